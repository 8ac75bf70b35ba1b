// src/variableStore.ts

import { BasicError } from './errors.js';
import {
    EMPTY_STRING,
    INTEGER_SLOT_COUNT,
    STRING_FLAG,
    VARIABLE_LETTERS,
    integerValue,
    isStringReference,
    stringLength,
    stringValue,
    type BasicString,
    type BasicValue,
} from './values.js';

/**
 * 変数領域管理クラス
 *
 * - 整数変数: 26文字 × 11スロット（32bit符号付き整数）
 * - 文字列変数: 26スロット。各スロットは自分専用のバッファを持ちます
 *
 * 文字列の代入では必ずバッファを複製するため、一時文字列領域や
 * 他の変数のバッファを参照し続けることはありません。
 */
export class VariableStore {
    private integers: Int32Array = new Int32Array(INTEGER_SLOT_COUNT);
    private strings: BasicString[] = new Array<BasicString>(VARIABLE_LETTERS).fill(EMPTY_STRING);

    /**
     * 変数の値を読み取ります。
     * 文字列変数は所有バッファへの参照を返すので、呼び出し側で書き換えないでください。
     * @throws {BasicError} InvalidVariable: 範囲外の参照
     */
    get(ref: number): BasicValue {
        if (isStringReference(ref)) {
            return stringValue(this.strings[this.stringSlot(ref)] ?? EMPTY_STRING);
        }
        return integerValue(this.integers[this.integerSlot(ref)] ?? 0);
    }

    /**
     * 変数に値を代入します。型が合わない場合は何も変更しません。
     * @throws {BasicError} TypeMismatch / InvalidVariable
     */
    set(ref: number, value: BasicValue): void {
        if (isStringReference(ref)) {
            if (value.type !== 'string') {
                throw new BasicError('TypeMismatch');
            }
            const slot = this.stringSlot(ref);
            this.strings[slot] = this.save(value.value);
            return;
        }
        if (value.type !== 'integer') {
            throw new BasicError('TypeMismatch');
        }
        this.integers[this.integerSlot(ref)] = value.value;
    }

    /**
     * すべての変数を初期状態に戻します（プログラムのロード時）。
     */
    clear(): void {
        this.integers.fill(0);
        this.strings.fill(EMPTY_STRING);
    }

    /** 長さバイト込みで所有バッファへ複製 */
    private save(source: BasicString): BasicString {
        const length = stringLength(source);
        if (length === 0) {
            return EMPTY_STRING;
        }
        return source.slice(0, length + 1);
    }

    private integerSlot(ref: number): number {
        if (!Number.isInteger(ref) || ref < 0 || ref >= INTEGER_SLOT_COUNT) {
            throw new BasicError('InvalidVariable', `reference ${ref}`);
        }
        return ref;
    }

    private stringSlot(ref: number): number {
        const slot = ref & ~STRING_FLAG;
        if (slot < 0 || slot >= VARIABLE_LETTERS) {
            throw new BasicError('InvalidVariable', `reference ${ref}`);
        }
        return slot;
    }
}
