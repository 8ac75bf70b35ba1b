// src/values.ts

/**
 * 長さ先頭付き文字列。
 * 先頭1バイトが長さ(0-255)、続く length バイトが内容です。終端バイトはありません。
 */
export type BasicString = Uint8Array;

export interface IntegerValue {
    type: 'integer';
    value: number;
}

export interface StringValue {
    type: 'string';
    value: BasicString;
}

export type BasicValue = IntegerValue | StringValue;

export type ValueType = BasicValue['type'];

export const MAX_STRING_LENGTH = 255;

/** 変数参照のうち文字列変数を示すビット */
export const STRING_FLAG = 0x200;

export const VARIABLE_LETTERS = 26;
/** 1文字あたりの整数スロット数（0: スカラー、1-10: 添字要素） */
export const SLOTS_PER_LETTER = 11;
export const INTEGER_SLOT_COUNT = VARIABLE_LETTERS * SLOTS_PER_LETTER;

/** 未代入の文字列変数が共有する空文字列 */
export const EMPTY_STRING: BasicString = new Uint8Array(1);

export function integerValue(value: number): IntegerValue {
    return { type: 'integer', value: value | 0 };
}

export function stringValue(value: BasicString): StringValue {
    return { type: 'string', value };
}

export function isStringReference(ref: number): boolean {
    return (ref & STRING_FLAG) !== 0;
}

export function integerReference(letter: number, slot = 0): number {
    return letter * SLOTS_PER_LETTER + slot;
}

export function stringReference(letter: number): number {
    return STRING_FLAG | letter;
}

/**
 * 変数参照を "A", "A[3]"（スロット番号）, "A$" 形式の名前にします（デバッグ出力用）。
 */
export function referenceName(ref: number): string {
    if (isStringReference(ref)) {
        return `${String.fromCharCode(65 + (ref & ~STRING_FLAG))}$`;
    }
    const letter = String.fromCharCode(65 + Math.floor(ref / SLOTS_PER_LETTER));
    const slot = ref % SLOTS_PER_LETTER;
    return slot === 0 ? letter : `${letter}[${slot}]`;
}

export function stringLength(s: BasicString): number {
    return s[0] ?? 0;
}

/** 内容部分のバイト列（長さバイトを除く） */
export function stringContent(s: BasicString): Uint8Array {
    return s.subarray(1, 1 + stringLength(s));
}

/** ホスト側で扱う文字列へ変換します。各バイトを1文字として扱います。 */
export function decodeString(s: BasicString): string {
    return String.fromCharCode(...stringContent(s));
}

/** 文字列をバイト列にします。0-255 を超える文字コードは下位8ビットに切り詰めます。 */
export function encodeText(text: string): Uint8Array {
    const bytes = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
        bytes[i] = text.charCodeAt(i) & 0xff;
    }
    return bytes;
}

/**
 * バイト列の辞書順比較。共通部分が等しければ長い方が大きい。
 * @returns -1, 0, 1 のいずれか
 */
export function compareStrings(left: BasicString, right: BasicString): number {
    const leftLength = stringLength(left);
    const rightLength = stringLength(right);
    const shared = Math.min(leftLength, rightLength);
    for (let i = 1; i <= shared; i++) {
        const a = left[i] ?? 0;
        const b = right[i] ?? 0;
        if (a !== b) {
            return a < b ? -1 : 1;
        }
    }
    if (leftLength === rightLength) return 0;
    return leftLength > rightLength ? 1 : -1;
}

/**
 * 一時文字列領域を使わずに文字列を作ります（INPUT で読んだ行など）。
 * 255 バイトを超える部分は切り捨てます。
 */
export function ownedString(bytes: Uint8Array): BasicString {
    const length = Math.min(bytes.length, MAX_STRING_LENGTH);
    const result = new Uint8Array(length + 1);
    result[0] = length;
    result.set(bytes.subarray(0, length), 1);
    return result;
}
