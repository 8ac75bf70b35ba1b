// src/stringArena.ts

import { BasicError } from './errors.js';
import { MAX_STRING_LENGTH, stringContent, type BasicString } from './values.js';

export const DEFAULT_ARENA_SIZE = 512;

/**
 * 一時文字列用のバンプアロケータ。
 * 式評価中に生成される文字列はすべてここから確保され、
 * ステートメントの開始ごとに reset() でまとめて破棄されます。
 * 次のステートメントまで残す値は VariableStore にコピーしてください。
 */
export class StringArena {
    private buffer: Uint8Array;
    private offset: number = 0;

    constructor(size: number = DEFAULT_ARENA_SIZE) {
        this.buffer = new Uint8Array(size);
    }

    /**
     * 長さ length の文字列領域を確保します（長さバイト込みで length + 1 バイト）。
     * 内容は0で初期化されます。
     * @throws {BasicError} OutOfSpace: 255 バイト超、または領域不足
     */
    allocate(length: number): BasicString {
        if (length > MAX_STRING_LENGTH) {
            throw new BasicError('OutOfSpace', 'string too long');
        }
        const size = Math.max(0, length) + 1;
        if (this.offset + size > this.buffer.length) {
            throw new BasicError('OutOfSpace', 'out of temporary space');
        }
        const view = this.buffer.subarray(this.offset, this.offset + size);
        view.fill(0);
        view[0] = size - 1;
        this.offset += size;
        return view;
    }

    /**
     * バイト列をコピーした一時文字列を作ります。
     */
    fromBytes(bytes: Uint8Array): BasicString {
        const view = this.allocate(bytes.length);
        view.set(bytes, 1);
        return view;
    }

    /**
     * 2つの文字列を連結した新しい一時文字列を作ります。元の文字列は変更しません。
     */
    concat(left: BasicString, right: BasicString): BasicString {
        const leftContent = stringContent(left);
        const rightContent = stringContent(right);
        const view = this.allocate(leftContent.length + rightContent.length);
        view.set(leftContent, 1);
        view.set(rightContent, 1 + leftContent.length);
        return view;
    }

    reset(): void {
        this.offset = 0;
    }

    /** 現在使用中のバイト数 */
    used(): number {
        return this.offset;
    }

    capacity(): number {
        return this.buffer.length;
    }
}
