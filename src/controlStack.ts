// src/controlStack.ts

import { BasicError } from './errors.js';

export const DEFAULT_GOSUB_STACK_DEPTH = 10;
export const DEFAULT_FOR_STACK_DEPTH = 4;

/**
 * スタックが満杯のときの振る舞い。
 * - 'fail': StackExhausted エラー（GOSUB）
 * - 'ignore': 積まずに黙って続行（FOR）
 */
export type OverflowPolicy = 'fail' | 'ignore';

/** FORループの状態 */
export interface ForFrame {
    resumePosition: number; // FORの次の行のソース位置
    variable: number;
    limit: number;
    step: number;
}

/**
 * 固定深さのスタック。
 */
export class BoundedStack<T> {
    private frames: T[] = [];

    constructor(
        private readonly depth: number,
        private readonly policy: OverflowPolicy,
    ) {
        if (!Number.isInteger(depth) || depth < 1) {
            throw new RangeError(`stack depth must be a positive integer: ${depth}`);
        }
    }

    /**
     * フレームを積みます。
     * @returns 積めた場合 true、'ignore' ポリシーで捨てた場合 false
     * @throws {BasicError} 'fail' ポリシーで満杯の場合
     */
    push(frame: T): boolean {
        if (this.frames.length >= this.depth) {
            if (this.policy === 'fail') {
                throw new BasicError('StackExhausted');
            }
            return false;
        }
        this.frames.push(frame);
        return true;
    }

    pop(): T | undefined {
        return this.frames.pop();
    }

    peek(): T | undefined {
        return this.frames[this.frames.length - 1];
    }

    clear(): void {
        this.frames = [];
    }

    get size(): number {
        return this.frames.length;
    }

    get capacity(): number {
        return this.depth;
    }
}

export function createGosubStack(depth: number = DEFAULT_GOSUB_STACK_DEPTH): BoundedStack<number> {
    return new BoundedStack<number>(depth, 'fail');
}

export function createForStack(depth: number = DEFAULT_FOR_STACK_DEPTH): BoundedStack<ForFrame> {
    return new BoundedStack<ForFrame>(depth, 'ignore');
}
