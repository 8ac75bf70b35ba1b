// src/errors.ts

/**
 * インタプリタが報告するエラーの種類。
 * いずれも実行中のプログラム全体にとって致命的です。
 */
export type BasicErrorKind =
    | 'SyntaxError'
    | 'TypeMismatch'
    | 'DivisionByZero'
    | 'OutOfSpace'
    | 'StackExhausted'
    | 'MismatchedNext'
    | 'UndefinedLine'
    | 'InvalidBase'
    | 'InvalidVariable'
    | 'InvalidAddress'
    | 'EndOfInput';

const ERROR_MESSAGES: Record<BasicErrorKind, string> = {
    SyntaxError: 'Syntax',
    TypeMismatch: 'Type mismatch',
    DivisionByZero: 'Division by zero',
    OutOfSpace: 'Out of string space',
    StackExhausted: 'GOSUB stack exhausted',
    MismatchedNext: 'Mismatched NEXT',
    UndefinedLine: 'Undefined line',
    InvalidBase: 'Invalid base',
    InvalidVariable: 'Invalid variable',
    InvalidAddress: 'Invalid address',
    EndOfInput: 'End of input',
};

/**
 * BASICプログラム実行時のエラー。
 * lineNumber は実行中の行が分かっている場合に BasicInterpreter が設定します。
 */
export class BasicError extends Error {
    readonly kind: BasicErrorKind;
    readonly detail: string | undefined;
    lineNumber: number | undefined;

    constructor(kind: BasicErrorKind, detail?: string) {
        super(detail ? `${ERROR_MESSAGES[kind]} error: ${detail}` : `${ERROR_MESSAGES[kind]} error`);
        this.name = 'BasicError';
        this.kind = kind;
        this.detail = detail;
        this.lineNumber = undefined;
    }

    /**
     * ホストに表示するための一行メッセージ。
     * 例: "Line 30: Type mismatch error."
     */
    report(): string {
        const prefix = this.lineNumber !== undefined ? `Line ${this.lineNumber}: ` : '';
        return `${prefix}${this.message}.`;
    }
}

export function isBasicError(error: unknown): error is BasicError {
    return error instanceof BasicError;
}
