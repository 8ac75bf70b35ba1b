// src/tokenSource.ts

/**
 * 字句解析で識別されるトークンの種類を定義します。
 */
export enum TokenType {
    ERROR = 'ERROR',
    ENDOFINPUT = 'ENDOFINPUT',
    CR = 'CR', // 行末

    // リテラル
    NUMBER = 'NUMBER',
    STRING = 'STRING',
    INTVAR = 'INTVAR', // A-Z
    STRINGVAR = 'STRINGVAR', // A$-Z$

    // ステートメント
    LET = 'LET',
    PRINT = 'PRINT',
    IF = 'IF',
    THEN = 'THEN',
    ELSE = 'ELSE',
    FOR = 'FOR',
    TO = 'TO',
    NEXT = 'NEXT',
    STEP = 'STEP',
    GO = 'GO',
    SUB = 'SUB',
    RETURN = 'RETURN',
    REM = 'REM',
    POKE = 'POKE',
    STOP = 'STOP',
    DATA = 'DATA',
    RANDOMIZE = 'RANDOMIZE',
    OPTION = 'OPTION',
    BASE = 'BASE',
    INPUT = 'INPUT',
    RESTORE = 'RESTORE',
    TAB = 'TAB',

    // 数値関数
    PEEK = 'PEEK',
    ABS = 'ABS',
    INT = 'INT',
    SGN = 'SGN',
    LEN = 'LEN',
    CODE = 'CODE',
    VAL = 'VAL',
    RND = 'RND',

    // 文字列関数
    LEFTSTR = 'LEFTSTR', // LEFT$
    RIGHTSTR = 'RIGHTSTR', // RIGHT$
    MIDSTR = 'MIDSTR', // MID$
    CHRSTR = 'CHRSTR', // CHR$

    // 演算子
    PLUS = 'PLUS', // +
    MINUS = 'MINUS', // -
    ASTR = 'ASTR', // *
    SLASH = 'SLASH', // /
    MOD = 'MOD', // % MOD
    AND = 'AND', // & AND
    OR = 'OR', // | OR
    LT = 'LT', // <
    GT = 'GT', // >
    EQ = 'EQ', // =
    NE = 'NE', // <>
    LE = 'LE', // <=
    GE = 'GE', // >=

    // 区切り
    LEFTPAREN = 'LEFTPAREN',
    RIGHTPAREN = 'RIGHTPAREN',
    COMMA = 'COMMA',
    SEMICOLON = 'SEMICOLON',
}

export const NUMERIC_FUNCTIONS: ReadonlySet<TokenType> = new Set([
    TokenType.PEEK,
    TokenType.ABS,
    TokenType.INT,
    TokenType.SGN,
    TokenType.LEN,
    TokenType.CODE,
    TokenType.VAL,
    TokenType.RND,
]);

export const STRING_FUNCTIONS: ReadonlySet<TokenType> = new Set([
    TokenType.LEFTSTR,
    TokenType.RIGHTSTR,
    TokenType.MIDSTR,
    TokenType.CHRSTR,
]);

/**
 * インタプリタが消費するトークン列の契約。
 * 位置 (pos) は不透明な数値で、goto() で同じトークンに戻れることだけを保証します。
 */
export interface TokenSource {
    /** プログラムテキストを設定し、先頭のトークンに位置づけます */
    load(program: string): void;
    token(): TokenType;
    next(): void;
    /** NUMBER トークンの値 */
    num(): number;
    /** STRING トークンの内容（引用符を除いたバイト列） */
    stringValue(): Uint8Array;
    /** INTVAR / STRINGVAR トークンの変数参照 */
    variableNum(): number;
    pos(): number;
    goto(position: number): void;
    /** 現在位置を退避します */
    push(): void;
    /** push() で退避した位置に戻ります */
    pop(): void;
    /** 現在行の残りを読み飛ばし、次の行の先頭トークンに進みます */
    nextLine(): void;
    finished(): boolean;
}
