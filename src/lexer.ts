// src/lexer.ts

import { TokenType, type TokenSource } from './tokenSource.js';
import { encodeText, integerReference, stringReference } from './values.js';

/**
 * キーワード表。先頭一致で上から順に照合します。
 * GOTO / GOSUB は GO の後に TO / SUB が続く2トークンとして扱います。
 */
const KEYWORDS: ReadonlyArray<readonly [string, TokenType]> = [
    ['LET', TokenType.LET],
    ['PRINT', TokenType.PRINT],
    ['IF', TokenType.IF],
    ['THEN', TokenType.THEN],
    ['ELSE', TokenType.ELSE],
    ['FOR', TokenType.FOR],
    ['TO', TokenType.TO],
    ['NEXT', TokenType.NEXT],
    ['STEP', TokenType.STEP],
    ['GO', TokenType.GO],
    ['SUB', TokenType.SUB],
    ['RETURN', TokenType.RETURN],
    ['REM', TokenType.REM],
    ['PEEK', TokenType.PEEK],
    ['POKE', TokenType.POKE],
    ['STOP', TokenType.STOP],
    ['END', TokenType.STOP],
    ['DATA', TokenType.DATA],
    ['RANDOMIZE', TokenType.RANDOMIZE],
    ['OPTION', TokenType.OPTION],
    ['BASE', TokenType.BASE],
    ['INPUT', TokenType.INPUT],
    ['RESTORE', TokenType.RESTORE],
    ['TAB', TokenType.TAB],
    ['ABS', TokenType.ABS],
    ['INT', TokenType.INT],
    ['SGN', TokenType.SGN],
    ['LEN', TokenType.LEN],
    ['CODE', TokenType.CODE],
    ['VAL', TokenType.VAL],
    ['RND', TokenType.RND],
    ['LEFT$', TokenType.LEFTSTR],
    ['RIGHT$', TokenType.RIGHTSTR],
    ['MID$', TokenType.MIDSTR],
    ['CHR$', TokenType.CHRSTR],
    ['AND', TokenType.AND],
    ['OR', TokenType.OR],
    ['MOD', TokenType.MOD],
];

const SINGLE_CHAR_TOKENS: Readonly<Record<string, TokenType>> = {
    '+': TokenType.PLUS,
    '-': TokenType.MINUS,
    '*': TokenType.ASTR,
    '/': TokenType.SLASH,
    '%': TokenType.MOD,
    '&': TokenType.AND,
    '|': TokenType.OR,
    '=': TokenType.EQ,
    '(': TokenType.LEFTPAREN,
    ')': TokenType.RIGHTPAREN,
    ',': TokenType.COMMA,
    ';': TokenType.SEMICOLON,
};

/**
 * プログラムテキストを先頭から1トークンずつ読むレキサー。
 * 位置はテキスト中のトークン開始オフセットです。
 * 解釈できない文字や閉じていない文字列は ERROR トークンになり、
 * それを受け取ったインタプリタが構文エラーとして扱います。
 */
export class Lexer implements TokenSource {
    private source: string = '';
    private cursor: number = 0; // 現在のトークンの開始位置
    private nextCursor: number = 0; // 現在のトークンの直後
    private current: TokenType = TokenType.ENDOFINPUT;
    private numberValue: number = 0;
    private stringBytes: Uint8Array = new Uint8Array(0);
    private variableNumber: number = 0;
    private savedPositions: number[] = [];

    load(program: string): void {
        this.source = program;
        this.savedPositions = [];
        this.goto(0);
    }

    token(): TokenType {
        return this.current;
    }

    next(): void {
        if (this.current === TokenType.ENDOFINPUT) {
            return;
        }
        this.goto(this.nextCursor);
    }

    num(): number {
        return this.numberValue;
    }

    stringValue(): Uint8Array {
        return this.stringBytes;
    }

    variableNum(): number {
        return this.variableNumber;
    }

    pos(): number {
        return this.cursor;
    }

    goto(position: number): void {
        this.cursor = this.skipBlanks(Math.max(0, Math.min(position, this.source.length)));
        this.scan();
    }

    push(): void {
        this.savedPositions.push(this.cursor);
    }

    pop(): void {
        const position = this.savedPositions.pop();
        if (position === undefined) {
            throw new Error('Lexer.pop() called without a matching push()');
        }
        this.goto(position);
    }

    nextLine(): void {
        const newline = this.source.indexOf('\n', this.cursor);
        this.goto(newline === -1 ? this.source.length : newline + 1);
    }

    finished(): boolean {
        return this.current === TokenType.ENDOFINPUT;
    }

    private skipBlanks(position: number): number {
        let cursor = position;
        while (cursor < this.source.length) {
            const char = this.source[cursor];
            if (char === ' ' || char === '\t' || char === '\r') {
                cursor++;
            } else {
                break;
            }
        }
        return cursor;
    }

    /**
     * cursor 位置のトークンを読み取り、current と nextCursor を設定します。
     */
    private scan(): void {
        const start = this.cursor;
        const char = this.source[start];

        if (char === undefined) {
            this.setToken(TokenType.ENDOFINPUT, start);
            return;
        }

        if (char === '\n') {
            this.setToken(TokenType.CR, start + 1);
            return;
        }

        if (/[0-9]/.test(char)) {
            this.scanNumber(start);
            return;
        }

        if (char === '"') {
            this.scanString(start);
            return;
        }

        for (const [keyword, type] of KEYWORDS) {
            if (this.source.startsWith(keyword, start)) {
                this.setToken(type, start + keyword.length);
                return;
            }
        }

        if (/[A-Z]/.test(char)) {
            const letter = char.charCodeAt(0) - 65;
            if (this.source[start + 1] === '$') {
                this.variableNumber = stringReference(letter);
                this.setToken(TokenType.STRINGVAR, start + 2);
            } else {
                this.variableNumber = integerReference(letter);
                this.setToken(TokenType.INTVAR, start + 1);
            }
            return;
        }

        // 比較演算子
        if (char === '<') {
            const following = this.source[start + 1];
            if (following === '=') {
                this.setToken(TokenType.LE, start + 2);
            } else if (following === '>') {
                this.setToken(TokenType.NE, start + 2);
            } else {
                this.setToken(TokenType.LT, start + 1);
            }
            return;
        }
        if (char === '>') {
            if (this.source[start + 1] === '=') {
                this.setToken(TokenType.GE, start + 2);
            } else {
                this.setToken(TokenType.GT, start + 1);
            }
            return;
        }

        const single = SINGLE_CHAR_TOKENS[char];
        if (single !== undefined) {
            this.setToken(single, start + 1);
            return;
        }

        this.setToken(TokenType.ERROR, start + 1);
    }

    private scanNumber(start: number): void {
        let cursor = start;
        let digits = '';
        let radix = 10;

        // 0xまたは0Xで始まる場合は16進数
        const prefix = this.source[start + 1];
        if (this.source[start] === '0' && (prefix === 'x' || prefix === 'X')) {
            radix = 16;
            cursor += 2;
            while (cursor < this.source.length && /[0-9A-Fa-f]/.test(this.source[cursor] ?? '')) {
                digits += this.source[cursor];
                cursor++;
            }
            if (digits.length === 0) {
                this.setToken(TokenType.ERROR, cursor);
                return;
            }
        } else {
            while (cursor < this.source.length && /[0-9]/.test(this.source[cursor] ?? '')) {
                digits += this.source[cursor];
                cursor++;
            }
        }

        // 32bit符号付き整数にラップアラウンド
        this.numberValue = Number(BigInt.asIntN(32, BigInt(radix === 16 ? `0x${digits}` : digits)));
        this.setToken(TokenType.NUMBER, cursor);
    }

    private scanString(start: number): void {
        let value = '';
        let cursor = start + 1; // 開始の " をスキップ

        while (cursor < this.source.length) {
            const currentChar = this.source[cursor];
            if (currentChar === '\n') {
                break;
            }
            if (currentChar === '"') {
                if (this.source[cursor + 1] === '"') {
                    // "" はエスケープされたダブルクォート
                    value += '"';
                    cursor += 2;
                    continue;
                }
                this.stringBytes = encodeText(value);
                this.setToken(TokenType.STRING, cursor + 1);
                return;
            }
            value += currentChar;
            cursor++;
        }

        // 文字列が閉じていない
        this.setToken(TokenType.ERROR, cursor);
    }

    private setToken(type: TokenType, end: number): void {
        this.current = type;
        this.nextCursor = end;
    }
}
