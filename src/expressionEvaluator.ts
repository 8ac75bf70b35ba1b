// src/expressionEvaluator.ts

import { BasicError } from './errors.js';
import type { StringArena } from './stringArena.js';
import { NUMERIC_FUNCTIONS, STRING_FUNCTIONS, TokenType, type TokenSource } from './tokenSource.js';
import {
    SLOTS_PER_LETTER,
    compareStrings,
    integerValue,
    stringContent,
    stringLength,
    stringValue,
    type BasicString,
    type BasicValue,
    type ValueType,
} from './values.js';
import type { VariableStore } from './variableStore.js';

/**
 * 式評価がホスト（インタプリタ）に求める機能。
 */
export interface EvaluatorHost {
    peek(address: number): number;
    /** 0 以上 limit 未満の乱数（limit <= 0 なら 0） */
    random(limit: number): number;
    /** OPTION BASE で設定された添字の基点（0 または 1） */
    arrayBase(): number;
}

const MULTIPLICATIVE = new Set([TokenType.ASTR, TokenType.SLASH, TokenType.MOD]);
const ADDITIVE = new Set([TokenType.PLUS, TokenType.MINUS, TokenType.AND, TokenType.OR]);
const RELATIONAL = new Set([TokenType.LT, TokenType.GT, TokenType.EQ, TokenType.NE, TokenType.LE, TokenType.GE]);

const ELEMENT_SLOTS = SLOTS_PER_LETTER - 1;

/**
 * 再帰下降の式評価器。
 * factor → term → expr → relation の4段階で、いずれも左結合です。
 * トークン列を直接読み進めながら評価するので、AST は作りません。
 */
export class ExpressionEvaluator {
    constructor(
        private readonly tokens: TokenSource,
        private readonly arena: StringArena,
        private readonly variables: VariableStore,
        private readonly host: EvaluatorHost,
    ) {}

    // ==================== トークン操作 ====================

    /**
     * 現在のトークンが expected であることを確認して読み進めます。
     * @returns 読み進めた後のトークン
     */
    accept(expected: TokenType): TokenType {
        const actual = this.tokens.token();
        if (actual !== expected) {
            throw new BasicError('SyntaxError', `expected ${expected}, got ${actual}`);
        }
        this.tokens.next();
        return this.tokens.token();
    }

    /**
     * first か second のどちらかを受け付けます。
     * @returns 受け付けたトークン
     */
    acceptEither(first: TokenType, second: TokenType): TokenType {
        const actual = this.tokens.token();
        this.accept(actual === second ? second : first);
        return actual;
    }

    // ==================== 式の入口 ====================

    /**
     * 比較演算を含む式。結果は常に整数です（比較があれば 0/1）。
     * A < B < C は左から順に評価され、2回目以降は前の結果 (0/1) と比較されます。
     */
    relation(): BasicValue {
        let left = this.expression();
        let op = this.tokens.token();
        while (RELATIONAL.has(op)) {
            this.tokens.next();
            const right = this.expression();
            if (left.type !== right.type) {
                throw new BasicError('TypeMismatch');
            }
            const order = left.type === 'integer' && right.type === 'integer'
                ? Math.sign(left.value - right.value)
                : compareStrings(this.expectString(left), this.expectString(right));
            left = integerValue(compare(op, order) ? 1 : 0);
            op = this.tokens.token();
        }
        // 比較を伴わない文字列は条件として使えない
        return integerValue(this.expectInteger(left));
    }

    /**
     * 加減算・論理演算の段。
     */
    expression(): BasicValue {
        let left = this.term();
        let op = this.tokens.token();
        while (ADDITIVE.has(op)) {
            this.tokens.next();
            const right = this.term();
            if (op !== TokenType.PLUS && left.type !== 'integer') {
                throw new BasicError('TypeMismatch');
            }
            if (left.type === 'integer' && right.type === 'integer') {
                left = integerValue(applyAdditive(op, left.value, right.value));
            } else if (left.type === 'string' && right.type === 'string') {
                left = stringValue(this.arena.concat(left.value, right.value));
            } else {
                throw new BasicError('TypeMismatch');
            }
            op = this.tokens.token();
        }
        return left;
    }

    integerExpression(): number {
        return this.expectInteger(this.expression());
    }

    stringExpression(): BasicString {
        return this.expectString(this.expression());
    }

    /**
     * ( 整数式 ) を読みます。TAB(n) で使用します。
     */
    bracketedIntegerExpression(): number {
        this.accept(TokenType.LEFTPAREN);
        const value = this.integerExpression();
        this.accept(TokenType.RIGHTPAREN);
        return value;
    }

    /**
     * 変数参照を読み取ります。整数変数は A(i) の添字形式も受け付けます。
     * @throws {BasicError} InvalidVariable: 添字が範囲外
     */
    variableReference(): number {
        const token = this.tokens.token();
        const ref = this.tokens.variableNum();
        if (token === TokenType.STRINGVAR) {
            this.tokens.next();
            return ref;
        }
        this.accept(TokenType.INTVAR);
        if (this.tokens.token() !== TokenType.LEFTPAREN) {
            return ref;
        }
        const index = this.bracketedIntegerExpression();
        const slot = index - this.host.arrayBase() + 1;
        if (slot < 1 || slot > ELEMENT_SLOTS) {
            throw new BasicError('InvalidVariable', `subscript ${index} out of range`);
        }
        return ref + slot;
    }

    expectInteger(value: BasicValue): number {
        if (value.type !== 'integer') {
            throw new BasicError('TypeMismatch');
        }
        return value.value;
    }

    expectString(value: BasicValue): BasicString {
        if (value.type !== 'string') {
            throw new BasicError('TypeMismatch');
        }
        return value.value;
    }

    // ==================== 各段 ====================

    private term(): BasicValue {
        let left = this.factor();
        let op = this.tokens.token();
        while (MULTIPLICATIVE.has(op)) {
            this.tokens.next();
            const right = this.factor();
            const a = this.expectInteger(left);
            const b = this.expectInteger(right);
            left = integerValue(applyMultiplicative(op, a, b));
            op = this.tokens.token();
        }
        return left;
    }

    private factor(): BasicValue {
        const token = this.tokens.token();
        switch (token) {
            case TokenType.STRING: {
                // 次のトークンを読む前に一時領域へコピーする
                const literal = this.arena.fromBytes(this.tokens.stringValue());
                this.accept(TokenType.STRING);
                return stringValue(literal);
            }
            case TokenType.NUMBER: {
                const value = this.tokens.num();
                this.accept(TokenType.NUMBER);
                return integerValue(value);
            }
            case TokenType.LEFTPAREN: {
                this.accept(TokenType.LEFTPAREN);
                const value = this.expression();
                this.accept(TokenType.RIGHTPAREN);
                return value;
            }
            case TokenType.MINUS: {
                this.accept(TokenType.MINUS);
                return integerValue(-this.expectInteger(this.factor()));
            }
            case TokenType.INTVAR:
            case TokenType.STRINGVAR:
                return this.variables.get(this.variableReference());
            default:
                if (NUMERIC_FUNCTIONS.has(token)) {
                    this.tokens.next();
                    return integerValue(this.numericFunction(token));
                }
                if (STRING_FUNCTIONS.has(token)) {
                    this.tokens.next();
                    return stringValue(this.stringFunction(token));
                }
                throw new BasicError('SyntaxError', `unexpected ${token}`);
        }
    }

    // ==================== 組み込み関数 ====================

    /**
     * ( 引数, ... ) を読み、それぞれが signature の型であることを確認します。
     */
    private functionArguments(...signature: ValueType[]): BasicValue[] {
        const args: BasicValue[] = [];
        this.accept(TokenType.LEFTPAREN);
        signature.forEach((expected, index) => {
            const value = this.expression();
            if (value.type !== expected) {
                throw new BasicError('TypeMismatch');
            }
            args.push(value);
            if (index < signature.length - 1) {
                this.accept(TokenType.COMMA);
            }
        });
        this.accept(TokenType.RIGHTPAREN);
        return args;
    }

    private integerArgument(args: BasicValue[], index: number): number {
        const arg = args[index];
        if (arg === undefined) {
            throw new BasicError('SyntaxError', 'missing argument');
        }
        return this.expectInteger(arg);
    }

    private stringArgument(args: BasicValue[], index: number): BasicString {
        const arg = args[index];
        if (arg === undefined) {
            throw new BasicError('SyntaxError', 'missing argument');
        }
        return this.expectString(arg);
    }

    private numericFunction(token: TokenType): number {
        switch (token) {
            case TokenType.PEEK: {
                const args = this.functionArguments('integer');
                return this.host.peek(this.integerArgument(args, 0));
            }
            case TokenType.ABS: {
                const args = this.functionArguments('integer');
                return Math.abs(this.integerArgument(args, 0));
            }
            case TokenType.INT: {
                const args = this.functionArguments('integer');
                return this.integerArgument(args, 0);
            }
            case TokenType.SGN: {
                const args = this.functionArguments('integer');
                return Math.sign(this.integerArgument(args, 0));
            }
            case TokenType.LEN: {
                const args = this.functionArguments('string');
                return stringLength(this.stringArgument(args, 0));
            }
            case TokenType.CODE: {
                const args = this.functionArguments('string');
                const content = stringContent(this.stringArgument(args, 0));
                return content[0] ?? 0;
            }
            case TokenType.VAL: {
                const args = this.functionArguments('string');
                return parseDecimal(this.stringArgument(args, 0));
            }
            case TokenType.RND: {
                const args = this.functionArguments('integer');
                return this.host.random(this.integerArgument(args, 0));
            }
            default:
                throw new BasicError('SyntaxError', `unexpected ${token}`);
        }
    }

    private stringFunction(token: TokenType): BasicString {
        switch (token) {
            case TokenType.LEFTSTR: {
                const args = this.functionArguments('string', 'integer');
                return this.cut(this.stringArgument(args, 0), 1, this.integerArgument(args, 1));
            }
            case TokenType.RIGHTSTR: {
                const args = this.functionArguments('string', 'integer');
                const source = this.stringArgument(args, 0);
                const count = this.integerArgument(args, 1);
                const remaining = stringLength(source) - count;
                if (remaining <= 0) {
                    return this.arena.allocate(0);
                }
                return this.cut(source, remaining + 1, count);
            }
            case TokenType.MIDSTR: {
                const args = this.functionArguments('string', 'integer', 'integer');
                return this.cut(this.stringArgument(args, 0), this.integerArgument(args, 1), this.integerArgument(args, 2));
            }
            case TokenType.CHRSTR: {
                const args = this.functionArguments('integer');
                // 宣言長は2、内容は先頭1バイトのみ設定（2バイト目は0）
                const result = this.arena.allocate(2);
                result[1] = this.integerArgument(args, 0) & 0xff;
                return result;
            }
            default:
                throw new BasicError('SyntaxError', `unexpected ${token}`);
        }
    }

    /**
     * 1始まりの start から count バイトを切り出した一時文字列を作ります。
     * start が長さを超える場合は空文字列、count は残りのバイト数に切り詰めます。
     */
    private cut(source: BasicString, start: number, count: number): BasicString {
        const length = stringLength(source);
        const first = Math.max(1, start);
        if (first > length) {
            return this.arena.allocate(0);
        }
        const size = Math.min(Math.max(0, count), length - first + 1);
        const result = this.arena.allocate(size);
        result.set(source.subarray(first, first + size), 1);
        return result;
    }
}

function compare(op: TokenType, order: number): boolean {
    switch (op) {
        case TokenType.LT: return order < 0;
        case TokenType.GT: return order > 0;
        case TokenType.EQ: return order === 0;
        case TokenType.NE: return order !== 0;
        case TokenType.LE: return order <= 0;
        case TokenType.GE: return order >= 0;
        default:
            throw new BasicError('SyntaxError', `unexpected ${op}`);
    }
}

function applyAdditive(op: TokenType, left: number, right: number): number {
    switch (op) {
        case TokenType.PLUS: return (left + right) | 0;
        case TokenType.MINUS: return (left - right) | 0;
        case TokenType.AND: return left & right;
        case TokenType.OR: return left | right;
        default:
            throw new BasicError('SyntaxError', `unexpected ${op}`);
    }
}

function applyMultiplicative(op: TokenType, left: number, right: number): number {
    switch (op) {
        case TokenType.ASTR:
            return Math.imul(left, right);
        case TokenType.SLASH:
            if (right === 0) {
                throw new BasicError('DivisionByZero');
            }
            return Math.trunc(left / right) | 0; // 0方向への切り捨て
        case TokenType.MOD:
            if (right === 0) {
                throw new BasicError('DivisionByZero');
            }
            return (left % right) | 0;
        default:
            throw new BasicError('SyntaxError', `unexpected ${op}`);
    }
}

/**
 * VAL の実装。先頭の '-' の後に1桁以上の数字のみを受け付けます。
 * @throws {BasicError} TypeMismatch: 空文字列や数字以外を含む場合
 */
export function parseDecimal(source: BasicString): number {
    const content = stringContent(source);
    let index = 0;
    let negative = false;
    if (content[0] === 0x2d) {
        negative = true;
        index = 1;
    }
    if (index >= content.length) {
        throw new BasicError('TypeMismatch');
    }
    let value = 0;
    for (; index < content.length; index++) {
        const digit = (content[index] ?? 0) - 0x30;
        if (digit < 0 || digit > 9) {
            throw new BasicError('TypeMismatch');
        }
        value = (Math.imul(value, 10) + digit) | 0;
    }
    return negative ? -value | 0 : value;
}
