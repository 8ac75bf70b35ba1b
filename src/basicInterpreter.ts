// src/basicInterpreter.ts

import {
    DEFAULT_FOR_STACK_DEPTH,
    DEFAULT_GOSUB_STACK_DEPTH,
    createForStack,
    createGosubStack,
    type BoundedStack,
    type ForFrame,
} from './controlStack.js';
import { BasicError } from './errors.js';
import { ExpressionEvaluator } from './expressionEvaluator.js';
import { Lexer } from './lexer.js';
import { LineIndex, type LineIndexEntry } from './lineIndex.js';
import { OutputSink } from './outputSink.js';
import { Rnd, entropySeed } from './random.js';
import { DEFAULT_ARENA_SIZE, StringArena } from './stringArena.js';
import { STRING_FUNCTIONS, TokenType, type TokenSource } from './tokenSource.js';
import {
    SLOTS_PER_LETTER,
    decodeString,
    encodeText,
    integerReference,
    integerValue,
    ownedString,
    referenceName,
    stringContent,
    stringReference,
    stringValue,
} from './values.js';
import { VariableStore } from './variableStore.js';

/**
 * インタプリタの設定。ホスト側の入出力とメモリアクセスは依存性注入されます。
 */
export interface BasicInterpreterConfig {
    writeFn?: (text: string) => void; // PRINT/INPUTプロンプトの出力先
    getLineFn?: () => string | null; // INPUT用の行入力（null は入力終端）
    peekFn?: (address: number) => number;
    pokeFn?: (address: number, value: number) => void;
    debugFn?: (message: string) => void; // トレース出力（未指定なら何も出さない）
    gosubStackDepth?: number;
    forStackDepth?: number;
    arenaSize?: number;
    tokenSource?: TokenSource;
}

/**
 * DATA文の読み取り位置
 */
export interface DataCursor {
    position: number;
    needsSeek: boolean;
}

/** 最終行の GOSUB から RETURN したときの戻り先 */
const END_OF_PROGRAM = -1;

/**
 * 行番号付きBASICインタプリタのコアクラス。
 * step() を1回呼ぶごとにちょうど1行を実行し、制御をホストに返します。
 *
 * 変数・スタック・一時文字列領域・行インデックスはすべてインスタンスが保持します。
 * 1つのインスタンスを複数の呼び出し元から同時に使う場合は、ホスト側で排他してください。
 */
class BasicInterpreter {
    private tokens: TokenSource;
    private arena: StringArena;
    private variables: VariableStore = new VariableStore();
    private lineIndex: LineIndex = new LineIndex();
    private gosubStack: BoundedStack<number>;
    private forStack: BoundedStack<ForFrame>;
    private evaluator: ExpressionEvaluator;
    private output: OutputSink;
    private rnd: Rnd = new Rnd();
    private getLineFn: (() => string | null) | undefined;
    private peekFn: ((address: number) => number) | undefined;
    private pokeFn: ((address: number, value: number) => void) | undefined;
    private debugFn: ((message: string) => void) | undefined;
    private statementExecutors: Map<TokenType, () => void> = new Map(); // 先頭トークンと実行関数のマッピング

    private loaded: boolean = false;
    private ended: boolean = false;
    private error: BasicError | undefined;
    private currentLine: number | undefined; // 実行中の行番号
    private programStart: number = 0;
    private arrayBase: number = 0;
    private dataCursor: DataCursor = { position: 0, needsSeek: true };
    private thenBranch: boolean = false; // IF の THEN 側を実行中か（ELSE で文が終わる）

    constructor(config: BasicInterpreterConfig = {}) {
        const writeFn = config.writeFn ?? ((text: string) => { process.stdout.write(text); });
        this.getLineFn = config.getLineFn;
        this.peekFn = config.peekFn;
        this.pokeFn = config.pokeFn;
        this.debugFn = config.debugFn;
        this.tokens = config.tokenSource ?? new Lexer();
        this.arena = new StringArena(config.arenaSize ?? DEFAULT_ARENA_SIZE);
        this.gosubStack = createGosubStack(config.gosubStackDepth ?? DEFAULT_GOSUB_STACK_DEPTH);
        this.forStack = createForStack(config.forStackDepth ?? DEFAULT_FOR_STACK_DEPTH);
        this.output = new OutputSink(writeFn);
        this.evaluator = new ExpressionEvaluator(this.tokens, this.arena, this.variables, {
            peek: (address) => this.peek(address),
            random: (limit) => this.rnd.next(limit),
            arrayBase: () => this.arrayBase,
        });

        this.initializeStatementExecutors();
    }

    /**
     * ステートメント実行関数のマッピングを初期化します。
     */
    private initializeStatementExecutors(): void {
        this.statementExecutors.set(TokenType.PRINT, () => this.executePrint());
        this.statementExecutors.set(TokenType.IF, () => this.executeIf());
        this.statementExecutors.set(TokenType.GO, () => this.executeGo());
        this.statementExecutors.set(TokenType.RETURN, () => this.executeReturn());
        this.statementExecutors.set(TokenType.FOR, () => this.executeFor());
        this.statementExecutors.set(TokenType.NEXT, () => this.executeNext());
        this.statementExecutors.set(TokenType.POKE, () => this.executePoke());
        this.statementExecutors.set(TokenType.STOP, () => this.executeStop());
        this.statementExecutors.set(TokenType.REM, () => this.executeRem());
        this.statementExecutors.set(TokenType.DATA, () => this.executeData());
        this.statementExecutors.set(TokenType.RANDOMIZE, () => this.executeRandomize());
        this.statementExecutors.set(TokenType.OPTION, () => this.executeOption());
        this.statementExecutors.set(TokenType.INPUT, () => this.executeInput());
        this.statementExecutors.set(TokenType.RESTORE, () => this.executeRestore());
        this.statementExecutors.set(TokenType.LET, () => this.executeLet());
        this.statementExecutors.set(TokenType.INTVAR, () => this.executeLet());
        this.statementExecutors.set(TokenType.STRINGVAR, () => this.executeLet());
    }

    /**
     * プログラムをロードし、すべての状態を初期化します。
     * このメソッドは実行前に一度呼び出す必要があります。
     */
    loadProgram(program: string): void {
        this.tokens.load(program);
        this.programStart = this.tokens.pos();
        this.variables.clear();
        this.lineIndex.clear();
        this.gosubStack.clear();
        this.forStack.clear();
        this.arena.reset();
        this.output.resetColumn();
        this.rnd = new Rnd();
        this.dataCursor = { position: this.programStart, needsSeek: true };
        this.arrayBase = 0;
        this.thenBranch = false;
        this.ended = false;
        this.error = undefined;
        this.currentLine = undefined;
        this.loaded = true;
    }

    /**
     * 1行だけ実行します。終了済みなら何もしません。
     * @throws {BasicError} 実行時エラー。以後このインスタンスは終了状態になります
     */
    step(): void {
        if (!this.loaded) {
            throw new Error('プログラムがロードされていません。loadProgram()を先に呼び出してください。');
        }
        if (this.isFinished()) {
            return;
        }
        try {
            this.lineStatement();
        } catch (error) {
            this.ended = true;
            if (error instanceof BasicError) {
                if (error.lineNumber === undefined) {
                    error.lineNumber = this.currentLine;
                }
                this.error = error;
            }
            throw error;
        }
    }

    /**
     * プログラムを実行します（Generator Functionとして実装）。
     * 外部からのクロック（next()呼び出し）ごとに1行を実行します。
     */
    public *run(): Generator<void, void, void> {
        while (!this.isFinished()) {
            this.step();
            yield;
        }
    }

    isFinished(): boolean {
        return this.ended || this.tokens.finished();
    }

    // ==================== 行とステートメント ====================

    private lineStatement(): void {
        // 空行は読み飛ばす
        while (this.tokens.token() === TokenType.CR) {
            this.tokens.next();
        }
        if (this.tokens.finished()) {
            return;
        }
        if (this.tokens.token() !== TokenType.NUMBER) {
            this.currentLine = undefined;
            throw new BasicError('SyntaxError', 'line number expected');
        }
        const lineNumber = this.tokens.num();
        this.currentLine = lineNumber;
        this.lineIndex.add(lineNumber, this.tokens.pos());
        this.debug(`----- line ${lineNumber} -----`);
        this.evaluator.accept(TokenType.NUMBER);
        this.statement();
    }

    /**
     * 先頭トークンに応じたステートメントを1つ実行します。
     * 一時文字列領域はここで毎回リセットされます。
     */
    private statement(): void {
        this.arena.reset();
        const token = this.tokens.token();
        const executor = this.statementExecutors.get(token);
        if (!executor) {
            throw new BasicError('SyntaxError', `unexpected ${token}`);
        }
        executor();
    }

    /**
     * ステートメントの終わりを確認します。
     * 行末は読み進め、入力終端はそのまま残します。
     * THEN 側の実行中に ELSE が来たら行の残りを読み飛ばします。
     */
    private endStatement(): void {
        const token = this.tokens.token();
        if (token === TokenType.ELSE && this.thenBranch) {
            this.tokens.nextLine();
            return;
        }
        if (token === TokenType.ENDOFINPUT) {
            return;
        }
        this.evaluator.accept(TokenType.CR);
    }

    private isStatementEnd(token: TokenType): boolean {
        return token === TokenType.CR
            || token === TokenType.ENDOFINPUT
            || (token === TokenType.ELSE && this.thenBranch);
    }

    // ==================== ジャンプ ====================

    /**
     * 指定行へ移動します。インデックスになければ先頭から順に探します。
     * @throws {BasicError} UndefinedLine: 行が存在しない
     */
    private jump(lineNumber: number): void {
        const position = this.lineIndex.find(lineNumber);
        if (position !== undefined) {
            this.debug(`jump: line ${lineNumber} found in index`);
            this.tokens.goto(position);
            return;
        }
        this.debug(`jump: scanning for line ${lineNumber}`);
        this.jumpSlow(lineNumber);
    }

    private jumpSlow(lineNumber: number): void {
        this.tokens.goto(this.programStart);
        for (;;) {
            while (this.tokens.token() === TokenType.CR) {
                this.tokens.next();
            }
            if (this.tokens.finished()) {
                throw new BasicError('UndefinedLine', `line ${lineNumber}`);
            }
            if (this.tokens.token() === TokenType.NUMBER && this.tokens.num() === lineNumber) {
                return;
            }
            this.tokens.nextLine();
        }
    }

    /**
     * 現在位置から見た次の行の行番号。なければ END_OF_PROGRAM。
     */
    private upcomingLineNumber(): number {
        this.tokens.push();
        while (this.tokens.token() === TokenType.CR) {
            this.tokens.next();
        }
        const lineNumber = this.tokens.token() === TokenType.NUMBER ? this.tokens.num() : END_OF_PROGRAM;
        this.tokens.pop();
        return lineNumber;
    }

    // ==================== ステートメント実行メソッド ====================

    /**
     * PRINT文を実行します。
     * 最後の区切りが , または ; なら改行しません。
     */
    private executePrint(): void {
        this.evaluator.accept(TokenType.PRINT);
        let suppressNewline = false;

        for (;;) {
            const token = this.tokens.token();
            if (this.isStatementEnd(token)) {
                break;
            }
            suppressNewline = false;

            if (token === TokenType.COMMA) {
                this.output.write('\t');
                suppressNewline = true;
                this.tokens.next();
            } else if (token === TokenType.SEMICOLON) {
                suppressNewline = true;
                this.tokens.next();
            } else if (token === TokenType.TAB) {
                this.evaluator.accept(TokenType.TAB);
                this.output.tab(this.evaluator.bracketedIntegerExpression());
            } else if (token === TokenType.STRING && this.printLiteral()) {
                continue;
            } else {
                const value = this.evaluator.expression();
                if (value.type === 'integer') {
                    this.output.write(String(value.value));
                } else {
                    this.output.writeBytes(stringContent(value.value));
                }
            }
        }

        if (!suppressNewline) {
            this.output.newline();
        }
        this.endStatement();
    }

    /**
     * 単独の文字列リテラルは一時領域を使わずにそのまま出力します（255バイト制限なし）。
     * 後ろに演算子が続く場合は false を返し、式として評価させます。
     */
    private printLiteral(): boolean {
        const literal = this.tokens.stringValue();
        const start = this.tokens.pos();
        this.tokens.next();
        const following = this.tokens.token();
        if (following === TokenType.COMMA || following === TokenType.SEMICOLON || this.isStatementEnd(following)) {
            this.output.writeBytes(literal);
            return true;
        }
        this.tokens.goto(start);
        return false;
    }

    /**
     * IF文を実行します。分岐ごとに1ステートメントだけ実行します。
     */
    private executeIf(): void {
        this.evaluator.accept(TokenType.IF);
        const condition = this.evaluator.expectInteger(this.evaluator.relation());
        this.evaluator.accept(TokenType.THEN);
        this.debug(`IF: condition ${condition}`);

        if (condition !== 0) {
            this.executeBranch(true);
            return;
        }

        // ELSE・行末まで評価せずに読み飛ばす
        let token = this.tokens.token();
        while (token !== TokenType.ELSE && token !== TokenType.CR && token !== TokenType.ENDOFINPUT) {
            this.tokens.next();
            token = this.tokens.token();
        }
        if (token === TokenType.ELSE) {
            this.tokens.next();
            this.executeBranch(false);
        } else if (token === TokenType.CR) {
            this.tokens.next();
        }
    }

    private executeBranch(thenBranch: boolean): void {
        const saved = this.thenBranch;
        this.thenBranch = thenBranch;
        try {
            this.statement();
        } finally {
            this.thenBranch = saved;
        }
    }

    /**
     * GO TO / GO SUB 文を実行します。
     */
    private executeGo(): void {
        this.evaluator.accept(TokenType.GO);
        const kind = this.evaluator.acceptEither(TokenType.TO, TokenType.SUB);
        const target = this.evaluator.integerExpression();
        this.endStatement();

        if (kind === TokenType.TO) {
            this.jump(target);
            return;
        }
        // 戻り先はGOSUBの次の行（行番号のみ保存）
        this.gosubStack.push(this.upcomingLineNumber());
        this.debug(`GOSUB ${target}: depth ${this.gosubStack.size}`);
        this.jump(target);
    }

    /**
     * RETURN文を実行します。対応する GOSUB がなければ何もしません。
     */
    private executeReturn(): void {
        this.evaluator.accept(TokenType.RETURN);
        this.endStatement();
        const returnLine = this.gosubStack.pop();
        if (returnLine === undefined) {
            this.debug('RETURN without GOSUB ignored');
            return;
        }
        if (returnLine === END_OF_PROGRAM) {
            this.ended = true;
            return;
        }
        this.jump(returnLine);
    }

    /**
     * FOR文を実行します。スタックが満杯ならループを記録せずに続行します。
     */
    private executeFor(): void {
        this.evaluator.accept(TokenType.FOR);
        if (this.tokens.token() !== TokenType.INTVAR) {
            throw new BasicError('SyntaxError', 'integer variable expected');
        }
        const variable = this.evaluator.variableReference();
        this.evaluator.accept(TokenType.EQ);
        const start = this.evaluator.integerExpression();
        this.variables.set(variable, integerValue(start));
        this.evaluator.accept(TokenType.TO);
        const limit = this.evaluator.integerExpression();
        let step = 1;
        if (this.tokens.token() === TokenType.STEP) {
            this.evaluator.accept(TokenType.STEP);
            step = this.evaluator.integerExpression();
        }
        this.endStatement();

        const frame: ForFrame = { resumePosition: this.tokens.pos(), variable, limit, step };
        if (this.forStack.push(frame)) {
            this.debug(`FOR ${referenceName(variable)}=${start} TO ${limit} STEP ${step}`);
        } else {
            this.debug(`FOR ${referenceName(variable)}: stack full, loop not tracked`);
        }
    }

    /**
     * NEXT文を実行します。スタックの一番上のループだけを照合します。
     */
    private executeNext(): void {
        this.evaluator.accept(TokenType.NEXT);
        if (this.tokens.token() !== TokenType.INTVAR) {
            throw new BasicError('SyntaxError', 'integer variable expected');
        }
        const variable = this.evaluator.variableReference();
        const frame = this.forStack.peek();
        if (frame === undefined || frame.variable !== variable) {
            throw new BasicError('MismatchedNext', referenceName(variable));
        }

        const value = (this.evaluator.expectInteger(this.variables.get(variable)) + frame.step) | 0;
        this.variables.set(variable, integerValue(value));

        // 終了条件はSTEPの符号で決まる
        if ((frame.step >= 0 && value <= frame.limit) || (frame.step < 0 && value >= frame.limit)) {
            this.tokens.goto(frame.resumePosition);
            return;
        }
        this.forStack.pop();
        this.endStatement();
    }

    /**
     * POKE文を実行します。
     */
    private executePoke(): void {
        this.evaluator.accept(TokenType.POKE);
        const address = this.evaluator.integerExpression();
        this.evaluator.accept(TokenType.COMMA);
        const value = this.evaluator.integerExpression();
        this.endStatement();
        if (!this.pokeFn) {
            throw new BasicError('InvalidAddress', 'POKE is not available');
        }
        this.pokeFn(address, value);
    }

    private executeStop(): void {
        this.evaluator.accept(TokenType.STOP);
        this.endStatement();
        this.ended = true;
    }

    private executeRem(): void {
        this.tokens.nextLine();
    }

    /**
     * DATA文は項目がリテラルであることだけを確認して読み飛ばします。
     */
    private executeData(): void {
        this.evaluator.accept(TokenType.DATA);
        for (;;) {
            if (this.tokens.token() === TokenType.MINUS) {
                this.tokens.next();
                if (this.tokens.token() !== TokenType.NUMBER) {
                    throw new BasicError('SyntaxError', 'number expected after -');
                }
            }
            const token = this.tokens.token();
            if (token !== TokenType.STRING && token !== TokenType.NUMBER) {
                throw new BasicError('SyntaxError', `unexpected ${token} in DATA`);
            }
            this.tokens.next();
            if (this.isStatementEnd(this.tokens.token())) {
                break;
            }
            this.evaluator.accept(TokenType.COMMA);
        }
        this.endStatement();
    }

    /**
     * RANDOMIZE文を実行します。
     * 引数なし・0 は固定シード 0 に、0 以外はホストのエントロピーから再初期化します。
     */
    private executeRandomize(): void {
        this.evaluator.accept(TokenType.RANDOMIZE);
        let seed = 0;
        if (!this.isStatementEnd(this.tokens.token())) {
            seed = this.evaluator.integerExpression();
        }
        this.endStatement();
        this.rnd.reseed(seed === 0 ? 0 : entropySeed());
    }

    /**
     * OPTION BASE文を実行します。
     */
    private executeOption(): void {
        this.evaluator.accept(TokenType.OPTION);
        this.evaluator.accept(TokenType.BASE);
        const base = this.evaluator.integerExpression();
        this.endStatement();
        if (base < 0 || base > 1) {
            throw new BasicError('InvalidBase', String(base));
        }
        this.arrayBase = base;
    }

    /**
     * INPUT文を実行します。変数1つにつき1行を読みます。
     */
    private executeInput(): void {
        this.evaluator.accept(TokenType.INPUT);

        const first = this.tokens.token();
        if (first === TokenType.STRING || STRING_FUNCTIONS.has(first)) {
            const prompt = this.evaluator.stringExpression();
            this.output.writeBytes(stringContent(prompt));
            this.evaluator.acceptEither(TokenType.COMMA, TokenType.SEMICOLON);
        } else {
            this.output.write('? ');
        }

        for (;;) {
            const kind = this.tokens.token();
            if (kind !== TokenType.INTVAR && kind !== TokenType.STRINGVAR) {
                throw new BasicError('SyntaxError', 'variable expected');
            }
            const variable = this.evaluator.variableReference();
            const line = this.readInputLine();
            this.output.resetColumn();

            if (kind === TokenType.INTVAR) {
                this.variables.set(variable, integerValue(parseLeadingInteger(line)));
            } else {
                this.variables.set(variable, stringValue(ownedString(encodeText(line.replace(/\r?\n$/, '')))));
            }

            if (this.isStatementEnd(this.tokens.token())) {
                break;
            }
            this.evaluator.acceptEither(TokenType.COMMA, TokenType.SEMICOLON);
        }
        this.endStatement();
    }

    private readInputLine(): string {
        const line = this.getLineFn ? this.getLineFn() : null;
        if (line === null) {
            throw new BasicError('EndOfInput');
        }
        return line;
    }

    /**
     * RESTORE文を実行します。行番号があればその行、なければプログラム先頭にDATA位置を戻します。
     */
    private executeRestore(): void {
        this.evaluator.accept(TokenType.RESTORE);
        let lineNumber = 0;
        if (!this.isStatementEnd(this.tokens.token())) {
            lineNumber = this.evaluator.integerExpression();
        }
        this.endStatement();

        if (lineNumber !== 0) {
            this.tokens.push();
            this.jump(lineNumber);
            this.dataCursor.position = this.tokens.pos();
            this.tokens.pop();
        } else {
            this.dataCursor.position = this.programStart;
        }
        this.dataCursor.needsSeek = true;
    }

    /**
     * 代入文（LET は省略可）を実行します。
     */
    private executeLet(): void {
        if (this.tokens.token() === TokenType.LET) {
            this.evaluator.accept(TokenType.LET);
        }
        const token = this.tokens.token();
        if (token !== TokenType.INTVAR && token !== TokenType.STRINGVAR) {
            throw new BasicError('SyntaxError', 'variable expected');
        }
        const variable = this.evaluator.variableReference();
        this.evaluator.accept(TokenType.EQ);
        const value = this.evaluator.expression();
        this.variables.set(variable, value);
        this.endStatement();
    }

    // ==================== ホスト連携 ====================

    private peek(address: number): number {
        if (!this.peekFn) {
            throw new BasicError('InvalidAddress', 'PEEK is not available');
        }
        return this.peekFn(address) | 0;
    }

    private debug(message: string): void {
        if (this.debugFn) {
            this.debugFn(message);
        }
    }

    // ==================== 状態の参照 ====================

    /**
     * 整数変数の現在値を取得します。
     * @param name 変数名 (A-Z)
     * @param slot 0 はスカラー、1-10 は添字要素のスロット
     */
    public getVariable(name: string, slot: number = 0): number {
        const value = this.variables.get(integerSlotReference(name, slot));
        return this.evaluator.expectInteger(value);
    }

    /**
     * 文字列変数の現在値を取得します。
     * @param name 変数名 (A-Z、$ は省略可)
     */
    public getStringVariable(name: string): string {
        const value = this.variables.get(stringReference(letterIndex(name)));
        return decodeString(this.evaluator.expectString(value));
    }

    /**
     * 整数変数に値を設定します。step() の前や合間にホストから変数を与えるときに使います。
     * 値は32bitに切り詰められます。
     */
    public setVariable(name: string, slot: number, value: number): void {
        if (!Number.isInteger(value)) {
            throw new RangeError(`integer value expected: ${value}`);
        }
        this.variables.set(integerSlotReference(name, slot), integerValue(value | 0));
    }

    /**
     * 文字列変数に値を設定します。各文字は下位8ビットのバイトになり、255 バイトを超える部分は切り捨てます。
     */
    public setStringVariable(name: string, text: string): void {
        this.variables.set(stringReference(letterIndex(name)), stringValue(ownedString(encodeText(text))));
    }

    getError(): BasicError | undefined {
        return this.error;
    }

    getCurrentLine(): number | undefined {
        return this.currentLine;
    }

    getLineIndex(): LineIndexEntry[] {
        return this.lineIndex.list();
    }

    getDataCursor(): Readonly<DataCursor> {
        return { ...this.dataCursor };
    }

    getArrayBase(): number {
        return this.arrayBase;
    }

    getGosubDepth(): number {
        return this.gosubStack.size;
    }

    getForDepth(): number {
        return this.forStack.size;
    }
}

function letterIndex(name: string): number {
    if (!/^[A-Z]\$?$/.test(name)) {
        throw new RangeError(`invalid variable name: ${name}`);
    }
    return name.charCodeAt(0) - 65;
}

/** 整数変数名 (A-Z) とスロット (0-10) から変数参照を作ります */
function integerSlotReference(name: string, slot: number): number {
    if (!/^[A-Z]$/.test(name)) {
        throw new RangeError(`invalid integer variable name: ${name}`);
    }
    if (!Number.isInteger(slot) || slot < 0 || slot >= SLOTS_PER_LETTER) {
        throw new RangeError(`invalid slot for ${name}: ${slot}`);
    }
    return integerReference(letterIndex(name), slot);
}

/**
 * 行頭の整数を読み取ります（先頭の空白と符号を許可、数字がなければ 0）。
 */
export function parseLeadingInteger(line: string): number {
    const match = /^\s*([+-]?)(\d+)/.exec(line);
    if (!match) {
        return 0;
    }
    const magnitude = BigInt(match[2] ?? '0');
    return Number(BigInt.asIntN(32, match[1] === '-' ? -magnitude : magnitude));
}

export default BasicInterpreter;
