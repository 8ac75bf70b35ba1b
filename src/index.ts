// src/index.ts - ライブラリとしての公開API

export { default as BasicInterpreter, parseLeadingInteger } from './basicInterpreter.js';
export type { BasicInterpreterConfig, DataCursor } from './basicInterpreter.js';
export { BasicError, isBasicError } from './errors.js';
export type { BasicErrorKind } from './errors.js';
export { Lexer } from './lexer.js';
export { TokenType } from './tokenSource.js';
export type { TokenSource } from './tokenSource.js';
export { ExpressionEvaluator, parseDecimal } from './expressionEvaluator.js';
export type { EvaluatorHost } from './expressionEvaluator.js';
export { StringArena, DEFAULT_ARENA_SIZE } from './stringArena.js';
export { VariableStore } from './variableStore.js';
export { LineIndex } from './lineIndex.js';
export type { LineIndexEntry } from './lineIndex.js';
export {
    BoundedStack,
    createForStack,
    createGosubStack,
    DEFAULT_FOR_STACK_DEPTH,
    DEFAULT_GOSUB_STACK_DEPTH,
} from './controlStack.js';
export type { ForFrame, OverflowPolicy } from './controlStack.js';
export { OutputSink } from './outputSink.js';
export { Rnd } from './random.js';
export { CLIRunner } from './cliRunner.js';
export type { CLIRunnerConfig, RunSummary } from './cliRunner.js';
export * from './values.js';
