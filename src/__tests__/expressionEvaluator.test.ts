// src/__tests__/expressionEvaluator.test.ts

import { ExpressionEvaluator, type EvaluatorHost } from '../expressionEvaluator';
import { BasicError, type BasicErrorKind } from '../errors';
import { Lexer } from '../lexer';
import { TokenType } from '../tokenSource';
import { StringArena } from '../stringArena';
import { VariableStore } from '../variableStore';
import {
  decodeString,
  encodeText,
  integerReference,
  integerValue,
  ownedString,
  stringReference,
  stringValue,
} from '../values';

describe('ExpressionEvaluator', () => {
  let lexer: Lexer;
  let arena: StringArena;
  let variables: VariableStore;
  let host: EvaluatorHost;
  let base: number;
  let evaluator: ExpressionEvaluator;

  beforeEach(() => {
    lexer = new Lexer();
    arena = new StringArena();
    variables = new VariableStore();
    base = 0;
    host = {
      peek: jest.fn(() => 42),
      random: jest.fn((limit: number) => limit - 1),
      arrayBase: () => base,
    };
    evaluator = new ExpressionEvaluator(lexer, arena, variables, host);
  });

  function integer(source: string): number {
    lexer.load(source);
    return evaluator.expectInteger(evaluator.relation());
  }

  function text(source: string): string {
    lexer.load(source);
    return decodeString(evaluator.stringExpression());
  }

  function errorKind(evaluate: () => unknown): BasicErrorKind | undefined {
    try {
      evaluate();
    } catch (error) {
      if (error instanceof BasicError) {
        return error.kind;
      }
      throw error;
    }
    return undefined;
  }

  describe('arithmetic', () => {
    test('operator precedence and parentheses', () => {
      expect(integer('2+3*4')).toBe(14);
      expect(integer('(2+3)*4')).toBe(20);
      expect(integer('10-4-3')).toBe(3);
    });

    test('division truncates toward zero', () => {
      expect(integer('7/2')).toBe(3);
      expect(integer('-7/2')).toBe(-3);
      expect(integer('7/-2')).toBe(-3);
    });

    test('(a/b)*b + a MOD b equals a', () => {
      for (const [a, b] of [[7, 2], [-7, 2], [7, -2], [-7, -2], [13, 5]] as const) {
        const quotient = integer(`(${a})/(${b})`);
        const remainder = integer(`(${a}) MOD (${b})`);
        expect(quotient * b + remainder).toBe(a);
      }
      expect(integer('-7 MOD 2')).toBe(-1);
      expect(integer('7 % 3')).toBe(1);
    });

    test('division and modulo by zero', () => {
      expect(errorKind(() => integer('1/0'))).toBe('DivisionByZero');
      expect(errorKind(() => integer('1 MOD 0'))).toBe('DivisionByZero');
    });

    test('results wrap to 32 bits', () => {
      expect(integer('2147483647+1')).toBe(-2147483648);
      expect(integer('65536*65536')).toBe(0);
    });

    test('bitwise AND and OR', () => {
      expect(integer('12 AND 10')).toBe(8);
      expect(integer('12 | 3')).toBe(15);
      expect(integer('12 OR 3')).toBe(15);
    });

    test('hexadecimal literals', () => {
      expect(integer('0x10 + 1')).toBe(17);
    });
  });

  describe('relations', () => {
    test('comparisons yield 0 or 1', () => {
      expect(integer('1 < 2')).toBe(1);
      expect(integer('2 <= 1')).toBe(0);
      expect(integer('3 <> 3')).toBe(0);
      expect(integer('3 >= 3')).toBe(1);
    });

    test('chained comparisons use the previous result', () => {
      expect(integer('1 < 2 < 3')).toBe(1);
      expect(integer('3 > 2 > 1')).toBe(0);
    });

    test('string ordering is bytewise, then by length', () => {
      expect(integer('"A" < "B"')).toBe(1);
      expect(integer('"AB" > "A"')).toBe(1);
      expect(integer('"ABC" = "ABC"')).toBe(1);
      expect(integer('"" < "A"')).toBe(1);
      expect(integer('"B" > "AA"')).toBe(1);
      expect(integer('"AA" < "B"')).toBe(1);
    });

    test('mixed comparison is a type mismatch', () => {
      expect(errorKind(() => integer('1 < "A"'))).toBe('TypeMismatch');
    });

    test('a bare string is not a condition', () => {
      expect(errorKind(() => integer('"A"'))).toBe('TypeMismatch');
    });
  });

  describe('strings', () => {
    test('concatenation', () => {
      expect(text('"AB" + "CD"')).toBe('ABCD');
    });

    test('integer operators reject strings', () => {
      expect(errorKind(() => integer('1 + "A"'))).toBe('TypeMismatch');
      expect(errorKind(() => text('"A" - 1'))).toBe('TypeMismatch');
      expect(errorKind(() => integer('"A" * 2'))).toBe('TypeMismatch');
    });

    test('LEFT$ and RIGHT$', () => {
      expect(text('LEFT$("HELLO", 2)')).toBe('HE');
      expect(text('LEFT$("HI", 10)')).toBe('HI');
      expect(text('RIGHT$("HELLO", 3)')).toBe('LLO');
      expect(text('RIGHT$("HI", 2)')).toBe('');
    });

    test('MID$ clamps its count and returns empty past the end', () => {
      expect(text('MID$("HELLO", 2, 3)')).toBe('ELL');
      expect(text('MID$("HELLO", 4, 10)')).toBe('LO');
      expect(text('MID$("HELLO", 9, 1)')).toBe('');
    });

    test('LEFT$(s, LEN(s)) is s', () => {
      expect(text('LEFT$("WORLD", LEN("WORLD"))')).toBe('WORLD');
    });

    test('LEFT$(s, 0) is empty and MID$(s, 1, LEN(s)) is s', () => {
      expect(text('LEFT$("WORLD", 0)')).toBe('');
      expect(text('MID$("WORLD", 1, LEN("WORLD"))')).toBe('WORLD');
    });

    test('concatenation does not modify its operands', () => {
      variables.set(stringReference(0), stringValue(ownedString(encodeText('AB'))));
      lexer.load('A$ + A$');
      const result = evaluator.stringExpression();
      expect(decodeString(result)).toBe('ABAB');
      expect(Array.from(evaluator.expectString(variables.get(stringReference(0))))).toEqual([2, 65, 66]);
    });

    test('CHR$ has declared length 2', () => {
      lexer.load('CHR$(65)');
      const result = evaluator.stringExpression();
      expect(Array.from(result)).toEqual([2, 65, 0]);
    });

    test('temporary strings live in the arena', () => {
      text('"AB" + "CD"');
      expect(arena.used()).toBe(3 + 3 + 5);
    });
  });

  describe('numeric functions', () => {
    test('ABS, SGN and INT', () => {
      expect(integer('ABS(-5)')).toBe(5);
      expect(integer('SGN(-9)')).toBe(-1);
      expect(integer('SGN(0)')).toBe(0);
      expect(integer('INT(4)')).toBe(4);
    });

    test('LEN and CODE', () => {
      expect(integer('LEN("HELLO")')).toBe(5);
      expect(integer('CODE("A")')).toBe(65);
      expect(integer('CODE("")')).toBe(0);
    });

    test('VAL parses an optionally negative decimal', () => {
      expect(integer('VAL("123")')).toBe(123);
      expect(integer('VAL("-42")')).toBe(-42);
      expect(errorKind(() => integer('VAL("12A")'))).toBe('TypeMismatch');
      expect(errorKind(() => integer('VAL("")'))).toBe('TypeMismatch');
      expect(errorKind(() => integer('VAL("-")'))).toBe('TypeMismatch');
    });

    test('PEEK and RND go through the host', () => {
      expect(integer('PEEK(3)')).toBe(42);
      expect(host.peek).toHaveBeenCalledWith(3);
      expect(integer('RND(10)')).toBe(9);
      expect(host.random).toHaveBeenCalledWith(10);
    });

    test('argument types are checked', () => {
      expect(errorKind(() => integer('LEN(5)'))).toBe('TypeMismatch');
      expect(errorKind(() => integer('ABS("A")'))).toBe('TypeMismatch');
    });
  });

  describe('variables', () => {
    test('reads scalar variables', () => {
      variables.set(integerReference(1), integerValue(6));
      expect(integer('B * 2')).toBe(12);
    });

    test('subscripts follow OPTION BASE', () => {
      variables.set(integerReference(0, 1), integerValue(9));
      expect(integer('A(0)')).toBe(9);
      base = 1;
      expect(integer('A(1)')).toBe(9);
    });

    test('out-of-range subscripts raise InvalidVariable', () => {
      expect(errorKind(() => integer('A(10)'))).toBe('InvalidVariable');
      expect(errorKind(() => integer('A(-1)'))).toBe('InvalidVariable');
      base = 1;
      expect(errorKind(() => integer('A(0)'))).toBe('InvalidVariable');
      expect(integer('A(10)')).toBe(0);
    });

    test('variableReference returns the slot reference', () => {
      lexer.load('C(2)');
      expect(evaluator.variableReference()).toBe(integerReference(2, 3));
    });
  });

  describe('syntax', () => {
    test('missing operand is a syntax error', () => {
      expect(errorKind(() => integer('1 +'))).toBe('SyntaxError');
    });

    test('accept reports the expected token', () => {
      lexer.load('PRINT');
      expect(() => evaluator.accept(TokenType.THEN)).toThrow('Syntax error: expected THEN, got PRINT');
    });

    test('acceptEither returns the accepted token', () => {
      lexer.load(';');
      expect(evaluator.acceptEither(TokenType.COMMA, TokenType.SEMICOLON)).toBe(TokenType.SEMICOLON);
    });
  });
});
