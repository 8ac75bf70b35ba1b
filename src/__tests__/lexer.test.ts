// src/__tests__/lexer.test.ts

import { Lexer } from '../lexer';
import { TokenType } from '../tokenSource';
import { STRING_FLAG } from '../values';

/** 入力終端までのトークン種別を集める */
function tokenTypes(source: string): TokenType[] {
  const lexer = new Lexer();
  lexer.load(source);
  const types: TokenType[] = [];
  while (!lexer.finished()) {
    types.push(lexer.token());
    lexer.next();
  }
  return types;
}

describe('Lexer', () => {
  let lexer: Lexer;

  beforeEach(() => {
    lexer = new Lexer();
  });

  test('empty program is immediately finished', () => {
    lexer.load('');
    expect(lexer.finished()).toBe(true);
    expect(lexer.token()).toBe(TokenType.ENDOFINPUT);
  });

  test('should tokenize a numbered PRINT line', () => {
    expect(tokenTypes('10 PRINT A$\n')).toEqual([
      TokenType.NUMBER,
      TokenType.PRINT,
      TokenType.STRINGVAR,
      TokenType.CR,
    ]);
  });

  test('GOTO and GOSUB are split into two tokens', () => {
    expect(tokenTypes('GOTO 10')).toEqual([TokenType.GO, TokenType.TO, TokenType.NUMBER]);
    expect(tokenTypes('GO SUB 10')).toEqual([TokenType.GO, TokenType.SUB, TokenType.NUMBER]);
    expect(tokenTypes('GOSUB 10')).toEqual([TokenType.GO, TokenType.SUB, TokenType.NUMBER]);
  });

  test('END is read as STOP', () => {
    expect(tokenTypes('END')).toEqual([TokenType.STOP]);
  });

  test('should tokenize comparison operators', () => {
    expect(tokenTypes('< <= <> > >= =')).toEqual([
      TokenType.LT,
      TokenType.LE,
      TokenType.NE,
      TokenType.GT,
      TokenType.GE,
      TokenType.EQ,
    ]);
  });

  test('symbolic and keyword forms of MOD, AND and OR', () => {
    expect(tokenTypes('% MOD & AND | OR')).toEqual([
      TokenType.MOD,
      TokenType.MOD,
      TokenType.AND,
      TokenType.AND,
      TokenType.OR,
      TokenType.OR,
    ]);
  });

  test('string functions keep their $ in the keyword', () => {
    expect(tokenTypes('LEFT$ RIGHT$ MID$ CHR$ LEN')).toEqual([
      TokenType.LEFTSTR,
      TokenType.RIGHTSTR,
      TokenType.MIDSTR,
      TokenType.CHRSTR,
      TokenType.LEN,
    ]);
  });

  test('variable references encode the letter', () => {
    lexer.load('C C$');
    expect(lexer.token()).toBe(TokenType.INTVAR);
    expect(lexer.variableNum()).toBe(22);
    lexer.next();
    expect(lexer.token()).toBe(TokenType.STRINGVAR);
    expect(lexer.variableNum()).toBe(STRING_FLAG | 2);
  });

  test('decimal and hexadecimal numbers', () => {
    lexer.load('123 0x1F');
    expect(lexer.num()).toBe(123);
    lexer.next();
    expect(lexer.token()).toBe(TokenType.NUMBER);
    expect(lexer.num()).toBe(31);
  });

  test('numbers wrap to 32 bits', () => {
    lexer.load('4294967295');
    expect(lexer.num()).toBe(-1);
  });

  test('doubled quotes inside a string literal', () => {
    lexer.load('"A""B"');
    expect(lexer.token()).toBe(TokenType.STRING);
    expect(Array.from(lexer.stringValue())).toEqual([65, 34, 66]);
  });

  test('unterminated string and unknown characters produce ERROR', () => {
    expect(tokenTypes('"ABC\n')).toEqual([TokenType.ERROR, TokenType.CR]);
    expect(tokenTypes('@')).toEqual([TokenType.ERROR]);
  });

  test('goto(pos) returns to the same token', () => {
    lexer.load('10 PRINT 5');
    lexer.next();
    const position = lexer.pos();
    lexer.next();
    expect(lexer.token()).toBe(TokenType.NUMBER);
    lexer.goto(position);
    expect(lexer.token()).toBe(TokenType.PRINT);
  });

  test('push and pop restore the saved position', () => {
    lexer.load('10 PRINT\n20 STOP\n');
    lexer.push();
    lexer.nextLine();
    expect(lexer.num()).toBe(20);
    lexer.pop();
    expect(lexer.num()).toBe(10);
  });

  test('pop without push throws', () => {
    lexer.load('10 STOP');
    expect(() => lexer.pop()).toThrow('Lexer.pop() called without a matching push()');
  });

  test('nextLine skips raw text including unlexable characters', () => {
    lexer.load('10 REM @@ "open\n20 STOP');
    lexer.next();
    expect(lexer.token()).toBe(TokenType.REM);
    lexer.nextLine();
    expect(lexer.token()).toBe(TokenType.NUMBER);
    expect(lexer.num()).toBe(20);
  });

  test('nextLine on the last line reaches end of input', () => {
    lexer.load('10 REM last');
    lexer.nextLine();
    expect(lexer.finished()).toBe(true);
  });
});
