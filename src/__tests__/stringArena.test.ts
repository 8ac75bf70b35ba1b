// src/__tests__/stringArena.test.ts

import { StringArena } from '../stringArena';
import { BasicError } from '../errors';
import { decodeString, encodeText } from '../values';

describe('StringArena', () => {
  test('allocate reserves length + 1 bytes with the length prefix', () => {
    const arena = new StringArena();
    const view = arena.allocate(3);
    expect(view.length).toBe(4);
    expect(Array.from(view)).toEqual([3, 0, 0, 0]);
    expect(arena.used()).toBe(4);
  });

  test('strings longer than 255 bytes are rejected', () => {
    const arena = new StringArena();
    expect(() => arena.allocate(256)).toThrow('Out of string space error: string too long');
    expect(arena.used()).toBe(0);
  });

  test('running out of arena space raises OutOfSpace', () => {
    const arena = new StringArena(10);
    arena.allocate(5);
    let caught: unknown;
    try {
      arena.allocate(4);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(BasicError);
    expect(caught instanceof BasicError && caught.kind).toBe('OutOfSpace');
    expect(arena.used()).toBe(6);
  });

  test('reset makes the whole arena available again', () => {
    const arena = new StringArena(10);
    arena.allocate(8);
    arena.reset();
    expect(arena.used()).toBe(0);
    expect(arena.allocate(9).length).toBe(10);
  });

  test('concat produces a string whose length is the sum of both', () => {
    const arena = new StringArena();
    const left = arena.fromBytes(encodeText('AB'));
    const right = arena.fromBytes(encodeText('CDE'));
    const joined = arena.concat(left, right);
    expect(joined[0]).toBe(5);
    expect(decodeString(joined)).toBe('ABCDE');
    expect(decodeString(left)).toBe('AB');
    expect(decodeString(right)).toBe('CDE');
  });

  test('concat fails when the result would exceed 255 bytes', () => {
    const arena = new StringArena();
    const left = arena.allocate(200);
    const right = arena.allocate(100);
    expect(() => arena.concat(left, right)).toThrow('Out of string space error: string too long');
  });

  test('capacity reports the configured size', () => {
    expect(new StringArena().capacity()).toBe(512);
    expect(new StringArena(64).capacity()).toBe(64);
  });
});
