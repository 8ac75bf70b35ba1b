// src/__tests__/outputSink.test.ts

import { OutputSink } from '../outputSink';

describe('OutputSink', () => {
  let written: string[];
  let sink: OutputSink;

  beforeEach(() => {
    written = [];
    sink = new OutputSink((text) => written.push(text));
  });

  test('tracks the column of plain text', () => {
    sink.write('AB');
    expect(sink.getColumn()).toBe(2);
    expect(written).toEqual(['AB']);
  });

  test('tab pads with spaces up to the column', () => {
    sink.write('AB');
    sink.tab(5);
    expect(written.join('')).toBe('AB   ');
    expect(sink.getColumn()).toBe(5);
  });

  test('tab does nothing when already past the column', () => {
    sink.write('ABCDE');
    sink.tab(1);
    expect(written).toEqual(['ABCDE']);
  });

  test('a tab character moves to the next multiple of eight', () => {
    sink.write('ABC\t');
    expect(sink.getColumn()).toBe(8);
  });

  test('backspace and DEL move the column back but not below zero', () => {
    sink.write('AB\b');
    expect(sink.getColumn()).toBe(1);
    sink.write('\x7f\x7f');
    expect(sink.getColumn()).toBe(0);
  });

  test('newline and carriage return reset the column', () => {
    sink.write('ABC');
    sink.newline();
    expect(sink.getColumn()).toBe(0);
    sink.write('XY\r');
    expect(sink.getColumn()).toBe(0);
  });

  test('writeBytes writes each byte as one character', () => {
    sink.writeBytes(new Uint8Array([72, 73]));
    expect(written).toEqual(['HI']);
  });

  test('empty text is not forwarded', () => {
    sink.write('');
    expect(written).toEqual([]);
  });
});
