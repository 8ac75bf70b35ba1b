// src/__tests__/random.test.ts

import { Rnd, entropySeed } from '../random';

describe('Rnd', () => {
  test('fixed initial sequence', () => {
    const rnd = new Rnd();
    expect([rnd.next(100), rnd.next(100), rnd.next(6)]).toEqual([70, 53, 3]);
  });

  test('reseed restarts the sequence', () => {
    const rnd = new Rnd();
    rnd.reseed(7);
    const first = [rnd.next(100), rnd.next(100)];
    rnd.reseed(7);
    expect([rnd.next(100), rnd.next(100)]).toEqual(first);
    expect(first).toEqual([68, 24]);
  });

  test('results stay below the limit', () => {
    const rnd = new Rnd();
    for (let i = 0; i < 200; i++) {
      const value = rnd.next(10);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(10);
    }
  });

  test('a non-positive limit returns zero', () => {
    const rnd = new Rnd();
    expect(rnd.next(0)).toBe(0);
    expect(rnd.next(-5)).toBe(0);
  });

  test('entropySeed is an integer', () => {
    expect(Number.isInteger(entropySeed())).toBe(true);
  });
});
