import { describe, expect, it } from 'vitest';
import { RingBuffer } from '../src/utils/ringBuffer.js';

describe('RingBuffer', () => {
  it('evicts the oldest item once full', () => {
    const buffer = new RingBuffer<number>(3);
    expect(buffer.push(1)).toBeUndefined();
    buffer.push(2);
    buffer.push(3);
    expect(buffer.push(4)).toBe(1);
    expect(buffer.size).toBe(3);
    expect(buffer.toArray()).toEqual([2, 3, 4]);
    expect(buffer.toArrayNewestFirst()).toEqual([4, 3, 2]);
  });

  it('keeps insertion order across many wraps', () => {
    const buffer = new RingBuffer<number>(4);
    for (let i = 0; i < 11; i++) buffer.push(i);
    expect(buffer.toArray()).toEqual([7, 8, 9, 10]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
  });
});
