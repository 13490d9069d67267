import { describe, it, expect } from 'vitest';
import { RingBuffer } from '../src/ring-buffer.js';

describe('RingBuffer', () => {
  it('keeps insertion order below capacity', () => {
    const ring = new RingBuffer(3);
    ring.push('a');
    ring.push('b');
    expect(ring.toArray()).toEqual(['a', 'b']);
    expect(ring.size).toBe(2);
  });

  it('evicts the oldest entries first', () => {
    const ring = new RingBuffer(3);
    ['a', 'b', 'c', 'd', 'e'].forEach(item => ring.push(item));
    expect(ring.toArray()).toEqual(['c', 'd', 'e']);
    expect(ring.size).toBe(3);
    expect(ring.join()).toBe('cde');
  });

  it('starts over after clear', () => {
    const ring = new RingBuffer(2);
    ['a', 'b', 'c'].forEach(item => ring.push(item));
    ring.clear();
    ring.push('x');
    expect(ring.toArray()).toEqual(['x']);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
  });
});
