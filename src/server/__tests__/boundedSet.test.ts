// =============================================================================
// Bounded Set Tests
// =============================================================================
import { BoundedMap, BoundedSet } from '../utils/boundedSet';

describe('BoundedSet', () => {
  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new BoundedSet(0)).toThrow(RangeError);
    expect(() => new BoundedSet(1.5)).toThrow(RangeError);
  });

  it('remembers keys until it overflows', () => {
    const set = new BoundedSet(3);
    expect(set.add('a')).toBe(false);
    expect(set.add('b')).toBe(false);
    expect(set.add('c')).toBe(false);
    expect(set.has('a')).toBe(true);
    expect(set.size).toBe(3);
  });

  it('clears every entry when an insert exceeds capacity', () => {
    const set = new BoundedSet(2);
    set.add('a');
    set.add('b');
    expect(set.add('c')).toBe(true);
    expect(set.size).toBe(0);
    expect(set.has('a')).toBe(false);
    expect(set.has('c')).toBe(false);
    expect(set.overflowCount).toBe(1);
  });

  it('does not grow when the same key is added twice', () => {
    const set = new BoundedSet(1);
    set.add('a');
    expect(set.add('a')).toBe(false);
    expect(set.size).toBe(1);
  });

  it('clear() empties the set without counting an overflow', () => {
    const set = new BoundedSet();
    set.add('x');
    set.clear();
    expect(set.has('x')).toBe(false);
    expect(set.overflowCount).toBe(0);
  });
});

describe('BoundedMap', () => {
  it('keeps the latest value per key', () => {
    const map = new BoundedMap<string, number>(2);
    map.set('a', 1);
    map.set('a', 2);
    expect(map.get('a')).toBe(2);
    expect(map.size).toBe(1);
  });

  it('wipes every entry on overflow', () => {
    const map = new BoundedMap<string, number>(1);
    expect(map.set('a', 1)).toBe(false);
    expect(map.set('b', 2)).toBe(true);
    expect(map.get('a')).toBeUndefined();
    expect(map.size).toBe(0);
  });

  it('forgets a deleted key', () => {
    const map = new BoundedMap<string, number>();
    map.set('a', 1);
    map.delete('a');
    expect(map.get('a')).toBeUndefined();
  });
});
