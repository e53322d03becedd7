import { describe, it, expect } from 'vitest';
import { canonicalJson, contentHash, sameContent } from '../../src/utils/canonical.js';

describe('canonical json', () => {
  it('sorts keys recursively', () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  it('hashes independently of key order', () => {
    expect(contentHash({ x: 1, y: [1, 2] })).toBe(contentHash({ y: [1, 2], x: 1 }));
    expect(contentHash({ x: 1 })).toMatch(/^[0-9a-f]{64}$/);
  });

  it('treats array order as significant', () => {
    expect(sameContent({ san: ['a', 'b'] }, { san: ['b', 'a'] })).toBe(false);
    expect(sameContent({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(true);
  });
});
