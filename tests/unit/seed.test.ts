import { describe, it, expect } from 'vitest';
import { contentHash, deterministicHash, stableStringify } from '@/core/seed';

describe('seed', () => {
  describe('deterministicHash', () => {
    it('produces consistent hash for same input', () => {
      expect(deterministicHash('test-input')).toBe(deterministicHash('test-input'));
    });

    it('produces different hash for different input', () => {
      expect(deterministicHash('input-a')).not.toBe(deterministicHash('input-b'));
    });

    it('returns 64-character hex string', () => {
      expect(deterministicHash('any-input')).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  describe('stableStringify', () => {
    it('sorts object keys at every level', () => {
      expect(stableStringify({ b: 1, a: { d: 2, c: [3, { f: 4, e: 5 }] } })).toBe(
        '{"a":{"c":[3,{"e":5,"f":4}],"d":2},"b":1}'
      );
    });

    it('drops undefined values and keeps nulls', () => {
      expect(stableStringify({ a: undefined, b: null })).toBe('{"b":null}');
    });
  });

  describe('contentHash', () => {
    it('ignores key order', () => {
      expect(contentHash({ a: 1, b: 2, c: 3 })).toBe(contentHash({ c: 3, a: 1, b: 2 }));
    });

    it('changes with the content', () => {
      expect(contentHash({ moat: 20 })).not.toBe(contentHash({ moat: 19 }));
    });
  });
});
