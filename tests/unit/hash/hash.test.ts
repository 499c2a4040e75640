/**
 * Unit tests for content hashing
 */

import { describe, it, expect } from 'vitest';
import { computeHash, HASH_PREFIX } from '../../../src/utils/index.js';

const HELLO_HASH = 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

describe('computeHash', () => {
  it('hashes strings to the prefixed hex digest', () => {
    expect(computeHash('hello')).toBe(HELLO_HASH);
  });

  it('hashes buffers the same as their text', () => {
    expect(computeHash(Buffer.from('hello', 'utf8'))).toBe(HELLO_HASH);
  });

  it('always has the prefix and hex length', () => {
    const hash = computeHash('{"a":1}');
    expect(hash.startsWith(HASH_PREFIX)).toBe(true);
    expect(hash).toMatch(/^sha256:[0-9a-f]{64}$/);
  });
});

