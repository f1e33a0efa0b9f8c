import { describe, it, expect } from 'vitest';
import { computeContentHash, computeSequencedHash } from '../../../src/server/utils/contentHash.js';

describe('contentHash', () => {
  it('computes the SHA-256 hex digest', () => {
    expect(computeContentHash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('includes the sequence in the sequenced hash', () => {
    expect(computeSequencedHash(1, '<a/>')).toMatch(/^[0-9a-f]{64}$/);
    expect(computeSequencedHash(1, '<a/>')).toBe(computeSequencedHash(1, '<a/>'));
    expect(computeSequencedHash(1, '<a/>')).not.toBe(computeSequencedHash(2, '<a/>'));
    expect(computeSequencedHash(1, 'abc')).toBe(computeContentHash('1:abc'));
  });
});
