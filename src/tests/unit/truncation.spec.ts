import { describe, expect, it } from 'vitest';

import { buildTruncationMarker, truncateList, truncateToBytes } from '../../truncation.js';

describe('truncateToBytes', () => {
  it('returns payloads that fit unchanged', () => {
    expect(truncateToBytes('short', 100)).toBe('short');
  });

  it('keeps both ends in split mode', () => {
    const payload = 'a'.repeat(100) + 'b'.repeat(100);
    expect(truncateToBytes(payload, 70)).toBe(`${'a'.repeat(10)}[···TRUNCATED 180 bytes···]${'b'.repeat(10)}`);
  });

  it('cuts at the last full line in head mode', () => {
    const payload = `aaaa\nbbbb\n${'c'.repeat(80)}`;
    expect(truncateToBytes(payload, 60, 'head')).toBe('aaaa\nbbbb\n[···TRUNCATED 80 bytes···]');
  });

  it('falls back to a plain cut when the marker cannot fit', () => {
    expect(truncateToBytes('abcdefghij'.repeat(3), 5)).toBe('abcde');
  });

  it('never splits a multi-byte character', () => {
    const payload = 'é'.repeat(10);
    expect(truncateToBytes(payload, 5)).toBe('éé');
  });
});

describe('buildTruncationMarker', () => {
  it('names the omitted amount and unit', () => {
    expect(buildTruncationMarker(12, 'rows')).toBe('[···TRUNCATED 12 rows···]');
  });
});

describe('truncateList', () => {
  it('reports omitted items', () => {
    expect(truncateList([1, 2, 3, 4], 3)).toEqual({ items: [1, 2, 3], omitted: 1 });
    expect(truncateList([1, 2], 3)).toEqual({ items: [1, 2], omitted: 0 });
  });
});
