import { describe, expect, it } from 'vitest';
import { jaccardSimilarity, matchingBlocks, sequenceRatio } from '../text';

describe('sequenceRatio', () => {
  it('scores identical and empty inputs', () => {
    expect(sequenceRatio('nginx', 'nginx')).toBe(1);
    expect(sequenceRatio('', '')).toBe(1);
    expect(sequenceRatio('nginx', '')).toBe(0);
  });

  it('matches longest blocks rather than edit distance', () => {
    expect(sequenceRatio('nginx:latest', 'nginx:alpine')).toBe(0.6666666666666666);
    expect(sequenceRatio('abcd', 'bcda')).toBe(0.75);
    expect(sequenceRatio('web:1', 'web:2')).toBe(0.8);
    expect(sequenceRatio('plex:amd64', 'plex:arm64')).toBe(0.9);
    expect(sequenceRatio('web server', 'webserver')).toBe(0.9473684210526315);
  });

  it('counts code points, not UTF-16 units', () => {
    expect(sequenceRatio('héllo', 'hello')).toBe(0.8);
  });

  it('never seeds a match on popular elements of long sequences', () => {
    const long = 'ab'.repeat(100);
    // Both letters occur 100 times in 200 items, so neither can start a block.
    expect(sequenceRatio(`x${long}`, long)).toBe(0);
    // A zero-length best match at the start may still be extended over them.
    expect(sequenceRatio('ab', long)).toBe(4 / 202);
  });
});

describe('matchingBlocks', () => {
  it('returns blocks ordered by position in the first sequence', () => {
    expect(matchingBlocks(Array.from('plex:amd64'), Array.from('plex:arm64'))).toEqual([
      { i: 0, j: 0, size: 6 },
      { i: 6, j: 7, size: 1 },
      { i: 8, j: 8, size: 2 },
    ]);
  });
});

describe('jaccardSimilarity', () => {
  it('divides the intersection by the union', () => {
    expect(jaccardSimilarity(new Set(['A', 'B']), new Set(['B', 'C']))).toBe(1 / 3);
    expect(jaccardSimilarity(new Set(['A']), new Set(['A']))).toBe(1);
    expect(jaccardSimilarity(new Set<string>(), new Set<string>())).toBe(0);
  });
});
