import { describe, expect, it } from 'vitest';
import type { CanonicalTemplate } from '../../../shared/types';
import { calculateSimilarity, compareEnvNames, detectArchitecture, textSimilarity } from '../comparator';

const template = (overrides: Partial<CanonicalTemplate> = {}): CanonicalTemplate => ({
  title: 'Nginx',
  description: 'High-performance web server',
  image: 'nginx:latest',
  ...overrides,
});

describe('textSimilarity', () => {
  it('treats two missing values as identical and one missing value as unrelated', () => {
    expect(textSimilarity(undefined, '')).toBe(1);
    expect(textSimilarity('nginx', undefined)).toBe(0);
  });

  it('ignores case', () => {
    expect(textSimilarity('NGINX', 'nginx')).toBe(1);
    expect(textSimilarity('Nginx:Latest', 'nginx:alpine')).toBe(0.6666666666666666);
  });
});

describe('compareEnvNames', () => {
  it('compares variable names as sets', () => {
    expect(compareEnvNames([], [])).toBe(1);
    expect(compareEnvNames([{ name: 'TZ' }], [])).toBe(0);
    expect(compareEnvNames([{ name: 'A' }, { name: 'B', default: '1' }], [{ name: 'B', default: '2' }, { name: 'C' }])).toBe(
      1 / 3,
    );
  });
});

describe('calculateSimilarity', () => {
  it('scores a record against itself as 1 when every compared field is present', () => {
    const full = template({ env: [{ name: 'TZ' }], repository: { stackfile: 'stack.yml' } });
    expect(calculateSimilarity(full, full)).toBe(1);
  });

  it('gives no stack file credit unless both records carry one', () => {
    expect(calculateSimilarity(template(), template())).toBe(0.85);
    expect(calculateSimilarity(template({ repository: { stackfile: '' } }), template({ repository: { stackfile: '' } }))).toBe(1);
    expect(calculateSimilarity(template({ repository: { url: 'https://example.com' } }), template())).toBe(0.85);
  });

  it('weights the fields 0.30 / 0.25 / 0.20 / 0.15 / 0.10', () => {
    const left = template({ title: 'Web', image: 'web:1', description: 'Demo' });
    const right = template({ title: 'Web', image: 'web:2', description: 'Demo', env: [{ name: 'X' }] });
    expect(calculateSimilarity(left, right)).toBe(0.7);
  });

  it('is symmetric for a pair with differing fields', () => {
    const left = template({ description: 'High-performance web server and reverse proxy' });
    const right = template({ image: 'nginx:alpine' });
    expect(calculateSimilarity(left, right)).toBe(calculateSimilarity(right, left));
  });
});

describe('detectArchitecture', () => {
  it('prefers the platform over image hints', () => {
    expect(detectArchitecture(template({ platform: 'Windows', image: 'example/app:arm64' }))).toBe('windows');
  });

  it('checks arm64 before the bare arm substring', () => {
    expect(detectArchitecture(template({ image: 'example/app:arm64' }))).toBe('arm64');
    expect(detectArchitecture(template({ image: 'example/app:aarch64' }))).toBe('arm64');
    expect(detectArchitecture(template({ image: 'arm32v7/nginx' }))).toBe('arm');
    expect(detectArchitecture(template({ image: 'example/app:x86_64' }))).toBe('amd64');
    expect(detectArchitecture(template({ image: 'i386/debian' }))).toBe('386');
  });

  it('falls back to the stack file and then to linux', () => {
    expect(detectArchitecture(template({ repository: { stackfile: 'compose.ARM64.yml' } }))).toBe('arm64');
    expect(detectArchitecture(template({ repository: { stackfile: 'compose.amd64.yml' } }))).toBe('amd64');
    expect(detectArchitecture(template())).toBe('linux');
  });
});
