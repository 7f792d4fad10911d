import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import type { MergeSettings } from '../../../shared/config';
import type { SourceOutcome } from '../../../shared/types';
import type { Logger } from '../../obs/logger';
import { buildMergeResponse, runMerge } from '../runMerge';

const settings: MergeSettings = {
  similarityThreshold: 0.7,
  requestTimeoutSeconds: 5,
  defaultOutputFilename: 'merged_templates.json',
  autoDetectArchitecture: true,
  defaultSources: { urls: [], files: [] },
  baseTemplate: { enabled: false, url: '' },
};

describe('buildMergeResponse', () => {
  const outcomes: SourceOutcome[] = [
    {
      sourceId: 'BASE_TEMPLATE:https://example.com/base/index.json',
      ok: true,
      format: 'portainer',
      collection: {
        version: '2',
        templates: [{ title: 'Nginx', image: 'nginx:latest', description: 'Web server', categories: ['Web'] }],
      },
    },
    {
      sourceId: '/data/extra.json',
      ok: true,
      format: 'portainer_array',
      collection: {
        version: '2',
        templates: [
          { title: 'Nginx', image: 'nginx:latest', description: 'Web server', categories: ['web ', 'Proxy'] },
          { title: 'Redis', image: 'redis' },
        ],
      },
    },
    {
      sourceId: 'https://example.com/down.json',
      ok: false,
      error: { kind: 'network', message: 'HTTP 404 Not Found' },
    },
  ];

  it('merges successful sources and summarizes every source', () => {
    const response = buildMergeResponse(outcomes, [{ title: 'Custom', image: 'example/custom' }], settings);

    expect(response.final).toEqual({
      version: '2',
      templates: [
        { title: 'Custom', image: 'example/custom' },
        { title: 'Nginx', image: 'nginx:latest', description: 'Web server', categories: ['Web'] },
        { title: 'Redis', image: 'redis' },
      ],
    });
    expect(response.originalCount).toBe(4);
    expect(response.finalCount).toBe(3);
    expect(response.duplicatesRemoved).toBe(1);
    expect(response.sources.lines).toEqual([
      'Total sources processed: 3',
      'Total templates found: 4',
      '✓ Base Template (index.json): 1 templates',
      '✓ Manual Entry: 1 templates',
      '✓ extra.json: 2 templates',
      '✗ https://example.com/down.json: HTTP 404 Not Found',
    ]);
    expect(response.categories).toEqual(['proxy', 'web']);
    expect(response.report).toEqual([
      '--- Processing Complete ---',
      'Original templates: 4',
      'Final templates: 3',
      'Duplicates removed: 1',
    ]);
    expect(response.weakest).toEqual([
      { title: 'Custom', rank: 45 },
      { title: 'Redis', rank: 45 },
      { title: 'Nginx', rank: 65 },
    ]);
    expect(response.related).toEqual([]);
  });

  it('returns an empty catalog when nothing loaded', () => {
    const response = buildMergeResponse([outcomes[2]], [], settings);
    expect(response.final).toEqual({ version: '2', templates: [] });
    expect(response.sources.lines).toEqual([
      'Total sources processed: 0',
      'Total templates found: 0',
      '✗ https://example.com/down.json: HTTP 404 Not Found',
    ]);
    expect(response.weakest).toEqual([]);
  });
});

describe('runMerge', () => {
  it('loads requested files and keeps dissimilar same-titled records', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-merge-'));
    try {
      const compose = path.join(dir, 'stack.yml');
      await fs.writeFile(compose, 'services:\n  cache:\n    image: redis:7\n', 'utf-8');

      const info = vi.fn();
      const logger: Logger = { debug: vi.fn(), info, warn: vi.fn(), error: vi.fn(), child: () => logger };
      const response = await runMerge({
        request: { sources: [compose], manual: [{ title: 'Cache', image: 'redis:7' }] },
        settings,
        concurrency: 2,
        logger,
      });

      expect(response.originalCount).toBe(2);
      // The manual record has no description, so the pair only reaches 0.65.
      expect(response.final.templates.map((template) => template.description)).toEqual([
        undefined,
        'Container service: cache',
      ]);
      expect(info).toHaveBeenCalledWith('Merge started', { sources: 1, manual: 1 });
      expect(info).toHaveBeenCalledWith('Merge finished', { originalCount: 2, finalCount: 2, duplicatesRemoved: 0 });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
