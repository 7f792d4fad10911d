import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { SourceOutcome } from '../../../shared/types';
import type { Logger } from '../../obs/logger';
import { loadSources } from '../loadSources';

const recordingLogger = () => {
  const info = vi.fn();
  const warn = vi.fn();
  const logger: Logger = { debug: vi.fn(), info, warn, error: vi.fn(), child: () => logger };
  return { logger, info, warn };
};

describe('loadSources', () => {
  let dir: string;

  const write = async (name: string, body: string) => {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, body, 'utf-8');
    return filePath;
  };

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'load-sources-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('isolates failures and keeps the input order', async () => {
    const good = await write('good.json', '{"version": "2", "templates": [{"title": "Redis", "image": "redis"}]}');
    const broken = await write('broken.json', '{"version": ');
    const unknown = await write('unknown.json', '{"foo": 1}');
    const badCompose = await write('compose.yml', 'version: "3"\nservices: []\n');
    const missing = path.join(dir, 'missing.json');

    const { logger, info, warn } = recordingLogger();
    const outcomes = await loadSources([good, broken, unknown, badCompose, missing], {
      timeoutMs: 1_000,
      concurrency: 2,
      logger,
    });

    expect(outcomes.map((outcome) => outcome.sourceId)).toEqual([good, broken, unknown, badCompose, missing]);
    expect(outcomes[0]).toEqual({
      sourceId: good,
      ok: true,
      format: 'portainer',
      collection: { version: '2', templates: [{ title: 'Redis', image: 'redis' }] },
    });

    const failures = outcomes.flatMap((outcome) => (outcome.ok ? [] : [outcome]));
    expect(failures.map((outcome) => outcome.error.kind)).toEqual(['decode', 'detection', 'conversion', 'io']);
    expect(failures[1].error.message).toBe('Unsupported template format: unknown');
    expect(failures[2]).toEqual({
      sourceId: badCompose,
      ok: false,
      format: 'docker_compose',
      error: { kind: 'conversion', message: 'Docker Compose services must be a mapping' },
    });

    expect(info).toHaveBeenCalledWith('Source loaded', { sourceId: good, format: 'portainer', templates: 1 });
    expect(warn).toHaveBeenCalledTimes(4);
    expect(warn).toHaveBeenCalledWith('Source load failed', {
      sourceId: unknown,
      kind: 'detection',
      error: 'Unsupported template format: unknown',
    });
  });

  it('reports each outcome as it settles', async () => {
    const first = await write('a.json', '[{"title": "A", "image": "a"}]');
    const second = await write('b.json', '[{"title": "B", "image": "b"}]');
    const seen: SourceOutcome[] = [];

    await loadSources([first, second], {
      timeoutMs: 1_000,
      concurrency: 1,
      onOutcome: (outcome) => seen.push(outcome),
    });

    expect(seen.map((outcome) => [outcome.sourceId, outcome.ok])).toEqual([
      [first, true],
      [second, true],
    ]);
  });

  it('returns nothing for no sources', async () => {
    await expect(loadSources([], { timeoutMs: 1_000, concurrency: 4 })).resolves.toEqual([]);
  });
});
