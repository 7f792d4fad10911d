import { describe, expect, it, vi } from 'vitest';
import { makeStageEmitter } from '../stageEmitter';

describe('makeStageEmitter', () => {
  it('stamps every event with the run id and stage', () => {
    const send = vi.fn();
    const emitter = makeStageEmitter('merge-1', 'fetch', send);

    emitter.start({ message: 'Loading 2 sources' });
    emitter.progress({ data: { sourceId: 'a.json', ok: true } });

    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[0][0]).toEqual({
      runId: 'merge-1',
      stage: 'fetch',
      status: 'start',
      message: 'Loading 2 sources',
      data: undefined,
      ts: expect.any(String),
    });
    expect(send.mock.calls[1][0]).toMatchObject({ status: 'progress', data: { sourceId: 'a.json', ok: true } });
  });

  it('reports failures with the error message', () => {
    const send = vi.fn();
    makeStageEmitter('merge-2', 'merge', send).failure(new Error('boom'));
    expect(send.mock.calls[0][0]).toMatchObject({
      runId: 'merge-2',
      stage: 'merge',
      status: 'failure',
      message: 'boom',
      data: { error: 'boom' },
    });
  });
});
