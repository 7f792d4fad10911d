import type { StageEvent, StageName, StageStatus } from '../../shared/types';
import { errorMessage } from '../catalog/errors';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

export interface StagePayload<T> {
  message?: string;
  data?: T;
}

const nowIso = () => new Date().toISOString();

export const makeStageEmitter = (runId: string, stage: StageName, send: StageEventSender) => {
  const emit = <T>(status: StageStatus, payload?: StagePayload<T>) => {
    send({
      runId,
      stage,
      status,
      message: payload?.message,
      data: payload?.data,
      ts: nowIso(),
    });
  };

  return {
    start: <T>(payload?: StagePayload<T>) => emit('start', payload),
    progress: <T>(payload?: StagePayload<T>) => emit('progress', payload),
    success: <T>(payload?: StagePayload<T>) => emit('success', payload),
    failure: (error: unknown, options?: { data?: unknown }) => {
      const message = errorMessage(error);
      emit('failure', { message, data: options?.data ?? { error: message } });
    },
  };
};

export type StageEmitter = ReturnType<typeof makeStageEmitter>;
