import type { StageEvent } from './types';

export interface SseStreamOptions {
  heartbeatMs: number;
  label?: string;
  onClose?: () => void;
}

export interface SseStream {
  /** Aborted when the client goes away or the stream is closed. */
  controller: AbortController;
  send: <T>(event: StageEvent<T>) => void;
  sendJson: (eventName: string, payload: unknown) => void;
  close: () => void;
}
