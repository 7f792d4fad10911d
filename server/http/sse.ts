import type { Response } from 'express';
import type { SseStreamOptions, SseStream } from '../../shared/sse';
import { errorMessage } from '../catalog/errors';
import { silentLogger, type Logger } from '../obs/logger';

export const formatSseFrame = (eventName: string, payload: unknown): string => {
  const data = typeof payload === 'string' ? payload : JSON.stringify(payload);
  return `event: ${eventName}\ndata: ${data}\n\n`;
};

export const createSseStream = (
  res: Response,
  options: SseStreamOptions,
  logger: Logger = silentLogger,
): SseStream => {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  const controller = new AbortController();
  let closed = false;

  const heartbeat = setInterval(() => {
    if (closed || res.writableEnded) {
      return;
    }
    res.write(': heartbeat\n\n');
  }, options.heartbeatMs);

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    clearInterval(heartbeat);
    controller.abort();
    if (!res.writableEnded) {
      res.end();
    }
    try {
      options.onClose?.();
    } catch (error) {
      logger.warn('SSE close observer failed', { label: options.label, error: errorMessage(error) });
    }
  };

  res.on('close', close);

  const writeFrame = (eventName: string, payload: unknown) => {
    if (closed || res.writableEnded) {
      return;
    }
    res.write(formatSseFrame(eventName, payload));
  };

  return {
    controller,
    send: (event) => writeFrame('stage-event', event),
    sendJson: (eventName, payload) => writeFrame(eventName, payload),
    close,
  };
};
