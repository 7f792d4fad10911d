import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import type { AppConfig } from '../../shared/config';
import { getPublicConfig } from '../../shared/config';
import type { CatalogStore } from '../../shared/artifacts';
import { errorMessage } from '../catalog/errors';
import { readMergeSettings, type SettingsStore } from '../config/settingsStore';
import type { Logger } from '../obs/logger';
import { parseMergeRequest } from '../pipeline/mergeRequest';
import { runMerge } from '../pipeline/runMerge';
import { handleMergeStream } from '../pipeline/runMergeStream';
import { handleConvert, handleSaveCatalog } from './handlers';
import { createSseStream } from './sse';

export interface AppDeps {
  config: AppConfig;
  settings: SettingsStore;
  store: CatalogStore;
  logger: Logger;
}

export const createApp = ({ config, settings, store, logger }: AppDeps): Express => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  const failInternal = (res: Response, route: string, error: unknown) => {
    logger.error('Request failed', { route, error: errorMessage(error) });
    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal error' });
    }
  };

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    try {
      res.json(getPublicConfig(readMergeSettings(settings)));
    } catch (error) {
      failInternal(res, 'config', error);
    }
  });

  app.post('/api/convert', (req: Request, res: Response) => {
    const result = handleConvert(req.body);
    if (!result.ok) {
      logger.info('Conversion rejected', { status: result.error.status, error: result.error.body.error });
      res.status(result.error.status).json(result.error.body);
      return;
    }
    res.json(result.value);
  });

  app.post('/api/merge', async (req: Request, res: Response) => {
    const parsed = parseMergeRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: 'Invalid merge request', problems: parsed.error });
      return;
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const response = await runMerge({
        request: parsed.value,
        settings: readMergeSettings(settings),
        concurrency: config.sources.concurrency,
        userAgent: config.sources.userAgent,
        logger,
        signal: controller.signal,
      });
      res.json(response);
    } catch (error) {
      failInternal(res, 'merge', error);
    }
  });

  app.post('/api/merge-stream', async (req: Request, res: Response) => {
    const stream = createSseStream(res, { heartbeatMs: config.server.heartbeatIntervalMs, label: 'merge' }, logger);
    try {
      await handleMergeStream({
        body: req.body,
        readSettings: () => readMergeSettings(settings),
        concurrency: config.sources.concurrency,
        userAgent: config.sources.userAgent,
        stream,
        logger,
        signal: stream.controller.signal,
      });
    } catch (error) {
      failInternal(res, 'merge-stream', error);
      stream.close();
    }
  });

  app.post('/api/catalog/save', async (req: Request, res: Response) => {
    try {
      const result = await handleSaveCatalog(req.body, store, readMergeSettings(settings).defaultOutputFilename);
      if (!result.ok) {
        res.status(result.error.status).json(result.error.body);
        return;
      }
      logger.info('Catalog saved', { path: result.value.path, count: result.value.count });
      res.json(result.value);
    } catch (error) {
      failInternal(res, 'catalog/save', error);
    }
  });

  return app;
};
