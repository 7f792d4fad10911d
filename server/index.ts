import 'dotenv/config';
import { loadConfig } from './config/config';
import { loadSettingsStore } from './config/settingsStore';
import { createApp } from './http/app';
import { createLogger } from './obs/logger';
import { createFsCatalogStore } from './persistence/fsStore';

const config = loadConfig();
const logger = createLogger(config);

const start = async () => {
  const settings = await loadSettingsStore(config.persistence.settingsFile, { logger });
  const store = createFsCatalogStore(config);
  await store.ensureLayout();

  logger.info('Config loaded', {
    environment: config.environment,
    settingsFile: settings.filePath,
    outputDir: config.persistence.outputDir,
    sourceConcurrency: config.sources.concurrency,
  });

  const app = createApp({ config, settings, store, logger });
  const port = config.server.port;
  app.listen(port, () => {
    logger.info('Server listening', { url: `http://localhost:${port}` });
  });
};

start().catch((error: unknown) => {
  logger.error('Server failed to start', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
