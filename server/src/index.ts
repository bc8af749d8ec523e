import dotenv from 'dotenv';
import { createApp } from './app';
import { createRuntime } from './bootstrap';
import { ConfigError } from './errors';

dotenv.config();

function main() {
  const { config, logger, storeProvider, engine } = createRuntime();
  const app = createApp({ storeProvider, engine, apiSecret: config.apiSecret, logger });
  if (!config.apiSecret) logger.warn('API_SECRET is not set; scrape routes will reject every request');
  app.listen(config.port, () => {
    logger.info({ port: config.port }, `Eater Ingest API listening on http://localhost:${config.port}`);
  });
}

try {
  main();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error(err);
  }
  process.exit(1);
}
