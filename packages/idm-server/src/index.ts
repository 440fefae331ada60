import { loadConfig, ConfigError } from './config.js';
import type { ServerConfig } from './config.js';
import { createStore } from './store.js';
import { buildServer } from './api/server.js';

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const store = createStore(config.databaseUrl, (err, operation) => {
  app.log.error({ err, operation }, 'entry store failure');
});

const app = buildServer({
  store,
  sessionTtlMs: config.sessionTtlMs,
  filterDepthLimit: config.filterDepthLimit,
  logger: { level: config.logLevel },
});

await store.initializeSchema();

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await store.close();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
  await store.close();
});
