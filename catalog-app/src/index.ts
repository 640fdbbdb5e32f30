import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { createPool, createRepository } from './store.js';
import { applySchema } from './features/operating-systems/schema.js';
import { buildServer } from './api/server.js';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

const pool = createPool(config.databaseUrl);

const client = await pool.connect();
try {
  await applySchema(client);
} finally {
  client.release();
}

const app = buildServer(createRepository(pool), { logger: { level: config.logLevel } });

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await pool.end();
  process.exit(1);
}

async function shutdown(): Promise<void> {
  await app.close();
  await pool.end();
}

process.on('SIGTERM', () => {
  shutdown().catch((err: unknown) => {
    app.log.error(err);
    process.exitCode = 1;
  });
});
