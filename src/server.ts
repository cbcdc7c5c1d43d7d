// src/server.ts
// Process entry point: open storage, build the classifier client, listen.

import { config } from './config';
import { createDatabase } from './db';
import { createZeroShotClient } from './ai/providers';
import { createApp } from './app';
import { createLogger, startGaugeUpdates, stopGaugeUpdates } from './observability';

const log = createLogger('startup');

async function main() {
  const db = createDatabase(config.database.path);
  const client = createZeroShotClient(config);
  const { app, store } = await createApp({ config, db, client });

  startGaugeUpdates(store);

  log.info(
    {
      node: process.version,
      env: config.nodeEnv,
      dbFile: config.database.path,
      provider: client.provider,
      model: client.model,
    },
    'Compliance API boot'
  );

  async function shutdown(signal: string) {
    log.info({ signal }, 'shutting down');
    stopGaugeUpdates();
    await app.close();
    await db.close();
    process.exit(0);
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        log.error({ err }, 'shutdown failed');
        process.exit(1);
      });
    });
  }

  await app.listen({ port: config.server.port, host: config.server.host });
  log.info({ port: config.server.port }, 'API listening');
}

main().catch((err) => {
  log.fatal({ err }, 'Server startup failed');
  process.exit(1);
});
