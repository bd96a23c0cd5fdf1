// src/server.ts
// Process entry point.

import { getConfig } from './config.js';
import { openDatabase } from './db/index.js';
import { createLogger } from './observability/logger.js';
import { createApp, createServices } from './app.js';

const log = createLogger('server');

async function main() {
  const config = getConfig();
  const db = openDatabase(config.database.path);

  const services = createServices(db, config);
  services.gate.onUnlocked((event) => {
    log.info({ docId: event.docId, method: event.method, lockRound: event.lockRound }, 'Document unlocked');
  });

  const app = await createApp({ db, config, services });

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down');
    try {
      await app.close();
      await db.close();
      process.exit(0);
    } catch (err) {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ port: config.server.port, host: config.server.host });
  log.info(
    {
      port: config.server.port,
      dbPath: config.database.path,
      nodeEnv: config.nodeEnv,
      node: process.version,
      adminEnabled: Boolean(config.admin.apiKey),
    },
    'receipt-gate listening'
  );
}

main().catch((err) => {
  log.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
