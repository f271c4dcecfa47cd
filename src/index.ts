/**
 * 出席 API サーバー起動（SQLite 永続化）
 */

import Database from 'better-sqlite3';
import { loadConfig } from './config';
import { createServer } from './createServer';
import { logError, logInfo } from './log';
import { createSqliteStorage } from './storage/SqliteStorage';

function main(): void {
  const config = loadConfig();
  const db = new Database(config.dbFile);
  db.pragma('journal_mode = WAL');

  const app = createServer({ storage: createSqliteStorage(db), config });
  const server = app.listen(config.port, () => {
    logInfo('[server] listening', {
      port: config.port,
      dbFile: config.dbFile,
      rotationPeriodSeconds: config.rotationPeriodSeconds,
      validityWindowSeconds: config.validityWindowSeconds,
    });
  });

  const shutdown = (signal: string) => {
    logInfo('[server] shutting down', { signal });
    app.expiry.dispose();
    server.close((err) => {
      if (err) logError('[server] close failed', { message: err.message });
      db.close();
      process.exit(err ? 1 : 0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
