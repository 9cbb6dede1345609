import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { Analytics } from './analytics.js';
import { createApp } from './app.js';
import { LedgerStore } from './ledger.js';
import { SettingsStore } from './settings.js';

const config = loadConfig();
const db = openDatabase(config.databasePath, { busyTimeoutMs: config.busyTimeoutMs });

const ledger = new LedgerStore(db, { retry: config.retry });
const settings = new SettingsStore(db, { retry: config.retry });
const analytics = new Analytics(db, ledger, settings);

const app = createApp({ ledger, settings, analytics });

const server = app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  console.log(`[api] ${signal} received, closing`);
  server.close(() => {
    db.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
