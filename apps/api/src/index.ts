import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { openDatabase } from './db.js';
import { createApp } from './app.js';
import { createNotifier } from './services/notifier.js';

const config = loadConfig();
const db = openDatabase(config.LOAN_DB_PATH);
const app = createApp(db, {
  notifier: createNotifier(config),
  currency: config.CURRENCY,
});

serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  console.log(`Loan Ledger API v0.1.0 → http://localhost:${info.port}`);
});
