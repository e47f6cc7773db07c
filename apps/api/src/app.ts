import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { InvalidLoanState, InvalidLoanTerms, type DB } from '@loanledger/engine';
import { AppError } from './errors.js';
import { DisabledNotifier, type Notifier } from './services/notifier.js';
import { emiRoutes } from './routes/emi.js';
import { borrowerRoutes } from './routes/borrowers.js';
import { loanRoutes } from './routes/loans.js';

export interface AppDeps {
  notifier: Notifier;
  currency: string;
}

export function createApp(db: DB, overrides: Partial<AppDeps> = {}) {
  const deps: AppDeps = {
    notifier: overrides.notifier ?? new DisabledNotifier('SMS notifications disabled'),
    currency: overrides.currency ?? 'INR',
  };

  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(
        { error: { code: err.code, message: err.message, suggestion: err.suggestion } },
        err.status,
      );
    }

    if (err instanceof InvalidLoanTerms) {
      return c.json(
        {
          error: {
            code: err.code,
            message: err.message,
            suggestion: 'Principal and term must be positive, rate must not be negative',
          },
        },
        400,
      );
    }

    if (err instanceof InvalidLoanState) {
      console.error('Ledger integrity error:', err.message);
      return c.json(
        {
          error: {
            code: err.code,
            message: err.message,
            suggestion: 'The stored loan or its payments are inconsistent; check the database',
          },
        },
        500,
      );
    }

    console.error('Unhandled error:', err);
    return c.json(
      { error: { code: 'INTERNAL_ERROR', message: err.message, suggestion: 'Check server logs' } },
      500,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: '0.1.0' }));

  app.route('/api/v1/emi', emiRoutes(deps));
  app.route('/api/v1/borrowers', borrowerRoutes(db, deps));
  app.route('/api/v1/loans', loanRoutes(db, deps));

  return app;
}
