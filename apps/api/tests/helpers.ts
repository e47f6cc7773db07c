import { createDb, migrate, type DB } from '@loanledger/engine';
import type { Hono } from 'hono';
import type { NotificationResult, Notifier } from '../src/services/notifier.js';

export function createTestDb(): DB {
  const db = createDb(':memory:');
  migrate(db.$client);
  return db;
}

export class RecordingNotifier implements Notifier {
  readonly sent: { to: string; body: string }[] = [];

  async send(to: string, body: string): Promise<NotificationResult> {
    this.sent.push({ to, body });
    return { sent: true, detail: 'queued' };
  }
}

export class FailingNotifier implements Notifier {
  async send(): Promise<NotificationResult> {
    throw new Error('carrier down');
  }
}

export async function api(app: Hono, method: string, path: string, body?: unknown) {
  const res = await app.request(path, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: res.status, data: await res.json() };
}
