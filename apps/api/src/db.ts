import { createDb, migrate, type DB } from '@loanledger/engine';

export function openDatabase(dbPath: string): DB {
  const db = createDb(dbPath);
  migrate(db.$client);
  return db;
}
