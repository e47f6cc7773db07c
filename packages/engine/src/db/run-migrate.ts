import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { migrate } from './migrate.js';

const DB_PATH = process.env.LOAN_DB_PATH ?? './data/loans.db';

mkdirSync(dirname(DB_PATH), { recursive: true });
const sqlite = new Database(DB_PATH);
sqlite.pragma('journal_mode = WAL');
sqlite.pragma('foreign_keys = ON');

migrate(sqlite);
sqlite.close();

console.log('Migration complete. Database created at', DB_PATH);
console.log('Tables: borrowers, loans, payments');
