import type Database from 'better-sqlite3';

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS borrowers (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT NOT NULL UNIQUE,
    phone TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS loans (
    id TEXT PRIMARY KEY,
    borrower_id TEXT NOT NULL REFERENCES borrowers(id) ON DELETE CASCADE,
    principal_cents INTEGER NOT NULL CHECK(principal_cents > 0),
    annual_rate_percent TEXT NOT NULL CHECK(CAST(annual_rate_percent AS REAL) >= 0),
    term_months INTEGER NOT NULL CHECK(term_months > 0),
    emi_cents INTEGER NOT NULL CHECK(emi_cents > 0),
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_loans_borrower ON loans(borrower_id);

  CREATE TABLE IF NOT EXISTS payments (
    id TEXT PRIMARY KEY,
    loan_id TEXT NOT NULL REFERENCES loans(id) ON DELETE CASCADE,
    amount_cents INTEGER NOT NULL CHECK(amount_cents > 0),
    payment_date TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_payments_loan_date ON payments(loan_id, payment_date);
`;

/** Creates any missing tables and indexes. Safe to run on every start. */
export function migrate(sqlite: Database.Database): void {
  sqlite.exec(SCHEMA_SQL);
}
