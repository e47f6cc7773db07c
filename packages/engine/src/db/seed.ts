import Database from 'better-sqlite3';
import { computeEMI } from '../loan/emi.js';
import { migrate } from './migrate.js';
import { rateToText } from './schema.js';

const DB_PATH = process.env.LOAN_DB_PATH ?? './data/loans.db';
const sqlite = new Database(DB_PATH);
sqlite.pragma('foreign_keys = ON');
migrate(sqlite);

const now = new Date().toISOString();

// Fixed deterministic IDs — re-runs target the exact same rows
const borrowerIds = {
  asha: 'seed_bor_asha',
  ravi: 'seed_bor_ravi',
};

const loanIds = {
  ashaHome: 'seed_loan_asha_home',
  raviInterestFree: 'seed_loan_ravi_zero',
};

// --- BORROWERS ---
const insertBorrower = sqlite.prepare(`
  INSERT OR IGNORE INTO borrowers (id, name, email, phone, created_at)
  VALUES (?, ?, ?, ?, ?)
`);

const seedBorrowers = sqlite.transaction(() => {
  insertBorrower.run(borrowerIds.asha, 'Asha Demo', 'asha@example.test', '+15550000001', now);
  insertBorrower.run(borrowerIds.ravi, 'Ravi Demo', 'ravi@example.test', null, now);
});
seedBorrowers();

// --- LOANS ---
const insertLoan = sqlite.prepare(`
  INSERT OR IGNORE INTO loans (id, borrower_id, principal_cents, annual_rate_percent, term_months, emi_cents, created_at)
  VALUES (?, ?, ?, ?, ?, ?, ?)
`);

const ashaTerms = { principalCents: 5_000_000, annualRatePercent: 10.5, termMonths: 24 };
const raviTerms = { principalCents: 1_200_000, annualRatePercent: 0, termMonths: 12 };

const seedLoans = sqlite.transaction(() => {
  insertLoan.run(
    loanIds.ashaHome, borrowerIds.asha,
    ashaTerms.principalCents, rateToText(ashaTerms.annualRatePercent), ashaTerms.termMonths,
    computeEMI(ashaTerms), now,
  );
  insertLoan.run(
    loanIds.raviInterestFree, borrowerIds.ravi,
    raviTerms.principalCents, rateToText(raviTerms.annualRatePercent), raviTerms.termMonths,
    computeEMI(raviTerms), now,
  );
});
seedLoans();

// --- PAYMENTS ---
const insertPayment = sqlite.prepare(`
  INSERT OR IGNORE INTO payments (id, loan_id, amount_cents, payment_date, created_at)
  VALUES (?, ?, ?, ?, ?)
`);

const seedPayments = sqlite.transaction(() => {
  const ashaEmi = computeEMI(ashaTerms);
  insertPayment.run('seed_pay_asha_1', loanIds.ashaHome, ashaEmi, '2026-01-05', now);
  insertPayment.run('seed_pay_asha_2', loanIds.ashaHome, ashaEmi, '2026-02-05', now);
  insertPayment.run('seed_pay_ravi_1', loanIds.raviInterestFree, 100_000, '2026-01-10', now);
});
seedPayments();

sqlite.close();

console.log('Seed complete:', DB_PATH);
console.log('  - 2 borrowers, 2 loans, 3 payments');
