export { createDb, schema } from './db/index.js';
export type { DB } from './db/index.js';
export { borrowers, loans, payments } from './db/schema.js';
export { migrate } from './db/migrate.js';

export {
  MoneyDecimal,
  formatMoney,
  formatMoneyWithCode,
  roundCents,
  roundToCents,
  isSafeCents,
  toCents,
  fromCents,
  addCents,
  subtractCents,
  multiplyCents,
  sumCents,
} from './math/money.js';

export type { LedgerErrorCode } from './loan/errors.js';
export { LedgerError, InvalidLoanTerms, InvalidLoanState } from './loan/errors.js';
export type { LoanTerms, LoanRecord, PaymentRecord, CreateLoanInput, RecordPaymentInput, LoanStatementView } from './loan/types.js';
export { computeEMI } from './loan/emi.js';
export { createLoan, getLoan, listLoans, recordPayment, getPayments, getLoanStatement } from './loan/engine.js';

export type { LedgerLoan, Statement, StatementEntry, StatementStatus } from './ledger/types.js';
export { buildStatement, comparePayments, isPaidOff, statementStatus } from './ledger/reconciler.js';
