import type { PaymentRecord } from '../loan/types.js';

/** The two stored loan figures the reconciler trusts. */
export interface LedgerLoan {
  id: string;
  emiCents: number;
  termMonths: number;
}

export interface StatementEntry {
  payment: PaymentRecord;
  runningBalanceAfterCents: number;
}

export interface Statement {
  loanId: string;
  emiCents: number;
  termMonths: number;
  scheduledTotalCents: number;
  totalPaidCents: number;
  /** Signed: negative when the borrower has overpaid. */
  outstandingBalanceCents: number;
  entries: StatementEntry[];
}

export type StatementStatus = 'outstanding' | 'paid_off' | 'overpaid';
