import type { Statement } from '../ledger/types.js';

export interface LoanTerms {
  principalCents: number;
  /** Nominal annual rate, e.g. `10.5` for 10.5% p.a. */
  annualRatePercent: number;
  termMonths: number;
}

export interface LoanRecord {
  id: string;
  borrowerId: string;
  principalCents: number;
  annualRatePercent: number;
  termMonths: number;
  emiCents: number;
  createdAt: string;
}

export interface PaymentRecord {
  id: string;
  loanId: string;
  amountCents: number;
  /** Calendar date the borrower paid, `YYYY-MM-DD`. */
  paymentDate: string;
  createdAt: string;
}

export interface CreateLoanInput {
  borrowerId: string;
  terms: LoanTerms;
}

export interface RecordPaymentInput {
  loanId: string;
  amountCents: number;
  paymentDate: string;
}

export interface LoanStatementView {
  loan: LoanRecord;
  statement: Statement;
}
