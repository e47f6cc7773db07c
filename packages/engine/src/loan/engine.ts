import { desc, eq } from 'drizzle-orm';
import type { DB } from '../db/index.js';
import { loans, payments } from '../db/schema.js';
import { buildStatement } from '../ledger/reconciler.js';
import { computeEMI } from './emi.js';
import { InvalidLoanTerms } from './errors.js';
import type {
  CreateLoanInput,
  LoanRecord,
  LoanStatementView,
  PaymentRecord,
  RecordPaymentInput,
} from './types.js';

/**
 * Computes the EMI and stores the loan. Invalid terms, including ones whose
 * installment rounds to zero, throw before anything is written.
 */
export function createLoan(db: DB, input: CreateLoanInput): LoanRecord {
  const emiCents = computeEMI(input.terms);
  if (emiCents <= 0) {
    throw new InvalidLoanTerms(
      `installment rounds to zero cents for ${input.terms.principalCents} cents over ${input.terms.termMonths} months`,
    );
  }

  return db
    .insert(loans)
    .values({
      borrowerId: input.borrowerId,
      principalCents: input.terms.principalCents,
      annualRatePercent: input.terms.annualRatePercent,
      termMonths: input.terms.termMonths,
      emiCents,
    })
    .returning()
    .get();
}

export function getLoan(db: DB, loanId: string): LoanRecord | null {
  return db.select().from(loans).where(eq(loans.id, loanId)).get() ?? null;
}

export function listLoans(db: DB, filter: { borrowerId?: string } = {}): LoanRecord[] {
  return db
    .select()
    .from(loans)
    .where(filter.borrowerId ? eq(loans.borrowerId, filter.borrowerId) : undefined)
    .orderBy(desc(loans.createdAt), desc(loans.id))
    .all();
}

export function recordPayment(db: DB, input: RecordPaymentInput): PaymentRecord {
  return db
    .insert(payments)
    .values({
      loanId: input.loanId,
      amountCents: input.amountCents,
      paymentDate: input.paymentDate,
    })
    .returning()
    .get();
}

/** Payments of a loan in storage order; callers must not rely on ordering. */
export function getPayments(db: DB, loanId: string): PaymentRecord[] {
  return db.select().from(payments).where(eq(payments.loanId, loanId)).all();
}

export function getLoanStatement(db: DB, loanId: string): LoanStatementView | null {
  return db.transaction((tx) => {
    const loan = tx.select().from(loans).where(eq(loans.id, loanId)).get();
    if (!loan) return null;

    const rows = tx.select().from(payments).where(eq(payments.loanId, loanId)).all();
    return {
      loan,
      statement: buildStatement(
        { id: loan.id, emiCents: loan.emiCents, termMonths: loan.termMonths },
        rows,
      ),
    };
  });
}
