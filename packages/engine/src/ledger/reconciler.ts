import { MoneyDecimal, isSafeCents, subtractCents } from '../math/money.js';
import { InvalidLoanState } from '../loan/errors.js';
import type { PaymentRecord } from '../loan/types.js';
import type { LedgerLoan, Statement, StatementEntry, StatementStatus } from './types.js';

// Code-unit comparison keeps the order independent of the host locale.
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function comparePayments(a: PaymentRecord, b: PaymentRecord): number {
  return (
    compareText(a.paymentDate, b.paymentDate) ||
    compareText(a.createdAt, b.createdAt) ||
    compareText(a.id, b.id)
  );
}

function assertLedgerLoan(loan: LedgerLoan): void {
  if (!Number.isSafeInteger(loan.emiCents) || loan.emiCents <= 0) {
    throw new InvalidLoanState(`Loan '${loan.id}' has a non-positive EMI (${loan.emiCents})`);
  }
  if (!Number.isSafeInteger(loan.termMonths) || loan.termMonths <= 0) {
    throw new InvalidLoanState(`Loan '${loan.id}' has a non-positive term (${loan.termMonths})`);
  }
}

function assertPayment(loan: LedgerLoan, payment: PaymentRecord): void {
  if (payment.loanId !== loan.id) {
    throw new InvalidLoanState(`Payment '${payment.id}' belongs to loan '${payment.loanId}', not '${loan.id}'`);
  }
  if (!Number.isSafeInteger(payment.amountCents) || payment.amountCents <= 0) {
    throw new InvalidLoanState(`Payment '${payment.id}' has a non-positive amount (${payment.amountCents})`);
  }
}

/**
 * Reconciles a loan's stored EMI and term against its payments.
 *
 * Payments may arrive in any order; they are applied by payment date, then
 * creation time, then id. The outstanding balance is not clamped, so an
 * overpaid loan reports a negative figure.
 */
export function buildStatement(loan: LedgerLoan, payments: readonly PaymentRecord[]): Statement {
  assertLedgerLoan(loan);
  for (const payment of payments) assertPayment(loan, payment);

  const scheduledTotal = new MoneyDecimal(loan.emiCents).times(loan.termMonths);
  if (!isSafeCents(scheduledTotal)) {
    throw new InvalidLoanState(`Loan '${loan.id}' has a scheduled total beyond the safe integer range`);
  }
  const scheduledTotalCents = scheduledTotal.toNumber();
  const sorted = [...payments].sort(comparePayments);

  let totalPaid = new MoneyDecimal(0);
  let totalPaidCents = 0;
  const entries: StatementEntry[] = sorted.map((payment) => {
    totalPaid = totalPaid.plus(payment.amountCents);
    if (!isSafeCents(totalPaid)) {
      throw new InvalidLoanState(`Payments of loan '${loan.id}' sum beyond the safe integer range`);
    }
    totalPaidCents = totalPaid.toNumber();
    return {
      payment: {
        id: payment.id,
        loanId: payment.loanId,
        amountCents: payment.amountCents,
        paymentDate: payment.paymentDate,
        createdAt: payment.createdAt,
      },
      runningBalanceAfterCents: subtractCents(scheduledTotalCents, totalPaidCents),
    };
  });

  return {
    loanId: loan.id,
    emiCents: loan.emiCents,
    termMonths: loan.termMonths,
    scheduledTotalCents,
    totalPaidCents,
    outstandingBalanceCents: subtractCents(scheduledTotalCents, totalPaidCents),
    entries,
  };
}

export function isPaidOff(statement: Statement): boolean {
  return statement.outstandingBalanceCents <= 0;
}

export function statementStatus(statement: Statement): StatementStatus {
  if (statement.outstandingBalanceCents > 0) return 'outstanding';
  return statement.outstandingBalanceCents === 0 ? 'paid_off' : 'overpaid';
}
