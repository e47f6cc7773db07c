import {
  formatMoney,
  isPaidOff,
  statementStatus,
  type LoanRecord,
  type PaymentRecord,
  type Statement,
} from '@loanledger/engine';

export function formatPayment(payment: PaymentRecord, currency: string) {
  return {
    ...payment,
    amountFormatted: formatMoney(payment.amountCents, currency),
  };
}

export function formatStatement(statement: Statement, currency: string) {
  return {
    loanId: statement.loanId,
    emiCents: statement.emiCents,
    termMonths: statement.termMonths,
    scheduledTotalCents: statement.scheduledTotalCents,
    scheduledTotalFormatted: formatMoney(statement.scheduledTotalCents, currency),
    totalPaidCents: statement.totalPaidCents,
    totalPaidFormatted: formatMoney(statement.totalPaidCents, currency),
    outstandingBalanceCents: statement.outstandingBalanceCents,
    outstandingBalanceFormatted: formatMoney(statement.outstandingBalanceCents, currency),
    status: statementStatus(statement),
    isPaidOff: isPaidOff(statement),
    entries: statement.entries.map((entry) => ({
      payment: formatPayment(entry.payment, currency),
      runningBalanceAfterCents: entry.runningBalanceAfterCents,
      runningBalanceAfterFormatted: formatMoney(entry.runningBalanceAfterCents, currency),
    })),
  };
}

export function formatLoan(loan: LoanRecord, statement: Statement, currency: string) {
  return {
    id: loan.id,
    borrowerId: loan.borrowerId,
    principalCents: loan.principalCents,
    principalFormatted: formatMoney(loan.principalCents, currency),
    annualRatePercent: loan.annualRatePercent,
    termMonths: loan.termMonths,
    emiCents: loan.emiCents,
    emiFormatted: formatMoney(loan.emiCents, currency),
    scheduledTotalCents: statement.scheduledTotalCents,
    totalPaidCents: statement.totalPaidCents,
    outstandingBalanceCents: statement.outstandingBalanceCents,
    outstandingBalanceFormatted: formatMoney(statement.outstandingBalanceCents, currency),
    status: statementStatus(statement),
    createdAt: loan.createdAt,
  };
}
