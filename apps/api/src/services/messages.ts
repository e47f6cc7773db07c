import { formatMoney, type LoanRecord } from '@loanledger/engine';

export function loanCreatedMessage(args: {
  borrowerName: string;
  loan: LoanRecord;
  currency: string;
}): string {
  const { borrowerName, loan, currency } = args;
  return [
    `Hello ${borrowerName},`,
    '',
    'Your loan has been created.',
    '',
    'Loan details:',
    `- Principal: ${formatMoney(loan.principalCents, currency)}`,
    `- Interest rate: ${loan.annualRatePercent}% per annum`,
    `- Term: ${loan.termMonths} months`,
    `- Monthly EMI: ${formatMoney(loan.emiCents, currency)}`,
  ].join('\n');
}

export function paymentRecordedMessage(args: {
  borrowerName: string;
  loanId: string;
  amountCents: number;
  outstandingBalanceCents: number;
  currency: string;
}): string {
  const { borrowerName, loanId, amountCents, outstandingBalanceCents, currency } = args;
  const balanceLine = outstandingBalanceCents <= 0
    ? `- Loan fully repaid${outstandingBalanceCents < 0 ? ` (overpaid by ${formatMoney(-outstandingBalanceCents, currency)})` : ''}`
    : `- Remaining balance: ${formatMoney(outstandingBalanceCents, currency)}`;

  return [
    `Hello ${borrowerName},`,
    '',
    'Your payment has been recorded.',
    '',
    `- Loan: ${loanId}`,
    `- Amount paid: ${formatMoney(amountCents, currency)}`,
    balanceLine,
  ].join('\n');
}
