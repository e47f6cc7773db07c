import type { Decimal } from 'decimal.js';
import { MoneyDecimal, isSafeCents, roundToCents } from '../math/money.js';
import { InvalidLoanTerms } from './errors.js';
import type { LoanTerms } from './types.js';

function assertTerms(terms: LoanTerms): void {
  const { principalCents, annualRatePercent, termMonths } = terms;

  if (!Number.isSafeInteger(principalCents) || principalCents <= 0) {
    throw new InvalidLoanTerms(`principal must be a positive whole number of cents, got ${principalCents}`);
  }
  if (!Number.isSafeInteger(termMonths) || termMonths <= 0) {
    throw new InvalidLoanTerms(`termMonths must be a positive integer, got ${termMonths}`);
  }
  if (!Number.isFinite(annualRatePercent) || annualRatePercent < 0) {
    throw new InvalidLoanTerms(`annualRatePercent must be zero or greater, got ${annualRatePercent}`);
  }
}

/**
 * Fixed monthly installment of a reducing-balance loan, in cents.
 *
 *   EMI = P * r * (1 + r)^n / ((1 + r)^n - 1),  r = annual% / 12 / 100
 *
 * A zero rate degenerates to P / n. The result is rounded once, half away
 * from zero; the compounding factor itself is never rounded. Terms whose
 * scheduled total (EMI x n) would not fit a safe integer are rejected.
 */
export function computeEMI(terms: LoanTerms): number {
  assertTerms(terms);

  const principal = new MoneyDecimal(terms.principalCents);
  const n = terms.termMonths;
  const monthlyRate = new MoneyDecimal(terms.annualRatePercent).div(12).div(100);

  let emi: Decimal;
  if (monthlyRate.isZero()) {
    emi = roundToCents(principal.div(n));
  } else {
    const growth = monthlyRate.plus(1).pow(n);
    emi = roundToCents(principal.times(monthlyRate).times(growth).div(growth.minus(1)));
  }

  if (!isSafeCents(emi.times(n))) {
    throw new InvalidLoanTerms(`scheduled total of ${n} installments of ${emi.toFixed()} cents exceeds the safe integer range`);
  }
  return emi.toNumber();
}
