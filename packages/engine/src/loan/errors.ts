export type LedgerErrorCode = 'INVALID_LOAN_TERMS' | 'INVALID_LOAN_STATE';

export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;
}

/** Raised by the EMI calculator; the loan must not be persisted. */
export class InvalidLoanTerms extends LedgerError {
  readonly code = 'INVALID_LOAN_TERMS';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidLoanTerms';
  }
}

/**
 * Raised by the reconciler when a stored loan or its payments break the
 * invariants established at creation time (non-positive EMI, foreign payment).
 */
export class InvalidLoanState extends LedgerError {
  readonly code = 'INVALID_LOAN_STATE';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidLoanState';
  }
}
