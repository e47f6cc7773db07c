import { Decimal } from 'decimal.js';

// Every money figure in the ledger is an integer count of cents. Intermediate
// values carry 40 significant digits and are rounded once, half away from zero.
export const MoneyDecimal = Decimal.clone({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
});

interface CurrencyConfig {
  symbol: string;
  position: 'prefix' | 'suffix';
}

const CURRENCY_CONFIG: Record<string, CurrencyConfig> = {
  INR: { symbol: '₹', position: 'prefix' },
  USD: { symbol: '$', position: 'prefix' },
  GBP: { symbol: '£', position: 'prefix' },
  EUR: { symbol: '€', position: 'suffix' },
  KZT: { symbol: '₸', position: 'suffix' },
  AED: { symbol: 'AED', position: 'prefix' },
};

const MAJOR_UNITS_PATTERN = /^-?\d+(\.\d{1,2})?$/;

/** True when `value` is a whole number of cents a JS number holds exactly. */
export function isSafeCents(value: Decimal.Value): boolean {
  const amount = new MoneyDecimal(value);
  return amount.isInteger() && amount.abs().lte(Number.MAX_SAFE_INTEGER);
}

function toSafeCents(value: Decimal): number {
  if (!isSafeCents(value)) {
    throw new RangeError(`${value.toFixed()} cents is outside the safe integer range`);
  }
  return value.toNumber();
}

export function roundToCents(value: Decimal.Value): Decimal {
  return new MoneyDecimal(value).toDecimalPlaces(0, Decimal.ROUND_HALF_UP);
}

export function roundCents(value: Decimal.Value): number {
  return toSafeCents(roundToCents(value));
}

/**
 * Converts a major-unit amount such as `"888.49"` or `12.5` to integer cents.
 * More than two fractional digits is an error, not a rounding.
 */
export function toCents(amount: string | number): number {
  const text = typeof amount === 'number' ? String(amount) : amount.trim();
  if (!MAJOR_UNITS_PATTERN.test(text)) {
    throw new RangeError(`Invalid money amount '${amount}': expected at most two decimal places`);
  }
  return toSafeCents(new MoneyDecimal(text).times(100));
}

export function fromCents(amountCents: number): string {
  if (!Number.isSafeInteger(amountCents)) {
    throw new RangeError(`Invalid cent amount ${amountCents}`);
  }
  return new MoneyDecimal(amountCents).dividedBy(100).toFixed(2);
}

function groupedMajorUnits(amountCents: number): { isNegative: boolean; absStr: string } {
  const amount = new MoneyDecimal(amountCents).dividedBy(100);
  const isNegative = amount.isNegative() && !amount.isZero();
  const [whole, fraction] = amount.abs().toFixed(2).split('.');
  return { isNegative, absStr: `${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}` };
}

/** `INR 1,000.00` style, for outputs that cannot render every currency sign. */
export function formatMoneyWithCode(amountCents: number, currency = 'INR'): string {
  const { isNegative, absStr } = groupedMajorUnits(amountCents);
  return `${isNegative ? '-' : ''}${currency} ${absStr}`;
}

export function formatMoney(amountCents: number, currency = 'INR'): string {
  const { isNegative, absStr } = groupedMajorUnits(amountCents);
  const config = CURRENCY_CONFIG[currency];

  if (config) {
    if (config.position === 'prefix') {
      const separator = config.symbol.length > 1 ? ' ' : '';
      return `${isNegative ? '-' : ''}${config.symbol}${separator}${absStr}`;
    }
    return `${isNegative ? '-' : ''}${absStr} ${config.symbol}`;
  }

  // Unknown currency: fallback to suffix with ISO code
  return `${isNegative ? '-' : ''}${absStr} ${currency}`;
}

export function addCents(...amounts: number[]): number {
  return sumCents(amounts);
}

export function subtractCents(a: number, b: number): number {
  return toSafeCents(new MoneyDecimal(a).minus(b));
}

export function multiplyCents(amount: number, factor: Decimal.Value): number {
  return roundCents(new MoneyDecimal(amount).times(factor));
}

// Throws RangeError rather than returning a total that has lost cents.
export function sumCents(amounts: readonly number[]): number {
  const total = amounts.reduce((acc, val) => acc.plus(val), new MoneyDecimal(0));
  return toSafeCents(total);
}
