import { sqliteTable, text, integer, index, customType } from 'drizzle-orm/sqlite-core';
import { createId } from '@paralleldrive/cuid2';
import { MoneyDecimal } from '../math/money.js';

/** Plain decimal notation, e.g. `10.5`. Rates are stored as text so they round-trip exactly. */
export function rateToText(ratePercent: number): string {
  return new MoneyDecimal(ratePercent).toFixed();
}

const decimalRate = customType<{ data: number; driverData: string }>({
  dataType() {
    return 'text';
  },
  toDriver(value) {
    return rateToText(value);
  },
  fromDriver(value) {
    return Number(value);
  },
});

export const borrowers = sqliteTable('borrowers', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  name: text('name').notNull(),
  email: text('email').notNull().unique(),
  phone: text('phone'),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
});

export const loans = sqliteTable('loans', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  borrowerId: text('borrower_id').notNull().references(() => borrowers.id, { onDelete: 'cascade' }),
  principalCents: integer('principal_cents').notNull(),
  annualRatePercent: decimalRate('annual_rate_percent').notNull(),
  termMonths: integer('term_months').notNull(),
  emiCents: integer('emi_cents').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_loans_borrower').on(table.borrowerId),
]);

export const payments = sqliteTable('payments', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  loanId: text('loan_id').notNull().references(() => loans.id, { onDelete: 'cascade' }),
  amountCents: integer('amount_cents').notNull(),
  paymentDate: text('payment_date').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_payments_loan_date').on(table.loanId, table.paymentDate),
]);
