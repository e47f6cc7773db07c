import { Hono } from 'hono';
import { z } from 'zod';
import { eq } from 'drizzle-orm';
import {
  type DB,
  borrowers,
  createLoan,
  formatMoney,
  getLoanStatement,
  listLoans,
  recordPayment,
  statementStatus,
} from '@loanledger/engine';
import { notFound } from '../errors.js';
import { parseBody } from '../validation.js';
import { formatLoan, formatPayment, formatStatement } from '../presenters.js';
import { loanCreatedMessage, paymentRecordedMessage } from '../services/messages.js';
import { notifyBestEffort } from '../services/notifier.js';
import { renderStatementPdf } from '../services/statement-pdf.js';
import { loanTermsSchema } from './emi.js';
import type { AppDeps } from '../app.js';

const createLoanSchema = loanTermsSchema.extend({
  borrowerId: z.string().min(1),
  phone: z.string().trim().min(1).optional(),
});

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine((value) => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value);
  }, 'Invalid calendar date');

const recordPaymentSchema = z.object({
  amountCents: z.number().int().positive(),
  paymentDate: isoDate,
  phone: z.string().trim().min(1).optional(),
});

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const out = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(out).set(bytes);
  return out;
}

export function loanRoutes(db: DB, deps: AppDeps) {
  const router = new Hono();

  const findBorrower = (id: string) =>
    db.select().from(borrowers).where(eq(borrowers.id, id)).get();

  const requireStatement = (id: string) => {
    const view = getLoanStatement(db, id);
    if (!view) throw notFound('Loan', id);
    return view;
  };

  // GET / — list loans, optionally for one borrower
  router.get('/', (c) => {
    const borrowerId = c.req.query('borrowerId');
    const result = listLoans(db, { borrowerId }).map((loan) => {
      const { statement } = requireStatement(loan.id);
      return formatLoan(loan, statement, deps.currency);
    });
    return c.json(result);
  });

  // POST / — create loan; the EMI is fixed here and never recomputed
  router.post('/', async (c) => {
    const data = await parseBody(c, createLoanSchema);

    const borrower = findBorrower(data.borrowerId);
    if (!borrower) throw notFound('Borrower', data.borrowerId);

    const created = createLoan(db, {
      borrowerId: borrower.id,
      terms: {
        principalCents: data.principalCents,
        annualRatePercent: data.annualRatePercent,
        termMonths: data.termMonths,
      },
    });
    const { statement } = requireStatement(created.id);

    const destination = data.phone ?? borrower.phone;
    const notification = destination
      ? await notifyBestEffort(
          deps.notifier,
          destination,
          loanCreatedMessage({ borrowerName: borrower.name, loan: created, currency: deps.currency }),
        )
      : null;

    return c.json({ ...formatLoan(created, statement, deps.currency), notification }, 201);
  });

  // GET /:id — loan with borrower and statement
  router.get('/:id', (c) => {
    const id = c.req.param('id');
    const { loan, statement } = requireStatement(id);
    const borrower = findBorrower(loan.borrowerId);

    return c.json({
      ...formatLoan(loan, statement, deps.currency),
      borrowerName: borrower?.name ?? null,
      statement: formatStatement(statement, deps.currency),
    });
  });

  // GET /:id/statement — reconciled payment history
  router.get('/:id/statement', (c) => {
    const { statement } = requireStatement(c.req.param('id'));
    return c.json(formatStatement(statement, deps.currency));
  });

  // GET /:id/statement.pdf — downloadable statement
  router.get('/:id/statement.pdf', async (c) => {
    const id = c.req.param('id');
    const { loan, statement } = requireStatement(id);
    const borrower = findBorrower(loan.borrowerId);

    const pdf = await renderStatementPdf({
      loan,
      borrowerName: borrower?.name ?? 'Unknown borrower',
      statement,
      currency: deps.currency,
    });

    return c.body(toArrayBuffer(pdf), 200, {
      'Content-Type': 'application/pdf',
      'Content-Disposition': `attachment; filename="loan_${loan.id}.pdf"`,
    });
  });

  // POST /:id/payments — record a payment, then notify
  router.post('/:id/payments', async (c) => {
    const id = c.req.param('id');
    requireStatement(id);

    const data = await parseBody(c, recordPaymentSchema);
    const payment = recordPayment(db, {
      loanId: id,
      amountCents: data.amountCents,
      paymentDate: data.paymentDate,
    });

    const { loan, statement } = requireStatement(id);
    const borrower = findBorrower(loan.borrowerId);

    const destination = data.phone ?? borrower?.phone;
    const notification = destination
      ? await notifyBestEffort(
          deps.notifier,
          destination,
          paymentRecordedMessage({
            borrowerName: borrower?.name ?? 'Borrower',
            loanId: loan.id,
            amountCents: payment.amountCents,
            outstandingBalanceCents: statement.outstandingBalanceCents,
            currency: deps.currency,
          }),
        )
      : null;

    return c.json(
      {
        payment: formatPayment(payment, deps.currency),
        totalPaidCents: statement.totalPaidCents,
        outstandingBalanceCents: statement.outstandingBalanceCents,
        outstandingBalanceFormatted: formatMoney(statement.outstandingBalanceCents, deps.currency),
        status: statementStatus(statement),
        notification,
      },
      201,
    );
  });

  return router;
}
