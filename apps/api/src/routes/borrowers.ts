import { Hono } from 'hono';
import { z } from 'zod';
import { asc, eq } from 'drizzle-orm';
import {
  type DB,
  borrowers,
  formatMoney,
  getLoanStatement,
  listLoans,
  sumCents,
} from '@loanledger/engine';
import { conflict, notFound } from '../errors.js';
import { parseBody } from '../validation.js';
import { formatLoan } from '../presenters.js';
import type { AppDeps } from '../app.js';

const createBorrowerSchema = z.object({
  name: z.string().trim().min(1),
  email: z.string().trim().toLowerCase().email(),
  phone: z.string().trim().min(1).optional(),
});

export function borrowerRoutes(db: DB, deps: AppDeps) {
  const router = new Hono();

  // GET / — list borrowers
  router.get('/', (c) => {
    const rows = db.select().from(borrowers).orderBy(asc(borrowers.name)).all();
    return c.json(rows);
  });

  // POST / — register borrower
  router.post('/', async (c) => {
    const data = await parseBody(c, createBorrowerSchema);

    const existing = db.select().from(borrowers).where(eq(borrowers.email, data.email)).get();
    if (existing) {
      throw conflict(`Email '${data.email}' is already registered`, 'Use the existing borrower ID');
    }

    const created = db
      .insert(borrowers)
      .values({ name: data.name, email: data.email, phone: data.phone ?? null })
      .returning()
      .get();

    return c.json(created, 201);
  });

  // GET /:id — single borrower
  router.get('/:id', (c) => {
    const id = c.req.param('id');
    const borrower = db.select().from(borrowers).where(eq(borrowers.id, id)).get();
    if (!borrower) throw notFound('Borrower', id);
    return c.json(borrower);
  });

  // GET /:id/loans — borrower's loans with balances
  router.get('/:id/loans', (c) => {
    const id = c.req.param('id');
    const borrower = db.select().from(borrowers).where(eq(borrowers.id, id)).get();
    if (!borrower) throw notFound('Borrower', id);

    const result = listLoans(db, { borrowerId: id }).flatMap((loan) => {
      const view = getLoanStatement(db, loan.id);
      return view ? [formatLoan(view.loan, view.statement, deps.currency)] : [];
    });
    const totalOutstandingCents = sumCents(result.map((l) => l.outstandingBalanceCents));

    return c.json({
      borrowerId: id,
      loans: result,
      totalOutstandingCents,
      totalOutstandingFormatted: formatMoney(totalOutstandingCents, deps.currency),
    });
  });

  return router;
}
