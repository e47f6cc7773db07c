import { Hono } from 'hono';
import { z } from 'zod';
import { computeEMI, formatMoney, multiplyCents } from '@loanledger/engine';
import { parseBody } from '../validation.js';
import type { AppDeps } from '../app.js';

// Caller-level sanity limits; the calculator itself enforces only the sign rules.
export const MAX_TERM_MONTHS = 600;
export const MAX_ANNUAL_RATE_PERCENT = 100;

export const loanTermsSchema = z.object({
  principalCents: z.number().int(),
  annualRatePercent: z.number().max(MAX_ANNUAL_RATE_PERCENT),
  termMonths: z.number().int().max(MAX_TERM_MONTHS),
});

export function emiRoutes(deps: AppDeps) {
  const router = new Hono();

  // POST / — quote an EMI without storing anything
  router.post('/', async (c) => {
    const terms = await parseBody(c, loanTermsSchema);
    const emiCents = computeEMI(terms);
    const scheduledTotalCents = multiplyCents(emiCents, terms.termMonths);

    return c.json({
      emiCents,
      emiFormatted: formatMoney(emiCents, deps.currency),
      scheduledTotalCents,
      scheduledTotalFormatted: formatMoney(scheduledTotalCents, deps.currency),
    });
  });

  return router;
}
