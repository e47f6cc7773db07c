import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Hono } from 'hono';
import { borrowers, loans, type DB } from '@loanledger/engine';
import { createApp } from '../src/app.js';
import { api, createTestDb, FailingNotifier, RecordingNotifier } from './helpers.js';

function seedBorrowers(db: DB) {
  db.insert(borrowers).values([
    { id: 'bor-asha', name: 'Asha Test', email: 'asha@example.test', phone: '+15550000001' },
    { id: 'bor-ravi', name: 'Ravi Test', email: 'ravi@example.test' },
  ]).run();
}

async function createStandardLoan(app: Hono, borrowerId = 'bor-asha') {
  const { data } = await api(app, 'POST', '/api/v1/loans', {
    borrowerId,
    principalCents: 1_000_000,
    annualRatePercent: 12,
    termMonths: 12,
  });
  const id: string = data.id;
  return id;
}

describe('Loans API', () => {
  let app: Hono;
  let notifier: RecordingNotifier;

  beforeEach(() => {
    const db = createTestDb();
    seedBorrowers(db);
    notifier = new RecordingNotifier();
    app = createApp(db, { notifier });
  });

  describe('POST /api/v1/loans', () => {
    it('creates a loan with its EMI and notifies the borrower', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/loans', {
        borrowerId: 'bor-asha',
        principalCents: 1_000_000,
        annualRatePercent: 12,
        termMonths: 12,
      });

      expect(status).toBe(201);
      expect(data.emiCents).toBe(88849);
      expect(data.emiFormatted).toBe('₹888.49');
      expect(data.scheduledTotalCents).toBe(1066188);
      expect(data.outstandingBalanceCents).toBe(1066188);
      expect(data.status).toBe('outstanding');
      expect(data.notification).toEqual({ sent: true, detail: 'queued' });

      expect(notifier.sent).toHaveLength(1);
      expect(notifier.sent[0].to).toBe('+15550000001');
      expect(notifier.sent[0].body).toBe(
        [
          'Hello Asha Test,',
          '',
          'Your loan has been created.',
          '',
          'Loan details:',
          '- Principal: ₹10,000.00',
          '- Interest rate: 12% per annum',
          '- Term: 12 months',
          '- Monthly EMI: ₹888.49',
        ].join('\n'),
      );
    });

    it('prefers the phone given with the request', async () => {
      await api(app, 'POST', '/api/v1/loans', {
        borrowerId: 'bor-asha',
        principalCents: 500_000,
        annualRatePercent: 0,
        termMonths: 5,
        phone: '+15550000099',
      });
      expect(notifier.sent[0].to).toBe('+15550000099');
    });

    it('skips notification when no phone is known', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/loans', {
        borrowerId: 'bor-ravi',
        principalCents: 1_200_000,
        annualRatePercent: 0,
        termMonths: 12,
      });
      expect(status).toBe(201);
      expect(data.emiCents).toBe(100000);
      expect(data.notification).toBeNull();
      expect(notifier.sent).toHaveLength(0);
    });

    it('rejects invalid terms without storing anything', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/loans', {
        borrowerId: 'bor-asha',
        principalCents: 1_000_000,
        annualRatePercent: -1,
        termMonths: 12,
      });
      expect(status).toBe(400);
      expect(data.error.code).toBe('INVALID_LOAN_TERMS');

      const { data: list } = await api(app, 'GET', '/api/v1/loans');
      expect(list).toEqual([]);
      expect(notifier.sent).toHaveLength(0);
    });

    it('rejects terms whose installment rounds to zero cents', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/loans', {
        borrowerId: 'bor-asha',
        principalCents: 1,
        annualRatePercent: 0,
        termMonths: 3,
      });
      expect(status).toBe(400);
      expect(data.error.code).toBe('INVALID_LOAN_TERMS');

      const { data: list } = await api(app, 'GET', '/api/v1/loans');
      expect(list).toEqual([]);
      expect(notifier.sent).toHaveLength(0);
    });

    it('returns 404 for an unknown borrower', async () => {
      const { status } = await api(app, 'POST', '/api/v1/loans', {
        borrowerId: 'nobody',
        principalCents: 1_000_000,
        annualRatePercent: 12,
        termMonths: 12,
      });
      expect(status).toBe(404);
    });

    it('returns 400 for a malformed body', async () => {
      const { status, data } = await api(app, 'POST', '/api/v1/loans', {});
      expect(status).toBe(400);
      expect(data.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /api/v1/loans', () => {
    it('lists loans, optionally per borrower', async () => {
      await createStandardLoan(app, 'bor-asha');
      await createStandardLoan(app, 'bor-ravi');

      const { data: all } = await api(app, 'GET', '/api/v1/loans');
      expect(all).toHaveLength(2);

      const { data: ravi } = await api(app, 'GET', '/api/v1/loans?borrowerId=bor-ravi');
      expect(ravi).toHaveLength(1);
      expect(ravi[0].borrowerId).toBe('bor-ravi');
    });

    it('GET /api/v1/loans/:id includes borrower and statement', async () => {
      const id = await createStandardLoan(app);
      const { status, data } = await api(app, 'GET', `/api/v1/loans/${id}`);
      expect(status).toBe(200);
      expect(data.borrowerName).toBe('Asha Test');
      expect(data.statement.scheduledTotalFormatted).toBe('₹10,661.88');
      expect(data.statement.entries).toEqual([]);
    });

    it('GET /api/v1/loans/nonexistent returns 404', async () => {
      const { status } = await api(app, 'GET', '/api/v1/loans/nonexistent');
      expect(status).toBe(404);
    });
  });

  describe('payments', () => {
    it('records a payment and reports the remaining balance', async () => {
      const id = await createStandardLoan(app);
      notifier.sent.length = 0;

      const { status, data } = await api(app, 'POST', `/api/v1/loans/${id}/payments`, {
        amountCents: 88849,
        paymentDate: '2026-01-05',
      });

      expect(status).toBe(201);
      expect(data.payment.loanId).toBe(id);
      expect(data.payment.amountFormatted).toBe('₹888.49');
      expect(data.totalPaidCents).toBe(88849);
      expect(data.outstandingBalanceCents).toBe(977339);
      expect(data.outstandingBalanceFormatted).toBe('₹9,773.39');
      expect(data.status).toBe('outstanding');
      expect(notifier.sent[0].body).toBe(
        [
          'Hello Asha Test,',
          '',
          'Your payment has been recorded.',
          '',
          `- Loan: ${id}`,
          '- Amount paid: ₹888.49',
          '- Remaining balance: ₹9,773.39',
        ].join('\n'),
      );
    });

    it('orders the statement by payment date, not entry order', async () => {
      const id = await createStandardLoan(app);
      await api(app, 'POST', `/api/v1/loans/${id}/payments`, { amountCents: 88849, paymentDate: '2026-01-05' });
      await api(app, 'POST', `/api/v1/loans/${id}/payments`, { amountCents: 50000, paymentDate: '2025-12-20' });

      const { status, data } = await api(app, 'GET', `/api/v1/loans/${id}/statement`);
      expect(status).toBe(200);
      expect(data.entries.map((e: { payment: { paymentDate: string } }) => e.payment.paymentDate)).toEqual([
        '2025-12-20',
        '2026-01-05',
      ]);
      expect(data.entries.map((e: { runningBalanceAfterCents: number }) => e.runningBalanceAfterCents)).toEqual([
        1016188,
        927339,
      ]);
      expect(data.totalPaidCents).toBe(138849);
      expect(data.outstandingBalanceCents).toBe(927339);
      expect(data.isPaidOff).toBe(false);
    });

    it('reports overpayment as a negative balance', async () => {
      const { data: loan } = await api(app, 'POST', '/api/v1/loans', {
        borrowerId: 'bor-asha',
        principalCents: 100_000,
        annualRatePercent: 0,
        termMonths: 10,
      });
      notifier.sent.length = 0;

      const { data } = await api(app, 'POST', `/api/v1/loans/${loan.id}/payments`, {
        amountCents: 120_000,
        paymentDate: '2026-01-05',
      });

      expect(data.outstandingBalanceCents).toBe(-20000);
      expect(data.outstandingBalanceFormatted).toBe('-₹200.00');
      expect(data.status).toBe('overpaid');
      expect(notifier.sent[0].body.split('\n').at(-1)).toBe('- Loan fully repaid (overpaid by ₹200.00)');
    });

    it('rejects an impossible calendar date', async () => {
      const id = await createStandardLoan(app);
      const { status } = await api(app, 'POST', `/api/v1/loans/${id}/payments`, {
        amountCents: 100,
        paymentDate: '2026-02-30',
      });
      expect(status).toBe(400);
    });

    it('rejects a non-positive amount', async () => {
      const id = await createStandardLoan(app);
      const { status } = await api(app, 'POST', `/api/v1/loans/${id}/payments`, {
        amountCents: 0,
        paymentDate: '2026-01-05',
      });
      expect(status).toBe(400);
    });

    it('returns 404 for an unknown loan', async () => {
      const { status } = await api(app, 'POST', '/api/v1/loans/nonexistent/payments', {
        amountCents: 100,
        paymentDate: '2026-01-05',
      });
      expect(status).toBe(404);
    });

    it('keeps the payment when the SMS fails', async () => {
      const db = createTestDb();
      seedBorrowers(db);
      const failing = createApp(db, { notifier: new FailingNotifier() });
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      const id = await createStandardLoan(failing);
      const { status, data } = await api(failing, 'POST', `/api/v1/loans/${id}/payments`, {
        amountCents: 88849,
        paymentDate: '2026-01-05',
      });

      expect(status).toBe(201);
      expect(data.notification).toEqual({ sent: false, detail: 'Failed to send SMS: carrier down' });

      const { data: statement } = await api(failing, 'GET', `/api/v1/loans/${id}/statement`);
      expect(statement.entries).toHaveLength(1);
      expect(errorSpy).toHaveBeenCalled();
      errorSpy.mockRestore();
    });
  });

  describe('corrupt ledger data', () => {
    it('maps an inconsistent stored loan to INVALID_LOAN_STATE', async () => {
      const db = createTestDb();
      seedBorrowers(db);
      db.$client.pragma('ignore_check_constraints = ON');
      db.insert(loans).values({
        id: 'loan-corrupt',
        borrowerId: 'bor-asha',
        principalCents: 1000,
        annualRatePercent: 12,
        termMonths: 12,
        emiCents: 0,
      }).run();
      const corrupt = createApp(db, { notifier });
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

      const { status, data } = await api(corrupt, 'GET', '/api/v1/loans/loan-corrupt/statement');

      expect(status).toBe(500);
      expect(data.error.code).toBe('INVALID_LOAN_STATE');
      expect(data.error.message).toBe("Loan 'loan-corrupt' has a non-positive EMI (0)");
      expect(errorSpy).toHaveBeenCalledWith('Ledger integrity error:', "Loan 'loan-corrupt' has a non-positive EMI (0)");
      errorSpy.mockRestore();
    });
  });

  describe('borrower loans', () => {
    it("sums outstanding balances across a borrower's loans", async () => {
      const first = await createStandardLoan(app);
      await createStandardLoan(app);
      await api(app, 'POST', `/api/v1/loans/${first}/payments`, { amountCents: 66188, paymentDate: '2026-01-05' });

      const { status, data } = await api(app, 'GET', '/api/v1/borrowers/bor-asha/loans');
      expect(status).toBe(200);
      expect(data.loans).toHaveLength(2);
      expect(data.totalOutstandingCents).toBe(2066188);
      expect(data.totalOutstandingFormatted).toBe('₹20,661.88');
    });
  });

  describe('GET /api/v1/loans/:id/statement.pdf', () => {
    it('returns a PDF attachment', async () => {
      const id = await createStandardLoan(app);
      await api(app, 'POST', `/api/v1/loans/${id}/payments`, { amountCents: 88849, paymentDate: '2026-01-05' });

      const res = await app.request(`/api/v1/loans/${id}/statement.pdf`);
      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('application/pdf');
      expect(res.headers.get('content-disposition')).toBe(`attachment; filename="loan_${id}.pdf"`);

      const bytes = Buffer.from(await res.arrayBuffer());
      expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('returns 404 for an unknown loan', async () => {
      const res = await app.request('/api/v1/loans/nonexistent/statement.pdf');
      expect(res.status).toBe(404);
    });
  });
});
