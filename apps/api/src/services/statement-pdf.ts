import PDFDocument from 'pdfkit';
import {
  formatMoney,
  formatMoneyWithCode,
  statementStatus,
  type LoanRecord,
  type Statement,
} from '@loanledger/engine';

export interface StatementPdfInput {
  loan: LoanRecord;
  borrowerName: string;
  statement: Statement;
  currency: string;
}

const MARGIN_X = 50;
const TOP_Y = 50;
const BOTTOM_LIMIT = 80;
const ROW_HEIGHT = 14;

// The standard PDF fonts are WinAnsi encoded; other currency signs have no glyph.
const WIN_ANSI_CURRENCIES = new Set(['USD', 'GBP', 'EUR']);

export function pdfMoney(amountCents: number, currency: string): string {
  return WIN_ANSI_CURRENCIES.has(currency)
    ? formatMoney(amountCents, currency)
    : formatMoneyWithCode(amountCents, currency);
}

const COLUMNS = {
  date: MARGIN_X,
  amount: MARGIN_X + 110,
  balance: MARGIN_X + 230,
  recorded: MARGIN_X + 350,
};

/**
 * Render a loan statement to PDF.
 *
 * Layout: title, loan details, balance summary, then the payment table in
 * the order the statement applied them, continuing onto new pages as needed.
 */
export function renderStatementPdf(input: StatementPdfInput): Promise<Buffer> {
  const { loan, borrowerName, statement, currency } = input;

  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = [];
      const doc = new PDFDocument({
        size: 'A4',
        margin: MARGIN_X,
        info: {
          Title: `Loan Statement - ${loan.id}`,
          Subject: 'Loan statement',
        },
      });

      doc.on('data', (chunk) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      const money = (cents: number) => pdfMoney(cents, currency);
      const pageBottom = doc.page.height - BOTTOM_LIMIT;
      let y = TOP_Y;

      doc.font('Helvetica-Bold').fontSize(16).text(`Loan Statement - #${loan.id}`, MARGIN_X, y);
      y += 30;

      doc.font('Helvetica').fontSize(11);
      const details = [
        `Borrower: ${borrowerName}`,
        `Principal: ${money(loan.principalCents)}`,
        `Annual Rate (%): ${loan.annualRatePercent}`,
        `Term (months): ${loan.termMonths}`,
        `EMI: ${money(loan.emiCents)}`,
        `Created at: ${loan.createdAt}`,
      ];
      for (const line of details) {
        doc.text(line, MARGIN_X, y);
        y += 18;
      }

      y += 6;
      doc.font('Helvetica-Bold').fontSize(13).text('Summary', MARGIN_X, y);
      y += 20;
      doc.font('Helvetica').fontSize(11);
      const summary = [
        `Scheduled total: ${money(statement.scheduledTotalCents)}`,
        `Total paid: ${money(statement.totalPaidCents)}`,
        `Outstanding balance: ${money(statement.outstandingBalanceCents)}`,
        `Status: ${statementStatus(statement).replace('_', ' ')}`,
      ];
      for (const line of summary) {
        doc.text(line, MARGIN_X, y);
        y += 18;
      }

      y += 6;
      doc.font('Helvetica-Bold').fontSize(13).text('Payments', MARGIN_X, y);
      y += 20;
      doc.font('Helvetica').fontSize(10);

      if (statement.entries.length === 0) {
        doc.text('No payments recorded.', MARGIN_X, y);
      } else {
        const header = () => {
          doc.font('Helvetica-Bold');
          doc.text('Date', COLUMNS.date, y);
          doc.text('Amount', COLUMNS.amount, y);
          doc.text('Balance After', COLUMNS.balance, y);
          doc.text('Recorded At', COLUMNS.recorded, y);
          y += ROW_HEIGHT;
          doc.moveTo(MARGIN_X, y).lineTo(doc.page.width - MARGIN_X, y).stroke();
          y += 6;
          doc.font('Helvetica');
        };

        header();
        for (const entry of statement.entries) {
          if (y > pageBottom) {
            doc.addPage();
            y = TOP_Y;
            header();
          }
          doc.text(entry.payment.paymentDate, COLUMNS.date, y);
          doc.text(money(entry.payment.amountCents), COLUMNS.amount, y);
          doc.text(money(entry.runningBalanceAfterCents), COLUMNS.balance, y);
          doc.text(entry.payment.createdAt.slice(0, 19).replace('T', ' '), COLUMNS.recorded, y);
          y += ROW_HEIGHT;
        }
      }

      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}
