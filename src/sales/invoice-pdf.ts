import PDFDocument from 'pdfkit';
import { describeDiscount, formatAmount, Invoice } from './invoice';

export type StoreDetails = {
  name: string;
  address: string;
};

const COLUMNS = [
  { label: 'Item', width: 190, align: 'left' as const },
  { label: 'Qty', width: 40, align: 'right' as const },
  { label: 'MRP', width: 70, align: 'right' as const },
  { label: 'Discount', width: 70, align: 'right' as const },
  { label: 'Total', width: 80, align: 'right' as const },
];

function writeRow(doc: PDFKit.PDFDocument, cells: string[], bold = false) {
  const y = doc.y;
  let x = doc.page.margins.left;
  doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(10);
  cells.forEach((cell, index) => {
    const column = COLUMNS[index];
    doc.text(cell, x, y, { width: column.width, align: column.align });
    x += column.width + 6;
  });
  doc.moveDown(0.4);
  doc.x = doc.page.margins.left;
}

export function writeInvoice(
  doc: PDFKit.PDFDocument,
  invoice: Invoice,
  store: StoreDetails,
) {
  doc.font('Helvetica-Bold').fontSize(18).text(store.name);
  if (store.address) {
    doc.font('Helvetica').fontSize(10).text(store.address);
  }
  doc.moveDown();
  doc
    .font('Helvetica')
    .fontSize(11)
    .text(`Invoice: ${invoice.invoiceNo}`)
    .text(`Date: ${invoice.date.replace('T', ' ').slice(0, 19)} UTC`)
    .text(`Served by: ${invoice.soldBy}`)
    .text(
      `Customer: ${invoice.customer.name}${
        invoice.customer.phone ? ` (${invoice.customer.phone})` : ''
      }`,
    );
  doc.moveDown();

  writeRow(
    doc,
    COLUMNS.map((column) => column.label),
    true,
  );
  invoice.items.forEach((item) => {
    writeRow(doc, [
      `${item.productId} ${item.name}`,
      String(item.qty),
      formatAmount(item.mrp),
      describeDiscount(item.discount),
      formatAmount(item.effectiveTotal),
    ]);
  });
  doc.moveDown();
  writeRow(doc, ['Subtotal', '', '', '', formatAmount(invoice.totals.subtotal)]);
  writeRow(
    doc,
    ['Grand total', '', '', '', formatAmount(invoice.totals.grandTotal)],
    true,
  );
  doc.moveDown();
  doc.font('Helvetica').fontSize(9).text('Prices include GST.');
}

/** Renders the invoice to an in-memory PDF. */
export function renderInvoicePdf(
  invoice: Invoice,
  store: StoreDetails,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ margin: 36, size: 'A4' });
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
    writeInvoice(doc, invoice, store);
    doc.end();
  });
}
