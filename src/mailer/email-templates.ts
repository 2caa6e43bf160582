import type { Invoice } from '../sales/invoice';
import { describeDiscount, formatAmount } from '../sales/invoice';

type StoreEmailContent = {
  subject: string;
  title: string;
  body: string;
  storeName: string;
  tableHtml?: string;
  tableText?: string;
  footerLine?: string;
};

export const escapeHtml = (value: string) =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

const renderBody = (body: string) =>
  body
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => `<p style="margin:0 0 12px;line-height:1.6;">${escapeHtml(line)}</p>`)
    .join('');

export const buildStoreEmail = (content: StoreEmailContent) => {
  const footerLine = content.footerLine
    ? `<p style="margin:18px 0 0;color:#6b7280;font-size:12px;">${escapeHtml(
        content.footerLine,
      )}</p>`
    : '';

  const html = `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>${escapeHtml(content.subject)}</title>
  </head>
  <body style="margin:0;padding:0;background:#f3f4f6;color:#111827;font-family:Arial,sans-serif;">
    <table role="presentation" width="100%" cellspacing="0" cellpadding="0" style="padding:24px 0;">
      <tr>
        <td align="center">
          <table role="presentation" width="640" cellspacing="0" cellpadding="0" style="width:640px;max-width:94%;background:#ffffff;border-radius:8px;">
            <tr>
              <td style="padding:20px 28px;border-bottom:1px solid #e5e7eb;font-size:18px;font-weight:700;">
                ${escapeHtml(content.storeName)}
              </td>
            </tr>
            <tr>
              <td style="padding:20px 28px 28px;">
                <h1 style="margin:0 0 16px;font-size:20px;">${escapeHtml(content.title)}</h1>
                ${renderBody(content.body)}
                ${content.tableHtml ?? ''}
                ${footerLine}
              </td>
            </tr>
          </table>
        </td>
      </tr>
    </table>
  </body>
</html>`;

  const text = [
    content.storeName,
    content.title,
    '',
    content.body,
    content.tableText ?? '',
    content.footerLine ?? '',
  ]
    .filter((value) => value !== '')
    .join('\n');

  return { subject: content.subject, text, html };
};

export const buildInvoiceEmail = (invoice: Invoice, storeName: string) => {
  const cell = 'padding:6px 8px;border-bottom:1px solid #e5e7eb;';
  const rows = invoice.items
    .map(
      (item) =>
        `<tr><td style="${cell}">${escapeHtml(item.name)}</td>` +
        `<td style="${cell}text-align:right;">${item.qty}</td>` +
        `<td style="${cell}text-align:right;">${formatAmount(item.mrp)}</td>` +
        `<td style="${cell}text-align:right;">${escapeHtml(describeDiscount(item.discount))}</td>` +
        `<td style="${cell}text-align:right;">${formatAmount(item.effectiveTotal)}</td></tr>`,
    )
    .join('');
  const tableHtml = `<table role="presentation" width="100%" cellspacing="0" cellpadding="0" style="border-collapse:collapse;font-size:14px;margin:8px 0 16px;">
  <tr><th align="left">Item</th><th align="right">Qty</th><th align="right">MRP</th><th align="right">Discount</th><th align="right">Total</th></tr>
  ${rows}
  <tr><td colspan="4" style="padding:8px;font-weight:700;text-align:right;">Grand total</td><td style="padding:8px;font-weight:700;text-align:right;">${formatAmount(invoice.totals.grandTotal)}</td></tr>
</table>`;
  const tableText = [
    ...invoice.items.map(
      (item) =>
        `${item.name} x${item.qty} @ ${formatAmount(item.mrp)} (${describeDiscount(item.discount)}) = ${formatAmount(item.effectiveTotal)}`,
    ),
    `Grand total: ${formatAmount(invoice.totals.grandTotal)}`,
  ].join('\n');

  return buildStoreEmail({
    subject: `Invoice ${invoice.invoiceNo} from ${storeName}`,
    title: `Invoice ${invoice.invoiceNo}`,
    body: `Hello ${invoice.customer.name},\nThank you for shopping with us. Your purchase is summarised below.`,
    storeName,
    tableHtml,
    tableText,
    footerLine: `Served by ${invoice.soldBy} on ${invoice.date.slice(0, 10)}.`,
  });
};
