import type { DiscountType } from './pricing';
import type { SaleLine } from './sale-line.entity';
import type { Sale } from './sale.entity';

export type InvoiceItem = {
  productId: string;
  name: string;
  category: string;
  qty: number;
  mrp: number;
  lineTotal: number;
  discount: { type: DiscountType; value: number };
  effectiveTotal: number;
};

export type Invoice = {
  invoiceNo: string;
  saleId: number;
  date: string;
  soldBy: string;
  customer: { name: string; phone: string | null };
  items: InvoiceItem[];
  totals: { subtotal: number; grandTotal: number };
};

const pad = (value: number) => String(value).padStart(2, '0');

/** `<saleId>-<yyyyMMddHHmmss>` (UTC) from the moment of sale. */
export function invoiceNumber(saleId: number, soldAt: Date) {
  const stamp = [
    soldAt.getUTCFullYear(),
    pad(soldAt.getUTCMonth() + 1),
    pad(soldAt.getUTCDate()),
    pad(soldAt.getUTCHours()),
    pad(soldAt.getUTCMinutes()),
    pad(soldAt.getUTCSeconds()),
  ].join('');
  return `${saleId}-${stamp}`;
}

export function buildInvoice(sale: Sale, lines: SaleLine[]): Invoice {
  return {
    invoiceNo: invoiceNumber(sale.id, sale.soldAt),
    saleId: sale.id,
    date: sale.soldAt.toISOString(),
    soldBy: sale.soldBy,
    customer: { name: sale.customerName, phone: sale.customerPhone },
    items: [...lines]
      .sort((a, b) => a.position - b.position)
      .map((line) => ({
        productId: line.productId,
        name: line.productName,
        category: line.category,
        qty: line.quantity,
        mrp: line.mrp,
        lineTotal: line.lineTotal,
        discount: { type: line.discountType, value: line.discountValue },
        effectiveTotal: line.effectiveTotal,
      })),
    totals: { subtotal: sale.subtotal, grandTotal: sale.grandTotal },
  };
}

export const formatAmount = (value: number) => value.toFixed(2);

export const describeDiscount = (discount: InvoiceItem['discount']) => {
  if (!discount.value) {
    return '-';
  }
  return discount.type === 'Percent'
    ? `${discount.value}%`
    : formatAmount(discount.value);
};
