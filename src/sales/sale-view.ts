import type { SaleLine } from './sale-line.entity';
import type { Sale } from './sale.entity';

export type LineStatus = 'FULL' | 'PARTIALLY_REFUNDED' | 'FULLY_REFUNDED';

export type SaleLineView = SaleLine & {
  remainingQuantity: number;
  status: LineStatus;
};

export type SaleView = Omit<Sale, 'lines'> & { lines: SaleLineView[] };

export function lineStatus(line: Pick<SaleLine, 'quantity' | 'refundedQuantity'>): LineStatus {
  if (line.refundedQuantity <= 0) {
    return 'FULL';
  }
  return line.refundedQuantity >= line.quantity
    ? 'FULLY_REFUNDED'
    : 'PARTIALLY_REFUNDED';
}

export function toSaleView(sale: Sale, lines: SaleLine[]): SaleView {
  const { lines: _loaded, ...header } = sale;
  return {
    ...header,
    lines: [...lines]
      .sort((a, b) => a.position - b.position)
      .map((line) => ({
        ...line,
        remainingQuantity: line.quantity - line.refundedQuantity,
        status: lineStatus(line),
      })),
  };
}
