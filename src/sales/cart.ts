import { NotFoundException } from '@nestjs/common';
import { OutOfStockError, ValidationError } from '../common/errors';
import { sumMoney } from '../common/money';
import {
  computeLine,
  DiscountType,
  isDiscountType,
  LinePrice,
  recomputeLine,
} from './pricing';

/** What the cart needs to know about a product at the moment it is added. */
export type CartProduct = {
  id: string;
  name: string;
  category: string;
  mrp: number;
  quantity: number;
};

export type CartLine = LinePrice & {
  lineId: number;
  productId: string;
  productName: string;
  category: string;
  quantity: number;
  unitMrp: number;
  discountType: DiscountType;
  discountValue: number;
};

/**
 * Lines of one in-progress sale. Every mutation validates first, so a
 * rejected call leaves the cart exactly as it was.
 */
export class Cart {
  private items: CartLine[] = [];
  private nextLineId = 1;

  get lines(): CartLine[] {
    return this.items.map((line) => ({ ...line }));
  }

  get isEmpty() {
    return this.items.length === 0;
  }

  add(
    product: CartProduct,
    quantity: number,
    discountType: DiscountType = 'Flat',
    discountValue = 0,
  ): CartLine {
    if (!isDiscountType(discountType)) {
      throw new ValidationError(
        'discountType',
        'discountType must be Flat or Percent.',
      );
    }
    const price = computeLine(
      quantity,
      product.mrp,
      discountType,
      discountValue,
    );
    const existing = this.items.find(
      (line) =>
        line.productId === product.id &&
        line.discountType === discountType &&
        line.discountValue === discountValue,
    );
    const merged = (existing?.quantity ?? 0) + quantity;
    if (merged > product.quantity) {
      throw new OutOfStockError(
        product.id,
        merged,
        product.quantity,
        product.name,
      );
    }

    if (existing) {
      const repriced = computeLine(
        merged,
        existing.unitMrp,
        discountType,
        discountValue,
      );
      Object.assign(existing, repriced, { quantity: merged });
      return { ...existing };
    }

    const line: CartLine = {
      lineId: this.nextLineId,
      productId: product.id,
      productName: product.name,
      category: product.category,
      quantity,
      unitMrp: product.mrp,
      discountType,
      discountValue,
      ...price,
    };
    this.nextLineId += 1;
    this.items.push(line);
    return { ...line };
  }

  /** Takes one unit off a line; returns null once the line is gone. */
  removeOne(lineId: number): CartLine | null {
    const index = this.items.findIndex((line) => line.lineId === lineId);
    if (index < 0) {
      throw new NotFoundException(`Cart line ${lineId} not found.`);
    }
    const line = this.items[index];
    if (line.quantity <= 1) {
      this.items.splice(index, 1);
      return null;
    }
    const quantity = line.quantity - 1;
    Object.assign(
      line,
      recomputeLine(quantity, line.unitMrp, line.discountType, line.discountValue),
      { quantity },
    );
    return { ...line };
  }

  clear() {
    this.items = [];
  }

  subtotal() {
    return sumMoney(this.items.map((line) => line.finalTotal));
  }
}
