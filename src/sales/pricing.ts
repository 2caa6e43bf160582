import { ValidationError } from '../common/errors';
import { clamp, roundMoney } from '../common/money';

export const DISCOUNT_TYPES = ['Flat', 'Percent'] as const;
export type DiscountType = (typeof DISCOUNT_TYPES)[number];

export const MAX_PERCENT_DISCOUNT = 90;
export const MAX_GST_PERCENT = 40;

export type LinePrice = {
  lineTotal: number;
  discountAmount: number;
  finalTotal: number;
};

export const isDiscountType = (value: unknown): value is DiscountType =>
  typeof value === 'string' &&
  DISCOUNT_TYPES.some((type) => type === value);

export function computeMrp(unitPrice: number, gst: number) {
  return roundMoney(unitPrice * (1 + clamp(gst, 0, MAX_GST_PERCENT) / 100));
}

function assertLineInputs(
  quantity: number,
  unitMrp: number,
  discountType: unknown,
  discountValue: number,
): asserts discountType is DiscountType {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new ValidationError(
      'quantity',
      'quantity must be a positive whole number.',
    );
  }
  if (!Number.isFinite(unitMrp) || unitMrp < 0) {
    throw new ValidationError('mrp', 'mrp must be a number >= 0.');
  }
  if (!isDiscountType(discountType)) {
    throw new ValidationError(
      'discountType',
      'discountType must be Flat or Percent.',
    );
  }
  if (!Number.isFinite(discountValue) || discountValue < 0) {
    throw new ValidationError(
      'discountValue',
      'discountValue must be a number >= 0.',
    );
  }
}

/**
 * Prices one line. A Flat discount above the line subtotal or a Percent
 * discount above 90 is rejected.
 */
export function computeLine(
  quantity: number,
  unitMrp: number,
  discountType: DiscountType,
  discountValue: number,
): LinePrice {
  assertLineInputs(quantity, unitMrp, discountType, discountValue);
  const lineTotal = roundMoney(quantity * unitMrp);
  let discountAmount: number;
  if (discountType === 'Percent') {
    if (discountValue > MAX_PERCENT_DISCOUNT) {
      throw new ValidationError(
        'discountValue',
        `Percent discount must be between 0 and ${MAX_PERCENT_DISCOUNT}.`,
      );
    }
    discountAmount = roundMoney((lineTotal * discountValue) / 100);
  } else {
    if (discountValue > lineTotal) {
      throw new ValidationError(
        'discountValue',
        `Flat discount ${discountValue} exceeds line subtotal ${lineTotal}.`,
      );
    }
    discountAmount = roundMoney(discountValue);
  }
  return {
    lineTotal,
    discountAmount,
    finalTotal: roundMoney(Math.max(lineTotal - discountAmount, 0)),
  };
}

/** Re-prices a line whose quantity shrank; Flat discounts are capped at the new subtotal. */
export function recomputeLine(
  quantity: number,
  unitMrp: number,
  discountType: DiscountType,
  discountValue: number,
): LinePrice {
  if (discountType === 'Flat') {
    const subtotal = roundMoney(quantity * unitMrp);
    return computeLine(
      quantity,
      unitMrp,
      discountType,
      Math.min(discountValue, subtotal),
    );
  }
  return computeLine(quantity, unitMrp, discountType, discountValue);
}
