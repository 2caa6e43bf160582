import { NotFoundException } from '@nestjs/common';
import { OutOfStockError, ValidationError } from '../common/errors';
import { Cart, CartProduct } from './cart';

const product = (overrides: Partial<CartProduct> = {}): CartProduct => ({
  id: '001',
  name: 'Basmati Rice 1kg',
  category: 'Grocery',
  mrp: 118,
  quantity: 10,
  ...overrides,
});

describe('Cart', () => {
  it('prices a new line through the pricing engine', () => {
    const cart = new Cart();
    const line = cart.add(product(), 3, 'Percent', 10);

    expect(line).toMatchObject({
      lineId: 1,
      productId: '001',
      quantity: 3,
      lineTotal: 354,
      discountAmount: 35.4,
      finalTotal: 318.6,
    });
    expect(cart.subtotal()).toBe(318.6);
  });

  it('merges lines with the same product and discount', () => {
    const cart = new Cart();
    cart.add(product(), 2, 'Percent', 10);
    const merged = cart.add(product(), 1, 'Percent', 10);

    expect(cart.lines).toHaveLength(1);
    expect(merged.quantity).toBe(3);
    expect(merged.finalTotal).toBe(318.6);
  });

  it('keeps lines with different discounts apart', () => {
    const cart = new Cart();
    cart.add(product(), 1, 'Percent', 10);
    cart.add(product(), 1, 'Flat', 0);

    expect(cart.lines.map((line) => line.lineId)).toEqual([1, 2]);
    expect(cart.subtotal()).toBe(224.2);
  });

  it('rejects a merged quantity above stock and leaves the cart unchanged', () => {
    const cart = new Cart();
    cart.add(product({ quantity: 4 }), 3);

    expect(() => cart.add(product({ quantity: 4 }), 2)).toThrow(
      OutOfStockError,
    );
    expect(() => cart.add(product({ quantity: 4 }), 2)).toThrow(
      'Not enough stock for Basmati Rice 1kg (001): requested 5, available 4.',
    );
    expect(cart.lines).toHaveLength(1);
    expect(cart.lines[0].quantity).toBe(3);
  });

  it('rejects a flat discount above the subtotal before mutating', () => {
    const cart = new Cart();

    expect(() => cart.add(product({ mrp: 400 }), 1, 'Flat', 500)).toThrow(
      ValidationError,
    );
    expect(cart.isEmpty).toBe(true);
    expect(cart.subtotal()).toBe(0);
  });

  it('removes one unit and re-prices the line', () => {
    const cart = new Cart();
    cart.add(product(), 3, 'Percent', 10);

    const line = cart.removeOne(1);

    expect(line?.quantity).toBe(2);
    expect(line?.finalTotal).toBe(212.4);
    expect(cart.subtotal()).toBe(212.4);
  });

  it('caps a flat discount when a line shrinks', () => {
    const cart = new Cart();
    cart.add(product({ mrp: 100 }), 2, 'Flat', 150);

    expect(cart.removeOne(1)).toMatchObject({
      quantity: 1,
      discountAmount: 100,
      finalTotal: 0,
    });
  });

  it('drops the line when its last unit is removed', () => {
    const cart = new Cart();
    cart.add(product(), 1);

    expect(cart.removeOne(1)).toBeNull();
    expect(cart.isEmpty).toBe(true);
  });

  it('fails on unknown lines', () => {
    expect(() => new Cart().removeOne(9)).toThrow(NotFoundException);
  });

  it('clears every line', () => {
    const cart = new Cart();
    cart.add(product(), 1);
    cart.add(product({ id: '002', name: 'Sugar 1kg' }), 1);
    cart.clear();

    expect(cart.lines).toEqual([]);
  });
});
