import { Injectable } from '@nestjs/common';
import { CatalogService } from '../catalog/catalog.service';
import { ValidationError } from '../common/errors';
import { requirePositiveInteger, requireText } from '../common/validation';
import { Cart, CartLine } from './cart';
import type { CustomerSelection } from './customer-selection';
import { isDiscountType } from './pricing';
import { SalesService } from './sales.service';

export type CartView = {
  operator: string;
  lines: CartLine[];
  subtotal: number;
  grandTotal: number;
};

export type AddLineInput = {
  productId?: string;
  quantity?: number;
  discountType?: string;
  discountValue?: number;
};

/** One in-memory cart per operator; nothing here is persisted. */
@Injectable()
export class CartsService {
  private readonly carts = new Map<string, Cart>();

  constructor(
    private readonly catalogService: CatalogService,
    private readonly salesService: SalesService,
  ) {}

  cartFor(operator: string) {
    let cart = this.carts.get(operator);
    if (!cart) {
      cart = new Cart();
      this.carts.set(operator, cart);
    }
    return cart;
  }

  view(operator: string): CartView {
    const cart = this.cartFor(operator);
    const subtotal = cart.subtotal();
    return { operator, lines: cart.lines, subtotal, grandTotal: subtotal };
  }

  async addLine(operator: string, input: AddLineInput) {
    const productId = requireText(input.productId, 'productId');
    const quantity = requirePositiveInteger(input.quantity, 'quantity');
    const discountType = input.discountType ?? 'Flat';
    if (!isDiscountType(discountType)) {
      throw new ValidationError(
        'discountType',
        'discountType must be Flat or Percent.',
      );
    }
    const discountValue = Number(input.discountValue ?? 0);
    const product = await this.catalogService.getProduct(productId);
    this.cartFor(operator).add(product, quantity, discountType, discountValue);
    return this.view(operator);
  }

  /** A scan adds one undiscounted unit. */
  async addScanned(operator: string, code?: string) {
    const product = await this.catalogService.resolveScannedCode(code ?? '');
    this.cartFor(operator).add(product, 1, 'Flat', 0);
    return this.view(operator);
  }

  removeOne(operator: string, lineId: number) {
    this.cartFor(operator).removeOne(lineId);
    return this.view(operator);
  }

  clear(operator: string) {
    this.cartFor(operator).clear();
    return this.view(operator);
  }

  /** The cart is only emptied once the sale has committed. */
  async checkout(operator: string, customer: CustomerSelection) {
    const cart = this.cartFor(operator);
    const result = await this.salesService.checkout(operator, cart, customer);
    cart.clear();
    return result;
  }
}
