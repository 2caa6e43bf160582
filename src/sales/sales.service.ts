import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  FindOptionsWhere,
  LessThan,
  Like,
} from 'typeorm';
import { Customer } from '../customers/customer.entity';
import { CustomersService } from '../customers/customers.service';
import { dateRangeOperator, parseDateRange } from '../common/date-range';
import { ValidationError } from '../common/errors';
import {
  buildPaginatedResponse,
  PaginationQuery,
  parsePagination,
} from '../common/pagination';
import { runInTransaction } from '../common/transactions';
import { StockService } from '../stock/stock.service';
import { Cart } from './cart';
import type { CustomerSelection } from './customer-selection';
import { buildInvoice, Invoice } from './invoice';
import { DeliveryStatus, InvoiceDeliveryService } from './invoice-delivery.service';
import { renderInvoicePdf } from './invoice-pdf';
import { SaleLine } from './sale-line.entity';
import { SaleReturn } from './sale-return.entity';
import { SaleView, toSaleView } from './sale-view';
import { Sale } from './sale.entity';

export type CheckoutResult = {
  sale: SaleView;
  invoice: Invoice;
  delivery: DeliveryStatus;
};

type Buyer = Pick<Customer, 'name' | 'phone' | 'email'> & {
  id: string | null;
};

const WALK_IN: Buyer = { id: null, name: 'Walk-in', phone: null, email: null };

@Injectable()
export class SalesService {
  private readonly logger = new Logger(SalesService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly stockService: StockService,
    private readonly customersService: CustomersService,
    private readonly invoiceDelivery: InvoiceDeliveryService,
  ) {}

  /**
   * Commits the cart as one sale. Header, lines, stock debits and their
   * log entries share a transaction; the invoice e-mail goes out after
   * commit and can only produce a warning.
   */
  async checkout(
    operator: string,
    cart: Cart,
    customer: CustomerSelection,
  ): Promise<CheckoutResult> {
    if (cart.isEmpty) {
      throw new ValidationError('cart', 'Cart is empty.');
    }
    const cartLines = cart.lines;
    const subtotal = cart.subtotal();

    const { buyer, sale, lines } = await runInTransaction(
      this.dataSource,
      'Checkout',
      this.logger,
      async (manager) => {
        const buyer = await this.resolveBuyer(customer, manager);
        const sale = await manager.save(
          manager.create(Sale, {
            soldAt: new Date(),
            soldBy: operator,
            customerId: buyer.id,
            customerName: buyer.name,
            customerPhone: buyer.phone,
            customerEmail: buyer.email,
            subtotal,
            grandTotal: subtotal,
          }),
        );
        const lines: SaleLine[] = [];
        for (const [index, line] of cartLines.entries()) {
          lines.push(
            await manager.save(
              manager.create(SaleLine, {
                saleId: sale.id,
                position: index + 1,
                productId: line.productId,
                productName: line.productName,
                category: line.category,
                quantity: line.quantity,
                mrp: line.unitMrp,
                lineTotal: line.lineTotal,
                discountType: line.discountType,
                discountValue: line.discountValue,
                discountAmount: line.discountAmount,
                effectiveTotal: line.finalTotal,
                refundedQuantity: 0,
              }),
            ),
          );
          await this.stockService.applyChange(manager, {
            productId: line.productId,
            delta: -line.quantity,
            reason: `Sale #${sale.id}`,
            actor: operator,
          });
        }
        return { buyer, sale, lines };
      },
    );

    this.logger.log(
      `Sale #${sale.id} committed by ${operator}: ${lines.length} line(s), total ${sale.grandTotal.toFixed(2)}.`,
    );
    const invoice = buildInvoice(sale, lines);
    const delivery = await this.invoiceDelivery.deliver(invoice, buyer.email);
    return { sale: toSaleView(sale, lines), invoice, delivery };
  }

  async list(
    query: PaginationQuery & {
      from?: string;
      to?: string;
      soldBy?: string;
      customer?: string;
    },
  ) {
    const pagination = parsePagination(query);
    const soldAt = dateRangeOperator(parseDateRange(query));
    const customer = query.customer?.trim();
    const where: FindOptionsWhere<Sale> = {
      ...(soldAt ? { soldAt } : {}),
      ...(query.soldBy ? { soldBy: query.soldBy } : {}),
      ...(customer ? { customerName: Like(`%${customer}%`) } : {}),
      ...(pagination.cursor
        ? { id: LessThan(Number(pagination.cursor)) }
        : {}),
    };
    const items = await this.dataSource.getRepository(Sale).find({
      where,
      order: { id: 'DESC' },
      take: pagination.take,
    });
    return buildPaginatedResponse(items, pagination.take);
  }

  async getSale(id: number) {
    const sale = await this.dataSource.getRepository(Sale).findOneBy({ id });
    if (!sale) {
      throw new NotFoundException(`Sale ${id} not found.`);
    }
    const lines = await this.dataSource.getRepository(SaleLine).find({
      where: { saleId: id },
      order: { position: 'ASC' },
    });
    return { sale, lines };
  }

  async getSaleDetail(id: number) {
    const { sale, lines } = await this.getSale(id);
    const returns = await this.dataSource.getRepository(SaleReturn).find({
      where: { saleId: id },
      order: { id: 'ASC' },
    });
    return { ...toSaleView(sale, lines), returns };
  }

  async getInvoice(id: number) {
    const { sale, lines } = await this.getSale(id);
    return buildInvoice(sale, lines);
  }

  async renderInvoicePdf(id: number) {
    const invoice = await this.getInvoice(id);
    return {
      invoice,
      pdf: await renderInvoicePdf(invoice, this.invoiceDelivery.store),
    };
  }

  /** A NEW customer is saved with the sale, so a failed checkout leaves no customer behind. */
  private async resolveBuyer(
    customer: CustomerSelection,
    manager: EntityManager,
  ): Promise<Buyer> {
    switch (customer.type) {
      case 'WALK_IN':
        return WALK_IN;
      case 'EXISTING':
        return this.customersService.getById(customer.customerId);
      case 'NEW':
        return this.customersService.create(
          {
            name: customer.name,
            phone: customer.phone,
            email: customer.email,
          },
          manager,
        );
    }
  }
}
