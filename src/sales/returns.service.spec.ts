import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { Product } from '../catalog/product.entity';
import { OverRefundError, ValidationError } from '../common/errors';
import { CustomersService } from '../customers/customers.service';
import {
  createInMemoryDataSource,
  seedProduct,
  seedSupplier,
} from '../database/testing';
import { MailerService } from '../mailer/mailer.service';
import { StockLog } from '../stock/stock-log.entity';
import { StockService } from '../stock/stock.service';
import { Cart } from './cart';
import { InvoiceDeliveryService } from './invoice-delivery.service';
import type { DiscountType } from './pricing';
import { ReturnsService } from './returns.service';
import { SaleReturn } from './sale-return.entity';
import { SalesService } from './sales.service';

type CartEntry = {
  quantity: number;
  discountType?: DiscountType;
  discountValue?: number;
};

describe('ReturnsService', () => {
  let dataSource: DataSource;
  let sales: SalesService;
  let service: ReturnsService;

  const quantityOnHand = async () =>
    (await dataSource.getRepository(Product).findOneByOrFail({ id: '001' }))
      .quantity;

  const sell = async (...entries: CartEntry[]) => {
    const product = await dataSource
      .getRepository(Product)
      .findOneByOrFail({ id: '001' });
    const cart = new Cart();
    for (const entry of entries) {
      cart.add(
        product,
        entry.quantity,
        entry.discountType ?? 'Flat',
        entry.discountValue ?? 0,
      );
    }
    const { sale } = await sales.checkout('cashier1', cart, { type: 'WALK_IN' });
    return sale;
  };

  beforeEach(async () => {
    dataSource = await createInMemoryDataSource();
    const config = new ConfigService({ returns: { lookbackDays: '10' } });
    const stock = new StockService(dataSource);
    sales = new SalesService(
      dataSource,
      stock,
      new CustomersService(dataSource),
      new InvoiceDeliveryService(new MailerService(config), config),
    );
    service = new ReturnsService(dataSource, stock, config);
    await seedSupplier(dataSource);
    await seedProduct(dataSource);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('refunds at the discounted unit price and restocks', async () => {
    const sale = await sell({ quantity: 3, discountType: 'Percent', discountValue: 10 });

    const result = await service.applyReturns('cashier2', sale.id, [
      { productId: '001', quantity: 1, reason: 'Damaged' },
    ]);

    expect(result.refundTotal).toBe(106.2);
    expect(result.sale.grandTotal).toBe(212.4);
    expect(result.sale.lines[0]).toMatchObject({
      effectiveTotal: 212.4,
      refundedQuantity: 1,
      remainingQuantity: 2,
      status: 'PARTIALLY_REFUNDED',
    });
    expect(result.returns).toHaveLength(1);
    expect(result.returns[0]).toMatchObject({
      saleId: sale.id,
      saleLineId: sale.lines[0].id,
      productId: '001',
      quantity: 1,
      refundAmount: 106.2,
      reason: 'Damaged',
      processedBy: 'cashier2',
    });
    expect(await quantityOnHand()).toBe(8);

    const logs = await dataSource.getRepository(StockLog).find({ order: { id: 'ASC' } });
    expect(logs.map((log) => `${log.changeType}:${log.quantity}`)).toEqual([
      'OUT:3',
      'IN:1',
    ]);
    expect(logs[1].reason).toBe(`Return on sale #${sale.id}: Damaged`);
  });

  it('rejects a refund beyond what is left and changes nothing', async () => {
    const sale = await sell({ quantity: 3, discountType: 'Percent', discountValue: 10 });
    await service.applyReturns('cashier2', sale.id, [
      { productId: '001', quantity: 1, reason: 'Damaged' },
    ]);

    const attempt = service.applyReturns('cashier2', sale.id, [
      { productId: '001', quantity: 3, reason: 'Changed mind' },
    ]);

    await expect(attempt).rejects.toBeInstanceOf(OverRefundError);
    await expect(attempt).rejects.toMatchObject({
      response: {
        errorCode: 'OVER_REFUND',
        details: { productId: '001', sold: 3, alreadyRefunded: 1, requested: 3 },
      },
    });
    expect(await dataSource.getRepository(SaleReturn).count()).toBe(1);
    expect(await quantityOnHand()).toBe(8);
  });

  it('counts repeated entries for one product together', async () => {
    const sale = await sell({ quantity: 3 });

    await expect(
      service.applyReturns('cashier2', sale.id, [
        { productId: '001', quantity: 1, reason: 'Damaged' },
        { productId: '001', quantity: 3, reason: 'Damaged' },
      ]),
    ).rejects.toBeInstanceOf(OverRefundError);

    expect(await dataSource.getRepository(SaleReturn).count()).toBe(0);
    expect(await quantityOnHand()).toBe(7);
  });

  it('prices each later return against the reduced line total', async () => {
    const sale = await sell({ quantity: 3, discountType: 'Percent', discountValue: 10 });

    const first = await service.applyReturns('cashier2', sale.id, [
      { productId: '001', quantity: 1, reason: 'Damaged' },
    ]);
    const second = await service.applyReturns('cashier2', sale.id, [
      { productId: '001', quantity: 1, reason: 'Damaged' },
    ]);

    expect(first.refundTotal).toBe(106.2);
    expect(second.refundTotal).toBe(70.8);
    expect(second.sale.grandTotal).toBe(141.6);
    expect(second.sale.lines[0]).toMatchObject({
      effectiveTotal: 141.6,
      refundedQuantity: 2,
      status: 'PARTIALLY_REFUNDED',
    });
  });

  it('marks a line fully refunded once every unit is back', async () => {
    const sale = await sell({ quantity: 3, discountType: 'Flat', discountValue: 50 });
    expect(sale.grandTotal).toBe(304);

    const first = await service.applyReturns('cashier2', sale.id, [
      { productId: '001', quantity: 1, reason: 'Damaged' },
    ]);
    expect(first.refundTotal).toBe(101.33);

    const second = await service.applyReturns('cashier2', sale.id, [
      { productId: '001', quantity: 2, reason: 'Damaged' },
    ]);
    expect(second.refundTotal).toBe(135.11);
    expect(second.sale.grandTotal).toBe(67.56);
    expect(second.sale.lines[0]).toMatchObject({
      effectiveTotal: 67.56,
      refundedQuantity: 3,
      status: 'FULLY_REFUNDED',
    });
    expect(await quantityOnHand()).toBe(10);
  });

  it('allocates a return across lines of the same product in order', async () => {
    const sale = await sell(
      { quantity: 2 },
      { quantity: 1, discountType: 'Percent', discountValue: 10 },
    );
    expect(sale.grandTotal).toBe(342.2);

    const result = await service.applyReturns('cashier2', sale.id, [
      { productId: '001', quantity: 2, reason: 'Wrong item' },
    ]);

    expect(result.refundTotal).toBe(236);
    expect(result.sale.grandTotal).toBe(106.2);
    expect(result.sale.lines.map((line) => line.status)).toEqual([
      'FULLY_REFUNDED',
      'FULL',
    ]);
  });

  it('validates the request before touching the sale', async () => {
    const sale = await sell({ quantity: 1 });

    await expect(service.applyReturns('cashier2', sale.id, [])).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(
      service.applyReturns('cashier2', sale.id, [
        { productId: '001', quantity: 1, reason: '  ' },
      ]),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      service.applyReturns('cashier2', sale.id, [
        { productId: '999', quantity: 1, reason: 'Damaged' },
      ]),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      service.applyReturns('cashier2', 404, [
        { productId: '001', quantity: 1, reason: 'Damaged' },
      ]),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('lists only recent sales with units left to return', async () => {
    const open = await sell({ quantity: 2 });
    const settled = await sell({ quantity: 1 });
    await service.applyReturns('cashier2', settled.id, [
      { productId: '001', quantity: 1, reason: 'Damaged' },
    ]);

    const returnable = await service.listReturnableSales();

    expect(returnable.map((sale) => sale.id)).toEqual([open.id]);
    await expect(service.listReturnableSales('-1')).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});
