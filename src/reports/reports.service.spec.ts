import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { Product } from '../catalog/product.entity';
import { ValidationError } from '../common/errors';
import { CustomersService } from '../customers/customers.service';
import {
  createInMemoryDataSource,
  seedProduct,
  seedSupplier,
} from '../database/testing';
import { MailerService } from '../mailer/mailer.service';
import { Cart } from '../sales/cart';
import { InvoiceDeliveryService } from '../sales/invoice-delivery.service';
import { ReturnsService } from '../sales/returns.service';
import { Sale } from '../sales/sale.entity';
import { SalesService } from '../sales/sales.service';
import { StockService } from '../stock/stock.service';
import { ReportsService } from './reports.service';

describe('ReportsService', () => {
  let dataSource: DataSource;
  let sales: SalesService;
  let returns: ReturnsService;
  let service: ReportsService;

  beforeEach(async () => {
    dataSource = await createInMemoryDataSource();
    const config = new ConfigService({});
    const stock = new StockService(dataSource);
    sales = new SalesService(
      dataSource,
      stock,
      new CustomersService(dataSource),
      new InvoiceDeliveryService(new MailerService(config), config),
    );
    returns = new ReturnsService(dataSource, stock, config);
    service = new ReportsService(dataSource);
    await seedSupplier(dataSource);
    await seedProduct(dataSource);
    await seedProduct(dataSource, {
      id: '002',
      name: 'Sunflower Oil 1L',
      quantity: 4,
      costPrice: 120,
      unitPrice: 150,
      gst: 0,
      mrp: 150,
      reorderLevel: 5,
    });

    const products = await dataSource.getRepository(Product).find({ order: { id: 'ASC' } });
    const cart = new Cart();
    cart.add(products[0], 3, 'Percent', 10);
    cart.add(products[1], 2);
    const { sale } = await sales.checkout('cashier1', cart, { type: 'WALK_IN' });
    await returns.applyReturns('cashier1', sale.id, [
      { productId: '001', quantity: 1, reason: 'Damaged' },
    ]);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('summarises the store on the dashboard', async () => {
    const dashboard = await service.dashboard();

    expect(dashboard).toEqual({
      employees: 0,
      products: 2,
      suppliers: 1,
      customers: 0,
      inventoryValue: 8 * 118 + 2 * 150,
      todaySales: 512.4,
      todaySaleCount: 1,
      lowStockCount: 1,
    });
  });

  it('reports products below their reorder level', async () => {
    const low = await service.lowStock();

    expect(low.map((product) => [product.id, product.quantity])).toEqual([['002', 2]]);
  });

  it('ranks products by sales net of refunds', async () => {
    const top = await service.topProducts({});

    expect(top).toEqual([
      { productId: '002', productName: 'Sunflower Oil 1L', quantity: 2, sales: 300 },
      { productId: '001', productName: 'Basmati Rice 1kg', quantity: 2, sales: 212.4 },
    ]);
  });

  it('computes profit against current cost price', async () => {
    const margin = await service.profitMargin({});

    expect(margin.items).toEqual([
      { productId: '001', productName: 'Basmati Rice 1kg', units: 2, sales: 212.4, cogs: 160, profit: 52.4, profitPercent: 24.67 },
      { productId: '002', productName: 'Sunflower Oil 1L', units: 2, sales: 300, cogs: 240, profit: 60, profitPercent: 20 },
    ]);
    expect(margin.totals).toEqual({ sales: 512.4, cogs: 400, profit: 112.4, profitPercent: 21.94 });
  });

  it('zero-fills days without sales', async () => {
    const now = new Date();
    const earlier = new Date(now.getTime() - 2 * 24 * 60 * 60 * 1000);
    await dataSource.getRepository(Sale).save({
      soldAt: earlier,
      soldBy: 'cashier1',
      customerId: null,
      customerName: 'Walk-in',
      customerPhone: null,
      customerEmail: null,
      subtotal: 50,
      grandTotal: 50,
    });

    const daily = await service.dailySales({ days: '3' }, now);

    expect(daily.map((day) => day.total)).toEqual([50, 0, 512.4]);
    await expect(service.dailySales({ days: '0' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('writes the sales history as CSV', async () => {
    const csv = await service.salesHistoryCsv({});
    const [header, first] = csv.split('\n');

    expect(header).toBe(
      'saleId,soldAt,soldBy,customerName,productId,productName,category,quantity,refundedQuantity,mrp,discountType,discountValue,effectiveTotal',
    );
    expect(first.split(',').slice(2)).toEqual([
      'cashier1',
      'Walk-in',
      '001',
      'Basmati Rice 1kg',
      'Grocery',
      '3',
      '1',
      '118',
      'Percent',
      '10',
      '212.4',
    ]);
  });

  it('totals refunds in the return history', async () => {
    const history = await service.returnHistory({});

    expect(history.items).toHaveLength(1);
    expect(history.refundTotal).toBe(106.2);
  });
});
