import { NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Product } from '../catalog/product.entity';
import { OutOfStockError } from '../common/errors';
import {
  createInMemoryDataSource,
  seedProduct,
  seedSupplier,
} from '../database/testing';
import { StockLog } from './stock-log.entity';
import { StockService } from './stock.service';

describe('StockService', () => {
  let dataSource: DataSource;
  let service: StockService;

  beforeEach(async () => {
    dataSource = await createInMemoryDataSource();
    service = new StockService(dataSource);
    await seedSupplier(dataSource);
    await seedProduct(dataSource, { quantity: 5 });
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('credits and debits stock with a log entry each', async () => {
    await dataSource.transaction(async (manager) => {
      expect(
        await service.applyChange(manager, {
          productId: '001',
          delta: 4,
          reason: 'Restock',
          actor: 'admin',
        }),
      ).toBe(9);
      expect(
        await service.applyChange(manager, {
          productId: '001',
          delta: -9,
          reason: 'Sale #1',
          actor: 'cashier1',
        }),
      ).toBe(0);
    });

    const product = await dataSource.getRepository(Product).findOneByOrFail({ id: '001' });
    expect(product.quantity).toBe(0);
    const logs = await dataSource.getRepository(StockLog).find({ order: { id: 'ASC' } });
    expect(
      logs.map((log) => [log.changeType, log.quantity, log.reason, log.changedBy]),
    ).toEqual([
      ['IN', 4, 'Restock', 'admin'],
      ['OUT', 9, 'Sale #1', 'cashier1'],
    ]);
  });

  it('refuses a debit that would go negative', async () => {
    const attempt = dataSource.transaction((manager) =>
      service.applyChange(manager, {
        productId: '001',
        delta: -6,
        reason: 'Sale #1',
        actor: 'cashier1',
      }),
    );

    await expect(attempt).rejects.toBeInstanceOf(OutOfStockError);
    await expect(attempt).rejects.toMatchObject({ requested: 6, available: 5 });
    const product = await dataSource.getRepository(Product).findOneByOrFail({ id: '001' });
    expect(product.quantity).toBe(5);
    expect(await dataSource.getRepository(StockLog).count()).toBe(0);
  });

  it('writes no log for a zero change', async () => {
    await dataSource.transaction((manager) =>
      service.applyChange(manager, {
        productId: '001',
        delta: 0,
        reason: 'Product edit',
        actor: 'admin',
      }),
    );

    expect(await dataSource.getRepository(StockLog).count()).toBe(0);
  });

  it('rejects an unknown product', async () => {
    await expect(
      dataSource.transaction((manager) =>
        service.applyChange(manager, {
          productId: '404',
          delta: 1,
          reason: 'Restock',
          actor: 'admin',
        }),
      ),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('lists logs newest first with filters', async () => {
    await dataSource.transaction(async (manager) => {
      await service.applyChange(manager, { productId: '001', delta: 2, reason: 'Restock', actor: 'admin' });
      await service.applyChange(manager, { productId: '001', delta: -1, reason: 'Sale #1', actor: 'cashier1' });
      await service.applyChange(manager, { productId: '001', delta: 3, reason: 'Restock', actor: 'admin' });
    });

    const all = await service.listLogs({});
    expect(all.items.map((log) => log.quantity)).toEqual([3, 1, 2]);

    const outgoing = await service.listLogs({ type: 'OUT' });
    expect(outgoing.items.map((log) => log.reason)).toEqual(['Sale #1']);

    const byActor = await service.listLogs({ search: 'cashier' });
    expect(byActor.items).toHaveLength(1);

    const firstPage = await service.listLogs({ limit: '2' });
    expect(firstPage.items).toHaveLength(2);
    expect(firstPage.nextCursor).not.toBeNull();
  });
});
