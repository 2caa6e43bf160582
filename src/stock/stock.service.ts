import { Injectable, NotFoundException } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  FindOptionsWhere,
  LessThan,
  Like,
} from 'typeorm';
import { Product } from '../catalog/product.entity';
import { dateRangeOperator, parseDateRange } from '../common/date-range';
import { OutOfStockError } from '../common/errors';
import {
  buildPaginatedResponse,
  PaginationQuery,
  parsePagination,
} from '../common/pagination';
import { StockChangeType, StockLog } from './stock-log.entity';

export type StockChange = {
  productId: string;
  delta: number;
  reason: string;
  actor: string;
};

@Injectable()
export class StockService {
  constructor(private readonly dataSource: DataSource) {}

  /**
   * Moves a product's on-hand quantity by `delta` and appends the matching
   * log entry. Debits only apply while `quantity >= |delta|`; a debit that
   * would go negative raises OutOfStockError and changes nothing.
   */
  async applyChange(manager: EntityManager, change: StockChange) {
    const product = await manager.findOneBy(Product, { id: change.productId });
    if (!product) {
      throw new NotFoundException(`Product ${change.productId} not found.`);
    }
    if (change.delta === 0) {
      return product.quantity;
    }

    const update = manager
      .createQueryBuilder()
      .update(Product)
      .set({ quantity: () => '"quantity" + :delta' })
      .where('id = :id', { id: change.productId, delta: change.delta });
    if (change.delta < 0) {
      update.andWhere('"quantity" >= :required', { required: -change.delta });
    }
    const result = await update.execute();
    if (!result.affected) {
      const current = await manager.findOneBy(Product, {
        id: change.productId,
      });
      throw new OutOfStockError(
        change.productId,
        -change.delta,
        current?.quantity ?? 0,
        product.name,
      );
    }

    await this.record(manager, {
      productId: product.id,
      productName: product.name,
      changeType: change.delta > 0 ? 'IN' : 'OUT',
      quantity: Math.abs(change.delta),
      reason: change.reason,
      changedBy: change.actor,
    });
    return product.quantity + change.delta;
  }

  record(
    manager: EntityManager,
    entry: {
      productId: string;
      productName: string;
      changeType: StockChangeType;
      quantity: number;
      reason: string;
      changedBy: string;
    },
  ) {
    return manager.save(manager.create(StockLog, entry));
  }

  async listLogs(
    query: PaginationQuery & {
      productId?: string;
      type?: string;
      search?: string;
      from?: string;
      to?: string;
    },
  ) {
    const pagination = parsePagination(query);
    const search = query.search?.trim();
    const loggedAt = dateRangeOperator(parseDateRange(query));
    const changeType =
      query.type === 'IN' || query.type === 'OUT' ? query.type : undefined;
    const base: FindOptionsWhere<StockLog> = {
      ...(query.productId ? { productId: query.productId } : {}),
      ...(changeType ? { changeType } : {}),
      ...(loggedAt ? { loggedAt } : {}),
      ...(pagination.cursor
        ? { id: LessThan(Number(pagination.cursor)) }
        : {}),
    };
    const where = search
      ? [
          { ...base, productName: Like(`%${search}%`) },
          { ...base, changedBy: Like(`%${search}%`) },
          { ...base, reason: Like(`%${search}%`) },
        ]
      : base;
    const items = await this.dataSource.getRepository(StockLog).find({
      where,
      order: { id: 'DESC' },
      take: pagination.take,
    });
    return buildPaginatedResponse(items, pagination.take);
  }
}
