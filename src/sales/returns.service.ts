import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DataSource,
  FindOptionsWhere,
  LessThan,
  MoreThanOrEqual,
} from 'typeorm';
import { dateRangeOperator, parseDateRange } from '../common/date-range';
import { OverRefundError, ValidationError } from '../common/errors';
import { roundMoney, sumMoney } from '../common/money';
import {
  buildPaginatedResponse,
  PaginationQuery,
  parsePagination,
} from '../common/pagination';
import { runInTransaction } from '../common/transactions';
import { requirePositiveInteger, requireText } from '../common/validation';
import { StockService } from '../stock/stock.service';
import { SaleLine } from './sale-line.entity';
import { SaleReturn } from './sale-return.entity';
import { SaleView, toSaleView } from './sale-view';
import { Sale } from './sale.entity';

export type ReturnEntryInput = {
  productId?: string;
  quantity?: number;
  reason?: string;
};

type ReturnRequest = {
  productId: string;
  quantity: number;
  reason: string;
};

export type RefundResult = {
  saleId: number;
  returns: SaleReturn[];
  refundTotal: number;
  sale: SaleView;
};

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class ReturnsService {
  private readonly logger = new Logger(ReturnsService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly stockService: StockService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Applies a batch of returns against one sale. Every entry is checked
   * before anything is written, so a rejected batch changes nothing.
   */
  async applyReturns(
    operator: string,
    saleId: number,
    entries: ReturnEntryInput[],
  ): Promise<RefundResult> {
    if (!Array.isArray(entries) || entries.length === 0) {
      throw new ValidationError('items', 'At least one item must be returned.');
    }
    const requests: ReturnRequest[] = entries.map((entry, index) => ({
      productId: requireText(entry.productId, `items[${index}].productId`),
      quantity: requirePositiveInteger(
        entry.quantity,
        `items[${index}].quantity`,
      ),
      reason: requireText(entry.reason, `items[${index}].reason`),
    }));

    const result = await runInTransaction(
      this.dataSource,
      'Return',
      this.logger,
      async (manager) => {
        const sale = await manager.findOneBy(Sale, { id: saleId });
        if (!sale) {
          throw new NotFoundException(`Sale ${saleId} not found.`);
        }
        const lines = await manager.find(SaleLine, {
          where: { saleId },
          order: { position: 'ASC' },
        });
        this.assertReturnable(saleId, lines, requests);

        const returnedAt = new Date();
        const returns: SaleReturn[] = [];
        for (const request of requests) {
          let outstanding = request.quantity;
          for (const line of lines) {
            const remaining = line.quantity - line.refundedQuantity;
            if (
              outstanding === 0 ||
              line.productId !== request.productId ||
              remaining <= 0
            ) {
              continue;
            }
            const quantity = Math.min(remaining, outstanding);
            // Priced per unit sold, against what the line is still worth.
            const refundAmount = roundMoney(
              (line.effectiveTotal / line.quantity) * quantity,
            );
            line.effectiveTotal = roundMoney(
              Math.max(line.effectiveTotal - refundAmount, 0),
            );
            line.refundedQuantity += quantity;
            sale.grandTotal = roundMoney(
              Math.max(sale.grandTotal - refundAmount, 0),
            );
            await manager.update(
              SaleLine,
              { id: line.id },
              {
                effectiveTotal: line.effectiveTotal,
                refundedQuantity: line.refundedQuantity,
              },
            );
            returns.push(
              await manager.save(
                manager.create(SaleReturn, {
                  saleId,
                  saleLineId: line.id,
                  productId: line.productId,
                  quantity,
                  refundAmount,
                  reason: request.reason,
                  processedBy: operator,
                  returnedAt,
                }),
              ),
            );
            await this.stockService.applyChange(manager, {
              productId: line.productId,
              delta: quantity,
              reason: `Return on sale #${saleId}: ${request.reason}`,
              actor: operator,
            });
            outstanding -= quantity;
          }
        }
        await manager.update(Sale, { id: saleId }, { grandTotal: sale.grandTotal });
        return { sale, lines, returns };
      },
    );

    const refundTotal = sumMoney(
      result.returns.map((entry) => entry.refundAmount),
    );
    this.logger.log(
      `Return on sale #${saleId} by ${operator}: ${result.returns.length} record(s), refund ${refundTotal.toFixed(2)}.`,
    );
    return {
      saleId,
      returns: result.returns,
      refundTotal,
      sale: toSaleView(result.sale, result.lines),
    };
  }

  /** Recent sales that still have unreturned units; a selection aid only. */
  async listReturnableSales(lookbackDays?: string) {
    const days = this.resolveLookbackDays(lookbackDays);
    const since = new Date(Date.now() - days * DAY_MS);
    const sales = await this.dataSource.getRepository(Sale).find({
      where: { soldAt: MoreThanOrEqual(since) },
      relations: { lines: true },
      order: { id: 'DESC' },
    });
    return sales
      .map((sale) => toSaleView(sale, sale.lines ?? []))
      .filter((sale) => sale.lines.some((line) => line.remainingQuantity > 0));
  }

  async listReturns(
    query: PaginationQuery & {
      saleId?: string;
      productId?: string;
      from?: string;
      to?: string;
    },
  ) {
    const pagination = parsePagination(query);
    const returnedAt = dateRangeOperator(parseDateRange(query));
    const where: FindOptionsWhere<SaleReturn> = {
      ...(query.saleId ? { saleId: Number(query.saleId) } : {}),
      ...(query.productId ? { productId: query.productId } : {}),
      ...(returnedAt ? { returnedAt } : {}),
      ...(pagination.cursor
        ? { id: LessThan(Number(pagination.cursor)) }
        : {}),
    };
    const items = await this.dataSource.getRepository(SaleReturn).find({
      where,
      order: { id: 'DESC' },
      take: pagination.take,
    });
    return buildPaginatedResponse(items, pagination.take);
  }

  private assertReturnable(
    saleId: number,
    lines: SaleLine[],
    requests: ReturnRequest[],
  ) {
    const requested = new Map<string, number>();
    requests.forEach((request, index) => {
      const productLines = lines.filter(
        (line) => line.productId === request.productId,
      );
      if (!productLines.length) {
        throw new ValidationError(
          `items[${index}].productId`,
          `Product ${request.productId} is not on sale ${saleId}.`,
        );
      }
      if (productLines.some((line) => line.quantity <= 0)) {
        throw new ValidationError(
          `items[${index}].productId`,
          `Sale ${saleId} has a line for ${request.productId} with no units sold.`,
        );
      }
      const sold = productLines.reduce((total, line) => total + line.quantity, 0);
      const alreadyRefunded = productLines.reduce(
        (total, line) => total + line.refundedQuantity,
        0,
      );
      const total = (requested.get(request.productId) ?? 0) + request.quantity;
      if (alreadyRefunded + total > sold) {
        throw new OverRefundError(
          request.productId,
          sold,
          alreadyRefunded,
          total,
        );
      }
      requested.set(request.productId, total);
    });
  }

  private resolveLookbackDays(value?: string) {
    const raw =
      value ?? this.configService.get<string>('returns.lookbackDays') ?? '10';
    const days = parseInt(raw, 10);
    if (Number.isNaN(days) || days < 0) {
      throw new ValidationError('days', 'days must be a whole number >= 0.');
    }
    return days;
  }
}
