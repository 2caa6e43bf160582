import { Injectable } from '@nestjs/common';
import { DataSource, FindOptionsWhere, MoreThanOrEqual } from 'typeorm';
import { Product } from '../catalog/product.entity';
import { toCsv } from '../common/csv';
import {
  DateRangeQuery,
  dateRangeOperator,
  parseDateRange,
  toDateKey,
} from '../common/date-range';
import { ValidationError } from '../common/errors';
import { roundMoney, sumMoney } from '../common/money';
import { Customer } from '../customers/customer.entity';
import { Employee } from '../employees/employee.entity';
import { SaleLine } from '../sales/sale-line.entity';
import { SaleReturn } from '../sales/sale-return.entity';
import { Sale } from '../sales/sale.entity';
import { Supplier } from '../suppliers/supplier.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

const SALES_HISTORY_COLUMNS = [
  'saleId',
  'soldAt',
  'soldBy',
  'customerName',
  'productId',
  'productName',
  'category',
  'quantity',
  'refundedQuantity',
  'mrp',
  'discountType',
  'discountValue',
  'effectiveTotal',
] as const;

function parseCount(value: string | undefined, field: string, fallback: number) {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new ValidationError(field, `${field} must be a positive whole number.`);
  }
  return parsed;
}

@Injectable()
export class ReportsService {
  constructor(private readonly dataSource: DataSource) {}

  async dashboard(now = new Date()) {
    const startOfDay = new Date(`${toDateKey(now)}T00:00:00.000Z`);
    const [employees, products, suppliers, customers, todaysSales, lowStock] =
      await Promise.all([
        this.dataSource.getRepository(Employee).count(),
        this.dataSource.getRepository(Product).find(),
        this.dataSource.getRepository(Supplier).count(),
        this.dataSource.getRepository(Customer).count(),
        this.dataSource
          .getRepository(Sale)
          .find({ where: { soldAt: MoreThanOrEqual(startOfDay) } }),
        this.lowStock(),
      ]);
    return {
      employees,
      products: products.length,
      suppliers,
      customers,
      inventoryValue: sumMoney(
        products.map((product) => product.quantity * product.mrp),
      ),
      todaySales: sumMoney(todaysSales.map((sale) => sale.grandTotal)),
      todaySaleCount: todaysSales.length,
      lowStockCount: lowStock.length,
    };
  }

  /** Products whose on-hand quantity has dropped below their reorder level. */
  lowStock() {
    return this.dataSource
      .getRepository(Product)
      .createQueryBuilder('product')
      .where('product.quantity < product.reorderLevel')
      .orderBy('product.quantity', 'ASC')
      .addOrderBy('product.id', 'ASC')
      .getMany();
  }

  private async linesInRange(query: DateRangeQuery) {
    const soldAt = dateRangeOperator(parseDateRange(query));
    const where: FindOptionsWhere<SaleLine> = soldAt ? { sale: { soldAt } } : {};
    return this.dataSource.getRepository(SaleLine).find({
      where,
      relations: { sale: true },
      order: { saleId: 'DESC', position: 'ASC' },
    });
  }

  async salesHistory(query: DateRangeQuery) {
    const lines = await this.linesInRange(query);
    return lines.map((line) => ({
      saleId: line.saleId,
      soldAt: line.sale?.soldAt ?? null,
      soldBy: line.sale?.soldBy ?? '',
      customerName: line.sale?.customerName ?? '',
      productId: line.productId,
      productName: line.productName,
      category: line.category,
      quantity: line.quantity,
      refundedQuantity: line.refundedQuantity,
      mrp: line.mrp,
      discountType: line.discountType,
      discountValue: line.discountValue,
      effectiveTotal: line.effectiveTotal,
    }));
  }

  async salesHistoryCsv(query: DateRangeQuery) {
    return toCsv(SALES_HISTORY_COLUMNS, await this.salesHistory(query));
  }

  async topProducts(query: DateRangeQuery & { limit?: string }) {
    const limit = parseCount(query.limit, 'limit', 10);
    const lines = await this.linesInRange(query);
    const totals = new Map<
      string,
      { productId: string; productName: string; quantity: number; sales: number }
    >();
    for (const line of lines) {
      const entry = totals.get(line.productId) ?? {
        productId: line.productId,
        productName: line.productName,
        quantity: 0,
        sales: 0,
      };
      entry.quantity += line.quantity - line.refundedQuantity;
      entry.sales = roundMoney(entry.sales + line.effectiveTotal);
      totals.set(line.productId, entry);
    }
    return [...totals.values()]
      .sort(
        (a, b) => b.sales - a.sales || a.productId.localeCompare(b.productId),
      )
      .slice(0, limit);
  }

  /**
   * Revenue net of refunds against cost at the product's current cost price
   * for the units kept by customers.
   */
  async profitMargin(query: DateRangeQuery) {
    const lines = await this.linesInRange(query);
    const products = await this.dataSource.getRepository(Product).find();
    const costs = new Map(products.map((product) => [product.id, product.costPrice]));
    const rows = new Map<
      string,
      { productId: string; productName: string; units: number; sales: number; cogs: number }
    >();
    for (const line of lines) {
      const units = line.quantity - line.refundedQuantity;
      const row = rows.get(line.productId) ?? {
        productId: line.productId,
        productName: line.productName,
        units: 0,
        sales: 0,
        cogs: 0,
      };
      row.units += units;
      row.sales = roundMoney(row.sales + line.effectiveTotal);
      row.cogs = roundMoney(row.cogs + (costs.get(line.productId) ?? 0) * units);
      rows.set(line.productId, row);
    }
    const items = [...rows.values()]
      .sort((a, b) => a.productId.localeCompare(b.productId))
      .map((row) => {
        const profit = roundMoney(row.sales - row.cogs);
        return {
          ...row,
          profit,
          profitPercent: row.sales > 0 ? roundMoney((profit / row.sales) * 100) : 0,
        };
      });
    const sales = sumMoney(items.map((item) => item.sales));
    const cogs = sumMoney(items.map((item) => item.cogs));
    const profit = roundMoney(sales - cogs);
    return {
      items,
      totals: {
        sales,
        cogs,
        profit,
        profitPercent: sales > 0 ? roundMoney((profit / sales) * 100) : 0,
      },
    };
  }

  /** Grand totals per UTC day, oldest first, with empty days reported as 0. */
  async dailySales(query: { days?: string }, now = new Date()) {
    const days = parseCount(query.days, 'days', 14);
    const today = new Date(`${toDateKey(now)}T00:00:00.000Z`);
    const since = new Date(today.getTime() - (days - 1) * DAY_MS);
    const sales = await this.dataSource
      .getRepository(Sale)
      .find({ where: { soldAt: MoreThanOrEqual(since) } });
    const buckets = new Map<string, number>();
    for (let offset = 0; offset < days; offset += 1) {
      buckets.set(toDateKey(new Date(since.getTime() + offset * DAY_MS)), 0);
    }
    for (const sale of sales) {
      const key = toDateKey(sale.soldAt);
      const current = buckets.get(key);
      if (current !== undefined) {
        buckets.set(key, roundMoney(current + sale.grandTotal));
      }
    }
    return [...buckets.entries()].map(([date, total]) => ({ date, total }));
  }

  async returnHistory(query: DateRangeQuery) {
    const returnedAt = dateRangeOperator(parseDateRange(query));
    const items = await this.dataSource.getRepository(SaleReturn).find({
      where: returnedAt ? { returnedAt } : {},
      order: { id: 'DESC' },
    });
    return {
      items,
      refundTotal: sumMoney(items.map((item) => item.refundAmount)),
    };
  }
}
