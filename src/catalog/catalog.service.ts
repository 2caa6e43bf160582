import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  FindOptionsWhere,
  Like,
  MoreThan,
} from 'typeorm';
import { toCsv } from '../common/csv';
import { DuplicateError, ValidationError } from '../common/errors';
import { nextPaddedId } from '../common/identifiers';
import { clamp } from '../common/money';
import {
  buildPaginatedResponse,
  PaginationQuery,
  parsePagination,
} from '../common/pagination';
import { runInTransaction } from '../common/transactions';
import {
  optionalText,
  requireNonNegativeInteger,
  requireNonNegativeNumber,
  requireText,
} from '../common/validation';
import { computeMrp, MAX_GST_PERCENT } from '../sales/pricing';
import { SaleLine } from '../sales/sale-line.entity';
import { StockService } from '../stock/stock.service';
import { Supplier } from '../suppliers/supplier.entity';
import { Product } from './product.entity';
import { parseScannedCode } from './scanned-code';

export type ProductInput = {
  id?: string;
  name?: string;
  category?: string;
  supplierId?: string;
  quantity?: number;
  costPrice?: number;
  unitPrice?: number;
  gst?: number;
  reorderLevel?: number;
};

@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly stockService: StockService,
  ) {}

  private get products() {
    return this.dataSource.getRepository(Product);
  }

  private transaction<T>(
    operation: string,
    work: (manager: EntityManager) => Promise<T>,
  ) {
    return runInTransaction(this.dataSource, operation, this.logger, work);
  }

  async listProducts(
    query: PaginationQuery & {
      search?: string;
      category?: string;
      supplierId?: string;
    },
  ) {
    const pagination = parsePagination(query);
    const search = query.search?.trim();
    const base: FindOptionsWhere<Product> = {
      ...(query.category ? { category: query.category } : {}),
      ...(query.supplierId ? { supplierId: query.supplierId } : {}),
      ...(pagination.cursor ? { id: MoreThan(pagination.cursor) } : {}),
    };
    const where = search
      ? [
          { ...base, id: Like(`%${search}%`) },
          { ...base, name: Like(`%${search}%`) },
          { ...base, category: Like(`%${search}%`) },
        ]
      : base;
    const items = await this.products.find({
      where,
      order: { id: 'ASC' },
      take: pagination.take,
    });
    return buildPaginatedResponse(items, pagination.take);
  }

  async getProduct(id: string, manager?: EntityManager) {
    const repository = manager?.getRepository(Product) ?? this.products;
    const product = await repository.findOneBy({ id });
    if (!product) {
      throw new NotFoundException(`Product ${id} not found.`);
    }
    return product;
  }

  async resolveScannedCode(code: string) {
    const id = parseScannedCode(code);
    if (!id) {
      throw new ValidationError('code', 'code is required.');
    }
    const product = await this.products.findOneBy({ id });
    if (!product) {
      throw new NotFoundException(`No product matches scanned code "${id}".`);
    }
    return product;
  }

  async createProduct(data: ProductInput, actor: string) {
    const requestedId = optionalText(data.id);
    const values = {
      name: requireText(data.name, 'name'),
      category: requireText(data.category, 'category'),
      supplierId: requireText(data.supplierId, 'supplierId'),
      quantity: requireNonNegativeInteger(data.quantity ?? 0, 'quantity'),
      costPrice: requireNonNegativeNumber(data.costPrice ?? 0, 'costPrice'),
      unitPrice: requireNonNegativeNumber(data.unitPrice ?? 0, 'unitPrice'),
      gst: clamp(requireNonNegativeNumber(data.gst ?? 0, 'gst'), 0, MAX_GST_PERCENT),
      reorderLevel: requireNonNegativeInteger(
        data.reorderLevel ?? 0,
        'reorderLevel',
      ),
    };
    await this.ensureSupplier(values.supplierId);

    return this.transaction('Create product', async (manager) => {
      const id =
        requestedId ?? (await nextPaddedId(manager.getRepository(Product)));
      if (await manager.existsBy(Product, { id })) {
        throw new DuplicateError('id', id);
      }
      const product = await manager.save(
        manager.create(Product, {
          id,
          ...values,
          mrp: computeMrp(values.unitPrice, values.gst),
        }),
      );
      if (product.quantity > 0) {
        await this.stockService.record(manager, {
          productId: product.id,
          productName: product.name,
          changeType: 'IN',
          quantity: product.quantity,
          reason: 'Opening stock',
          changedBy: actor,
        });
      }
      return product;
    });
  }

  /**
   * Field edits plus an optional new on-hand quantity; the quantity moves
   * through the stock ledger like any other change.
   */
  async updateProduct(id: string, data: ProductInput, actor: string) {
    const patch: Partial<Product> = {};
    if (data.name !== undefined) {
      patch.name = requireText(data.name, 'name');
    }
    if (data.category !== undefined) {
      patch.category = requireText(data.category, 'category');
    }
    if (data.supplierId !== undefined) {
      patch.supplierId = requireText(data.supplierId, 'supplierId');
      await this.ensureSupplier(patch.supplierId);
    }
    if (data.costPrice !== undefined) {
      patch.costPrice = requireNonNegativeNumber(data.costPrice, 'costPrice');
    }
    if (data.unitPrice !== undefined) {
      patch.unitPrice = requireNonNegativeNumber(data.unitPrice, 'unitPrice');
    }
    if (data.gst !== undefined) {
      patch.gst = clamp(
        requireNonNegativeNumber(data.gst, 'gst'),
        0,
        MAX_GST_PERCENT,
      );
    }
    if (data.reorderLevel !== undefined) {
      patch.reorderLevel = requireNonNegativeInteger(
        data.reorderLevel,
        'reorderLevel',
      );
    }
    const quantity =
      data.quantity === undefined
        ? undefined
        : requireNonNegativeInteger(data.quantity, 'quantity');

    return this.transaction('Update product', async (manager) => {
      const product = await this.getProduct(id, manager);
      if (patch.unitPrice !== undefined || patch.gst !== undefined) {
        patch.mrp = computeMrp(
          patch.unitPrice ?? product.unitPrice,
          patch.gst ?? product.gst,
        );
      }
      if (Object.keys(patch).length) {
        await manager.update(Product, { id }, patch);
      }
      if (quantity !== undefined && quantity !== product.quantity) {
        await this.stockService.applyChange(manager, {
          productId: id,
          delta: quantity - product.quantity,
          reason: 'Product edit',
          actor,
        });
      }
      return this.getProduct(id, manager);
    });
  }

  async adjustQuantity(
    id: string,
    data: { delta?: number; reason?: string },
    actor: string,
  ) {
    const delta = Number(data.delta);
    if (!Number.isInteger(delta) || delta === 0) {
      throw new ValidationError('delta', 'delta must be a non-zero whole number.');
    }
    const reason = requireText(data.reason, 'reason');
    return this.transaction('Adjust stock', async (manager) => {
      await this.stockService.applyChange(manager, {
        productId: id,
        delta,
        reason,
        actor,
      });
      return this.getProduct(id, manager);
    });
  }

  removeProduct(id: string) {
    return this.transaction('Delete product', async (manager) => {
      const product = await this.getProduct(id, manager);
      const sold = await manager.countBy(SaleLine, { productId: id });
      if (sold > 0) {
        throw new ConflictException(
          `Product ${id} appears on ${sold} sale line(s) and cannot be deleted.`,
        );
      }
      await manager.delete(Product, { id });
      return product;
    });
  }

  async exportCsv() {
    const products = await this.products.find({ order: { id: 'ASC' } });
    return toCsv(
      [
        'id',
        'name',
        'category',
        'supplierId',
        'quantity',
        'costPrice',
        'unitPrice',
        'gst',
        'mrp',
        'reorderLevel',
      ],
      products,
    );
  }

  private async ensureSupplier(supplierId: string) {
    const exists = await this.dataSource
      .getRepository(Supplier)
      .existsBy({ id: supplierId });
    if (!exists) {
      throw new ValidationError(
        'supplierId',
        `Supplier ${supplierId} does not exist.`,
      );
    }
  }
}
