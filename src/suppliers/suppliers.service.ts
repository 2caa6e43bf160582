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
import { Product } from '../catalog/product.entity';
import { nextPaddedId } from '../common/identifiers';
import {
  buildPaginatedResponse,
  PaginationQuery,
  parsePagination,
} from '../common/pagination';
import { rethrowUniqueViolation } from '../common/sqlite-errors';
import { runInTransaction } from '../common/transactions';
import { assertUnique } from '../common/uniqueness';
import {
  optionalEmail,
  optionalText,
  requirePersonName,
  requirePhone,
  requireText,
} from '../common/validation';
import { Supplier } from './supplier.entity';

export type SupplierInput = {
  name?: string;
  company?: string;
  phone?: string;
  email?: string | null;
  address?: string | null;
};

@Injectable()
export class SuppliersService {
  private readonly logger = new Logger(SuppliersService.name);

  constructor(private readonly dataSource: DataSource) {}

  private get suppliers() {
    return this.dataSource.getRepository(Supplier);
  }

  private transaction<T>(
    operation: string,
    work: (manager: EntityManager) => Promise<T>,
  ) {
    return runInTransaction(this.dataSource, operation, this.logger, work);
  }

  async list(query: PaginationQuery & { search?: string }) {
    const pagination = parsePagination(query);
    const search = query.search?.trim();
    const base: FindOptionsWhere<Supplier> = pagination.cursor
      ? { id: MoreThan(pagination.cursor) }
      : {};
    const where = search
      ? [
          { ...base, name: Like(`%${search}%`) },
          { ...base, company: Like(`%${search}%`) },
          { ...base, phone: Like(`%${search}%`) },
        ]
      : base;
    const items = await this.suppliers.find({
      where,
      order: { id: 'ASC' },
      take: pagination.take,
    });
    return buildPaginatedResponse(items, pagination.take);
  }

  async getById(id: string) {
    const supplier = await this.suppliers.findOneBy({ id });
    if (!supplier) {
      throw new NotFoundException(`Supplier ${id} not found.`);
    }
    return supplier;
  }

  create(data: SupplierInput) {
    const values = {
      name: requirePersonName(data.name, 'name'),
      company: requireText(data.company, 'company'),
      phone: requirePhone(data.phone, 'phone'),
      email: optionalEmail(data.email, 'email'),
      address: optionalText(data.address),
    };
    return this.transaction('Create supplier', async (manager) => {
      const suppliers = manager.getRepository(Supplier);
      await assertUnique(suppliers, 'phone', values.phone);
      await assertUnique(suppliers, 'email', values.email);
      const id = await nextPaddedId(suppliers);
      try {
        return await suppliers.save(suppliers.create({ id, ...values }));
      } catch (error) {
        rethrowUniqueViolation(error, { id, ...values });
      }
    });
  }

  update(id: string, data: SupplierInput) {
    return this.transaction('Update supplier', async (manager) => {
      const suppliers = manager.getRepository(Supplier);
      const supplier = await this.findIn(manager, id);
      if (data.name !== undefined) {
        supplier.name = requirePersonName(data.name, 'name');
      }
      if (data.company !== undefined) {
        supplier.company = requireText(data.company, 'company');
      }
      if (data.phone !== undefined) {
        supplier.phone = requirePhone(data.phone, 'phone');
      }
      if (data.email !== undefined) {
        supplier.email = optionalEmail(data.email, 'email');
      }
      if (data.address !== undefined) {
        supplier.address = optionalText(data.address);
      }
      const exclude = { column: 'id', value: id };
      await assertUnique(suppliers, 'phone', supplier.phone, exclude);
      await assertUnique(suppliers, 'email', supplier.email, exclude);
      try {
        return await suppliers.save(supplier);
      } catch (error) {
        rethrowUniqueViolation(error, { ...supplier });
      }
    });
  }

  /** Refused while any product still names the supplier. */
  remove(id: string) {
    return this.transaction('Delete supplier', async (manager) => {
      const supplier = await this.findIn(manager, id);
      const products = await manager.countBy(Product, { supplierId: id });
      if (products > 0) {
        throw new ConflictException(
          `Supplier ${id} still supplies ${products} product(s).`,
        );
      }
      await manager.delete(Supplier, { id });
      return supplier;
    });
  }

  private async findIn(manager: EntityManager, id: string) {
    const supplier = await manager.findOneBy(Supplier, { id });
    if (!supplier) {
      throw new NotFoundException(`Supplier ${id} not found.`);
    }
    return supplier;
  }
}
