import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  FindOptionsWhere,
  Like,
  MoreThan,
} from 'typeorm';
import { toCsv } from '../common/csv';
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
  optionalPhone,
  requirePersonName,
} from '../common/validation';
import { Customer } from './customer.entity';

export type CustomerInput = {
  name?: string;
  phone?: string | null;
  email?: string | null;
};

@Injectable()
export class CustomersService {
  private readonly logger = new Logger(CustomersService.name);

  constructor(private readonly dataSource: DataSource) {}

  private get customers() {
    return this.dataSource.getRepository(Customer);
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
    const base: FindOptionsWhere<Customer> = pagination.cursor
      ? { id: MoreThan(pagination.cursor) }
      : {};
    const where = search
      ? [
          { ...base, name: Like(`%${search}%`) },
          { ...base, phone: Like(`%${search}%`) },
          { ...base, email: Like(`%${search}%`) },
        ]
      : base;
    const items = await this.customers.find({
      where,
      order: { id: 'ASC' },
      take: pagination.take,
    });
    return buildPaginatedResponse(items, pagination.take);
  }

  async getById(id: string) {
    const customer = await this.customers.findOneBy({ id });
    if (!customer) {
      throw new NotFoundException(`Customer ${id} not found.`);
    }
    return customer;
  }

  /** Pass `manager` to create the customer inside a caller's transaction. */
  create(data: CustomerInput, manager?: EntityManager) {
    const values = {
      name: requirePersonName(data.name, 'name'),
      phone: optionalPhone(data.phone, 'phone'),
      email: optionalEmail(data.email, 'email'),
    };
    const insert = async (current: EntityManager) => {
      const customers = current.getRepository(Customer);
      await assertUnique(customers, 'phone', values.phone);
      await assertUnique(customers, 'email', values.email);
      const id = await nextPaddedId(customers);
      try {
        return await customers.save(customers.create({ id, ...values }));
      } catch (error) {
        rethrowUniqueViolation(error, { id, ...values });
      }
    };
    return manager ? insert(manager) : this.transaction('Create customer', insert);
  }

  update(id: string, data: CustomerInput) {
    return this.transaction('Update customer', async (manager) => {
      const customers = manager.getRepository(Customer);
      const customer = await customers.findOneBy({ id });
      if (!customer) {
        throw new NotFoundException(`Customer ${id} not found.`);
      }
      if (data.name !== undefined) {
        customer.name = requirePersonName(data.name, 'name');
      }
      if (data.phone !== undefined) {
        customer.phone = optionalPhone(data.phone, 'phone');
      }
      if (data.email !== undefined) {
        customer.email = optionalEmail(data.email, 'email');
      }
      const exclude = { column: 'id', value: id };
      await assertUnique(customers, 'phone', customer.phone, exclude);
      await assertUnique(customers, 'email', customer.email, exclude);
      try {
        return await customers.save(customer);
      } catch (error) {
        rethrowUniqueViolation(error, { ...customer });
      }
    });
  }

  /** Past sales keep their own copy of the customer's details. */
  remove(id: string) {
    return this.transaction('Delete customer', async (manager) => {
      const customer = await manager.findOneBy(Customer, { id });
      if (!customer) {
        throw new NotFoundException(`Customer ${id} not found.`);
      }
      await manager.delete(Customer, { id });
      return customer;
    });
  }

  async exportCsv() {
    const customers = await this.customers.find({ order: { id: 'ASC' } });
    return toCsv(
      ['id', 'name', 'phone', 'email', 'createdAt'],
      customers,
    );
  }
}
