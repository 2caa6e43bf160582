import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  FindOptionsWhere,
  Like,
  MoreThan,
} from 'typeorm';
import { defaultPasswordFor, usernameFor } from '../auth/password';
import { toDateKey } from '../common/date-range';
import { ValidationError } from '../common/errors';
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
  requireEmail,
  requirePersonName,
  requirePhone,
  requireText,
} from '../common/validation';
import { isOperatorRole, OperatorRole } from '../users/user.entity';
import { UsersService } from '../users/users.service';
import { Employee } from './employee.entity';

export type EmployeeInput = {
  name?: string;
  phone?: string;
  email?: string;
  role?: string;
  joinDate?: string;
};

const JOIN_DATE = /^\d{4}-\d{2}-\d{2}$/;

function parseRole(value: unknown): OperatorRole {
  if (!isOperatorRole(value)) {
    throw new ValidationError('role', 'role must be Admin or Employee.');
  }
  return value;
}

function parseJoinDate(value: unknown) {
  const joinDate = requireText(value, 'joinDate');
  const parsed = new Date(`${joinDate}T00:00:00Z`);
  if (!JOIN_DATE.test(joinDate) || Number.isNaN(parsed.getTime())) {
    throw new ValidationError('joinDate', 'joinDate must be YYYY-MM-DD.');
  }
  if (joinDate > toDateKey(new Date())) {
    throw new ValidationError('joinDate', 'joinDate cannot be in the future.');
  }
  return joinDate;
}

@Injectable()
export class EmployeesService {
  private readonly logger = new Logger(EmployeesService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly usersService: UsersService,
  ) {}

  private get employees() {
    return this.dataSource.getRepository(Employee);
  }

  private transaction<T>(
    operation: string,
    work: (manager: EntityManager) => Promise<T>,
  ) {
    return runInTransaction(this.dataSource, operation, this.logger, work);
  }

  async list(query: PaginationQuery & { search?: string; role?: string }) {
    const pagination = parsePagination(query);
    const search = query.search?.trim();
    const base: FindOptionsWhere<Employee> = {
      ...(isOperatorRole(query.role) ? { role: query.role } : {}),
      ...(pagination.cursor ? { id: MoreThan(pagination.cursor) } : {}),
    };
    const where = search
      ? [
          { ...base, name: Like(`%${search}%`) },
          { ...base, phone: Like(`%${search}%`) },
          { ...base, email: Like(`%${search}%`) },
        ]
      : base;
    const items = await this.employees.find({
      where,
      order: { id: 'ASC' },
      take: pagination.take,
    });
    return buildPaginatedResponse(items, pagination.take);
  }

  async getById(id: string) {
    const employee = await this.employees.findOneBy({ id });
    if (!employee) {
      throw new NotFoundException(`Employee ${id} not found.`);
    }
    return employee;
  }

  create(data: EmployeeInput) {
    const values = {
      name: requirePersonName(data.name, 'name'),
      phone: requirePhone(data.phone, 'phone'),
      email: requireEmail(data.email, 'email'),
      role: parseRole(data.role ?? 'Employee'),
      joinDate: parseJoinDate(data.joinDate ?? toDateKey(new Date())),
    };
    return this.transaction('Create employee', async (manager) => {
      const employees = manager.getRepository(Employee);
      await assertUnique(employees, 'phone', values.phone);
      await assertUnique(employees, 'email', values.email);
      const id = await nextPaddedId(employees);
      try {
        return await employees.save(employees.create({ id, ...values }));
      } catch (error) {
        rethrowUniqueViolation(error, { id, ...values });
      }
    });
  }

  update(id: string, data: EmployeeInput) {
    return this.transaction('Update employee', async (manager) => {
      const employees = manager.getRepository(Employee);
      const employee = await this.findIn(manager, id);
      if (data.name !== undefined) {
        employee.name = requirePersonName(data.name, 'name');
      }
      if (data.phone !== undefined) {
        employee.phone = requirePhone(data.phone, 'phone');
      }
      if (data.email !== undefined) {
        employee.email = requireEmail(data.email, 'email');
      }
      if (data.role !== undefined) {
        employee.role = parseRole(data.role);
      }
      if (data.joinDate !== undefined) {
        employee.joinDate = parseJoinDate(data.joinDate);
      }
      const exclude = { column: 'id', value: id };
      await assertUnique(employees, 'phone', employee.phone, exclude);
      await assertUnique(employees, 'email', employee.email, exclude);
      try {
        return await employees.save(employee);
      } catch (error) {
        rethrowUniqueViolation(error, { ...employee });
      }
    });
  }

  /** Also drops the login that was derived from the employee's name. */
  remove(id: string) {
    return this.transaction('Delete employee', async (manager) => {
      const employee = await this.findIn(manager, id);
      await manager.delete(Employee, { id });
      await this.usersService.removeForEmployee(
        manager,
        id,
        usernameFor(employee.name),
      );
      return employee;
    });
  }

  /**
   * Creates (or resets) the employee's login. The default password is only
   * ever returned here.
   */
  async createLogin(id: string) {
    const employee = await this.getById(id);
    const username = usernameFor(employee.name);
    const password = defaultPasswordFor(employee.name);
    const user = await this.usersService.upsertLogin({
      username,
      password,
      role: employee.role,
      employeeId: employee.id,
    });
    return { username: user.username, role: user.role, password };
  }

  private async findIn(manager: EntityManager, id: string) {
    const employee = await manager.findOneBy(Employee, { id });
    if (!employee) {
      throw new NotFoundException(`Employee ${id} not found.`);
    }
    return employee;
  }
}
