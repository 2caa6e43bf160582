import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { hashPassword } from '../auth/password';
import { runInTransaction } from '../common/transactions';
import { OperatorRole, User } from './user.entity';

export type UserView = Omit<User, 'passwordHash'>;

const toView = ({ passwordHash: _hash, ...user }: User): UserView => user;

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly dataSource: DataSource) {}

  private get users() {
    return this.dataSource.getRepository(User);
  }

  private transaction<T>(
    operation: string,
    work: (manager: EntityManager) => Promise<T>,
  ) {
    return runInTransaction(this.dataSource, operation, this.logger, work);
  }

  findByUsername(username: string) {
    return this.users.findOneBy({ username });
  }

  async getView(username: string) {
    const user = await this.findByUsername(username);
    if (!user) {
      throw new NotFoundException(`User ${username} not found.`);
    }
    return toView(user);
  }

  async list() {
    const users = await this.users.find({
      order: { role: 'ASC', username: 'ASC' },
    });
    return users.map(toView);
  }

  /** Creates the login or resets its password and role. */
  upsertLogin(data: {
    username: string;
    password: string;
    role: OperatorRole;
    employeeId?: string | null;
  }) {
    return this.transaction('Save login', (manager) =>
      this.saveLogin(manager, data),
    );
  }

  setPassword(username: string, password: string) {
    return this.transaction('Change password', async (manager) => {
      await manager.update(
        User,
        { username },
        { passwordHash: hashPassword(password) },
      );
    });
  }

  setOnline(username: string, online: boolean) {
    return this.transaction('Update login status', async (manager) => {
      await manager.update(
        User,
        { username },
        online
          ? { isOnline: true, lastLoginAt: new Date() }
          : { isOnline: false },
      );
    });
  }

  /** Runs on the caller's transaction. */
  async removeForEmployee(
    manager: EntityManager,
    employeeId: string,
    username: string,
  ) {
    const result = await manager
      .createQueryBuilder()
      .delete()
      .from(User)
      .where('employeeId = :employeeId OR username = :username', {
        employeeId,
        username,
      })
      .execute();
    return result.affected ?? 0;
  }

  /** Seeds the first Admin login when the table is empty. */
  async ensureAdmin(username: string, password: string) {
    const created = await this.transaction(
      'Seed admin login',
      async (manager) => {
        if ((await manager.count(User)) > 0) {
          return false;
        }
        await this.saveLogin(manager, { username, password, role: 'Admin' });
        return true;
      },
    );
    if (created) {
      this.logger.warn(
        `Created initial Admin login "${username}"; change its password.`,
      );
    }
    return created;
  }

  private async saveLogin(
    manager: EntityManager,
    data: {
      username: string;
      password: string;
      role: OperatorRole;
      employeeId?: string | null;
    },
  ) {
    const users = manager.getRepository(User);
    const existing = await users.findOneBy({ username: data.username });
    const user = existing ?? users.create({ username: data.username });
    user.passwordHash = hashPassword(data.password);
    user.role = data.role;
    user.employeeId = data.employeeId ?? existing?.employeeId ?? null;
    return toView(await users.save(user));
  }
}
