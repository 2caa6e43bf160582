import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { ValidationError } from '../common/errors';
import { UsersService } from '../users/users.service';
import type { JwtPayload } from './auth.types';
import { validatePassword, verifyPassword } from './password';

@Injectable()
export class AuthService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap() {
    await this.usersService.ensureAdmin(
      this.configService.get<string>('auth.adminUsername') ?? 'admin',
      this.configService.get<string>('auth.adminPassword') ?? 'ChangeMe123',
    );
  }

  async signIn({ username, password }: { username?: string; password?: string }) {
    if (!username?.trim() || !password) {
      throw new UnauthorizedException('Invalid credentials.');
    }
    const user = await this.usersService.findByUsername(username.trim());
    if (!user || !verifyPassword(password, user.passwordHash)) {
      throw new UnauthorizedException('Invalid credentials.');
    }

    const payload: JwtPayload = { sub: user.username, role: user.role };
    await this.usersService.setOnline(user.username, true);
    this.logger.log(`Operator ${user.username} signed in.`);

    return {
      accessToken: await this.jwtService.signAsync(payload),
      user: await this.usersService.getView(user.username),
    };
  }

  async signOut(username: string) {
    await this.usersService.setOnline(username, false);
    this.logger.log(`Operator ${username} signed out.`);
    return { success: true };
  }

  me(username: string) {
    return this.usersService.getView(username);
  }

  async changePassword(
    username: string,
    data: { currentPassword?: string; newPassword?: string },
  ) {
    const user = await this.usersService.findByUsername(username);
    if (!user || !verifyPassword(data.currentPassword ?? '', user.passwordHash)) {
      throw new UnauthorizedException('Invalid credentials.');
    }
    if (!data.newPassword || !validatePassword(data.newPassword)) {
      throw new ValidationError(
        'newPassword',
        'newPassword needs at least 8 characters with a letter and a number.',
      );
    }
    await this.usersService.setPassword(username, data.newPassword);
    return { success: true };
  }
}
