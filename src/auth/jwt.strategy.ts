import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { UsersService } from '../users/users.service';
import type { JwtPayload } from './auth.types';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly usersService: UsersService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get<string>('jwt.secret') ?? 'change-me',
    });
  }

  /** Tokens stop working once the operator logs out or the login is removed. */
  async validate(payload: JwtPayload): Promise<JwtPayload> {
    const user = await this.usersService.findByUsername(payload.sub);
    if (!user || !user.isOnline) {
      throw new UnauthorizedException('Session has ended.');
    }
    return { sub: user.username, role: user.role };
  }
}
