import type { OperatorRole } from '../users/user.entity';

export type JwtPayload = {
  sub: string;
  role: OperatorRole;
};

export type AuthRequest = {
  user?: JwtPayload;
};

/** Operator name recorded on sales, returns and stock logs. */
export const actorOf = (req: AuthRequest) => req.user?.sub || 'system';
