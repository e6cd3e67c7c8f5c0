import type { Request } from 'express';
import type { UserDocument } from '../users/user.types';

/** Claims carried by our bearer tokens. `sub` is the discord id. */
export interface JwtPayload {
  sub: string;
}

/** A request that passed `AuthGuard('jwt')`. */
export interface AuthenticatedRequest extends Request {
  user: UserDocument;
}
