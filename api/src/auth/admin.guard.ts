import {
  CanActivate,
  ExecutionContext,
  Injectable,
  ForbiddenException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppEnv } from '../config/env.schema';
import type { AuthenticatedRequest } from './auth.types';
import { isAdminId } from './permissions';

/** Admins are listed by discord id in ADMIN_DISCORD_IDS. */
@Injectable()
export class AdminGuard implements CanActivate {
  constructor(private readonly config: ConfigService<AppEnv, true>) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context
      .switchToHttp()
      .getRequest<Partial<AuthenticatedRequest>>();
    const user = request.user;

    if (!user) {
      // JWT guard did not run first
      return false;
    }

    const adminIds = this.config.get('ADMIN_DISCORD_IDS', { infer: true });
    if (!isAdminId(adminIds, user.discord_id)) {
      throw new ForbiddenException('Admin access required');
    }

    return true;
  }
}
