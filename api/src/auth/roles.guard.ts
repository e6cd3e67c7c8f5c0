import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import type { CommunityRole } from '@maestros/contract';
import type { AppEnv } from '../config/env.schema';
import {
  DISCORD_ROLE_IDS,
  holdsAnyRole,
  type DiscordRoleIds,
} from '../config/discord-roles';
import { DiscordBridgeService } from '../discord-bot/discord-bridge.service';
import type { AuthenticatedRequest } from './auth.types';
import { isAdminId } from './permissions';
import { ROLES_KEY } from './roles.decorator';

/**
 * Checks the caller's live Discord roles against the configured role IDs.
 * Roles are read through the bot on every request, so the bot being down
 * is a 503 and leaving the guild is a 401.
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly config: ConfigService<AppEnv, true>,
    private readonly bridge: DiscordBridgeService,
    @Inject(DISCORD_ROLE_IDS) private readonly roleIds: DiscordRoleIds,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const requiredRoles = this.reflector.getAllAndOverride<
      CommunityRole[] | undefined
    >(ROLES_KEY, [context.getHandler(), context.getClass()]);

    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const request = context
      .switchToHttp()
      .getRequest<Partial<AuthenticatedRequest>>();
    const user = request.user;
    if (!user) {
      return false;
    }

    const adminIds = this.config.get('ADMIN_DISCORD_IDS', { infer: true });
    if (isAdminId(adminIds, user.discord_id)) {
      return true;
    }

    const liveRoles = await this.bridge.getMemberRoleIds(user.discord_id);
    if (liveRoles === null) {
      throw new UnauthorizedException('Not a member of the Discord server');
    }

    if (!holdsAnyRole(this.roleIds, liveRoles, requiredRoles)) {
      throw new ForbiddenException('Manager or Admin access required');
    }

    return true;
  }
}
