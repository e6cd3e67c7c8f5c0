import {
  ForbiddenException,
  ServiceUnavailableException,
  UnauthorizedException,
  type ExecutionContext,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { ConfigService } from '@nestjs/config';
import type { CommunityRole } from '@maestros/contract';
import { RolesGuard } from './roles.guard';
import { discordRoleIdsFromEnv } from '../config/discord-roles';
import type { DiscordBridgeService } from '../discord-bot/discord-bridge.service';
import type { AppEnv } from '../config/env.schema';

function contextFor(discordId: string | null): ExecutionContext {
  const request = discordId ? { user: { discord_id: discordId } } : {};
  return {
    getHandler: () => undefined,
    getClass: () => undefined,
    switchToHttp: () => ({ getRequest: () => request }),
  } as unknown as ExecutionContext;
}

describe('RolesGuard', () => {
  const reflector = new Reflector();
  const config = {
    get: jest.fn(() => ['9001']),
  } as unknown as ConfigService<AppEnv, true>;
  let getMemberRoleIds: jest.Mock;

  function guardWith(
    required: CommunityRole[] | undefined,
    managerRoleId: string | null = 'role-manager',
  ): RolesGuard {
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(required);
    getMemberRoleIds = jest.fn();
    const bridge = { getMemberRoleIds } as unknown as DiscordBridgeService;
    return new RolesGuard(
      reflector,
      config,
      bridge,
      discordRoleIdsFromEnv({
        CEO_ROLE_ID: 'role-ceo',
        MANAGER_ROLE_ID: managerRoleId,
        MEMBER_ROLE_ID: 'role-member',
        APPLICATION_PENDING_ROLE_ID: null,
      }),
    );
  }

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('allows any authenticated caller when no roles are required', async () => {
    const guard = guardWith(undefined);

    await expect(guard.canActivate(contextFor('1001'))).resolves.toBe(true);
  });

  it('lets admins through without asking the bot', async () => {
    const guard = guardWith(['manager', 'ceo']);

    await expect(guard.canActivate(contextFor('9001'))).resolves.toBe(true);
    expect(getMemberRoleIds).not.toHaveBeenCalled();
  });

  it('passes a caller holding any required role', async () => {
    const guard = guardWith(['manager', 'ceo']);
    getMemberRoleIds.mockResolvedValue(['role-ceo']);

    await expect(guard.canActivate(contextFor('1001'))).resolves.toBe(true);
  });

  it('403s a caller without a required role', async () => {
    const guard = guardWith(['manager', 'ceo']);
    getMemberRoleIds.mockResolvedValue(['role-member']);

    await expect(guard.canActivate(contextFor('1001'))).rejects.toThrow(
      new ForbiddenException('Manager or Admin access required'),
    );
  });

  it('401s a caller who is not in the guild', async () => {
    const guard = guardWith(['manager']);
    getMemberRoleIds.mockResolvedValue(null);

    await expect(guard.canActivate(contextFor('1001'))).rejects.toThrow(
      UnauthorizedException,
    );
  });

  it('propagates 503 when the bot is not connected', async () => {
    const guard = guardWith(['manager']);
    getMemberRoleIds.mockRejectedValue(
      new ServiceUnavailableException('Discord bot not connected'),
    );

    await expect(guard.canActivate(contextFor('1001'))).rejects.toThrow(
      ServiceUnavailableException,
    );
  });

  it('stops matching a role once its ID is removed from configuration', async () => {
    const guard = guardWith(['manager'], null);
    getMemberRoleIds.mockResolvedValue(['role-manager']);

    await expect(guard.canActivate(contextFor('1001'))).rejects.toThrow(
      ForbiddenException,
    );
  });

  it('refuses requests that skipped the JWT guard', async () => {
    const guard = guardWith(['manager']);

    await expect(guard.canActivate(contextFor(null))).resolves.toBe(false);
  });
});
