import type { CommunityRole } from '@maestros/contract';
import type { AppEnv } from './env.schema';

export const DISCORD_ROLE_IDS = 'DISCORD_ROLE_IDS';

/**
 * Role IDs are read once at startup and frozen. A role left unset is null
 * and can never be matched by an authorization check.
 */
export type DiscordRoleIds = Readonly<Record<CommunityRole, string | null>>;

export function discordRoleIdsFromEnv(
  env: Pick<
    AppEnv,
    | 'CEO_ROLE_ID'
    | 'MANAGER_ROLE_ID'
    | 'MEMBER_ROLE_ID'
    | 'APPLICATION_PENDING_ROLE_ID'
  >,
): DiscordRoleIds {
  return Object.freeze({
    ceo: env.CEO_ROLE_ID,
    manager: env.MANAGER_ROLE_ID,
    member: env.MEMBER_ROLE_ID,
    applicationPending: env.APPLICATION_PENDING_ROLE_ID,
  });
}

/** True when `heldRoleIds` contains the configured ID of any of `roles`. */
export function holdsAnyRole(
  roleIds: DiscordRoleIds,
  heldRoleIds: readonly string[],
  roles: readonly CommunityRole[],
): boolean {
  return roles.some((role) => {
    const id = roleIds[role];
    return id !== null && heldRoleIds.includes(id);
  });
}
