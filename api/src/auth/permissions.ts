import type { PermissionsDto } from '@maestros/contract';
import { holdsAnyRole, type DiscordRoleIds } from '../config/discord-roles';

export function isAdminId(
  adminIds: readonly string[],
  discordId: string,
): boolean {
  return adminIds.includes(discordId);
}

/**
 * Permission flags shown to the frontend. Derived from whichever role list
 * the caller passes (stored `guild_roles` or live roles from the bot).
 */
export function computePermissions(
  roleIds: DiscordRoleIds,
  adminIds: readonly string[],
  discordId: string,
  guildRoles: readonly string[],
): PermissionsDto {
  const isAdmin = isAdminId(adminIds, discordId);
  const isCeo = holdsAnyRole(roleIds, guildRoles, ['ceo']);
  const isManager = holdsAnyRole(roleIds, guildRoles, ['manager']);
  return {
    is_admin: isAdmin,
    is_ceo: isCeo,
    is_manager: isManager,
    can_manage_applications: isAdmin || isCeo || isManager,
  };
}
