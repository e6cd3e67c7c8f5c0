import { SetMetadata } from '@nestjs/common';
import type { CommunityRole } from '@maestros/contract';

export const ROLES_KEY = 'roles';

/**
 * Discord roles allowed through `RolesGuard`. Holding any one of them is
 * enough; admins always pass.
 *
 *   @UseGuards(AuthGuard('jwt'), RolesGuard)
 *   @Roles('manager', 'ceo')
 */
export const Roles = (...roles: CommunityRole[]) => SetMetadata(ROLES_KEY, roles);
