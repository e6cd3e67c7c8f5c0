import { z } from 'zod';

/**
 * Community roles backed by Discord role IDs from configuration.
 * A role whose ID is not configured never matches.
 */
export const CommunityRoleSchema = z.enum(['ceo', 'manager', 'member', 'applicationPending']);
export type CommunityRole = z.infer<typeof CommunityRoleSchema>;

export const PermissionsSchema = z.object({
    is_admin: z.boolean(),
    is_ceo: z.boolean(),
    is_manager: z.boolean(),
    can_manage_applications: z.boolean(),
});

export type PermissionsDto = z.infer<typeof PermissionsSchema>;

export const ExchangeCodeSchema = z.object({
    code: z.string().min(1, 'Auth code is required'),
});

export type ExchangeCodeDto = z.infer<typeof ExchangeCodeSchema>;

/** Response from POST /auth/exchange-code and POST /auth/refresh */
export const TokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.literal('bearer'),
});

export type TokenResponseDto = z.infer<typeof TokenResponseSchema>;
