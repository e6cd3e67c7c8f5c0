import { z } from 'zod';

export const DiscordTokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
});

export const DiscordOAuthUserSchema = z.object({
  id: z.string(),
  username: z.string(),
  discriminator: z.string().nullish(),
  avatar: z.string().nullish(),
  email: z.string().nullish(),
});

export type DiscordOAuthUser = z.infer<typeof DiscordOAuthUserSchema>;

export const DiscordPartialGuildListSchema = z.array(
  z.object({ id: z.string() }).passthrough(),
);

export const DiscordGuildMemberSchema = z.object({
  roles: z.array(z.string()).default([]),
});

/** Reasons appended to `${FRONTEND_URL}/?error=` when login fails. */
export type OAuthFailure = 'token_failed' | 'user_info_failed' | 'auth_failed';

export class OAuthCallbackError extends Error {
  constructor(
    readonly reason: OAuthFailure,
    message: string,
  ) {
    super(message);
    this.name = 'OAuthCallbackError';
  }
}
