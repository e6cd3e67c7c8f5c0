import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import * as crypto from 'crypto';
import type Redis from 'ioredis';
import type { PermissionsDto, TokenResponseDto } from '@maestros/contract';
import type { AppEnv } from '../config/env.schema';
import { DISCORD_ROLE_IDS, type DiscordRoleIds } from '../config/discord-roles';
import { REDIS_CLIENT } from '../redis/redis.module';
import { UsersService } from '../users/users.service';
import type { UserDocument } from '../users/user.types';
import { DiscordBridgeService } from '../discord-bot/discord-bridge.service';
import { DISCORD_API_BASE, discordFetch } from './discord-http.util';
import {
  DiscordGuildMemberSchema,
  DiscordOAuthUserSchema,
  DiscordPartialGuildListSchema,
  DiscordTokenResponseSchema,
  OAuthCallbackError,
  type DiscordOAuthUser,
} from './discord-oauth.types';
import type { JwtPayload } from './auth.types';
import { computePermissions } from './permissions';

const AUTH_CODE_TTL_SECONDS = 30;
const AUTH_CODE_PREFIX = 'auth_code:';
const OAUTH_SCOPE = 'identify email guilds';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly config: ConfigService<AppEnv, true>,
    private readonly jwtService: JwtService,
    private readonly usersService: UsersService,
    private readonly bridge: DiscordBridgeService,
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    @Inject(DISCORD_ROLE_IDS) private readonly roleIds: DiscordRoleIds,
  ) {}

  authorizeUrl(): string {
    const params = new URLSearchParams({
      client_id: this.config.get('DISCORD_CLIENT_ID', { infer: true }),
      redirect_uri: this.config.get('DISCORD_REDIRECT_URI', { infer: true }),
      response_type: 'code',
      scope: OAUTH_SCOPE,
    });
    return `https://discord.com/api/oauth2/authorize?${params.toString()}`;
  }

  /**
   * Completes the OAuth callback: code exchange, profile lookup, guild role
   * lookup, user upsert. Resolves to the frontend URL to redirect to, which
   * carries either a one-time code or an `error` reason.
   */
  async completeLogin(code: string): Promise<string> {
    const frontendUrl = this.config.get('FRONTEND_URL', { infer: true });
    try {
      const accessToken = await this.exchangeOAuthCode(code);
      const profile = await this.fetchProfile(accessToken);
      const guildRoles = await this.fetchGuildRoles(accessToken, profile.id);

      const user = await this.usersService.upsertFromDiscord({
        discord_id: profile.id,
        username: profile.username,
        discriminator: profile.discriminator ?? '0',
        avatar: profile.avatar ?? null,
        email: profile.email ?? null,
        guild_roles: guildRoles,
      });

      const oneTimeCode = await this.storeOneTimeCode(
        this.issueToken(user.discord_id).access_token,
      );
      this.logger.log(`Login for ${user.username} (${user.discord_id})`);
      return `${frontendUrl}/auth/callback?code=${oneTimeCode}`;
    } catch (error) {
      const reason =
        error instanceof OAuthCallbackError ? error.reason : 'auth_failed';
      this.logger.error(
        `OAuth callback failed (${reason}): ${error instanceof Error ? error.message : String(error)}`,
      );
      return `${frontendUrl}/?error=${reason}`;
    }
  }

  /** Trades a one-time code for the JWT it guards. Each code works once. */
  async redeemOneTimeCode(code: string): Promise<TokenResponseDto> {
    const key = `${AUTH_CODE_PREFIX}${code}`;
    const token = await this.redis.get(key);
    if (!token) {
      throw new UnauthorizedException('Invalid or expired auth code');
    }
    await this.redis.del(key);
    return { access_token: token, token_type: 'bearer' };
  }

  issueToken(discordId: string): TokenResponseDto {
    const payload: JwtPayload = { sub: discordId };
    return {
      access_token: this.jwtService.sign(payload),
      token_type: 'bearer',
    };
  }

  permissionsFor(discordId: string, guildRoles: readonly string[]): PermissionsDto {
    return computePermissions(
      this.roleIds,
      this.config.get('ADMIN_DISCORD_IDS', { infer: true }),
      discordId,
      guildRoles,
    );
  }

  /** Re-reads live roles through the bot and stores them on the user. */
  async syncRoles(user: UserDocument): Promise<{
    message: string;
    guild_roles: string[];
    permissions: PermissionsDto;
  }> {
    const roles = await this.bridge.getMemberRoleIds(user.discord_id);
    if (roles === null) {
      throw new UnauthorizedException('Not a member of the Discord server');
    }
    await this.usersService.setGuildRoles(user.discord_id, roles);
    this.logger.log(`Synced roles for ${user.username}: ${roles.length} role(s)`);
    return {
      message: 'Roles synced successfully',
      guild_roles: roles,
      permissions: this.permissionsFor(user.discord_id, roles),
    };
  }

  private async storeOneTimeCode(accessToken: string): Promise<string> {
    const code = crypto.randomBytes(32).toString('hex');
    await this.redis.setex(
      `${AUTH_CODE_PREFIX}${code}`,
      AUTH_CODE_TTL_SECONDS,
      accessToken,
    );
    return code;
  }

  private async exchangeOAuthCode(code: string): Promise<string> {
    const response = await discordFetch(`${DISCORD_API_BASE}/oauth2/token`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        client_id: this.config.get('DISCORD_CLIENT_ID', { infer: true }),
        client_secret: this.config.get('DISCORD_CLIENT_SECRET', { infer: true }),
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.config.get('DISCORD_REDIRECT_URI', { infer: true }),
      }),
    });
    if (!response.ok) {
      throw new OAuthCallbackError(
        'token_failed',
        `Token exchange failed: ${response.status} ${await response.text()}`,
      );
    }
    return DiscordTokenResponseSchema.parse(await response.json()).access_token;
  }

  private async fetchProfile(accessToken: string): Promise<DiscordOAuthUser> {
    const response = await discordFetch(`${DISCORD_API_BASE}/users/@me`, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    if (!response.ok) {
      throw new OAuthCallbackError(
        'user_info_failed',
        `User lookup failed: ${response.status}`,
      );
    }
    return DiscordOAuthUserSchema.parse(await response.json());
  }

  /**
   * Role IDs the user holds in the configured guild. Empty when they are
   * not a member or the bot-token lookup fails.
   */
  private async fetchGuildRoles(
    accessToken: string,
    discordId: string,
  ): Promise<string[]> {
    const guildId = this.config.get('DISCORD_GUILD_ID', { infer: true });
    if (!guildId) return [];

    const guildsResponse = await discordFetch(
      `${DISCORD_API_BASE}/users/@me/guilds`,
      { headers: { Authorization: `Bearer ${accessToken}` } },
    );
    if (!guildsResponse.ok) return [];
    const guilds = DiscordPartialGuildListSchema.parse(
      await guildsResponse.json(),
    );
    if (!guilds.some((guild) => guild.id === guildId)) return [];

    const memberResponse = await discordFetch(
      `${DISCORD_API_BASE}/guilds/${guildId}/members/${discordId}`,
      {
        headers: {
          Authorization: `Bot ${this.config.get('DISCORD_BOT_TOKEN', { infer: true })}`,
        },
      },
    );
    if (!memberResponse.ok) {
      this.logger.warn(
        `Could not fetch guild member ${discordId}: ${memberResponse.status}`,
      );
      return [];
    }
    return DiscordGuildMemberSchema.parse(await memberResponse.json()).roles;
  }
}
