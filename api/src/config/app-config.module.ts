import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { validateEnv, type AppEnv } from './env.schema';
import { DISCORD_ROLE_IDS, discordRoleIdsFromEnv } from './discord-roles';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnv,
    }),
  ],
  providers: [
    {
      provide: DISCORD_ROLE_IDS,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppEnv, true>) =>
        discordRoleIdsFromEnv({
          CEO_ROLE_ID: config.get('CEO_ROLE_ID', { infer: true }),
          MANAGER_ROLE_ID: config.get('MANAGER_ROLE_ID', { infer: true }),
          MEMBER_ROLE_ID: config.get('MEMBER_ROLE_ID', { infer: true }),
          APPLICATION_PENDING_ROLE_ID: config.get(
            'APPLICATION_PENDING_ROLE_ID',
            { infer: true },
          ),
        }),
    },
  ],
  exports: [DISCORD_ROLE_IDS],
})
export class AppConfigModule {}
