import { EnvSchema, validateEnv } from './env.schema';
import { discordRoleIdsFromEnv, holdsAnyRole } from './discord-roles';

const baseEnv = {
  MONGODB_URI: 'mongodb://localhost:27017',
  JWT_SECRET_KEY: 'test-secret',
};

describe('EnvSchema', () => {
  it('applies defaults for the database and server', () => {
    const env = validateEnv(baseEnv);

    expect(env.MONGODB_DB_NAME).toBe('maestros_community');
    expect(env.API_PORT).toBe(8000);
    expect(env.JWT_EXPIRE_MINUTES).toBe(60);
    expect(env.RATE_LIMIT_PER_MINUTE).toBe(60);
    expect(env.DEBUG).toBe(false);
  });

  it('allows the local frontend when CORS_ORIGINS is unset', () => {
    expect(validateEnv(baseEnv).CORS_ORIGINS).toEqual(['http://localhost:3000']);
  });

  it('splits CORS_ORIGINS, trimming entries and dropping empties', () => {
    const env = validateEnv({
      ...baseEnv,
      CORS_ORIGINS: ' http://localhost:3000 , ,https://maestros.example ,',
    });

    expect(env.CORS_ORIGINS).toEqual([
      'http://localhost:3000',
      'https://maestros.example',
    ]);
  });

  it('parses ADMIN_DISCORD_IDS into a list', () => {
    const env = validateEnv({ ...baseEnv, ADMIN_DISCORD_IDS: '111,222' });
    expect(env.ADMIN_DISCORD_IDS).toEqual(['111', '222']);
  });

  it('treats blank role IDs as unset', () => {
    const env = validateEnv({ ...baseEnv, MANAGER_ROLE_ID: '   ' });
    expect(env.MANAGER_ROLE_ID).toBeNull();
  });

  it('lists every missing required variable in one error', () => {
    expect(() => validateEnv({})).toThrow(
      'Invalid environment configuration: MONGODB_URI: Required; JWT_SECRET_KEY: Required',
    );
  });

  it('rejects a non-numeric port', () => {
    expect(EnvSchema.safeParse({ ...baseEnv, API_PORT: 'abc' }).success).toBe(
      false,
    );
  });
});

describe('discordRoleIdsFromEnv', () => {
  const env = validateEnv({
    ...baseEnv,
    CEO_ROLE_ID: '100',
    MANAGER_ROLE_ID: '200',
    MEMBER_ROLE_ID: '300',
  });

  it('freezes the role map', () => {
    const roles = discordRoleIdsFromEnv(env);
    expect(Object.isFrozen(roles)).toBe(true);
    expect(roles).toEqual({
      ceo: '100',
      manager: '200',
      member: '300',
      applicationPending: null,
    });
  });

  it('matches a held role by its configured ID', () => {
    const roles = discordRoleIdsFromEnv(env);
    expect(holdsAnyRole(roles, ['200'], ['manager', 'ceo'])).toBe(true);
    expect(holdsAnyRole(roles, ['300'], ['manager', 'ceo'])).toBe(false);
  });

  it('never matches a role whose ID was removed from configuration', () => {
    const roles = discordRoleIdsFromEnv({ ...env, MANAGER_ROLE_ID: null });
    expect(holdsAnyRole(roles, ['200'], ['manager'])).toBe(false);
  });
});
