import { RATE_LIMIT_TIERS, RateLimit } from './rate-limit.decorator';

describe('RATE_LIMIT_TIERS', () => {
  it('limits auth routes to 10 per minute', () => {
    expect(RATE_LIMIT_TIERS.auth).toEqual({ ttl: 60_000, limit: 10 });
  });

  it('limits music lookups to 30 per minute', () => {
    expect(RATE_LIMIT_TIERS.music).toEqual({ ttl: 60_000, limit: 30 });
  });
});

describe('RateLimit', () => {
  it('writes throttle metadata onto a class', () => {
    @RateLimit('discord')
    class DiscordRoutes {}

    expect(Reflect.getMetadata('THROTTLER:LIMITdefault', DiscordRoutes)).toBe(
      20,
    );
    expect(Reflect.getMetadata('THROTTLER:TTLdefault', DiscordRoutes)).toBe(
      60_000,
    );
  });

  it('writes throttle metadata onto a method', () => {
    class MusicRoutes {
      @RateLimit('music')
      search() {}
    }

    expect(
      Reflect.getMetadata(
        'THROTTLER:LIMITdefault',
        MusicRoutes.prototype.search,
      ),
    ).toBe(30);
  });
});
