import { Test } from '@nestjs/testing';
import { Controller, Get } from '@nestjs/common';
import type { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import request from 'supertest';
import { RateLimitModule } from './throttler.module';
import { ThrottlerExceptionFilter } from './throttler-exception.filter';

@Controller('ping')
class PingController {
  @Get()
  ping() {
    return { ok: true };
  }
}

describe('RateLimitModule', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ RATE_LIMIT_PER_MINUTE: 2 })],
        }),
        RateLimitModule,
      ],
      controllers: [PingController],
    }).compile();

    app = moduleRef.createNestApplication();
    app.useGlobalFilters(new ThrottlerExceptionFilter());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('rejects the request past RATE_LIMIT_PER_MINUTE with 429', async () => {
    const server = app.getHttpServer();

    expect((await request(server).get('/ping')).status).toBe(200);
    expect((await request(server).get('/ping')).status).toBe(200);

    const third = await request(server).get('/ping');
    expect(third.status).toBe(429);
    expect(third.body).toEqual({
      statusCode: 429,
      message: 'Rate limit exceeded. Try again in a minute.',
      retryAfter: 60,
    });
  });
});
