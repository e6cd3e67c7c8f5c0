import { Test } from '@nestjs/testing';
import { Controller, Get } from '@nestjs/common';
import type { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { buildCorsOptions } from './cors';

@Controller('health')
class HealthController {
  @Get()
  health() {
    return { status: 'healthy' };
  }
}

describe('buildCorsOptions', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
    }).compile();

    app = moduleRef.createNestApplication({ logger: false });
    app.enableCors(
      buildCorsOptions(['http://localhost:3000', 'https://maestros.example']),
    );
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('echoes an allowed origin on preflight', async () => {
    const res = await request(app.getHttpServer())
      .options('/health')
      .set('Origin', 'https://maestros.example')
      .set('Access-Control-Request-Method', 'GET');

    expect(res.status).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe(
      'https://maestros.example',
    );
    expect(res.headers['access-control-allow-credentials']).toBe('true');
  });

  it('sends no allow-origin header to a disallowed origin', async () => {
    const res = await request(app.getHttpServer())
      .get('/health')
      .set('Origin', 'https://evil.example');

    expect(res.status).toBe(200);
    expect(res.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('serves requests without an Origin header', async () => {
    const res = await request(app.getHttpServer()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'healthy' });
  });
});
