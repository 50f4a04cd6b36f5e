import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { AppModule } from './../src/app.module';

describe('Digest API (e2e)', () => {
  let app: INestApplication<App>;

  beforeEach(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('/health (GET)', () => {
    return request(app.getHttpServer()).get('/health').expect(200).expect({
      status: 'ok',
      service: 'ranked-news-digest',
    });
  });

  it('/ (GET)', () => {
    return request(app.getHttpServer())
      .get('/')
      .expect(200)
      .expect((res) => {
        const body = res.body as { service?: string; variants?: string[] };
        expect(body.service).toBe('ranked-news-digest');
        expect(body.variants).toContain('ai-media');
      });
  });

  it('/digest/ai-media/queries (GET)', () => {
    return request(app.getHttpServer())
      .get('/digest/ai-media/queries')
      .expect(200)
      .expect((res) => {
        const body = res.body as { queries?: string[] };
        expect(body.queries?.[0]).toBe('gpt-4');
      });
  });

  it('/digest/unknown/queries (GET) is 404', () => {
    return request(app.getHttpServer())
      .get('/digest/unknown/queries')
      .expect(404);
  });

  it('/digest/ai-media/run (POST) rejects a bad budget', () => {
    return request(app.getHttpServer())
      .post('/digest/ai-media/run')
      .send({ budget: 'many' })
      .expect(400);
  });
});
