import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../../../src/app.module';
import { setupTestApp } from '../../utils/test-helpers';

describe('SearchController (e2e)', () => {
  let app: INestApplication;

  beforeEach(async () => {
    app = await setupTestApp([AppModule]);

    await request(app.getHttpServer())
      .post('/api/documents')
      .send({ id: 'a', title: 'Apple Pie', body: 'apple pie recipe', tags: ['dessert'] })
      .expect(201);
    await request(app.getHttpServer())
      .post('/api/documents')
      .send({ id: 'b', title: 'Apple Cider', body: 'apple cider recipe', tags: ['drink'] })
      .expect(201);
  });

  afterEach(async () => {
    if (app) await app.close();
  });

  describe('POST /api/search', () => {
    it('should return ranked results', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/search')
        .send({ query: 'apple recipe', topK: 10 })
        .expect(200);

      expect(res.body.query).toBe('apple recipe');
      expect(res.body.count).toBe(2);
      expect(res.body.results[0]).toEqual({
        id: 'a',
        title: 'Apple Pie',
        body: 'apple pie recipe',
        tags: ['dessert'],
        relevanceScore: 0.125,
      });
      expect(typeof res.body.took).toBe('number');
    });

    it('should only return documents containing the token', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/search')
        .send({ query: 'pie' })
        .expect(200);

      expect(res.body.results.map((result: { id: string }) => result.id)).toEqual(['a']);
    });

    it.each([{}, { query: '' }, { query: 'apple', topK: 0 }, { query: 'apple', topK: 101 }])(
      'should return 400 for %p',
      async (body) => {
        await request(app.getHttpServer()).post('/api/search').send(body).expect(400);
      },
    );
  });

  describe('POST /api/autocomplete', () => {
    it('should suggest indexed tokens', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/autocomplete')
        .send({ prefix: 'app', limit: 10 })
        .expect(200);

      expect(res.body).toEqual({ prefix: 'app', suggestions: ['apple'], count: 1 });
    });

    it('should return 400 for a non-integer limit', async () => {
      await request(app.getHttpServer())
        .post('/api/autocomplete')
        .send({ prefix: 'app', limit: 2.5 })
        .expect(400);
    });
  });

  describe('cache and stats', () => {
    it('should report cached queries until the cache is cleared', async () => {
      await request(app.getHttpServer()).post('/api/search').send({ query: 'apple' }).expect(200);

      const before = await request(app.getHttpServer()).get('/api/stats').expect(200);
      expect(before.body).toEqual({
        documentCount: 2,
        vocabularySize: 6,
        suggestionCount: 6,
        cachedQueries: 1,
        cacheCapacity: 100,
        folderCount: 1,
      });

      await request(app.getHttpServer()).post('/api/cache/clear').expect(204);

      const after = await request(app.getHttpServer()).get('/api/stats').expect(200);
      expect(after.body.cachedQueries).toBe(0);
    });
  });
});
