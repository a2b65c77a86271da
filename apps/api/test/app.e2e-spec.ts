import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { LABELER_PROVIDER } from '../src/food/analyzers/labeler.provider';
import { UsdaService } from '../src/food/usda/usda.service';
import { CorrelationIdInterceptor } from '../src/common/interceptors/correlation.interceptor';

describe('App (e2e)', () => {
  const labeler = { extractFoods: jest.fn().mockRejectedValue(new Error('classifier down')) };
  const usda = { searchBestMatch: jest.fn().mockRejectedValue(new Error('usda down')) };
  let app: INestApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(LABELER_PROVIDER)
      .useValue(labeler)
      .overrideProvider(UsdaService)
      .useValue(usda)
      .compile();

    app = moduleRef.createNestApplication();
    app.useGlobalInterceptors(new CorrelationIdInterceptor());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET / -> 200 with name and version', async () => {
    const r = await request(app.getHttpServer()).get('/').expect(200);

    expect(r.body).toEqual({ message: 'Nutrition Analysis API is running', version: '1.0.0' });
  });

  it('GET /health -> 200 while upstreams are down', async () => {
    const r = await request(app.getHttpServer()).get('/health').expect(200);

    expect(r.body).toEqual({ status: 'healthy', service: 'nutrition-analysis-api' });
    expect(labeler.extractFoods).not.toHaveBeenCalled();
    expect(usda.searchBestMatch).not.toHaveBeenCalled();
  });

  it('echoes the caller correlation id', async () => {
    const r = await request(app.getHttpServer()).get('/health').set('x-correlation-id', 'test-corr-1').expect(200);

    expect(r.headers['x-correlation-id']).toBe('test-corr-1');
  });

  it('generates a correlation id when none is sent', async () => {
    const r = await request(app.getHttpServer()).get('/health').expect(200);

    expect(r.headers['x-correlation-id']).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
