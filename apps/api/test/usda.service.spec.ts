import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { UsdaService } from '../src/food/usda/usda.service';
import { appleRaw } from './fixtures/usda';

const config: Record<string, string | number> = {
  USDA_BASE_URL: 'http://usda.test/fdc/v1/',
  USDA_API_KEY: 'test-usda-key',
  USDA_TIMEOUT_MS: 1000,
};

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

describe('UsdaService', () => {
  let usda: UsdaService;
  let fetchMock: jest.SpyInstance;

  beforeEach(async () => {
    fetchMock = jest.spyOn(global, 'fetch');
    const moduleRef = await Test.createTestingModule({
      providers: [UsdaService, { provide: ConfigService, useValue: { get: (key: string) => config[key] } }],
    }).compile();
    usda = moduleRef.get(UsdaService);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('asks for one curated result sorted by data type', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ totalHits: 1, foods: [appleRaw] }));

    await usda.searchBestMatch('  apple ');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.origin + url.pathname).toBe('http://usda.test/fdc/v1/foods/search');
    expect(url.searchParams.get('api_key')).toBe('test-usda-key');
    expect(url.searchParams.get('query')).toBe('apple');
    expect(url.searchParams.get('pageSize')).toBe('1');
    expect(url.searchParams.getAll('dataType')).toEqual(['Foundation', 'SR Legacy']);
    expect(url.searchParams.get('sortBy')).toBe('dataType.keyword');
    expect(url.searchParams.get('sortOrder')).toBe('desc');
  });

  it('returns the first record', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ foods: [appleRaw, { fdcId: 2, description: 'Apple juice', foodNutrients: [] }] }),
    );

    const food = await usda.searchBestMatch('apple');

    expect(food?.fdcId).toBe(1001);
    expect(food?.foodNutrients).toHaveLength(8);
  });

  it('drops malformed nutrient entries and keeps the food', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ foods: [{ ...appleRaw, foodNutrients: [null, 'energy', ...appleRaw.foodNutrients] }] }),
    );

    const food = await usda.searchBestMatch('apple');

    expect(food?.fdcId).toBe(1001);
    expect(food?.foodNutrients).toHaveLength(8);
  });

  it('returns null when nothing matches', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ totalHits: 0, foods: [] }));

    await expect(usda.searchBestMatch('unobtainium')).resolves.toBeNull();
  });

  it('skips the request for a blank query', async () => {
    await expect(usda.searchBestMatch('   ')).resolves.toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('throws on a non-2xx status', async () => {
    fetchMock.mockResolvedValueOnce(new Response('forbidden', { status: 403 }));

    await expect(usda.searchBestMatch('apple')).rejects.toThrow('usda_error_403: forbidden');
  });

  it('throws on a malformed body', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ foods: 'none' }));

    await expect(usda.searchBestMatch('apple')).rejects.toThrow('usda_bad_response');
  });

  it('propagates transport errors', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(usda.searchBestMatch('apple')).rejects.toThrow('fetch failed');
  });

  it('aborts a stalled request after USDA_TIMEOUT_MS', async () => {
    jest.useFakeTimers();
    fetchMock.mockImplementationOnce(
      (_input: unknown, init?: RequestInit) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () =>
            // shaped like an abort error from another realm: not an Error instance
            reject({ name: 'AbortError', message: 'This operation was aborted' }),
          );
        }),
    );

    const pending = usda.searchBestMatch('apple');
    jest.advanceTimersByTime(1000);

    await expect(pending).rejects.toThrow('usda_timeout after 1000ms');
    expect(fetchMock.mock.calls[0][1].signal.aborted).toBe(true);
  });
});
