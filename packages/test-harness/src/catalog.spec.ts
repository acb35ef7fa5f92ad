import { describe, expect, it, vi } from 'vitest';
import {
  CATALOG_TTL_MS,
  OPENROUTER_MODELS_URL,
  createModelCatalog,
  type ModelCache,
  type ModelCacheStore,
} from '@voicebox/core';

const MODELS = [
  {
    id: 'paid/vision',
    name: 'Paid Vision',
    pricing: { prompt: '0.000003' },
    architecture: { input_modalities: ['text', 'image'] },
  },
  { id: 'free/b', name: 'Beta', pricing: { prompt: '0' } },
  { id: 'free/a', name: 'alpha', pricing: { prompt: 0 } },
];

const createFetcher = (status = 200) => {
  const calls: Array<{ url: string; headers: Headers }> = [];
  const fetcher: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), headers: new Headers(init?.headers) });
    return new Response(JSON.stringify({ data: MODELS }), { status });
  };
  return { fetcher, calls };
};

const memoryStore = (initial: ModelCache | null = null) => {
  let saved = initial;
  const store: ModelCacheStore = {
    load: () => saved,
    save: vi.fn((cache: ModelCache) => {
      saved = cache;
    }),
  };
  return store;
};

describe('model catalog', () => {
  it('lists models free first with display names', async () => {
    const { fetcher, calls } = createFetcher();
    const catalog = createModelCatalog({ apiKey: 'test-secret', fetcher, now: () => 1000 });
    const listings = await catalog.list();
    expect(listings.map((listing) => listing.displayName)).toEqual([
      'alpha (Free)',
      'Beta (Free)',
      'Paid Vision ($3.00/M) [vision]',
    ]);
    expect(listings.map((listing) => listing.vision)).toEqual([false, false, true]);
    expect(calls[0].url).toBe(OPENROUTER_MODELS_URL);
    expect(calls[0].headers.get('Authorization')).toBe('Bearer test-secret');
    expect(calls[0].headers.get('User-Agent')).toBe('VoiceBox/1.0');
  });

  it('caches the list for a day', async () => {
    const { fetcher, calls } = createFetcher();
    let clock = 1000;
    const store = memoryStore();
    const catalog = createModelCatalog({ fetcher, now: () => clock, store });
    await catalog.list();
    await catalog.search('beta');
    expect(calls).toHaveLength(1);
    expect(store.save).toHaveBeenCalledTimes(1);

    clock += CATALOG_TTL_MS;
    await catalog.list();
    expect(calls).toHaveLength(2);
  });

  it('uses a fresh persisted cache without fetching', async () => {
    const { fetcher, calls } = createFetcher();
    const store = memoryStore({ fetchedAt: 500, models: [{ id: 'cached/model', name: 'Cached' }] });
    const catalog = createModelCatalog({ fetcher, now: () => 1000, store });
    expect((await catalog.list()).map((listing) => listing.id)).toEqual(['cached/model']);
    expect(calls).toHaveLength(0);
  });

  it('falls back to the stale cache when the request fails', async () => {
    const fetcher: typeof fetch = async () => {
      throw new Error('offline');
    };
    const store = memoryStore({ fetchedAt: 0, models: [{ id: 'cached/model' }] });
    const catalog = createModelCatalog({ fetcher, now: () => CATALOG_TTL_MS * 2, store });
    expect(await catalog.fetchModels()).toEqual([{ id: 'cached/model' }]);
  });

  it('returns nothing when the service errors and no cache exists', async () => {
    const { fetcher } = createFetcher(503);
    const catalog = createModelCatalog({ fetcher });
    expect(await catalog.list()).toEqual([]);
  });

  it('searches ids and names and detects vision support', async () => {
    const { fetcher } = createFetcher();
    const catalog = createModelCatalog({ fetcher });
    expect((await catalog.search('VISION')).map((listing) => listing.id)).toEqual(['paid/vision']);
    expect((await catalog.search('free/')).map((listing) => listing.id)).toEqual(['free/a', 'free/b']);
    expect(await catalog.isVisionCapable('paid/vision')).toBe(true);
    expect(await catalog.isVisionCapable('free/a')).toBe(false);
    expect(await catalog.isVisionCapable('missing/model')).toBe(false);
  });
});
