import { z } from 'zod';
import { noopLogger, type Logger } from '../logging';

export const OPENROUTER_MODELS_URL = 'https://openrouter.ai/api/v1/models';
export const CATALOG_TTL_MS = 24 * 60 * 60 * 1000;
const CATALOG_TIMEOUT_MS = 15000;

export const OpenRouterModelSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    pricing: z
      .object({
        prompt: z.union([z.string(), z.number()]).optional(),
      })
      .passthrough()
      .optional(),
    architecture: z
      .object({
        input_modalities: z.array(z.string()).optional(),
        modality: z.string().optional(),
        modalities: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type OpenRouterModel = z.infer<typeof OpenRouterModelSchema>;

export const ModelCacheSchema = z.object({
  fetchedAt: z.number(),
  models: z.array(OpenRouterModelSchema),
});
export type ModelCache = z.infer<typeof ModelCacheSchema>;

const ModelsResponseSchema = z.object({
  data: z.array(OpenRouterModelSchema).default([]),
});

export interface ModelCacheStore {
  load(): ModelCache | null;
  save(cache: ModelCache): void;
}

export interface ModelListing {
  id: string;
  displayName: string;
  pricePerMillion: number;
  vision: boolean;
}

export interface ModelCatalog {
  fetchModels(forceRefresh?: boolean): Promise<OpenRouterModel[]>;
  list(forceRefresh?: boolean): Promise<ModelListing[]>;
  search(query: string): Promise<ModelListing[]>;
  isVisionCapable(modelId: string): Promise<boolean>;
}

export interface ModelCatalogOptions {
  apiKey?: string;
  fetcher?: typeof fetch;
  now?: () => number;
  store?: ModelCacheStore;
  logger?: Logger;
  url?: string;
}

export const hasVision = (model: OpenRouterModel) => {
  const architecture = model.architecture;
  if (!architecture) return false;
  if (architecture.input_modalities?.includes('image')) return true;
  if (architecture.modality?.toLowerCase().includes('image')) return true;
  return architecture.modalities?.includes('vision') ?? false;
};

// Pricing arrives per token; listings show it per million tokens.
export const pricePerMillion = (model: OpenRouterModel) => {
  const raw = model.pricing?.prompt;
  const perToken = typeof raw === 'number' ? raw : Number.parseFloat(raw ?? '0');
  return Number.isFinite(perToken) ? perToken * 1_000_000 : 0;
};

export const toListing = (model: OpenRouterModel): ModelListing => {
  const price = pricePerMillion(model);
  const vision = hasVision(model);
  const priceLabel = price < 0.01 ? '(Free)' : `($${price.toFixed(2)}/M)`;
  return {
    id: model.id,
    displayName: `${model.name ?? model.id} ${priceLabel}${vision ? ' [vision]' : ''}`,
    pricePerMillion: price,
    vision,
  };
};

export const createModelCatalog = (options: ModelCatalogOptions = {}): ModelCatalog => {
  const fetcher = options.fetcher ?? fetch;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? noopLogger;
  let cache: ModelCache | null = options.store?.load() ?? null;

  const isFresh = (entry: ModelCache | null): entry is ModelCache =>
    entry !== null && now() - entry.fetchedAt < CATALOG_TTL_MS;

  const fetchModels = async (forceRefresh = false) => {
    if (!forceRefresh && isFresh(cache)) return cache.models;
    const headers: Record<string, string> = { 'User-Agent': 'VoiceBox/1.0' };
    if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;
    try {
      const response = await fetcher(options.url ?? OPENROUTER_MODELS_URL, {
        headers,
        signal: AbortSignal.timeout(CATALOG_TIMEOUT_MS),
      });
      if (!response.ok) {
        logger.warn('Model list request failed', response.status);
        return cache?.models ?? [];
      }
      const parsed = ModelsResponseSchema.parse(await response.json());
      cache = { fetchedAt: now(), models: parsed.data };
      options.store?.save(cache);
      return parsed.data;
    } catch (error) {
      logger.warn('Model list unavailable, using cache', error instanceof Error ? error.message : error);
      return cache?.models ?? [];
    }
  };

  const list = async (forceRefresh = false) => {
    const models = await fetchModels(forceRefresh);
    return models
      .map(toListing)
      .sort(
        (left, right) =>
          left.pricePerMillion - right.pricePerMillion ||
          left.displayName.toLowerCase().localeCompare(right.displayName.toLowerCase())
      );
  };

  const search = async (query: string) => {
    const needle = query.trim().toLowerCase();
    const listings = await list();
    if (!needle) return listings;
    return listings.filter(
      (listing) =>
        listing.id.toLowerCase().includes(needle) || listing.displayName.toLowerCase().includes(needle)
    );
  };

  const isVisionCapable = async (modelId: string) => {
    const models = await fetchModels();
    const model = models.find((candidate) => candidate.id === modelId);
    return model ? hasVision(model) : false;
  };

  return { fetchModels, list, search, isVisionCapable };
};
