export {
  MODEL_CACHE_TTL_MS,
  ModelCatalog,
  filterFreeModels,
  type GetModelsOptions,
  type ModelCatalogOptions,
  type ModelFetcher,
  type ModelMap,
} from './model-catalog.js';
