export { ModelCatalog, CatalogDefinitionError } from './model-catalog';
export type { ModelResolution, ListModelsOptions } from './model-catalog';
export { OPENAI_MODEL_DEFINITIONS } from './openai-models';
