/**
 * Providers 统一导出
 */

// 能力目录
export { ModelCatalog, CatalogDefinitionError, OPENAI_MODEL_DEFINITIONS } from './catalog';
export type { ModelResolution, ListModelsOptions } from './catalog';

// 限制策略
export { ModelRestrictionService, UNRESTRICTED, RESTRICTION_ENV_VARS, parseAllowList, isProviderKind } from './restrictions';
export type { RestrictionPolicy } from './restrictions';

// Provider
export { ModelProvider } from './provider';
export { OpenAICompatibleProvider, OPENAI_CATALOG } from './openai-compatible';
export type { OpenAICompatibleProviderOptions } from './openai-compatible';
export { encodeImage, dataUriByteLength, getImageMimeType, isDataUri, isRemoteUrl } from './images';

// Registry
export * from './registry';

// 适配器
export { BaseAPIAdapter, ChatCompletionsAdapter, ResponsesAdapter } from './adapters';
export type { AdapterHeaderOptions } from './adapters';

// HTTP 客户端
export { HTTPClient } from './http/client';
export type { HttpClientOptions } from './http/client';

// 类型与错误
export * from './types';
