export { ProviderRegistry, ProviderRegistryBuilder, PROVIDER_PRIORITY_ORDER } from './provider-registry';
export type { ProviderRegistryOptions } from './provider-registry';
export { EnvCredentialSource, StaticCredentialSource, API_KEY_ENV_VARS } from './credentials';
export type { CredentialSource } from './credentials';
export { createOpenAICompatibleFactory } from './factories';
export type { ProviderFactory, ProviderInit, OpenAICompatibleFactoryOptions } from './factories';
export { FALLBACK_POLICIES, selectFallbackModel } from './fallback';
export type { ToolModelCategory, FallbackPolicy } from './fallback';
