export { loadRelayConfig, loadEnvFile, ConfigError } from './env';
export type { RelayConfig, ConversationStoreKind } from './env';
