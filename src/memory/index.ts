export {
    ConversationMemory,
    threadKey,
    DEFAULT_CONVERSATION_TTL_SECONDS,
    DEFAULT_MAX_CONVERSATION_TURNS,
    DEFAULT_MAX_CHAIN_DEPTH,
} from './conversation-memory';
export type { ConversationMemoryOptions } from './conversation-memory';
export { conversationRoleSchema, conversationTurnSchema, threadContextSchema } from './types';
export type { ConversationRole, ConversationTurn, ThreadContext, AddTurnOptions } from './types';
export { StorageError, isStorageError } from './errors';
export type { StorageOperation } from './errors';
export type { KeyValueStore } from './ports/kv-store';
export { InMemoryKeyValueStore } from './adapters/in-memory-store';
export type { InMemoryKeyValueStoreOptions } from './adapters/in-memory-store';
export { FileKeyValueStore, encodeKeyFileName, decodeKeyFileName } from './adapters/file/file-kv-store';
export type { FileKeyValueStoreOptions } from './adapters/file/file-kv-store';
export { AtomicJsonStore } from './adapters/file/atomic-json';
