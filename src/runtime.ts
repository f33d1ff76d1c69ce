/**
 * 组合根
 *
 * 由 RelayConfig 构建日志器、限制策略、Provider 注册表和会话记忆；
 * 注册表通过参数传递，不存在全局单例。
 */

import type { RelayConfig } from './config';
import { getLogger } from './logger';
import type { Logger } from './logger';
import { ConversationMemory, FileKeyValueStore, InMemoryKeyValueStore } from './memory';
import type { KeyValueStore } from './memory';
import {
    ModelRestrictionService,
    ProviderRegistry,
    ProviderRegistryBuilder,
    StaticCredentialSource,
    createOpenAICompatibleFactory,
} from './providers';

export interface RelayRuntime {
    config: RelayConfig;
    logger: Logger;
    restrictions: ModelRestrictionService;
    registry: ProviderRegistry;
    memory: ConversationMemory;
    store: KeyValueStore;
    close(): Promise<void>;
}

export interface RelayRuntimeOverrides {
    logger?: Logger;
    store?: KeyValueStore;
    fetchImpl?: typeof fetch;
}

function createStore(config: RelayConfig, logger: Logger): KeyValueStore {
    if (config.conversation.store === 'file') {
        return new FileKeyValueStore({ dir: config.conversation.storeDir, logger: logger.child('FileKeyValueStore') });
    }
    return new InMemoryKeyValueStore();
}

export function createRelayRuntime(config: RelayConfig, overrides: RelayRuntimeOverrides = {}): RelayRuntime {
    const logger = overrides.logger ?? getLogger();
    const restrictions = new ModelRestrictionService({ openai: config.openai.allowedModels });

    const registry = new ProviderRegistryBuilder()
        .withCredentials(new StaticCredentialSource({ openai: config.openai.apiKey }))
        .withRestrictions(restrictions)
        .withLogger(logger.child('ProviderRegistry'))
        .register(
            'openai',
            createOpenAICompatibleFactory({
                baseURL: config.openai.baseURL,
                timeout: config.openai.requestTimeoutMs,
                fetchImpl: overrides.fetchImpl,
                logger: logger.child('OpenAICompatibleProvider'),
            })
        )
        .build();

    const store = overrides.store ?? createStore(config, logger);
    const memory = new ConversationMemory({
        store,
        ttlSeconds: config.conversation.ttlSeconds,
        maxTurns: config.conversation.maxTurns,
        logger: logger.child('ConversationMemory'),
    });

    if (restrictions.hasRestrictions('openai')) {
        logger.info('Model restrictions active', { providerKind: 'openai' }, {
            allowed: restrictions.getAllowedModels('openai'),
        });
    }

    return {
        config,
        logger,
        restrictions,
        registry,
        memory,
        store,
        async close() {
            await store.close?.();
            await logger.flush();
        },
    };
}
