/**
 * Provider Registry
 *
 * 每个 Provider 类型的状态：未注册 → 已注册未初始化 → 已初始化。
 * 实例按需创建并缓存；没有凭证或未注册时返回 undefined，而不是抛错。
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistryBuilder()
 *     .withCredentials(new EnvCredentialSource())
 *     .register('openai', createOpenAICompatibleFactory())
 *     .build();
 *
 * const provider = registry.getProviderForModel('o3');
 * ```
 */

import { getLogger } from '../../logger';
import type { LoggerLike } from '../../logger';
import type { ModelProvider } from '../provider';
import type { RestrictionPolicy } from '../restrictions';
import type { ProviderKind } from '../types';
import { EnvCredentialSource } from './credentials';
import type { CredentialSource } from './credentials';
import type { ProviderFactory } from './factories';
import { selectFallbackModel } from './fallback';
import type { ToolModelCategory } from './fallback';

/** 按模型查找 Provider 时的固定优先级 */
export const PROVIDER_PRIORITY_ORDER: readonly ProviderKind[] = ['openai'];

export interface ProviderRegistryOptions {
    credentials?: CredentialSource;
    restrictions?: RestrictionPolicy;
    logger?: LoggerLike;
    factories?: Iterable<readonly [ProviderKind, ProviderFactory]>;
}

export class ProviderRegistry {
    private readonly factories = new Map<ProviderKind, ProviderFactory>();
    private readonly instances = new Map<ProviderKind, ModelProvider>();
    private readonly credentials: CredentialSource;
    private readonly restrictions?: RestrictionPolicy;
    private readonly logger: LoggerLike;

    constructor(options: ProviderRegistryOptions = {}) {
        this.credentials = options.credentials ?? new EnvCredentialSource();
        this.restrictions = options.restrictions;
        this.logger = options.logger ?? getLogger().child('ProviderRegistry');
        for (const [kind, factory] of options.factories ?? []) {
            this.factories.set(kind, factory);
        }
    }

    /**
     * 注册 Provider 工厂（后写覆盖先写）
     *
     * 重新注册会丢弃已缓存的实例
     */
    registerProvider(kind: ProviderKind, factory: ProviderFactory): void {
        this.factories.set(kind, factory);
        this.instances.delete(kind);
        this.logger.debug('Provider registered', { providerKind: kind });
    }

    unregisterProvider(kind: ProviderKind): void {
        this.factories.delete(kind);
        this.instances.delete(kind);
    }

    isRegistered(kind: ProviderKind): boolean {
        return this.factories.has(kind);
    }

    /**
     * 获取 Provider 实例
     *
     * @returns 未注册或没有凭证时返回 undefined
     */
    getProvider(kind: ProviderKind, forceNew: boolean = false): ModelProvider | undefined {
        const factory = this.factories.get(kind);
        if (!factory) {
            return undefined;
        }

        if (!forceNew) {
            const cached = this.instances.get(kind);
            if (cached) return cached;
        }

        const apiKey = this.credentials.getApiKey(kind);
        if (!apiKey) {
            this.logger.debug('No credential configured', { providerKind: kind });
            return undefined;
        }

        const provider = factory({ apiKey, restrictions: this.restrictions });
        this.instances.set(kind, provider);
        this.logger.debug('Provider initialized', { providerKind: kind });
        return provider;
    }

    /**
     * 按优先级返回第一个认可该模型名的 Provider
     */
    getProviderForModel(modelName: string): ModelProvider | undefined {
        for (const kind of PROVIDER_PRIORITY_ORDER) {
            const provider = this.getProvider(kind);
            if (provider?.validateModelName(modelName)) {
                return provider;
            }
        }
        return undefined;
    }

    /**
     * 模型名（含别名）→ Provider 类型
     *
     * 过滤只在 Provider 的 listModels 中发生一次，这里不再调用限制策略。
     */
    getAvailableModels(respectRestrictions: boolean = true): Map<string, ProviderKind> {
        const models = new Map<string, ProviderKind>();

        for (const kind of PROVIDER_PRIORITY_ORDER) {
            const provider = this.getProvider(kind);
            if (!provider) continue;

            for (const name of provider.listModels(respectRestrictions)) {
                if (!models.has(name)) {
                    models.set(name, kind);
                }
            }
        }

        return models;
    }

    getAvailableModelNames(kind?: ProviderKind): string[] {
        const names: string[] = [];
        for (const [name, owner] of this.getAvailableModels(true)) {
            if (kind === undefined || owner === kind) {
                names.push(name);
            }
        }
        return names;
    }

    /**
     * 已注册的 Provider 类型
     */
    getAvailableProviders(): ProviderKind[] {
        return PROVIDER_PRIORITY_ORDER.filter((kind) => this.factories.has(kind));
    }

    /**
     * 已注册且配置了凭证的 Provider 类型
     */
    getAvailableProvidersWithKeys(): ProviderKind[] {
        return this.getAvailableProviders().filter((kind) => this.credentials.getApiKey(kind) !== undefined);
    }

    /**
     * 按类别选择回退模型，永不失败
     */
    getPreferredFallbackModel(category?: ToolModelCategory): string {
        const model = selectFallbackModel(category, this.getAvailableModels(true).keys());
        this.logger.debug('Fallback model selected', {}, { category: category ?? 'balanced', model });
        return model;
    }

    /**
     * 丢弃已初始化的实例，注册信息保留
     */
    clearCache(): void {
        this.instances.clear();
    }
}

/**
 * 在启动时一次性完成注册
 */
export class ProviderRegistryBuilder {
    private readonly factories = new Map<ProviderKind, ProviderFactory>();
    private credentials?: CredentialSource;
    private restrictions?: RestrictionPolicy;
    private logger?: LoggerLike;

    register(kind: ProviderKind, factory: ProviderFactory): this {
        this.factories.set(kind, factory);
        return this;
    }

    withCredentials(credentials: CredentialSource): this {
        this.credentials = credentials;
        return this;
    }

    withRestrictions(restrictions: RestrictionPolicy): this {
        this.restrictions = restrictions;
        return this;
    }

    withLogger(logger: LoggerLike): this {
        this.logger = logger;
        return this;
    }

    build(): ProviderRegistry {
        return new ProviderRegistry({
            credentials: this.credentials,
            restrictions: this.restrictions,
            logger: this.logger,
            factories: this.factories,
        });
    }
}
