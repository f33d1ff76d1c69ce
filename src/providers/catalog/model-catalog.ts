/**
 * 模型能力目录
 *
 * 别名解析是目录上的纯函数：
 * 1. 规范名精确匹配
 * 2. 规范名大小写不敏感匹配
 * 3. 别名大小写不敏感匹配
 * 都不匹配时原样返回（由调用方处理后续的校验失败）。
 */

import type { ModelCapabilities, ProviderKind } from '../types';
import type { RestrictionPolicy } from '../restrictions';

export type ModelResolution =
    | { resolved: true; canonicalName: string; matchedAlias?: string }
    | { resolved: false; name: string };

export interface ListModelsOptions {
    /** 为 true 时按限制策略过滤 */
    respectRestrictions: boolean;
    restrictions?: RestrictionPolicy;
}

export class CatalogDefinitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CatalogDefinitionError';
    }
}

export class ModelCatalog {
    readonly kind: ProviderKind;
    private readonly models: ReadonlyMap<string, ModelCapabilities>;
    private readonly canonicalIndex: ReadonlyMap<string, string>;
    private readonly aliasIndex: ReadonlyMap<string, string>;

    constructor(kind: ProviderKind, definitions: readonly ModelCapabilities[]) {
        this.kind = kind;

        const models = new Map<string, ModelCapabilities>();
        const canonicalIndex = new Map<string, string>();
        const aliasIndex = new Map<string, string>();

        for (const definition of definitions) {
            if (definition.provider !== kind) {
                throw new CatalogDefinitionError(
                    `Model '${definition.modelName}' belongs to provider '${definition.provider}', not '${kind}'`
                );
            }
            if (!Number.isInteger(definition.contextWindow) || definition.contextWindow <= 0) {
                throw new CatalogDefinitionError(`Model '${definition.modelName}' must declare a positive context window`);
            }
            const lowered = definition.modelName.toLowerCase();
            if (canonicalIndex.has(lowered)) {
                throw new CatalogDefinitionError(`Duplicate model name '${definition.modelName}'`);
            }
            canonicalIndex.set(lowered, definition.modelName);
            models.set(definition.modelName, Object.freeze({ ...definition, aliases: Object.freeze([...definition.aliases]) }));
        }

        for (const definition of definitions) {
            for (const alias of definition.aliases) {
                const lowered = alias.toLowerCase();
                const owner = aliasIndex.get(lowered) ?? canonicalIndex.get(lowered);
                if (owner !== undefined && owner !== definition.modelName) {
                    throw new CatalogDefinitionError(
                        `Alias '${alias}' of '${definition.modelName}' collides with '${owner}'`
                    );
                }
                aliasIndex.set(lowered, definition.modelName);
            }
        }

        this.models = models;
        this.canonicalIndex = canonicalIndex;
        this.aliasIndex = aliasIndex;
    }

    /**
     * 规范名 → 能力记录
     */
    getModelConfigurations(): ReadonlyMap<string, ModelCapabilities> {
        return this.models;
    }

    get(canonicalName: string): ModelCapabilities | undefined {
        return this.models.get(canonicalName);
    }

    resolve(name: string): ModelResolution {
        if (this.models.has(name)) {
            return { resolved: true, canonicalName: name };
        }

        const lowered = name.toLowerCase();
        const canonical = this.canonicalIndex.get(lowered);
        if (canonical !== undefined) {
            return { resolved: true, canonicalName: canonical };
        }

        const aliased = this.aliasIndex.get(lowered);
        if (aliased !== undefined) {
            return { resolved: true, canonicalName: aliased, matchedAlias: name };
        }

        return { resolved: false, name };
    }

    /**
     * 解析为规范名；无法解析时原样返回
     */
    resolveModelName(name: string): string {
        const resolution = this.resolve(name);
        return resolution.resolved ? resolution.canonicalName : resolution.name;
    }

    /**
     * 列出规范名及其别名
     *
     * 可用模型的全部名称一并返回，与 isModelAllowed 使用同一判定。
     */
    listModels(options: ListModelsOptions): string[] {
        const names: string[] = [];
        const policy = options.respectRestrictions ? options.restrictions : undefined;

        for (const capabilities of this.models.values()) {
            if (!this.isModelAllowed(policy, capabilities)) {
                continue;
            }
            names.push(capabilities.modelName, ...capabilities.aliases);
        }

        return names;
    }

    /**
     * 条目级限制判定：规范名、调用方给出的名称或任一别名被允许即视为可用
     */
    isModelAllowed(policy: RestrictionPolicy | undefined, capabilities: ModelCapabilities, requestedName?: string): boolean {
        if (!policy) {
            return true;
        }
        if (policy.isAllowed(this.kind, capabilities.modelName, requestedName)) {
            return true;
        }
        return capabilities.aliases.some((alias) => policy.isAllowed(this.kind, capabilities.modelName, alias));
    }
}
