/**
 * 模型限制策略
 *
 * 每个 Provider 类型可以配置一份允许列表（如 OPENAI_ALLOWED_MODELS=o3,mini）。
 * 未配置列表的类型不受限制；名称统一按小写比较。
 */

import { PROVIDER_KINDS } from './types';
import type { ProviderKind } from './types';

export interface RestrictionPolicy {
    /**
     * @param modelName 规范模型名
     * @param originalName 调用方给出的原始名称（可能是别名）
     */
    isAllowed(kind: ProviderKind, modelName: string, originalName?: string): boolean;
}

/** 每个 Provider 类型对应的允许列表环境变量 */
export const RESTRICTION_ENV_VARS: Record<ProviderKind, string> = {
    openai: 'OPENAI_ALLOWED_MODELS',
};

export function parseAllowList(raw: string | undefined): Set<string> | undefined {
    if (!raw) return undefined;
    const names = raw
        .split(',')
        .map((name) => name.trim().toLowerCase())
        .filter(Boolean);
    return names.length > 0 ? new Set(names) : undefined;
}

export class ModelRestrictionService implements RestrictionPolicy {
    private readonly allowLists: Map<ProviderKind, Set<string>>;

    constructor(allowLists: Partial<Record<ProviderKind, Iterable<string>>> = {}) {
        this.allowLists = new Map();
        for (const [kind, names] of Object.entries(allowLists)) {
            if (!isProviderKind(kind) || !names) continue;
            const normalized = new Set(Array.from(names, (name) => name.trim().toLowerCase()).filter(Boolean));
            if (normalized.size > 0) {
                this.allowLists.set(kind, normalized);
            }
        }
    }

    /**
     * 从环境变量构建
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env): ModelRestrictionService {
        const allowLists: Partial<Record<ProviderKind, Set<string>>> = {};
        for (const [kind, envVar] of Object.entries(RESTRICTION_ENV_VARS)) {
            const names = parseAllowList(env[envVar]);
            if (names && isProviderKind(kind)) {
                allowLists[kind] = names;
            }
        }
        return new ModelRestrictionService(allowLists);
    }

    isAllowed(kind: ProviderKind, modelName: string, originalName?: string): boolean {
        const allowed = this.allowLists.get(kind);
        if (!allowed) return true;

        if (allowed.has(modelName.toLowerCase())) return true;
        return originalName !== undefined && allowed.has(originalName.toLowerCase());
    }

    hasRestrictions(kind: ProviderKind): boolean {
        return this.allowLists.has(kind);
    }

    getAllowedModels(kind: ProviderKind): string[] {
        return Array.from(this.allowLists.get(kind) ?? []).sort();
    }
}

/**
 * 不做任何限制的策略
 */
export const UNRESTRICTED: RestrictionPolicy = {
    isAllowed: () => true,
};

export function isProviderKind(value: string): value is ProviderKind {
    return PROVIDER_KINDS.some((kind) => kind === value);
}
