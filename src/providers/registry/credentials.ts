/**
 * 凭证来源
 *
 * 每个 Provider 类型一个环境变量；空白值视为未配置。
 */

import type { ProviderKind } from '../types';

export interface CredentialSource {
    getApiKey(kind: ProviderKind): string | undefined;
}

export const API_KEY_ENV_VARS: Record<ProviderKind, string> = {
    openai: 'OPENAI_API_KEY',
};

function normalizeKey(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export class EnvCredentialSource implements CredentialSource {
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    getApiKey(kind: ProviderKind): string | undefined {
        return normalizeKey(this.env[API_KEY_ENV_VARS[kind]]);
    }
}

/**
 * 固定凭证，用于已加载好的配置
 */
export class StaticCredentialSource implements CredentialSource {
    constructor(private readonly keys: Partial<Record<ProviderKind, string>>) {}

    getApiKey(kind: ProviderKind): string | undefined {
        return normalizeKey(this.keys[kind]);
    }
}
