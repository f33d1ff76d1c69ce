/**
 * 运行配置
 *
 * 从环境变量读取并用 zod 校验；空字符串视为未设置。
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_OPENAI_BASE_URL, parseAllowList } from '../providers';

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: string[]
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

function blankAsUndefined(value: unknown): unknown {
    return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const relayEnvSchema = z.object({
    OPENAI_API_KEY: z.preprocess(blankAsUndefined, z.string().trim().optional()),
    OPENAI_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().default(DEFAULT_OPENAI_BASE_URL)),
    OPENAI_ALLOWED_MODELS: z.preprocess(blankAsUndefined, z.string().optional()),
    OPENAI_REQUEST_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
    CONVERSATION_TIMEOUT_HOURS: z.preprocess(blankAsUndefined, z.coerce.number().positive().default(3)),
    MAX_CONVERSATION_TURNS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(20)),
    CONVERSATION_STORE: z.preprocess(blankAsUndefined, z.enum(['memory', 'file']).default('memory')),
    CONVERSATION_STORE_DIR: z.preprocess(blankAsUndefined, z.string().default('./.relay/threads')),
});

export type ConversationStoreKind = 'memory' | 'file';

export interface RelayConfig {
    openai: {
        apiKey?: string;
        baseURL: string;
        /** 小写的允许列表，空数组表示不限制 */
        allowedModels: string[];
        requestTimeoutMs?: number;
    };
    conversation: {
        ttlSeconds: number;
        maxTurns: number;
        store: ConversationStoreKind;
        storeDir: string;
    };
}

/**
 * @throws ConfigError 列出全部不合法的变量
 */
export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
    const parsed = relayEnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const values = parsed.data;
    return {
        openai: {
            apiKey: values.OPENAI_API_KEY,
            baseURL: values.OPENAI_BASE_URL,
            allowedModels: Array.from(parseAllowList(values.OPENAI_ALLOWED_MODELS) ?? []),
            requestTimeoutMs: values.OPENAI_REQUEST_TIMEOUT_MS,
        },
        conversation: {
            ttlSeconds: Math.round(values.CONVERSATION_TIMEOUT_HOURS * 3600),
            maxTurns: values.MAX_CONVERSATION_TURNS,
            store: values.CONVERSATION_STORE,
            storeDir: values.CONVERSATION_STORE_DIR,
        },
    };
}

/**
 * 加载 .env 文件到 process.env（已存在的变量不覆盖）
 *
 * @returns 文件是否被读取
 */
export function loadEnvFile(path: string = '.env'): boolean {
    const result = loadDotenv({ path });
    return result.error === undefined;
}
