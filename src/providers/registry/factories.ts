/**
 * Provider 工厂
 *
 * 注册表只保存工厂函数，实例在首次获取时才创建
 */

import type { LoggerLike } from '../../logger';
import { OpenAICompatibleProvider } from '../openai-compatible';
import type { ModelProvider } from '../provider';
import type { RestrictionPolicy } from '../restrictions';

export interface ProviderInit {
    apiKey: string;
    restrictions?: RestrictionPolicy;
}

export type ProviderFactory = (init: ProviderInit) => ModelProvider;

export interface OpenAICompatibleFactoryOptions {
    baseURL?: string;
    timeout?: number;
    organization?: string;
    fetchImpl?: typeof fetch;
    logger?: LoggerLike;
}

export function createOpenAICompatibleFactory(options: OpenAICompatibleFactoryOptions = {}): ProviderFactory {
    return ({ apiKey, restrictions }) => new OpenAICompatibleProvider({ ...options, apiKey, restrictions });
}
