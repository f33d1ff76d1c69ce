/**
 * Provider 配置类型定义
 */

import type { LoggerLike } from '../../logger';
import type { RestrictionPolicy } from '../restrictions';

export interface BaseProviderConfig {
    /** API 密钥或凭证 */
    apiKey: string;
    /** API 基础 URL */
    baseURL?: string;
    /**
     * 请求超时（毫秒）
     * 不设置则不施加默认超时，由调用方通过 abortSignal 控制
     */
    timeout?: number;
    /** 模型限制策略，未提供时不做限制 */
    restrictions?: RestrictionPolicy;
    logger?: LoggerLike;
}

/**
 * OpenAI 兼容服务配置
 */
export interface OpenAICompatibleConfig extends BaseProviderConfig {
    /** 可选的组织 ID（部分提供商需要） */
    organization?: string;
    /** 替换全局 fetch，便于测试或自定义代理 */
    fetchImpl?: typeof fetch;
}

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
