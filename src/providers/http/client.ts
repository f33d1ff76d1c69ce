/**
 * HTTP 客户端
 *
 * - 单次请求执行，不做任何重试
 * - 取消与超时由调用方的 signal 控制；只有显式配置了 defaultTimeoutMs 才会兜底
 * - 失败统一归一化为分类后的 BackendError
 */

import type { LoggerLike } from '../../logger';
import {
    BackendAbortedError,
    BackendError,
    BackendTransientError,
    classifyAbortReason,
    createErrorFromStatus,
} from '../types';

export interface HttpClientOptions {
    /** 默认超时（毫秒，仅在调用方未传 signal 时生效；不设置则没有超时） */
    defaultTimeoutMs?: number;
    /** 替换全局 fetch */
    fetchImpl?: typeof fetch;
    logger?: LoggerLike;
}

const NETWORK_ERROR_CODES = [
    'ECONNRESET',
    'ECONNREFUSED',
    'ENOTFOUND',
    'EAI_AGAIN',
    'ETIMEDOUT',
    'UND_ERR_SOCKET',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
];

export class HTTPClient {
    readonly defaultTimeoutMs?: number;
    private readonly fetchImpl: typeof fetch;
    private readonly logger?: LoggerLike;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeoutMs = normalizeTimeoutMs(options.defaultTimeoutMs);
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.logger = options.logger;
    }

    /**
     * 单次 Fetch，非 2xx 响应抛出按状态码分类的错误
     */
    async fetch(url: string, options: RequestInit = {}): Promise<Response> {
        const requestOptions = this.applyDefaultSignal(options);
        const method = requestOptions.method ?? 'GET';

        try {
            this.logger?.debug('Sending request', {}, { method, url });
            const response = await this.fetchImpl(url, requestOptions);

            if (!response.ok) {
                const errorText = await response.text();
                throw createErrorFromStatus(
                    response.status,
                    response.statusText,
                    errorText,
                    parseRetryAfter(response.headers.get('retry-after'))
                );
            }

            return response;
        } catch (rawError) {
            const error = this.normalizeError(rawError, requestOptions.signal ?? undefined);
            this.logger?.debug('Request failed', {}, { method, url, code: error.code });
            throw error;
        }
    }

    private normalizeError(error: unknown, signal?: AbortSignal): BackendError {
        if (error instanceof BackendError) {
            return error;
        }

        if (signal?.aborted) {
            if (classifyAbortReason(signal.reason) === 'timeout') {
                return new BackendTransientError('Request timeout', 'TIMEOUT');
            }
            return new BackendAbortedError();
        }

        if (error instanceof Error && isBodyTimeoutLikeError(error)) {
            return new BackendTransientError('Response body timeout', 'BODY_TIMEOUT');
        }

        if (error instanceof Error && isNetworkLikeError(error)) {
            return new BackendTransientError(`Network request failed: ${error.message}`, 'NETWORK_ERROR');
        }

        const message = error instanceof Error ? error.message : String(error);
        return new BackendTransientError(`Request failed: ${message}`, 'UNKNOWN');
    }

    private applyDefaultSignal(options: RequestInit): RequestInit {
        if (options.signal || !this.defaultTimeoutMs) {
            return options;
        }
        return {
            ...options,
            signal: AbortSignal.timeout(this.defaultTimeoutMs),
        };
    }
}

function normalizeTimeoutMs(value: number | undefined): number | undefined {
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        return undefined;
    }
    return value;
}

function parseRetryAfter(header: string | null): number | undefined {
    if (!header) return undefined;
    const seconds = Number(header);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

function getErrorCode(error: Error): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    const cause = error.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;
    }
    return undefined;
}

function isBodyTimeoutLikeError(error: Error): boolean {
    const message = `${error.name} ${error.message}`.toLowerCase();
    return getErrorCode(error) === 'UND_ERR_BODY_TIMEOUT' || message.includes('body timeout') || message.includes('terminated');
}

function isNetworkLikeError(error: Error): boolean {
    const code = getErrorCode(error);
    if (!code) {
        // Node fetch (undici) 的网络失败以 TypeError 抛出
        return error instanceof TypeError;
    }
    return NETWORK_ERROR_CODES.includes(code);
}
