/**
 * Provider 错误类型定义
 *
 * - 解析类：ModelNotFoundError
 * - 参数类：InvalidParameterError
 * - 后端类：BackendError 及其分类子类（auth / rate_limit / transient / permanent / aborted）
 *
 * 本层不做任何重试，分类信息只作为元数据交给调用方决策。
 */

// =============================================================================
// 错误基类
// =============================================================================

export class ProviderError extends Error {
    constructor(
        message: string,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ProviderError';
    }
}

export class ModelNotFoundError extends ProviderError {
    constructor(
        public readonly modelName: string,
        message: string = `Model '${modelName}' is not available`
    ) {
        super(message, 'MODEL_NOT_FOUND');
        this.name = 'ModelNotFoundError';
    }
}

export class InvalidParameterError extends ProviderError {
    constructor(
        message: string,
        public readonly parameter: string,
        public readonly validationErrors: Record<string, string> = {}
    ) {
        super(message, 'INVALID_PARAMETER');
        this.name = 'InvalidParameterError';
    }
}

// =============================================================================
// 后端错误
// =============================================================================

export type BackendErrorClassification = 'auth' | 'rate_limit' | 'transient' | 'permanent' | 'aborted';

export interface BackendErrorMetadata {
    classification: BackendErrorClassification;
    retryable: boolean;
    statusCode?: number;
    retryAfter?: number;
    code?: string;
}

export class BackendError extends ProviderError {
    constructor(
        message: string,
        public readonly classification: BackendErrorClassification,
        public readonly statusCode?: number,
        code?: string,
        public readonly retryAfter?: number
    ) {
        super(message, code);
        this.name = 'BackendError';
    }

    /** 调用方据此决定是否重试，本层从不重试 */
    get retryable(): boolean {
        return this.classification === 'rate_limit' || this.classification === 'transient';
    }

    get metadata(): BackendErrorMetadata {
        return {
            classification: this.classification,
            retryable: this.retryable,
            statusCode: this.statusCode,
            retryAfter: this.retryAfter,
            code: this.code,
        };
    }
}

export class BackendAuthError extends BackendError {
    constructor(message: string, statusCode: number = 401) {
        super(message, 'auth', statusCode, 'AUTH_FAILED');
        this.name = 'BackendAuthError';
    }
}

export class BackendRateLimitError extends BackendError {
    constructor(message: string, retryAfter?: number) {
        super(message, 'rate_limit', 429, 'RATE_LIMIT', retryAfter);
        this.name = 'BackendRateLimitError';
    }
}

export class BackendTransientError extends BackendError {
    constructor(message: string, code: string, statusCode?: number, retryAfter?: number) {
        super(message, 'transient', statusCode, code, retryAfter);
        this.name = 'BackendTransientError';
    }
}

export class BackendPermanentError extends BackendError {
    constructor(message: string, statusCode?: number, code?: string) {
        super(message, 'permanent', statusCode, code);
        this.name = 'BackendPermanentError';
    }
}

export class BackendAbortedError extends BackendError {
    constructor(message: string = 'Request was cancelled') {
        super(message, 'aborted', undefined, 'ABORTED');
        this.name = 'BackendAbortedError';
    }
}

// =============================================================================
// 工具函数
// =============================================================================

export type AbortReasonCategory = 'timeout' | 'abort' | 'unknown';

export function classifyAbortReason(reason: unknown): AbortReasonCategory {
    const text =
        reason instanceof Error ? `${reason.name} ${reason.message}` : typeof reason === 'string' ? reason : '';
    const signature = text.trim().toLowerCase();
    if (!signature) {
        return 'unknown';
    }
    if (signature.includes('timeout') || signature.includes('timed out')) {
        return 'timeout';
    }
    if (signature.includes('abort') || signature.includes('cancel')) {
        return 'abort';
    }
    return 'unknown';
}

function extractErrorDetail(errorText: string): string {
    try {
        const parsed: unknown = JSON.parse(errorText);
        if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
            const inner = parsed.error;
            if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
                return inner.message;
            }
        }
    } catch {
        // 非 JSON 错误体，按原文返回
    }
    return errorText;
}

/**
 * 按 HTTP 状态码构造分类后的后端错误
 */
export function createErrorFromStatus(
    status: number,
    statusText: string,
    errorText: string,
    retryAfterMs?: number
): BackendError {
    const details = extractErrorDetail(errorText);
    const message = `${status} ${statusText}${details ? ` - ${details}` : ''}`;

    switch (status) {
        case 401:
        case 403:
            return new BackendAuthError(message, status);
        case 429:
            return new BackendRateLimitError(message, retryAfterMs);
        case 408:
            return new BackendTransientError(message, 'TIMEOUT', status, retryAfterMs);
        case 500:
        case 502:
        case 503:
        case 504:
            return new BackendTransientError(message, `SERVER_${status}`, status, retryAfterMs);
        case 400:
            return new BackendPermanentError(message, status, 'BAD_REQUEST');
        case 404:
            return new BackendPermanentError(message, status, 'NOT_FOUND');
        default:
            return new BackendPermanentError(message, status, `HTTP_${status}`);
    }
}

export function isBackendError(error: unknown): error is BackendError {
    return error instanceof BackendError;
}

export function isRetryableBackendError(error: unknown): error is BackendError {
    return error instanceof BackendError && error.retryable;
}
