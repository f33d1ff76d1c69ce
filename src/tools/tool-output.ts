/**
 * 工具边界的结构化输出
 *
 * 校验、解析、后端与持久化错误在这里转为 status: 'error' 的载荷，不再向宿主抛出。
 */

import { StorageError } from '../memory';
import { BackendError, InvalidParameterError, ModelNotFoundError } from '../providers';

export type ToolStatus = 'success' | 'error';

export interface ToolOutput {
    status: ToolStatus;
    content: string;
    contentType: 'text' | 'markdown';
    metadata: Record<string, unknown>;
}

export function toolSuccess(content: string, metadata: Record<string, unknown> = {}): ToolOutput {
    return { status: 'success', content, contentType: 'markdown', metadata };
}

export function toolError(content: string, metadata: Record<string, unknown> = {}): ToolOutput {
    return { status: 'error', content, contentType: 'text', metadata };
}

/**
 * 已知错误转为错误载荷，其余错误原样抛出
 */
export function toToolError(error: unknown): ToolOutput {
    if (error instanceof ModelNotFoundError) {
        return toolError(error.message, { errorType: 'model_not_found', modelName: error.modelName });
    }
    if (error instanceof InvalidParameterError) {
        return toolError(error.message, {
            errorType: 'invalid_parameter',
            parameter: error.parameter,
            validationErrors: error.validationErrors,
        });
    }
    if (error instanceof BackendError) {
        return toolError(error.message, { errorType: 'backend', ...error.metadata });
    }
    if (error instanceof StorageError) {
        return toolError(error.message, { errorType: 'storage', operation: error.operation, key: error.key });
    }
    throw error;
}
