/**
 * 基础 API 适配器
 *
 * 负责某一种调用形态的请求/响应转换，Provider 只负责发送。
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { ProviderError } from '../types';
import type { AdapterResult, EndpointShape, GenerationRequest } from '../types';

export interface AdapterHeaderOptions {
    organization?: string;
}

export abstract class BaseAPIAdapter<TBody extends object = object> {
    abstract readonly endpoint: EndpointShape;

    /**
     * 将生成请求转换为后端请求体
     */
    abstract transformRequest(request: GenerationRequest): TBody;

    /**
     * 将后端响应转换为统一结果
     */
    abstract transformResponse(response: unknown): AdapterResult;

    /**
     * 端点路径，例如 '/chat/completions'
     */
    abstract getEndpointPath(): string;

    getHeaders(apiKey: string, options: AdapterHeaderOptions = {}): Headers {
        const headers = new Headers({
            'Content-Type': 'application/json',
            Authorization: `Bearer ${apiKey}`,
        });
        if (options.organization) {
            headers.set('OpenAI-Organization', options.organization);
        }
        return headers;
    }

    /**
     * 用 schema 校验响应体，失败时抛出 INVALID_RESPONSE
     */
    protected parseResponse<T>(schema: ZodType<T, ZodTypeDef, unknown>, response: unknown): T {
        const result = schema.safeParse(response);
        if (!result.success) {
            const details = result.error.issues
                .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
                .join('; ');
            throw new ProviderError(`Invalid ${this.endpoint} response: ${details}`, 'INVALID_RESPONSE');
        }
        return result.data;
    }
}
