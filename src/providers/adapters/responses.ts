/**
 * Responses 适配器
 *
 * 扩展计算模型（o3-pro）使用的调用形态：单个 user input 块，
 * 系统提示走 instructions，不发送 temperature。
 */

import { BaseAPIAdapter } from './base';
import { responsesResponseSchema } from '../types';
import type {
    AdapterResult,
    GenerationRequest,
    ResponsesInputPart,
    ResponsesRequestBody,
    ResponsesResponse,
} from '../types';

export class ResponsesAdapter extends BaseAPIAdapter<ResponsesRequestBody> {
    readonly endpoint = 'responses' as const;
    readonly endpointPath: string;

    constructor(options: { endpointPath?: string } = {}) {
        super();
        this.endpointPath = options.endpointPath ?? '/responses';
    }

    transformRequest(request: GenerationRequest): ResponsesRequestBody {
        const content: ResponsesInputPart[] = [
            { type: 'input_text', text: request.prompt },
            ...request.imageUrls.map((url) => ({ type: 'input_image' as const, image_url: url })),
        ];

        const body: ResponsesRequestBody = {
            model: request.model,
            input: [{ role: 'user', content }],
            reasoning: { effort: 'medium' },
            store: true,
        };
        if (request.systemPrompt) {
            body.instructions = request.systemPrompt;
        }
        if (request.maxOutputTokens !== undefined) {
            body.max_output_tokens = request.maxOutputTokens;
        }
        return body;
    }

    transformResponse(response: unknown): AdapterResult {
        const data = this.parseResponse(responsesResponseSchema, response);
        const inputTokens = data.usage?.input_tokens ?? 0;
        const outputTokens = data.usage?.output_tokens ?? 0;

        return {
            content: data.output_text ?? this.collectOutputText(data.output ?? []),
            usage: {
                inputTokens,
                outputTokens,
                totalTokens: data.usage?.total_tokens ?? inputTokens + outputTokens,
            },
            finishReason: data.status ?? null,
            id: data.id,
            created: data.created_at,
            model: data.model,
        };
    }

    private collectOutputText(output: NonNullable<ResponsesResponse['output']>): string {
        return output
            .filter((item) => item.type === 'message')
            .flatMap((item) => item.content ?? [])
            .filter((part) => part.type === 'output_text')
            .map((part) => part.text ?? '')
            .join('');
    }

    getEndpointPath(): string {
        return this.endpointPath;
    }
}
