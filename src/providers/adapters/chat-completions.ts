/**
 * Chat Completions 适配器
 *
 * 请求：[system?, user] 消息列表，带图片时 user 内容为 text + image_url 数组
 * 响应：取第一个 choice 的 message.content
 */

import { BaseAPIAdapter } from './base';
import { chatCompletionResponseSchema } from '../types';
import type { AdapterResult, ChatCompletionRequestBody, ChatMessage, GenerationRequest, MessageContent } from '../types';

export class ChatCompletionsAdapter extends BaseAPIAdapter<ChatCompletionRequestBody> {
    readonly endpoint = 'chat_completions' as const;
    readonly endpointPath: string;

    constructor(options: { endpointPath?: string } = {}) {
        super();
        this.endpointPath = options.endpointPath ?? '/chat/completions';
    }

    transformRequest(request: GenerationRequest): ChatCompletionRequestBody {
        const messages: ChatMessage[] = [];
        if (request.systemPrompt) {
            messages.push({ role: 'system', content: request.systemPrompt });
        }
        messages.push({ role: 'user', content: this.buildUserContent(request) });

        const body: ChatCompletionRequestBody = {
            model: request.model,
            messages,
            stream: false,
        };
        if (request.temperature !== undefined) {
            body.temperature = request.temperature;
        }
        if (request.maxOutputTokens !== undefined) {
            body.max_tokens = request.maxOutputTokens;
        }
        return body;
    }

    private buildUserContent(request: GenerationRequest): MessageContent {
        if (request.imageUrls.length === 0) {
            return request.prompt;
        }
        return [
            { type: 'text', text: request.prompt },
            ...request.imageUrls.map((url) => ({ type: 'image_url' as const, image_url: { url } })),
        ];
    }

    transformResponse(response: unknown): AdapterResult {
        const data = this.parseResponse(chatCompletionResponseSchema, response);
        const [choice] = data.choices;
        const inputTokens = data.usage?.prompt_tokens ?? 0;
        const outputTokens = data.usage?.completion_tokens ?? 0;

        return {
            content: choice?.message.content ?? '',
            usage: {
                inputTokens,
                outputTokens,
                totalTokens: data.usage?.total_tokens ?? inputTokens + outputTokens,
            },
            finishReason: choice?.finish_reason ?? null,
            id: data.id,
            created: data.created,
            model: data.model,
        };
    }

    getEndpointPath(): string {
        return this.endpointPath;
    }
}
