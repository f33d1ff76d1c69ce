/**
 * Adapter 测试
 */

import { describe, it, expect } from 'vitest';
import { ChatCompletionsAdapter } from './chat-completions';
import { ResponsesAdapter } from './responses';
import { ProviderError } from '../types';

describe('ChatCompletionsAdapter', () => {
    const adapter = new ChatCompletionsAdapter();

    it('should default to the chat completions path', () => {
        expect(adapter.getEndpointPath()).toBe('/chat/completions');
        expect(new ChatCompletionsAdapter({ endpointPath: '/v1/chat' }).getEndpointPath()).toBe('/v1/chat');
    });

    it('should build system and user messages', () => {
        const body = adapter.transformRequest({
            model: 'gpt-4o',
            prompt: 'Hello',
            systemPrompt: 'Be brief',
            temperature: 0.3,
            maxOutputTokens: 100,
            imageUrls: [],
        });

        expect(body).toEqual({
            model: 'gpt-4o',
            messages: [
                { role: 'system', content: 'Be brief' },
                { role: 'user', content: 'Hello' },
            ],
            temperature: 0.3,
            max_tokens: 100,
            stream: false,
        });
    });

    it('should omit unset optional fields', () => {
        const body = adapter.transformRequest({ model: 'o3', prompt: 'Hi', imageUrls: [] });

        expect(body).toEqual({ model: 'o3', messages: [{ role: 'user', content: 'Hi' }], stream: false });
    });

    it('should attach images as content parts', () => {
        const body = adapter.transformRequest({
            model: 'gpt-4o',
            prompt: 'Describe',
            imageUrls: ['data:image/png;base64,AAAA'],
        });

        expect(body.messages[0]?.content).toEqual([
            { type: 'text', text: 'Describe' },
            { type: 'image_url', image_url: { url: 'data:image/png;base64,AAAA' } },
        ]);
    });

    it('should normalize the first choice', () => {
        const result = adapter.transformResponse({
            id: 'chatcmpl-1',
            created: 1700000000,
            model: 'gpt-4o-2024-08-06',
            choices: [{ index: 0, message: { role: 'assistant', content: 'Hi there' }, finish_reason: 'stop' }],
            usage: { prompt_tokens: 5, completion_tokens: 3, total_tokens: 8 },
        });

        expect(result).toEqual({
            content: 'Hi there',
            usage: { inputTokens: 5, outputTokens: 3, totalTokens: 8 },
            finishReason: 'stop',
            id: 'chatcmpl-1',
            created: 1700000000,
            model: 'gpt-4o-2024-08-06',
        });
    });

    it('should default missing usage to zero', () => {
        const result = adapter.transformResponse({ choices: [{ message: { content: null } }] });

        expect(result.content).toBe('');
        expect(result.usage).toEqual({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });
        expect(result.finishReason).toBeNull();
    });

    it('should reject empty choices', () => {
        expect(() => adapter.transformResponse({ choices: [] })).toThrow(
            'Invalid chat_completions response: choices: Empty choices in response'
        );
    });

    it('should reject malformed bodies with an INVALID_RESPONSE error', () => {
        let caught: unknown;
        try {
            adapter.transformResponse('not json');
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(ProviderError);
        expect(caught).toMatchObject({ code: 'INVALID_RESPONSE' });
    });

    it('should set auth and organization headers', () => {
        const headers = adapter.getHeaders('test-secret', { organization: 'org-test' });

        expect(headers.get('Authorization')).toBe('Bearer test-secret');
        expect(headers.get('OpenAI-Organization')).toBe('org-test');
        expect(headers.get('Content-Type')).toBe('application/json');
    });
});

describe('ResponsesAdapter', () => {
    const adapter = new ResponsesAdapter();

    it('should build a single input block', () => {
        const body = adapter.transformRequest({
            model: 'o3-pro-2025-06-10',
            prompt: 'Prove it',
            systemPrompt: 'You are careful',
            temperature: 1,
            imageUrls: [],
        });

        expect(adapter.getEndpointPath()).toBe('/responses');
        expect(body).toEqual({
            model: 'o3-pro-2025-06-10',
            input: [{ role: 'user', content: [{ type: 'input_text', text: 'Prove it' }] }],
            instructions: 'You are careful',
            reasoning: { effort: 'medium' },
            store: true,
        });
        expect(body).not.toHaveProperty('temperature');
    });

    it('should prefer output_text', () => {
        const result = adapter.transformResponse({
            id: 'resp_1',
            status: 'completed',
            output_text: 'Done',
            usage: { input_tokens: 10, output_tokens: 4, total_tokens: 14 },
        });

        expect(result.content).toBe('Done');
        expect(result.finishReason).toBe('completed');
        expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 4, totalTokens: 14 });
    });

    it('should join message output parts when output_text is absent', () => {
        const result = adapter.transformResponse({
            output: [
                { type: 'reasoning', content: [{ type: 'summary_text', text: 'thinking' }] },
                {
                    type: 'message',
                    content: [
                        { type: 'output_text', text: 'Part one. ' },
                        { type: 'output_text', text: 'Part two.' },
                    ],
                },
            ],
        });

        expect(result.content).toBe('Part one. Part two.');
    });
});
