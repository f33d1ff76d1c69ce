/**
 * 后端 API 相关类型定义
 *
 * 两种调用形态：
 * - chat_completions：role 消息列表 → choices
 * - responses：单个 input 块 → output 内容列表
 *
 * 响应体由 zod schema 校验后再进入 Provider。
 */

import { z } from 'zod';
import type { EndpointShape, ProviderKind } from './capabilities';

// =============================================================================
// 请求
// =============================================================================

export type Role = 'system' | 'user' | 'assistant';

export interface TextContentPart {
    type: 'text';
    text: string;
}

export interface ImageUrlContentPart {
    type: 'image_url';
    image_url: {
        url: string;
        detail?: 'auto' | 'low' | 'high';
    };
}

export type InputContentPart = TextContentPart | ImageUrlContentPart;

export type MessageContent = string | InputContentPart[];

export interface ChatMessage {
    role: Role;
    content: MessageContent;
}

export interface ChatCompletionRequestBody {
    model: string;
    messages: ChatMessage[];
    temperature?: number;
    max_tokens?: number;
    stream: false;
}

export type ResponsesInputPart = { type: 'input_text'; text: string } | { type: 'input_image'; image_url: string };

export interface ResponsesInputBlock {
    role: 'user';
    content: ResponsesInputPart[];
}

export interface ResponsesRequestBody {
    model: string;
    input: ResponsesInputBlock[];
    instructions?: string;
    reasoning: { effort: 'low' | 'medium' | 'high' };
    store: boolean;
    max_output_tokens?: number;
}

/**
 * 别名解析之后交给 Adapter 的生成请求
 */
export interface GenerationRequest {
    /** 规范模型名，绝不是别名 */
    model: string;
    prompt: string;
    systemPrompt?: string;
    temperature?: number;
    maxOutputTokens?: number;
    /** 已编码为 URL（data URI 或远程地址）的图片 */
    imageUrls: string[];
}

// =============================================================================
// 响应
// =============================================================================

export const chatCompletionResponseSchema = z.object({
    id: z.string().optional(),
    object: z.string().optional(),
    created: z.number().optional(),
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                index: z.number().optional(),
                message: z.object({
                    role: z.string().optional(),
                    content: z.string().nullable().optional(),
                }),
                finish_reason: z.string().nullable().optional(),
            })
        )
        .min(1, 'Empty choices in response'),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .partial()
        .optional(),
});

export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;

export const responsesResponseSchema = z.object({
    id: z.string().optional(),
    created_at: z.number().optional(),
    model: z.string().optional(),
    status: z.string().optional(),
    output_text: z.string().optional(),
    output: z
        .array(
            z.object({
                type: z.string(),
                content: z
                    .array(
                        z.object({
                            type: z.string(),
                            text: z.string().optional(),
                        })
                    )
                    .optional(),
            })
        )
        .optional(),
    usage: z
        .object({
            input_tokens: z.number(),
            output_tokens: z.number(),
            total_tokens: z.number(),
        })
        .partial()
        .optional(),
});

export type ResponsesResponse = z.infer<typeof responsesResponseSchema>;

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
}

/**
 * Adapter 归一化后的结果
 */
export interface AdapterResult {
    content: string;
    usage: TokenUsage;
    finishReason: string | null;
    id?: string;
    created?: number;
    /** 后端回报的模型名 */
    model?: string;
}

export interface ModelResponseMetadata {
    endpoint: EndpointShape;
    finishReason: string | null;
    id?: string;
    created?: number;
    /** 后端回报的模型名，可能与规范名不同（如带日期后缀） */
    backendModel?: string;
    [key: string]: unknown;
}

export interface ModelResponse {
    content: string;
    usage: TokenUsage;
    /** 规范模型名 */
    modelName: string;
    friendlyName: string;
    provider: ProviderKind;
    metadata: ModelResponseMetadata;
}

/**
 * generateContent 的可选参数
 */
export interface GenerateContentOptions {
    systemPrompt?: string;
    temperature?: number;
    maxOutputTokens?: number;
    /** 文件路径或 data URI */
    images?: string[];
    /** 由调用方控制取消与超时 */
    abortSignal?: AbortSignal;
}
