/**
 * OpenAI 兼容模型目录
 *
 * 以规范模型名为键的静态能力表，启动时构建一次，之后不再修改
 */

import { fixedTemperature, rangeTemperature } from '../types';
import type { ModelCapabilities } from '../types';

export const OPENAI_MODEL_DEFINITIONS: readonly ModelCapabilities[] = [
    {
        modelName: 'o3',
        friendlyName: 'OpenAI (O3)',
        contextWindow: 200_000,
        maxOutputTokens: 65_536,
        provider: 'openai',
        aliases: [],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: true,
        supportsFunctionCalling: true,
        supportsImages: true,
        maxImageSizeMb: 20,
        temperatureConstraint: fixedTemperature(1.0),
        endpoint: 'chat_completions',
        description: 'Strong reasoning (200K context) - Logical problems, code generation, systematic analysis',
    },
    {
        modelName: 'o3-mini',
        friendlyName: 'OpenAI (O3-mini)',
        contextWindow: 200_000,
        maxOutputTokens: 65_536,
        provider: 'openai',
        aliases: ['o3mini'],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: true,
        supportsFunctionCalling: true,
        supportsImages: false,
        maxImageSizeMb: 0,
        temperatureConstraint: fixedTemperature(1.0),
        endpoint: 'chat_completions',
        description: 'Fast O3 variant (200K context) - Balanced performance/speed, moderate complexity',
    },
    {
        modelName: 'o3-pro-2025-06-10',
        friendlyName: 'OpenAI (O3-Pro)',
        contextWindow: 200_000,
        maxOutputTokens: 65_536,
        provider: 'openai',
        aliases: ['o3-pro'],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: false,
        supportsFunctionCalling: true,
        supportsImages: true,
        maxImageSizeMb: 20,
        temperatureConstraint: fixedTemperature(1.0),
        endpoint: 'responses',
        description: 'Professional-grade reasoning (200K context) - EXTREMELY EXPENSIVE: only for the most complex problems',
    },
    {
        modelName: 'o4-mini',
        friendlyName: 'OpenAI (O4-mini)',
        contextWindow: 200_000,
        maxOutputTokens: 65_536,
        provider: 'openai',
        aliases: ['mini', 'o4mini'],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: true,
        supportsFunctionCalling: true,
        supportsImages: true,
        maxImageSizeMb: 20,
        temperatureConstraint: fixedTemperature(1.0),
        endpoint: 'chat_completions',
        description: 'Latest reasoning model (200K context) - Optimized for shorter contexts, rapid reasoning',
    },
    {
        modelName: 'gpt-4o',
        friendlyName: 'OpenAI (GPT-4o)',
        contextWindow: 128_000,
        maxOutputTokens: 16_384,
        provider: 'openai',
        aliases: ['4o'],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: true,
        supportsFunctionCalling: true,
        supportsImages: true,
        maxImageSizeMb: 20,
        temperatureConstraint: rangeTemperature(0, 2, 0.7),
        endpoint: 'chat_completions',
        description: 'Balanced multimodal model (128K context) - General purpose analysis and code review',
    },
    {
        modelName: 'gpt-4o-mini',
        friendlyName: 'OpenAI (GPT-4o mini)',
        contextWindow: 128_000,
        maxOutputTokens: 16_384,
        provider: 'openai',
        aliases: ['4o-mini'],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: true,
        supportsFunctionCalling: true,
        supportsImages: true,
        maxImageSizeMb: 20,
        temperatureConstraint: rangeTemperature(0, 2, 0.7),
        endpoint: 'chat_completions',
        description: 'Fast and inexpensive (128K context) - Quick iterations and simple tasks',
    },
    {
        modelName: 'gemini-2.5-pro',
        friendlyName: 'Gemini (Pro 2.5)',
        contextWindow: 1_048_576,
        maxOutputTokens: 65_536,
        provider: 'openai',
        aliases: ['pro'],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: true,
        supportsFunctionCalling: true,
        supportsImages: true,
        maxImageSizeMb: 32,
        temperatureConstraint: rangeTemperature(0, 2, 0.7),
        endpoint: 'chat_completions',
        description: 'Advanced reasoning (1M context) - Complex problems, architecture, deep analysis',
    },
    {
        modelName: 'gemini-2.5-flash',
        friendlyName: 'Gemini (Flash 2.5)',
        contextWindow: 1_048_576,
        maxOutputTokens: 65_536,
        provider: 'openai',
        aliases: ['flash'],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: true,
        supportsFunctionCalling: true,
        supportsImages: true,
        maxImageSizeMb: 20,
        temperatureConstraint: rangeTemperature(0, 2, 0.7),
        endpoint: 'chat_completions',
        description: 'Ultra-fast (1M context) - Quick analysis, simple queries, rapid iterations',
    },
];
