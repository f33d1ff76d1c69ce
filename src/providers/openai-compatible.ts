/**
 * OpenAI 兼容 Provider
 *
 * 按模型能力记录选择调用形态（chat completions / responses），
 * 发送前始终把别名解析为规范名。
 *
 * @example
 * ```typescript
 * const provider = new OpenAICompatibleProvider({ apiKey: process.env.OPENAI_API_KEY ?? '' });
 * const response = await provider.generateContent('Explain closures', 'mini', { temperature: 1 });
 * console.log(response.modelName); // 'o4-mini'
 * ```
 */

import { getLogger } from '../logger';
import type { LoggerLike } from '../logger';
import { BaseAPIAdapter } from './adapters/base';
import { ChatCompletionsAdapter } from './adapters/chat-completions';
import { ResponsesAdapter } from './adapters/responses';
import { ModelCatalog, OPENAI_MODEL_DEFINITIONS } from './catalog';
import { HTTPClient } from './http/client';
import { encodeImage } from './images';
import { ModelProvider } from './provider';
import { DEFAULT_OPENAI_BASE_URL, ProviderError, defaultTemperature } from './types';
import type {
    EndpointShape,
    GenerateContentOptions,
    GenerationRequest,
    ModelCapabilities,
    ModelResponse,
    OpenAICompatibleConfig,
    ProviderKind,
} from './types';

export const OPENAI_CATALOG = new ModelCatalog('openai', OPENAI_MODEL_DEFINITIONS);

export interface OpenAICompatibleProviderOptions {
    catalog?: ModelCatalog;
    adapters?: Partial<Record<EndpointShape, BaseAPIAdapter>>;
}

export class OpenAICompatibleProvider extends ModelProvider {
    readonly config: Readonly<OpenAICompatibleConfig> & { baseURL: string };
    readonly httpClient: HTTPClient;
    readonly adapters: Readonly<Record<EndpointShape, BaseAPIAdapter>>;
    protected readonly logger: LoggerLike;

    constructor(config: OpenAICompatibleConfig, options: OpenAICompatibleProviderOptions = {}) {
        const logger = config.logger ?? getLogger().child('OpenAICompatibleProvider');
        super(options.catalog ?? OPENAI_CATALOG, { restrictions: config.restrictions, logger });
        this.logger = logger;

        // 规范化 baseURL（移除末尾斜杠）
        const baseURL = (config.baseURL ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, '');
        this.config = { ...config, baseURL };

        this.httpClient = new HTTPClient({
            defaultTimeoutMs: config.timeout,
            fetchImpl: config.fetchImpl,
            logger,
        });

        this.adapters = {
            chat_completions: options.adapters?.chat_completions ?? new ChatCompletionsAdapter(),
            responses: options.adapters?.responses ?? new ResponsesAdapter(),
        };
    }

    getProviderKind(): ProviderKind {
        return 'openai';
    }

    async generateContent(prompt: string, modelName: string, options: GenerateContentOptions = {}): Promise<ModelResponse> {
        const capabilities = this.getCapabilities(modelName);
        const adapter = this.adapters[capabilities.endpoint];
        const context = { model: capabilities.modelName, providerKind: this.getProviderKind() };

        const request: GenerationRequest = {
            model: capabilities.modelName,
            prompt,
            systemPrompt: options.systemPrompt,
            temperature: this.resolveTemperature(capabilities, options.temperature),
            maxOutputTokens: options.maxOutputTokens,
            imageUrls: await this.prepareImages(capabilities, options.images ?? []),
        };

        this.logger.info('Generating content', context, {
            requestedModel: modelName,
            endpoint: capabilities.endpoint,
            images: request.imageUrls.length,
        });

        const response = await this.httpClient.fetch(`${this.config.baseURL}${adapter.getEndpointPath()}`, {
            method: 'POST',
            headers: adapter.getHeaders(this.config.apiKey, { organization: this.config.organization }),
            body: JSON.stringify(adapter.transformRequest(request)),
            signal: options.abortSignal,
        });

        let data: unknown;
        try {
            data = await response.json();
        } catch (error) {
            throw new ProviderError(
                `Failed to parse response as JSON: ${error instanceof Error ? error.message : String(error)}`,
                'INVALID_JSON'
            );
        }

        const result = adapter.transformResponse(data);
        this.logger.debug('Content generated', context, { ...result.usage, finishReason: result.finishReason });

        return {
            content: result.content,
            usage: result.usage,
            modelName: capabilities.modelName,
            friendlyName: capabilities.friendlyName,
            provider: this.getProviderKind(),
            metadata: {
                endpoint: capabilities.endpoint,
                finishReason: result.finishReason,
                id: result.id,
                created: result.created,
                backendModel: result.model,
            },
        };
    }

    /**
     * 固定温度模型始终发送固定值；区间模型校验请求值，未给出时使用默认值
     */
    private resolveTemperature(capabilities: ModelCapabilities, requested: number | undefined): number {
        if (requested === undefined) {
            return defaultTemperature(capabilities.temperatureConstraint);
        }
        if (capabilities.temperatureConstraint.type === 'fixed') {
            return capabilities.temperatureConstraint.value;
        }
        this.validateParameters(capabilities.modelName, requested);
        return requested;
    }

    private async prepareImages(capabilities: ModelCapabilities, images: string[]): Promise<string[]> {
        if (images.length === 0) {
            return [];
        }
        if (!capabilities.supportsImages) {
            this.logger.warn('Model does not support images, dropping them', { model: capabilities.modelName }, {
                dropped: images.length,
            });
            return [];
        }
        return Promise.all(images.map((image) => encodeImage(image)));
    }
}
