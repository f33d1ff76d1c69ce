/**
 * Provider 抽象基类
 *
 * 每个 Provider 持有一份静态能力目录；别名解析、能力查询、限制校验在基类完成，
 * 子类只负责把请求发往后端。
 */

import type { LoggerLike } from '../logger';
import type { ModelCatalog } from './catalog';
import type { RestrictionPolicy } from './restrictions';
import {
    InvalidParameterError,
    ModelNotFoundError,
    describeTemperatureConstraint,
    validateTemperature,
} from './types';
import type { GenerateContentOptions, ModelCapabilities, ModelResponse, ProviderKind } from './types';

/** 粗略估算：约 4 个字符一个 token */
const CHARS_PER_TOKEN = 4;

export abstract class ModelProvider {
    protected readonly catalog: ModelCatalog;
    protected readonly restrictions?: RestrictionPolicy;
    protected readonly logger?: LoggerLike;

    protected constructor(catalog: ModelCatalog, options: { restrictions?: RestrictionPolicy; logger?: LoggerLike } = {}) {
        this.catalog = catalog;
        this.restrictions = options.restrictions;
        this.logger = options.logger;
    }

    abstract getProviderKind(): ProviderKind;

    /**
     * 生成回复
     * @param modelName 规范名或别名，发送前解析为规范名
     */
    abstract generateContent(prompt: string, modelName: string, options?: GenerateContentOptions): Promise<ModelResponse>;

    getModelConfigurations(): ReadonlyMap<string, ModelCapabilities> {
        return this.catalog.getModelConfigurations();
    }

    /**
     * 列出规范名和别名
     *
     * respectRestrictions 为 false 时不咨询限制策略；过滤只在这里发生一次。
     */
    listModels(respectRestrictions: boolean): string[] {
        return this.catalog.listModels({ respectRestrictions, restrictions: this.restrictions });
    }

    resolveModelName(modelName: string): string {
        return this.catalog.resolveModelName(modelName);
    }

    /**
     * 模型能被解析且未被限制时返回 true
     */
    validateModelName(modelName: string): boolean {
        const resolution = this.catalog.resolve(modelName);
        const capabilities = resolution.resolved ? this.catalog.get(resolution.canonicalName) : undefined;
        if (!capabilities) {
            return false;
        }
        if (!this.catalog.isModelAllowed(this.restrictions, capabilities, modelName)) {
            this.logger?.debug('Model rejected by restriction policy', { model: modelName });
            return false;
        }
        return true;
    }

    /**
     * @throws ModelNotFoundError 无法解析或被限制的模型
     */
    getCapabilities(modelName: string): ModelCapabilities {
        const resolution = this.catalog.resolve(modelName);
        const capabilities = resolution.resolved ? this.catalog.get(resolution.canonicalName) : undefined;
        if (!capabilities) {
            throw new ModelNotFoundError(modelName);
        }
        if (!this.catalog.isModelAllowed(this.restrictions, capabilities, modelName)) {
            throw new ModelNotFoundError(modelName, `Model '${modelName}' is not allowed by restriction policy`);
        }
        return capabilities;
    }

    /**
     * 该族模型均不支持思考模式
     */
    supportsThinkingMode(_modelName: string): boolean {
        return false;
    }

    /**
     * @throws InvalidParameterError 温度超出模型约束
     */
    validateParameters(modelName: string, temperature: number): void {
        const capabilities = this.getCapabilities(modelName);
        const constraint = capabilities.temperatureConstraint;
        if (!validateTemperature(constraint, temperature)) {
            const expected = describeTemperatureConstraint(constraint);
            throw new InvalidParameterError(
                `Temperature ${temperature} is invalid for model ${capabilities.modelName}: must be ${expected}`,
                'temperature',
                { temperature: expected }
            );
        }
    }

    countTokens(text: string): number {
        return Math.ceil(text.length / CHARS_PER_TOKEN);
    }
}
