/**
 * 模型能力类型定义
 *
 * 每个模型一条不可变的能力记录，由 Provider 的静态目录在启动时构建
 */

/**
 * Provider 厂商类型（目前只有 OpenAI 兼容一族）
 */
export type ProviderKind = 'openai';

export const PROVIDER_KINDS: readonly ProviderKind[] = ['openai'];

/**
 * 后端调用形态
 * - chat_completions: 标准 role 消息列表
 * - responses: 单个 input 块，仅用于扩展计算模型
 */
export type EndpointShape = 'chat_completions' | 'responses';

/**
 * 温度约束：固定值或数值区间
 */
export type TemperatureConstraint =
    | { readonly type: 'fixed'; readonly value: number }
    | { readonly type: 'range'; readonly min: number; readonly max: number; readonly default: number };

export interface ModelCapabilities {
    /** 规范模型名（后端期望的完整标识） */
    readonly modelName: string;
    readonly friendlyName: string;
    /** 上下文窗口 token 数 */
    readonly contextWindow: number;
    readonly maxOutputTokens: number;
    readonly provider: ProviderKind;
    /** 别名，大小写不敏感，同一 Provider 内唯一 */
    readonly aliases: readonly string[];
    readonly supportsExtendedThinking: boolean;
    readonly supportsSystemPrompts: boolean;
    readonly supportsStreaming: boolean;
    readonly supportsFunctionCalling: boolean;
    readonly supportsImages: boolean;
    /** 单次请求全部图片的总大小上限 (MB)，不支持图片时为 0 */
    readonly maxImageSizeMb: number;
    readonly temperatureConstraint: TemperatureConstraint;
    readonly endpoint: EndpointShape;
    readonly description: string;
}

export function fixedTemperature(value: number): TemperatureConstraint {
    return { type: 'fixed', value };
}

export function rangeTemperature(min: number, max: number, defaultValue: number): TemperatureConstraint {
    return { type: 'range', min, max, default: defaultValue };
}

export function validateTemperature(constraint: TemperatureConstraint, temperature: number): boolean {
    if (constraint.type === 'fixed') {
        return Math.abs(temperature - constraint.value) < 1e-6;
    }
    return temperature >= constraint.min && temperature <= constraint.max;
}

export function defaultTemperature(constraint: TemperatureConstraint): number {
    return constraint.type === 'fixed' ? constraint.value : constraint.default;
}

/**
 * 把温度修正到约束允许的最近值
 */
export function correctTemperature(constraint: TemperatureConstraint, temperature: number): number {
    if (constraint.type === 'fixed') {
        return constraint.value;
    }
    return Math.min(constraint.max, Math.max(constraint.min, temperature));
}

export function describeTemperatureConstraint(constraint: TemperatureConstraint): string {
    if (constraint.type === 'fixed') {
        return `fixed at ${constraint.value}`;
    }
    return `between ${constraint.min} and ${constraint.max}`;
}
