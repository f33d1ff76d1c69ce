/**
 * 回退模型选择策略
 */

export type ToolModelCategory = 'extended_reasoning' | 'fast_response' | 'balanced';

export interface FallbackPolicy {
    preferences: readonly string[];
    /** 没有任何可用模型时返回 */
    defaultModel: string;
}

export const FALLBACK_POLICIES: Readonly<Record<ToolModelCategory, FallbackPolicy>> = {
    extended_reasoning: { preferences: ['o3', 'o3-pro'], defaultModel: 'gpt-4' },
    fast_response: { preferences: ['o4-mini', 'o3-mini', 'flash', 'gpt-4o-mini'], defaultModel: 'gpt-4o-mini' },
    balanced: { preferences: ['o4-mini', 'o3-mini', 'pro', 'gpt-4o'], defaultModel: 'gpt-4o' },
};

/**
 * 偏好列表中第一个可用的模型 → 任一可用模型 → 类别默认值
 */
export function selectFallbackModel(category: ToolModelCategory | undefined, availableModels: Iterable<string>): string {
    const policy = FALLBACK_POLICIES[category ?? 'balanced'];
    const available = [...availableModels];
    const availableSet = new Set(available);

    const preferred = policy.preferences.find((name) => availableSet.has(name));
    if (preferred) {
        return preferred;
    }
    return available[0] ?? policy.defaultModel;
}
