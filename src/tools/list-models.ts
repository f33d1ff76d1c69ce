/**
 * 模型列表（Markdown）
 *
 * 按 Provider 类型输出配置状态、可用模型（含上下文大小与说明）和别名映射。
 */

import { API_KEY_ENV_VARS, PROVIDER_PRIORITY_ORDER } from '../providers';
import type { ProviderKind, ProviderRegistry } from '../providers';
import { toolSuccess } from './tool-output';
import type { ToolOutput } from './tool-output';

const PROVIDER_TITLES: Record<ProviderKind, string> = {
    openai: 'OpenAI-compatible Models',
};

export function formatContextWindow(tokens: number): string {
    if (tokens >= 1_000_000) {
        return `${Math.floor(tokens / 1_000_000)}M`;
    }
    if (tokens >= 1_000) {
        return `${Math.floor(tokens / 1_000)}K`;
    }
    return String(tokens);
}

export function formatModelListing(registry: ProviderRegistry): string {
    const available = registry.getAvailableModels(true);
    const lines: string[] = ['# Available AI Models', ''];
    let configuredProviders = 0;

    for (const kind of PROVIDER_PRIORITY_ORDER) {
        const provider = registry.getProvider(kind);

        lines.push(`## ${PROVIDER_TITLES[kind]} ${provider ? '✅' : '❌'}`);
        if (!provider) {
            lines.push(`**Status**: Not configured (set ${API_KEY_ENV_VARS[kind]})`, '');
            continue;
        }

        configuredProviders += 1;
        lines.push('**Status**: Configured and available', '', '**Models**:');

        const aliases: Array<[string, string]> = [];
        for (const capabilities of provider.getModelConfigurations().values()) {
            if (available.get(capabilities.modelName) !== kind) continue;

            lines.push(`- \`${capabilities.modelName}\` - ${formatContextWindow(capabilities.contextWindow)} context`);
            if (capabilities.description) {
                lines.push(`  - ${capabilities.description}`);
            }
            for (const alias of capabilities.aliases) {
                aliases.push([alias, capabilities.modelName]);
            }
        }

        if (aliases.length > 0) {
            lines.push('', '**Aliases**:');
            aliases.sort(([a], [b]) => a.localeCompare(b));
            for (const [alias, target] of aliases) {
                lines.push(`- \`${alias}\` → \`${target}\``);
            }
        }
        lines.push('');
    }

    lines.push('## Summary', `**Configured Providers**: ${configuredProviders}`, `**Total Available Models**: ${available.size}`);
    return lines.join('\n');
}

export function listModelsTool(registry: ProviderRegistry): ToolOutput {
    return toolSuccess(formatModelListing(registry), { totalModels: registry.getAvailableModels(true).size });
}

