/**
 * 模型目录测试
 */

import { describe, it, expect, vi } from 'vitest';
import { ModelCatalog, CatalogDefinitionError } from './model-catalog';
import { OPENAI_MODEL_DEFINITIONS } from './openai-models';
import { fixedTemperature } from '../types';
import type { ModelCapabilities } from '../types';
import { ModelRestrictionService, UNRESTRICTED } from '../restrictions';

function makeModel(overrides: Partial<ModelCapabilities> & { modelName: string }): ModelCapabilities {
    return {
        friendlyName: overrides.modelName,
        contextWindow: 1000,
        maxOutputTokens: 100,
        provider: 'openai',
        aliases: [],
        supportsExtendedThinking: false,
        supportsSystemPrompts: true,
        supportsStreaming: false,
        supportsFunctionCalling: false,
        supportsImages: false,
        maxImageSizeMb: 0,
        temperatureConstraint: fixedTemperature(1),
        endpoint: 'chat_completions',
        description: '',
        ...overrides,
    };
}

describe('ModelCatalog', () => {
    const catalog = new ModelCatalog('openai', OPENAI_MODEL_DEFINITIONS);

    describe('resolve', () => {
        it('should return canonical names unchanged', () => {
            expect(catalog.resolve('o3')).toEqual({ resolved: true, canonicalName: 'o3' });
        });

        it('should resolve aliases case-insensitively', () => {
            expect(catalog.resolve('MINI')).toEqual({ resolved: true, canonicalName: 'o4-mini', matchedAlias: 'MINI' });
            expect(catalog.resolveModelName('o3-pro')).toBe('o3-pro-2025-06-10');
            expect(catalog.resolveModelName('pro')).toBe('gemini-2.5-pro');
            expect(catalog.resolveModelName('flash')).toBe('gemini-2.5-flash');
            expect(catalog.resolveModelName('o4mini')).toBe('o4-mini');
        });

        it('should match canonical names regardless of case', () => {
            expect(catalog.resolveModelName('GPT-4o')).toBe('gpt-4o');
        });

        it('should pass unknown names through', () => {
            expect(catalog.resolve('gpt-4')).toEqual({ resolved: false, name: 'gpt-4' });
            expect(catalog.resolveModelName('gemini-pro')).toBe('gemini-pro');
        });

        it('should be idempotent for canonical names, aliases and unknown names', () => {
            const names = [...catalog.listModels({ respectRestrictions: false }), 'MINI', 'GPT-4o', 'gpt-4', 'gemini-pro'];

            for (const name of names) {
                const once = catalog.resolveModelName(name);
                expect(catalog.resolveModelName(once)).toBe(once);
            }
        });
    });

    describe('getModelConfigurations', () => {
        it('should key every record by its canonical name', () => {
            for (const [name, capabilities] of catalog.getModelConfigurations()) {
                expect(capabilities.modelName).toBe(name);
                expect(capabilities.provider).toBe('openai');
                expect(capabilities.contextWindow).toBeGreaterThan(0);
            }
        });

        it('should describe the o3 model', () => {
            const o3 = catalog.get('o3');
            expect(o3?.friendlyName).toBe('OpenAI (O3)');
            expect(o3?.contextWindow).toBe(200_000);
            expect(o3?.temperatureConstraint).toEqual({ type: 'fixed', value: 1.0 });
        });

        it('should freeze the records', () => {
            const o3 = catalog.get('o3');
            expect(Object.isFrozen(o3)).toBe(true);
            expect(Object.isFrozen(o3?.aliases)).toBe(true);
        });
    });

    describe('listModels', () => {
        it('should list canonical names followed by their aliases', () => {
            const names = catalog.listModels({ respectRestrictions: false });
            expect(names.slice(0, 3)).toEqual(['o3', 'o3-mini', 'o3mini']);
            expect(names).toContain('o3-pro');
            expect(names).toContain('gemini-2.5-flash');
            expect(names).toHaveLength(16);
        });

        it('should not consult the policy when restrictions are ignored', () => {
            const policy = { isAllowed: vi.fn(() => false) };
            catalog.listModels({ respectRestrictions: false, restrictions: policy });
            expect(policy.isAllowed).not.toHaveBeenCalled();
        });

        it('should call the policy once per model when everything is allowed', () => {
            const policy = { isAllowed: vi.fn(UNRESTRICTED.isAllowed) };
            catalog.listModels({ respectRestrictions: true, restrictions: policy });
            expect(policy.isAllowed).toHaveBeenCalledTimes(OPENAI_MODEL_DEFINITIONS.length);
        });

        it('should apply the same rule to listings and single models', () => {
            const restrictions = new ModelRestrictionService({ openai: ['mini'] });
            const o4mini = catalog.get('o4-mini');
            const o3 = catalog.get('o3');
            if (!o4mini || !o3) throw new Error('missing catalog entries');

            expect(catalog.isModelAllowed(restrictions, o4mini)).toBe(true);
            expect(catalog.isModelAllowed(restrictions, o4mini, 'o4mini')).toBe(true);
            expect(catalog.isModelAllowed(restrictions, o3, 'o3')).toBe(false);
            expect(catalog.isModelAllowed(undefined, o3)).toBe(true);
        });

        it('should keep models allowed by canonical name or alias', () => {
            const restrictions = new ModelRestrictionService({ openai: ['o3', 'mini'] });
            expect(catalog.listModels({ respectRestrictions: true, restrictions })).toEqual(['o3', 'o4-mini', 'mini', 'o4mini']);
        });
    });

    describe('construction', () => {
        it('should reject duplicate aliases', () => {
            expect(
                () =>
                    new ModelCatalog('openai', [
                        makeModel({ modelName: 'a', aliases: ['fast'] }),
                        makeModel({ modelName: 'b', aliases: ['FAST'] }),
                    ])
            ).toThrow(CatalogDefinitionError);
        });

        it('should reject an alias that shadows another model name', () => {
            expect(
                () => new ModelCatalog('openai', [makeModel({ modelName: 'a' }), makeModel({ modelName: 'b', aliases: ['A'] })])
            ).toThrow("Alias 'A' of 'b' collides with 'a'");
        });

        it('should reject a non-positive context window', () => {
            expect(() => new ModelCatalog('openai', [makeModel({ modelName: 'a', contextWindow: 0 })])).toThrow(
                'positive context window'
            );
        });
    });
});
