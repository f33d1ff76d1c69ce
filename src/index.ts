/**
 * 包入口
 *
 * @example
 * ```typescript
 * import { createRelayRuntime, loadEnvFile, loadRelayConfig } from 'model-relay';
 *
 * loadEnvFile();
 * const runtime = createRelayRuntime(loadRelayConfig());
 * const provider = runtime.registry.getProviderForModel('mini');
 * const response = await provider?.generateContent('Summarize the diff', 'mini');
 * ```
 */

export * from './providers';
export * from './memory';
export * from './tools';
export * from './config';
export * from './logger';
export * from './runtime';
