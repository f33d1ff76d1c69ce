/**
 * 日志模块
 *
 * - 多级别日志 (TRACE … FATAL)
 * - 结构化 JSON / 美化输出
 * - 中间件：默认上下文、敏感字段脱敏
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'model-relay', level: LogLevel.DEBUG });
 * const registryLogger = logger.child('ProviderRegistry');
 * registryLogger.debug('Resolving provider', { model: 'pro' });
 * ```
 */

export * from './types';
export { defaultLoggerConfig, mergeConfig, getConfigForEnv, parseLoggerEnv } from './config';
export { Logger, ChildLogger, createLogger, getLogger, setDefaultLogger } from './logger';
export * from './formatters';
export * from './transports';
