/**
 * 日志模块配置
 */

import type { ConsoleTransportConfig, LoggerConfig, LogLevel } from './types';
import { LogLevel as Lvl } from './types';

const LOGGER_ENVS: ReadonlyArray<LoggerConfig['env']> = ['development', 'staging', 'production', 'test'];

function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
    if (!raw) return fallback;
    const value = Number(raw);
    const validLevels: LogLevel[] = [Lvl.TRACE, Lvl.DEBUG, Lvl.INFO, Lvl.WARN, Lvl.ERROR, Lvl.FATAL];
    return validLevels.find((level) => level === value) ?? fallback;
}

function parseBoolean(raw: string | undefined): boolean | undefined {
    if (!raw) return undefined;
    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return undefined;
}

function parseFormat(raw: string | undefined): 'json' | 'pretty' | undefined {
    if (!raw) return undefined;
    const value = raw.trim().toLowerCase();
    return value === 'json' || value === 'pretty' ? value : undefined;
}

function parseStream(raw: string | undefined): 'stdout' | 'stderr' | undefined {
    if (!raw) return undefined;
    const value = raw.trim().toLowerCase();
    return value === 'stdout' || value === 'stderr' ? value : undefined;
}

export function parseLoggerEnv(raw: string | undefined): LoggerConfig['env'] | undefined {
    if (!raw) return undefined;
    const value = raw.trim().toLowerCase();
    return LOGGER_ENVS.find((env) => env === value);
}

/**
 * 只收集环境变量中显式设置的控制台选项，避免 undefined 覆盖低优先级配置
 */
function getConsoleOverrides(): ConsoleTransportConfig {
    const overrides: ConsoleTransportConfig = {};
    const enabled = parseBoolean(process.env.LOG_CONSOLE_ENABLED);
    const format = parseFormat(process.env.LOG_CONSOLE_FORMAT);
    const colorize = parseBoolean(process.env.LOG_CONSOLE_COLORIZE);
    const stream = parseStream(process.env.LOG_CONSOLE_STREAM);

    if (enabled !== undefined) overrides.enabled = enabled;
    if (format !== undefined) overrides.format = format;
    if (colorize !== undefined) overrides.colorize = colorize;
    if (stream !== undefined) overrides.stream = stream;
    return overrides;
}

function getEnvOverrides(baseConfig: LoggerConfig): Partial<LoggerConfig> {
    const sensitiveFields = process.env.LOG_SENSITIVE_FIELDS
        ? process.env.LOG_SENSITIVE_FIELDS.split(',')
              .map((field) => field.trim())
              .filter(Boolean)
        : undefined;

    return {
        service: process.env.LOG_SERVICE?.trim() || baseConfig.service,
        level: parseLogLevel(process.env.LOG_LEVEL, baseConfig.level),
        sensitiveFields: sensitiveFields || baseConfig.sensitiveFields,
        console: getConsoleOverrides(),
    };
}

export const defaultLoggerConfig: LoggerConfig = {
    service: 'model-relay',
    env: parseLoggerEnv(process.env.NODE_ENV) ?? 'development',
    level: Lvl.INFO,
    console: {
        enabled: true,
        level: Lvl.TRACE,
        format: 'pretty',
        colorize: true,
        timestamp: true,
    },
    sensitiveFields: ['apiKey', 'api_key', 'password', 'token', 'secret', 'authorization'],
};

export const developmentConfig: Partial<LoggerConfig> = {
    level: Lvl.DEBUG,
    console: {
        enabled: true,
        format: 'pretty',
        colorize: true,
        timestamp: true,
    },
};

export const productionConfig: Partial<LoggerConfig> = {
    level: Lvl.INFO,
    console: {
        enabled: true,
        format: 'json',
        colorize: false,
        level: Lvl.INFO,
    },
};

export const testConfig: Partial<LoggerConfig> = {
    level: Lvl.WARN,
    console: {
        enabled: false,
    },
};

export function getConfigForEnv(env: LoggerConfig['env']): Partial<LoggerConfig> {
    switch (env) {
        case 'production':
        case 'staging':
            return productionConfig;
        case 'test':
            return testConfig;
        case 'development':
        default:
            return developmentConfig;
    }
}

/**
 * 合并配置
 *
 * 优先级：用户配置 > 环境变量 > 环境预设 > 默认配置
 */
export function mergeConfig(userConfig?: Partial<LoggerConfig>): LoggerConfig {
    const env = userConfig?.env || parseLoggerEnv(process.env.LOG_ENV) || defaultLoggerConfig.env;
    const envConfig = getConfigForEnv(env);
    const baseConfig: LoggerConfig = {
        ...defaultLoggerConfig,
        ...envConfig,
        env,
        console: {
            ...defaultLoggerConfig.console,
            ...envConfig.console,
        },
    };
    const envOverrides = getEnvOverrides(baseConfig);

    return {
        ...baseConfig,
        ...envOverrides,
        ...userConfig,
        env,
        console: {
            ...baseConfig.console,
            ...envOverrides.console,
            ...userConfig?.console,
        },
    };
}
