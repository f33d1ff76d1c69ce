/**
 * 日志模块类型定义
 */

/**
 * 日志级别
 */
export enum LogLevel {
    TRACE = 0,
    DEBUG = 10,
    INFO = 20,
    WARN = 30,
    ERROR = 40,
    FATAL = 50,
}

export const LogLevelName: Record<LogLevel, string> = {
    [LogLevel.TRACE]: 'TRACE',
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR',
    [LogLevel.FATAL]: 'FATAL',
};

/**
 * 日志上下文信息
 */
export interface LogContext {
    /** 会话线程 ID */
    threadId?: string;
    /** 请求 ID */
    requestId?: string;
    /** 工具名称 */
    toolName?: string;
    /** 模型名称（可能是别名） */
    model?: string;
    /** Provider 类型 */
    providerKind?: string;
    [key: string]: unknown;
}

/**
 * 日志记录结构
 */
export interface LogRecord {
    /** 时间戳 (ISO 8601) */
    timestamp: string;
    level: LogLevel;
    levelName: string;
    message: string;
    context: LogContext;
    error?: {
        name: string;
        message: string;
        stack?: string;
        code?: string;
    };
    data?: Record<string, unknown>;
    /** 来源模块 */
    module?: string;
}

export interface TransportConfig {
    enabled?: boolean;
    /** 最小日志级别 */
    level?: LogLevel;
    format?: 'json' | 'pretty';
    timestamp?: boolean;
}

export interface ConsoleTransportConfig extends TransportConfig {
    colorize?: boolean;
    stream?: 'stdout' | 'stderr';
}

/**
 * 日志模块配置
 */
export interface LoggerConfig {
    /** 服务名称 */
    service: string;
    env: 'development' | 'staging' | 'production' | 'test';
    /** 全局最小日志级别 */
    level: LogLevel;
    defaultContext?: LogContext;
    console?: ConsoleTransportConfig;
    /** 敏感字段列表 (这些字段会被脱敏) */
    sensitiveFields?: string[];
}

export interface ITransport {
    readonly name: string;
    readonly config: TransportConfig;
    write(record: LogRecord): void | Promise<void>;
    flush?(): void | Promise<void>;
    close?(): void | Promise<void>;
}

export interface IFormatter {
    format(record: LogRecord): string;
}

export type LogMiddleware = (record: LogRecord, next: () => void | Promise<void>) => void | Promise<void>;

export interface LogStats {
    total: number;
    byLevel: Record<string, number>;
    errors: number;
    lastRecordTime?: string;
}

/**
 * 组件依赖的最小日志接口，Logger 与 ChildLogger 均满足
 */
export interface LoggerLike {
    trace(message: string, context?: LogContext): void;
    debug(message: string, context?: LogContext, data?: Record<string, unknown>): void;
    info(message: string, context?: LogContext, data?: Record<string, unknown>): void;
    warn(message: string, context?: LogContext, data?: Record<string, unknown>): void;
    error(message: string, error?: Error, context?: LogContext): void;
}
