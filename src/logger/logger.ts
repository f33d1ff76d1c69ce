/**
 * Logger 核心模块
 */

import type { LoggerConfig, LogRecord, LogContext, ITransport, LogMiddleware, LogStats, LoggerLike } from './types';
import { LogLevel, LogLevelName } from './types';
import { mergeConfig } from './config';
import { JsonFormatter, PrettyFormatter } from './formatters';
import { ConsoleTransport } from './transports';

/**
 * 日志器
 *
 * 记录先经过中间件链（默认上下文、敏感字段脱敏），再写入全部 Transport。
 * 写入是异步的，需要确定落盘时调用 flush()。
 */
export class Logger implements LoggerLike {
    private readonly config: LoggerConfig;
    private transports: ITransport[] = [];
    private readonly middlewares: LogMiddleware[] = [];
    private readonly stats: LogStats = {
        total: 0,
        byLevel: {},
        errors: 0,
    };
    private readonly pendingWrites = new Set<Promise<void>>();
    private closed = false;

    constructor(config?: Partial<LoggerConfig>) {
        this.config = mergeConfig(config);
        this.initTransports();
        this.initMiddlewares();
    }

    private initTransports(): void {
        if (this.config.console?.enabled === false) {
            return;
        }
        const formatter =
            this.config.console?.format === 'json'
                ? new JsonFormatter()
                : new PrettyFormatter({
                      colorize: this.config.console?.colorize,
                      showTimestamp: this.config.console?.timestamp,
                  });
        this.transports.push(new ConsoleTransport(this.config.console ?? {}, formatter));
    }

    private initMiddlewares(): void {
        const defaultContext = this.config.defaultContext;
        if (defaultContext) {
            this.middlewares.push((record, next) => {
                record.context = { ...defaultContext, ...record.context };
                return next();
            });
        }

        if (this.config.sensitiveFields && this.config.sensitiveFields.length > 0) {
            this.middlewares.push((record, next) => {
                record.context = this.redact(record.context);
                if (record.data) {
                    record.data = this.redact(record.data);
                }
                return next();
            });
        }
    }

    /**
     * 脱敏对象中的敏感字段（键名包含匹配，大小写不敏感）
     */
    private redact(obj: Record<string, unknown>, seen: WeakSet<object> = new WeakSet()): Record<string, unknown> {
        if (seen.has(obj)) return { circular: '[Circular]' };
        seen.add(obj);

        const sensitiveFields = (this.config.sensitiveFields ?? []).map((field) => field.toLowerCase());
        const result: Record<string, unknown> = {};

        for (const [key, value] of Object.entries(obj)) {
            if (sensitiveFields.some((field) => key.toLowerCase().includes(field))) {
                result[key] = '[REDACTED]';
            } else if (Array.isArray(value)) {
                result[key] = value.map((item) => (isPlainRecord(item) ? this.redact(item, seen) : item));
            } else if (isPlainRecord(value)) {
                result[key] = this.redact(value, seen);
            } else {
                result[key] = value;
            }
        }

        return result;
    }

    use(middleware: LogMiddleware): this {
        this.middlewares.push(middleware);
        return this;
    }

    addTransport(transport: ITransport): this {
        this.transports.push(transport);
        return this;
    }

    private createRecord(
        level: LogLevel,
        message: string,
        context?: LogContext,
        error?: Error,
        data?: Record<string, unknown>
    ): LogRecord {
        const { module, ...rest } = context ?? {};
        const record: LogRecord = {
            timestamp: new Date().toISOString(),
            level,
            levelName: LogLevelName[level],
            message,
            context: rest,
            data,
        };

        if (typeof module === 'string') {
            record.module = module;
        }

        if (error) {
            const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
            record.error = {
                name: error.name,
                message: error.message,
                stack: error.stack,
                code,
            };
        }

        return record;
    }

    private async executeMiddlewares(record: LogRecord): Promise<void> {
        const middlewares = [...this.middlewares];

        const executeChain = async (index: number): Promise<void> => {
            const middleware = middlewares[index];
            if (!middleware) return;
            // 中间件漏调 next 时仍继续执行后续中间件
            let nextCalled = false;
            await middleware(record, async () => {
                nextCalled = true;
                await executeChain(index + 1);
            });
            if (!nextCalled) {
                await executeChain(index + 1);
            }
        };

        await executeChain(0);
    }

    private async writeToTransports(record: LogRecord): Promise<void> {
        if (record.level < this.config.level) {
            return;
        }

        for (const transport of this.transports) {
            try {
                await transport.write(record);
            } catch (err) {
                console.error(`[Logger] Transport ${transport.name} write error: ${errorMessage(err)}`);
            }
        }

        this.stats.total++;
        this.stats.byLevel[record.levelName] = (this.stats.byLevel[record.levelName] ?? 0) + 1;
        if (record.level >= LogLevel.ERROR) {
            this.stats.errors++;
        }
        this.stats.lastRecordTime = record.timestamp;
    }

    async logWithLevel(
        level: LogLevel,
        message: string,
        context?: LogContext,
        error?: Error,
        data?: Record<string, unknown>
    ): Promise<void> {
        if (this.closed || level < this.config.level) return;

        const task = (async () => {
            const record = this.createRecord(level, message, context, error, data);
            await this.executeMiddlewares(record);
            await this.writeToTransports(record);
        })();

        this.pendingWrites.add(task);
        try {
            await task;
        } finally {
            this.pendingWrites.delete(task);
        }
    }

    private dispatch(level: LogLevel, message: string, context?: LogContext, error?: Error, data?: Record<string, unknown>): void {
        this.logWithLevel(level, message, context, error, data).catch((err) => {
            console.error(`[Logger] ${LogLevelName[level]} log failed: ${errorMessage(err)}`);
        });
    }

    trace(message: string, context?: LogContext): void {
        this.dispatch(LogLevel.TRACE, message, context);
    }

    debug(message: string, context?: LogContext, data?: Record<string, unknown>): void {
        this.dispatch(LogLevel.DEBUG, message, context, undefined, data);
    }

    info(message: string, context?: LogContext, data?: Record<string, unknown>): void {
        this.dispatch(LogLevel.INFO, message, context, undefined, data);
    }

    warn(message: string, context?: LogContext, data?: Record<string, unknown>): void {
        this.dispatch(LogLevel.WARN, message, context, undefined, data);
    }

    error(message: string, error?: Error, context?: LogContext): void {
        this.dispatch(LogLevel.ERROR, message, context, error);
    }

    fatal(message: string, error?: Error, context?: LogContext): void {
        this.dispatch(LogLevel.FATAL, message, context, error);
    }

    child(module: string, additionalContext?: LogContext): ChildLogger {
        return new ChildLogger(this, module, additionalContext);
    }

    getStats(): LogStats {
        return { ...this.stats, byLevel: { ...this.stats.byLevel } };
    }

    /**
     * 等待所有挂起的写入完成
     */
    async flush(): Promise<void> {
        await Promise.allSettled([...this.pendingWrites]);
        for (const transport of this.transports) {
            if (transport.flush) {
                await transport.flush();
            }
        }
    }

    async close(): Promise<void> {
        if (this.closed) return;
        await this.flush();
        this.closed = true;
        for (const transport of this.transports) {
            if (transport.close) {
                await transport.close();
            }
        }
        this.transports = [];
    }

    getConfig(): LoggerConfig {
        return { ...this.config };
    }
}

/**
 * 子日志器
 *
 * 带有预设模块名和上下文的日志器
 */
export class ChildLogger implements LoggerLike {
    constructor(
        private readonly parent: Logger,
        private readonly module: string,
        private readonly context: LogContext = {}
    ) {}

    private mergeContext(context?: LogContext): LogContext {
        return { ...this.context, ...context, module: this.module };
    }

    trace(message: string, context?: LogContext): void {
        this.parent.trace(message, this.mergeContext(context));
    }

    debug(message: string, context?: LogContext, data?: Record<string, unknown>): void {
        this.parent.debug(message, this.mergeContext(context), data);
    }

    info(message: string, context?: LogContext, data?: Record<string, unknown>): void {
        this.parent.info(message, this.mergeContext(context), data);
    }

    warn(message: string, context?: LogContext, data?: Record<string, unknown>): void {
        this.parent.warn(message, this.mergeContext(context), data);
    }

    error(message: string, error?: Error, context?: LogContext): void {
        this.parent.error(message, error, this.mergeContext(context));
    }

    fatal(message: string, error?: Error, context?: LogContext): void {
        this.parent.fatal(message, error, this.mergeContext(context));
    }

    child(subModule: string, additionalContext?: LogContext): ChildLogger {
        return new ChildLogger(this.parent, `${this.module}:${subModule}`, {
            ...this.context,
            ...additionalContext,
        });
    }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
    if (!defaultLogger) {
        defaultLogger = new Logger();
    }
    return defaultLogger;
}

export function createLogger(config?: Partial<LoggerConfig>): Logger {
    return new Logger(config);
}

export function setDefaultLogger(logger: Logger): void {
    defaultLogger = logger;
}
