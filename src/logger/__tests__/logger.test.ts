/**
 * Logger 模块单元测试
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Logger, createLogger, getLogger, setDefaultLogger } from '../logger';
import { LogLevel, LogLevelName } from '../types';
import type { LogRecord } from '../types';
import { JsonFormatter } from '../formatters/json';
import { PrettyFormatter } from '../formatters/pretty';
import { MemoryTransport } from '../transports/memory';
import { mergeConfig } from '../config';

function record(overrides: Partial<LogRecord> = {}): LogRecord {
    return {
        timestamp: '2024-01-01T00:00:00.000Z',
        level: LogLevel.INFO,
        levelName: 'INFO',
        message: 'Test message',
        context: {},
        ...overrides,
    };
}

describe('LogLevel', () => {
    it('should have correct level values and names', () => {
        expect(LogLevel.TRACE).toBe(0);
        expect(LogLevel.WARN).toBe(30);
        expect(LogLevel.FATAL).toBe(50);
        expect(LogLevelName[LogLevel.ERROR]).toBe('ERROR');
    });
});

describe('JsonFormatter', () => {
    it('should format log record as JSON', () => {
        const formatter = new JsonFormatter();
        const parsed = JSON.parse(formatter.format(record({ context: { threadId: 'thread-1' } })));

        expect(parsed['@timestamp']).toBe('2024-01-01T00:00:00.000Z');
        expect(parsed['@level']).toBe('INFO');
        expect(parsed['@message']).toBe('Test message');
        expect(parsed['@context']).toEqual({ threadId: 'thread-1' });
    });

    it('should format error correctly', () => {
        const formatter = new JsonFormatter();
        const parsed = JSON.parse(
            formatter.format(
                record({
                    level: LogLevel.ERROR,
                    levelName: 'ERROR',
                    error: { name: 'BackendAuthError', message: 'denied', code: 'AUTH_FAILED' },
                })
            )
        );

        expect(parsed['@error']).toEqual({ type: 'BackendAuthError', message: 'denied', code: 'AUTH_FAILED' });
    });

    it('should omit empty context', () => {
        const parsed = JSON.parse(new JsonFormatter().format(record()));
        expect(parsed['@context']).toBeUndefined();
    });
});

describe('PrettyFormatter', () => {
    it('should format log record as human readable', () => {
        const formatter = new PrettyFormatter({ colorize: false, showTimestamp: false });
        const result = formatter.format(record({ module: 'ProviderRegistry', context: { model: 'pro' } }));

        expect(result).toBe('INFO  [ProviderRegistry] Test message (model=pro)');
    });

    it('should truncate long messages', () => {
        const formatter = new PrettyFormatter({ colorize: false, showTimestamp: false, maxMessageLength: 5 });
        expect(formatter.format(record({ message: 'abcdefgh' }))).toBe('INFO  abcde...');
    });
});

describe('Logger', () => {
    let logger: Logger;
    let transport: MemoryTransport;

    beforeEach(() => {
        logger = createLogger({
            service: 'test-service',
            env: 'test',
            level: LogLevel.DEBUG,
            console: { enabled: false },
        });
        transport = new MemoryTransport();
        logger.addTransport(transport);
    });

    it('should write records at or above the configured level', async () => {
        logger.trace('hidden');
        logger.debug('visible', { threadId: 't-1' });
        await logger.flush();

        const records = transport.getRecords();
        expect(records).toHaveLength(1);
        expect(records[0].message).toBe('visible');
        expect(records[0].context).toEqual({ threadId: 't-1' });
    });

    it('should redact sensitive fields in context and data', async () => {
        logger.info('configured', { apiKey: 'test-secret', model: 'o3' }, { headers: { authorization: 'Bearer x' } });
        await logger.flush();

        const [entry] = transport.getRecords();
        expect(entry.context).toEqual({ apiKey: '[REDACTED]', model: 'o3' });
        expect(entry.data).toEqual({ headers: { authorization: '[REDACTED]' } });
    });

    it('should attach module and context from child loggers', async () => {
        const child = logger.child('ConversationMemory', { toolName: 'chat' });
        child.warn('turn dropped', { threadId: 't-9' });
        await logger.flush();

        const [entry] = transport.getRecords();
        expect(entry.module).toBe('ConversationMemory');
        expect(entry.context).toEqual({ toolName: 'chat', threadId: 't-9' });
        expect(entry.levelName).toBe('WARN');
    });

    it('should nest child module names', async () => {
        logger.child('Registry').child('Fallback').info('selected');
        await logger.flush();
        expect(transport.getRecords()[0].module).toBe('Registry:Fallback');
    });

    it('should serialize error details and count errors', async () => {
        logger.error('call failed', new Error('boom'));
        await logger.flush();

        const [entry] = transport.getRecords();
        expect(entry.error?.message).toBe('boom');
        expect(logger.getStats().errors).toBe(1);
        expect(logger.getStats().byLevel).toEqual({ ERROR: 1 });
    });

    it('should merge default context', async () => {
        const scoped = createLogger({ env: 'test', level: LogLevel.INFO, defaultContext: { requestId: 'req-1' } });
        const memory = new MemoryTransport();
        scoped.addTransport(memory);

        scoped.info('hello', { model: 'flash' });
        await scoped.flush();

        expect(memory.getRecords()[0].context).toEqual({ requestId: 'req-1', model: 'flash' });
    });

    it('should ignore records after close', async () => {
        await logger.close();
        logger.info('late');
        await logger.flush();
        expect(transport.getRecords()).toHaveLength(0);
    });
});

describe('mergeConfig', () => {
    it('should disable console output for the test profile', () => {
        const config = mergeConfig({ env: 'test' });
        expect(config.console?.enabled).toBe(false);
    });

    it('should let user config win over profile defaults', () => {
        const config = mergeConfig({ env: 'production', service: 'relay-test', level: LogLevel.ERROR });
        expect(config.service).toBe('relay-test');
        expect(config.level).toBe(LogLevel.ERROR);
        expect(config.console?.format).toBe('json');
    });
});

describe('default logger', () => {
    it('should return the logger set as default', () => {
        const custom = createLogger({ env: 'test' });
        setDefaultLogger(custom);
        expect(getLogger()).toBe(custom);
    });
});
