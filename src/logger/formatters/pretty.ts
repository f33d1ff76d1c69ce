/**
 * 美化格式化器
 * 输出人类可读的彩色日志，适合开发环境
 */

import { BaseFormatter } from './base';
import type { LogRecord } from '../types';
import { LogLevel, LogLevelName } from '../types';

const Colors = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    cyan: '\x1b[36m',
    white: '\x1b[37m',
    bgRed: '\x1b[41m',
};

const LevelColors: Record<LogLevel, string> = {
    [LogLevel.TRACE]: Colors.dim,
    [LogLevel.DEBUG]: Colors.cyan,
    [LogLevel.INFO]: Colors.green,
    [LogLevel.WARN]: Colors.yellow,
    [LogLevel.ERROR]: Colors.red,
    [LogLevel.FATAL]: Colors.bgRed + Colors.white,
};

export interface PrettyFormatterConfig {
    colorize?: boolean;
    showTimestamp?: boolean;
    showContext?: boolean;
    /** 最大消息长度，超出部分以 ... 截断 */
    maxMessageLength?: number;
}

export class PrettyFormatter extends BaseFormatter {
    private readonly config: Required<PrettyFormatterConfig>;

    constructor(config: PrettyFormatterConfig = {}) {
        super();
        this.config = {
            colorize: true,
            showTimestamp: true,
            showContext: true,
            maxMessageLength: 200,
            ...config,
        };
    }

    format(record: LogRecord): string {
        const parts: string[] = [];

        if (this.config.showTimestamp) {
            parts.push(this.colorize(record.timestamp, Colors.dim));
        }

        parts.push(this.colorize(LogLevelName[record.level].padEnd(5), LevelColors[record.level] + Colors.bold));

        if (record.module) {
            parts.push(this.colorize(`[${record.module}]`, Colors.cyan));
        }

        parts.push(this.truncate(record.message));

        if (this.config.showContext) {
            const context = this.formatContext(record.context);
            if (context) parts.push(context);
        }

        let output = parts.join(' ');

        if (record.data && Object.keys(record.data).length > 0) {
            output += '\n' + this.colorize(this.safeStringify(record.data, 2), Colors.dim);
        }

        const error = this.formatError(record.error);
        if (error) {
            output += '\n' + this.colorize(error, Colors.red);
        }

        return output;
    }

    private truncate(message: string): string {
        if (message.length <= this.config.maxMessageLength) {
            return message;
        }
        return message.substring(0, this.config.maxMessageLength) + '...';
    }

    private formatContext(context: LogRecord['context']): string {
        const pairs = Object.entries(context)
            .filter(([, value]) => value !== undefined)
            .map(([key, value]) => {
                const text = typeof value === 'object' && value !== null ? this.safeStringify(value) : String(value);
                return `${key}=${text.length > 40 ? text.substring(0, 40) + '...' : text}`;
            });

        if (pairs.length === 0) return '';
        return this.colorize(`(${pairs.join(', ')})`, Colors.dim);
    }

    private colorize(text: string, color: string): string {
        if (!this.config.colorize) return text;
        return `${color}${text}${Colors.reset}`;
    }
}
