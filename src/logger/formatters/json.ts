/**
 * JSON 格式化器
 *
 * 输出单行结构化日志，字段以 @ 前缀区分元信息
 */

import { BaseFormatter } from './base';
import type { LogRecord } from '../types';

export interface JsonFormatterConfig {
    /** 是否美化输出 */
    pretty?: boolean;
    /** 是否保留 null 值 */
    includeNulls?: boolean;
}

export class JsonFormatter extends BaseFormatter {
    private readonly config: Required<JsonFormatterConfig>;

    constructor(config: JsonFormatterConfig = {}) {
        super();
        this.config = {
            pretty: false,
            includeNulls: false,
            ...config,
        };
    }

    format(record: LogRecord): string {
        const output: Record<string, unknown> = {
            '@timestamp': record.timestamp,
            '@level': record.levelName,
            '@message': record.message,
        };

        if (record.module) {
            output['@module'] = record.module;
        }

        if (Object.keys(record.context).length > 0) {
            output['@context'] = this.sanitize(record.context);
        }

        if (record.error) {
            output['@error'] = {
                type: record.error.name,
                message: record.error.message,
                stack: record.error.stack,
                code: record.error.code,
            };
        }

        if (record.data && Object.keys(record.data).length > 0) {
            output['@data'] = this.sanitize(record.data);
        }

        return this.safeStringify(output, this.config.pretty ? 2 : undefined);
    }

    private sanitize(values: Record<string, unknown>): Record<string, unknown> {
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(values)) {
            if (value === undefined || (value === null && !this.config.includeNulls)) {
                continue;
            }
            try {
                JSON.stringify(value);
                result[key] = value;
            } catch {
                result[key] = '[non-serializable]';
            }
        }
        return result;
    }
}
