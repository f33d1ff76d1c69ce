/**
 * 内存 Transport
 *
 * 将日志记录保留在进程内，用于测试断言与诊断输出
 */

import { BaseTransport } from './base';
import { JsonFormatter } from '../formatters/json';
import type { LogRecord, TransportConfig, IFormatter } from '../types';

export class MemoryTransport extends BaseTransport {
    readonly name = 'memory';
    readonly config: TransportConfig;
    private readonly records: LogRecord[] = [];

    constructor(config: TransportConfig = {}, formatter: IFormatter = new JsonFormatter()) {
        super(formatter);
        this.config = { enabled: true, ...config };
    }

    write(record: LogRecord): void {
        if (!this.shouldLog(record)) return;
        this.records.push(record);
    }

    getRecords(): LogRecord[] {
        return [...this.records];
    }

    /** 按格式化器输出的文本行 */
    getLines(): string[] {
        return this.records.map((record) => this.formatter.format(record));
    }

    clear(): void {
        this.records.length = 0;
    }
}
