/**
 * 控制台 Transport
 */

import { BaseTransport } from './base';
import { LogLevel } from '../types';
import type { ConsoleTransportConfig, LogRecord, IFormatter } from '../types';

export class ConsoleTransport extends BaseTransport {
    readonly name = 'console';
    readonly config: ConsoleTransportConfig;
    private readonly stream: NodeJS.WritableStream;

    constructor(config: ConsoleTransportConfig, formatter: IFormatter) {
        super(formatter);
        this.config = {
            enabled: true,
            level: LogLevel.TRACE,
            format: 'pretty',
            colorize: true,
            stream: 'stdout',
            ...config,
        };
        this.stream = this.config.stream === 'stderr' ? process.stderr : process.stdout;
    }

    write(record: LogRecord): void {
        if (!this.shouldLog(record)) return;

        // ERROR 及以上固定输出到 stderr
        const target = record.level >= LogLevel.ERROR ? process.stderr : this.stream;
        target.write(this.formatter.format(record) + '\n');
    }
}
