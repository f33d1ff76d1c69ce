import type { ITransport, TransportConfig, LogRecord, IFormatter } from '../types';

export abstract class BaseTransport implements ITransport {
    abstract readonly name: string;
    abstract readonly config: TransportConfig;

    protected constructor(protected readonly formatter: IFormatter) {}

    protected shouldLog(record: LogRecord): boolean {
        if (this.config.enabled === false) return false;
        return record.level >= (this.config.level ?? 0);
    }

    abstract write(record: LogRecord): void | Promise<void>;
}
