import type { IFormatter, LogRecord } from '../types';

export abstract class BaseFormatter implements IFormatter {
    abstract format(record: LogRecord): string;

    protected formatError(error: LogRecord['error']): string | undefined {
        if (!error) return undefined;
        return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
    }

    /**
     * 安全的 JSON 序列化
     */
    protected safeStringify(value: unknown, indent?: number): string {
        try {
            return JSON.stringify(value, null, indent);
        } catch {
            return '[non-serializable]';
        }
    }
}
