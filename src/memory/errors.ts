/**
 * 持久化错误
 */

export type StorageOperation = 'get' | 'set' | 'delete';

export class StorageError extends Error {
    constructor(
        message: string,
        public readonly operation: StorageOperation,
        public readonly key: string,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = 'StorageError';
    }
}

export function isStorageError(error: unknown): error is StorageError {
    return error instanceof StorageError;
}
