/**
 * 文件键值存储
 *
 * 每个键一个 JSON 文件（文件名为 encodeURIComponent(key).json），
 * 记录值与过期时间；过期的键在读取时删除。
 */

import * as path from 'path';
import { z } from 'zod';
import { getLogger } from '../../../logger';
import type { LoggerLike } from '../../../logger';
import { StorageError } from '../../errors';
import type { StorageOperation } from '../../errors';
import type { KeyValueStore } from '../../ports/kv-store';
import { AtomicJsonStore } from './atomic-json';

const storedEntrySchema = z.object({
    value: z.string(),
    expiresAt: z.number().nullable(),
});

export interface FileKeyValueStoreOptions {
    dir: string;
    clock?: () => number;
    logger?: LoggerLike;
}

export function encodeKeyFileName(key: string): string {
    return `${encodeURIComponent(key)}.json`;
}

export function decodeKeyFileName(fileName: string): string | null {
    try {
        return decodeURIComponent(fileName.replace(/\.json$/, ''));
    } catch {
        return null;
    }
}

export class FileKeyValueStore implements KeyValueStore {
    private readonly dir: string;
    private readonly clock: () => number;
    private readonly logger: LoggerLike;
    private readonly files: AtomicJsonStore;

    constructor(options: FileKeyValueStoreOptions) {
        this.dir = path.resolve(options.dir);
        this.clock = options.clock ?? Date.now;
        this.logger = options.logger ?? getLogger().child('FileKeyValueStore');
        this.files = new AtomicJsonStore(this.logger);
    }

    async get(key: string): Promise<string | null> {
        const filePath = this.filePath(key);
        const raw = await this.run('get', key, () => this.files.readJsonFile(filePath));
        if (raw === null) {
            return null;
        }

        const entry = storedEntrySchema.safeParse(raw);
        if (!entry.success) {
            throw new StorageError(`Malformed entry for key '${key}'`, 'get', key, entry.error);
        }
        if (entry.data.expiresAt !== null && entry.data.expiresAt <= this.clock()) {
            await this.delete(key);
            return null;
        }
        return entry.data.value;
    }

    async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
        const expiresAt = ttlSeconds !== undefined && ttlSeconds > 0 ? this.clock() + ttlSeconds * 1000 : null;
        await this.run('set', key, () => this.files.writeJsonFile(this.filePath(key), { value, expiresAt }));
    }

    async delete(key: string): Promise<void> {
        await this.run('delete', key, () => this.files.deleteFileIfExists(this.filePath(key)));
    }

    /**
     * 删除全部已过期的键
     *
     * @returns 删除的键
     */
    async purgeExpired(): Promise<string[]> {
        const removed: string[] = [];
        for (const fileName of await this.files.listJsonFiles(this.dir)) {
            const key = decodeKeyFileName(fileName);
            if (key === null) {
                this.logger.warn('Skipping undecodable file name', {}, { fileName });
                continue;
            }
            try {
                if ((await this.get(key)) === null) {
                    removed.push(key);
                }
            } catch (error) {
                this.logger.warn('Skipping unreadable entry', {}, { key, reason: String(error) });
            }
        }
        return removed;
    }

    async close(): Promise<void> {
        await this.files.close();
    }

    private filePath(key: string): string {
        return path.join(this.dir, encodeKeyFileName(key));
    }

    private async run<T>(operation: StorageOperation, key: string, action: () => Promise<T>): Promise<T> {
        try {
            return await action();
        } catch (error) {
            if (error instanceof StorageError) throw error;
            const reason = error instanceof Error ? error.message : String(error);
            throw new StorageError(`Failed to ${operation} key '${key}': ${reason}`, operation, key, error);
        }
    }
}
