/**
 * 进程内键值存储
 */

import type { KeyValueStore } from '../ports/kv-store';

interface Entry {
    value: string;
    /** 毫秒时间戳，null 表示不过期 */
    expiresAt: number | null;
}

export interface InMemoryKeyValueStoreOptions {
    /** 当前时间（毫秒） */
    clock?: () => number;
}

export class InMemoryKeyValueStore implements KeyValueStore {
    private readonly entries = new Map<string, Entry>();
    private readonly clock: () => number;

    constructor(options: InMemoryKeyValueStoreOptions = {}) {
        this.clock = options.clock ?? Date.now;
    }

    async get(key: string): Promise<string | null> {
        const entry = this.entries.get(key);
        if (!entry) return null;
        if (this.isExpired(entry, this.clock())) {
            this.entries.delete(key);
            return null;
        }
        return entry.value;
    }

    /**
     * 写入前顺带清理已过期的条目
     */
    async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
        this.sweep();
        this.entries.set(key, {
            value,
            expiresAt: ttlSeconds !== undefined && ttlSeconds > 0 ? this.clock() + ttlSeconds * 1000 : null,
        });
    }

    async delete(key: string): Promise<void> {
        this.entries.delete(key);
    }

    /**
     * 删除全部过期条目，返回被删除的键
     */
    async purgeExpired(): Promise<string[]> {
        return this.sweep();
    }

    get size(): number {
        return this.entries.size;
    }

    private sweep(): string[] {
        const now = this.clock();
        const removed: string[] = [];
        for (const [key, entry] of this.entries) {
            if (this.isExpired(entry, now)) {
                this.entries.delete(key);
                removed.push(key);
            }
        }
        return removed;
    }

    private isExpired(entry: Entry, now: number): boolean {
        return entry.expiresAt !== null && entry.expiresAt <= now;
    }
}
