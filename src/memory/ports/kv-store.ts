/**
 * 键值存储端口
 *
 * 值为序列化后的字符串；TTL 由存储负责，过期的键读取时视为不存在。
 * 实现遇到 I/O 失败时抛出 StorageError。
 */
export interface KeyValueStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds?: number): Promise<void>;
    delete(key: string): Promise<void>;
    close?(): Promise<void>;
}
