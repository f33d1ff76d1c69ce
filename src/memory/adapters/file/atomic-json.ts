import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import type { LoggerLike } from '../../../logger';

type ParseResult = { ok: true; value: unknown } | { ok: false; error: Error };

/**
 * 原子 JSON 文件读写
 *
 * 写入：先备份为 .bak，再写临时文件并 rename；同一文件的操作串行执行。
 * 读取：主文件缺失或损坏时从备份恢复。
 */
export class AtomicJsonStore {
    private readonly fileOperationQueue = new Map<string, Promise<void>>();
    private readonly pendingFileOperations = new Set<Promise<void>>();

    constructor(private readonly logger?: LoggerLike) {}

    async listJsonFiles(dirPath: string): Promise<string[]> {
        let entries: Array<{ name: string; isFile(): boolean }>;
        try {
            entries = await fs.readdir(dirPath, { withFileTypes: true });
        } catch (error) {
            if (isNotFound(error)) return [];
            throw error;
        }
        return entries
            .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
            .map((entry) => entry.name)
            .sort((a, b) => a.localeCompare(b));
    }

    /**
     * @returns 解析后的 JSON 值；文件与备份都不存在时返回 null
     */
    async readJsonFile(filePath: string): Promise<unknown> {
        const raw = await this.readTextIfExists(filePath);
        const backupPath = this.getBackupFilePath(filePath);

        if (raw === null) {
            const backupRaw = await this.readTextIfExists(backupPath);
            if (backupRaw === null) {
                return null;
            }
            const parsedBackup = parseJsonText(backupRaw, backupPath);
            if (!parsedBackup.ok) {
                throw parsedBackup.error;
            }
            this.logger?.warn('Restoring missing file from backup', {}, { filePath });
            await this.writeJsonFile(filePath, parsedBackup.value);
            return parsedBackup.value;
        }

        const parsedPrimary = parseJsonText(raw, filePath);
        if (parsedPrimary.ok) {
            return parsedPrimary.value;
        }

        const backupRaw = await this.readTextIfExists(backupPath);
        if (backupRaw !== null) {
            const parsedBackup = parseJsonText(backupRaw, backupPath);
            if (parsedBackup.ok) {
                this.logger?.warn('Recovered corrupted file from backup', {}, { filePath, reason: parsedPrimary.error.message });
                await this.archiveCorruptedFile(filePath);
                await this.writeJsonFile(filePath, parsedBackup.value);
                return parsedBackup.value;
            }
        }

        throw parsedPrimary.error;
    }

    async writeJsonFile(filePath: string, value: unknown): Promise<void> {
        const json = JSON.stringify(value, null, 2);

        await this.enqueueFileOperation(filePath, async () => {
            await fs.mkdir(path.dirname(filePath), { recursive: true });
            await this.copyFileIfExists(filePath, this.getBackupFilePath(filePath));

            const tempFilePath = this.buildTempFilePath(filePath);
            try {
                await fs.writeFile(tempFilePath, json, 'utf-8');
                await this.renameWithRetry(tempFilePath, filePath);
            } finally {
                await this.unlinkIfExists(tempFilePath);
            }
        });
    }

    async deleteFileIfExists(filePath: string): Promise<void> {
        await this.enqueueFileOperation(filePath, async () => {
            await this.unlinkIfExists(filePath);
            await this.unlinkIfExists(this.getBackupFilePath(filePath));
        });
    }

    async close(): Promise<void> {
        if (this.pendingFileOperations.size === 0) {
            return;
        }
        await Promise.allSettled([...this.pendingFileOperations]);
    }

    private async renameWithRetry(src: string, dest: string, maxRetries = 5, delayMs = 100): Promise<void> {
        for (let attempt = 0; ; attempt += 1) {
            try {
                await fs.rename(src, dest);
                return;
            } catch (error) {
                // Windows 上目标文件被占用时 rename 会短暂返回 EPERM
                if (errorCode(error) === 'EPERM' && attempt < maxRetries - 1) {
                    await new Promise((resolve) => setTimeout(resolve, delayMs * (attempt + 1)));
                    continue;
                }
                throw error;
            }
        }
    }

    private async archiveCorruptedFile(filePath: string): Promise<void> {
        const archivedPath = `${filePath}.corrupt-${Date.now()}`;
        try {
            await fs.rename(filePath, archivedPath);
        } catch (error) {
            if (isNotFound(error)) {
                return;
            }
            throw error;
        }
    }

    private getBackupFilePath(filePath: string): string {
        return `${filePath}.bak`;
    }

    private buildTempFilePath(filePath: string): string {
        const base = path.basename(filePath);
        const dir = path.dirname(filePath);
        return path.join(dir, `.${base}.${process.pid}.${Date.now()}.${uuid()}.tmp`);
    }

    private async readTextIfExists(filePath: string): Promise<string | null> {
        try {
            return await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isNotFound(error)) {
                return null;
            }
            throw error;
        }
    }

    private async copyFileIfExists(fromPath: string, toPath: string): Promise<void> {
        try {
            await fs.copyFile(fromPath, toPath);
        } catch (error) {
            if (isNotFound(error)) {
                return;
            }
            throw error;
        }
    }

    private async unlinkIfExists(filePath: string): Promise<void> {
        try {
            await fs.unlink(filePath);
        } catch (error) {
            if (isNotFound(error)) {
                return;
            }
            throw error;
        }
    }

    private enqueueFileOperation(filePath: string, operation: () => Promise<void>): Promise<void> {
        const previous = this.fileOperationQueue.get(filePath) ?? Promise.resolve();
        const pending = previous
            .catch(() => {
                // 前一个操作的失败已由其调用方处理，这里只保持队列继续
            })
            .then(operation);

        const tracked = pending.finally(() => {
            if (this.fileOperationQueue.get(filePath) === tracked) {
                this.fileOperationQueue.delete(filePath);
            }
            this.pendingFileOperations.delete(tracked);
        });

        this.fileOperationQueue.set(filePath, tracked);
        this.pendingFileOperations.add(tracked);
        return tracked;
    }
}

function parseJsonText(raw: string, filePath: string): ParseResult {
    const normalized = raw.trim();
    if (normalized.length === 0) {
        return { ok: false, error: new Error(`JSON file is empty: ${filePath}`) };
    }
    try {
        const value: unknown = JSON.parse(normalized);
        return { ok: true, value };
    } catch (error) {
        const reason = error instanceof Error ? `: ${error.message}` : '';
        return { ok: false, error: new Error(`Failed to parse JSON ${filePath}${reason}`) };
    }
}

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function isNotFound(error: unknown): boolean {
    return errorCode(error) === 'ENOENT';
}
