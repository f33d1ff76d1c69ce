/**
 * 会话记忆
 *
 * 线程以 `thread:<id>` 为键整体序列化保存，每次追加轮次都会覆盖整个载荷。
 *
 * addTurn 是不加锁的读-改-写：同一线程上的并发追加可能丢失更新（后写覆盖先写）。
 * 父线程是弱引用，悬空的 parentThreadId 是合法状态。
 */

import { v4 as uuid } from 'uuid';
import { getLogger } from '../logger';
import type { LoggerLike } from '../logger';
import { StorageError } from './errors';
import type { KeyValueStore } from './ports/kv-store';
import { threadContextSchema } from './types';
import type { AddTurnOptions, ConversationRole, ConversationTurn, ThreadContext } from './types';

export const DEFAULT_CONVERSATION_TTL_SECONDS = 3 * 60 * 60;
export const DEFAULT_MAX_CONVERSATION_TURNS = 20;
export const DEFAULT_MAX_CHAIN_DEPTH = 20;

export interface ConversationMemoryOptions {
    store: KeyValueStore;
    ttlSeconds?: number;
    maxTurns?: number;
    clock?: () => Date;
    idGenerator?: () => string;
    logger?: LoggerLike;
}

export function threadKey(threadId: string): string {
    return `thread:${threadId}`;
}

export class ConversationMemory {
    readonly ttlSeconds: number;
    readonly maxTurns: number;
    private readonly store: KeyValueStore;
    private readonly clock: () => Date;
    private readonly idGenerator: () => string;
    private readonly logger: LoggerLike;

    constructor(options: ConversationMemoryOptions) {
        this.store = options.store;
        this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CONVERSATION_TTL_SECONDS;
        this.maxTurns = options.maxTurns ?? DEFAULT_MAX_CONVERSATION_TURNS;
        this.clock = options.clock ?? (() => new Date());
        this.idGenerator = options.idGenerator ?? uuid;
        this.logger = options.logger ?? getLogger().child('ConversationMemory');
    }

    /**
     * 创建线程，写入确认后才返回 id
     *
     * @throws StorageError 写入失败
     */
    async createThread(
        toolName: string,
        initialContext: Record<string, unknown> = {},
        parentThreadId?: string
    ): Promise<string> {
        const threadId = this.idGenerator();
        const now = this.clock().toISOString();
        const context: ThreadContext = {
            threadId,
            parentThreadId,
            createdAt: now,
            lastUpdatedAt: now,
            toolName,
            turns: [],
            initialContext,
        };

        try {
            await this.persist(context);
        } catch (error) {
            this.logger.error('Failed to create thread', toError(error), { threadId, toolName });
            if (error instanceof StorageError) throw error;
            throw new StorageError(`Failed to create thread ${threadId}`, 'set', threadKey(threadId), error);
        }

        this.logger.debug('Thread created', { threadId, toolName }, { parentThreadId });
        return threadId;
    }

    /**
     * 追加一轮对话
     *
     * @returns 线程不存在、已达轮次上限或写入失败时返回 false
     */
    async addTurn(
        threadId: string,
        role: ConversationRole,
        content: string,
        options: AddTurnOptions = {}
    ): Promise<boolean> {
        const context = await this.getThread(threadId);
        if (!context) {
            this.logger.debug('Turn dropped: thread not found', { threadId });
            return false;
        }

        if (context.turns.length >= this.maxTurns) {
            this.logger.debug('Turn dropped: turn limit reached', { threadId }, { maxTurns: this.maxTurns });
            return false;
        }

        const turn: ConversationTurn = {
            role,
            content,
            timestamp: this.nextTimestamp(context),
            ...(options.files ? { files: [...options.files] } : {}),
            ...(options.images ? { images: [...options.images] } : {}),
            ...(options.toolName !== undefined ? { toolName: options.toolName } : {}),
            ...(options.modelProvider !== undefined ? { modelProvider: options.modelProvider } : {}),
            ...(options.modelName !== undefined ? { modelName: options.modelName } : {}),
            ...(options.modelMetadata !== undefined ? { modelMetadata: options.modelMetadata } : {}),
        };

        const updated: ThreadContext = {
            ...context,
            turns: [...context.turns, turn],
            lastUpdatedAt: turn.timestamp,
        };

        try {
            await this.persist(updated);
        } catch (error) {
            this.logger.error('Failed to persist turn', toError(error), { threadId });
            return false;
        }
        return true;
    }

    /**
     * @returns 不存在、读取失败或载荷损坏时返回 null
     */
    async getThread(threadId: string): Promise<ThreadContext | null> {
        if (!threadId) return null;

        let raw: string | null;
        try {
            raw = await this.store.get(threadKey(threadId));
        } catch (error) {
            this.logger.warn('Failed to read thread', { threadId }, { reason: toError(error).message });
            return null;
        }
        if (raw === null) return null;

        let payload: unknown;
        try {
            payload = JSON.parse(raw);
        } catch {
            this.logger.warn('Discarding unparseable thread payload', { threadId });
            return null;
        }

        const parsed = threadContextSchema.safeParse(payload);
        if (!parsed.success) {
            this.logger.warn('Discarding invalid thread payload', { threadId }, { issues: parsed.error.issues.length });
            return null;
        }
        return parsed.data;
    }

    /**
     * 线程内的图片引用，最新轮次在前；同一引用只保留最新出现的位置，轮次内保持原顺序
     */
    getConversationImageList(context: ThreadContext): string[] {
        return collectNewestFirst(context.turns, (turn) => turn.images);
    }

    /**
     * 线程内的文件引用，规则同图片
     */
    getConversationFileList(context: ThreadContext): string[] {
        return collectNewestFirst(context.turns, (turn) => turn.files);
    }

    /**
     * 从给定线程沿父链向上，返回 [线程, 父线程, 祖父线程, ...]
     *
     * 父线程缺失、出现环或达到 maxDepth 时停止。
     */
    async getThreadChain(threadId: string, maxDepth: number = DEFAULT_MAX_CHAIN_DEPTH): Promise<ThreadContext[]> {
        const chain: ThreadContext[] = [];
        const visited = new Set<string>();
        let currentId: string | undefined = threadId;

        while (currentId !== undefined && chain.length < maxDepth) {
            if (visited.has(currentId)) {
                this.logger.warn('Cycle detected in thread chain', { threadId: currentId });
                break;
            }
            visited.add(currentId);

            const context = await this.getThread(currentId);
            if (!context) break;

            chain.push(context);
            currentId = context.parentThreadId;
        }

        return chain;
    }

    /**
     * 合并整条链的图片引用，链中越新的线程越靠前
     */
    getChainImageList(chain: ThreadContext[]): string[] {
        const seen = new Set<string>();
        const images: string[] = [];
        for (const context of chain) {
            for (const image of this.getConversationImageList(context)) {
                if (!seen.has(image)) {
                    seen.add(image);
                    images.push(image);
                }
            }
        }
        return images;
    }

    private async persist(context: ThreadContext): Promise<void> {
        await this.store.set(threadKey(context.threadId), JSON.stringify(context), this.ttlSeconds);
    }

    private nextTimestamp(context: ThreadContext): string {
        const now = this.clock();
        const last = context.turns.at(-1);
        if (last) {
            const previous = Date.parse(last.timestamp);
            if (Number.isFinite(previous) && previous > now.getTime()) {
                return last.timestamp;
            }
        }
        return now.toISOString();
    }
}

function collectNewestFirst(
    turns: readonly ConversationTurn[],
    select: (turn: ConversationTurn) => readonly string[] | undefined
): string[] {
    const seen = new Set<string>();
    const result: string[] = [];

    for (let index = turns.length - 1; index >= 0; index -= 1) {
        const turn = turns[index];
        for (const reference of (turn && select(turn)) ?? []) {
            if (!seen.has(reference)) {
                seen.add(reference);
                result.push(reference);
            }
        }
    }

    return result;
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
