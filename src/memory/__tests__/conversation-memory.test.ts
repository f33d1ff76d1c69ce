/**
 * ConversationMemory 测试
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConversationMemory, threadKey } from '../conversation-memory';
import { InMemoryKeyValueStore } from '../adapters/in-memory-store';
import { StorageError } from '../errors';
import type { KeyValueStore } from '../ports/kv-store';
import type { ConversationTurn, ThreadContext } from '../types';

const START = Date.parse('2025-01-01T00:00:00.000Z');

describe('ConversationMemory', () => {
    let nowMs: number;
    let store: InMemoryKeyValueStore;
    let memory: ConversationMemory;

    function createMemory(options: { maxTurns?: number; kvStore?: KeyValueStore } = {}) {
        let counter = 0;
        return new ConversationMemory({
            store: options.kvStore ?? store,
            ttlSeconds: 3600,
            maxTurns: options.maxTurns,
            clock: () => new Date(nowMs),
            idGenerator: () => `thread-${++counter}`,
        });
    }

    function contextWithImages(images: string[][]): ThreadContext {
        return {
            threadId: 'thread-images',
            createdAt: '2025-01-01T00:00:00.000Z',
            lastUpdatedAt: '2025-01-01T00:00:00.000Z',
            toolName: 'chat',
            initialContext: {},
            turns: images.map((list, index): ConversationTurn => ({
                role: index % 2 === 0 ? 'user' : 'assistant',
                content: `turn ${index}`,
                timestamp: new Date(START + index * 1000).toISOString(),
                images: list,
            })),
        };
    }

    beforeEach(() => {
        nowMs = START;
        store = new InMemoryKeyValueStore({ clock: () => nowMs });
        memory = createMemory();
    });

    describe('createThread', () => {
        it('should persist an empty thread', async () => {
            const threadId = await memory.createThread('chat', { prompt: 'hi' });

            expect(threadId).toBe('thread-1');
            expect(await memory.getThread(threadId)).toEqual({
                threadId: 'thread-1',
                createdAt: '2025-01-01T00:00:00.000Z',
                lastUpdatedAt: '2025-01-01T00:00:00.000Z',
                toolName: 'chat',
                turns: [],
                initialContext: { prompt: 'hi' },
            });
        });

        it('should record the parent thread', async () => {
            const parent = await memory.createThread('chat');
            const child = await memory.createThread('debug', {}, parent);

            expect((await memory.getThread(child))?.parentThreadId).toBe(parent);
        });

        it('should generate uuids by default', async () => {
            const defaultMemory = new ConversationMemory({ store });
            const threadId = await defaultMemory.createThread('chat');

            expect(threadId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        });

        it('should fail loudly when the write fails', async () => {
            const failing: KeyValueStore = {
                get: async () => null,
                set: async (key) => {
                    throw new StorageError('disk full', 'set', key);
                },
                delete: async () => undefined,
            };

            await expect(createMemory({ kvStore: failing }).createThread('chat')).rejects.toBeInstanceOf(StorageError);
        });

        it('should wrap unexpected write failures', async () => {
            const failing: KeyValueStore = {
                get: async () => null,
                set: async () => {
                    throw new Error('connection reset');
                },
                delete: async () => undefined,
            };

            await expect(createMemory({ kvStore: failing }).createThread('chat')).rejects.toMatchObject({
                name: 'StorageError',
                operation: 'set',
                key: 'thread:thread-1',
            });
        });
    });

    describe('addTurn', () => {
        it('should return false for a missing thread', async () => {
            await expect(memory.addTurn('no-such-thread', 'user', 'hello')).resolves.toBe(false);
        });

        it('should append turns in order', async () => {
            const threadId = await memory.createThread('chat');

            nowMs = START + 1000;
            expect(await memory.addTurn(threadId, 'user', 'question', { files: ['a.ts'], toolName: 'chat' })).toBe(true);
            nowMs = START + 2000;
            expect(
                await memory.addTurn(threadId, 'assistant', 'answer', { modelName: 'o3', modelProvider: 'openai' })
            ).toBe(true);

            const context = await memory.getThread(threadId);
            expect(context?.turns).toEqual([
                {
                    role: 'user',
                    content: 'question',
                    timestamp: '2025-01-01T00:00:01.000Z',
                    files: ['a.ts'],
                    toolName: 'chat',
                },
                {
                    role: 'assistant',
                    content: 'answer',
                    timestamp: '2025-01-01T00:00:02.000Z',
                    modelName: 'o3',
                    modelProvider: 'openai',
                },
            ]);
            expect(context?.lastUpdatedAt).toBe('2025-01-01T00:00:02.000Z');
        });

        it('should keep timestamps non-decreasing when the clock moves back', async () => {
            const threadId = await memory.createThread('chat');
            nowMs = START + 5000;
            await memory.addTurn(threadId, 'user', 'first');
            nowMs = START + 1000;
            await memory.addTurn(threadId, 'assistant', 'second');

            const turns = (await memory.getThread(threadId))?.turns ?? [];
            expect(turns.map((turn) => turn.timestamp)).toEqual([
                '2025-01-01T00:00:05.000Z',
                '2025-01-01T00:00:05.000Z',
            ]);
        });

        it('should refuse turns beyond the limit', async () => {
            const limited = createMemory({ maxTurns: 2 });
            const threadId = await limited.createThread('chat');

            expect(await limited.addTurn(threadId, 'user', 'one')).toBe(true);
            expect(await limited.addTurn(threadId, 'assistant', 'two')).toBe(true);
            expect(await limited.addTurn(threadId, 'user', 'three')).toBe(false);
            expect((await limited.getThread(threadId))?.turns).toHaveLength(2);
        });

        it('should return false when the write fails', async () => {
            const threadId = await memory.createThread('chat');
            vi.spyOn(store, 'set').mockRejectedValueOnce(new StorageError('disk full', 'set', threadKey(threadId)));

            expect(await memory.addTurn(threadId, 'user', 'lost')).toBe(false);
            expect((await memory.getThread(threadId))?.turns).toEqual([]);
        });

        it('should lose one of two concurrent appends to the same thread', async () => {
            const threadId = await memory.createThread('chat');

            const results = await Promise.all([
                memory.addTurn(threadId, 'user', 'from caller A'),
                memory.addTurn(threadId, 'user', 'from caller B'),
            ]);

            expect(results).toEqual([true, true]);
            const turns = (await memory.getThread(threadId))?.turns ?? [];
            expect(turns.map((turn) => turn.content)).toEqual(['from caller B']);
        });
    });

    describe('getThread', () => {
        it('should return null for unknown and empty ids', async () => {
            expect(await memory.getThread('missing')).toBeNull();
            expect(await memory.getThread('')).toBeNull();
        });

        it('should treat unparseable payloads as absent', async () => {
            await store.set(threadKey('broken'), '{not json');
            await expect(memory.getThread('broken')).resolves.toBeNull();
        });

        it('should treat payloads of the wrong shape as absent', async () => {
            await store.set(threadKey('wrong'), JSON.stringify({ threadId: 'wrong', turns: 'nope' }));
            await expect(memory.getThread('wrong')).resolves.toBeNull();
        });

        it('should treat store read failures as absent', async () => {
            vi.spyOn(store, 'get').mockRejectedValueOnce(new StorageError('unreachable', 'get', threadKey('x')));
            await expect(memory.getThread('x')).resolves.toBeNull();
        });

        it('should expire threads after the ttl', async () => {
            const threadId = await memory.createThread('chat');

            nowMs = START + 3600 * 1000;

            expect(await memory.getThread(threadId)).toBeNull();
        });
    });

    describe('getConversationImageList', () => {
        it('should order images newest first keeping the newest occurrence', () => {
            const context = contextWithImages([['old', 'shared'], ['mid'], ['shared', 'new']]);

            expect(memory.getConversationImageList(context)).toEqual(['shared', 'new', 'mid', 'old']);
        });

        it('should return an empty list without images', () => {
            expect(memory.getConversationImageList(contextWithImages([[], []]))).toEqual([]);
        });

        it('should apply the same rule to files', async () => {
            const threadId = await memory.createThread('chat');
            await memory.addTurn(threadId, 'user', 'one', { files: ['a.ts', 'b.ts'] });
            await memory.addTurn(threadId, 'assistant', 'two');
            await memory.addTurn(threadId, 'user', 'three', { files: ['c.ts', 'a.ts'] });

            const context = await memory.getThread(threadId);
            expect(context && memory.getConversationFileList(context)).toEqual(['c.ts', 'a.ts', 'b.ts']);
        });
    });

    describe('thread chains', () => {
        it('should walk parents from the given thread', async () => {
            const root = await memory.createThread('chat');
            const middle = await memory.createThread('chat', {}, root);
            const leaf = await memory.createThread('chat', {}, middle);

            const chain = await memory.getThreadChain(leaf);

            expect(chain.map((context) => context.threadId)).toEqual([leaf, middle, root]);
        });

        it('should stop at a dangling parent', async () => {
            const orphan = await memory.createThread('chat', {}, 'expired-parent');

            const chain = await memory.getThreadChain(orphan);

            expect(chain.map((context) => context.threadId)).toEqual([orphan]);
        });

        it('should respect the depth limit', async () => {
            const root = await memory.createThread('chat');
            const middle = await memory.createThread('chat', {}, root);
            const leaf = await memory.createThread('chat', {}, middle);

            expect(await memory.getThreadChain(leaf, 2)).toHaveLength(2);
        });

        it('should stop on cycles', async () => {
            const base = contextWithImages([]);
            await store.set(threadKey('a'), JSON.stringify({ ...base, threadId: 'a', parentThreadId: 'b' }));
            await store.set(threadKey('b'), JSON.stringify({ ...base, threadId: 'b', parentThreadId: 'a' }));

            const chain = await memory.getThreadChain('a');

            expect(chain.map((context) => context.threadId)).toEqual(['a', 'b']);
        });

        it('should merge images across the chain, newest thread first', async () => {
            const parent = await memory.createThread('chat');
            await memory.addTurn(parent, 'user', 'p', { images: ['b.png', 'c.png'] });
            const child = await memory.createThread('chat', {}, parent);
            await memory.addTurn(child, 'user', 'c', { images: ['a.png', 'b.png'] });

            const chain = await memory.getThreadChain(child);

            expect(memory.getChainImageList(chain)).toEqual(['a.png', 'b.png', 'c.png']);
        });
    });
});
