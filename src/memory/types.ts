/**
 * 会话记忆类型定义
 *
 * 持久化载荷由 zod schema 描述，读取时校验；校验失败视为不存在。
 */

import { z } from 'zod';

export const conversationRoleSchema = z.enum(['user', 'assistant']);

export type ConversationRole = z.infer<typeof conversationRoleSchema>;

export const conversationTurnSchema = z.object({
    role: conversationRoleSchema,
    content: z.string(),
    /** ISO 8601，同一线程内单调不减 */
    timestamp: z.string(),
    /** 按引用顺序保存的文件路径 */
    files: z.array(z.string()).optional(),
    /** 文件路径或 data URI */
    images: z.array(z.string()).optional(),
    toolName: z.string().optional(),
    modelProvider: z.string().optional(),
    modelName: z.string().optional(),
    modelMetadata: z.record(z.unknown()).optional(),
});

export type ConversationTurn = z.infer<typeof conversationTurnSchema>;

export const threadContextSchema = z.object({
    threadId: z.string().min(1),
    /** 弱引用：父线程可能已过期或被删除 */
    parentThreadId: z.string().optional(),
    createdAt: z.string(),
    lastUpdatedAt: z.string(),
    /** 发起该线程的工具 */
    toolName: z.string(),
    turns: z.array(conversationTurnSchema),
    initialContext: z.record(z.unknown()),
});

export type ThreadContext = z.infer<typeof threadContextSchema>;

export interface AddTurnOptions {
    files?: string[];
    images?: string[];
    toolName?: string;
    modelProvider?: string;
    modelName?: string;
    modelMetadata?: Record<string, unknown>;
}
