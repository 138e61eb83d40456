import { z } from 'zod';
import { ValidationError } from '../core/errors.js';

export const chatMessagePayload = z.object({
    sessionId: z.string().min(1).nullish(),
    content: z.string().min(1, 'content 不能为空')
});

export const cleanDocumentPayload = z.object({
    content: z.string().min(1, 'content 不能为空')
});

export const sessionHistoryPayload = z.object({
    sessionId: z.string().min(1)
});

/**
 * 校验客户端发来的事件载荷，失败时抛出 ValidationError
 */
export function parsePayload<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.infer<T> {
    const result = schema.safeParse(payload);
    if (!result.success) {
        const detail = result.error.issues.map(issue => `${issue.path.join('.') || 'payload'}: ${issue.message}`).join('; ');
        throw new ValidationError(`请求参数不合法 (${detail})`);
    }
    return result.data;
}
