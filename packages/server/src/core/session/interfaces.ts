import { ChatMessage } from '../llm/types.js';

/**
 * 标准化的会话数据接口
 */
export interface SessionData {
    sessionId: string;
    createdAt: number;
    updatedAt: number;
    /** 按时间顺序追加，只增不减，从不重排 */
    messages: ChatMessage[];
}

export interface SessionSummary {
    sessionId: string;
    createdAt: number;
    updatedAt: number;
    messageCount: number;
}

/**
 * 会话存储接口，由编排层创建后注入 SessionManager
 * 会话不提供删除：进程退出即全部丢失
 */
export interface ISessionStorage {
    /**
     * 根据会话 ID 拉取会话，不存在时返回 null
     */
    loadSession(sessionId: string): Promise<SessionData | null>;

    /**
     * 新建或覆盖保存会话
     */
    saveSession(sessionId: string, data: SessionData): Promise<void>;

    listSessionIds(): Promise<string[]>;
}
