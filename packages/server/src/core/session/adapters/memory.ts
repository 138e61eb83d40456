import { ISessionStorage, SessionData } from '../interfaces.js';

/**
 * 进程内会话存储：不同会话的并发插入与修改互不影响
 * 保存的是对象引用，同一会话的多次 load 拿到的是同一份历史
 */
export class MemorySessionAdapter implements ISessionStorage {
    private readonly sessions: Map<string, SessionData> = new Map();

    public async loadSession(sessionId: string): Promise<SessionData | null> {
        return this.sessions.get(sessionId) ?? null;
    }

    public async saveSession(sessionId: string, data: SessionData): Promise<void> {
        this.sessions.set(sessionId, data);
    }

    public async listSessionIds(): Promise<string[]> {
        return Array.from(this.sessions.keys());
    }
}
