import { randomUUID } from 'crypto';
import { SessionNotFoundError } from '../errors.js';
import { ILLMProvider } from '../llm/interfaces.js';
import { ChatMessage, ChatOptions, Role } from '../llm/types.js';
import { ISessionStorage, SessionData, SessionSummary } from './interfaces.js';
import { KeyedLock } from './lock.js';

export interface SessionManagerOptions {
    /** 每个会话创建时注入一次的系统指令，为空则不注入 */
    systemPrompt?: string;
    /** 会话 ID 生成器，默认 sess-<uuid> */
    generateId?: () => string;
}

export interface HandleMessageResult {
    sessionId: string;
    reply: string;
}

/**
 * 会话状态机：UNINITIALIZED → ACTIVE (首次接触) → ACTIVE (之后的每一轮)
 * 历史只追加不压缩：user 轮在调用后端前写入，assistant 轮只来自该次调用的结果
 */
export class SessionManager {
    // 同一会话的多轮调用排队执行，避免交错写入历史
    private readonly turnLock = new KeyedLock();

    constructor(
        private readonly storage: ISessionStorage,
        private readonly llm: ILLMProvider,
        private readonly options: SessionManagerOptions = {}
    ) { }

    /**
     * 会话 ID 缺失或不存在时新建会话并写入系统指令，已存在则原样返回；从不失败
     */
    public async beginOrContinue(sessionId?: string): Promise<string> {
        if (sessionId && await this.storage.loadSession(sessionId)) {
            return sessionId;
        }

        const newId = this.options.generateId ? this.options.generateId() : `sess-${randomUUID()}`;
        const now = Date.now();
        const session: SessionData = { sessionId: newId, createdAt: now, updatedAt: now, messages: [] };
        if (this.options.systemPrompt) {
            this.append(session, 'system', this.options.systemPrompt);
        }
        await this.storage.saveSession(newId, session);

        console.log(`[Session Manager] 新建会话 ${newId}${sessionId ? ` (未找到请求的会话 ${sessionId})` : ''}`);
        return newId;
    }

    /**
     * 追加一条用户消息，把完整历史交给后端，成功后追加 assistant 回复并返回。
     * 后端失败时已写入的 user 轮不回滚，重新提交会追加一条新的 user 轮。
     */
    public async submit(sessionId: string, userText: string, options?: ChatOptions): Promise<string> {
        return this.turnLock.run(sessionId, async () => {
            const session = await this.storage.loadSession(sessionId);
            if (!session) {
                throw new SessionNotFoundError(sessionId);
            }

            this.append(session, 'user', userText);
            await this.storage.saveSession(sessionId, session);

            console.log(`[Session Manager] 会话 ${sessionId} 向模型喂入 ${session.messages.length} 条上下文。`);

            let reply: string;
            try {
                const response = await this.llm.chat([...session.messages], options);
                reply = response.content;
            } catch (error) {
                console.error(`[Session Manager] 会话 ${sessionId} 的后端调用失败，保留已写入的用户消息:`, error);
                throw error;
            }

            this.append(session, 'assistant', reply);
            await this.storage.saveSession(sessionId, session);
            return reply;
        });
    }

    /**
     * 网关入口：先定位或新建会话，再提交一轮对话
     */
    public async handleMessage(sessionId: string | undefined, userText: string, options?: ChatOptions): Promise<HandleMessageResult> {
        const activeId = await this.beginOrContinue(sessionId);
        const reply = await this.submit(activeId, userText, options);
        return { sessionId: activeId, reply };
    }

    public async getHistory(sessionId: string): Promise<ChatMessage[] | null> {
        const session = await this.storage.loadSession(sessionId);
        return session ? [...session.messages] : null;
    }

    public async listSessions(): Promise<SessionSummary[]> {
        const summaries: SessionSummary[] = [];
        for (const id of await this.storage.listSessionIds()) {
            const row = await this.storage.loadSession(id);
            if (row) {
                summaries.push({
                    sessionId: row.sessionId,
                    createdAt: row.createdAt,
                    updatedAt: row.updatedAt,
                    messageCount: row.messages.length
                });
            }
        }
        return summaries.sort((a, b) => b.updatedAt - a.updatedAt);
    }

    private append(session: SessionData, role: Role, content: string): void {
        session.messages.push(Object.freeze({ role, content }));
        session.updatedAt = Date.now();
    }
}
