import { Socket } from 'socket.io';
import { toErrorPayload } from '../../core/errors.js';
import { SessionManager } from '../../core/session/manager.js';
import { chatMessagePayload, parsePayload } from '../validation.js';
import { Ack } from '../types.js';

export class ChatController {
    constructor(private readonly sessionManager: SessionManager) { }

    /**
     * @param signal 连接断开时触发，用于放弃仍在等待的后端调用
     */
    public registerEvents(socket: Socket, signal: AbortSignal) {
        socket.on('chat_message', async (payload: unknown, callback?: Ack<{ sessionId: string; reply: string }>) => {
            try {
                const { sessionId, content } = parsePayload(chatMessagePayload, payload);
                console.log(`[WS API] 收到聊天消息 -> SessionId: ${sessionId ?? '(新会话)'}, Content: ${content.substring(0, 50)}...`);

                const result = await this.sessionManager.handleMessage(sessionId ?? undefined, content, { signal });
                callback?.({ ok: true, sessionId: result.sessionId, reply: result.reply });
            } catch (error) {
                console.error(`[WS API] 对话执行失败:`, error);
                callback?.({ ok: false, error: toErrorPayload(error) });
            }
        });
    }
}
