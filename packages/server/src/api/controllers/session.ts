import { Socket } from 'socket.io';
import { toErrorPayload } from '../../core/errors.js';
import { ChatMessage } from '../../core/llm/types.js';
import { SessionSummary } from '../../core/session/interfaces.js';
import { SessionManager } from '../../core/session/manager.js';
import { parsePayload, sessionHistoryPayload } from '../validation.js';
import { Ack } from '../types.js';

export class SessionController {
    constructor(private readonly sessionManager: SessionManager) { }

    public registerEvents(socket: Socket) {
        socket.on('get_session_list', async (_: unknown, callback?: Ack<{ sessions: SessionSummary[] }>) => {
            try {
                const sessions = await this.sessionManager.listSessions();
                callback?.({ ok: true, sessions });
            } catch (error) {
                callback?.({ ok: false, error: toErrorPayload(error) });
            }
        });

        socket.on('get_session_history', async (payload: unknown, callback?: Ack<{ session: { sessionId: string; messages: ChatMessage[] } | null }>) => {
            try {
                const { sessionId } = parsePayload(sessionHistoryPayload, payload);
                const messages = await this.sessionManager.getHistory(sessionId);
                callback?.({ ok: true, session: messages ? { sessionId, messages } : null });
            } catch (error) {
                callback?.({ ok: false, error: toErrorPayload(error) });
            }
        });
    }
}
