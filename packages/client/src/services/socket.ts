import { io, Socket } from 'socket.io-client';
import { z } from 'zod';
import { RelayRequestError } from '../errors.js';

export interface ChatReply {
    sessionId: string;
    reply: string;
}

export interface CleanReply {
    reply: string;
    chunks: number;
}

/** 交互终端依赖的服务端能力 */
export interface RelayApi {
    sendChatMessage(sessionId: string | undefined, content: string): Promise<ChatReply>;
    cleanDocument(content: string): Promise<CleanReply>;
}

const errorAck = z.object({
    ok: z.literal(false),
    error: z.object({ code: z.string(), message: z.string() })
});

const chatAck = z.discriminatedUnion('ok', [
    z.object({ ok: z.literal(true), sessionId: z.string(), reply: z.string() }),
    errorAck
]);

const cleanAck = z.discriminatedUnion('ok', [
    z.object({ ok: z.literal(true), reply: z.string(), chunks: z.number() }),
    errorAck
]);

export interface SocketServiceOptions {
    chatTimeoutMs: number;
    cleanTimeoutMs: number;
}

export class SocketService implements RelayApi {
    private socket: Socket;

    constructor(url: string, private readonly options: SocketServiceOptions) {
        this.socket = io(url, {
            autoConnect: true,
        });

        this.socket.on('connect', () => {
            console.log(`[Client] 已连接到中继服务: ${url}`);
        });

        this.socket.on('disconnect', () => {
            console.log('[Client] 与中继服务的连接已断开');
        });
    }

    async sendChatMessage(sessionId: string | undefined, content: string): Promise<ChatReply> {
        const parsed = chatAck.safeParse(await this.emit('chat_message', { sessionId, content }, this.options.chatTimeoutMs));
        if (!parsed.success) {
            throw new RelayRequestError('MALFORMED_RESPONSE', '服务端回包结构异常');
        }
        if (!parsed.data.ok) {
            throw new RelayRequestError(parsed.data.error.code, parsed.data.error.message);
        }
        return { sessionId: parsed.data.sessionId, reply: parsed.data.reply };
    }

    async cleanDocument(content: string): Promise<CleanReply> {
        const parsed = cleanAck.safeParse(await this.emit('clean_document', { content }, this.options.cleanTimeoutMs));
        if (!parsed.success) {
            throw new RelayRequestError('MALFORMED_RESPONSE', '服务端回包结构异常');
        }
        if (!parsed.data.ok) {
            throw new RelayRequestError(parsed.data.error.code, parsed.data.error.message);
        }
        return { reply: parsed.data.reply, chunks: parsed.data.chunks };
    }

    close(): void {
        this.socket.disconnect();
    }

    // 等不到 ack 时不无限阻塞，超时按传输失败上报
    private async emit(event: string, payload: object, timeoutMs: number): Promise<unknown> {
        await this.ensureConnected(timeoutMs);
        try {
            const response: unknown = await this.socket.timeout(timeoutMs).emitWithAck(event, payload);
            return response;
        } catch (error) {
            throw new RelayRequestError('TRANSPORT_ERROR', `中继服务在 ${timeoutMs}ms 内没有响应`, { cause: error });
        }
    }

    /**
     * 未连接时不把消息交给 socket.io 缓冲：等到连上为止，
     * 一旦本轮连接尝试失败 (例如连接被拒) 就立即按传输失败上报
     */
    private ensureConnected(timeoutMs: number): Promise<void> {
        if (this.socket.connected) {
            return Promise.resolve();
        }
        if (!this.socket.active) {
            return Promise.reject(new RelayRequestError('TRANSPORT_ERROR', '与中继服务的连接已关闭'));
        }

        return new Promise<void>((resolve, reject) => {
            const cleanup = () => {
                clearTimeout(timer);
                this.socket.off('connect', onConnect);
                this.socket.off('connect_error', onError);
            };
            const onConnect = () => {
                cleanup();
                resolve();
            };
            const onError = (error: Error) => {
                cleanup();
                reject(new RelayRequestError('TRANSPORT_ERROR', `无法连接到中继服务: ${error.message}`, { cause: error }));
            };
            const timer = setTimeout(() => {
                cleanup();
                reject(new RelayRequestError('TRANSPORT_ERROR', `中继服务在 ${timeoutMs}ms 内没有建立连接`));
            }, timeoutMs);

            this.socket.on('connect', onConnect);
            this.socket.on('connect_error', onError);
        });
    }
}
