import { Socket } from 'socket.io';
import { DocumentCleaner } from '../../core/chunker/cleaner.js';
import { toErrorPayload } from '../../core/errors.js';
import { cleanDocumentPayload, parsePayload } from '../validation.js';
import { Ack } from '../types.js';

export class CleanController {
    constructor(private readonly cleaner: DocumentCleaner) { }

    public registerEvents(socket: Socket, signal: AbortSignal) {
        socket.on('clean_document', async (payload: unknown, callback?: Ack<{ reply: string; chunks: number }>) => {
            try {
                const { content } = parsePayload(cleanDocumentPayload, payload);
                console.log(`[WS API] 收到文档清洗请求 -> 长度: ${content.length} 字符`);

                const result = await this.cleaner.cleanDocument(content, signal);
                callback?.({ ok: true, reply: result.content, chunks: result.chunks });
            } catch (error) {
                console.error(`[WS API] 文档清洗失败:`, error);
                callback?.({ ok: false, error: toErrorPayload(error) });
            }
        });
    }
}
