import { Server, Socket } from 'socket.io';
import { Server as HttpServer } from 'http';
import { DocumentCleaner } from '../core/chunker/cleaner.js';
import { SessionManager } from '../core/session/manager.js';
import { ChatController } from './controllers/chat.js';
import { CleanController } from './controllers/clean.js';
import { SessionController } from './controllers/session.js';

/**
 * 启动 WebSocket 服务器，向客户端暴露对话与文档清洗能力
 */
export function setupWebSocketServer(
    httpServer: HttpServer,
    sessionManager: SessionManager,
    cleaner: DocumentCleaner
): Server {
    const io = new Server(httpServer, {
        cors: {
            origin: "*",
            methods: ["GET", "POST"]
        }
    });

    const chatController = new ChatController(sessionManager);
    const cleanController = new CleanController(cleaner);
    const sessionController = new SessionController(sessionManager);

    io.on('connection', (socket: Socket) => {
        console.log(`[WebSocket] 新的客户终端已连接: ${socket.id}`);

        // 每条连接一个中止源：终端断开后不再等待它发起的后端调用
        const inflight = new AbortController();

        chatController.registerEvents(socket, inflight.signal);
        cleanController.registerEvents(socket, inflight.signal);
        sessionController.registerEvents(socket);

        socket.on('disconnect', () => {
            inflight.abort();
            console.log(`[WebSocket] 客户终端连接断开: ${socket.id}`);
        });
    });

    console.log('[WebSocket] Socket.IO 服务已挂载并开始监听。');
    return io;
}
