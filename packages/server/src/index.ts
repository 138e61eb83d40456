// 优先加载环境变量
import { sysConfig } from './config/env.js';
import { relayConfig } from './config/relay.js';
import { LLMFactory } from './core/llm/factory.js';
import { OllamaProvider } from './providers/llm/ollama/index.js';
import { ollamaConfig } from './providers/llm/ollama/config.js';
import { createTokenCounter } from './core/tokenizer/factory.js';
import { DocumentCleaner } from './core/chunker/cleaner.js';
import { MemorySessionAdapter } from './core/session/adapters/memory.js';
import { SessionManager } from './core/session/manager.js';

import { setupWebSocketServer } from './api/ws.js';
import { createServer } from 'http';

async function main() {
    LLMFactory.register('ollama', new OllamaProvider());
    const assistant = LLMFactory.get(sysConfig.llmProvider);

    const counter = createTokenCounter(relayConfig.tokenCounter, relayConfig.tiktokenEncoding);
    const cleaner = new DocumentCleaner(assistant, counter, {
        model: ollamaConfig.cleanModel,
        outputRatio: relayConfig.expectedOutputRatio
    });

    // 会话仅存在于内存中：随进程启动创建，进程退出即丢失
    const sessionStorage = new MemorySessionAdapter();
    const sessionManager = new SessionManager(sessionStorage, assistant, {
        systemPrompt: relayConfig.systemPrompt
    });

    const httpServer = createServer((req, res) => {
        res.writeHead(200);
        res.end('LLM relay server is running...\n');
    });

    setupWebSocketServer(httpServer, sessionManager, cleaner);

    httpServer.listen(sysConfig.port, () => {
        console.log(`\n🚀 [Server] 对话中继服务已启动 (${sysConfig.nodeEnv})`);
        console.log(`📡 [Network] HTTP & WebSocket 监听端口: http://localhost:${sysConfig.port}\n`);
    });
}

main().catch((error) => {
    console.error('❌ 服务端运行异常:', error);
    process.exit(1);
});
