import * as readline from 'readline/promises';
import { clientConfig } from './config.js';
import { FileDocumentSource } from './services/documents.js';
import { SocketService } from './services/socket.js';
import { RelayShell } from './shell.js';

async function main() {
    const service = new SocketService(clientConfig.serverUrl, {
        chatTimeoutMs: clientConfig.chatTimeoutMs,
        cleanTimeoutMs: clientConfig.cleanTimeoutMs
    });
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

    // Ctrl+D / Ctrl+C 关闭输入流时直接退出
    rl.on('close', () => {
        service.close();
        process.exit(0);
    });

    const shell = new RelayShell(
        {
            question: (prompt) => rl.question(prompt),
            print: (line) => console.log(line)
        },
        service,
        new FileDocumentSource(clientConfig.textsDir),
        clientConfig.exitWord
    );

    await shell.run();
    rl.close();
}

main().catch((error) => {
    console.error('❌ 客户端运行异常:', error);
    process.exit(1);
});
