import { ClientError, DocumentDecodeError, DocumentNotFoundError, RelayRequestError } from './errors.js';
import { DocumentSource } from './services/documents.js';
import { RelayApi } from './services/socket.js';

export interface ShellIO {
    question(prompt: string): Promise<string>;
    print(line: string): void;
}

const TRANSPORT_CODES = new Set(['TRANSPORT_ERROR', 'TIMEOUT_ERROR', 'BACKEND_HTTP_ERROR', 'ABORTED']);

/**
 * 把各类失败折叠成一句可以直接打印给用户的话，不同类别措辞不同
 */
export function describeError(error: unknown): string {
    if (error instanceof DocumentNotFoundError) {
        return '文件不存在。';
    }
    if (error instanceof DocumentDecodeError) {
        return '文件不是合法的 UTF-8 文本，无法读取。';
    }
    if (error instanceof RelayRequestError) {
        if (TRANSPORT_CODES.has(error.code)) return `传输失败: ${error.message}`;
        if (error.code === 'MALFORMED_RESPONSE') return `模型回复异常: ${error.message}`;
        if (error.code === 'VALIDATION_ERROR') return `请求无效: ${error.message}`;
        return `请求失败 [${error.code}]: ${error.message}`;
    }
    if (error instanceof ClientError) {
        return error.message;
    }
    return `未知错误: ${error instanceof Error ? error.message : String(error)}`;
}

export class RelayShell {
    constructor(
        private readonly io: ShellIO,
        private readonly api: RelayApi,
        private readonly documents: DocumentSource,
        private readonly exitWord: string = 'bye'
    ) { }

    public async run(): Promise<void> {
        this.io.print(`(输入 '${this.exitWord}' 退出)\n选择模式:\n\t[1] 与 LLM 对话\n\t[2] 清洗文档`);

        while (true) {
            const input = (await this.io.question('\nYou: ')).trim();
            if (this.isExit(input)) break;

            if (input === '1') {
                await this.chatMode();
                this.printMenu();
            } else if (input === '2') {
                await this.cleanMode();
                this.printMenu();
            } else {
                this.io.print('无效输入，请重试。');
            }
        }
    }

    /**
     * 对话模式：沿用上一轮回复里的会话 ID，让服务端保持上下文
     */
    public async chatMode(): Promise<void> {
        this.io.print(`====================\n(输入 '${this.exitWord}' 退出)\n -> *[LLM 对话模式]*`);
        let sessionId: string | undefined;

        while (true) {
            const input = await this.io.question('\nYou: ');
            if (this.isExit(input.trim())) break;
            if (!input.trim()) {
                this.io.print('输入为空，请重试。');
                continue;
            }

            try {
                const result = await this.api.sendChatMessage(sessionId, input);
                sessionId = result.sessionId;
                this.io.print(`LLM: ${result.reply}`);
            } catch (error) {
                this.io.print(describeError(error));
            }
        }
    }

    public async cleanMode(): Promise<void> {
        this.io.print(`====================\n(输入 '${this.exitWord}' 退出)\n -> *[文档清洗模式]*`);

        while (true) {
            const name = (await this.io.question('\n文档名称: ')).trim();
            if (this.isExit(name)) break;

            try {
                const text = await this.documents.read(name);
                const result = await this.api.cleanDocument(text);
                this.io.print(`清洗结果 (${result.chunks} 片): ${result.reply}`);
            } catch (error) {
                this.io.print(describeError(error));
            }
        }
    }

    private printMenu(): void {
        this.io.print(`已返回主菜单。\n(输入 '${this.exitWord}' 退出)\n选择模式:\n\t[1] 与 LLM 对话\n\t[2] 清洗文档`);
    }

    private isExit(input: string): boolean {
        return input.toLowerCase() === this.exitWord;
    }
}
