import { ILLMProvider } from '../src/core/llm/interfaces.js';
import { ChatMessage, ChatOptions, ChatResponse, ModelConfig } from '../src/core/llm/types.js';
import { ITokenCounter } from '../src/core/tokenizer/interfaces.js';

export type ChatHandler = (messages: ChatMessage[], options: ChatOptions | undefined, callIndex: number) => Promise<string> | string;

/**
 * 进程内的 Provider 桩：记录每次调用的消息快照，回复由 handler 决定
 */
export class FakeLLMProvider implements ILLMProvider {
    public readonly calls: Array<{ messages: ChatMessage[]; options?: ChatOptions }> = [];

    constructor(
        private readonly handler: ChatHandler = (_messages, _options, index) => `reply-${index}`,
        private readonly modelConfig: ModelConfig = { contextWindow: 4096, maxOutputTokens: 1024 }
    ) { }

    async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
        const index = this.calls.length;
        this.calls.push({ messages: [...messages], options });
        return { content: await this.handler(messages, options, index) };
    }

    getModelConfig(): ModelConfig {
        return this.modelConfig;
    }
}

/** 以字符数计 Token，便于构造单词本身就超预算的场景 */
export class CharTokenCounter implements ITokenCounter {
    countTokens(text: string): number {
        return text.length;
    }
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
