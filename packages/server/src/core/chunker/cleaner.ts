import { ChunkCleanError } from '../errors.js';
import { ILLMProvider } from '../llm/interfaces.js';
import { assertModelConfig } from '../llm/model-config.js';
import { ITokenCounter } from '../tokenizer/interfaces.js';
import { chunkText } from './chunker.js';
import { DEFAULT_EXPECTED_OUTPUT_RATIO, needsChunking } from './gate.js';

export function buildCleanPrompt(text: string): string {
    return `Can you please clean this text and reply only with the clean one?: "${text}"`;
}

export interface DocumentCleanerOptions {
    /** 清洗任务使用的模型，不传则由 Provider 决定 */
    model?: string;
    outputRatio?: number;
}

export interface CleanResult {
    content: string;
    /** 实际发送给后端的片段数，不需要切片时为 1 */
    chunks: number;
}

export class DocumentCleaner {
    constructor(
        private readonly llm: ILLMProvider,
        private readonly counter: ITokenCounter,
        private readonly options: DocumentCleanerOptions = {}
    ) {
        assertModelConfig(llm.getModelConfig(), 'Document Cleaner');
    }

    /**
     * 清洗整篇文档：超出窗口时先切片，再按原顺序逐片串行清洗并用单个空格拼接
     * 第 i 片失败时整体失败，已清洗的片段挂在 ChunkCleanError 上，不做部分拼接
     */
    public async cleanDocument(text: string, signal?: AbortSignal): Promise<CleanResult> {
        const { contextWindow, maxOutputTokens } = this.llm.getModelConfig();
        const outputRatio = this.options.outputRatio ?? DEFAULT_EXPECTED_OUTPUT_RATIO;

        if (!needsChunking(text, contextWindow, this.counter, outputRatio)) {
            console.log(`[Document Cleaner] 文档未超出窗口 (${contextWindow})，整篇一次清洗。`);
            return { content: await this.cleanOnce(text, signal), chunks: 1 };
        }

        const maxInputTokens = contextWindow - maxOutputTokens;
        const chunks = chunkText(text, maxInputTokens, this.counter);
        console.log(`[Document Cleaner] 文档超出窗口，按每片 ${maxInputTokens} tokens 切成 ${chunks.length} 片，开始串行清洗...`);

        const cleaned: string[] = [];
        for (let i = 0; i < chunks.length; i++) {
            try {
                cleaned.push(await this.cleanOnce(chunks[i], signal));
            } catch (error) {
                console.error(`[Document Cleaner] 第 ${i + 1}/${chunks.length} 片清洗失败，已完成 ${cleaned.length} 片。`);
                throw new ChunkCleanError(i, chunks.length, [...cleaned], error);
            }
            console.log(`[Document Cleaner] 第 ${i + 1}/${chunks.length} 片清洗完成。`);
        }

        return { content: cleaned.join(' '), chunks: chunks.length };
    }

    private async cleanOnce(text: string, signal?: AbortSignal): Promise<string> {
        const response = await this.llm.chat(
            [{ role: 'user', content: buildCleanPrompt(text) }],
            { model: this.options.model, signal }
        );
        return response.content;
    }
}
