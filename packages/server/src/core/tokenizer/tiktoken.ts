import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import { ITokenCounter } from './interfaces.js';

/**
 * 基于 BPE 子词表的精确计数器
 * 词表与后端模型不完全一致时仍是比单词数更贴近的估计
 */
export class TiktokenCounter implements ITokenCounter {
    private readonly encoder: Tiktoken;

    constructor(encoding: TiktokenEncoding = 'cl100k_base') {
        this.encoder = getEncoding(encoding);
        console.log(`[Tokenizer] 已加载 BPE 词表: ${encoding}`);
    }

    countTokens(text: string): number {
        return text ? this.encoder.encode(text).length : 0;
    }
}
