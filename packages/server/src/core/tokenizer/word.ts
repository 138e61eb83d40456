import { ITokenCounter } from './interfaces.js';

/**
 * 以空白分隔的单词数作为 Token 数的粗略代理
 */
export class WordTokenCounter implements ITokenCounter {
    countTokens(text: string): number {
        const trimmed = text.trim();
        return trimmed ? trimmed.split(/\s+/).length : 0;
    }
}
