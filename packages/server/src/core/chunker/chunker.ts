import { ITokenCounter } from '../tokenizer/interfaces.js';

/**
 * 按空白拆词后贪心装填：每加入一个词就对整个候选片段重新计数，
 * 一旦超出 maxTokens 就把这个词退回，封存当前片段，并以该词开启下一个片段。
 *
 * 单个词本身就超预算时不会在词内部切断，它会独占一个片段 (该片段允许超预算)。
 * 所有片段用单个空格拼回即得到空白归一化后的原文。
 */
export function chunkText(text: string, maxTokens: number, counter: ITokenCounter): string[] {
    const words = text.split(/\s+/).filter(word => word.length > 0);
    const chunks: string[] = [];
    let candidate: string[] = [];

    for (const word of words) {
        candidate.push(word);
        if (counter.countTokens(candidate.join(' ')) <= maxTokens) {
            continue;
        }

        candidate.pop();
        if (candidate.length > 0) {
            chunks.push(candidate.join(' '));
        }
        candidate = [word];
    }

    if (candidate.length > 0) {
        chunks.push(candidate.join(' '));
    }
    return chunks;
}
