import { ITokenCounter } from '../tokenizer/interfaces.js';

export const DEFAULT_EXPECTED_OUTPUT_RATIO = 0.8;

/**
 * 整篇文档的窗口门控：假设输出约为输入的 outputRatio 倍，
 * 输入 + 预期输出严格大于窗口时才需要切片 (恰好相等不切)
 *
 * 比例换算成百分比后做整数运算，避免 0.8 * n 的浮点误差影响向下取整
 */
export function exceedsContextWindow(
    tokenCount: number,
    contextWindow: number,
    outputRatio: number = DEFAULT_EXPECTED_OUTPUT_RATIO
): boolean {
    const ratioPercent = Math.round(outputRatio * 100);
    const expectedOutput = Math.floor((tokenCount * ratioPercent) / 100);
    return tokenCount + expectedOutput > contextWindow;
}

export function needsChunking(
    text: string,
    contextWindow: number,
    counter: ITokenCounter,
    outputRatio: number = DEFAULT_EXPECTED_OUTPUT_RATIO
): boolean {
    return exceedsContextWindow(counter.countTokens(text), contextWindow, outputRatio);
}
