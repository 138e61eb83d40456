import { ConfigurationError } from '../errors.js';
import { ModelConfig } from './types.js';

/**
 * 切片预算是 contextWindow - maxOutputTokens，必须留出正的输入空间
 */
export function assertModelConfig(config: ModelConfig, source: string): void {
    const { contextWindow, maxOutputTokens } = config;
    if (!Number.isInteger(contextWindow) || contextWindow <= 0) {
        throw new ConfigurationError(`[${source}] 上下文窗口必须是正整数，当前为 ${contextWindow}`);
    }
    if (!Number.isInteger(maxOutputTokens) || maxOutputTokens < 0) {
        throw new ConfigurationError(`[${source}] 输出预留必须是非负整数，当前为 ${maxOutputTokens}`);
    }
    if (maxOutputTokens >= contextWindow) {
        throw new ConfigurationError(
            `[${source}] 输出预留 (${maxOutputTokens}) 必须小于上下文窗口 (${contextWindow})，否则没有可用的输入空间`
        );
    }
}
