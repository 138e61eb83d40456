import { ChatMessage, ChatOptions, ChatResponse, ModelConfig } from './types.js';

/**
 * 核心：大语言模型提供商 (LLM Provider) 必须实现的通用访问接口。
 * 会话管理与文档清洗都只认识这个接口，而不认识具体的 Ollama
 */
export interface ILLMProvider {
    /**
     * 普通对话 (非流式，一次性返回全部结果)
     * 每次调用都有固定超时，失败时抛出 AppError 子类，不做任何重试
     * @param messages 按时间顺序排列的完整消息数组
     * @param options 通用模型选项
     */
    chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;

    /**
     * 获取当前模型的元计算配置 (用于切片器进行窗口控制)
     */
    getModelConfig(): ModelConfig;
}
