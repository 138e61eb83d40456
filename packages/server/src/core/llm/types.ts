/**
 * 角色定义：会话历史中只允许出现这三种角色
 */
export type Role = 'system' | 'user' | 'assistant';

/**
 * 标准化的对话消息体
 */
export interface ChatMessage {
    readonly role: Role;
    readonly content: string;
}

/**
 * 统一的对话参数选项
 */
export interface ChatOptions {
    model?: string; // 如果不传，由 Provider 自己的 config 决定默认模型
    temperature?: number;

    /** 调用方中止信号：触发后立即停止等待后端回复 */
    signal?: AbortSignal;
}

/**
 * 后端返回的一次性完整回复
 */
export interface ChatResponse {
    content: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

/**
 * 模型的元计算配置信息
 */
export interface ModelConfig {
    /** 模型一次调用能处理的最大上下文窗口 (输入 + 输出) */
    contextWindow: number;
    /** 为模型生成预留的固定输出空间，切片时从窗口里扣除 */
    maxOutputTokens: number;
}
