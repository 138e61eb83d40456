/**
 * 服务端统一错误类型，code 字段用于向客户端区分错误类别
 */

export class AppError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'AppError';
    }
}

/** 连接被拒、网络中断等传输层失败 */
export class BackendTransportError extends AppError {
    constructor(message: string = '无法连接到模型后端', options?: ErrorOptions, code: string = 'TRANSPORT_ERROR') {
        super(message, code, options);
        this.name = 'BackendTransportError';
    }
}

export class BackendTimeoutError extends BackendTransportError {
    constructor(public readonly timeoutMs: number, options?: ErrorOptions) {
        super(`模型后端在 ${timeoutMs}ms 内未返回结果`, options, 'TIMEOUT_ERROR');
        this.name = 'BackendTimeoutError';
    }
}

export class BackendHTTPError extends BackendTransportError {
    constructor(public readonly status: number, message: string, options?: ErrorOptions) {
        super(`模型后端返回异常状态 ${status}: ${message}`, options, 'BACKEND_HTTP_ERROR');
        this.name = 'BackendHTTPError';
    }
}

/** 调用方主动放弃等待 (例如客户端断开连接) */
export class RequestAbortedError extends BackendTransportError {
    constructor(options?: ErrorOptions) {
        super('请求已被调用方中止', options, 'ABORTED');
        this.name = 'RequestAbortedError';
    }
}

export class MalformedResponseError extends AppError {
    constructor(message: string = '模型后端的回复缺少 message.content 字段') {
        super(message, 'MALFORMED_RESPONSE');
        this.name = 'MalformedResponseError';
    }
}

/**
 * 分片清洗中途失败：已经清洗完的片段保留在错误对象上，但不会拼出最终结果
 */
export class ChunkCleanError extends AppError {
    constructor(
        public readonly failedIndex: number,
        public readonly totalChunks: number,
        public readonly cleanedChunks: readonly string[],
        cause: unknown
    ) {
        super(
            `第 ${failedIndex + 1}/${totalChunks} 个片段清洗失败: ${cause instanceof Error ? cause.message : String(cause)}`,
            cause instanceof AppError ? cause.code : 'INTERNAL_ERROR',
            { cause }
        );
        this.name = 'ChunkCleanError';
    }
}

/** 启动时发现的配置矛盾，例如输出预留不小于上下文窗口 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR');
        this.name = 'ConfigurationError';
    }
}

export class SessionNotFoundError extends AppError {
    constructor(public readonly sessionId: string) {
        super(`会话不存在: ${sessionId}`, 'SESSION_NOT_FOUND');
        this.name = 'SessionNotFoundError';
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR');
        this.name = 'ValidationError';
    }
}

/**
 * 将任意异常折叠成可以直接发给客户端的结构
 */
export function toErrorPayload(error: unknown): { code: string; message: string } {
    if (error instanceof AppError) {
        return { code: error.code, message: error.message };
    }
    if (error instanceof Error) {
        return { code: 'INTERNAL_ERROR', message: error.message };
    }
    return { code: 'INTERNAL_ERROR', message: String(error) };
}
