import { Ollama, type ChatResponse as OllamaChatResponse } from 'ollama';
import { ILLMProvider } from '../../../core/llm/interfaces.js';
import { ChatMessage, ChatOptions, ChatResponse, ModelConfig } from '../../../core/llm/types.js';
import {
    AppError,
    BackendHTTPError,
    BackendTimeoutError,
    BackendTransportError,
    MalformedResponseError,
    RequestAbortedError
} from '../../../core/errors.js';
import { assertModelConfig } from '../../../core/llm/model-config.js';
import { ollamaConfig, OllamaProviderConfig } from './config.js';

// ollama 的 ResponseError 携带后端 HTTP 状态码
function hasStatusCode(error: unknown): error is Error & { status_code: number } {
    return error instanceof Error && 'status_code' in error && typeof error.status_code === 'number';
}

/** 单次调用的现场记录，用于区分"连不上"和"连上了但回包不对" */
interface CallState {
    responded: boolean;
}

export class OllamaProvider implements ILLMProvider {
    private readonly config: OllamaProviderConfig;

    /**
     * @param overrides 覆盖环境变量中的默认配置
     * @param fetchImpl 底层 HTTP 实现，测试时可替换为进程内桩
     */
    constructor(overrides: Partial<OllamaProviderConfig> = {}, private readonly fetchImpl: typeof fetch = fetch) {
        this.config = { ...ollamaConfig, ...overrides };
        assertModelConfig(this.config, 'Ollama');
        console.log(`[Ollama] Provider 初始化完成，指向服务: ${this.config.host} (Win: ${this.config.contextWindow}, 超时: ${this.config.timeoutMs}ms)`);
    }

    async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
        const model = options?.model || this.config.chatModel;
        if (options?.signal?.aborted) {
            throw new RequestAbortedError();
        }

        const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
        const callSignal = options?.signal ? AbortSignal.any([timeoutSignal, options.signal]) : timeoutSignal;
        const state: CallState = { responded: false };

        // 每次调用创建独立客户端，把本次调用的中止信号注入 fetch，互不干扰
        const client = new Ollama({ host: this.config.host, fetch: this.bindSignal(callSignal, state) });

        console.log(`[Ollama] 借助本地引擎使用 ${model} 模型计算中 (${messages.length} 条上下文)...`);

        let response: OllamaChatResponse;
        try {
            response = await this.raceWithSignal(
                client.chat({
                    model,
                    messages: messages.map(msg => ({ role: msg.role, content: msg.content })),
                    stream: false,
                    options: {
                        num_ctx: this.config.contextWindow,
                        temperature: options?.temperature
                    }
                }),
                callSignal
            );
        } catch (error) {
            throw this.mapError(error, state, timeoutSignal, options?.signal);
        }

        const content: unknown = response?.message?.content;
        if (typeof content !== 'string') {
            console.error(`[Ollama] 回包结构异常，缺少 message.content 字段`);
            throw new MalformedResponseError();
        }

        return {
            content,
            usage: {
                promptTokens: response.prompt_eval_count || 0,
                completionTokens: response.eval_count || 0,
                totalTokens: (response.prompt_eval_count || 0) + (response.eval_count || 0)
            }
        };
    }

    getModelConfig(): ModelConfig {
        return {
            contextWindow: this.config.contextWindow,
            maxOutputTokens: this.config.maxOutputTokens
        };
    }

    private bindSignal(signal: AbortSignal, state: CallState): typeof fetch {
        return async (input, init) => {
            const merged = init?.signal ? AbortSignal.any([signal, init.signal]) : signal;
            const res = await this.fetchImpl(input, { ...init, signal: merged });
            state.responded = true;
            return res;
        };
    }

    // fetch 实现不一定尊重 signal，这里保证中止后调用方一定不再等待
    private raceWithSignal<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const onAbort = () => reject(signal.reason);
            if (signal.aborted) {
                onAbort();
                return;
            }
            signal.addEventListener('abort', onAbort, { once: true });
            task.then(
                value => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(value);
                },
                error => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }

    private mapError(error: unknown, state: CallState, timeoutSignal: AbortSignal, callerSignal?: AbortSignal): AppError {
        if (error instanceof AppError) return error;

        const reason = error instanceof Error ? error.message : String(error);
        if (callerSignal?.aborted) {
            console.warn(`[Ollama] 调用方已中止请求，停止等待后端回复`);
            return new RequestAbortedError({ cause: error });
        }
        if (timeoutSignal.aborted) {
            console.error(`[Ollama] 请求超时 (${this.config.timeoutMs}ms)`);
            return new BackendTimeoutError(this.config.timeoutMs, { cause: error });
        }
        if (hasStatusCode(error)) {
            console.error(`[Ollama] 后端返回异常状态 ${error.status_code}: ${reason}`);
            return new BackendHTTPError(error.status_code, reason, { cause: error });
        }
        if (state.responded) {
            console.error(`[Ollama] 后端回包无法解析: ${reason}`);
            return new MalformedResponseError(`模型后端的回复无法解析: ${reason}`);
        }
        console.error(`[Ollama] 无法连接到 ${this.config.host}: ${reason}`);
        return new BackendTransportError(`无法连接到模型后端 ${this.config.host}: ${reason}`, { cause: error });
    }
}
