export interface ErrorPayload {
    code: string;
    message: string;
}

/** 所有事件的 ack 回包：成功时携带业务字段，失败时携带分类后的错误 */
export type AckResponse<T extends object> = ({ ok: true } & T) | { ok: false; error: ErrorPayload };

export type Ack<T extends object> = (response: AckResponse<T>) => void;
