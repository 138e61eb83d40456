export class ClientError extends Error {
    constructor(message: string, public readonly code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ClientError';
    }
}

export class DocumentNotFoundError extends ClientError {
    constructor(public readonly documentName: string, options?: ErrorOptions) {
        super(`文档不存在: ${documentName}`, 'DOCUMENT_NOT_FOUND', options);
        this.name = 'DocumentNotFoundError';
    }
}

export class DocumentDecodeError extends ClientError {
    constructor(public readonly documentName: string, options?: ErrorOptions) {
        super(`文档不是合法的 UTF-8 文本: ${documentName}`, 'DOCUMENT_DECODE_ERROR', options);
        this.name = 'DocumentDecodeError';
    }
}

export class DocumentReadError extends ClientError {
    constructor(public readonly documentName: string, options?: ErrorOptions) {
        super(`读取文档失败: ${documentName}`, 'DOCUMENT_READ_ERROR', options);
        this.name = 'DocumentReadError';
    }
}

/** 服务端返回的失败 ack，或者请求根本没有得到 ack */
export class RelayRequestError extends ClientError {
    constructor(code: string, message: string, options?: ErrorOptions) {
        super(message, code, options);
        this.name = 'RelayRequestError';
    }
}
