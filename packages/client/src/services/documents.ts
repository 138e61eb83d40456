import * as fs from 'fs';
import * as path from 'path';
import { DocumentDecodeError, DocumentNotFoundError, DocumentReadError } from '../errors.js';

export interface DocumentSource {
    read(name: string): Promise<string>;
}

function hasErrorCode(error: unknown): error is Error & { code: unknown } {
    return error instanceof Error && 'code' in error;
}

/**
 * 从固定目录读取待清洗的文本文件，按严格 UTF-8 解码
 */
export class FileDocumentSource implements DocumentSource {
    private readonly rootDir: string;

    constructor(baseDir: string) {
        this.rootDir = path.resolve(baseDir);
    }

    public async read(name: string): Promise<string> {
        const filePath = path.resolve(this.rootDir, name);
        const relative = path.relative(this.rootDir, filePath);
        // 空名字或者跳出目录的路径一律视为不存在
        if (!name.trim() || !relative || relative === '..' || relative.startsWith('..' + path.sep) || path.isAbsolute(relative)) {
            throw new DocumentNotFoundError(name);
        }

        let bytes: Buffer;
        try {
            bytes = await fs.promises.readFile(filePath);
        } catch (error) {
            if (hasErrorCode(error) && (error.code === 'ENOENT' || error.code === 'EISDIR' || error.code === 'ENOTDIR')) {
                throw new DocumentNotFoundError(name, { cause: error });
            }
            throw new DocumentReadError(name, { cause: error });
        }

        try {
            return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
        } catch (error) {
            throw new DocumentDecodeError(name, { cause: error });
        }
    }
}
