import type { TiktokenEncoding } from 'js-tiktoken';
import { TokenCounterKind } from '../../config/relay.js';
import { ITokenCounter } from './interfaces.js';
import { TiktokenCounter } from './tiktoken.js';
import { WordTokenCounter } from './word.js';

const KNOWN_ENCODINGS: readonly TiktokenEncoding[] = ['gpt2', 'r50k_base', 'p50k_base', 'p50k_edit', 'cl100k_base', 'o200k_base'];

function isKnownEncoding(name: string): name is TiktokenEncoding {
    return KNOWN_ENCODINGS.some(known => known === name);
}

export function createTokenCounter(kind: TokenCounterKind, encoding: string = 'cl100k_base'): ITokenCounter {
    if (kind === 'tiktoken') {
        if (!isKnownEncoding(encoding)) {
            throw new Error(`[Tokenizer] 不支持的 BPE 词表: ${encoding}，可选值: ${KNOWN_ENCODINGS.join(', ')}`);
        }
        return new TiktokenCounter(encoding);
    }
    return new WordTokenCounter();
}
