import * as dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';

const nodeEnv = process.env.NODE_ENV || 'development';
dotenv.config({ path: path.resolve(process.cwd(), `.env.${nodeEnv}`) });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().catch(fallback);

const clientTimeouts = z.object({
    // 比服务端的后端超时 (120s) 多留一点，让后端超时以 TIMEOUT_ERROR 回到终端
    CHAT_TIMEOUT_MS: positiveInt(130000),
    // 长文档会被切成多片串行清洗，等待时间要比单轮对话长得多
    CLEAN_TIMEOUT_MS: positiveInt(600000),
});

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env) {
    const timeouts = clientTimeouts.parse(env);
    return {
        serverUrl: env.RELAY_SERVER_URL || 'http://127.0.0.1:3000',
        textsDir: env.TEXTS_DIR || './sample_texts',
        exitWord: 'bye',
        chatTimeoutMs: timeouts.CHAT_TIMEOUT_MS,
        cleanTimeoutMs: timeouts.CLEAN_TIMEOUT_MS,
    };
}

export const clientConfig = loadClientConfig();
