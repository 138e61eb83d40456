// 会话与文档清洗相关的可配置常量

const DEFAULT_SYSTEM_PROMPT = [
    'You are a skeptical, discerning buyer. The user is a salesperson trying to convince you to purchase a product.',
    'Ask critical questions, challenge vague or weak claims and express doubt when the offer is irrelevant or unconvincing.',
    'Only agree to buy when the pitch is specific, relevant to your needs and genuinely persuasive.',
    'Stay polite and respectful, but firm and objective.'
].join(' ');

export type TokenCounterKind = 'word' | 'tiktoken';

function parseTokenCounterKind(raw: string | undefined): TokenCounterKind {
    if (raw === 'tiktoken') return 'tiktoken';
    if (raw && raw !== 'word') {
        console.warn(`[Config] 未知的 TOKEN_COUNTER=${raw}，退回 word 计数器`);
    }
    return 'word';
}

export const relayConfig = {
    // 显式设置为空字符串即表示不注入系统指令
    systemPrompt: process.env.CHAT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    tokenCounter: parseTokenCounterKind(process.env.TOKEN_COUNTER),
    tiktokenEncoding: process.env.TIKTOKEN_ENCODING || 'cl100k_base',
    // 整篇文档门控假设的输出/输入比例
    expectedOutputRatio: 0.8
};
