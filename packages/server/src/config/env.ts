// 负责加载基础的全局 .env 并汇总系统级配置
import * as dotenv from 'dotenv';
import * as path from 'path';

// 根据运行环境设定读取不同的 .env 文件
const nodeEnv = process.env.NODE_ENV || 'development';
const envFile = `.env.${nodeEnv}`;

// 以进程工作目录 (server 包根目录) 为基准查找 .env 文件
const envPath = path.resolve(process.cwd(), envFile);

console.log(`[Config] 加载环境变量文件: ${envFile} (Path: ${envPath})`);
dotenv.config({ path: envPath });

export const sysConfig = {
    port: Number(process.env.PORT) || 3000,
    llmProvider: process.env.LLM_PROVIDER || 'ollama',
    nodeEnv
};
