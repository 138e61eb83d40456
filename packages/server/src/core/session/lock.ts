/**
 * 按 key 串行化的异步锁：同一 key 的任务排队执行，不同 key 之间互不阻塞
 */
export class KeyedLock {
    private readonly tails: Map<string, Promise<void>> = new Map();

    public async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
        const previousTail = this.tails.get(key) || Promise.resolve();

        let release = () => { };
        const currentGate = new Promise<void>((resolve) => {
            release = resolve;
        });

        const currentTail = previousTail.then(() => currentGate);
        this.tails.set(key, currentTail);

        await previousTail;
        try {
            return await fn();
        } finally {
            release();
            // 队尾仍是自己说明后面没有排队者：删掉 key，否则每个出现过的会话都会在 Map 里留下一项
            if (this.tails.get(key) === currentTail) {
                this.tails.delete(key);
            }
        }
    }

    public get activeKeys(): number {
        return this.tails.size;
    }
}
