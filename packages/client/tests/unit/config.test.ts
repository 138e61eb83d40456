import { describe, it, expect } from 'vitest';
import { loadClientConfig } from '../../src/config.js';

describe('loadClientConfig', () => {
    it('waits longer for a chat ack than the server waits for the backend', () => {
        const config = loadClientConfig({});

        expect(config.chatTimeoutMs).toBe(130000);
        expect(config.chatTimeoutMs).toBeGreaterThan(120000);
        expect(config.cleanTimeoutMs).toBe(600000);
    });

    it('reads timeouts from the environment and ignores unusable values', () => {
        const config = loadClientConfig({ CHAT_TIMEOUT_MS: '5000', CLEAN_TIMEOUT_MS: '-1' });

        expect(config.chatTimeoutMs).toBe(5000);
        expect(config.cleanTimeoutMs).toBe(600000);
    });
});
