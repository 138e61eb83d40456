import { describe, it, expect } from 'vitest';
import { BackendTransportError, SessionNotFoundError } from '../../src/core/errors.js';
import { MemorySessionAdapter } from '../../src/core/session/adapters/memory.js';
import { SessionManager } from '../../src/core/session/manager.js';
import { FakeLLMProvider, sleep } from '../helpers.js';

function createManager(llm = new FakeLLMProvider(), systemPrompt: string | undefined = 'SYS', generateId?: () => string) {
    const storage = new MemorySessionAdapter();
    return { manager: new SessionManager(storage, llm, { systemPrompt, generateId }), storage, llm };
}

describe('SessionManager.beginOrContinue', () => {
    it('creates a session seeded with the system directive when no id is given', async () => {
        const { manager } = createManager();

        const sessionId = await manager.beginOrContinue();

        expect(sessionId).toMatch(/^sess-/);
        expect(await manager.getHistory(sessionId)).toEqual([{ role: 'system', content: 'SYS' }]);
    });

    it('starts a fresh session for an unknown id instead of failing', async () => {
        const { manager } = createManager();

        const sessionId = await manager.beginOrContinue('does-not-exist');

        expect(sessionId).not.toBe('does-not-exist');
        expect(await manager.getHistory('does-not-exist')).toBeNull();
        expect(await manager.getHistory(sessionId)).toHaveLength(1);
    });

    it('returns an existing id unchanged and never re-appends the directive', async () => {
        const { manager } = createManager();
        const sessionId = await manager.beginOrContinue();

        for (let i = 0; i < 3; i++) {
            expect(await manager.beginOrContinue(sessionId)).toBe(sessionId);
        }
        expect(await manager.getHistory(sessionId)).toEqual([{ role: 'system', content: 'SYS' }]);
    });

    it('leaves the history empty when no directive is configured', async () => {
        const { manager } = createManager(new FakeLLMProvider(), '');

        const sessionId = await manager.beginOrContinue();

        expect(await manager.getHistory(sessionId)).toEqual([]);
    });
});

describe('SessionManager.submit', () => {
    it('appends the user turn and the reply after the directive', async () => {
        const llm = new FakeLLMProvider(() => 'REPLY');
        const { manager } = createManager(llm, 'SYS', () => 's1');

        const sessionId = await manager.beginOrContinue();
        const reply = await manager.submit('s1', 'hello');

        expect(sessionId).toBe('s1');
        expect(reply).toBe('REPLY');
        expect(await manager.getHistory('s1')).toEqual([
            { role: 'system', content: 'SYS' },
            { role: 'user', content: 'hello' },
            { role: 'assistant', content: 'REPLY' }
        ]);
        expect(llm.calls[0].messages).toEqual([
            { role: 'system', content: 'SYS' },
            { role: 'user', content: 'hello' }
        ]);
    });

    it('grows the history by two alternating turns per submit', async () => {
        const { manager } = createManager();
        const sessionId = await manager.beginOrContinue();

        for (let n = 0; n <= 3; n++) {
            const history = await manager.getHistory(sessionId);
            expect(history).toHaveLength(1 + 2 * n);
            expect(history?.slice(1).map(turn => turn.role)).toEqual(
                Array.from({ length: 2 * n }, (_, i) => (i % 2 === 0 ? 'user' : 'assistant'))
            );
            await manager.submit(sessionId, `message ${n}`);
        }
    });

    it('sends the entire history on every turn', async () => {
        const llm = new FakeLLMProvider();
        const { manager } = createManager(llm);
        const sessionId = await manager.beginOrContinue();

        await manager.submit(sessionId, 'first');
        await manager.submit(sessionId, 'second');

        expect(llm.calls[1].messages).toEqual([
            { role: 'system', content: 'SYS' },
            { role: 'user', content: 'first' },
            { role: 'assistant', content: 'reply-0' },
            { role: 'user', content: 'second' }
        ]);
    });

    it('keeps the user turn when the backend fails and adds a new one on resubmit', async () => {
        const llm = new FakeLLMProvider((_m, _o, index) => {
            if (index === 0) throw new BackendTransportError('connection refused');
            return 'recovered';
        });
        const { manager } = createManager(llm);
        const sessionId = await manager.beginOrContinue();

        await expect(manager.submit(sessionId, 'hello')).rejects.toBeInstanceOf(BackendTransportError);
        expect(await manager.getHistory(sessionId)).toEqual([
            { role: 'system', content: 'SYS' },
            { role: 'user', content: 'hello' }
        ]);

        await expect(manager.submit(sessionId, 'hello')).resolves.toBe('recovered');
        expect(await manager.getHistory(sessionId)).toEqual([
            { role: 'system', content: 'SYS' },
            { role: 'user', content: 'hello' },
            { role: 'user', content: 'hello' },
            { role: 'assistant', content: 'recovered' }
        ]);
    });

    it('rejects an id the store does not hold', async () => {
        const { manager } = createManager();

        await expect(manager.submit('ghost', 'hello')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('freezes appended turns', async () => {
        const { manager, storage } = createManager();
        const sessionId = await manager.beginOrContinue();
        await manager.submit(sessionId, 'hello');

        const session = await storage.loadSession(sessionId);

        expect(session?.messages.every(turn => Object.isFrozen(turn))).toBe(true);
    });

    it('serializes concurrent turns of the same session', async () => {
        const llm = new FakeLLMProvider(async (_m, _o, index) => {
            await sleep(index === 0 ? 30 : 0);
            return `reply-${index}`;
        });
        const { manager } = createManager(llm);
        const sessionId = await manager.beginOrContinue();

        await Promise.all([manager.submit(sessionId, 'one'), manager.submit(sessionId, 'two')]);

        expect(await manager.getHistory(sessionId)).toEqual([
            { role: 'system', content: 'SYS' },
            { role: 'user', content: 'one' },
            { role: 'assistant', content: 'reply-0' },
            { role: 'user', content: 'two' },
            { role: 'assistant', content: 'reply-1' }
        ]);
    });

    it('lets different sessions talk to the backend at the same time', async () => {
        let started = 0;
        let releaseAll = () => { };
        const bothStarted = new Promise<void>(resolve => { releaseAll = resolve; });
        const llm = new FakeLLMProvider(async (_m, _o, index) => {
            started++;
            if (started === 2) releaseAll();
            await bothStarted;
            return `reply-${index}`;
        });
        const { manager } = createManager(llm);
        const first = await manager.beginOrContinue();
        const second = await manager.beginOrContinue();

        await Promise.all([manager.submit(first, 'a'), manager.submit(second, 'b')]);

        expect(await manager.getHistory(first)).toHaveLength(3);
        expect(await manager.getHistory(second)).toHaveLength(3);
    });
});

describe('SessionManager.handleMessage', () => {
    it('opens a session on first contact and continues it afterwards', async () => {
        const { manager } = createManager();

        const first = await manager.handleMessage(undefined, 'hi');
        const second = await manager.handleMessage(first.sessionId, 'again');

        expect(first.reply).toBe('reply-0');
        expect(second.sessionId).toBe(first.sessionId);
        expect(await manager.getHistory(first.sessionId)).toHaveLength(5);
    });
});

describe('SessionManager read views', () => {
    it('returns copies of the history', async () => {
        const { manager } = createManager();
        const sessionId = await manager.beginOrContinue();

        const history = await manager.getHistory(sessionId);
        history?.push({ role: 'user', content: 'injected' });

        expect(await manager.getHistory(sessionId)).toHaveLength(1);
    });

    it('lists every session with its message count', async () => {
        const { manager } = createManager();
        const a = await manager.beginOrContinue();
        const b = await manager.beginOrContinue();
        await manager.submit(b, 'hello');

        const sessions = await manager.listSessions();

        expect(sessions).toHaveLength(2);
        expect(sessions.find(s => s.sessionId === a)?.messageCount).toBe(1);
        expect(sessions.find(s => s.sessionId === b)?.messageCount).toBe(3);
    });
});
