import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../../src/core/session/lock.js';
import { sleep } from '../helpers.js';

describe('KeyedLock', () => {
    it('runs tasks for the same key one at a time in call order', async () => {
        const lock = new KeyedLock();
        const events: string[] = [];

        await Promise.all([
            lock.run('k', async () => {
                events.push('start-1');
                await sleep(20);
                events.push('end-1');
            }),
            lock.run('k', async () => {
                events.push('start-2');
                events.push('end-2');
            })
        ]);

        expect(events).toEqual(['start-1', 'end-1', 'start-2', 'end-2']);
        expect(lock.activeKeys).toBe(0);
    });

    it('does not block different keys', async () => {
        const lock = new KeyedLock();
        const events: string[] = [];

        await Promise.all([
            lock.run('a', async () => {
                events.push('start-a');
                await sleep(20);
                events.push('end-a');
            }),
            lock.run('b', async () => {
                events.push('start-b');
                events.push('end-b');
            })
        ]);

        expect(events).toEqual(['start-a', 'start-b', 'end-b', 'end-a']);
    });

    it('releases the key when a task throws', async () => {
        const lock = new KeyedLock();

        await expect(lock.run('k', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
        await expect(lock.run('k', async () => 'next')).resolves.toBe('next');
        expect(lock.activeKeys).toBe(0);
    });
});
