import test from 'node:test';
import assert from 'node:assert/strict';

import { KeyedLock } from '../src/keyed_lock';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function gate(): { wait: Promise<void>; open: () => void } {
    let open: () => void = () => undefined;
    const wait = new Promise<void>((resolve) => {
        open = resolve;
    });
    return { wait, open };
}

test('tasks under one key run one at a time in arrival order', async () => {
    const lock = new KeyedLock<string>();
    const events: string[] = [];
    const g = gate();

    const first = lock.runExclusive('s', async () => {
        events.push('first:start');
        await g.wait;
        events.push('first:end');
        return 1;
    });
    const second = lock.runExclusive('s', () => {
        events.push('second');
        return 2;
    });

    await tick();
    assert.deepEqual(events, ['first:start']);
    assert.equal(lock.isLocked('s'), true);

    g.open();
    assert.deepEqual(await Promise.all([first, second]), [1, 2]);
    assert.deepEqual(events, ['first:start', 'first:end', 'second']);
});

test('different keys do not wait on each other', async () => {
    const lock = new KeyedLock<string>();
    const g = gate();

    const blocked = lock.runExclusive('a', async () => {
        await g.wait;
        return 'a';
    });
    assert.equal(await lock.runExclusive('b', () => 'b'), 'b');
    assert.equal(lock.isLocked('a'), true);

    g.open();
    assert.equal(await blocked, 'a');
});

test('a failing task releases the key', async () => {
    const lock = new KeyedLock<string>();
    await assert.rejects(
        lock.runExclusive('k', () => {
            throw new Error('boom');
        }),
        /boom/
    );
    assert.equal(await lock.runExclusive('k', () => 'ok'), 'ok');
});

test('idle keys are dropped', async () => {
    const lock = new KeyedLock<number>();
    await Promise.all([1, 2, 3, 1, 2].map((key) => lock.runExclusive(key, tick)));
    assert.equal(lock.activeKeys, 0);
    assert.equal(lock.isLocked(1), false);
});
