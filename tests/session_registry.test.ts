import test from 'node:test';
import assert from 'node:assert/strict';

import { SessionRegistry, type SessionHistory } from '../src/session_registry';
import { normalize, parseRawTree } from '../src/normalization_engine';
import { isLineageError, type ErrorCode } from '../src/structured_error';
import { SESSION_LIMITS } from '../src/config';
import type { SessionId } from '../src/identifier_format';
import { EK30, TWO_GOAL_REPLY, normalizedTree, planId, sessionId } from './helpers';

const failsWith = (code: ErrorCode) => (err: unknown) => isLineageError(err, code);

/** History backed by a plain map of session id to goals minted. */
function historyOf(known: Record<string, number>): SessionHistory {
    return {
        goalsMinted: (session: SessionId) => known[session] ?? 0,
        isKnown: (session: SessionId) => session in known,
    };
}

test('open without an id mints a server session', () => {
    const minted = sessionId('sess_20250909_163532_abcd');
    const registry = new SessionRegistry({ mintSessionId: () => minted });

    const scope = registry.open();
    assert.equal(scope.session_id, minted);
    assert.equal(scope.origin, 'server');
    assert.equal(scope.goalsMinted, 0);
    assert.equal(registry.size, 1);
});

test('a canonical client id is adopted as-is and resumes its scope', () => {
    const registry = new SessionRegistry();
    const scope = registry.open(EK30);

    assert.equal(scope.session_id, EK30);
    assert.equal(scope.origin, 'client');
    assert.equal(registry.open(EK30), scope);
    assert.equal(registry.size, 1);
});

test('a non-canonical client id is rejected and nothing is registered', () => {
    const registry = new SessionRegistry();
    for (const candidate of ['abc', 'sess_20250909_163532_EK30', 'sess_20250909_163532_ek30 ']) {
        assert.throws(() => registry.open(candidate), failsWith('INVALID_SESSION_FORMAT'));
    }
    assert.equal(registry.size, 0);
});

test('minting gives up after repeated collisions', () => {
    const stuck = sessionId('sess_20250909_163532_aaaa');
    let calls = 0;
    const registry = new SessionRegistry({
        mintSessionId: () => {
            calls++;
            return stuck;
        },
    });

    registry.open();
    assert.throws(() => registry.open(), failsWith('SESSION_COLLISION'));
    assert.equal(calls, 1 + SESSION_LIMITS.MINT_ATTEMPTS);
});

test('a colliding mint is retried with a fresh id', () => {
    const ids = [
        sessionId('sess_20250909_163532_aaaa'),
        sessionId('sess_20250909_163532_aaaa'),
        sessionId('sess_20250909_163532_bbbb'),
    ];
    const registry = new SessionRegistry({ mintSessionId: () => ids.shift() ?? sessionId(EK30) });

    registry.open();
    assert.equal(registry.open().session_id, 'sess_20250909_163532_bbbb');
});

test('closed and unknown sessions are not found', () => {
    const registry = new SessionRegistry();
    registry.open(EK30);

    assert.equal(registry.close(EK30), true);
    assert.equal(registry.close(EK30), false);
    assert.equal(registry.get(EK30), undefined);
    assert.throws(() => registry.require(EK30), failsWith('SESSION_NOT_FOUND'));
});

test('the least recently used session is dropped at capacity', () => {
    const registry = new SessionRegistry({ maxSessions: 2 });
    registry.open('sess_20250909_000001_aaaa');
    registry.open('sess_20250909_000002_bbbb');
    registry.get('sess_20250909_000001_aaaa');
    registry.open('sess_20250909_000003_cccc');

    assert.equal(registry.size, 2);
    assert.equal(registry.get('sess_20250909_000002_bbbb'), undefined);
    assert.ok(registry.get('sess_20250909_000001_aaaa'));
});

test('committing a tree registers its plans and advances the goal cursor', () => {
    const registry = new SessionRegistry();
    const scope = registry.open(EK30);
    const tree = normalizedTree(normalize(scope.session_id, parseRawTree(TWO_GOAL_REPLY)));

    scope.commit(tree);
    assert.equal(scope.goalsMinted, 2);
    assert.equal(scope.planCount, 3);
    assert.equal(scope.requirePlan(planId('plan_002_01')).goal_id, 'goal_ek30_002');
    assert.equal(scope.plan(planId('plan_003_01')), undefined);
    assert.throws(() => scope.requirePlan(planId('plan_003_01')), failsWith('UNKNOWN_PLAN'));
});

test('a tree that does not continue the goal cursor is refused', () => {
    const registry = new SessionRegistry();
    const scope = registry.open(EK30);
    scope.commit(normalizedTree(normalize(scope.session_id, parseRawTree(TWO_GOAL_REPLY))));

    const stale = normalizedTree(normalize(scope.session_id, parseRawTree(TWO_GOAL_REPLY)));
    assert.throws(() => scope.commit(stale), failsWith('INVALID_SEQUENCE'));
    assert.equal(scope.goalsMinted, 2);
});

test('a tree from another session is refused', () => {
    const registry = new SessionRegistry();
    const scope = registry.open(EK30);
    const foreign = normalizedTree(normalize(sessionId('sess_20250909_163532_zzzz'), parseRawTree(TWO_GOAL_REPLY)));

    assert.throws(() => scope.commit(foreign), failsWith('SESSION_NOT_FOUND'));
    assert.equal(scope.planCount, 0);
});

test('retiring a plan drops it and its counter', () => {
    const registry = new SessionRegistry();
    const scope = registry.open(EK30);
    scope.commit(normalizedTree(normalize(scope.session_id, parseRawTree(TWO_GOAL_REPLY))));
    const plan = planId('plan_001_01');

    scope.counters.nextCommandId(plan);
    scope.retire(plan);

    assert.equal(scope.plan(plan), undefined);
    assert.equal(scope.counters.has(plan), false);
    assert.equal(scope.planCount, 2);
    assert.throws(() => scope.retire(plan), failsWith('UNKNOWN_PLAN'));
});

test('a plan that never issued a command can still be retired', () => {
    const registry = new SessionRegistry();
    const scope = registry.open(EK30);
    scope.commit(normalizedTree(normalize(scope.session_id, parseRawTree(TWO_GOAL_REPLY))));

    scope.retire(planId('plan_002_01'));
    assert.equal(scope.planCount, 2);
});

test('a client session seen before resumes its stored goal cursor', () => {
    const registry = new SessionRegistry({ history: historyOf({ [EK30]: 5 }) });
    const scope = registry.open(EK30);
    assert.equal(scope.goalsMinted, 5);

    const tree = normalizedTree(normalize(scope.session_id, parseRawTree(TWO_GOAL_REPLY), { goalOffset: 5 }));
    scope.commit(tree);
    assert.equal(scope.goalsMinted, 7);
    assert.equal(scope.requirePlan(planId('plan_006_01')).goal_id, 'goal_ek30_006');

    assert.equal(registry.open('sess_20250910_080000_zz99').goalsMinted, 0);
});

test('minting skips ids the history already holds', () => {
    const ids = [sessionId('sess_20250909_163532_aaaa'), sessionId('sess_20250909_163532_bbbb')];
    const registry = new SessionRegistry({
        history: historyOf({ sess_20250909_163532_aaaa: 0 }),
        mintSessionId: () => ids.shift() ?? sessionId(EK30),
    });

    assert.equal(registry.open().session_id, 'sess_20250909_163532_bbbb');
});

test('commit hands the new cursor to persist and stays unchanged when it throws', () => {
    const registry = new SessionRegistry();
    const scope = registry.open(EK30);
    const tree = normalizedTree(normalize(scope.session_id, parseRawTree(TWO_GOAL_REPLY)));

    assert.throws(() => scope.commit(tree, () => {
        throw new Error('cursor not saved');
    }), /cursor not saved/);
    assert.equal(scope.goalsMinted, 0);
    assert.equal(scope.planCount, 0);

    const saved: number[] = [];
    scope.commit(tree, (goalsMinted) => saved.push(goalsMinted));
    assert.deepEqual(saved, [2]);
    assert.equal(scope.goalsMinted, 2);
});
