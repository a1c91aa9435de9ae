import test from 'node:test';
import assert from 'node:assert/strict';

import { CommandLedger, CommandLedgerError, LEDGER_ERRORS, type NewCommandRecord } from '../src/command_ledger';
import { isGoalId, type CommandId } from '../src/identifier_format';
import { EK30, commandId, planId, sessionId } from './helpers';

const session = sessionId(EK30);
const other = sessionId('sess_20250910_080000_zz99');
const plan = planId('plan_001_01');

function entry(command: CommandId, attemptOf: CommandId | null = null, sess = session): NewCommandRecord {
    const goal = 'goal_ek30_001';
    return {
        session_id: sess,
        command_id: command,
        plan_id: plan,
        goal_id: isGoalId(goal) ? goal : null,
        sequence: Number(command.slice(-3)),
        command_type: 'move',
        attempt_of: attemptOf,
        issued_at: '2025-09-09T16:35:32.000Z',
    };
}

function withLedger(fn: (ledger: CommandLedger) => void): void {
    const ledger = new CommandLedger(':memory:');
    try {
        fn(ledger);
    } finally {
        ledger.close();
    }
}

const c1 = commandId('cmd_plan_001_01_001');
const c2 = commandId('cmd_plan_001_01_002');
const c3 = commandId('cmd_plan_001_01_003');

test('a recorded command reads back unchanged', () => {
    withLedger((ledger) => {
        ledger.record(entry(c1));
        assert.deepEqual(ledger.get(session, c1), {
            session_id: EK30,
            command_id: 'cmd_plan_001_01_001',
            plan_id: 'plan_001_01',
            goal_id: 'goal_ek30_001',
            sequence: 1,
            command_type: 'move',
            attempt_of: null,
            issued_at: '2025-09-09T16:35:32.000Z',
        });
        assert.equal(ledger.get(session, c2), undefined);
    });
});

test('issued_at defaults to the time of recording', () => {
    withLedger((ledger) => {
        const stored = ledger.record({ ...entry(c1), issued_at: undefined });
        assert.ok(!Number.isNaN(Date.parse(stored.issued_at)));
        assert.equal(ledger.get(session, c1)?.issued_at, stored.issued_at);
    });
});

test('a command id is recorded at most once per session', () => {
    withLedger((ledger) => {
        ledger.record(entry(c1));
        assert.throws(
            () => ledger.record(entry(c1)),
            (err: unknown) => err instanceof CommandLedgerError && err.code === LEDGER_ERRORS.DUPLICATE_COMMAND
        );
        assert.equal(ledger.count(session), 1);
    });
});

test('the same command id in two sessions is two commands', () => {
    withLedger((ledger) => {
        ledger.record(entry(c1));
        ledger.record(entry(c1, null, other));
        assert.equal(ledger.count(session), 1);
        assert.equal(ledger.count(other), 1);
        assert.equal(ledger.count(), 2);
    });
});

test('commands for a plan come back in sequence order', () => {
    withLedger((ledger) => {
        ledger.record(entry(c2));
        ledger.record(entry(c1));
        ledger.record(entry(c3));
        assert.deepEqual(ledger.listForPlan(session, plan).map(r => r.command_id), [c1, c2, c3]);
        assert.deepEqual(ledger.listForPlan(session, planId('plan_009_09')), []);
    });
});

test('retries link back to the attempt they replace', () => {
    withLedger((ledger) => {
        ledger.record(entry(c1));
        ledger.record(entry(c2, c1));
        ledger.record(entry(c3, c2));

        assert.deepEqual(ledger.attemptChain(session, c3).map(r => r.command_id), [c1, c2, c3]);
        assert.deepEqual(ledger.attemptChain(session, c1).map(r => r.command_id), [c1]);
        assert.deepEqual(ledger.attemptChain(other, c3), []);
    });
});

test('a retry must point at a command recorded in the same session', () => {
    withLedger((ledger) => {
        ledger.record(entry(c1, null, other));
        assert.throws(
            () => ledger.record(entry(c2, c1)),
            (err: unknown) => err instanceof CommandLedgerError && err.code === LEDGER_ERRORS.UNKNOWN_ATTEMPT
        );
        assert.equal(ledger.count(session), 0);
    });
});

test('the goal cursor is stored per session and never lowered', () => {
    withLedger((ledger) => {
        assert.equal(ledger.goalsMinted(session), 0);

        ledger.saveGoalCursor(session, 3);
        ledger.saveGoalCursor(session, 1);
        assert.equal(ledger.goalsMinted(session), 3);

        ledger.saveGoalCursor(session, 4);
        assert.equal(ledger.goalsMinted(session), 4);
        assert.equal(ledger.goalsMinted(other), 0);
    });
});

test('a session is known once it has a cursor or a command', () => {
    withLedger((ledger) => {
        assert.equal(ledger.isKnown(session), false);
        assert.equal(ledger.isKnown(other), false);

        ledger.saveGoalCursor(session, 1);
        ledger.record(entry(c1, null, other));
        assert.equal(ledger.isKnown(session), true);
        assert.equal(ledger.isKnown(other), true);
    });
});

test('lastSequence is the highest sequence recorded for a plan', () => {
    withLedger((ledger) => {
        assert.equal(ledger.lastSequence(session, plan), 0);

        ledger.record(entry(c1));
        ledger.record(entry(c3));
        assert.equal(ledger.lastSequence(session, plan), 3);
        assert.equal(ledger.lastSequence(other, plan), 0);
        assert.equal(ledger.lastSequence(session, planId('plan_009_09')), 0);
    });
});
