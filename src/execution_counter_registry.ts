/**
 * ExecutionCounterRegistry — per-plan command sequence numbers.
 *
 * INVARIANT: for a given plan, issued command sequences are 1, 2, 3 ... with no
 * gap and no reuse for the lifetime of the plan's counter.
 *
 * nextCommandId is a single synchronous step (read, increment, format, store),
 * so two callers can never observe the same value for one plan, and callers for
 * different plans only ever touch their own entry. Nothing is held across an
 * await. Entries are kept until reset(); the registry never evicts on its own.
 *
 * Callers that must write the id somewhere before it counts as issued use
 * peek() and advance() around that write, in the same synchronous step.
 */

import { type CommandId, type PlanId, formatCommandId, lineageOf } from './identifier_format';
import { ErrorFactory, LineageError } from './structured_error';
import { createLogger } from './logger';

const log = createLogger('counters');

export class ExecutionCounterRegistry {
    private readonly counters = new Map<PlanId, number>();

    constructor(private readonly scope: string = 'default') {}

    nextCommandId(plan: PlanId): CommandId {
        const id = this.peek(plan);
        this.advance(id);
        return id;
    }

    /** The id nextCommandId would return, without consuming it. */
    peek(plan: PlanId): CommandId {
        return formatCommandId(plan, (this.counters.get(plan) ?? 0) + 1);
    }

    /** Consume `command`, which must be the id peek() returns for its plan. */
    advance(command: CommandId): void {
        const { plan, commandSequence } = lineageOf(command);
        const expected = (this.counters.get(plan) ?? 0) + 1;
        if (commandSequence !== expected) {
            throw new LineageError(
                'INVALID_SEQUENCE',
                `Command ${command} is out of turn, plan ${plan} expects sequence ${expected}`,
                { scope: this.scope, command_id: command, expected_sequence: expected }
            );
        }
        this.counters.set(plan, commandSequence);
        log.debug('Command id issued', { scope: this.scope, plan_id: plan, command_id: command });
    }

    /**
     * Continue a plan's sequence after `lastIssued`, e.g. from a persisted
     * record. Never moves a counter backwards.
     */
    restore(plan: PlanId, lastIssued: number): void {
        if (lastIssued > this.current(plan)) {
            this.counters.set(plan, lastIssued);
        }
    }

    /** Discard a plan's counter. Throws UNKNOWN_PLAN if the plan never issued a command. */
    reset(plan: PlanId): void {
        if (!this.counters.delete(plan)) {
            throw ErrorFactory.unknownPlan(plan);
        }
        log.info('Command counter reset', { scope: this.scope, plan_id: plan });
    }

    /** Last issued sequence for `plan` (0 if none). */
    current(plan: PlanId): number {
        return this.counters.get(plan) ?? 0;
    }

    has(plan: PlanId): boolean {
        return this.counters.has(plan);
    }

    get size(): number {
        return this.counters.size;
    }
}
