/**
 * PlanningPipeline — session acquisition, planning calls and command issuance.
 *
 * INVARIANT: a planning call either commits a whole normalized tree to its
 * session or changes nothing. Goals minted by a rejected call do not exist,
 * so the next call starts from the same goal sequence.
 *
 * Planning calls for one session are serialized with a per-session lock held
 * across the planner round-trip, so goal numbers follow request order. Calls
 * for different sessions run independently. Command issuance is synchronous
 * and needs no lock (see ExecutionCounterRegistry); a command id only counts
 * as issued once the ledger has recorded it.
 *
 * The ledger doubles as the sessions' history: a session reopened after it
 * was closed or expired continues from its recorded goal cursor.
 */

import * as crypto from 'crypto';
import {
    type CommandId,
    type CommandLineage,
    type PlanId,
    type SessionId,
    lineageOf,
} from './identifier_format';
import {
    type NormalizedPlan,
    type NormalizedTree,
    normalize,
    parseRawTree,
    createPlanTreeValidator,
} from './normalization_engine';
import { SchemaValidator } from './schema_validator';
import { SessionRegistry } from './session_registry';
import { CommandLedger, type CommandRecord } from './command_ledger';
import { KeyedLock } from './keyed_lock';
import { ErrorFactory, isLineageError } from './structured_error';
import { createLogger, setCorrelation, clearCorrelation } from './logger';

const log = createLogger('pipeline');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface PlanningRequest {
    session_id: SessionId;
    prompt: string;
    /** Goals already committed in this session. */
    goals_minted: number;
}

/** The upstream planner. Its reply is untrusted and validated before use. */
export interface PlanningService {
    propose(request: PlanningRequest): Promise<unknown>;
}

export type PlanningOutcome =
    | { status: 'NORMALIZED'; call_id: string; tree: NormalizedTree }
    | { status: 'EMPTY_TREE'; call_id: string; session: SessionId };

export interface CommandDescription {
    record: CommandRecord;
    lineage: CommandLineage;
    /** Undefined once the plan has been retired. */
    plan?: NormalizedPlan;
}

export interface PlanningPipelineOptions {
    /** Should be built with `history` set to the same ledger. */
    sessions?: SessionRegistry;
    ledger?: CommandLedger;
    validator?: SchemaValidator;
}

/* -------------------------------------------------------------------------- */
/* Pipeline                                                                   */
/* -------------------------------------------------------------------------- */

export class PlanningPipeline {
    private readonly sessions: SessionRegistry;
    private readonly ledger: CommandLedger;
    private readonly validator: SchemaValidator;
    private readonly sessionLocks = new KeyedLock<SessionId>();

    constructor(private readonly planner: PlanningService, opts: PlanningPipelineOptions = {}) {
        this.ledger = opts.ledger ?? new CommandLedger();
        this.sessions = opts.sessions ?? new SessionRegistry({ history: this.ledger });
        this.validator = opts.validator ?? createPlanTreeValidator();
    }

    /* ------------------------------------------------------------------------ */
    /* Sessions                                                                 */
    /* ------------------------------------------------------------------------ */

    /** Start or resume a session. A client id must be canonical. */
    openSession(clientSessionId?: string): SessionId {
        return this.sessions.open(clientSessionId).session_id;
    }

    closeSession(session: SessionId): boolean {
        return this.sessions.close(session);
    }

    /* ------------------------------------------------------------------------ */
    /* Planning                                                                 */
    /* ------------------------------------------------------------------------ */

    async plan(session: SessionId, prompt: string): Promise<PlanningOutcome> {
        return this.sessionLocks.runExclusive<PlanningOutcome>(session, async () => {
            const call_id = crypto.randomUUID();
            const before = this.sessions.require(session);

            const payload = await this.planner.propose({
                session_id: session,
                prompt,
                goals_minted: before.goalsMinted,
            });

            // Everything below is synchronous: no other call can interleave
            setCorrelation({ sessionId: session, callId: call_id });
            try {
                const scope = this.sessions.require(session);
                const raw = parseRawTree(payload, this.validator);
                const outcome = normalize(session, raw, { goalOffset: scope.goalsMinted });

                if (outcome.status === 'EMPTY_TREE') {
                    log.info('Planning call was a no-op');
                    return { status: 'EMPTY_TREE', call_id, session };
                }

                scope.commit(outcome.tree, (goalsMinted) => this.ledger.saveGoalCursor(session, goalsMinted));
                log.info('Planning call committed', {
                    goals: outcome.tree.goals.map(g => g.id),
                    goals_minted: scope.goalsMinted,
                });
                return { status: 'NORMALIZED', call_id, tree: outcome.tree };
            } catch (err) {
                if (isLineageError(err)) {
                    log.warn('Planning call rejected', { error: err.toStructured() });
                }
                throw err;
            } finally {
                clearCorrelation();
            }
        });
    }

    /* ------------------------------------------------------------------------ */
    /* Execution                                                                */
    /* ------------------------------------------------------------------------ */

    /** Mint the next command id for `plan` and record it. */
    issueCommand(session: SessionId, plan: PlanId, commandType?: string): CommandRecord {
        return this.issue(session, plan, commandType ?? null, null);
    }

    /** A retry gets a fresh id under the same plan, linked back through attempt_of. */
    retryCommand(session: SessionId, command: CommandId, commandType?: string): CommandRecord {
        const original = this.ledger.get(session, command);
        if (!original) {
            throw ErrorFactory.unknownCommand(command, session);
        }
        return this.issue(session, original.plan_id, commandType ?? original.command_type, command);
    }

    /** Retire a plan: its counter is discarded and it accepts no more commands. */
    abandonPlan(session: SessionId, plan: PlanId): void {
        this.sessions.require(session).retire(plan);
    }

    describeCommand(session: SessionId, command: CommandId): CommandDescription | undefined {
        const record = this.ledger.get(session, command);
        if (!record) return undefined;
        return {
            record,
            lineage: lineageOf(command),
            plan: this.sessions.get(session)?.plan(record.plan_id),
        };
    }

    commandsForPlan(session: SessionId, plan: PlanId): CommandRecord[] {
        return this.ledger.listForPlan(session, plan);
    }

    attemptChain(session: SessionId, command: CommandId): CommandRecord[] {
        return this.ledger.attemptChain(session, command);
    }

    close(): void {
        this.ledger.close();
    }

    private issue(
        session: SessionId,
        plan: PlanId,
        commandType: string | null,
        attemptOf: CommandId | null
    ): CommandRecord {
        const scope = this.sessions.require(session);
        const target = scope.requirePlan(plan);
        if (!scope.counters.has(plan)) {
            scope.counters.restore(plan, this.ledger.lastSequence(session, plan));
        }

        const command_id = scope.counters.peek(plan);
        const record = this.ledger.record({
            session_id: session,
            command_id,
            plan_id: plan,
            goal_id: target.goal_id,
            sequence: lineageOf(command_id).commandSequence,
            command_type: commandType,
            attempt_of: attemptOf,
        });
        scope.counters.advance(command_id);
        return record;
    }
}
