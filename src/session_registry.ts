/**
 * SessionRegistry — the active-session set.
 *
 * A session is either minted here or supplied by the rendering client. Client
 * values are format-checked with the identifier formatter and never re-derived.
 * Each active session owns a SessionScope: its goal cursor, its command
 * counters and the plans committed by its planning calls.
 *
 * Sessions expire after SESSION_LIMITS.IDLE_TTL_MS without use, and the least
 * recently used one is dropped once SESSION_LIMITS.MAX_ACTIVE is reached.
 * Dropping a scope loses nothing that matters for uniqueness: with a
 * SessionHistory attached, a reopened session continues its goal numbering
 * from the persisted high-water mark, and minting skips ids already used.
 */

import { LRUCache } from 'lru-cache';
import {
    type PlanId,
    type SessionId,
    formatSessionId,
    isSessionId,
} from './identifier_format';
import type { NormalizedPlan, NormalizedTree } from './normalization_engine';
import { ExecutionCounterRegistry } from './execution_counter_registry';
import { ErrorFactory, LineageError } from './structured_error';
import { SESSION_LIMITS } from './config';
import { createLogger } from './logger';

const log = createLogger('sessions');

export type SessionOrigin = 'server' | 'client';

/** What outlives a session's in-memory scope. CommandLedger implements it. */
export interface SessionHistory {
    goalsMinted(session: SessionId): number;
    isKnown(session: SessionId): boolean;
}

/* -------------------------------------------------------------------------- */
/* Session scope                                                              */
/* -------------------------------------------------------------------------- */

export class SessionScope {
    readonly counters: ExecutionCounterRegistry;
    private goalCursor = 0;
    private readonly plans = new Map<PlanId, NormalizedPlan>();

    constructor(
        readonly session_id: SessionId,
        readonly origin: SessionOrigin,
        goalsMinted = 0,
        readonly opened_at: string = new Date().toISOString()
    ) {
        this.counters = new ExecutionCounterRegistry(session_id);
        this.goalCursor = goalsMinted;
    }

    /** Goals minted so far; the next planning call numbers goals from here + 1. */
    get goalsMinted(): number {
        return this.goalCursor;
    }

    get planCount(): number {
        return this.plans.size;
    }

    /**
     * Make a normalized tree's plans dispatchable and advance the goal cursor.
     * The tree must have been normalized with goalOffset === goalsMinted.
     * `persist` receives the new cursor before anything changes here; if it
     * throws, the scope is left as it was.
     */
    commit(tree: NormalizedTree, persist?: (goalsMinted: number) => void): void {
        if (tree.session !== this.session_id) {
            throw ErrorFactory.sessionNotFound(tree.session);
        }
        const first = tree.goals[0];
        if (first && first.sequence !== this.goalCursor + 1) {
            throw new LineageError(
                'INVALID_SEQUENCE',
                `Tree starts at goal ${first.sequence}, session expects ${this.goalCursor + 1}`,
                { session_id: this.session_id, first_goal: first.id, expected_sequence: this.goalCursor + 1 }
            );
        }

        const next = this.goalCursor + tree.goals.length;
        persist?.(next);

        for (const goal of tree.goals) {
            for (const plan of goal.plans) {
                this.plans.set(plan.id, plan);
            }
        }
        this.goalCursor = next;
    }

    plan(planId: PlanId): NormalizedPlan | undefined {
        return this.plans.get(planId);
    }

    requirePlan(planId: PlanId): NormalizedPlan {
        const plan = this.plans.get(planId);
        if (!plan) {
            throw ErrorFactory.unknownPlan(planId, this.session_id);
        }
        return plan;
    }

    /** Stop accepting commands for a plan and drop its counter, if it has one. */
    retire(planId: PlanId): void {
        this.requirePlan(planId);
        if (this.counters.has(planId)) {
            this.counters.reset(planId);
        }
        this.plans.delete(planId);
        log.info('Plan retired', { session_id: this.session_id, plan_id: planId });
    }
}

/* -------------------------------------------------------------------------- */
/* Registry                                                                   */
/* -------------------------------------------------------------------------- */

export interface SessionRegistryOptions {
    maxSessions?: number;
    idleTtlMs?: number;
    /** Source of server-minted ids (default: formatSessionId). */
    mintSessionId?: () => SessionId;
    /** Persisted session state; without it a reopened session starts from goal 1. */
    history?: SessionHistory;
}

export class SessionRegistry {
    private readonly active: LRUCache<string, SessionScope>;
    private readonly mintSessionId: () => SessionId;
    private readonly history?: SessionHistory;

    constructor(opts: SessionRegistryOptions = {}) {
        this.mintSessionId = opts.mintSessionId ?? (() => formatSessionId());
        this.history = opts.history;
        this.active = new LRUCache<string, SessionScope>({
            max: opts.maxSessions ?? SESSION_LIMITS.MAX_ACTIVE,
            ttl: opts.idleTtlMs ?? SESSION_LIMITS.IDLE_TTL_MS,
            updateAgeOnGet: true,
            dispose: (scope, key, reason) => {
                if (reason === 'evict' || reason === 'expire') {
                    log.info('Session dropped', { session_id: key, reason, plans: scope.planCount });
                }
            },
        });
    }

    /**
     * Open a session. Without a candidate a fresh id is minted. A client
     * candidate must be canonical (INVALID_SESSION_FORMAT otherwise); an
     * already active candidate resumes its existing scope.
     */
    open(candidate?: string): SessionScope {
        if (candidate !== undefined) {
            if (!isSessionId(candidate)) {
                log.warn('Rejected client session id', { candidate });
                throw ErrorFactory.invalidSessionFormat(candidate);
            }
            const existing = this.active.get(candidate);
            if (existing) {
                log.debug('Session resumed', { session_id: candidate });
                return existing;
            }
            const goalsMinted = this.history?.goalsMinted(candidate) ?? 0;
            return this.register(new SessionScope(candidate, 'client', goalsMinted));
        }

        for (let attempt = 0; attempt < SESSION_LIMITS.MINT_ATTEMPTS; attempt++) {
            const id = this.mintSessionId();
            if (!this.active.has(id) && !this.history?.isKnown(id)) {
                return this.register(new SessionScope(id, 'server'));
            }
            log.debug('Session id collision, minting again', { session_id: id, attempt });
        }
        throw ErrorFactory.sessionCollision(SESSION_LIMITS.MINT_ATTEMPTS);
    }

    get(session: string): SessionScope | undefined {
        return this.active.get(session);
    }

    require(session: string): SessionScope {
        const scope = this.active.get(session);
        if (!scope) {
            throw ErrorFactory.sessionNotFound(session);
        }
        return scope;
    }

    close(session: string): boolean {
        const closed = this.active.delete(session);
        if (closed) log.info('Session closed', { session_id: session });
        return closed;
    }

    get size(): number {
        return this.active.size;
    }

    private register(scope: SessionScope): SessionScope {
        this.active.set(scope.session_id, scope);
        log.info('Session opened', {
            session_id: scope.session_id,
            origin: scope.origin,
            goals_minted: scope.goalsMinted,
        });
        return scope;
    }
}
