import {
    type CommandId,
    type PlanId,
    type SessionId,
    isCommandId,
    isPlanId,
    isSessionId,
} from '../src/identifier_format';
import type { NormalizeOutcome, NormalizedTree } from '../src/normalization_engine';
import type { PlanningRequest, PlanningService } from '../src/planning_pipeline';

export const EK30 = 'sess_20250909_163532_ek30';

export function sessionId(raw: string): SessionId {
    if (!isSessionId(raw)) throw new Error(`fixture is not a session id: ${raw}`);
    return raw;
}

export function planId(raw: string): PlanId {
    if (!isPlanId(raw)) throw new Error(`fixture is not a plan id: ${raw}`);
    return raw;
}

export function commandId(raw: string): CommandId {
    if (!isCommandId(raw)) throw new Error(`fixture is not a command id: ${raw}`);
    return raw;
}

export function normalizedTree(outcome: NormalizeOutcome): NormalizedTree {
    if (outcome.status !== 'NORMALIZED') throw new Error(`expected NORMALIZED, got ${outcome.status}`);
    return outcome.tree;
}

export type Reply = () => Promise<unknown>;

export const reply = (payload: unknown): Reply => () => Promise.resolve(payload);

export const delayedReply = (payload: unknown, ms: number): Reply => () =>
    new Promise((resolve) => setTimeout(() => resolve(payload), ms));

export const failingReply = (message: string): Reply => () => Promise.reject(new Error(message));

/** Planner stand-in that answers from a fixed script and records what it was asked. */
export class ScriptedPlanner implements PlanningService {
    readonly requests: PlanningRequest[] = [];

    constructor(private readonly replies: Reply[]) {}

    propose(request: PlanningRequest): Promise<unknown> {
        this.requests.push(request);
        const next = this.replies.shift();
        if (!next) return Promise.reject(new Error('planner script exhausted'));
        return next();
    }
}

/** Two goals; goal 2 depends on goal 1's second plan. */
export const TWO_GOAL_REPLY = {
    goals: [
        {
            id: 'g1',
            label: 'gather wood',
            plans: [
                { id: 'p1', action_type: 'move', depends_on: [] },
                { id: 'p2', action_type: 'collect', depends_on: ['p1'] },
            ],
        },
        {
            id: 'g2',
            label: 'build shelter',
            plans: [{ id: 'p3', action_type: 'craft', depends_on: ['p2'] }],
        },
    ],
};
