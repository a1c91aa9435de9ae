/**
 * Normalization Engine — canonical goal/plan trees from untrusted planner output
 *
 * The planning service returns goals and plans carrying whatever identifiers
 * it felt like emitting ("1", "step-a", "goal_xx_001", 7 ...). None of them is
 * trusted: every goal and plan gets a freshly minted canonical id based on its
 * position, and every depends_on reference is rewritten through a raw →
 * canonical mapping that lives only for the duration of one call.
 *
 * A call is all-or-nothing. Any reference that does not resolve fails the
 * whole call with UNRESOLVED_DEPENDENCY, and plans that wait on each other
 * fail it with CYCLIC_DEPENDENCY. Nothing is returned in either case.
 */

import {
    type SessionId,
    type GoalId,
    type PlanId,
    formatGoalId,
    formatPlanId,
    isPlanId,
} from './identifier_format';
import { ErrorFactory } from './structured_error';
import { SchemaValidator, type JsonSchema } from './schema_validator';
import { createLogger } from './logger';

const log = createLogger('normalize');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface RawPlan {
    id: string;
    action_type?: string;
    description?: string;
    depends_on: string[];
}

export interface RawGoal {
    /** Absent when the planner replied with a single unnamed goal. */
    id?: string;
    label?: string;
    plans: RawPlan[];
}

export interface RawGoalPlanTree {
    goals: RawGoal[];
}

export type DependencyTarget = PlanId | GoalId;

export interface DependencyEdge {
    from: PlanId;
    to: DependencyTarget;
    raw_ref: string;
}

export interface NormalizedPlan {
    id: PlanId;
    raw_id: string;
    goal_id: GoalId;
    index: number;
    action_type?: string;
    description?: string;
    depends_on: DependencyTarget[];
}

export interface NormalizedGoal {
    id: GoalId;
    raw_id?: string;
    sequence: number;
    label?: string;
    plans: NormalizedPlan[];
}

export interface NormalizedTree {
    session: SessionId;
    goals: NormalizedGoal[];
    edges: DependencyEdge[];
    /** Every plan, prerequisites first; input order among plans that are ready together. */
    dispatch_order: PlanId[];
}

export type NormalizeOutcome =
    | { status: 'NORMALIZED'; tree: NormalizedTree }
    | { status: 'EMPTY_TREE'; session: SessionId };

export interface NormalizeOptions {
    /**
     * Number of goals already minted in this session. Goal sequence numbers
     * continue from here (default 0).
     */
    goalOffset?: number;
}

/* -------------------------------------------------------------------------- */
/* Raw payload schema                                                         */
/* -------------------------------------------------------------------------- */

export const RAW_PLAN_TREE_SCHEMA_ID = 'raw_plan_tree_v1';

const RAW_ID: JsonSchema = { type: ['string', 'number'] };
const OPTIONAL_TEXT: JsonSchema = { type: ['string', 'null'] };

const RAW_PLAN_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['id'],
    properties: {
        id: RAW_ID,
        action_type: OPTIONAL_TEXT,
        description: OPTIONAL_TEXT,
        depends_on: { type: ['array', 'string', 'number', 'null'], items: RAW_ID },
    },
};

const RAW_GOAL_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        id: { type: ['string', 'number', 'null'] },
        label: OPTIONAL_TEXT,
        goal_label: OPTIONAL_TEXT,
        plans: { type: 'array', items: RAW_PLAN_SCHEMA },
        plan: { type: 'array', items: RAW_PLAN_SCHEMA },
    },
};

/**
 * Accepted shapes: `{ goals: [...] }`, a bare goal array, or the planner's
 * single-goal reply `{ goal_label, plan: [...] }`.
 */
export const RAW_PLAN_TREE_SCHEMA: JsonSchema = {
    type: ['object', 'array'],
    items: RAW_GOAL_SCHEMA,
    properties: {
        goals: { type: 'array', items: RAW_GOAL_SCHEMA },
        goal_label: OPTIONAL_TEXT,
        talk_to_player: OPTIONAL_TEXT,
        plan: { type: 'array', items: RAW_PLAN_SCHEMA },
    },
};

export function createPlanTreeValidator(): SchemaValidator {
    const validator = new SchemaValidator();
    validator.registerSchema(RAW_PLAN_TREE_SCHEMA_ID, RAW_PLAN_TREE_SCHEMA);
    return validator;
}

const sharedValidator = createPlanTreeValidator();

/* -------------------------------------------------------------------------- */
/* Coercion                                                                   */
/* -------------------------------------------------------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rawString(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
}

function rawText(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}

function rawRefs(value: unknown): string[] {
    const list = Array.isArray(value) ? value : [value];
    const refs: string[] = [];
    for (const item of list) {
        const ref = rawString(item);
        // blank references carry nothing to resolve
        if (ref !== undefined && ref.trim() !== '') refs.push(ref);
    }
    return refs;
}

function coercePlans(value: unknown): RawPlan[] {
    if (!Array.isArray(value)) return [];
    return value.filter(isRecord).map((plan) => ({
        id: rawString(plan.id) ?? '',
        action_type: rawText(plan.action_type),
        description: rawText(plan.description),
        depends_on: rawRefs(plan.depends_on),
    }));
}

function coerceGoal(goal: Record<string, unknown>): RawGoal {
    return {
        id: rawString(goal.id),
        label: rawText(goal.label) ?? rawText(goal.goal_label),
        plans: coercePlans(goal.plans ?? goal.plan),
    };
}

/**
 * Validate an untrusted planner payload and coerce it into a RawGoalPlanTree.
 * Throws MALFORMED_PLAN_TREE when the payload has no recognizable goal/plan shape.
 */
export function parseRawTree(payload: unknown, validator: SchemaValidator = sharedValidator): RawGoalPlanTree {
    const result = validator.validate(payload, RAW_PLAN_TREE_SCHEMA_ID);
    if (!result.valid) {
        throw ErrorFactory.malformedPlanTree(result.errors.map(e => `${e.path || '$'}: ${e.message}`));
    }

    if (Array.isArray(payload)) {
        return { goals: payload.filter(isRecord).map(coerceGoal) };
    }
    if (isRecord(payload) && Array.isArray(payload.goals)) {
        return { goals: payload.goals.filter(isRecord).map(coerceGoal) };
    }
    if (isRecord(payload) && Array.isArray(payload.plan)) {
        return { goals: [coerceGoal(payload)] };
    }
    throw ErrorFactory.malformedPlanTree(['$: expected "goals" or "plan"']);
}

/* -------------------------------------------------------------------------- */
/* Normalization                                                              */
/* -------------------------------------------------------------------------- */

interface RefIndex {
    goals: Map<string, GoalId>;
    plans: Map<string, PlanId>;
    plansByGoal: Array<Map<string, PlanId>>;
}

function remember<T>(map: Map<string, T>, raw: string, id: T, kind: string): void {
    if (map.has(raw)) {
        log.debug(`Duplicate raw ${kind} id, first occurrence keeps the reference`, { raw_id: raw });
        return;
    }
    map.set(raw, id);
}

/**
 * References resolve against plans of the declaring goal first, then plans
 * anywhere in the call, then goals. Within each scope the first occurrence of
 * a raw id wins.
 */
function resolveRef(index: RefIndex, ref: string, goalPosition: number): DependencyTarget | undefined {
    return index.plansByGoal[goalPosition].get(ref)
        ?? index.plans.get(ref)
        ?? index.goals.get(ref);
}

/**
 * Order in which the execution layer may dispatch the tree's plans: a plan
 * comes after every plan it depends on, and a dependency on a goal means a
 * dependency on each of that goal's other plans. Among plans whose
 * prerequisites are all done, input order is kept.
 *
 * Throws CYCLIC_DEPENDENCY naming the plans that can never become ready.
 */
export function dispatchOrder(tree: Pick<NormalizedTree, 'goals'>): PlanId[] {
    const plans = tree.goals.flatMap(g => g.plans);
    const position = new Map<PlanId, number>(plans.map((p, i) => [p.id, i]));
    const plansOfGoal = new Map<GoalId, PlanId[]>(tree.goals.map(g => [g.id, g.plans.map(p => p.id)]));

    const waitingOn: number[] = [];
    const dependents: number[][] = plans.map(() => []);
    plans.forEach((plan, i) => {
        const prerequisites = new Set<number>();
        for (const target of plan.depends_on) {
            if (isPlanId(target)) {
                const j = position.get(target);
                if (j !== undefined) prerequisites.add(j);
                continue;
            }
            for (const member of plansOfGoal.get(target) ?? []) {
                const j = position.get(member);
                if (j !== undefined && j !== i) prerequisites.add(j);
            }
        }
        waitingOn.push(prerequisites.size);
        for (const j of prerequisites) dependents[j].push(i);
    });

    // ready stays sorted by input position
    const ready = waitingOn.flatMap((n, i) => (n === 0 ? [i] : []));
    const order: PlanId[] = [];
    for (let next = ready.shift(); next !== undefined; next = ready.shift()) {
        order.push(plans[next].id);
        for (const d of dependents[next]) {
            waitingOn[d]--;
            if (waitingOn[d] === 0) {
                const at = ready.findIndex(r => r > d);
                ready.splice(at === -1 ? ready.length : at, 0, d);
            }
        }
    }

    if (order.length < plans.length) {
        const stuck = plans.filter((_, i) => waitingOn[i] > 0).map(p => p.raw_id);
        log.warn('Cyclic dependency, rejecting planning call', { plans: stuck });
        throw ErrorFactory.cyclicDependency(stuck);
    }
    return order;
}

export function normalize(
    session: SessionId,
    rawTree: RawGoalPlanTree,
    options: NormalizeOptions = {}
): NormalizeOutcome {
    const goalOffset = options.goalOffset ?? 0;
    if (!Number.isInteger(goalOffset) || goalOffset < 0) {
        throw ErrorFactory.invalidSequence('goal offset', goalOffset, Number.MAX_SAFE_INTEGER);
    }

    if (rawTree.goals.length === 0) {
        log.info('Planning call proposed no goals', { session_id: session });
        return { status: 'EMPTY_TREE', session };
    }

    const index: RefIndex = { goals: new Map(), plans: new Map(), plansByGoal: [] };

    // Pass 1: mint every id so forward references resolve
    const goals: NormalizedGoal[] = rawTree.goals.map((rawGoal, goalPosition) => {
        const sequence = goalOffset + goalPosition + 1;
        const goalId = formatGoalId(session, sequence);
        if (rawGoal.id !== undefined) remember(index.goals, rawGoal.id, goalId, 'goal');

        const local = new Map<string, PlanId>();
        index.plansByGoal.push(local);

        const plans = rawGoal.plans.map((rawPlan, planPosition): NormalizedPlan => {
            const planId = formatPlanId(sequence, planPosition + 1);
            remember(local, rawPlan.id, planId, 'plan');
            remember(index.plans, rawPlan.id, planId, 'plan');
            return {
                id: planId,
                raw_id: rawPlan.id,
                goal_id: goalId,
                index: planPosition + 1,
                action_type: rawPlan.action_type,
                description: rawPlan.description,
                depends_on: [],
            };
        });

        return { id: goalId, raw_id: rawGoal.id, sequence, label: rawGoal.label, plans };
    });

    // Pass 2: rewrite references
    const edges: DependencyEdge[] = [];
    rawTree.goals.forEach((rawGoal, goalPosition) => {
        rawGoal.plans.forEach((rawPlan, planPosition) => {
            const plan = goals[goalPosition].plans[planPosition];
            for (const ref of rawPlan.depends_on) {
                const target = resolveRef(index, ref, goalPosition);
                if (target === undefined) {
                    log.warn('Unresolved dependency, rejecting planning call', {
                        raw_ref: ref,
                        source_plan: rawPlan.id,
                    });
                    throw ErrorFactory.unresolvedDependency(ref, rawPlan.id);
                }
                plan.depends_on.push(target);
                edges.push({ from: plan.id, to: target, raw_ref: ref });
            }
        });
    });

    const dispatch_order = dispatchOrder({ goals });

    log.info('Planning call normalized', {
        session_id: session,
        goals: goals.length,
        plans: dispatch_order.length,
        edges: edges.length,
        first_goal: goals[0].id,
    });

    return { status: 'NORMALIZED', tree: { session, goals, edges, dispatch_order } };
}
