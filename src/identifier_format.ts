/**
 * Identifier Formatter — canonical identifiers for sessions, goals, plans and commands
 *
 * Layouts:
 *   Session  sess_<YYYYMMDD>_<HHMMSS>_<suffix>     sess_20250909_163532_ek30
 *   Goal     goal_<session suffix>_<seq:3>          goal_ek30_001
 *   Plan     plan_<goal seq:3>_<plan seq:2>         plan_001_02
 *   Command  cmd_<plan id>_<seq:3>                  cmd_plan_001_02_001
 *
 * Every child identifier embeds its ancestry, so a CommandId alone names its
 * plan and goal sequence. Sequence fields are zero-padded to a fixed width so
 * that lexical order equals creation order; values that do not fit the width
 * are rejected rather than widened.
 *
 * Identifier types are branded strings. A plain string only becomes a
 * SessionId / GoalId / PlanId / CommandId through the type guards below.
 */

import { randomInt } from 'crypto';
import { ID_LAYOUT, SESSION_SUFFIX_ALPHABET } from './config';
import { ErrorFactory } from './structured_error';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type SessionId = string & { readonly __brand: 'SessionId' };
export type GoalId = string & { readonly __brand: 'GoalId' };
export type PlanId = string & { readonly __brand: 'PlanId' };
export type CommandId = string & { readonly __brand: 'CommandId' };

export const EntityKind = {
    Session: 'session',
    Goal: 'goal',
    Plan: 'plan',
    Command: 'command',
} as const;

export type EntityKind = typeof EntityKind[keyof typeof EntityKind];

export interface ParsedSessionId {
    date: string;   // YYYYMMDD
    time: string;   // HHMMSS
    suffix: string;
}

export interface ParsedGoalId {
    sessionSuffix: string;
    sequence: number;
}

export interface ParsedPlanId {
    goalSequence: number;
    planIndex: number;
}

export interface ParsedCommandId {
    plan: PlanId;
    goalSequence: number;
    planIndex: number;
    sequence: number;
}

export interface SessionIdOptions {
    /** Clock reading to stamp into the id (default: now). */
    now?: Date;
    /** Uniform integer in [0, size). Default: crypto.randomInt. */
    randomIndex?: (size: number) => number;
}

/* -------------------------------------------------------------------------- */
/* Patterns                                                                   */
/* -------------------------------------------------------------------------- */

const SUFFIX = `[a-z0-9]{${ID_LAYOUT.SUFFIX_LENGTH}}`;
const GOAL_SEQ = `\\d{${ID_LAYOUT.GOAL_DIGITS}}`;
const PLAN_SEQ = `\\d{${ID_LAYOUT.PLAN_DIGITS}}`;
const CMD_SEQ = `\\d{${ID_LAYOUT.COMMAND_DIGITS}}`;

const SESSION_RE = new RegExp(`^sess_(\\d{8})_(\\d{6})_(${SUFFIX})$`);
const GOAL_RE = new RegExp(`^goal_(${SUFFIX})_(${GOAL_SEQ})$`);
const PLAN_RE = new RegExp(`^plan_(${GOAL_SEQ})_(${PLAN_SEQ})$`);
const COMMAND_RE = new RegExp(`^cmd_(plan_${GOAL_SEQ}_${PLAN_SEQ})_(${CMD_SEQ})$`);

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

function requireSequence(field: string, value: number, max: number): void {
    if (!Number.isInteger(value) || value < 1 || value > max) {
        throw ErrorFactory.invalidSequence(field, value, max);
    }
}

function stampUtc(now: Date): { date: string; time: string } {
    const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1, 2)}${pad(now.getUTCDate(), 2)}`;
    const time = `${pad(now.getUTCHours(), 2)}${pad(now.getUTCMinutes(), 2)}${pad(now.getUTCSeconds(), 2)}`;
    return { date, time };
}

/* -------------------------------------------------------------------------- */
/* Parsing & guards                                                           */
/* -------------------------------------------------------------------------- */

export function parseSessionId(candidate: string): ParsedSessionId | null {
    const m = SESSION_RE.exec(candidate);
    if (!m) return null;
    return { date: m[1], time: m[2], suffix: m[3] };
}

export function parseGoalId(candidate: string): ParsedGoalId | null {
    const m = GOAL_RE.exec(candidate);
    if (!m) return null;
    const sequence = Number(m[2]);
    if (sequence < 1) return null;
    return { sessionSuffix: m[1], sequence };
}

export function parsePlanId(candidate: string): ParsedPlanId | null {
    const m = PLAN_RE.exec(candidate);
    if (!m) return null;
    const goalSequence = Number(m[1]);
    const planIndex = Number(m[2]);
    if (goalSequence < 1 || planIndex < 1) return null;
    return { goalSequence, planIndex };
}

export function parseCommandId(candidate: string): ParsedCommandId | null {
    const m = COMMAND_RE.exec(candidate);
    if (!m) return null;
    const plan = m[1];
    const parsedPlan = parsePlanId(plan);
    const sequence = Number(m[2]);
    if (!parsedPlan || !isPlanId(plan) || sequence < 1) return null;
    return { plan, goalSequence: parsedPlan.goalSequence, planIndex: parsedPlan.planIndex, sequence };
}

export function isSessionId(candidate: string): candidate is SessionId {
    return parseSessionId(candidate) !== null;
}

export function isGoalId(candidate: string): candidate is GoalId {
    return parseGoalId(candidate) !== null;
}

export function isPlanId(candidate: string): candidate is PlanId {
    return parsePlanId(candidate) !== null;
}

export function isCommandId(candidate: string): candidate is CommandId {
    return parseCommandId(candidate) !== null;
}

/**
 * Structural check: does `candidate` already have the canonical layout of `kind`?
 */
export function isCanonical(candidate: string, kind: EntityKind): boolean {
    switch (kind) {
        case EntityKind.Session: return isSessionId(candidate);
        case EntityKind.Goal:    return isGoalId(candidate);
        case EntityKind.Plan:    return isPlanId(candidate);
        case EntityKind.Command: return isCommandId(candidate);
    }
}

/** Kind of a canonical identifier, or null for anything else. */
export function kindOf(candidate: string): EntityKind | null {
    for (const kind of Object.values(EntityKind)) {
        if (isCanonical(candidate, kind)) return kind;
    }
    return null;
}

/* -------------------------------------------------------------------------- */
/* Formatting                                                                 */
/* -------------------------------------------------------------------------- */

export function formatSessionId(options: SessionIdOptions = {}): SessionId {
    const { date, time } = stampUtc(options.now ?? new Date());
    const pick = options.randomIndex ?? ((size: number) => randomInt(size));

    let suffix = '';
    for (let i = 0; i < ID_LAYOUT.SUFFIX_LENGTH; i++) {
        suffix += SESSION_SUFFIX_ALPHABET[pick(SESSION_SUFFIX_ALPHABET.length)];
    }

    const id = `sess_${date}_${time}_${suffix}`;
    if (!isSessionId(id)) {
        throw new Error(`formatSessionId produced a non-canonical id: ${id}`);
    }
    return id;
}

export function formatGoalId(session: SessionId, sequence: number): GoalId {
    requireSequence('goal sequence', sequence, ID_LAYOUT.GOAL_MAX);
    const parsed = parseSessionId(session);
    if (!parsed) {
        throw ErrorFactory.invalidSessionFormat(session);
    }

    const id = `goal_${parsed.suffix}_${pad(sequence, ID_LAYOUT.GOAL_DIGITS)}`;
    if (!isGoalId(id)) {
        throw ErrorFactory.invalidSequence('goal sequence', sequence, ID_LAYOUT.GOAL_MAX);
    }
    return id;
}

export function formatPlanId(goalSequence: number, planIndexInGoal: number): PlanId {
    requireSequence('goal sequence', goalSequence, ID_LAYOUT.GOAL_MAX);
    requireSequence('plan index', planIndexInGoal, ID_LAYOUT.PLAN_MAX);

    const id = `plan_${pad(goalSequence, ID_LAYOUT.GOAL_DIGITS)}_${pad(planIndexInGoal, ID_LAYOUT.PLAN_DIGITS)}`;
    if (!isPlanId(id)) {
        throw ErrorFactory.invalidSequence('plan index', planIndexInGoal, ID_LAYOUT.PLAN_MAX);
    }
    return id;
}

export function formatCommandId(plan: PlanId, commandSequence: number): CommandId {
    if (!parsePlanId(plan)) {
        // Only reachable from untyped callers
        throw new Error(`Not a canonical plan id: ${plan}`);
    }
    requireSequence('command sequence', commandSequence, ID_LAYOUT.COMMAND_MAX);

    const id = `cmd_${plan}_${pad(commandSequence, ID_LAYOUT.COMMAND_DIGITS)}`;
    if (!isCommandId(id)) {
        throw new Error(`formatCommandId produced a non-canonical id: ${id}`);
    }
    return id;
}

/* -------------------------------------------------------------------------- */
/* Lineage                                                                    */
/* -------------------------------------------------------------------------- */

export interface CommandLineage {
    command: CommandId;
    plan: PlanId;
    goalSequence: number;
    planIndex: number;
    commandSequence: number;
}

/** Reconstruct a command's ancestry from the identifier string alone. */
export function lineageOf(command: CommandId): CommandLineage {
    const parsed = parseCommandId(command);
    if (!parsed) {
        // Unreachable for a branded CommandId
        throw new Error(`Not a canonical command id: ${command}`);
    }
    return {
        command,
        plan: parsed.plan,
        goalSequence: parsed.goalSequence,
        planIndex: parsed.planIndex,
        commandSequence: parsed.sequence,
    };
}

/** Goal sequence embedded in a GoalId. */
export function goalSequenceOf(goal: GoalId): number {
    const parsed = parseGoalId(goal);
    if (!parsed) {
        throw new Error(`Not a canonical goal id: ${goal}`);
    }
    return parsed.sequence;
}
