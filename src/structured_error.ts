/**
 * Structured Error Schema for identifier issuance
 *
 * Every failure raised by the formatter, the normalization engine, the
 * counter registry or the session registry is a LineageError. It carries a
 * machine-readable code and can be rendered as a StructuredError with the
 * recovery options the caller is expected to take.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Invariant violations (internal bugs)
    | 'INVALID_SEQUENCE'
    | 'SESSION_COLLISION'

    // Upstream planner output
    | 'UNRESOLVED_DEPENDENCY'
    | 'CYCLIC_DEPENDENCY'
    | 'MALFORMED_PLAN_TREE'

    // Client input
    | 'INVALID_SESSION_FORMAT'
    | 'SESSION_NOT_FOUND'

    // Execution layer
    | 'UNKNOWN_PLAN'
    | 'UNKNOWN_COMMAND';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RecoveryAction =
    | 'regenerate_plan'
    | 'request_server_session'
    | 'open_new_session'
    | 'register_plan'
    | 'issue_fresh_command'
    | 'report_bug'
    | 'retry_later';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    retryable: boolean;
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    human_intervention_required: boolean;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = recoveryFor(code)
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        recovery_options: recoveryOptions,
        human_intervention_required: recoveryOptions.length === 0 ||
            recoveryOptions.every(opt => !opt.retryable),
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'INVALID_SEQUENCE',
        'SESSION_COLLISION'
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    return 'ERROR';
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    regeneratePlan: (): RecoveryOption => ({
        action: 'regenerate_plan',
        description: 'Ask the planning service for a new plan; nothing from the rejected call was kept',
        retryable: true
    }),

    requestServerSession: (): RecoveryOption => ({
        action: 'request_server_session',
        description: 'Start the session without a client id and use the server-minted one',
        retryable: true
    }),

    openNewSession: (): RecoveryOption => ({
        action: 'open_new_session',
        description: 'Open a new session; the previous one is no longer active',
        retryable: true
    }),

    registerPlan: (): RecoveryOption => ({
        action: 'register_plan',
        description: 'Only plans from a committed planning call can receive commands',
        retryable: false
    }),

    issueFreshCommand: (): RecoveryOption => ({
        action: 'issue_fresh_command',
        description: 'Issue a new command id for the plan instead of retrying an unknown one',
        retryable: true
    }),

    reportBug: (reason: string): RecoveryOption => ({
        action: 'report_bug',
        description: `Internal invariant violated: ${reason}`,
        retryable: false
    }),

    retryLater: (): RecoveryOption => ({
        action: 'retry_later',
        description: 'Retry once some active sessions have closed or expired',
        retryable: true
    })
};

function recoveryFor(code: ErrorCode): RecoveryOption[] {
    switch (code) {
        case 'INVALID_SEQUENCE':
            return [CommonRecoveryOptions.reportBug('sequence outside the canonical range')];
        case 'SESSION_COLLISION':
            return [CommonRecoveryOptions.retryLater()];
        case 'UNRESOLVED_DEPENDENCY':
        case 'CYCLIC_DEPENDENCY':
        case 'MALFORMED_PLAN_TREE':
            return [CommonRecoveryOptions.regeneratePlan()];
        case 'INVALID_SESSION_FORMAT':
            return [CommonRecoveryOptions.requestServerSession()];
        case 'SESSION_NOT_FOUND':
            return [CommonRecoveryOptions.openNewSession()];
        case 'UNKNOWN_PLAN':
            return [CommonRecoveryOptions.registerPlan()];
        case 'UNKNOWN_COMMAND':
            return [CommonRecoveryOptions.issueFreshCommand()];
    }
}

/* -------------------------------------------------------------------------- */
/* Error class                                                                */
/* -------------------------------------------------------------------------- */

export class LineageError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'LineageError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, this.context);
    }
}

export function isLineageError(err: unknown, code?: ErrorCode): err is LineageError {
    return err instanceof LineageError && (code === undefined || err.code === code);
}

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static invalidSequence(field: string, value: number, max: number): LineageError {
        return new LineageError(
            'INVALID_SEQUENCE',
            `${field} must be an integer in 1..${max}, got ${value}`,
            { field, value, max }
        );
    }

    static unresolvedDependency(rawRef: string, sourcePlan: string): LineageError {
        return new LineageError(
            'UNRESOLVED_DEPENDENCY',
            `Plan "${sourcePlan}" depends on "${rawRef}", which is not part of this planning call`,
            { raw_ref: rawRef, source_plan: sourcePlan }
        );
    }

    static cyclicDependency(rawPlanIds: string[]): LineageError {
        return new LineageError(
            'CYCLIC_DEPENDENCY',
            `Dependency cycle: plans ${rawPlanIds.map(id => `"${id}"`).join(', ')} can never be dispatched`,
            { plans: rawPlanIds }
        );
    }

    static malformedPlanTree(errors: string[]): LineageError {
        return new LineageError(
            'MALFORMED_PLAN_TREE',
            `Planner output is not a goal/plan tree (${errors.length} problem${errors.length === 1 ? '' : 's'})`,
            { errors }
        );
    }

    static invalidSessionFormat(candidate: string): LineageError {
        return new LineageError(
            'INVALID_SESSION_FORMAT',
            `Client-supplied session id is not canonical: "${candidate}"`,
            { candidate }
        );
    }

    static sessionNotFound(sessionId: string): LineageError {
        return new LineageError(
            'SESSION_NOT_FOUND',
            `Session ${sessionId} is not active`,
            { session_id: sessionId }
        );
    }

    static sessionCollision(attempts: number): LineageError {
        return new LineageError(
            'SESSION_COLLISION',
            `No free session id after ${attempts} attempts`,
            { attempts }
        );
    }

    static unknownPlan(planId: string, sessionId?: string): LineageError {
        return new LineageError(
            'UNKNOWN_PLAN',
            `Plan ${planId} is not registered${sessionId ? ` in session ${sessionId}` : ''}`,
            sessionId ? { plan_id: planId, session_id: sessionId } : { plan_id: planId }
        );
    }

    static unknownCommand(commandId: string, sessionId: string): LineageError {
        return new LineageError(
            'UNKNOWN_COMMAND',
            `Command ${commandId} was never issued in session ${sessionId}`,
            { command_id: commandId, session_id: sessionId }
        );
    }
}
