/**
 * Main entry point - exports all public APIs
 */

export {
    type SessionId,
    type GoalId,
    type PlanId,
    type CommandId,
    type CommandLineage,
    type SessionIdOptions,
    EntityKind,
    formatSessionId,
    formatGoalId,
    formatPlanId,
    formatCommandId,
    isCanonical,
    isSessionId,
    isGoalId,
    isPlanId,
    isCommandId,
    kindOf,
    parseSessionId,
    parseGoalId,
    parsePlanId,
    parseCommandId,
    lineageOf,
    goalSequenceOf,
} from './identifier_format';
export {
    type RawGoalPlanTree,
    type RawGoal,
    type RawPlan,
    type NormalizedTree,
    type NormalizedGoal,
    type NormalizedPlan,
    type DependencyEdge,
    type DependencyTarget,
    type NormalizeOutcome,
    type NormalizeOptions,
    normalize,
    dispatchOrder,
    parseRawTree,
    createPlanTreeValidator,
    RAW_PLAN_TREE_SCHEMA,
    RAW_PLAN_TREE_SCHEMA_ID,
} from './normalization_engine';
export { ExecutionCounterRegistry } from './execution_counter_registry';
export {
    type SessionRegistryOptions,
    type SessionOrigin,
    type SessionHistory,
    SessionRegistry,
    SessionScope,
} from './session_registry';
export { type CommandRecord, CommandLedger, CommandLedgerError, LEDGER_ERRORS } from './command_ledger';
export {
    type PlanningService,
    type PlanningRequest,
    type PlanningOutcome,
    type PlanningPipelineOptions,
    type CommandDescription,
    PlanningPipeline,
} from './planning_pipeline';
export { KeyedLock } from './keyed_lock';
export { type ValidationResult, type JsonSchema, SchemaValidator } from './schema_validator';
export {
    type ErrorCode,
    type StructuredError,
    type RecoveryOption,
    LineageError,
    ErrorFactory,
    createStructuredError,
    isLineageError,
} from './structured_error';
export { type Logger, type LogLevel, createLogger } from './logger';
