/**
 * Shared Configuration Constants
 *
 * Centralized configuration for identifier issuance.
 * Values can be overridden via environment variables.
 */

// Canonical identifier layout: field widths and the largest sequence each field can carry
export const ID_LAYOUT = {
    SUFFIX_LENGTH: 4,
    GOAL_DIGITS: 3,
    PLAN_DIGITS: 2,
    COMMAND_DIGITS: 3,
    GOAL_MAX: 999,
    PLAN_MAX: 99,
    COMMAND_MAX: 999,
} as const;

// Session suffix alphabet (no 0/o, 1/l/i)
export const SESSION_SUFFIX_ALPHABET = 'abcdefghjkmnpqrstuvwxyz23456789';

/** Positive integer from an env value; anything else falls back to the default. */
export function readPositiveInt(raw: string | undefined, fallback: number): number {
    const value = parseInt(raw || '', 10);
    return Number.isFinite(value) && value > 0 ? value : fallback;
}

// Active session bookkeeping
export const SESSION_LIMITS = {
    MAX_ACTIVE: readPositiveInt(process.env.LINEAGE_MAX_SESSIONS, 1000),
    IDLE_TTL_MS: readPositiveInt(process.env.LINEAGE_SESSION_TTL_MS, 3600000), // 1 hour
    MINT_ATTEMPTS: 32,
};

// Command ledger location (in-memory unless configured)
export const LEDGER_DB_PATH = process.env.LINEAGE_LEDGER_DB || ':memory:';

// SQLite busy timeout for the ledger
export const SQLITE_BUSY_TIMEOUT_MS = 5000;
