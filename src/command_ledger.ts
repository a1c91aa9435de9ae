// command_ledger.ts — record of every command id handed to the execution layer
//
// GUARANTEES:
// - One row per (session_id, command_id); a command id is never recorded twice
// - Retries are linked to the command they retry through attempt_of, never by id reuse
// - attempt_of must name a command already recorded in the same session (FK)
// - A session's goal high-water mark outlives its in-memory scope (session_cursors)
// - Forward-compatible schema migrations (schema_version)
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import {
  type CommandId,
  type GoalId,
  type PlanId,
  type SessionId,
  isCommandId,
  isGoalId,
  isPlanId,
  isSessionId,
} from './identifier_format';
import { LEDGER_DB_PATH, SQLITE_BUSY_TIMEOUT_MS } from './config';
import { createLogger } from './logger';

const log = createLogger('ledger');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface CommandRecord {
  session_id: SessionId;
  command_id: CommandId;
  plan_id: PlanId;
  goal_id: GoalId | null;
  sequence: number;
  command_type: string | null;
  attempt_of: CommandId | null;
  issued_at: string;
}

export type NewCommandRecord = Omit<CommandRecord, 'issued_at'> & { issued_at?: string };

interface CommandRow {
  session_id: string;
  command_id: string;
  plan_id: string;
  goal_id: string | null;
  sequence: number;
  command_type: string | null;
  attempt_of: string | null;
  issued_at: string;
}

/* -------------------------------------------------------------------------- */
/* Errors                                                                     */
/* -------------------------------------------------------------------------- */

export class CommandLedgerError extends Error {
  constructor(message: string, public readonly code: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CommandLedgerError';
  }
}

export const LEDGER_ERRORS = {
  DUPLICATE_COMMAND: 'DUPLICATE_COMMAND',
  UNKNOWN_ATTEMPT: 'UNKNOWN_ATTEMPT',
  CORRUPT_ROW: 'CORRUPT_ROW',
  INFRA_ERROR: 'INFRA_ERROR',
} as const;

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const MAX_ATTEMPT_CHAIN = 1000;

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function toRecord(row: CommandRow): CommandRecord {
  const { session_id, command_id, plan_id, goal_id, attempt_of } = row;
  if (
    !isSessionId(session_id) ||
    !isCommandId(command_id) ||
    !isPlanId(plan_id) ||
    (goal_id !== null && !isGoalId(goal_id)) ||
    (attempt_of !== null && !isCommandId(attempt_of))
  ) {
    throw new CommandLedgerError(`Corrupt ledger row for ${row.command_id}`, LEDGER_ERRORS.CORRUPT_ROW);
  }
  return {
    session_id,
    command_id,
    plan_id,
    goal_id,
    sequence: row.sequence,
    command_type: row.command_type,
    attempt_of,
    issued_at: row.issued_at,
  };
}

function sqliteCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return '';
}

/* -------------------------------------------------------------------------- */
/* Command Ledger                                                             */
/* -------------------------------------------------------------------------- */

export class CommandLedger {
  private readonly db: Database.Database;

  constructor(dbPath: string = LEDGER_DB_PATH) {
    this.db = new Database(dbPath);
    this.configureDatabase();
    this.runMigrations();
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma(`busy_timeout = ${SQLITE_BUSY_TIMEOUT_MS}`);
  }

  /* ------------------------------------------------------------------------ */
  /* Migrations                                                               */
  /* ------------------------------------------------------------------------ */

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get() as { version: number } | undefined;

      const current = row?.version ?? 0;

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS commands (
            session_id TEXT NOT NULL,
            command_id TEXT NOT NULL,
            plan_id TEXT NOT NULL,
            goal_id TEXT,
            sequence INTEGER NOT NULL,
            command_type TEXT,
            attempt_of TEXT,
            issued_at TEXT NOT NULL,
            PRIMARY KEY (session_id, command_id),
            FOREIGN KEY (session_id, attempt_of) REFERENCES commands(session_id, command_id),
            CHECK(sequence >= 1)
          ) STRICT;

          CREATE INDEX IF NOT EXISTS idx_commands_plan
            ON commands(session_id, plan_id, sequence);
          CREATE INDEX IF NOT EXISTS idx_commands_attempt
            ON commands(session_id, attempt_of);
        `);
        this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(1);
      }

      if (current < 2) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS session_cursors (
            session_id TEXT PRIMARY KEY,
            goals_minted INTEGER NOT NULL,
            updated_at TEXT NOT NULL,
            CHECK(goals_minted >= 0)
          ) STRICT
        `);
        this.db.prepare(`INSERT INTO schema_version (version) VALUES (?)`).run(2);
      }
    });
    tx();
  }

  /* ------------------------------------------------------------------------ */
  /* Writes                                                                   */
  /* ------------------------------------------------------------------------ */

  record(entry: NewCommandRecord): CommandRecord {
    const record: CommandRecord = { ...entry, issued_at: entry.issued_at ?? new Date().toISOString() };
    try {
      this.db
        .prepare(`
          INSERT INTO commands
            (session_id, command_id, plan_id, goal_id, sequence, command_type, attempt_of, issued_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          record.session_id,
          record.command_id,
          record.plan_id,
          record.goal_id,
          record.sequence,
          record.command_type,
          record.attempt_of,
          record.issued_at
        );
    } catch (err) {
      const code = sqliteCode(err);
      if (code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
        throw new CommandLedgerError(
          `Command ${record.command_id} already recorded in ${record.session_id}`,
          LEDGER_ERRORS.DUPLICATE_COMMAND,
          err
        );
      }
      if (code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
        throw new CommandLedgerError(
          `attempt_of ${String(record.attempt_of)} is not recorded in ${record.session_id}`,
          LEDGER_ERRORS.UNKNOWN_ATTEMPT,
          err
        );
      }
      throw new CommandLedgerError('Ledger write failed', LEDGER_ERRORS.INFRA_ERROR, err);
    }

    log.debug('Command recorded', {
      session_id: record.session_id,
      command_id: record.command_id,
      attempt_of: record.attempt_of,
    });
    return record;
  }

  /** Persist a session's goal high-water mark. Never lowers a stored value. */
  saveGoalCursor(session: SessionId, goalsMinted: number): void {
    try {
      this.db
        .prepare(`
          INSERT INTO session_cursors (session_id, goals_minted, updated_at)
          VALUES (?, ?, ?)
          ON CONFLICT(session_id) DO UPDATE SET
            goals_minted = MAX(goals_minted, excluded.goals_minted),
            updated_at = excluded.updated_at
        `)
        .run(session, goalsMinted, new Date().toISOString());
    } catch (err) {
      throw new CommandLedgerError(`Cannot save goal cursor for ${session}`, LEDGER_ERRORS.INFRA_ERROR, err);
    }
  }

  /* ------------------------------------------------------------------------ */
  /* Reads                                                                    */
  /* ------------------------------------------------------------------------ */

  /** Goals minted so far in `session`, 0 for a session never seen. */
  goalsMinted(session: SessionId): number {
    const row = this.db
      .prepare(`SELECT goals_minted FROM session_cursors WHERE session_id = ?`)
      .get(session) as { goals_minted: number } | undefined;
    return row?.goals_minted ?? 0;
  }

  /** True once a session has committed goals or recorded commands. */
  isKnown(session: SessionId): boolean {
    const row = this.db
      .prepare(`
        SELECT 1 AS hit FROM session_cursors WHERE session_id = ?
        UNION ALL
        SELECT 1 AS hit FROM commands WHERE session_id = ?
        LIMIT 1
      `)
      .get(session, session);
    return row !== undefined;
  }

  /** Highest command sequence recorded for a plan, 0 if none. */
  lastSequence(session: SessionId, plan: PlanId): number {
    const row = this.db
      .prepare(`SELECT MAX(sequence) AS n FROM commands WHERE session_id = ? AND plan_id = ?`)
      .get(session, plan) as { n: number | null };
    return row.n ?? 0;
  }

  get(session: SessionId, command: CommandId): CommandRecord | undefined {
    const row = this.db
      .prepare(`SELECT * FROM commands WHERE session_id = ? AND command_id = ?`)
      .get(session, command) as CommandRow | undefined;
    return row ? toRecord(row) : undefined;
  }

  listForPlan(session: SessionId, plan: PlanId): CommandRecord[] {
    const rows = this.db
      .prepare(`SELECT * FROM commands WHERE session_id = ? AND plan_id = ? ORDER BY sequence ASC`)
      .all(session, plan) as CommandRow[];
    return rows.map(toRecord);
  }

  /** The retry chain ending at `command`, oldest attempt first. */
  attemptChain(session: SessionId, command: CommandId): CommandRecord[] {
    const chain: CommandRecord[] = [];
    let cursor = this.get(session, command);
    while (cursor && chain.length < MAX_ATTEMPT_CHAIN) {
      chain.unshift(cursor);
      cursor = cursor.attempt_of ? this.get(session, cursor.attempt_of) : undefined;
    }
    return chain;
  }

  count(session?: SessionId): number {
    const row = (session
      ? this.db.prepare(`SELECT COUNT(*) AS n FROM commands WHERE session_id = ?`).get(session)
      : this.db.prepare(`SELECT COUNT(*) AS n FROM commands`).get()) as { n: number };
    return row.n;
  }

  close(): void {
    this.db.close();
  }
}
