/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when LINEAGE_LOG_JSON=1
 * - Optional file output via LINEAGE_LOG_FILE
 * - Module context (component name) on every line
 * - Session / planning-call correlation propagated through all log entries
 *
 * Environment:
 *   LINEAGE_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   LINEAGE_LOG_JSON   = 1 (default: text)
 *   LINEAGE_LOG_FILE   = path (optional, appends)
 *   LINEAGE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const value = (raw || 'info').toLowerCase();
    if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
    return 'info';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.LINEAGE_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.LINEAGE_DEBUG === '1' || process.env.LINEAGE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.LINEAGE_LOG_JSON === '1';
const LOG_FILE = process.env.LINEAGE_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Correlation Context (singleton)                                            */
/* -------------------------------------------------------------------------- */

let _sessionId: string = '';
let _callId: string = '';
let _fileWriteFailed = false;

/** Set the active correlation context. Called by the pipeline at the start of a planning call. */
export function setCorrelation(opts: { sessionId?: string; callId?: string }): void {
    if (opts.sessionId !== undefined) _sessionId = opts.sessionId;
    if (opts.callId !== undefined) _callId = opts.callId;
}

/** Clear correlation context. Called when the planning call settles. */
export function clearCorrelation(): void {
    _sessionId = '';
    _callId = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_sessionId) entry.session_id = _sessionId;
        if (_callId) entry.call_id = _callId;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _sessionId ? ` [${_sessionId}${_callId ? ':' + _callId.slice(0, 8) : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE && !_fileWriteFailed) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (err) {
            // Report once, then keep logging to the console only
            _fileWriteFailed = true;
            process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${String(err)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
