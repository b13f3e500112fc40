/**
 * Run-aware logger for the protocol kernel.
 *
 * Every entry carries the component that wrote it and, while a run is
 * active, the run id and the command being worked on (seq, attempt,
 * device). Text lines read
 *
 *   2026-01-01T00:00:00.000Z WARN  orchestrator run=1a2b3c4d seq=3#2 dev=stage Command failed code=ACK_TIMEOUT
 *
 * where `seq=3#2` is attempt 2 of command 3. JSON mode writes one object per
 * line with the same fields.
 *
 * Environment:
 *   LABMOTION_LOG_LEVEL  = debug|info|warn|error|silent (default: info)
 *   LABMOTION_LOG_JSON   = 1 (default: text)
 *   LABMOTION_LOG_FILE   = path (optional, appends)
 *   LABMOTION_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function isLevelName(value: string): value is LogLevel | 'silent' {
    return value in LEVEL_ORDER;
}

const envLevel = (process.env.LABMOTION_LOG_LEVEL || 'info').toLowerCase();
const DEBUG_OVERRIDE = process.env.LABMOTION_DEBUG === '1' || process.env.LABMOTION_DEBUG === 'true';
const MIN_LEVEL = DEBUG_OVERRIDE ? 0 : isLevelName(envLevel) ? LEVEL_ORDER[envLevel] : LEVEL_ORDER.info;

const JSON_MODE = process.env.LABMOTION_LOG_JSON === '1';
const LOG_FILE = process.env.LABMOTION_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Run context                                                                */
/* -------------------------------------------------------------------------- */

/** What the kernel is working on when an entry is written. */
export interface RunContext {
    runId?: string;
    seq?: number;
    attempt?: number;
    device?: string;
}

let context: RunContext = {};

/**
 * Merge fields into the active run context. Starting a new run drops the
 * command fields of the previous one.
 */
export function setCorrelation(update: RunContext): void {
    context = update.runId !== undefined && update.runId !== context.runId
        ? { ...update }
        : { ...context, ...update };
}

export function clearCorrelation(): void {
    context = {};
}

export function currentCorrelation(): Readonly<RunContext> {
    return context;
}

/* -------------------------------------------------------------------------- */
/* Formatting                                                                 */
/* -------------------------------------------------------------------------- */

export interface LogEntry {
    ts: string;
    level: LogLevel;
    component: string;
    msg: string;
    context: Readonly<RunContext>;
    data?: Record<string, unknown>;
}

function fieldValue(value: unknown): string {
    if (typeof value === 'number' || typeof value === 'boolean' || value === null) return String(value);
    if (typeof value === 'string') return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
    if (value === undefined) return 'undefined';
    return JSON.stringify(value);
}

export function formatText(entry: LogEntry): string {
    const parts = [entry.ts, entry.level.toUpperCase().padEnd(5), entry.component];
    const { runId, seq, attempt, device } = entry.context;
    if (runId) parts.push(`run=${runId.slice(0, 8)}`);
    if (seq !== undefined) parts.push(attempt !== undefined ? `seq=${seq}#${attempt}` : `seq=${seq}`);
    if (device) parts.push(`dev=${device}`);
    parts.push(entry.msg);
    for (const [key, value] of Object.entries(entry.data ?? {})) {
        parts.push(`${key}=${fieldValue(value)}`);
    }
    return parts.join(' ');
}

export function formatJson(entry: LogEntry): string {
    const { runId, seq, attempt, device } = entry.context;
    return JSON.stringify({
        ts: entry.ts,
        level: entry.level,
        component: entry.component,
        msg: entry.msg,
        run_id: runId,
        seq,
        attempt,
        device,
        data: entry.data,
    });
}

/* -------------------------------------------------------------------------- */
/* Output                                                                     */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, msg: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < MIN_LEVEL) return;

    const entry: LogEntry = { ts: new Date().toISOString(), level, component, msg, context, data };
    const line = JSON_MODE ? formatJson(entry) : formatText(entry);

    if (level === 'warn' || level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${reason}\n`);
        }
    }
}

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
        info: (msg, data) => emit('info', component, msg, data),
        warn: (msg, data) => emit('warn', component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
