/**
 * Command Journal
 *
 * Append-only record of every dispatch and its outcome, kept in SQLite
 * (`:memory:` by default, a file path for durability across restarts).
 *
 * - One writer (the orchestrator) appends; readers see committed prefixes.
 * - `rebuild()` reconstructs command statuses after a transient fault.
 * - `compact()` drops entries inside the fully acknowledged prefix; the
 *   prefix length survives as the run's checkpoint.
 * - A `finished` entry records how the run ended (status in `reason`, the
 *   fault code in `code`), so recovery can tell a crash from a terminal fault.
 */

import Database from 'better-sqlite3';
import type { Command, CommandStream, Opcode } from '../compiler/types';
import { JOURNAL } from '../config';
import { createLogger } from '../logger';
import { ErrorCode, RunStatus, isErrorCode } from '../structured_error';
import { isRecord } from '../schema_validator';
import type { OutcomeKind } from './run_state_machine';
import { CommandStatus, JournalEntry, JournalEntryKind, NewJournalEntry } from './types';

const log = createLogger('journal');

const ENTRY_KINDS: readonly JournalEntryKind[] = ['dispatch', 'ack', 'fault', 'timeout', 'recovered', 'stop', 'finished'];
const RUN_STATUSES: readonly RunStatus[] = ['Idle', 'Running', 'Paused', 'Faulted', 'Completed', 'Aborted'];
const OPCODES: readonly Opcode[] = ['HOME', 'MOVE_REL', 'MOVE_ABS', 'SYNC', 'DISPENSE', 'ASPIRATE', 'READ', 'SPIN', 'DWELL', 'SET', 'STOP'];

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export class JournalError extends Error {
    constructor(message: string, public readonly code: ErrorCode = 'JOURNAL_MISMATCH') {
        super(message);
        this.name = 'JournalError';
    }
}

export interface RunRecord {
    runId: string;
    streamDigest: string;
    commandCount: number;
    /** Highest seq of the compacted, fully acknowledged prefix; -1 when nothing was compacted */
    checkpointSeq: number;
    createdAt: string;
}

/** One dispatch attempt and what became of it. */
export interface AttemptRecord {
    seq: number;
    attempt: number;
    dispatchedAt: string;
    outcome: OutcomeKind | null;
    reason: string | null;
}

export interface RebuiltRun {
    /** First command not acknowledged */
    index: number;
    statuses: CommandStatus[];
    attempts: number[];
    /** The command at `index` was dispatched and has no outcome yet */
    inFlight: boolean;
    /** An emergency stop was journaled for this run */
    stopped: boolean;
    /** How the run ended, if it ended before the journal was read */
    finished: { status: RunStatus; code: ErrorCode | null } | null;
}

export interface JournalOptions {
    path?: string;
    clock?: () => Date;
}

interface RunRow {
    run_id: string;
    stream_digest: string;
    command_count: number;
    checkpoint_seq: number;
    created_at: string;
}

interface EntryRow {
    entry_no: number;
    run_id: string;
    seq: number | null;
    attempt: number | null;
    kind: string;
    command: string | null;
    reason: string | null;
    code: string | null;
    created_at: string;
}

/* -------------------------------------------------------------------------- */
/* Journal                                                                    */
/* -------------------------------------------------------------------------- */

export class CommandJournal {
    private readonly db: Database.Database;
    private readonly clock: () => Date;

    constructor(options: JournalOptions = {}) {
        this.db = new Database(options.path ?? JOURNAL.PATH);
        this.clock = options.clock ?? (() => new Date());
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
        this.db.pragma('busy_timeout = 5000');
    }

    private runMigrations(): void {
        const tx = this.db.transaction(() => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS schema_version (
                    version INTEGER PRIMARY KEY,
                    applied_at TEXT DEFAULT CURRENT_TIMESTAMP
                ) STRICT
            `);

            const row = this.db
                .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get();
            const current = row?.version ?? 0;

            if (current < 1) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS runs (
                        run_id TEXT PRIMARY KEY,
                        stream_digest TEXT NOT NULL,
                        command_count INTEGER NOT NULL,
                        checkpoint_seq INTEGER NOT NULL DEFAULT -1,
                        created_at TEXT NOT NULL,
                        CHECK(command_count >= 0)
                    ) STRICT;

                    CREATE TABLE IF NOT EXISTS journal_entries (
                        entry_no INTEGER PRIMARY KEY AUTOINCREMENT,
                        run_id TEXT NOT NULL,
                        seq INTEGER,
                        attempt INTEGER,
                        kind TEXT NOT NULL,
                        command TEXT,
                        reason TEXT,
                        code TEXT,
                        created_at TEXT NOT NULL,
                        FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE,
                        CHECK(kind IN ('dispatch','ack','fault','timeout','recovered','stop'))
                    ) STRICT;

                    CREATE INDEX IF NOT EXISTS idx_journal_run_seq ON journal_entries(run_id, seq);
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
            }

            if (current < 2) {
                // Adds the 'finished' kind; SQLite cannot alter a CHECK, so the table is rebuilt.
                this.db.exec(`
                    CREATE TABLE journal_entries_v2 (
                        entry_no INTEGER PRIMARY KEY AUTOINCREMENT,
                        run_id TEXT NOT NULL,
                        seq INTEGER,
                        attempt INTEGER,
                        kind TEXT NOT NULL,
                        command TEXT,
                        reason TEXT,
                        code TEXT,
                        created_at TEXT NOT NULL,
                        FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE,
                        CHECK(kind IN ('dispatch','ack','fault','timeout','recovered','stop','finished'))
                    ) STRICT;

                    INSERT INTO journal_entries_v2 SELECT * FROM journal_entries;
                    DROP TABLE journal_entries;
                    ALTER TABLE journal_entries_v2 RENAME TO journal_entries;
                    CREATE INDEX IF NOT EXISTS idx_journal_run_seq ON journal_entries(run_id, seq);
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (2)`).run();
            }
        });
        tx();
    }

    close(): void {
        this.db.close();
    }

    /* ------------------------------------------------------------------------ */
    /* Runs                                                                     */
    /* ------------------------------------------------------------------------ */

    beginRun(runId: string, stream: CommandStream): RunRecord {
        const existing = this.run(runId);
        if (existing) {
            throw new JournalError(`Run ${runId} is already journaled`, 'RUN_CONFLICT');
        }
        const createdAt = this.clock().toISOString();
        this.db
            .prepare(`INSERT INTO runs (run_id, stream_digest, command_count, created_at) VALUES (?, ?, ?, ?)`)
            .run(runId, stream.digest, stream.commands.length, createdAt);
        return { runId, streamDigest: stream.digest, commandCount: stream.commands.length, checkpointSeq: -1, createdAt };
    }

    run(runId: string): RunRecord | null {
        const row = this.db.prepare<[string], RunRow>(`SELECT * FROM runs WHERE run_id = ?`).get(runId);
        if (!row) return null;
        return {
            runId: row.run_id,
            streamDigest: row.stream_digest,
            commandCount: row.command_count,
            checkpointSeq: row.checkpoint_seq,
            createdAt: row.created_at,
        };
    }

    /* ------------------------------------------------------------------------ */
    /* Entries                                                                  */
    /* ------------------------------------------------------------------------ */

    append(entry: NewJournalEntry): JournalEntry {
        const timestamp = entry.timestamp ?? this.clock().toISOString();
        const info = this.db
            .prepare(`
                INSERT INTO journal_entries (run_id, seq, attempt, kind, command, reason, code, created_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?)
            `)
            .run(
                entry.runId,
                entry.seq,
                entry.attempt,
                entry.kind,
                entry.command ? JSON.stringify(entry.command) : null,
                entry.reason,
                entry.code,
                timestamp
            );
        return { ...entry, entryNo: Number(info.lastInsertRowid), timestamp };
    }

    /** Entries of a run in append order, optionally only those after `afterEntryNo`. */
    entries(runId: string, afterEntryNo = 0): JournalEntry[] {
        return this.db
            .prepare<[string, number], EntryRow>(
                `SELECT * FROM journal_entries WHERE run_id = ? AND entry_no > ? ORDER BY entry_no`
            )
            .all(runId, afterEntryNo)
            .map(toEntry);
    }

    /** Dispatch attempts of a run (or of one command), each joined with its outcome. */
    attempts(runId: string, seq?: number): AttemptRecord[] {
        const records = new Map<string, AttemptRecord>();
        const ordered: AttemptRecord[] = [];

        for (const entry of this.entries(runId)) {
            if (entry.seq === null || entry.attempt === null) continue;
            if (seq !== undefined && entry.seq !== seq) continue;
            const key = `${entry.seq}:${entry.attempt}`;

            if (entry.kind === 'dispatch') {
                const record: AttemptRecord = {
                    seq: entry.seq,
                    attempt: entry.attempt,
                    dispatchedAt: entry.timestamp,
                    outcome: null,
                    reason: null,
                };
                records.set(key, record);
                ordered.push(record);
                continue;
            }

            const record = records.get(key);
            if (record && record.outcome === null && entry.kind !== 'stop' && entry.kind !== 'finished') {
                record.outcome = entry.kind;
                record.reason = entry.reason;
            }
        }
        return ordered;
    }

    /* ------------------------------------------------------------------------ */
    /* Checkpoints                                                              */
    /* ------------------------------------------------------------------------ */

    /** Highest seq such that it and every earlier command are acknowledged; -1 if none. */
    checkpoint(runId: string): number {
        const run = this.requireRun(runId);
        const acked = new Set<number>();
        for (const entry of this.entries(runId)) {
            if ((entry.kind === 'ack' || entry.kind === 'recovered') && entry.seq !== null) acked.add(entry.seq);
        }
        let seq = run.checkpointSeq;
        while (acked.has(seq + 1)) seq++;
        return seq;
    }

    /** Discard entries inside the acknowledged prefix. Returns the number of entries removed. */
    compact(runId: string): number {
        const tx = this.db.transaction((): number => {
            const checkpoint = this.checkpoint(runId);
            const run = this.requireRun(runId);
            if (checkpoint <= run.checkpointSeq) return 0;

            const removed = this.db
                .prepare(`DELETE FROM journal_entries WHERE run_id = ? AND seq IS NOT NULL AND seq <= ?`)
                .run(runId, checkpoint).changes;
            this.db.prepare(`UPDATE runs SET checkpoint_seq = ? WHERE run_id = ?`).run(checkpoint, runId);
            return removed;
        });

        const removed = tx();
        if (removed) log.debug('Compacted journal', { runId, removed });
        return removed;
    }

    /* ------------------------------------------------------------------------ */
    /* Rebuild                                                                  */
    /* ------------------------------------------------------------------------ */

    /**
     * Reconstruct per-command status for a run of `commandCount` commands.
     * Throws JournalError when the journal does not describe an in-order run.
     */
    rebuild(runId: string, commandCount: number): RebuiltRun {
        const run = this.requireRun(runId);
        if (run.commandCount !== commandCount) {
            throw new JournalError(
                `Run ${runId} was journaled with ${run.commandCount} commands, not ${commandCount}`
            );
        }

        const statuses: CommandStatus[] = Array.from({ length: commandCount }, (_, i) =>
            i <= run.checkpointSeq ? 'Acked' : 'Pending'
        );
        const attempts: number[] = Array.from({ length: commandCount }, () => 0);
        const lastKind: (JournalEntryKind | null)[] = Array.from({ length: commandCount }, () => null);
        let stopped = false;
        let finished: RebuiltRun['finished'] = null;

        for (const entry of this.entries(runId)) {
            if (entry.kind === 'stop') {
                stopped = true;
                continue;
            }
            if (entry.kind === 'finished') {
                const status = RUN_STATUSES.find((st) => st === entry.reason);
                if (!status) throw new JournalError(`Journal entry ${entry.entryNo} has unknown run status ${entry.reason}`);
                finished = { status, code: entry.code };
                continue;
            }
            if (entry.seq === null) continue;
            if (entry.seq < 0 || entry.seq >= commandCount) {
                throw new JournalError(`Journal entry ${entry.entryNo} references seq ${entry.seq} outside the run`);
            }
            const i = entry.seq;
            if (entry.kind === 'dispatch') {
                attempts[i] = Math.max(attempts[i], entry.attempt ?? 0);
                if (statuses[i] !== 'Acked') statuses[i] = 'Sent';
            } else if (entry.kind === 'ack' || entry.kind === 'recovered') {
                statuses[i] = 'Acked';
            } else if (statuses[i] !== 'Acked') {
                statuses[i] = 'Failed';
            }
            lastKind[i] = entry.kind;
        }

        let index = 0;
        while (index < commandCount && statuses[index] === 'Acked') index++;
        for (let i = index + 1; i < commandCount; i++) {
            if (statuses[i] !== 'Pending') {
                throw new JournalError(
                    `Journal shows seq ${i} as ${statuses[i]} while seq ${index} was never acknowledged`
                );
            }
        }

        return {
            index,
            statuses,
            attempts,
            inFlight: index < commandCount && lastKind[index] === 'dispatch',
            stopped,
            finished,
        };
    }

    private requireRun(runId: string): RunRecord {
        const run = this.run(runId);
        if (!run) throw new JournalError(`No journal for run ${runId}`);
        return run;
    }
}

/* -------------------------------------------------------------------------- */
/* Row decoding                                                               */
/* -------------------------------------------------------------------------- */

function toEntry(row: EntryRow): JournalEntry {
    const kind = ENTRY_KINDS.find((k) => k === row.kind);
    if (!kind) throw new JournalError(`Journal entry ${row.entry_no} has unknown kind ${row.kind}`);
    return {
        entryNo: row.entry_no,
        runId: row.run_id,
        seq: row.seq,
        attempt: row.attempt,
        kind,
        command: row.command === null ? null : parseCommand(row.command, row.entry_no),
        timestamp: row.created_at,
        reason: row.reason,
        code: isErrorCode(row.code) ? row.code : null,
    };
}

function parseCommand(text: string, entryNo: number): Command {
    const raw: unknown = JSON.parse(text);
    const bad = (): JournalError => new JournalError(`Journal entry ${entryNo} holds a malformed command`);
    if (!isRecord(raw)) throw bad();

    const opcode = OPCODES.find((o) => o === raw.opcode);
    const { seq, device, channel, args, steps } = raw;
    if (!opcode || typeof seq !== 'number' || typeof device !== 'string') throw bad();
    if (channel !== null && typeof channel !== 'string') throw bad();
    if (!isRecord(args) || !Array.isArray(steps)) throw bad();

    const numericArgs: Record<string, number> = {};
    for (const [key, value] of Object.entries(args)) {
        if (typeof value !== 'number') throw bad();
        numericArgs[key] = value;
    }
    const stepIds: number[] = [];
    for (const id of steps) {
        if (typeof id !== 'number') throw bad();
        stepIds.push(id);
    }

    return { seq, opcode, device, channel, args: numericArgs, steps: stepIds };
}
