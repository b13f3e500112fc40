import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';

import { buildStream } from '../src/compiler/codegen';
import { CommandJournal, JournalError } from '../src/runtime/journal';
import { JournalEntryKind, NewJournalEntry } from '../src/runtime/types';

const stream = buildStream([
    { opcode: 'HOME', device: 'stage', channel: null, args: {}, steps: [0] },
    { opcode: 'MOVE_REL', device: 'stage', channel: 'x', args: { x: 10, feed: 3000 }, steps: [0] },
    { opcode: 'DWELL', device: 'system', channel: null, args: { duration: 2 }, steps: [1] },
]);
const NOW = new Date('2026-03-04T05:06:07Z');

function journal(file?: string): CommandJournal {
    return new CommandJournal({ path: file, clock: () => NOW });
}

function entry(kind: JournalEntryKind, seq: number | null, attempt: number | null, reason: string | null = null): NewJournalEntry {
    return {
        runId: 'r1',
        seq,
        attempt,
        kind,
        command: kind === 'dispatch' && seq !== null ? stream.commands[seq] : null,
        reason,
        code: kind === 'fault' ? 'DEVICE_FAULT' : null,
    };
}

function rejects(fn: () => unknown, message: string | RegExp): void {
    assert.throws(fn, (e: unknown) => {
        assert.ok(e instanceof JournalError);
        if (typeof message === 'string') assert.equal(e.message, message);
        else assert.match(e.message, message);
        return true;
    });
}

test('records runs and refuses a second run with the same id', () => {
    const j = journal();
    const record = j.beginRun('r1', stream);
    assert.deepEqual(record, {
        runId: 'r1',
        streamDigest: stream.digest,
        commandCount: 3,
        checkpointSeq: -1,
        createdAt: '2026-03-04T05:06:07.000Z',
    });
    assert.deepEqual(j.run('r1'), record);
    assert.equal(j.run('r2'), null);

    assert.throws(() => j.beginRun('r1', stream), (e: unknown) => e instanceof JournalError && e.code === 'RUN_CONFLICT');
    j.close();
});

test('entries come back in append order with their commands', () => {
    const j = journal();
    j.beginRun('r1', stream);
    const first = j.append(entry('dispatch', 0, 1));
    const second = j.append(entry('fault', 0, 1, 'jam'));
    assert.ok(second.entryNo > first.entryNo);

    const entries = j.entries('r1');
    assert.deepEqual(entries.map((e) => e.kind), ['dispatch', 'fault']);
    assert.deepEqual(entries[0].command, stream.commands[0]);
    assert.equal(entries[1].code, 'DEVICE_FAULT');
    assert.equal(entries[1].timestamp, '2026-03-04T05:06:07.000Z');
    assert.deepEqual(j.entries('r1', first.entryNo).map((e) => e.entryNo), [second.entryNo]);
    j.close();
});

test('joins each dispatch attempt with its outcome', () => {
    const j = journal();
    j.beginRun('r1', stream);
    j.append(entry('dispatch', 0, 1));
    j.append(entry('fault', 0, 1, 'jam'));
    j.append(entry('dispatch', 0, 2));
    j.append(entry('ack', 0, 2));
    j.append(entry('dispatch', 1, 1));

    assert.deepEqual(j.attempts('r1', 0), [
        { seq: 0, attempt: 1, dispatchedAt: '2026-03-04T05:06:07.000Z', outcome: 'fault', reason: 'jam' },
        { seq: 0, attempt: 2, dispatchedAt: '2026-03-04T05:06:07.000Z', outcome: 'ack', reason: null },
    ]);
    assert.deepEqual(j.attempts('r1').map((a) => [a.seq, a.attempt, a.outcome]), [
        [0, 1, 'fault'],
        [0, 2, 'ack'],
        [1, 1, null],
    ]);
    j.close();
});

test('compaction keeps the acknowledged prefix as a checkpoint', () => {
    const j = journal();
    j.beginRun('r1', stream);
    j.append(entry('dispatch', 0, 1));
    j.append(entry('ack', 0, 1));
    j.append(entry('dispatch', 1, 1));
    j.append(entry('timeout', 1, 1));
    j.append(entry('recovered', 1, 1));
    j.append(entry('dispatch', 2, 1));

    assert.equal(j.checkpoint('r1'), 1);
    assert.equal(j.compact('r1'), 5);
    assert.equal(j.run('r1')?.checkpointSeq, 1);
    assert.equal(j.checkpoint('r1'), 1);
    assert.equal(j.compact('r1'), 0);

    assert.deepEqual(j.rebuild('r1', 3), {
        index: 2,
        statuses: ['Acked', 'Acked', 'Sent'],
        attempts: [0, 0, 1],
        inFlight: true,
        stopped: false,
        finished: null,
    });
    j.close();
});

test('rebuild reports faults and stops', () => {
    const j = journal();
    j.beginRun('r1', stream);
    j.append(entry('dispatch', 0, 1));
    j.append(entry('fault', 0, 1, 'jam'));
    j.append(entry('stop', null, null, 'operator abort'));

    assert.deepEqual(j.rebuild('r1', 3), {
        index: 0,
        statuses: ['Failed', 'Pending', 'Pending'],
        attempts: [1, 0, 0],
        inFlight: false,
        stopped: true,
        finished: null,
    });
    j.close();
});

test('rebuild reports how the run ended', () => {
    const j = journal();
    j.beginRun('r1', stream);
    j.append(entry('dispatch', 0, 1));
    j.append(entry('fault', 0, 1, 'jam'));
    j.append({ runId: 'r1', seq: null, attempt: null, kind: 'finished', command: null, reason: 'Faulted', code: 'RETRIES_EXHAUSTED' });

    const rebuilt = j.rebuild('r1', 3);
    assert.deepEqual(rebuilt.finished, { status: 'Faulted', code: 'RETRIES_EXHAUSTED' });
    assert.equal(rebuilt.stopped, false);
    assert.deepEqual(j.attempts('r1').map((a) => [a.seq, a.attempt, a.outcome]), [[0, 1, 'fault']]);

    j.append({ runId: 'r1', seq: null, attempt: null, kind: 'finished', command: null, reason: 'Lost', code: null });
    rejects(() => j.rebuild('r1', 3), /^Journal entry \d+ has unknown run status Lost$/);
    j.close();
});

test('rebuild refuses a journal that does not describe an in-order run', () => {
    const j = journal();
    j.beginRun('r1', stream);
    j.append(entry('dispatch', 0, 1));
    j.append(entry('ack', 0, 1));
    j.append(entry('dispatch', 2, 1));

    rejects(() => j.rebuild('r1', 4), 'Run r1 was journaled with 3 commands, not 4');
    rejects(() => j.rebuild('r1', 3), 'Journal shows seq 2 as Sent while seq 1 was never acknowledged');
    rejects(() => j.rebuild('ghost', 3), 'No journal for run ghost');

    j.append(entry('ack', 9, 1));
    rejects(() => j.rebuild('r1', 3), /^Journal entry \d+ references seq 9 outside the run$/);
    j.close();
});

test('a file-backed journal survives reopening', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'journal-'));
    const file = path.join(dir, 'journal.db');
    try {
        const first = journal(file);
        first.beginRun('r1', stream);
        first.append(entry('dispatch', 0, 1));
        first.append(entry('ack', 0, 1));
        first.close();

        const second = journal(file);
        assert.equal(second.run('r1')?.streamDigest, stream.digest);
        assert.deepEqual(second.entries('r1').map((e) => e.kind), ['dispatch', 'ack']);
        assert.equal(second.checkpoint('r1'), 0);
        second.close();
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('a journal written before finished entries existed is migrated on open', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'journal-'));
    const file = path.join(dir, 'journal.db');
    try {
        const old = new Database(file);
        old.exec(`
            CREATE TABLE schema_version (version INTEGER PRIMARY KEY, applied_at TEXT DEFAULT CURRENT_TIMESTAMP) STRICT;
            CREATE TABLE runs (
                run_id TEXT PRIMARY KEY,
                stream_digest TEXT NOT NULL,
                command_count INTEGER NOT NULL,
                checkpoint_seq INTEGER NOT NULL DEFAULT -1,
                created_at TEXT NOT NULL
            ) STRICT;
            CREATE TABLE journal_entries (
                entry_no INTEGER PRIMARY KEY AUTOINCREMENT,
                run_id TEXT NOT NULL,
                seq INTEGER,
                attempt INTEGER,
                kind TEXT NOT NULL,
                command TEXT,
                reason TEXT,
                code TEXT,
                created_at TEXT NOT NULL,
                CHECK(kind IN ('dispatch','ack','fault','timeout','recovered','stop'))
            ) STRICT;
            INSERT INTO schema_version (version) VALUES (1);
        `);
        old.prepare(`INSERT INTO runs (run_id, stream_digest, command_count, created_at) VALUES (?, ?, ?, ?)`)
            .run('r1', stream.digest, 3, NOW.toISOString());
        old.prepare(`INSERT INTO journal_entries (run_id, seq, attempt, kind, created_at) VALUES (?, ?, ?, ?, ?)`)
            .run('r1', 0, 1, 'timeout', NOW.toISOString());
        old.close();

        const j = journal(file);
        j.append({ runId: 'r1', seq: null, attempt: null, kind: 'finished', command: null, reason: 'Completed', code: null });
        assert.deepEqual(j.entries('r1').map((e) => [e.entryNo, e.kind]), [[1, 'timeout'], [2, 'finished']]);
        j.close();
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});
