import test from 'node:test';
import assert from 'node:assert/strict';

import { buildStream } from '../src/compiler/codegen';
import { CommandDraft } from '../src/compiler/lowering';
import { CommandStream } from '../src/compiler/types';
import {
    DispatchNotice,
    ExecutionOrchestrator,
    OrchestratorOptions,
    OutcomeNotice,
    RunHandle,
    RunOutcome,
} from '../src/runtime/execution_orchestrator';
import { CommandJournal } from '../src/runtime/journal';
import { RetryPolicy } from '../src/runtime/retry_policy';
import { Result } from '../src/structured_error';
import { Prng } from './helpers/prng';
import { Reply, ScriptedController } from './helpers/scripted_controller';
import { tick } from './helpers/fixtures';

const DRAFTS: CommandDraft[] = [
    { opcode: 'DISPENSE', device: 'deviceA', channel: null, args: { volume: 1 }, steps: [0] },
    { opcode: 'DWELL', device: 'system', channel: null, args: { duration: 0.01 }, steps: [1] },
    { opcode: 'SPIN', device: 'deviceB', channel: null, args: { speed: 100, duration: 0.01 }, steps: [2] },
];
const stream = buildStream(DRAFTS);
const NOW = new Date('2026-05-06T07:08:09Z');

function orchestrator(controller: ScriptedController, options: OrchestratorOptions = {}): ExecutionOrchestrator {
    return new ExecutionOrchestrator(controller, {
        journal: new CommandJournal({ path: ':memory:', clock: () => NOW }),
        policy: new RetryPolicy({ maxRetries: 3, backoffBaseMs: 1, backoffMaxMs: 4 }),
        ackTimeoutMs: 1000,
        abortWaitMs: 50,
        compactEveryAcks: 0,
        clock: () => NOW,
        ...options,
    });
}

function unwrap<T>(result: Result<T>): T {
    if (!result.ok) throw new Error(`${result.error}: ${result.message}`);
    return result.value;
}

/** Dispatch and outcome notices as `kind seq#attempt`, in emission order. */
function trace(o: ExecutionOrchestrator): string[] {
    const lines: string[] = [];
    o.on('dispatch', (n: DispatchNotice) => lines.push(`dispatch ${n.seq}#${n.attempt}`));
    o.on('outcome', (n: OutcomeNotice) => lines.push(`${n.outcome} ${n.seq}#${n.attempt}`));
    return lines;
}

/* -------------------------------------------------------------------------- */
/* Dispatch and retry                                                         */
/* -------------------------------------------------------------------------- */

test('retries a faulted command after checking the controller status', async () => {
    const controller = new ScriptedController().script(0, 'fault', 'fault');
    const o = orchestrator(controller);
    const lines = trace(o);
    const finishedEvents: RunOutcome[] = [];
    o.on('finished', (outcome: RunOutcome) => finishedEvents.push(outcome));

    const run = unwrap(o.start(stream));
    const outcome = await run.finished;

    assert.deepEqual(outcome, { runId: run.runId, status: 'Completed', fault: null });
    assert.deepEqual(finishedEvents, [outcome]);
    assert.deepEqual(lines, [
        'dispatch 0#1',
        'fault 0#1',
        'dispatch 0#2',
        'fault 0#2',
        'dispatch 0#3',
        'ack 0#3',
        'dispatch 1#1',
        'ack 1#1',
        'dispatch 2#1',
        'ack 2#1',
    ]);
    assert.equal(controller.statusQueries, 2);

    assert.deepEqual(
        o.journal.attempts(run.runId, 0).map((a) => [a.attempt, a.outcome]),
        [[1, 'fault'], [2, 'fault'], [3, 'ack']]
    );
    assert.deepEqual(
        o.journal.entries(run.runId).filter((e) => e.kind === 'fault').map((e) => [e.code, e.reason]),
        [['DEVICE_FAULT', 'device fault on seq 0'], ['DEVICE_FAULT', 'device fault on seq 0']]
    );
    assert.equal(o.activeRun, null);
    assert.equal(o.snapshot()?.status, 'Completed');
});

test('escalates once the retry bound is spent and never dispatches past the failing command', async () => {
    const controller = new ScriptedController().script(1, 'fault', 'fault', 'fault', 'fault');
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    const outcome = await run.finished;

    assert.equal(outcome.status, 'Faulted');
    assert.ok(outcome.fault);
    assert.equal(outcome.fault.code, 'RETRIES_EXHAUSTED');
    assert.equal(outcome.fault.run_status, 'Faulted');
    assert.equal(outcome.fault.failing_seq, 1);
    assert.deepEqual(outcome.fault.completed_seqs, [0]);
    assert.equal(outcome.fault.attempts, 4);
    assert.equal(
        outcome.fault.reason,
        'Retries exhausted for seq 1: 4 attempts (limit 3 retries), last fault: device fault on seq 1'
    );
    assert.deepEqual(controller.seqs(), [0, 1, 1, 1, 1]);
});

test('a lost acknowledgement is recovered from the status check without a resend', async () => {
    const controller = new ScriptedController().script(0, 'lose_ack');
    const o = orchestrator(controller, { ackTimeoutMs: 20 });
    const reasons: (string | null)[] = [];
    o.on('outcome', (n: OutcomeNotice) => reasons.push(n.reason));
    const lines = trace(o);

    const outcome = await unwrap(o.start(stream)).finished;

    assert.equal(outcome.status, 'Completed');
    assert.deepEqual(lines, [
        'dispatch 0#1',
        'timeout 0#1',
        'recovered 0#1',
        'dispatch 1#1',
        'ack 1#1',
        'dispatch 2#1',
        'ack 2#1',
    ]);
    assert.deepEqual(reasons.slice(0, 2), [
        'no acknowledgement for seq 0 attempt 1 before the deadline',
        'controller reports the command completed; its acknowledgement was lost',
    ]);
    assert.deepEqual(controller.seqs(), [0, 1, 2]);
});

test('a dispatch the controller refuses is journaled and retried', async () => {
    const controller = new ScriptedController().script(0, 'reject');
    const o = orchestrator(controller);
    const lines = trace(o);

    const run = unwrap(o.start(stream));
    const outcome = await run.finished;

    assert.equal(outcome.status, 'Completed');
    assert.deepEqual(lines.slice(0, 4), ['dispatch 0#1', 'fault 0#1', 'dispatch 0#2', 'ack 0#2']);
    const fault = o.journal.entries(run.runId).find((e) => e.kind === 'fault');
    assert.equal(fault?.code, 'DISPATCH_REJECTED');
    assert.equal(fault?.reason, 'controller refused seq 0');
});

test('a dwell longer than the acknowledgement timeout completes on its first dispatch', async () => {
    const controller = new ScriptedController({ defaultReply: 'timed' });
    const o = orchestrator(controller, { ackTimeoutMs: 30 });
    const lines = trace(o);
    const dwell = buildStream([
        { opcode: 'DWELL', device: 'system', channel: null, args: { duration: 0.2 }, steps: [0] },
    ]);

    const outcome = await unwrap(o.start(dwell)).finished;

    assert.equal(outcome.status, 'Completed');
    assert.deepEqual(lines, ['dispatch 0#1', 'ack 0#1']);
    assert.equal(controller.statusQueries, 0);
});

test('compacts the journal behind the acknowledged prefix', async () => {
    const o = orchestrator(new ScriptedController(), { compactEveryAcks: 2 });

    const run = unwrap(o.start(stream));
    await run.finished;

    assert.equal(o.journal.run(run.runId)?.checkpointSeq, 1);
    assert.deepEqual(
        o.journal.entries(run.runId).map((e) => [e.kind, e.seq]),
        [['dispatch', 2], ['ack', 2], ['finished', null]]
    );
});

/* -------------------------------------------------------------------------- */
/* Operator control                                                           */
/* -------------------------------------------------------------------------- */

test('pause holds the next dispatch until resume', async () => {
    const controller = new ScriptedController();
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    assert.deepEqual(o.pause(), { ok: true, value: 'Paused' });

    await tick();
    assert.deepEqual(controller.seqs(), [0]);
    assert.equal(run.snapshot().current_index, 1);
    assert.equal(run.status, 'Paused');

    assert.deepEqual(o.resume(), { ok: true, value: 'Running' });
    const outcome = await run.finished;
    assert.equal(outcome.status, 'Completed');
    assert.deepEqual(controller.seqs(), [0, 1, 2]);
});

test('operator commands are refused without an active run or in the wrong state', () => {
    const controller = new ScriptedController({ defaultReply: 'drop' });
    const o = orchestrator(controller);

    assert.deepEqual(o.pause(), { ok: false, error: 'INVALID_STATE', message: 'No active run' });

    unwrap(o.start(stream));
    assert.deepEqual(o.resume(), {
        ok: false,
        error: 'INVALID_STATE',
        message: 'cannot resume a run that is Running',
    });
    assert.deepEqual(o.abort(), { ok: true, value: 'Aborted' });
});

test('abort sends an emergency stop and ends the run once it is confirmed', async () => {
    const controller = new ScriptedController({ defaultReply: 'drop' });
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    assert.deepEqual(o.abort('spill detected'), { ok: true, value: 'Aborted' });

    const outcome = await run.finished;
    assert.deepEqual(outcome, { runId: run.runId, status: 'Aborted', fault: null });
    assert.equal(controller.stopRequests, 1);

    const stop = o.journal.entries(run.runId).find((e) => e.kind === 'stop');
    assert.equal(stop?.reason, 'spill detected');

    assert.deepEqual(o.recover(stream, run.runId), {
        ok: false,
        error: 'INVALID_STATE',
        message: `Run ${run.runId} was aborted and cannot be resumed`,
    });
});

test('an emergency stop that is never confirmed is reported', async () => {
    const controller = new ScriptedController({ defaultReply: 'drop', stop: 'hang' });
    const o = orchestrator(controller, { abortWaitMs: 20 });

    const run = unwrap(o.start(stream));
    o.abort();
    const outcome = await run.finished;

    assert.equal(outcome.status, 'Aborted');
    assert.ok(outcome.fault);
    assert.equal(outcome.fault.code, 'ABORT_UNCONFIRMED');
    assert.equal(outcome.fault.failing_seq, 0);
    assert.equal(outcome.fault.reason, 'emergency stop timed out after 20ms');
    assert.ok(outcome.fault.recovery_options.some((option) => option.action === 'rehome_devices'));
});

test('a controller without emergency stop aborts immediately', async () => {
    const controller = new ScriptedController({ defaultReply: 'drop', supportsEmergencyStop: false });
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    o.abort();

    assert.equal(o.activeRun, null);
    assert.equal(controller.stopRequests, 0);
    assert.deepEqual(await run.finished, { runId: run.runId, status: 'Aborted', fault: null });
});

test('only one run may be active at a time', async () => {
    const controller = new ScriptedController({ defaultReply: 'drop' });
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    assert.deepEqual(o.start(stream), {
        ok: false,
        error: 'RUN_CONFLICT',
        message: `Run ${run.runId} is still Running`,
    });

    o.abort();
    await run.finished;
    const second = unwrap(o.start(stream));
    assert.notEqual(second.runId, run.runId);
    o.abort();
    await second.finished;
});

/* -------------------------------------------------------------------------- */
/* Protocol violations                                                        */
/* -------------------------------------------------------------------------- */

test('an acknowledgement ahead of the outstanding command faults the run', async () => {
    const controller = new ScriptedController({ defaultReply: 'drop' });
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    controller.emit({ type: 'ack', runId: run.runId, seq: 2 });
    const outcome = await run.finished;

    assert.equal(outcome.status, 'Faulted');
    assert.ok(outcome.fault);
    assert.equal(outcome.fault.code, 'OUT_OF_ORDER_ACK');
    assert.equal(outcome.fault.fault_kind, 'ProtocolViolation');
    assert.equal(outcome.fault.reason, 'ack for seq 2 arrived while seq 0 is outstanding');
    assert.equal(run.snapshot().commands[0].status, 'Failed');
});

test('an acknowledgement for an unknown sequence number faults the run', async () => {
    const controller = new ScriptedController({ defaultReply: 'drop' });
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    controller.emit({ type: 'ack', runId: 'someone-else', seq: 0 });
    assert.equal(run.status, 'Running');

    controller.emit({ type: 'ack', runId: run.runId, seq: 7 });
    const outcome = await run.finished;
    assert.equal(outcome.fault?.code, 'UNKNOWN_SEQUENCE');
    assert.equal(outcome.fault?.reason, 'ack references unknown seq 7');
});

/* -------------------------------------------------------------------------- */
/* Recovery                                                                   */
/* -------------------------------------------------------------------------- */

function crashedJournal(): CommandJournal {
    const journal = new CommandJournal({ path: ':memory:', clock: () => NOW });
    journal.beginRun('r-crash', stream);
    const base = { runId: 'r-crash', reason: null, code: null };
    journal.append({ ...base, seq: 0, attempt: 1, kind: 'dispatch', command: stream.commands[0] });
    journal.append({ ...base, seq: 0, attempt: 1, kind: 'ack', command: null });
    journal.append({ ...base, seq: 1, attempt: 1, kind: 'dispatch', command: stream.commands[1] });
    return journal;
}

test('recovery skips an in-flight command the controller already completed', async () => {
    const controller = new ScriptedController();
    controller.markCompleted('r-crash', 1);
    const o = orchestrator(controller, { journal: crashedJournal() });
    const lines = trace(o);

    const run = unwrap(o.recover(stream, 'r-crash'));
    assert.equal(run.runId, 'r-crash');
    const outcome = await run.finished;

    assert.equal(outcome.status, 'Completed');
    assert.deepEqual(lines, ['recovered 1#1', 'dispatch 2#1', 'ack 2#1']);
    assert.deepEqual(controller.seqs(), [2]);
});

test('recovery resends an in-flight command the controller did not complete', async () => {
    const controller = new ScriptedController();
    const o = orchestrator(controller, { journal: crashedJournal() });

    const outcome = await unwrap(o.recover(stream, 'r-crash')).finished;

    assert.equal(outcome.status, 'Completed');
    assert.deepEqual(
        controller.dispatched.map((d) => [d.seq, d.attempt]),
        [[1, 2], [2, 1]]
    );
});

test('recovery refuses a journal that does not match the stream', () => {
    const o = orchestrator(new ScriptedController(), { journal: crashedJournal() });
    const other = buildStream(DRAFTS.slice(0, 2));

    assert.deepEqual(o.recover(other, 'r-crash'), {
        ok: false,
        error: 'JOURNAL_MISMATCH',
        message: `Run r-crash was journaled for stream ${stream.digest}, not ${other.digest}`,
    });
    assert.deepEqual(o.recover(stream, 'ghost'), {
        ok: false,
        error: 'JOURNAL_MISMATCH',
        message: 'No journal for run ghost',
    });
});

test('a run that exhausted its retries is resumed only when the fault is acknowledged', async () => {
    const controller = new ScriptedController().script(1, 'fault', 'fault', 'fault', 'fault');
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    assert.equal((await run.finished).status, 'Faulted');
    const [ending] = o.journal.entries(run.runId).slice(-1);
    assert.deepEqual([ending.kind, ending.seq, ending.reason, ending.code], ['finished', null, 'Faulted', 'RETRIES_EXHAUSTED']);

    assert.deepEqual(o.recover(stream, run.runId), {
        ok: false,
        error: 'INVALID_STATE',
        message: `Run ${run.runId} ended Faulted with RETRIES_EXHAUSTED; recover with acknowledgeFault to retry seq 1`,
    });
    assert.equal(controller.dispatched.length, 5);

    const resumed = unwrap(o.recover(stream, run.runId, { acknowledgeFault: true }));
    assert.equal((await resumed.finished).status, 'Completed');
    assert.deepEqual(
        controller.dispatched.slice(5).map((d) => [d.seq, d.attempt]),
        [[1, 5], [2, 1]]
    );

    assert.deepEqual(o.recover(stream, run.runId), {
        ok: false,
        error: 'INVALID_STATE',
        message: `Run ${run.runId} already completed`,
    });
});

test('a run ended by a protocol violation is not recovered by default', async () => {
    const controller = new ScriptedController({ defaultReply: 'drop' });
    const o = orchestrator(controller);

    const run = unwrap(o.start(stream));
    controller.emit({ type: 'ack', runId: run.runId, seq: 2 });
    await run.finished;

    const refused = o.recover(stream, run.runId);
    assert.equal(refused.ok, false);
    if (!refused.ok) {
        assert.equal(refused.message, `Run ${run.runId} ended Faulted with OUT_OF_ORDER_ACK; recover with acknowledgeFault to retry seq 0`);
    }
});

test('a stream with gaps in its numbering is refused before anything is journaled', () => {
    const controller = new ScriptedController();
    const o = orchestrator(controller);
    const gapped: CommandStream = { ...stream, commands: [stream.commands[0], stream.commands[2]] };

    assert.deepEqual(o.start(gapped), {
        ok: false,
        error: 'UNKNOWN_SEQUENCE',
        message: 'Stream rejected: command 1 carries seq 2; a stream is numbered 0..1 in order',
    });
    assert.equal(controller.dispatched.length, 0);
    assert.equal(o.activeRun, null);
});

/* -------------------------------------------------------------------------- */
/* Ordering under random controller behaviour                                 */
/* -------------------------------------------------------------------------- */

test('a command is dispatched only after every earlier command is acknowledged', async () => {
    const prng = new Prng(7031);
    const replies: readonly Reply[] = ['ack', 'ack', 'ack', 'fault', 'lose_ack', 'drop', 'reject'];
    const long = buildStream([...DRAFTS, ...DRAFTS]);

    for (let round = 0; round < 12; round++) {
        const controller = new ScriptedController();
        for (const command of long.commands) {
            controller.script(command.seq, ...Array.from({ length: prng.int(0, 3) }, () => prng.pick(replies)));
        }
        const o = orchestrator(controller, { ackTimeoutMs: 10 });
        const done = new Set<number>();
        const violations: string[] = [];

        o.on('outcome', (n: OutcomeNotice) => {
            if (n.outcome === 'ack' || n.outcome === 'recovered') done.add(n.seq);
        });
        o.on('dispatch', (n: DispatchNotice) => {
            for (let seq = 0; seq < n.seq; seq++) {
                if (!done.has(seq)) violations.push(`round ${round}: seq ${n.seq} sent before seq ${seq} completed`);
            }
            if (done.has(n.seq)) violations.push(`round ${round}: seq ${n.seq} resent after it completed`);
        });

        const handle: RunHandle = unwrap(o.start(long));
        const outcome = await handle.finished;

        assert.deepEqual(violations, []);
        const sorted = [...controller.seqs()].sort((a, b) => a - b);
        assert.deepEqual(controller.seqs(), sorted);
        if (outcome.status === 'Completed') {
            assert.equal(done.size, long.commands.length);
        } else {
            assert.equal(outcome.fault?.code, 'RETRIES_EXHAUSTED');
        }
    }
});
