import test from 'node:test';
import assert from 'node:assert/strict';

import { buildStream } from '../src/compiler/codegen';
import { CommandDraft } from '../src/compiler/lowering';
import { RetryPolicy } from '../src/runtime/retry_policy';
import { RunStateMachine, RunStateMachineOptions } from '../src/runtime/run_state_machine';

const DRAFTS: CommandDraft[] = [
    { opcode: 'DISPENSE', device: 'deviceA', channel: null, args: { volume: 1 }, steps: [0] },
    { opcode: 'DWELL', device: 'system', channel: null, args: { duration: 1 }, steps: [1] },
    { opcode: 'SPIN', device: 'deviceB', channel: null, args: { speed: 100, duration: 1 }, steps: [2] },
];
const { commands } = buildStream(DRAFTS);
const NOW = new Date('2026-01-01T00:00:00Z');

function machine(options: RunStateMachineOptions = {}, cmds = commands): RunStateMachine {
    return new RunStateMachine('run-1', cmds, {
        policy: new RetryPolicy({ maxRetries: 3, backoffBaseMs: 1, backoffMaxMs: 4 }),
        clock: () => NOW,
        ...options,
    });
}

function started(options: RunStateMachineOptions = {}): RunStateMachine {
    const m = machine(options);
    m.handle({ type: 'start' });
    return m;
}

test('dispatches one command at a time and completes', () => {
    const m = machine();
    assert.deepEqual(m.handle({ type: 'start' }).effects, [{ type: 'dispatch', command: commands[0], attempt: 1 }]);
    assert.equal(m.status, 'Running');

    assert.deepEqual(m.handle({ type: 'ack', seq: 0 }).effects, [
        { type: 'cancel_timers' },
        { type: 'record_outcome', seq: 0, attempt: 1, outcome: 'ack', reason: null, code: null },
        { type: 'dispatch', command: commands[1], attempt: 1 },
    ]);
    m.handle({ type: 'ack', seq: 1 });
    const last = m.handle({ type: 'ack', seq: 2 }).effects;
    assert.deepEqual(last[last.length - 1], { type: 'finished', status: 'Completed', fault: null });

    const snap = m.snapshot();
    assert.equal(snap.status, 'Completed');
    assert.equal(snap.acked, 3);
    assert.equal(snap.current_index, 3);
});

test('an empty stream completes on start', () => {
    const m = machine({}, []);
    assert.deepEqual(m.handle({ type: 'start' }).effects, [{ type: 'finished', status: 'Completed', fault: null }]);
});

test('a stream not numbered from zero is refused on start', () => {
    const shifted = commands.map((c) => ({ ...c, seq: c.seq + 1 }));
    const m = machine({}, shifted);
    assert.equal(m.handle({ type: 'start' }).rejected, 'command 0 carries seq 1; a stream is numbered 0..2 in order');
    assert.equal(m.status, 'Idle');
});

test('start is refused once the run has begun', () => {
    const m = started();
    assert.equal(m.handle({ type: 'start' }).rejected, 'cannot start a run that is Running');
});

test('a fault schedules a status check before the retry', () => {
    const m = started();
    assert.deepEqual(m.handle({ type: 'fault', seq: 0, reason: 'jam' }).effects, [
        { type: 'cancel_timers' },
        { type: 'record_outcome', seq: 0, attempt: 1, outcome: 'fault', reason: 'jam', code: 'DEVICE_FAULT' },
        { type: 'verify_then_retry', seq: 0, retryNumber: 1, delayMs: 1 },
    ]);
    assert.equal(m.snapshot().fault_count, 1);

    assert.deepEqual(m.handle({ type: 'status', seq: 0, completed: false }).effects, [
        { type: 'dispatch', command: commands[0], attempt: 2 },
    ]);
    assert.equal(m.attemptsFor(0), 2);
});

test('a command the controller already completed is not sent again', () => {
    const m = started();
    m.handle({ type: 'timeout', seq: 0, attempt: 1 });
    const effects = m.handle({ type: 'status', seq: 0, completed: true }).effects;
    assert.deepEqual(effects, [
        { type: 'cancel_timers' },
        {
            type: 'record_outcome',
            seq: 0,
            attempt: 1,
            outcome: 'recovered',
            reason: 'controller reports the command completed; its acknowledgement was lost',
            code: null,
        },
        { type: 'dispatch', command: commands[1], attempt: 1 },
    ]);
});

test('a missed deadline is a fault; a stale one is ignored', () => {
    const m = started();
    const effects = m.handle({ type: 'timeout', seq: 0, attempt: 1 }).effects;
    assert.deepEqual(effects[1], {
        type: 'record_outcome',
        seq: 0,
        attempt: 1,
        outcome: 'timeout',
        reason: 'no acknowledgement for seq 0 attempt 1 before the deadline',
        code: 'ACK_TIMEOUT',
    });
    assert.equal(m.handle({ type: 'timeout', seq: 0, attempt: 2 }).ignored, 'stale deadline for seq 0 attempt 2');
});

test('escalates after the retry bound with a fault report', () => {
    const m = started({ policy: new RetryPolicy({ maxRetries: 2, backoffBaseMs: 1 }) });
    for (let attempt = 1; attempt <= 2; attempt++) {
        m.handle({ type: 'fault', seq: 0, reason: 'jam' });
        m.handle({ type: 'status', seq: 0, completed: false });
    }
    const effects = m.handle({ type: 'fault', seq: 0, reason: 'jam' }).effects;
    assert.equal(m.status, 'Faulted');

    const fault = m.fault;
    assert.ok(fault);
    assert.deepEqual(effects[effects.length - 1], { type: 'finished', status: 'Faulted', fault });
    assert.equal(fault.code, 'RETRIES_EXHAUSTED');
    assert.equal(fault.fault_kind, 'DispatchFault');
    assert.equal(fault.run_id, 'run-1');
    assert.equal(fault.failing_seq, 0);
    assert.equal(fault.attempts, 3);
    assert.deepEqual(fault.completed_seqs, []);
    assert.equal(fault.reason, 'Retries exhausted for seq 0: 3 attempts (limit 2 retries), last fault: jam');
    assert.equal(fault.timestamp, '2026-01-01T00:00:00.000Z');
    assert.deepEqual(fault.recovery_options.map((o) => o.action), [
        'inspect_device',
        'resume_from_checkpoint',
        'escalate_to_human',
    ]);
});

test('duplicate and late messages are ignored', () => {
    const m = started();
    m.handle({ type: 'ack', seq: 0 });
    assert.equal(m.handle({ type: 'ack', seq: 0 }).ignored, 'duplicate ack for seq 0');
    assert.equal(m.handle({ type: 'fault', seq: 0, reason: 'late' }).ignored, 'late fault for acknowledged seq 0');
    assert.equal(m.status, 'Running');
});

test('an ack ahead of the outstanding command is a protocol violation', () => {
    const m = started();
    const effects = m.handle({ type: 'ack', seq: 1 }).effects;
    assert.equal(m.status, 'Faulted');
    const fault = m.fault;
    assert.ok(fault);
    assert.deepEqual(effects, [{ type: 'cancel_timers' }, { type: 'finished', status: 'Faulted', fault }]);
    assert.equal(fault.code, 'OUT_OF_ORDER_ACK');
    assert.equal(fault.fault_kind, 'ProtocolViolation');
    assert.equal(fault.reason, 'ack for seq 1 arrived while seq 0 is outstanding');
    assert.equal(fault.recovery_options[0].action, 'verify_protocol_peer');
    assert.equal(m.snapshot().commands[0].status, 'Failed');
});

test('an ack for a sequence number outside the stream is a protocol violation', () => {
    const m = started();
    m.handle({ type: 'ack', seq: 7 });
    assert.equal(m.fault?.code, 'UNKNOWN_SEQUENCE');
    assert.equal(m.fault?.reason, 'ack references unknown seq 7');
});

/* -------------------------------------------------------------------------- */
/* Pause, resume, abort                                                       */
/* -------------------------------------------------------------------------- */

test('pause holds the next dispatch until resume', () => {
    const m = started();
    assert.deepEqual(m.handle({ type: 'pause' }).effects, []);
    assert.equal(m.status, 'Paused');

    // The command in flight still completes.
    assert.deepEqual(m.handle({ type: 'ack', seq: 0 }).effects.map((e) => e.type), ['cancel_timers', 'record_outcome']);
    assert.deepEqual(m.handle({ type: 'resume' }).effects, [{ type: 'dispatch', command: commands[1], attempt: 1 }]);
});

test('pausing during a retry wait checks status again on resume', () => {
    const m = started();
    m.handle({ type: 'fault', seq: 0, reason: 'jam' });
    assert.deepEqual(m.handle({ type: 'pause' }).effects, [{ type: 'cancel_timers' }]);
    assert.equal(m.handle({ type: 'status', seq: 0, completed: false }).ignored, 'status for seq 0 no longer needed');

    assert.deepEqual(m.handle({ type: 'resume' }).effects, [
        { type: 'cancel_timers' },
        { type: 'verify_then_retry', seq: 0, retryNumber: 1, delayMs: 0 },
    ]);
});

test('resends after resume count against the retry bound', () => {
    const m = started({ policy: new RetryPolicy({ maxRetries: 1, backoffBaseMs: 1 }) });

    m.handle({ type: 'pause' });
    m.handle({ type: 'resume' });
    assert.deepEqual(m.handle({ type: 'status', seq: 0, completed: false }).effects, [
        { type: 'dispatch', command: commands[0], attempt: 2 },
    ]);

    m.handle({ type: 'pause' });
    m.handle({ type: 'resume' });
    const effects = m.handle({ type: 'status', seq: 0, completed: false }).effects;
    const fault = m.fault;
    assert.ok(fault);
    assert.deepEqual(effects, [{ type: 'cancel_timers' }, { type: 'finished', status: 'Faulted', fault }]);
    assert.equal(fault.code, 'RETRIES_EXHAUSTED');
    assert.equal(fault.attempts, 2);
    assert.equal(
        fault.reason,
        'Retries exhausted for seq 0: 2 attempts (limit 1 retries), last fault: no acknowledgement for seq 0 while it was in flight'
    );
    assert.equal(m.snapshot().commands[0].status, 'Failed');
});

test('a paused timeout followed by resume quotes the timeout when retries run out', () => {
    const m = started({ policy: new RetryPolicy({ maxRetries: 1, backoffBaseMs: 1 }) });

    m.handle({ type: 'pause' });
    m.handle({ type: 'timeout', seq: 0, attempt: 1 });
    m.handle({ type: 'resume' });
    m.handle({ type: 'status', seq: 0, completed: false });
    m.handle({ type: 'pause' });
    m.handle({ type: 'resume' });
    m.handle({ type: 'status', seq: 0, completed: false });

    assert.equal(m.status, 'Faulted');
    assert.equal(
        m.fault?.reason,
        'Retries exhausted for seq 0: 2 attempts (limit 1 retries), last fault: no acknowledgement for seq 0 attempt 1 before the deadline'
    );
});

test('pause and resume are refused in the wrong state', () => {
    const m = machine();
    assert.equal(m.handle({ type: 'pause' }).rejected, 'cannot pause a run that is Idle');
    m.handle({ type: 'start' });
    assert.equal(m.handle({ type: 'resume' }).rejected, 'cannot resume a run that is Running');
});

test('abort requests an emergency stop and finishes when it is confirmed', () => {
    const m = started();
    assert.deepEqual(m.handle({ type: 'abort', reason: 'door open' }).effects, [
        { type: 'cancel_timers' },
        { type: 'emergency_stop', reason: 'door open' },
    ]);
    assert.equal(m.status, 'Aborted');
    assert.equal(m.handle({ type: 'abort' }).ignored, 'abort already in progress');

    assert.deepEqual(m.handle({ type: 'stop_result', confirmed: true }).effects, [
        { type: 'finished', status: 'Aborted', fault: null },
    ]);
    assert.equal(m.handle({ type: 'ack', seq: 0 }).ignored, 'ack for seq 0 while Aborted');
});

test('an unconfirmed stop is reported', () => {
    const m = started();
    m.handle({ type: 'abort' });
    const effects = m.handle({ type: 'stop_result', confirmed: false, reason: 'stop refused' }).effects;
    const fault = m.fault;
    assert.ok(fault);
    assert.deepEqual(effects, [{ type: 'finished', status: 'Aborted', fault }]);
    assert.equal(fault.code, 'ABORT_UNCONFIRMED');
    assert.equal(fault.failing_seq, 0);
    assert.equal(fault.reason, 'stop refused');
    assert.ok(fault.recovery_options.some((o) => o.action === 'rehome_devices'));
});

test('without emergency stop support abort finishes at once', () => {
    const m = started({ supportsEmergencyStop: false });
    assert.deepEqual(m.handle({ type: 'abort' }).effects, [
        { type: 'cancel_timers' },
        { type: 'finished', status: 'Aborted', fault: null },
    ]);
});

test('a finished run refuses abort', () => {
    const m = machine({}, []);
    m.handle({ type: 'start' });
    assert.equal(m.handle({ type: 'abort' }).rejected, 'cannot abort a run that is Completed');
});

/* -------------------------------------------------------------------------- */
/* Recovery                                                                   */
/* -------------------------------------------------------------------------- */

test('a recovered run checks the in-flight command before resending it', () => {
    const m = machine({ resumeFrom: { index: 1, attempts: [1, 2, 0] }, policy: new RetryPolicy({ maxRetries: 1, backoffBaseMs: 1 }) });
    assert.deepEqual(m.snapshot().commands.map((c) => c.status), ['Acked', 'Sent', 'Pending']);

    assert.deepEqual(m.handle({ type: 'start' }).effects, [
        { type: 'verify_then_retry', seq: 1, retryNumber: 0, delayMs: 0 },
    ]);
    assert.deepEqual(m.handle({ type: 'status', seq: 1, completed: false }).effects, [
        { type: 'dispatch', command: commands[1], attempt: 3 },
    ]);

    // Attempts made before recovery do not count against the bound.
    assert.equal(m.handle({ type: 'fault', seq: 1, reason: 'jam' }).effects[2].type, 'verify_then_retry');
    m.handle({ type: 'status', seq: 1, completed: false });
    m.handle({ type: 'fault', seq: 1, reason: 'jam' });
    assert.equal(m.status, 'Faulted');
    assert.equal(m.fault?.attempts, 4);
    assert.deepEqual(m.fault?.completed_seqs, [0]);
});

test('a run recovered past its last command completes on start', () => {
    const m = machine({ resumeFrom: { index: 3, attempts: [1, 1, 1] } });
    assert.deepEqual(m.handle({ type: 'start' }).effects, [{ type: 'finished', status: 'Completed', fault: null }]);
});
