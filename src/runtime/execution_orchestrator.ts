/**
 * Execution Orchestrator
 *
 * Owns at most one active run per controller connection and carries out the
 * effects produced by RunStateMachine:
 *
 *   dispatch           -> journal attempt, arm ack deadline (plus the command's own
 *                         duration), controller.dispatch
 *   verify_then_retry  -> backoff, controller.queryStatus, status event
 *   emergency_stop     -> controller.emergencyStop raced against the abort wait
 *   record_outcome     -> journal entry (+ periodic compaction)
 *   finished           -> journal the ending, release the run, resolve RunHandle.finished
 *
 * Effects are applied strictly in order. Controller callbacks that arrive
 * while effects are being applied are fed to the machine immediately, but
 * their effects queue behind the ones already pending. Listener
 * notifications are emitted only after the queue is drained.
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import type { Command, CommandStream } from '../compiler/types';
import { JOURNAL, TIMEOUTS } from '../config';
import { clearCorrelation, createLogger, setCorrelation } from '../logger';
import { ErrorCode, FaultReport, Result, RunStatus } from '../structured_error';
import { AckTracker, deadlineFor } from './ack_tracker';
import { CommandJournal, JournalError, RebuiltRun } from './journal';
import { RetryPolicy } from './retry_policy';
import { RunEffect, RunEvent, RunStateMachine, RunStateMachineOptions, Transition, numberingProblem } from './run_state_machine';
import { ControllerEvent, HardwareController, RunSnapshot } from './types';

const log = createLogger('orchestrator');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface OrchestratorOptions {
    journal?: CommandJournal;
    policy?: RetryPolicy;
    ackTimeoutMs?: number;
    abortWaitMs?: number;
    statusTimeoutMs?: number;
    /** Compact the journal after this many acknowledgements; 0 disables */
    compactEveryAcks?: number;
    clock?: () => Date;
}

export interface RecoverOptions {
    /**
     * Resume a run that ended on a terminal fault (retries exhausted or a
     * protocol violation). Its earlier attempts no longer count against the
     * retry bound.
     */
    acknowledgeFault?: boolean;
}

export interface RunOutcome {
    runId: string;
    status: RunStatus;
    fault: FaultReport | null;
}

export interface DispatchNotice {
    runId: string;
    seq: number;
    attempt: number;
    command: Command;
}

export interface OutcomeNotice {
    runId: string;
    seq: number;
    attempt: number;
    outcome: 'ack' | 'fault' | 'timeout' | 'recovered';
    reason: string | null;
}

type Notice =
    | { event: 'dispatch'; payload: DispatchNotice }
    | { event: 'outcome'; payload: OutcomeNotice }
    | { event: 'finished'; payload: RunOutcome };

/* -------------------------------------------------------------------------- */
/* Run handle                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * The active run. Created by the orchestrator; callers observe it through
 * `snapshot()` and await `finished`.
 */
export class RunHandle {
    readonly finished: Promise<RunOutcome>;

    /** @internal */
    readonly machine: RunStateMachine;
    /** @internal */
    readonly tracker: AckTracker;
    /** @internal */
    retryTimer: ReturnType<typeof setTimeout> | null = null;
    /** Bumped whenever pending retries are cancelled, so late status replies are dropped */
    retryGeneration = 0;
    acksSinceCompact = 0;
    unsubscribe: () => void = () => undefined;

    private resolveFinished: (outcome: RunOutcome) => void = () => undefined;

    constructor(readonly stream: CommandStream, machine: RunStateMachine, tracker: AckTracker) {
        this.machine = machine;
        this.tracker = tracker;
        this.finished = new Promise<RunOutcome>((resolve) => {
            this.resolveFinished = resolve;
        });
    }

    get runId(): string {
        return this.machine.runId;
    }

    get status(): RunStatus {
        return this.machine.status;
    }

    snapshot(): RunSnapshot {
        return this.machine.snapshot();
    }

    /** @internal */
    settle(outcome: RunOutcome): void {
        this.resolveFinished(outcome);
    }
}

/* -------------------------------------------------------------------------- */
/* Orchestrator                                                               */
/* -------------------------------------------------------------------------- */

export class ExecutionOrchestrator extends EventEmitter {
    readonly journal: CommandJournal;

    private readonly policy: RetryPolicy;
    private readonly ackTimeoutMs: number;
    private readonly abortWaitMs: number;
    private readonly statusTimeoutMs: number;
    private readonly compactEveryAcks: number;
    private readonly clock: () => Date;

    private active: RunHandle | null = null;
    private last: RunHandle | null = null;
    private readonly effects: RunEffect[] = [];
    private readonly outbox: Notice[] = [];
    private draining = false;

    constructor(private readonly controller: HardwareController, options: OrchestratorOptions = {}) {
        super();
        this.journal = options.journal ?? new CommandJournal({ clock: options.clock });
        this.policy = options.policy ?? new RetryPolicy();
        this.ackTimeoutMs = options.ackTimeoutMs ?? TIMEOUTS.ACK_MS;
        this.abortWaitMs = options.abortWaitMs ?? TIMEOUTS.ABORT_WAIT_MS;
        this.statusTimeoutMs = options.statusTimeoutMs ?? TIMEOUTS.STATUS_QUERY_MS;
        this.compactEveryAcks = options.compactEveryAcks ?? JOURNAL.COMPACT_EVERY_ACKS;
        this.clock = options.clock ?? (() => new Date());
    }

    get activeRun(): RunHandle | null {
        return this.active;
    }

    /* ------------------------------------------------------------------------ */
    /* Run lifecycle                                                            */
    /* ------------------------------------------------------------------------ */

    start(stream: CommandStream): Result<RunHandle> {
        if (this.active) {
            return { ok: false, error: 'RUN_CONFLICT', message: `Run ${this.active.runId} is still ${this.active.status}` };
        }

        const problem = numberingProblem(stream.commands);
        if (problem) return { ok: false, error: 'UNKNOWN_SEQUENCE', message: `Stream rejected: ${problem}` };

        const runId = randomUUID();
        this.journal.beginRun(runId, stream);
        log.info('Starting run', { runId, commands: stream.commands.length, digest: stream.digest });

        return { ok: true, value: this.launch(runId, stream, new RunStateMachine(runId, stream.commands, this.machineOptions())) };
    }

    /**
     * Resume a journaled run after a transient fault. The in-flight command,
     * if any, is checked against the controller's status before it is sent
     * again. A run that ended on its own fault is only resumed with
     * `acknowledgeFault`.
     */
    recover(stream: CommandStream, runId: string, options: RecoverOptions = {}): Result<RunHandle> {
        if (this.active) {
            return { ok: false, error: 'RUN_CONFLICT', message: `Run ${this.active.runId} is still ${this.active.status}` };
        }

        const problem = numberingProblem(stream.commands);
        if (problem) return { ok: false, error: 'UNKNOWN_SEQUENCE', message: `Stream rejected: ${problem}` };

        const record = this.journal.run(runId);
        if (!record) {
            return { ok: false, error: 'JOURNAL_MISMATCH', message: `No journal for run ${runId}` };
        }
        if (record.streamDigest !== stream.digest) {
            return {
                ok: false,
                error: 'JOURNAL_MISMATCH',
                message: `Run ${runId} was journaled for stream ${record.streamDigest}, not ${stream.digest}`,
            };
        }

        let rebuilt: RebuiltRun;
        try {
            rebuilt = this.journal.rebuild(runId, stream.commands.length);
        } catch (e) {
            if (e instanceof JournalError) return { ok: false, error: e.code, message: e.message };
            throw e;
        }
        if (rebuilt.stopped) {
            return { ok: false, error: 'INVALID_STATE', message: `Run ${runId} was aborted and cannot be resumed` };
        }
        const ended = rebuilt.finished;
        if (ended && ended.status === 'Completed') {
            return { ok: false, error: 'INVALID_STATE', message: `Run ${runId} already completed` };
        }
        if (ended && ended.code !== null) {
            if (!options.acknowledgeFault) {
                return {
                    ok: false,
                    error: 'INVALID_STATE',
                    message: `Run ${runId} ended ${ended.status} with ${ended.code}; recover with acknowledgeFault to retry seq ${rebuilt.index}`,
                };
            }
            log.warn('Recovering a run that ended on a fault', { runId, code: ended.code, seq: rebuilt.index });
        }

        log.info('Recovering run', { runId, index: rebuilt.index, inFlight: rebuilt.inFlight });
        const machine = new RunStateMachine(runId, stream.commands, {
            ...this.machineOptions(),
            resumeFrom: { index: rebuilt.index, attempts: rebuilt.attempts },
        });
        return { ok: true, value: this.launch(runId, stream, machine) };
    }

    pause(): Result<RunStatus> {
        return this.operatorEvent({ type: 'pause' });
    }

    resume(): Result<RunStatus> {
        return this.operatorEvent({ type: 'resume' });
    }

    abort(reason?: string): Result<RunStatus> {
        return this.operatorEvent({ type: 'abort', reason });
    }

    /** Snapshot of the active run, or of the most recent one once it has finished. */
    snapshot(): RunSnapshot | null {
        const run = this.active ?? this.last;
        return run ? run.snapshot() : null;
    }

    /* ------------------------------------------------------------------------ */
    /* Event intake                                                             */
    /* ------------------------------------------------------------------------ */

    private machineOptions(): RunStateMachineOptions {
        return {
            policy: this.policy,
            supportsEmergencyStop: this.controller.supportsEmergencyStop,
            clock: this.clock,
        };
    }

    private launch(runId: string, stream: CommandStream, machine: RunStateMachine): RunHandle {
        const tracker = new AckTracker(
            (seq, attempt) => this.process(run, { type: 'timeout', seq, attempt }),
            { ackTimeoutMs: this.ackTimeoutMs }
        );
        const run = new RunHandle(stream, machine, tracker);

        this.active = run;
        this.last = run;
        setCorrelation({ runId });
        run.unsubscribe = this.controller.subscribe((event) => this.onControllerEvent(run, event));

        this.process(run, { type: 'start' });
        return run;
    }

    private onControllerEvent(run: RunHandle, event: ControllerEvent): void {
        if (event.runId !== run.runId || this.active !== run) {
            log.debug('Ignoring controller event for another run', { runId: event.runId, seq: event.seq });
            return;
        }
        if (event.type === 'ack') {
            this.process(run, { type: 'ack', seq: event.seq });
        } else {
            this.process(run, { type: 'fault', seq: event.seq, reason: event.reason, code: 'DEVICE_FAULT' });
        }
    }

    private operatorEvent(event: RunEvent): Result<RunStatus> {
        const run = this.active;
        if (!run) return { ok: false, error: 'INVALID_STATE', message: 'No active run' };

        const transition = this.process(run, event);
        if (transition.rejected) {
            return { ok: false, error: 'INVALID_STATE', message: transition.rejected };
        }
        log.info(`Operator ${event.type}`, { runId: run.runId, status: run.status });
        return { ok: true, value: run.status };
    }

    private process(run: RunHandle, event: RunEvent): Transition {
        const transition = run.machine.handle(event);
        if (transition.ignored) {
            log.debug('Event ignored', { type: event.type, reason: transition.ignored });
        }
        this.effects.push(...transition.effects);
        this.drain(run);
        return transition;
    }

    private drain(run: RunHandle): void {
        if (this.draining) return;
        this.draining = true;
        try {
            let effect = this.effects.shift();
            while (effect) {
                this.apply(run, effect);
                effect = this.effects.shift();
            }
        } finally {
            this.draining = false;
        }

        const notices = this.outbox.splice(0);
        for (const notice of notices) {
            this.emit(notice.event, notice.payload);
        }
    }

    /* ------------------------------------------------------------------------ */
    /* Effects                                                                  */
    /* ------------------------------------------------------------------------ */

    private apply(run: RunHandle, effect: RunEffect): void {
        switch (effect.type) {
            case 'dispatch':
                this.dispatch(run, effect.command, effect.attempt);
                return;
            case 'cancel_timers':
                this.cancelTimers(run);
                return;
            case 'verify_then_retry':
                this.scheduleRetry(run, effect.seq, effect.delayMs);
                return;
            case 'emergency_stop':
                this.emergencyStop(run, effect.reason);
                return;
            case 'record_outcome':
                this.recordOutcome(run, effect.seq, effect.attempt, effect.outcome, effect.reason, effect.code);
                return;
            case 'finished':
                this.finish(run, effect.status, effect.fault);
                return;
        }
    }

    private dispatch(run: RunHandle, command: Command, attempt: number): void {
        const runId = run.runId;
        this.journal.append({
            runId,
            seq: command.seq,
            attempt,
            kind: 'dispatch',
            command,
            reason: null,
            code: null,
        });
        run.tracker.arm(command.seq, attempt, deadlineFor(command, this.ackTimeoutMs));
        setCorrelation({ seq: command.seq, attempt, device: command.device });
        log.debug('Dispatching', { seq: command.seq, attempt, opcode: command.opcode });
        this.outbox.push({ event: 'dispatch', payload: { runId, seq: command.seq, attempt, command } });

        void this.controller.dispatch(command, { runId, attempt }).catch((e: unknown) => {
            const reason = e instanceof Error ? e.message : String(e);
            if (this.active !== run || run.machine.attemptsFor(command.seq) !== attempt) {
                log.debug('Stale dispatch rejection', { seq: command.seq, attempt, reason });
                return;
            }
            this.process(run, { type: 'fault', seq: command.seq, reason, code: 'DISPATCH_REJECTED' });
        });
    }

    private cancelTimers(run: RunHandle): void {
        run.tracker.cancelAll();
        run.retryGeneration++;
        if (run.retryTimer) {
            clearTimeout(run.retryTimer);
            run.retryTimer = null;
        }
    }

    private scheduleRetry(run: RunHandle, seq: number, delayMs: number): void {
        const generation = run.retryGeneration;
        const command = run.stream.commands[seq];
        log.info('Verifying before retry', { seq, delayMs });

        run.retryTimer = setTimeout(() => {
            run.retryTimer = null;
            void this.isCompleted(run, command).then((completed) => {
                if (generation !== run.retryGeneration || this.active !== run) return;
                this.process(run, { type: 'status', seq, completed });
            }, (e: unknown) => {
                log.error('Status check failed unexpectedly', { seq, error: e instanceof Error ? e.message : String(e) });
            });
        }, delayMs);
    }

    /** True when the controller reports `command` as already completed for this run. */
    private async isCompleted(run: RunHandle, command: Command): Promise<boolean> {
        try {
            const status = await withTimeout(
                this.controller.queryStatus(command.device),
                this.statusTimeoutMs,
                `status query for ${command.device}`
            );
            return status.runId === run.runId
                && status.lastCompletedSeq !== null
                && status.lastCompletedSeq >= command.seq;
        } catch (e) {
            // The controller ignores a repeated seq it already completed, so resending is safe.
            log.warn('Status query failed; resending', {
                seq: command.seq,
                device: command.device,
                error: e instanceof Error ? e.message : String(e),
            });
            return false;
        }
    }

    private emergencyStop(run: RunHandle, reason: string): void {
        this.journal.append({
            runId: run.runId,
            seq: null,
            attempt: null,
            kind: 'stop',
            command: null,
            reason,
            code: null,
        });
        log.warn('Emergency stop requested', { runId: run.runId, reason });

        void withTimeout(this.controller.emergencyStop(), this.abortWaitMs, 'emergency stop').then(
            () => this.process(run, { type: 'stop_result', confirmed: true }),
            (e: unknown) => this.process(run, {
                type: 'stop_result',
                confirmed: false,
                reason: e instanceof Error ? e.message : String(e),
            })
        );
    }

    private recordOutcome(
        run: RunHandle,
        seq: number,
        attempt: number,
        outcome: OutcomeNotice['outcome'],
        reason: string | null,
        code: ErrorCode | null
    ): void {
        const runId = run.runId;
        this.journal.append({ runId, seq, attempt, kind: outcome, command: null, reason, code });
        this.outbox.push({ event: 'outcome', payload: { runId, seq, attempt, outcome, reason } });

        if (outcome === 'fault' || outcome === 'timeout') {
            log.warn('Command failed', { seq, attempt, code, reason });
            return;
        }
        run.acksSinceCompact++;
        if (this.compactEveryAcks > 0 && run.acksSinceCompact >= this.compactEveryAcks) {
            run.acksSinceCompact = 0;
            this.journal.compact(runId);
        }
    }

    private finish(run: RunHandle, status: RunStatus, fault: FaultReport | null): void {
        this.journal.append({
            runId: run.runId,
            seq: null,
            attempt: null,
            kind: 'finished',
            command: null,
            reason: status,
            code: fault ? fault.code : null,
        });
        this.cancelTimers(run);
        run.tracker.dispose();
        run.unsubscribe();
        if (this.active === run) this.active = null;

        if (fault) {
            log.error('Run ended with fault', { status, code: fault.code, failingSeq: fault.failing_seq, reason: fault.reason });
        } else {
            log.info('Run finished', { status });
        }
        clearCorrelation();

        const outcome: RunOutcome = { runId: run.runId, status, fault };
        this.outbox.push({ event: 'finished', payload: outcome });
        run.settle(outcome);
    }
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
        promise.then(
            (value) => {
                clearTimeout(timer);
                resolve(value);
            },
            (e: unknown) => {
                clearTimeout(timer);
                reject(e);
            }
        );
    });
}
