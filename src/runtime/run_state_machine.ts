/**
 * Run State Machine
 *
 *   Idle --start--> Running --> Completed | Faulted | Aborted
 *   Running <--pause/resume--> Paused
 *
 * Pure: `handle(event)` updates RunState and returns the effects the
 * orchestrator must carry out (dispatch, timers, status checks, emergency
 * stop, journal records). No I/O and no timers live here, so every path can
 * be driven directly from tests.
 *
 * Only one command is ever outstanding. Command i+1 is dispatched only after
 * command i is acknowledged (or verified complete through the controller's
 * status), so acknowledgements for any device must arrive in stream order.
 */

import type { Command } from '../compiler/types';
import { ErrorCode, FaultReport, RunStatus, createFaultReport } from '../structured_error';
import { RetryPolicy } from './retry_policy';
import { CommandStatus, RunSnapshot, RunState } from './types';

/* -------------------------------------------------------------------------- */
/* Events and effects                                                         */
/* -------------------------------------------------------------------------- */

export type RunEvent =
    | { type: 'start' }
    | { type: 'ack'; seq: number }
    | { type: 'fault'; seq: number; reason: string; code?: ErrorCode }
    | { type: 'timeout'; seq: number; attempt: number }
    /** Result of the status check that precedes every retry */
    | { type: 'status'; seq: number; completed: boolean }
    | { type: 'pause' }
    | { type: 'resume' }
    | { type: 'abort'; reason?: string }
    | { type: 'stop_result'; confirmed: boolean; reason?: string };

export type OutcomeKind = 'ack' | 'fault' | 'timeout' | 'recovered';

export type RunEffect =
    | { type: 'dispatch'; command: Command; attempt: number }
    /** Cancel the ack deadline and any pending retry */
    | { type: 'cancel_timers' }
    /** Wait `delayMs`, ask the controller whether `seq` already completed, report back with a status event */
    | { type: 'verify_then_retry'; seq: number; retryNumber: number; delayMs: number }
    | { type: 'emergency_stop'; reason: string }
    | { type: 'record_outcome'; seq: number; attempt: number; outcome: OutcomeKind; reason: string | null; code: ErrorCode | null }
    | { type: 'finished'; status: RunStatus; fault: FaultReport | null };

export interface Transition {
    effects: RunEffect[];
    /** Why the event was refused in the current state; null when accepted */
    rejected: string | null;
    /** Why an accepted event had no effect (duplicate or stale message) */
    ignored: string | null;
}

/** Progress carried over from a journal when a run is recovered. */
export interface ResumePoint {
    index: number;
    attempts: number[];
}

export interface RunStateMachineOptions {
    policy?: RetryPolicy;
    supportsEmergencyStop?: boolean;
    resumeFrom?: ResumePoint;
    clock?: () => Date;
}

const TERMINAL: ReadonlySet<RunStatus> = new Set(['Completed', 'Faulted', 'Aborted']);

/** Why `commands` cannot be run as a stream (seqs must be 0..n-1 in order), or null. */
export function numberingProblem(commands: readonly Command[]): string | null {
    const at = commands.findIndex((c, i) => c.seq !== i);
    if (at < 0) return null;
    return `command ${at} carries seq ${commands[at].seq}; a stream is numbered 0..${commands.length - 1} in order`;
}

/* -------------------------------------------------------------------------- */
/* Machine                                                                    */
/* -------------------------------------------------------------------------- */

export class RunStateMachine {
    private readonly state: RunState;
    private readonly policy: RetryPolicy;
    private readonly supportsEmergencyStop: boolean;
    private readonly clock: () => Date;
    /** Attempts made before recovery; they do not count against the retry bound */
    private readonly retryBase: number[];
    /** Last failure of the current command, quoted when retries run out */
    private lastFailure: { code: ErrorCode; reason: string } | null = null;

    constructor(runId: string, commands: readonly Command[], options: RunStateMachineOptions = {}) {
        this.policy = options.policy ?? new RetryPolicy();
        this.supportsEmergencyStop = options.supportsEmergencyStop ?? true;
        this.clock = options.clock ?? (() => new Date());

        const resume = options.resumeFrom;
        const index = resume ? Math.min(Math.max(0, resume.index), commands.length) : 0;
        const attempts = commands.map((_, i) => (resume ? resume.attempts[i] ?? 0 : 0));
        const statuses: CommandStatus[] = commands.map((_, i) => {
            if (i < index) return 'Acked';
            if (i === index && attempts[i] > 0) return 'Sent';
            return 'Pending';
        });

        this.retryBase = attempts.slice();
        this.state = {
            runId,
            status: 'Idle',
            index,
            commands,
            statuses,
            attempts,
            faultCount: 0,
            awaiting: 'none',
            fault: null,
        };
    }

    get runId(): string {
        return this.state.runId;
    }

    get status(): RunStatus {
        return this.state.status;
    }

    get index(): number {
        return this.state.index;
    }

    get isTerminal(): boolean {
        return TERMINAL.has(this.state.status);
    }

    get fault(): FaultReport | null {
        return this.state.fault;
    }

    attemptsFor(seq: number): number {
        return this.state.attempts[seq] ?? 0;
    }

    snapshot(): RunSnapshot {
        const s = this.state;
        return {
            run_id: s.runId,
            status: s.status,
            current_index: s.index,
            total_commands: s.commands.length,
            acked: s.statuses.filter((st) => st === 'Acked').length,
            fault_count: s.faultCount,
            commands: s.commands.map((c, i) => ({
                seq: c.seq,
                opcode: c.opcode,
                device: c.device,
                status: s.statuses[i],
                attempts: s.attempts[i],
            })),
            fault: s.fault,
        };
    }

    handle(event: RunEvent): Transition {
        switch (event.type) {
            case 'start':
                return this.onStart();
            case 'ack':
                return this.onAck(event.seq);
            case 'fault':
                return this.onFault(event.seq, event.reason, event.code ?? 'DEVICE_FAULT', 'fault');
            case 'timeout':
                return this.onTimeout(event.seq, event.attempt);
            case 'status':
                return this.onStatus(event.seq, event.completed);
            case 'pause':
                return this.onPause();
            case 'resume':
                return this.onResume();
            case 'abort':
                return this.onAbort(event.reason ?? 'operator abort');
            case 'stop_result':
                return this.onStopResult(event.confirmed, event.reason);
        }
    }

    /* ------------------------------------------------------------------------ */
    /* Handlers                                                                 */
    /* ------------------------------------------------------------------------ */

    private onStart(): Transition {
        const s = this.state;
        if (s.status !== 'Idle') return rejected(`cannot start a run that is ${s.status}`);
        const problem = numberingProblem(s.commands);
        if (problem) return rejected(problem);

        s.status = 'Running';
        if (s.index >= s.commands.length) {
            return accepted(this.complete());
        }
        if (s.statuses[s.index] === 'Sent') {
            // Recovered with this command in flight: check before sending it again.
            s.awaiting = 'retry';
            return accepted([{ type: 'verify_then_retry', seq: s.index, retryNumber: 0, delayMs: 0 }]);
        }
        return accepted(this.dispatchCurrent());
    }

    private onAck(seq: number): Transition {
        const s = this.state;
        if (s.status === 'Idle' || this.isTerminal) return ignored(`ack for seq ${seq} while ${s.status}`);
        if (!this.isKnownSeq(seq)) return this.violation('UNKNOWN_SEQUENCE', `ack references unknown seq ${seq}`);
        if (seq < s.index) return ignored(`duplicate ack for seq ${seq}`);
        if (seq > s.index) {
            return this.violation('OUT_OF_ORDER_ACK', `ack for seq ${seq} arrived while seq ${s.index} is outstanding`);
        }
        if (s.statuses[seq] === 'Pending') {
            return this.violation('OUT_OF_ORDER_ACK', `ack for seq ${seq}, which was never dispatched`);
        }

        const effects: RunEffect[] = [
            { type: 'cancel_timers' },
            { type: 'record_outcome', seq, attempt: s.attempts[seq], outcome: 'ack', reason: null, code: null },
        ];
        return accepted(effects.concat(this.advance()));
    }

    private onTimeout(seq: number, attempt: number): Transition {
        const s = this.state;
        if (seq !== s.index || s.statuses[seq] !== 'Sent' || attempt !== s.attempts[seq] || this.isTerminal) {
            return ignored(`stale deadline for seq ${seq} attempt ${attempt}`);
        }
        return this.onFault(seq, `no acknowledgement for seq ${seq} attempt ${attempt} before the deadline`, 'ACK_TIMEOUT', 'timeout');
    }

    private onFault(seq: number, reason: string, code: ErrorCode, outcome: OutcomeKind): Transition {
        const s = this.state;
        if (s.status === 'Idle' || this.isTerminal) return ignored(`fault for seq ${seq} while ${s.status}`);
        if (!this.isKnownSeq(seq)) return this.violation('UNKNOWN_SEQUENCE', `fault references unknown seq ${seq}`);
        if (seq < s.index) return ignored(`late fault for acknowledged seq ${seq}`);
        if (seq > s.index) {
            return this.violation('OUT_OF_ORDER_ACK', `fault for seq ${seq} arrived while seq ${s.index} is outstanding`);
        }
        if (s.statuses[seq] !== 'Sent') return ignored(`duplicate fault for seq ${seq}`);

        s.faultCount++;
        s.statuses[seq] = 'Failed';
        this.lastFailure = { code, reason };
        const effects: RunEffect[] = [
            { type: 'cancel_timers' },
            { type: 'record_outcome', seq, attempt: s.attempts[seq], outcome, reason, code },
        ];

        const decision = this.policy.evaluate({
            seq,
            attempts: s.attempts[seq] - this.retryBase[seq],
            code,
            reason,
        });

        if (decision.decision === 'ESCALATE') {
            s.status = 'Faulted';
            s.awaiting = 'none';
            s.fault = this.report('RETRIES_EXHAUSTED', seq, decision.reasoning);
            effects.push({ type: 'finished', status: 'Faulted', fault: s.fault });
            return accepted(effects);
        }

        if (s.status === 'Running') {
            s.awaiting = 'retry';
            effects.push({ type: 'verify_then_retry', seq, retryNumber: decision.retryNumber, delayMs: decision.delayMs });
        } else {
            // Paused: resume picks the retry up.
            s.awaiting = 'none';
        }
        return accepted(effects);
    }

    private onStatus(seq: number, completed: boolean): Transition {
        const s = this.state;
        if (s.status !== 'Running' || s.awaiting !== 'retry' || seq !== s.index) {
            return ignored(`status for seq ${seq} no longer needed`);
        }

        if (completed) {
            const effects: RunEffect[] = [
                { type: 'cancel_timers' },
                {
                    type: 'record_outcome',
                    seq,
                    attempt: s.attempts[seq],
                    outcome: 'recovered',
                    reason: 'controller reports the command completed; its acknowledgement was lost',
                    code: null,
                },
            ];
            return accepted(effects.concat(this.advance()));
        }

        // Every resend, including one after resume, is bounded by the policy.
        const failure: { code: ErrorCode; reason: string } = this.lastFailure ?? {
            code: 'ACK_TIMEOUT',
            reason: `no acknowledgement for seq ${seq} while it was in flight`,
        };
        const decision = this.policy.evaluate({
            seq,
            attempts: s.attempts[seq] - this.retryBase[seq],
            code: failure.code,
            reason: failure.reason,
        });
        if (decision.decision === 'ESCALATE') {
            s.status = 'Faulted';
            s.awaiting = 'none';
            s.statuses[seq] = 'Failed';
            s.fault = this.report('RETRIES_EXHAUSTED', seq, decision.reasoning);
            return accepted([
                { type: 'cancel_timers' },
                { type: 'finished', status: 'Faulted', fault: s.fault },
            ]);
        }
        return accepted(this.dispatchCurrent());
    }

    private onPause(): Transition {
        const s = this.state;
        if (s.status !== 'Running') return rejected(`cannot pause a run that is ${s.status}`);

        s.status = 'Paused';
        if (s.awaiting === 'retry') {
            s.awaiting = 'none';
            return accepted([{ type: 'cancel_timers' }]);
        }
        return accepted([]);
    }

    private onResume(): Transition {
        const s = this.state;
        if (s.status !== 'Paused') return rejected(`cannot resume a run that is ${s.status}`);

        s.status = 'Running';
        const current = s.statuses[s.index];
        if (current === 'Pending') return accepted(this.dispatchCurrent());

        // In flight without an observed ack, or waiting for a retry.
        s.awaiting = 'retry';
        return accepted([
            { type: 'cancel_timers' },
            { type: 'verify_then_retry', seq: s.index, retryNumber: s.attempts[s.index], delayMs: 0 },
        ]);
    }

    private onAbort(reason: string): Transition {
        const s = this.state;
        if (s.status === 'Aborted') return ignored('abort already in progress');
        if (s.status !== 'Running' && s.status !== 'Paused') return rejected(`cannot abort a run that is ${s.status}`);

        s.status = 'Aborted';
        const effects: RunEffect[] = [{ type: 'cancel_timers' }];
        if (this.supportsEmergencyStop) {
            s.awaiting = 'stop';
            effects.push({ type: 'emergency_stop', reason });
        } else {
            s.awaiting = 'none';
            effects.push({ type: 'finished', status: 'Aborted', fault: null });
        }
        return accepted(effects);
    }

    private onStopResult(confirmed: boolean, reason: string | undefined): Transition {
        const s = this.state;
        if (s.awaiting !== 'stop') return ignored('no emergency stop outstanding');

        s.awaiting = 'none';
        if (confirmed) {
            return accepted([{ type: 'finished', status: 'Aborted', fault: null }]);
        }
        const failing = s.index < s.commands.length ? s.index : null;
        s.fault = this.report('ABORT_UNCONFIRMED', failing, reason ?? 'controller did not confirm the emergency stop');
        return accepted([{ type: 'finished', status: 'Aborted', fault: s.fault }]);
    }

    /* ------------------------------------------------------------------------ */
    /* Helpers                                                                  */
    /* ------------------------------------------------------------------------ */

    private dispatchCurrent(): RunEffect[] {
        const s = this.state;
        const seq = s.index;
        s.attempts[seq]++;
        s.statuses[seq] = 'Sent';
        s.awaiting = 'ack';
        return [{ type: 'dispatch', command: s.commands[seq], attempt: s.attempts[seq] }];
    }

    private advance(): RunEffect[] {
        const s = this.state;
        s.statuses[s.index] = 'Acked';
        s.index++;
        this.lastFailure = null;

        if (s.index >= s.commands.length) return this.complete();
        if (s.status === 'Running') return this.dispatchCurrent();

        s.awaiting = 'none';
        return [];
    }

    private complete(): RunEffect[] {
        this.state.status = 'Completed';
        this.state.awaiting = 'none';
        return [{ type: 'finished', status: 'Completed', fault: null }];
    }

    private violation(code: ErrorCode, reason: string): Transition {
        const s = this.state;
        s.status = 'Faulted';
        s.awaiting = 'none';
        if (s.index < s.commands.length && s.statuses[s.index] === 'Sent') s.statuses[s.index] = 'Failed';
        s.fault = this.report(code, s.index < s.commands.length ? s.index : null, reason);
        return accepted([
            { type: 'cancel_timers' },
            { type: 'finished', status: 'Faulted', fault: s.fault },
        ]);
    }

    private report(code: ErrorCode, failingSeq: number | null, reason: string): FaultReport {
        const s = this.state;
        return createFaultReport({
            code,
            runId: s.runId,
            runStatus: s.status,
            failingSeq,
            reason,
            completedSeqs: s.commands.filter((_, i) => s.statuses[i] === 'Acked').map((c) => c.seq),
            attempts: failingSeq === null ? 0 : s.attempts[failingSeq],
            device: failingSeq === null ? undefined : s.commands[failingSeq].device,
            now: this.clock(),
        });
    }

    private isKnownSeq(seq: number): boolean {
        return Number.isInteger(seq) && seq >= 0 && seq < this.state.commands.length;
    }
}

function accepted(effects: RunEffect[]): Transition {
    return { effects, rejected: null, ignored: null };
}

function rejected(reason: string): Transition {
    return { effects: [], rejected: reason, ignored: null };
}

function ignored(reason: string): Transition {
    return { effects: [], rejected: null, ignored: reason };
}
