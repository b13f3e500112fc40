/**
 * Run-time data model: hardware controller contract, run state and journal
 * records.
 */

import type { Command } from '../compiler/types';
import type { ErrorCode, FaultReport, RunStatus } from '../structured_error';

/* -------------------------------------------------------------------------- */
/* Hardware controller                                                        */
/* -------------------------------------------------------------------------- */

export type DeviceState = 'idle' | 'busy' | 'error' | 'offline';

export interface DeviceStatus {
    device: string;
    state: DeviceState;
    /** Run the controller last completed a command for */
    runId: string | null;
    /** Highest sequence number the controller has completed for `runId` */
    lastCompletedSeq: number | null;
    detail?: string;
}

export interface DispatchContext {
    runId: string;
    /** 1-based attempt number for this sequence number */
    attempt: number;
}

/** Asynchronous outcome reported by the controller after a dispatch. */
export type ControllerEvent =
    | { type: 'ack'; runId: string; seq: number }
    | { type: 'fault'; runId: string; seq: number; reason: string };

export type ControllerListener = (event: ControllerEvent) => void;

/**
 * Unreliable request/acknowledgement peer. Messages may be delayed, lost or
 * duplicated but are never reordered for the same device. A duplicate
 * dispatch of an already-completed sequence number must be harmless.
 */
export interface HardwareController {
    /** Resolves once the command is accepted; rejects if it is refused outright */
    dispatch(command: Command, context: DispatchContext): Promise<void>;
    queryStatus(deviceId: string): Promise<DeviceStatus>;
    /** Resolves when the controller confirms the safe state */
    emergencyStop(): Promise<void>;
    readonly supportsEmergencyStop: boolean;
    /** Subscribe to acks and faults; returns the unsubscribe function */
    subscribe(listener: ControllerListener): () => void;
}

/* -------------------------------------------------------------------------- */
/* Run state                                                                  */
/* -------------------------------------------------------------------------- */

export type CommandStatus = 'Pending' | 'Sent' | 'Acked' | 'Failed';

/** What the run is currently waiting for. */
export type Awaiting = 'none' | 'ack' | 'retry' | 'stop';

export interface RunState {
    readonly runId: string;
    status: RunStatus;
    /** Index of the first command not yet acknowledged */
    index: number;
    readonly commands: readonly Command[];
    readonly statuses: CommandStatus[];
    readonly attempts: number[];
    faultCount: number;
    awaiting: Awaiting;
    fault: FaultReport | null;
}

export interface CommandProgress {
    seq: number;
    opcode: string;
    device: string;
    status: CommandStatus;
    attempts: number;
}

/** Read-only projection of RunState for the gateway. */
export interface RunSnapshot {
    run_id: string;
    status: RunStatus;
    current_index: number;
    total_commands: number;
    acked: number;
    fault_count: number;
    commands: CommandProgress[];
    fault: FaultReport | null;
}

/* -------------------------------------------------------------------------- */
/* Journal                                                                    */
/* -------------------------------------------------------------------------- */

export type JournalEntryKind = 'dispatch' | 'ack' | 'fault' | 'timeout' | 'recovered' | 'stop' | 'finished';

export interface JournalEntry {
    /** Position in the journal, assigned on append */
    entryNo: number;
    runId: string;
    seq: number | null;
    attempt: number | null;
    kind: JournalEntryKind;
    /** Present on dispatch entries */
    command: Command | null;
    timestamp: string;
    /** Failure reason; the final run status on `finished` entries */
    reason: string | null;
    code: ErrorCode | null;
}

export type NewJournalEntry = Omit<JournalEntry, 'entryNo' | 'timestamp'> & { timestamp?: string };
