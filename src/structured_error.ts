/**
 * Structured errors for compilation and execution.
 *
 * Compile-stage problems are Diagnostics returned inside results; run-time
 * problems are FaultReports surfaced to the gateway. Both are plain data so
 * they can be serialized without loss.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorKind =
    | 'SyntaxError'
    | 'SemanticError'
    | 'LoweringError'
    | 'DispatchFault'
    | 'ProtocolViolation';

export type ErrorCode =
    // Syntax
    | 'UNEXPECTED_CHARACTER'
    | 'UNTERMINATED_STRING'
    | 'INVALID_UNIT'
    | 'UNEXPECTED_TOKEN'
    | 'SOURCE_TOO_LARGE'

    // Semantic
    | 'UNKNOWN_DEVICE'
    | 'UNSUPPORTED_OPERATION'
    | 'MISSING_PARAMETER'
    | 'UNKNOWN_PARAMETER'
    | 'INVALID_PARAMETER'
    | 'OUT_OF_RANGE'
    | 'UNKNOWN_POSITION'
    | 'UNKNOWN_AXIS'
    | 'DUPLICATE_LABEL'
    | 'UNKNOWN_LABEL'
    | 'ORDERING_CYCLE'
    | 'TOO_MANY_ERRORS'

    // Lowering
    | 'NO_LOWERING_RULE'
    | 'ENVELOPE_VIOLATION'
    | 'REGISTRY_MISMATCH'

    // Dispatch
    | 'DEVICE_FAULT'
    | 'ACK_TIMEOUT'
    | 'RETRIES_EXHAUSTED'
    | 'DISPATCH_REJECTED'
    | 'ABORT_UNCONFIRMED'

    // Protocol
    | 'UNKNOWN_SEQUENCE'
    | 'OUT_OF_ORDER_ACK'

    // Orchestrator
    | 'RUN_CONFLICT'
    | 'INVALID_STATE'
    | 'JOURNAL_MISMATCH';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface SourcePoint {
    line: number;
    column: number;
}

export interface Diagnostic {
    kind: ErrorKind;
    code: ErrorCode;
    message: string;
    severity: Severity;
    /** 1-based position of the offending statement or token */
    line?: number;
    column?: number;
    /** Human-readable description of the tokens that would have been accepted */
    expected?: string[];
    /** Device, label, parameter or step the problem is about */
    subject?: string;
    /** Step names participating in an ordering cycle, in cycle order */
    steps?: string[];
}

export type RecoveryAction =
    | 'resume_from_checkpoint'
    | 'rehome_devices'
    | 'inspect_device'
    | 'verify_protocol_peer'
    | 'escalate_to_human';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    risk_level: RiskLevel;
}

export type RunStatus = 'Idle' | 'Running' | 'Paused' | 'Faulted' | 'Completed' | 'Aborted';

/** Consolidated run fault surfaced to the gateway. */
export interface FaultReport {
    fault_kind: ErrorKind;
    code: ErrorCode;
    run_id: string;
    run_status: RunStatus;
    /** Sequence number of the failing command; null when the fault is not tied to one */
    failing_seq: number | null;
    reason: string;
    /** Sequence numbers of commands that were acknowledged before the fault */
    completed_seqs: number[];
    /** Dispatch attempts made for the failing command */
    attempts: number;
    recovery_options: RecoveryOption[];
    timestamp: string;
}

/**
 * Result union for operations that can be refused without throwing.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: ErrorCode; message: string };

/* -------------------------------------------------------------------------- */
/* Builders                                                                   */
/* -------------------------------------------------------------------------- */

const KIND_BY_CODE: Record<ErrorCode, ErrorKind> = {
    UNEXPECTED_CHARACTER: 'SyntaxError',
    UNTERMINATED_STRING: 'SyntaxError',
    INVALID_UNIT: 'SyntaxError',
    UNEXPECTED_TOKEN: 'SyntaxError',
    SOURCE_TOO_LARGE: 'SyntaxError',
    UNKNOWN_DEVICE: 'SemanticError',
    UNSUPPORTED_OPERATION: 'SemanticError',
    MISSING_PARAMETER: 'SemanticError',
    UNKNOWN_PARAMETER: 'SemanticError',
    INVALID_PARAMETER: 'SemanticError',
    OUT_OF_RANGE: 'SemanticError',
    UNKNOWN_POSITION: 'SemanticError',
    UNKNOWN_AXIS: 'SemanticError',
    DUPLICATE_LABEL: 'SemanticError',
    UNKNOWN_LABEL: 'SemanticError',
    ORDERING_CYCLE: 'SemanticError',
    TOO_MANY_ERRORS: 'SemanticError',
    NO_LOWERING_RULE: 'LoweringError',
    ENVELOPE_VIOLATION: 'LoweringError',
    REGISTRY_MISMATCH: 'LoweringError',
    DEVICE_FAULT: 'DispatchFault',
    ACK_TIMEOUT: 'DispatchFault',
    RETRIES_EXHAUSTED: 'DispatchFault',
    DISPATCH_REJECTED: 'DispatchFault',
    ABORT_UNCONFIRMED: 'DispatchFault',
    UNKNOWN_SEQUENCE: 'ProtocolViolation',
    OUT_OF_ORDER_ACK: 'ProtocolViolation',
    RUN_CONFLICT: 'DispatchFault',
    INVALID_STATE: 'DispatchFault',
    JOURNAL_MISMATCH: 'DispatchFault',
};

export function kindOf(code: ErrorCode): ErrorKind {
    return KIND_BY_CODE[code];
}

export function isErrorCode(value: unknown): value is ErrorCode {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(KIND_BY_CODE, value);
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'RETRIES_EXHAUSTED',
        'UNKNOWN_SEQUENCE',
        'OUT_OF_ORDER_ACK',
        'ABORT_UNCONFIRMED',
        'NO_LOWERING_RULE',
        'ENVELOPE_VIOLATION',
    ];

    const warningCodes: ErrorCode[] = [
        'TOO_MANY_ERRORS',
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

export function createDiagnostic(
    code: ErrorCode,
    message: string,
    details: Omit<Diagnostic, 'kind' | 'code' | 'message' | 'severity'> = {}
): Diagnostic {
    return {
        kind: kindOf(code),
        code,
        message,
        severity: getSeverity(code),
        ...details,
    };
}

/** Format a diagnostic as `line:column: Kind[CODE] message`. */
export function formatDiagnostic(d: Diagnostic): string {
    const where = d.line !== undefined ? `${d.line}:${d.column ?? 1}: ` : '';
    return `${where}${d.kind}[${d.code}] ${d.message}`;
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    resumeFromCheckpoint: (seq: number): RecoveryOption => ({
        action: 'resume_from_checkpoint',
        description: `Recover the run from its journal; commands before seq ${seq} are acknowledged`,
        risk_level: 'MEDIUM',
    }),

    rehomeDevices: (): RecoveryOption => ({
        action: 'rehome_devices',
        description: 'Re-home moving devices before any further motion; axis positions are unknown',
        risk_level: 'LOW',
    }),

    inspectDevice: (device: string): RecoveryOption => ({
        action: 'inspect_device',
        description: `Inspect ${device} and confirm its physical state`,
        risk_level: 'LOW',
    }),

    verifyProtocolPeer: (): RecoveryOption => ({
        action: 'verify_protocol_peer',
        description: 'Acknowledgement stream is inconsistent; verify controller firmware and connection',
        risk_level: 'HIGH',
    }),

    escalateToHuman: (reason: string): RecoveryOption => ({
        action: 'escalate_to_human',
        description: `Escalate to operator: ${reason}`,
        risk_level: 'LOW',
    }),
};

/* -------------------------------------------------------------------------- */
/* Fault Reports                                                              */
/* -------------------------------------------------------------------------- */

export function createFaultReport(params: {
    code: ErrorCode;
    runId: string;
    runStatus: RunStatus;
    failingSeq: number | null;
    reason: string;
    completedSeqs: number[];
    attempts: number;
    device?: string;
    now?: Date;
}): FaultReport {
    const options: RecoveryOption[] = [];
    const kind = kindOf(params.code);

    if (kind === 'ProtocolViolation') {
        options.push(CommonRecoveryOptions.verifyProtocolPeer());
    }
    if (params.device) {
        options.push(CommonRecoveryOptions.inspectDevice(params.device));
    }
    if (params.failingSeq !== null && kind === 'DispatchFault') {
        options.push(CommonRecoveryOptions.resumeFromCheckpoint(params.failingSeq));
    }
    if (params.code === 'ABORT_UNCONFIRMED') {
        options.push(CommonRecoveryOptions.rehomeDevices());
    }
    options.push(CommonRecoveryOptions.escalateToHuman(params.reason));

    return {
        fault_kind: kind,
        code: params.code,
        run_id: params.runId,
        run_status: params.runStatus,
        failing_seq: params.failingSeq,
        reason: params.reason,
        completed_seqs: params.completedSeqs.slice(),
        attempts: params.attempts,
        recovery_options: options,
        timestamp: (params.now ?? new Date()).toISOString(),
    };
}
