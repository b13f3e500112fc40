import type { Command } from '../compiler/types';
import { TIMEOUTS } from '../config';

const TIMED_OPCODES: ReadonlySet<Command['opcode']> = new Set(['DWELL', 'SPIN', 'SYNC']);

/**
 * Acknowledgement deadline for one dispatch: the base timeout plus the time
 * the command itself keeps the controller busy (dwells, spins and the SYNC
 * that closes a shaker path).
 */
export function deadlineFor(command: Command, ackTimeoutMs: number): number {
    const busyS = TIMED_OPCODES.has(command.opcode) ? command.args.duration ?? 0 : 0;
    return ackTimeoutMs + Math.ceil(busyS * 1000);
}

export type DeadlineListener = (seq: number, attempt: number) => void;

interface PendingDeadline {
    seq: number;
    attempt: number;
    armedAt: number;
    timer: ReturnType<typeof setTimeout>;
    settled: boolean;
}

interface TrackerOptions {
    ackTimeoutMs?: number;
}

/**
 * Per-dispatch acknowledgement deadlines. Each (seq, attempt) pair gets one
 * timer; whichever comes first of settle, cancel or expiry wins and the
 * others become no-ops.
 */
export class AckTracker {
    readonly ackTimeoutMs: number;

    private readonly pending = new Map<string, PendingDeadline>();

    private disposed = false;

    constructor(private readonly onExpired: DeadlineListener, options: TrackerOptions = {}) {
        this.ackTimeoutMs = options.ackTimeoutMs ?? TIMEOUTS.ACK_MS;
    }

    get size(): number {
        return this.pending.size;
    }

    arm(seq: number, attempt: number, timeoutMs: number = this.ackTimeoutMs): void {
        if (this.disposed) {
            throw new Error('Ack tracker has been disposed');
        }
        const key = keyOf(seq, attempt);
        if (this.pending.has(key)) {
            throw new Error(`Deadline for seq ${seq} attempt ${attempt} already armed`);
        }

        const record: PendingDeadline = {
            seq,
            attempt,
            armedAt: Date.now(),
            timer: setTimeout(() => this.expire(key), timeoutMs),
            settled: false,
        };
        this.pending.set(key, record);
    }

    /** Clear the deadline for an acknowledged or faulted attempt. Returns false if none was armed. */
    settle(seq: number, attempt: number): boolean {
        const record = this.pending.get(keyOf(seq, attempt));
        if (!record || record.settled) {
            return false;
        }
        this.clear(record);
        return true;
    }

    /** Milliseconds since the deadline was armed, or null if it is not pending. */
    elapsedMs(seq: number, attempt: number): number | null {
        const record = this.pending.get(keyOf(seq, attempt));
        return record ? Date.now() - record.armedAt : null;
    }

    cancelAll(): void {
        for (const record of [...this.pending.values()]) {
            this.clear(record);
        }
    }

    dispose(): void {
        this.cancelAll();
        this.disposed = true;
    }

    private expire(key: string): void {
        const record = this.pending.get(key);
        if (!record || record.settled) {
            return;
        }
        this.clear(record);
        this.onExpired(record.seq, record.attempt);
    }

    private clear(record: PendingDeadline): void {
        record.settled = true;
        clearTimeout(record.timer);
        this.pending.delete(keyOf(record.seq, record.attempt));
    }
}

function keyOf(seq: number, attempt: number): string {
    return `${seq}:${attempt}`;
}
