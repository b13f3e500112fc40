/**
 * Moonraker Controller - HardwareController over the Moonraker HTTP API of a
 * Klipper-driven motion system.
 *
 *   dispatch       POST /printer/gcode/script {script}
 *   queryStatus    GET  /printer/info
 *   emergencyStop  POST /printer/emergency_stop
 *
 * Moonraker answers a script request only after Klipper has executed it, so
 * the HTTP response is the acknowledgement. Completion is tracked locally per
 * run; it survives the orchestrator's deadline and is what `queryStatus`
 * reports back before a retry.
 */

import type { Command } from '../compiler/types';
import { renderCommand } from '../compiler/gcode';
import { MOONRAKER } from '../config';
import { createLogger } from '../logger';
import { isRecord } from '../schema_validator';
import { deadlineFor } from './ack_tracker';
import {
    ControllerEvent,
    ControllerListener,
    DeviceState,
    DeviceStatus,
    DispatchContext,
    HardwareController,
} from './types';

const log = createLogger('moonraker');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface HttpResponse {
    ok: boolean;
    status: number;
    text(): Promise<string>;
}

export interface HttpRequestInit {
    method: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string;
    signal: AbortSignal;
}

/** The subset of `fetch` the controller uses; the global one fits. */
export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface MoonrakerOptions {
    baseUrl?: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
}

export class MoonrakerError extends Error {
    constructor(message: string, public readonly status: number | null = null) {
        super(message);
        this.name = 'MoonrakerError';
    }
}

const STATE_MAP: Record<string, DeviceState> = {
    ready: 'idle',
    startup: 'busy',
    shutdown: 'error',
    error: 'error',
};

/* -------------------------------------------------------------------------- */
/* Controller                                                                 */
/* -------------------------------------------------------------------------- */

export class MoonrakerController implements HardwareController {
    readonly supportsEmergencyStop = true;

    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: FetchLike;
    private readonly listeners = new Set<ControllerListener>();

    /** `${runId}:${seq}` of scripts whose request has not returned */
    private readonly inFlight = new Set<string>();
    private completed: { runId: string; seq: number } | null = null;

    constructor(options: MoonrakerOptions = {}) {
        this.baseUrl = (options.baseUrl ?? MOONRAKER.BASE_URL).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? MOONRAKER.REQUEST_TIMEOUT_MS;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    subscribe(listener: ControllerListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    async dispatch(command: Command, context: DispatchContext): Promise<void> {
        const { runId } = context;
        const key = `${runId}:${command.seq}`;

        if (this.isCompleted(runId, command.seq)) {
            log.debug('Already executed; acknowledging again', { seq: command.seq, attempt: context.attempt });
            queueMicrotask(() => this.publish({ type: 'ack', runId, seq: command.seq }));
            return;
        }
        if (this.inFlight.has(key)) {
            // The earlier request will produce the acknowledgement.
            log.debug('Script still executing; not resending', { seq: command.seq, attempt: context.attempt });
            return;
        }

        const script = renderCommand(command);
        this.inFlight.add(key);
        log.debug('Sending script', { seq: command.seq, attempt: context.attempt, script });

        // The script returns only once it has run, so timed commands get their duration on top.
        void this.request('POST', '/printer/gcode/script', { script }, deadlineFor(command, this.timeoutMs)).then(
            () => {
                this.inFlight.delete(key);
                this.markCompleted(runId, command.seq);
                this.publish({ type: 'ack', runId, seq: command.seq });
            },
            (e: unknown) => {
                this.inFlight.delete(key);
                const reason = e instanceof Error ? e.message : String(e);
                this.publish({ type: 'fault', runId, seq: command.seq, reason: `${script}: ${reason}` });
            }
        );
    }

    async queryStatus(deviceId: string): Promise<DeviceStatus> {
        const local = {
            device: deviceId,
            runId: this.completed ? this.completed.runId : null,
            lastCompletedSeq: this.completed ? this.completed.seq : null,
        };

        try {
            const body = await this.request('GET', '/printer/info');
            const info = parseInfo(body);
            const state = this.inFlight.size > 0 ? 'busy' : STATE_MAP[info.state] ?? 'error';
            return { ...local, state, detail: info.message || undefined };
        } catch (e) {
            const detail = e instanceof Error ? e.message : String(e);
            log.warn('Printer info unavailable', { detail });
            return { ...local, state: 'offline', detail };
        }
    }

    async emergencyStop(): Promise<void> {
        log.warn('Sending emergency stop');
        await this.request('POST', '/printer/emergency_stop');
        this.inFlight.clear();
    }

    /* ------------------------------------------------------------------------ */
    /* Internals                                                                */
    /* ------------------------------------------------------------------------ */

    private isCompleted(runId: string, seq: number): boolean {
        return this.completed !== null && this.completed.runId === runId && this.completed.seq >= seq;
    }

    private markCompleted(runId: string, seq: number): void {
        if (!this.completed || this.completed.runId !== runId || this.completed.seq < seq) {
            this.completed = { runId, seq };
        }
    }

    private publish(event: ControllerEvent): void {
        for (const listener of [...this.listeners]) {
            listener(event);
        }
    }

    private async request(
        method: 'GET' | 'POST',
        path: string,
        payload?: Record<string, unknown>,
        timeoutMs: number = this.timeoutMs
    ): Promise<string> {
        const ac = new AbortController();
        const tid = setTimeout(() => ac.abort(), timeoutMs);

        try {
            const resp = await this.fetchImpl(`${this.baseUrl}${path}`, {
                method,
                headers: payload ? { 'Content-Type': 'application/json' } : undefined,
                body: payload ? JSON.stringify(payload) : undefined,
                signal: ac.signal,
            });
            const bodyText = await resp.text();

            if (!resp.ok) {
                throw new MoonrakerError(`HTTP ${resp.status}: ${snippet(bodyText)}`, resp.status);
            }
            return bodyText;
        } catch (e) {
            if (e instanceof MoonrakerError) throw e;
            if (ac.signal.aborted) {
                throw new MoonrakerError(`${method} ${path} timed out after ${timeoutMs}ms`);
            }
            const reason = e instanceof Error ? e.message : String(e);
            throw new MoonrakerError(`cannot reach ${this.baseUrl}: ${reason}`);
        } finally {
            clearTimeout(tid);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function snippet(text: string): string {
    const trimmed = text.trim().replace(/\s+/g, ' ');
    return trimmed.length > MOONRAKER.MAX_ERROR_SNIPPET_CHARS
        ? trimmed.slice(0, MOONRAKER.MAX_ERROR_SNIPPET_CHARS) + '...'
        : trimmed;
}

/** `{"result": {"state": "ready", "state_message": "..."}}` */
function parseInfo(body: string): { state: string; message: string } {
    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch {
        throw new MoonrakerError(`printer info is not JSON: ${snippet(body)}`);
    }
    const result = isRecord(parsed) ? parsed.result : undefined;
    if (!isRecord(result) || typeof result.state !== 'string') {
        throw new MoonrakerError('printer info has no state');
    }
    return {
        state: result.state,
        message: typeof result.state_message === 'string' ? result.state_message : '',
    };
}
