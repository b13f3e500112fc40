/**
 * Optimization passes over lowered commands. Each pass keeps the physical
 * effect of the stream: final axis positions, total dispensed volume and
 * total dwell time are unchanged.
 */

import { LIMITS } from '../config';
import { DeviceRegistry, FEED_ARG, isNotFound } from '../device_registry';
import { CommandDraft } from './lowering';
import { StepId } from './types';

const EPSILON = 1e-9;

function roundSum(value: number): number {
    return Math.round(value * 1e9) / 1e9;
}

function mergeSteps(a: readonly StepId[], b: readonly StepId[]): StepId[] {
    const out = [...a];
    for (const id of b) {
        if (!out.includes(id)) out.push(id);
    }
    return out;
}

/* -------------------------------------------------------------------------- */
/* Coalescing                                                                 */
/* -------------------------------------------------------------------------- */

export interface CoalesceOptions {
    /** Ceiling for merged dwells on the system device and devices without a duration envelope, seconds */
    maxDwellS?: number;
}

/**
 * Merge adjacent commands for the same device and channel:
 * - MOVE_REL on one axis, same direction, same feed: distances add
 * - DISPENSE: volumes add while the sum stays within the volume envelope
 * - DWELL: durations add while the sum stays within the duration envelope
 *
 * MOVE_ABS and everything else is left alone, and nothing merges across an
 * intervening command.
 */
export function coalesce(
    drafts: readonly CommandDraft[],
    registry: DeviceRegistry,
    options: CoalesceOptions = {}
): CommandDraft[] {
    const maxDwellS = options.maxDwellS ?? LIMITS.MAX_DWELL_S;
    const out: CommandDraft[] = [];

    // Dwells on the system device, or on a device without a duration envelope, stop at maxDwellS.
    const ceiling = (device: string, key: string): number => {
        const spec = registry.resolve(device);
        const unbounded = key === 'duration' ? maxDwellS : Infinity;
        if (isNotFound(spec)) return unbounded;
        const range = spec.envelope[key];
        return range ? range.max : unbounded;
    };

    for (const command of drafts) {
        const previous = out[out.length - 1];
        if (!previous || previous.device !== command.device || previous.opcode !== command.opcode || previous.channel !== command.channel) {
            out.push(command);
            continue;
        }

        let merged: CommandDraft | null = null;
        switch (command.opcode) {
            case 'MOVE_REL': {
                const axis = command.channel;
                if (axis === null) break;
                const a = previous.args[axis];
                const b = command.args[axis];
                if (a === undefined || b === undefined) break;
                if (a * b < 0 || previous.args[FEED_ARG] !== command.args[FEED_ARG]) break;
                merged = {
                    ...previous,
                    args: { ...previous.args, [axis]: roundSum(a + b) },
                    steps: mergeSteps(previous.steps, command.steps),
                };
                break;
            }
            case 'DISPENSE':
            case 'DWELL': {
                const key = command.opcode === 'DISPENSE' ? 'volume' : 'duration';
                const a = previous.args[key];
                const b = command.args[key];
                if (a === undefined || b === undefined) break;
                const sum = roundSum(a + b);
                if (sum > ceiling(command.device, key) + EPSILON) break;
                merged = {
                    ...previous,
                    args: { ...previous.args, [key]: sum },
                    steps: mergeSteps(previous.steps, command.steps),
                };
                break;
            }
            default:
                break;
        }

        if (merged) {
            out[out.length - 1] = merged;
        } else {
            out.push(command);
        }
    }

    return out;
}

/* -------------------------------------------------------------------------- */
/* No-op elimination                                                          */
/* -------------------------------------------------------------------------- */

export function isNoOp(command: CommandDraft): boolean {
    switch (command.opcode) {
        case 'MOVE_REL':
            return Object.entries(command.args).every(([key, value]) => key === FEED_ARG || value === 0);
        case 'DWELL':
        case 'SPIN':
            return command.args.duration === 0;
        default:
            return false;
    }
}

export function eliminateNoOps(drafts: readonly CommandDraft[]): CommandDraft[] {
    return drafts.filter((d) => !isNoOp(d));
}
