/**
 * Bounds validation of a lowered command sequence.
 *
 * Every numeric argument is checked against the device's declared envelope,
 * and axis positions are simulated from HOME so relative moves are checked
 * where they end up. Out-of-range values are reported, never clamped.
 */

import { LIMITS } from '../config';
import { DeviceRegistry, DeviceSpec, FEED_ARG, Range, isNotFound } from '../device_registry';
import { Diagnostic, createDiagnostic } from '../structured_error';
import { CommandDraft } from './lowering';
import { Program } from './types';

const EPSILON = 1e-9;

export interface EnvelopeOptions {
    /** Ceiling for dwells on the system device and devices without a duration envelope, seconds */
    maxDwellS?: number;
}

export function checkEnvelope(
    drafts: readonly CommandDraft[],
    program: Program,
    registry: DeviceRegistry,
    options: EnvelopeOptions = {}
): Diagnostic[] {
    const maxDwellS = options.maxDwellS ?? LIMITS.MAX_DWELL_S;
    const errors: Diagnostic[] = [];
    const positions = new Map<string, Map<string, number>>();

    for (const command of drafts) {
        const step = program.steps[command.steps[0]];
        const violation = (message: string): void => {
            errors.push(createDiagnostic(
                'ENVELOPE_VIOLATION',
                `${command.opcode} on "${command.device}" (from ${step.name}): ${message}`,
                { line: step.line, column: step.column, subject: command.device }
            ));
        };
        const inRange = (label: string, value: number | undefined, range: Range | undefined, unit: string): void => {
            if (value === undefined || !range) return;
            if (value < range.min - EPSILON || value > range.max + EPSILON) {
                violation(`${label} ${value} ${unit} is outside ${range.min}..${range.max} ${unit}`);
            }
        };

        const found = registry.resolve(command.device);
        const device: DeviceSpec | null = isNotFound(found) ? null : found;

        if (!device) {
            if (command.opcode === 'DWELL') {
                inRange('duration', command.args.duration, { min: 0, max: maxDwellS }, 's');
            } else if (command.opcode !== 'STOP' && command.opcode !== 'SYNC') {
                violation('no such device');
            }
            continue;
        }

        switch (command.opcode) {
            case 'HOME':
                positions.set(device.name, new Map(device.axes.map((a) => [a.name, a.home])));
                break;
            case 'MOVE_REL':
            case 'MOVE_ABS': {
                const current = positions.get(device.name);
                if (!current) {
                    violation('axis positions are unknown before HOME');
                    break;
                }
                for (const [key, value] of Object.entries(command.args)) {
                    if (key === FEED_ARG) {
                        inRange('feed', value, device.envelope[FEED_ARG], 'mm/min');
                        continue;
                    }
                    const axis = device.axes.find((a) => a.name === key);
                    if (!axis) {
                        violation(`unknown axis ${key}`);
                        continue;
                    }
                    const base = current.get(key) ?? axis.home;
                    const next = command.opcode === 'MOVE_REL' ? Math.round((base + value) * 1e9) / 1e9 : value;
                    if (next < axis.min - EPSILON || next > axis.max + EPSILON) {
                        violation(`axis ${key} would reach ${next} mm, outside ${axis.min}..${axis.max} mm`);
                    }
                    current.set(key, next);
                }
                break;
            }
            case 'DISPENSE':
            case 'ASPIRATE':
                inRange('volume', command.args.volume, device.envelope.volume, 'mL');
                break;
            case 'SPIN':
                inRange('speed', command.args.speed, device.envelope.speed, 'rpm');
                inRange('duration', command.args.duration, device.envelope.duration, 's');
                break;
            case 'DWELL':
                inRange('duration', command.args.duration, device.envelope.duration ?? { min: 0, max: maxDwellS }, 's');
                break;
            case 'SET': {
                const parameter = command.channel === null ? undefined : device.parameters[command.channel];
                if (!parameter) {
                    violation(`no settable parameter ${command.channel ?? '(none)'}`);
                    break;
                }
                inRange(command.channel ?? 'value', command.args.value, parameter, parameter.unit ?? '');
                break;
            }
            case 'READ':
            case 'SYNC':
            case 'STOP':
                break;
        }
    }

    return errors;
}
