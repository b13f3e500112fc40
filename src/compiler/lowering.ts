/**
 * Lowering: Program steps -> device commands.
 *
 * Rules live in a fixed table keyed by operation kind and device class. A
 * step whose (operation, class) pair has no entry is a LoweringError.
 * Steps are lowered in the Program's topological order. The first command
 * that moves a device's axes is preceded by a HOME for that device.
 */

import { DeviceClass, DeviceRegistry, DeviceSpec, FEED_ARG, isNotFound } from '../device_registry';
import { Diagnostic, createDiagnostic } from '../structured_error';
import { buildTrajectory, setting } from './shaker_trajectory';
import { Command, OperationKind, Program, SYSTEM_DEVICE, Step, StepAction } from './types';

/** A command before sequence numbers are assigned. */
export type CommandDraft = Omit<Command, 'seq'>;

export type LoweringTarget = DeviceClass | 'system';

export class LoweringFailure extends Error {
    constructor(public readonly diagnostic: Diagnostic) {
        super(diagnostic.message);
        this.name = 'LoweringFailure';
    }
}

type LoweringRule = (step: Step, device: DeviceSpec | null) => CommandDraft[];

/* -------------------------------------------------------------------------- */
/* Rules                                                                      */
/* -------------------------------------------------------------------------- */

function draft(step: Step, opcode: Command['opcode'], args: Record<string, number>, channel: string | null = null): CommandDraft {
    return { opcode, device: step.device ?? SYSTEM_DEVICE, channel, args, steps: [step.id] };
}

function actionOf<K extends StepAction['op']>(step: Step, op: K): Extract<StepAction, { op: K }> {
    const action = step.action;
    if (!isAction(action, op)) {
        throw new Error(`lowering: step ${step.name} is not a ${op}`);
    }
    return action;
}

function isAction<K extends StepAction['op']>(action: StepAction, op: K): action is Extract<StepAction, { op: K }> {
    return action.op === op;
}

const lowerDispense: LoweringRule = (step) => [
    draft(step, 'DISPENSE', { volume: actionOf(step, 'dispense').volumeMl }),
];

const lowerSample: LoweringRule = (step) => [
    draft(step, 'ASPIRATE', { volume: actionOf(step, 'sample').volumeMl }),
    draft(step, 'READ', {}),
];

const lowerSpin: LoweringRule = (step) => {
    const action = actionOf(step, 'mix');
    return [draft(step, 'SPIN', { speed: action.speedRpm, duration: action.durationS })];
};

const lowerDwell: LoweringRule = (step) => [
    draft(step, 'DWELL', { duration: actionOf(step, 'wait').durationS }),
];

const lowerSet: LoweringRule = (step) => {
    const action = actionOf(step, 'set_parameter');
    return [draft(step, 'SET', { value: action.value }, action.parameter)];
};

const lowerMove: LoweringRule = (step) => {
    const action = actionOf(step, 'move');
    const feed: Record<string, number> = action.feedMmPerMin !== null ? { [FEED_ARG]: action.feedMmPerMin } : {};
    const target = action.target;

    switch (target.kind) {
        case 'relative':
            return [draft(step, 'MOVE_REL', { [target.axis]: target.distanceMm, ...feed }, target.axis)];
        case 'absolute':
            return [draft(step, 'MOVE_ABS', { [target.axis]: target.positionMm, ...feed }, target.axis)];
        case 'named':
            return [draft(step, 'MOVE_ABS', { ...target.coordinates, ...feed })];
    }
};

const lowerShake: LoweringRule = (step, device) => {
    const action = actionOf(step, 'mix');
    if (!device) throw new Error(`lowering: step ${step.name} has no device`);

    const axes = new Set(device.axes.map((a) => a.name));
    const needed = action.mode === 'helical' ? ['x', 'y', 'z'] : ['x', 'y'];
    const missing = needed.filter((a) => !axes.has(a));
    if (missing.length) {
        throw new LoweringFailure(createDiagnostic(
            'NO_LOWERING_RULE',
            `${action.mode} mix on "${device.name}" needs axes ${needed.join(', ')} (missing ${missing.join(', ')})`,
            { line: step.line, column: step.column, subject: device.name }
        ));
    }

    const settings = device.settings;
    const center: Record<string, number> = { x: setting(settings, 'centerX'), y: setting(settings, 'centerY') };
    if (axes.has('z')) center.z = setting(settings, 'centerZ');
    if (action.position !== null) {
        const at = device.positions[action.position];
        if (!at) throw new Error(`lowering: "${device.name}" has no position ${action.position}`);
        for (const axis of Object.keys(center)) {
            const v = at[axis];
            if (v !== undefined) center[axis] = v;
        }
    }

    const travel = { ...center, [FEED_ARG]: setting(settings, 'travelFeed') };
    const trajectory = buildTrajectory(action.mode, action.speedRpm, action.durationS, settings, {
        x: center.x,
        y: center.y,
        z: center.z,
    });
    const out: CommandDraft[] = [draft(step, 'MOVE_ABS', travel)];
    for (const point of trajectory.points) {
        const args: Record<string, number> = { x: point.x, y: point.y, [FEED_ARG]: trajectory.feed };
        if (point.z !== undefined) args.z = point.z;
        out.push(draft(step, 'MOVE_ABS', args));
    }
    // Back to the centre, then wait for the motion queue to drain.
    out.push(draft(step, 'MOVE_ABS', { ...travel }));
    out.push(draft(step, 'SYNC', { duration: action.durationS }));
    return out;
};

const ALL_CLASSES: readonly LoweringTarget[] = ['dispenser', 'sampler', 'mixer', 'shaker', 'stage', 'system'];

function everywhere(rule: LoweringRule): Partial<Record<LoweringTarget, LoweringRule>> {
    const rules: Partial<Record<LoweringTarget, LoweringRule>> = {};
    for (const target of ALL_CLASSES) rules[target] = rule;
    return rules;
}

export const LOWERING_TABLE: Readonly<Record<OperationKind, Partial<Record<LoweringTarget, LoweringRule>>>> = {
    dispense: { dispenser: lowerDispense },
    sample: { sampler: lowerSample },
    mix: { mixer: lowerSpin, shaker: lowerShake },
    wait: everywhere(lowerDwell),
    move: { stage: lowerMove, shaker: lowerMove },
    set_parameter: everywhere(lowerSet),
};

/* -------------------------------------------------------------------------- */
/* Driver                                                                     */
/* -------------------------------------------------------------------------- */

export interface LoweringResult {
    drafts: CommandDraft[];
    errors: Diagnostic[];
}

const MOTION_OPCODES: ReadonlySet<Command['opcode']> = new Set(['MOVE_REL', 'MOVE_ABS']);

export function lowerProgram(program: Program, registry: DeviceRegistry): LoweringResult {
    const drafts: CommandDraft[] = [];
    const errors: Diagnostic[] = [];
    const homed = new Set<string>();

    for (const id of program.order) {
        const step = program.steps[id];
        let device: DeviceSpec | null = null;
        if (step.device !== null) {
            const found = registry.resolve(step.device);
            if (isNotFound(found)) {
                errors.push(createDiagnostic('REGISTRY_MISMATCH', `Device "${found.name}" is no longer registered`, {
                    line: step.line,
                    column: step.column,
                    subject: found.name,
                }));
                continue;
            }
            device = found;
        }

        const target: LoweringTarget = device ? device.deviceClass : 'system';
        const rule = LOWERING_TABLE[step.action.op][target];
        if (!rule) {
            errors.push(createDiagnostic(
                'NO_LOWERING_RULE',
                `No lowering rule for ${step.action.op} on ${target}${device ? ` "${device.name}"` : ''}`,
                { line: step.line, column: step.column, subject: device ? device.name : SYSTEM_DEVICE }
            ));
            continue;
        }

        let lowered: CommandDraft[];
        try {
            lowered = rule(step, device);
        } catch (e) {
            if (!(e instanceof LoweringFailure)) throw e;
            errors.push(e.diagnostic);
            continue;
        }

        for (const command of lowered) {
            if (device && MOTION_OPCODES.has(command.opcode) && !homed.has(device.name)) {
                homed.add(device.name);
                drafts.push({ opcode: 'HOME', device: device.name, channel: null, args: {}, steps: [step.id] });
            }
            drafts.push(command);
        }
    }

    return { drafts, errors };
}
