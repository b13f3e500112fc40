/**
 * Declared argument schema of each statement keyword.
 *
 * Positional arguments bind to `params` in order, after the device for
 * keywords that take one; `name=value` arguments bind by name.
 */

import { Dimension } from './grammar';
import { MixMode, OperationKind, StatementKeyword } from './types';

export type ParamKind =
    /** Number with a unit of the given dimension; `positive` excludes zero */
    | { type: 'quantity'; dimension: Dimension; positive: boolean }
    /** Bare number without a unit */
    | { type: 'number'; positive: boolean }
    /** Number with or without a unit, converted against the target's declared unit */
    | { type: 'scalar' }
    | { type: 'enum'; values: readonly string[] }
    | { type: 'name' }
    /** Length quantity or the name of a declared position */
    | { type: 'target' };

export interface ParamSchema {
    name: string;
    kind: ParamKind;
    required: boolean;
    /** Substituted when the argument is omitted */
    default?: string;
}

export type DeviceArity = 'required' | 'optional';

export interface OperationSchema {
    keyword: StatementKeyword;
    operation: OperationKind;
    device: DeviceArity;
    params: readonly ParamSchema[];
}

export const MIX_MODES: readonly MixMode[] = ['orbital', 'linear', 'helical'];

export type MoveMode = 'relative' | 'absolute';

export const MOVE_MODES: readonly MoveMode[] = ['relative', 'absolute'];

export const OPERATION_SCHEMAS: Readonly<Record<StatementKeyword, OperationSchema>> = {
    dispense: {
        keyword: 'dispense',
        operation: 'dispense',
        device: 'required',
        params: [
            { name: 'volume', kind: { type: 'quantity', dimension: 'volume', positive: true }, required: true },
        ],
    },
    mix: {
        keyword: 'mix',
        operation: 'mix',
        device: 'required',
        params: [
            { name: 'speed', kind: { type: 'quantity', dimension: 'speed', positive: true }, required: true },
            { name: 'duration', kind: { type: 'quantity', dimension: 'duration', positive: false }, required: true },
            { name: 'mode', kind: { type: 'enum', values: MIX_MODES }, required: false, default: 'orbital' },
            { name: 'target', kind: { type: 'name' }, required: false },
        ],
    },
    sample: {
        keyword: 'sample',
        operation: 'sample',
        device: 'required',
        params: [
            { name: 'volume', kind: { type: 'quantity', dimension: 'volume', positive: true }, required: true },
        ],
    },
    wait: {
        keyword: 'wait',
        operation: 'wait',
        device: 'optional',
        params: [
            { name: 'duration', kind: { type: 'quantity', dimension: 'duration', positive: false }, required: true },
        ],
    },
    move: {
        keyword: 'move',
        operation: 'move',
        device: 'required',
        params: [
            { name: 'target', kind: { type: 'target' }, required: true },
            { name: 'axis', kind: { type: 'name' }, required: false },
            { name: 'mode', kind: { type: 'enum', values: MOVE_MODES }, required: false, default: 'relative' },
            { name: 'feed', kind: { type: 'number', positive: true }, required: false },
        ],
    },
    set: {
        keyword: 'set',
        operation: 'set_parameter',
        device: 'required',
        params: [
            { name: 'parameter', kind: { type: 'name' }, required: true },
            { name: 'value', kind: { type: 'scalar' }, required: true },
        ],
    },
};

/** Human-readable description of what a parameter accepts. */
export function describeKind(kind: ParamKind): string {
    switch (kind.type) {
        case 'quantity':
            return `a ${kind.dimension} quantity`;
        case 'number':
            return 'a number without unit';
        case 'scalar':
            return 'a number';
        case 'enum':
            return `one of ${kind.values.join(', ')}`;
        case 'name':
            return 'a name';
        case 'target':
            return 'a length or a position name';
    }
}
