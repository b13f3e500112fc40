/**
 * Semantic Analyzer
 *
 * Resolves a parsed document against a device registry into a Program:
 * - binds arguments to each keyword's declared schema and fills defaults
 * - converts quantities to canonical units (mL, s, rpm, mm)
 * - checks types and ranges against the schema and the device envelope
 * - resolves labels and builds the ordering graph
 * - reports ordering cycles with the steps that form them
 *
 * All problems are collected (up to `maxErrors`) rather than stopping at the
 * first one. The same document and registry always give the same Program.
 */

import { LIMITS } from '../config';
import { DeviceRegistry, DeviceSpec, isNotFound } from '../device_registry';
import { Diagnostic, ErrorCode, createDiagnostic } from '../structured_error';
import { unitByText } from './grammar';
import { MIX_MODES, OPERATION_SCHEMAS, OperationSchema, ParamSchema, describeKind } from './operation_schema';
import {
    ArgumentNode,
    MixMode,
    MoveTarget,
    ProtocolDocument,
    Program,
    StatementNode,
    Step,
    StepAction,
    StepId,
} from './types';

export interface AnalyzerOptions {
    /** Stop collecting after this many errors (default LIMITS.MAX_SEMANTIC_ERRORS) */
    maxErrors?: number;
    /** Upper bound for any `wait`, in seconds */
    maxDwellS?: number;
}

export interface AnalysisResult {
    /** Null whenever `errors` is non-empty */
    program: Program | null;
    errors: Diagnostic[];
}

export function analyze(
    document: ProtocolDocument,
    registry: DeviceRegistry,
    options: AnalyzerOptions = {}
): AnalysisResult {
    const sink = new DiagnosticSink(options.maxErrors ?? LIMITS.MAX_SEMANTIC_ERRORS);
    const analyzer = new Analyzer(registry, sink, options.maxDwellS ?? LIMITS.MAX_DWELL_S);

    let program: Program | null = null;
    try {
        program = analyzer.run(document);
    } catch (e) {
        if (!(e instanceof ErrorLimitReached)) throw e;
    }

    return sink.items.length ? { program: null, errors: sink.items } : { program, errors: [] };
}

/* -------------------------------------------------------------------------- */
/* Diagnostics                                                                */
/* -------------------------------------------------------------------------- */

class ErrorLimitReached extends Error {}

interface At {
    line: number;
    column: number;
}

class DiagnosticSink {
    readonly items: Diagnostic[] = [];

    constructor(private readonly max: number) {}

    report(code: ErrorCode, message: string, at: At, extra: { subject?: string; steps?: string[] } = {}): void {
        if (this.items.length >= this.max) {
            this.items.push(createDiagnostic(
                'TOO_MANY_ERRORS',
                `Stopped after ${this.max} errors`,
                { line: at.line, column: at.column }
            ));
            throw new ErrorLimitReached();
        }
        this.items.push(createDiagnostic(code, message, { line: at.line, column: at.column, ...extra }));
    }
}

function startOf(node: { span: { start: At } }): At {
    return { line: node.span.start.line, column: node.span.start.column };
}

/* -------------------------------------------------------------------------- */
/* Resolved argument values                                                   */
/* -------------------------------------------------------------------------- */

type Resolved =
    | { kind: 'number'; value: number; unit: string | null; explicit: boolean; at: At }
    | { kind: 'name'; name: string; explicit: boolean; at: At };

type Values = Map<string, Resolved>;

function canonical(value: number): number {
    return Math.round(value * 1e9) / 1e9;
}

function fmt(value: number): string {
    return String(canonical(value));
}

/* -------------------------------------------------------------------------- */
/* Analyzer                                                                   */
/* -------------------------------------------------------------------------- */

class Analyzer {
    constructor(
        private readonly registry: DeviceRegistry,
        private readonly sink: DiagnosticSink,
        private readonly maxDwellS: number
    ) {}

    run(document: ProtocolDocument): Program | null {
        const statements = document.statements;
        const labels = this.collectLabels(statements);

        const actions: (StepAction | null)[] = [];
        const devices: (string | null)[] = [];
        for (const statement of statements) {
            const resolved = this.resolveStatement(statement);
            actions.push(resolved ? resolved.action : null);
            devices.push(resolved ? resolved.device : null);
        }

        const mustFollow: Set<StepId>[] = statements.map(() => new Set());
        const mustPrecede: Set<StepId>[] = statements.map(() => new Set());
        const successors: Set<StepId>[] = statements.map(() => new Set());

        statements.forEach((statement, id) => {
            for (const constraint of statement.constraints) {
                for (const target of constraint.targets) {
                    const other = labels.get(target.name);
                    if (other === undefined) {
                        this.sink.report('UNKNOWN_LABEL', `Unknown step label "${target.name}"`, startOf(target), {
                            subject: target.name,
                        });
                        continue;
                    }
                    if (constraint.relation === 'after') {
                        mustFollow[id].add(other);
                        successors[other].add(id);
                    } else {
                        mustPrecede[id].add(other);
                        successors[id].add(other);
                    }
                }
            }
        });

        const names = statements.map((s, id) => stepName(s, id));
        const graph = successors.map((set) => [...set].sort((a, b) => a - b));
        this.reportCycles(graph, names, statements);

        if (this.sink.items.length) return null;

        const steps: Step[] = [];
        statements.forEach((statement, id) => {
            const action = actions[id];
            if (!action) return;
            steps.push(Object.freeze({
                id,
                name: names[id],
                label: statement.label ? statement.label.name : null,
                device: devices[id],
                action: Object.freeze(action),
                mustFollow: Object.freeze([...mustFollow[id]].sort((a, b) => a - b)),
                mustPrecede: Object.freeze([...mustPrecede[id]].sort((a, b) => a - b)),
                line: statement.span.start.line,
                column: statement.span.start.column,
            }));
        });

        return Object.freeze({
            steps: Object.freeze(steps),
            successors: Object.freeze(graph.map((s) => Object.freeze(s))),
            order: Object.freeze(topologicalOrder(graph)),
            registryFingerprint: this.registry.fingerprint(),
        });
    }

    /* ------------------------------------------------------------------------ */
    /* Labels and ordering                                                      */
    /* ------------------------------------------------------------------------ */

    private collectLabels(statements: readonly StatementNode[]): Map<string, StepId> {
        const labels = new Map<string, StepId>();
        statements.forEach((statement, id) => {
            if (!statement.label) return;
            const name = statement.label.name;
            const first = labels.get(name);
            if (first !== undefined) {
                const firstAt = statements[first].span.start;
                this.sink.report(
                    'DUPLICATE_LABEL',
                    `Label "${name}" is already used at line ${firstAt.line}`,
                    startOf(statement.label),
                    { subject: name }
                );
                return;
            }
            labels.set(name, id);
        });
        return labels;
    }

    /**
     * Depth-first search over the ordering graph. Every back edge closes a
     * cycle, reported with its steps in path order.
     */
    private reportCycles(graph: StepId[][], names: string[], statements: readonly StatementNode[]): void {
        const WHITE = 0, GRAY = 1, BLACK = 2;
        const color = graph.map(() => WHITE);

        for (let root = 0; root < graph.length; root++) {
            if (color[root] !== WHITE) continue;

            const path: StepId[] = [root];
            const nextEdge: number[] = [0];
            color[root] = GRAY;

            while (path.length) {
                const top = path.length - 1;
                const node = path[top];
                const edges = graph[node];

                if (nextEdge[top] >= edges.length) {
                    color[node] = BLACK;
                    path.pop();
                    nextEdge.pop();
                    continue;
                }

                const next = edges[nextEdge[top]++];
                if (color[next] === WHITE) {
                    color[next] = GRAY;
                    path.push(next);
                    nextEdge.push(0);
                } else if (color[next] === GRAY) {
                    const cycle = path.slice(path.indexOf(next));
                    const cycleNames = cycle.map((id) => names[id]);
                    this.sink.report(
                        'ORDERING_CYCLE',
                        `Ordering constraints form a cycle: ${[...cycleNames, names[next]].join(' -> ')}`,
                        startOf(statements[next]),
                        { steps: cycleNames }
                    );
                }
            }
        }
    }

    /* ------------------------------------------------------------------------ */
    /* Statements                                                               */
    /* ------------------------------------------------------------------------ */

    private resolveStatement(statement: StatementNode): { action: StepAction; device: string | null } | null {
        const schema = OPERATION_SCHEMAS[statement.keyword];
        const bound = this.bindArguments(statement, schema);
        if (!bound) return null;

        let device: DeviceSpec | null = null;
        if (bound.device) {
            const found = this.registry.resolve(bound.device.name);
            if (isNotFound(found)) {
                this.sink.report('UNKNOWN_DEVICE', `Unknown device "${found.name}"`, startOf(statement), {
                    subject: found.name,
                });
                return null;
            }
            if (!found.operations.includes(schema.operation)) {
                this.sink.report(
                    'UNSUPPORTED_OPERATION',
                    `Device "${found.name}" (${found.deviceClass}) does not support ${schema.operation}`,
                    startOf(statement),
                    { subject: found.name }
                );
                return null;
            }
            device = found;
        }

        const action = this.buildAction(statement, bound.values, device);
        return action ? { action, device: device ? device.name : null } : null;
    }

    private bindArguments(
        statement: StatementNode,
        schema: OperationSchema
    ): { device: { name: string; at: At } | null; values: Values } | null {
        const errorsBefore = this.sink.items.length;
        const values: Values = new Map();
        const named = new Map<string, ArgumentNode>();
        const positional: ArgumentNode[] = [];
        let device: { name: string; at: At } | null = null;

        for (const arg of statement.args) {
            if (arg.name === null) {
                positional.push(arg);
            } else if (named.has(arg.name)) {
                this.sink.report('INVALID_PARAMETER', `Argument "${arg.name}" is given more than once`, startOf(arg), {
                    subject: arg.name,
                });
            } else {
                named.set(arg.name, arg);
            }
        }

        const deviceArg = named.get('device');
        if (deviceArg) {
            named.delete('device');
            if (deviceArg.value.kind === 'name') {
                device = { name: deviceArg.value.name, at: startOf(deviceArg) };
            } else {
                this.sink.report('INVALID_PARAMETER', 'device must be a device name', startOf(deviceArg), {
                    subject: 'device',
                });
            }
        } else if (positional.length && positional[0].value.kind === 'name') {
            // A leading name is always the device; no keyword starts with a name parameter.
            const head = positional[0].value;
            positional.shift();
            device = { name: head.name, at: startOf(head) };
        }

        if (!device && schema.device === 'required' && errorsBefore === this.sink.items.length) {
            this.sink.report(
                'MISSING_PARAMETER',
                `${statement.keyword} needs a device name as its first argument`,
                startOf(statement),
                { subject: 'device' }
            );
        }

        const given = new Set<string>();
        for (const [name, arg] of named) {
            const param = schema.params.find((p) => p.name === name);
            if (!param) {
                this.sink.report(
                    'UNKNOWN_PARAMETER',
                    `${statement.keyword} has no argument "${name}" (accepts ${schema.params.map((p) => p.name).join(', ')})`,
                    startOf(arg),
                    { subject: name }
                );
                continue;
            }
            given.add(name);
            const resolved = this.resolveValue(param, arg);
            if (resolved) values.set(name, resolved);
        }

        const open = schema.params.filter((p) => !named.has(p.name));
        positional.forEach((arg, i) => {
            const param = open[i];
            if (!param) {
                this.sink.report('UNKNOWN_PARAMETER', `Too many arguments for ${statement.keyword}`, startOf(arg));
                return;
            }
            given.add(param.name);
            const resolved = this.resolveValue(param, arg);
            if (resolved) values.set(param.name, resolved);
        });

        for (const param of schema.params) {
            if (given.has(param.name)) continue;
            if (param.default !== undefined) {
                values.set(param.name, { kind: 'name', name: param.default, explicit: false, at: startOf(statement) });
            } else if (param.required) {
                this.sink.report(
                    'MISSING_PARAMETER',
                    `${statement.keyword} requires ${param.name} (${describeKind(param.kind)})`,
                    startOf(statement),
                    { subject: param.name }
                );
            }
        }

        return this.sink.items.length === errorsBefore ? { device, values } : null;
    }

    private resolveValue(param: ParamSchema, arg: ArgumentNode): Resolved | null {
        const value = arg.value;
        const at = startOf(arg);
        const kind = param.kind;
        const invalid = (): null => {
            this.sink.report('INVALID_PARAMETER', `${param.name} must be ${describeKind(kind)}`, at, {
                subject: param.name,
            });
            return null;
        };

        switch (kind.type) {
            case 'quantity': {
                if (value.kind !== 'quantity') return invalid();
                const unit = value.unit === null ? undefined : unitByText(value.unit);
                if (!unit || unit.dimension !== kind.dimension) {
                    this.sink.report(
                        'INVALID_PARAMETER',
                        value.unit === null
                            ? `${param.name} ${value.text} needs a ${kind.dimension} unit`
                            : `${param.name} expects a ${kind.dimension} unit, got ${value.unit}`,
                        at,
                        { subject: param.name }
                    );
                    return null;
                }
                const converted = canonical(value.value * unit.factor);
                if (!this.checkFinite(param.name, converted, value.text, at)) return null;
                if (!this.checkSign(param.name, converted, kind.positive, at)) return null;
                return { kind: 'number', value: converted, unit: unit.text, explicit: true, at };
            }
            case 'number': {
                if (value.kind !== 'quantity' || value.unit !== null) return invalid();
                if (!this.checkFinite(param.name, value.value, value.text, at)) return null;
                if (!this.checkSign(param.name, value.value, kind.positive, at)) return null;
                return { kind: 'number', value: value.value, unit: null, explicit: true, at };
            }
            case 'scalar':
                if (value.kind !== 'quantity') return invalid();
                if (!this.checkFinite(param.name, value.value, value.text, at)) return null;
                return { kind: 'number', value: value.value, unit: value.unit, explicit: true, at };
            case 'enum':
                if (value.kind !== 'name' || !kind.values.includes(value.name)) return invalid();
                return { kind: 'name', name: value.name, explicit: true, at };
            case 'name':
                if (value.kind !== 'name') return invalid();
                return { kind: 'name', name: value.name, explicit: true, at };
            case 'target': {
                if (value.kind === 'name') return { kind: 'name', name: value.name, explicit: true, at };
                if (value.kind !== 'quantity') return invalid();
                const unit = value.unit === null ? undefined : unitByText(value.unit);
                if (!unit || unit.dimension !== 'length') return invalid();
                const converted = canonical(value.value * unit.factor);
                if (!this.checkFinite(param.name, converted, value.text, at)) return null;
                return { kind: 'number', value: converted, unit: unit.text, explicit: true, at };
            }
        }
    }

    /** Literals such as `1e999` overflow to Infinity. */
    private checkFinite(name: string, value: number, text: string, at: At): boolean {
        if (Number.isFinite(value)) return true;
        this.sink.report('OUT_OF_RANGE', `${name} ${text} is not a finite number`, at, { subject: name });
        return false;
    }

    private checkSign(name: string, value: number, positive: boolean, at: At): boolean {
        if (positive ? value > 0 : value >= 0) return true;
        this.sink.report(
            'OUT_OF_RANGE',
            `${name} must be ${positive ? 'greater than zero' : 'zero or more'}, got ${fmt(value)}`,
            at,
            { subject: name }
        );
        return false;
    }

    /* ------------------------------------------------------------------------ */
    /* Actions                                                                  */
    /* ------------------------------------------------------------------------ */

    private buildAction(statement: StatementNode, values: Values, device: DeviceSpec | null): StepAction | null {
        const errorsBefore = this.sink.items.length;
        const ok = () => this.sink.items.length === errorsBefore;

        switch (statement.keyword) {
            case 'dispense': {
                const volume = numberOf(values, 'volume');
                if (device) this.checkEnvelope(device, 'volume', volume, 'mL');
                return ok() ? { op: 'dispense', volumeMl: volume.value } : null;
            }
            case 'sample': {
                const volume = numberOf(values, 'volume');
                if (device) this.checkEnvelope(device, 'volume', volume, 'mL');
                return ok() ? { op: 'sample', volumeMl: volume.value } : null;
            }
            case 'mix': {
                const speed = numberOf(values, 'speed');
                const duration = numberOf(values, 'duration');
                if (device) {
                    this.checkEnvelope(device, 'speed', speed, 'rpm');
                    this.checkEnvelope(device, 'duration', duration, 's');
                }
                const mode = mixModeOf(nameOf(values, 'mode').name);
                const target = values.get('target');
                let position: string | null = null;
                if (device && target && target.kind === 'name') {
                    if (device.deviceClass !== 'shaker') {
                        this.sink.report('INVALID_PARAMETER', `target does not apply to a mix on ${device.deviceClass} "${device.name}"`, target.at, {
                            subject: target.name,
                        });
                    } else if (this.resolvePosition(device, target)) {
                        position = target.name;
                    }
                }
                return ok() ? { op: 'mix', speedRpm: speed.value, durationS: duration.value, mode, position } : null;
            }
            case 'wait': {
                const duration = numberOf(values, 'duration');
                if (device) this.checkEnvelope(device, 'duration', duration, 's');
                if (ok() && duration.value > this.maxDwellS) {
                    this.sink.report(
                        'OUT_OF_RANGE',
                        `wait of ${fmt(duration.value)} s exceeds the ${this.maxDwellS} s limit`,
                        duration.at,
                        { subject: 'duration' }
                    );
                }
                return ok() ? { op: 'wait', durationS: duration.value } : null;
            }
            case 'move':
                return device ? this.buildMove(device, values) : null;
            case 'set':
                return device ? this.buildSet(device, values) : null;
        }
    }

    private buildMove(device: DeviceSpec, values: Values): StepAction | null {
        const errorsBefore = this.sink.items.length;
        const target = values.get('target');
        const axisArg = values.get('axis');
        const modeArg = nameOf(values, 'mode');
        const feedArg = values.get('feed');
        if (!target) return null;

        let feed: number | null = null;
        if (feedArg && feedArg.kind === 'number') {
            this.checkEnvelope(device, 'feed', feedArg, 'mm/min');
            feed = feedArg.value;
        }

        let resolved: MoveTarget | null = null;

        if (target.kind === 'name') {
            if ((axisArg && axisArg.explicit) || modeArg.explicit) {
                this.sink.report('INVALID_PARAMETER', 'axis and mode do not apply to a named position', target.at, {
                    subject: target.name,
                });
                return null;
            }
            const coordinates = this.resolvePosition(device, target);
            if (!coordinates) return null;
            resolved = { kind: 'named', position: target.name, coordinates };
        } else {
            const axisName = axisArg && axisArg.kind === 'name' ? axisArg.name : device.axes.length ? device.axes[0].name : null;
            const axis = device.axes.find((a) => a.name === axisName);
            if (!axis) {
                this.sink.report(
                    'UNKNOWN_AXIS',
                    axisName === null
                        ? `Device "${device.name}" has no axes`
                        : `Device "${device.name}" has no axis "${axisName}"`,
                    axisArg ? axisArg.at : target.at,
                    { subject: axisName ?? device.name }
                );
                return null;
            }
            if (modeArg.name === 'absolute') {
                if (target.value < axis.min || target.value > axis.max) {
                    this.sink.report(
                        'OUT_OF_RANGE',
                        `${axis.name} position ${fmt(target.value)} mm is outside ${axis.min}..${axis.max}`,
                        target.at,
                        { subject: axis.name }
                    );
                }
                resolved = { kind: 'absolute', axis: axis.name, positionMm: target.value };
            } else {
                resolved = { kind: 'relative', axis: axis.name, distanceMm: target.value };
            }
        }

        if (this.sink.items.length !== errorsBefore) return null;
        return { op: 'move', target: resolved, feedMmPerMin: feed };
    }

    /** Coordinates of a named position, with every axis it names inside the axis range. */
    private resolvePosition(device: DeviceSpec, target: { name: string; at: At }): Readonly<Record<string, number>> | null {
        const coordinates = device.positions[target.name];
        if (!coordinates) {
            const known = Object.keys(device.positions).sort();
            this.sink.report(
                'UNKNOWN_POSITION',
                `Device "${device.name}" has no position "${target.name}"` +
                    (known.length ? ` (known: ${known.join(', ')})` : ''),
                target.at,
                { subject: target.name }
            );
            return null;
        }
        let inside = true;
        for (const axis of device.axes) {
            const v = coordinates[axis.name];
            if (v !== undefined && (v < axis.min || v > axis.max)) {
                this.sink.report(
                    'OUT_OF_RANGE',
                    `Position "${target.name}" puts ${axis.name} at ${fmt(v)} mm, outside ${axis.min}..${axis.max}`,
                    target.at,
                    { subject: target.name }
                );
                inside = false;
            }
        }
        return inside ? coordinates : null;
    }

    private buildSet(device: DeviceSpec, values: Values): StepAction | null {
        const parameter = nameOf(values, 'parameter');
        const value = numberOf(values, 'value');
        const spec = device.parameters[parameter.name];

        if (!spec) {
            const known = Object.keys(device.parameters).sort();
            this.sink.report(
                'UNKNOWN_PARAMETER',
                `Device "${device.name}" has no settable parameter "${parameter.name}"` +
                    (known.length ? ` (settable: ${known.join(', ')})` : ''),
                parameter.at,
                { subject: parameter.name }
            );
            return null;
        }

        let converted = value.value;
        if (value.unit !== null) {
            const given = unitByText(value.unit);
            const declared = spec.unit === null ? undefined : unitByText(spec.unit);
            if (spec.unit === null || !given || !declared || given.dimension !== declared.dimension) {
                this.sink.report(
                    'INVALID_PARAMETER',
                    spec.unit === null
                        ? `${parameter.name} takes a plain number, got ${value.unit}`
                        : `${parameter.name} is set in ${spec.unit}, got ${value.unit}`,
                    value.at,
                    { subject: parameter.name }
                );
                return null;
            }
            converted = canonical((value.value * given.factor) / declared.factor);
        }

        if (converted < spec.min || converted > spec.max) {
            this.sink.report(
                'OUT_OF_RANGE',
                `${parameter.name} ${fmt(converted)}${spec.unit ?? ''} is outside ${spec.min}..${spec.max}${spec.unit ?? ''}`,
                value.at,
                { subject: parameter.name }
            );
            return null;
        }

        return { op: 'set_parameter', parameter: parameter.name, value: converted, unit: spec.unit };
    }

    private checkEnvelope(device: DeviceSpec, key: string, value: { value: number; at: At }, unit: string): void {
        const range = device.envelope[key];
        if (!range) return;
        if (value.value < range.min || value.value > range.max) {
            this.sink.report(
                'OUT_OF_RANGE',
                `${key} ${fmt(value.value)} ${unit} is outside the safe range of "${device.name}" (${range.min}..${range.max} ${unit})`,
                value.at,
                { subject: key }
            );
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function stepName(statement: StatementNode, id: StepId): string {
    return statement.label ? statement.label.name : `${OPERATION_SCHEMAS[statement.keyword].operation}#${id}`;
}

// Binding has already reported any missing required argument, so these only
// run on complete value maps.
function numberOf(values: Values, name: string): { value: number; unit: string | null; at: At } {
    const v = values.get(name);
    if (!v || v.kind !== 'number') throw new Error(`analyzer: ${name} was not bound to a number`);
    return v;
}

function nameOf(values: Values, name: string): { name: string; explicit: boolean; at: At } {
    const v = values.get(name);
    if (!v || v.kind !== 'name') throw new Error(`analyzer: ${name} was not bound to a name`);
    return v;
}

function mixModeOf(name: string): MixMode {
    const mode = MIX_MODES.find((m) => m === name);
    if (!mode) throw new Error(`analyzer: unknown mix mode ${name}`);
    return mode;
}

/**
 * Kahn's algorithm, always taking the lowest ready id so independent steps
 * keep their declaration order.
 */
export function topologicalOrder(successors: readonly (readonly StepId[])[]): StepId[] {
    const indegree = successors.map(() => 0);
    for (const edges of successors) {
        for (const to of edges) indegree[to]++;
    }

    const ready: StepId[] = [];
    indegree.forEach((d, id) => {
        if (d === 0) ready.push(id);
    });

    const order: StepId[] = [];
    while (ready.length) {
        const id = ready.shift();
        if (id === undefined) break;
        order.push(id);
        for (const to of successors[id]) {
            if (--indegree[to] === 0) insertSorted(ready, to);
        }
    }
    return order;
}

function insertSorted(list: StepId[], value: StepId): void {
    let lo = 0;
    let hi = list.length;
    while (lo < hi) {
        const mid = (lo + hi) >> 1;
        if (list[mid] < value) lo = mid + 1;
        else hi = mid;
    }
    list.splice(lo, 0, value);
}
