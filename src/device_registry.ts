/**
 * Device Registry - resolves device names used in method text to their
 * declared capabilities and safe operating envelopes.
 *
 * Registry documents are JSON:
 *
 *   { "version": 1, "devices": [ { "name": "deviceA", "class": "dispenser", ... } ] }
 *
 * see tests/fixtures/devices.json for a complete example.
 */

import * as fs from 'fs';
import { stableStringify, sha256Hex } from './canonical';
import { ShakerSettingKey, SHAKER_DEFAULTS } from './config';
import { OPERATION_KINDS, OperationKind } from './compiler/types';
import { JsonSchema, SchemaValidator, ValidationError, isRecord } from './schema_validator';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type DeviceClass = 'dispenser' | 'sampler' | 'mixer' | 'shaker' | 'stage';

const DEVICE_CLASSES: readonly DeviceClass[] = ['dispenser', 'sampler', 'mixer', 'shaker', 'stage'];

export interface Range {
    min: number;
    max: number;
}

export interface AxisSpec {
    name: string;
    min: number;
    max: number;
    home: number;
}

export interface ParameterSpec extends Range {
    unit: string | null;
}

export interface DeviceSpec {
    readonly name: string;
    readonly deviceClass: DeviceClass;
    readonly operations: readonly OperationKind[];
    readonly axes: readonly AxisSpec[];
    /** Safe range per command argument (`volume`, `speed`, `duration`, `feed`) */
    readonly envelope: Readonly<Record<string, Range>>;
    /** Parameters settable with `set(...)` */
    readonly parameters: Readonly<Record<string, ParameterSpec>>;
    /** Named absolute positions, axis -> mm */
    readonly positions: Readonly<Record<string, Readonly<Record<string, number>>>>;
    readonly settings: Readonly<Partial<Record<ShakerSettingKey, number>>>;
}

export interface NotFound {
    readonly notFound: true;
    readonly name: string;
}

export interface DeviceRegistry {
    resolve(name: string): DeviceSpec | NotFound;
    /** Stable hash of the registry contents; changes whenever any device changes */
    fingerprint(): string;
}

export function isNotFound(value: DeviceSpec | NotFound): value is NotFound {
    return 'notFound' in value;
}

export class DeviceRegistryError extends Error {
    constructor(message: string, public readonly errors: ValidationError[] = []) {
        super(message);
        this.name = 'DeviceRegistryError';
    }
}

/** Argument name reserved for feed rate in move commands. */
export const FEED_ARG = 'feed';

/* -------------------------------------------------------------------------- */
/* Document schema                                                            */
/* -------------------------------------------------------------------------- */

const RANGE_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['min', 'max'],
    properties: {
        min: { type: 'number' },
        max: { type: 'number' },
        unit: { type: 'string' },
    },
    additionalProperties: false,
};

const DEVICE_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['name', 'class', 'operations'],
    properties: {
        name: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
        class: { type: 'string', enum: DEVICE_CLASSES },
        operations: { type: 'array', items: { type: 'string', enum: OPERATION_KINDS } },
        axes: {
            type: 'array',
            items: {
                type: 'object',
                required: ['name', 'min', 'max'],
                properties: {
                    name: { type: 'string', pattern: '^[a-z][a-z0-9_]*$' },
                    min: { type: 'number' },
                    max: { type: 'number' },
                    home: { type: 'number' },
                },
                additionalProperties: false,
            },
        },
        envelope: { type: 'object', additionalProperties: RANGE_SCHEMA },
        parameters: { type: 'object', additionalProperties: RANGE_SCHEMA },
        positions: {
            type: 'object',
            additionalProperties: { type: 'object', additionalProperties: { type: 'number' } },
        },
        settings: {
            type: 'object',
            properties: Object.fromEntries(Object.keys(SHAKER_DEFAULTS).map((k) => [k, { type: 'number' as const }])),
            additionalProperties: false,
        },
    },
    additionalProperties: false,
};

const REGISTRY_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['version', 'devices'],
    properties: {
        version: { type: 'number', enum: [1] },
        devices: { type: 'array', items: DEVICE_SCHEMA },
    },
    additionalProperties: false,
};

const validator = new SchemaValidator();
validator.registerSchema('device_registry_v1', REGISTRY_SCHEMA);

/* -------------------------------------------------------------------------- */
/* In-memory registry                                                         */
/* -------------------------------------------------------------------------- */

export class InMemoryDeviceRegistry implements DeviceRegistry {
    private readonly devices: Map<string, DeviceSpec>;
    private readonly hash: string;

    constructor(devices: readonly DeviceSpec[]) {
        this.devices = new Map();
        for (const device of devices) {
            if (this.devices.has(device.name)) {
                throw new DeviceRegistryError(`Duplicate device name: ${device.name}`);
            }
            checkDeviceConsistency(device);
            this.devices.set(device.name, device);
        }
        this.hash = fingerprintDevices(devices);
    }

    resolve(name: string): DeviceSpec | NotFound {
        return this.devices.get(name) ?? { notFound: true, name };
    }

    fingerprint(): string {
        return this.hash;
    }

    names(): string[] {
        return [...this.devices.keys()].sort();
    }
}

/**
 * Build a registry from a parsed JSON document. Throws DeviceRegistryError
 * carrying every schema violation found.
 */
export function registryFromDocument(doc: unknown): InMemoryDeviceRegistry {
    const result = validator.validate(doc, 'device_registry_v1');
    if (!result.valid) {
        const summary = result.errors.map((e) => `${e.path || '<root>'}: ${e.message}`).join('; ');
        throw new DeviceRegistryError(`Invalid device registry: ${summary}`, result.errors);
    }
    if (!isRecord(doc) || !Array.isArray(doc.devices)) {
        throw new DeviceRegistryError('Invalid device registry: devices must be an array');
    }
    return new InMemoryDeviceRegistry(doc.devices.map(toDeviceSpec));
}

export function loadDeviceRegistry(filePath: string): InMemoryDeviceRegistry {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new DeviceRegistryError(`Cannot read device registry ${filePath}: ${reason}`);
    }
    return registryFromDocument(parsed);
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function toDeviceSpec(raw: unknown): DeviceSpec {
    if (!isRecord(raw)) throw new DeviceRegistryError('Device entry must be an object');

    const axes: AxisSpec[] = Array.isArray(raw.axes)
        ? raw.axes.filter(isRecord).map((a) => ({
            name: String(a.name),
            min: Number(a.min),
            max: Number(a.max),
            home: typeof a.home === 'number' ? a.home : Number(a.min),
        }))
        : [];

    const parameters: Record<string, ParameterSpec> = {};
    for (const [key, value] of Object.entries(isRecord(raw.parameters) ? raw.parameters : {})) {
        if (!isRecord(value)) continue;
        parameters[key] = {
            min: Number(value.min),
            max: Number(value.max),
            unit: typeof value.unit === 'string' ? value.unit : null,
        };
    }

    return {
        name: String(raw.name),
        deviceClass: parseDeviceClass(raw.class),
        operations: Array.isArray(raw.operations) ? raw.operations.filter(isOperationKind) : [],
        axes,
        envelope: numberRecordOfRanges(raw.envelope),
        parameters,
        positions: positionsOf(raw.positions),
        settings: settingsOf(raw.settings),
    };
}

function parseDeviceClass(value: unknown): DeviceClass {
    const found = DEVICE_CLASSES.find((c) => c === value);
    if (!found) throw new DeviceRegistryError(`Unknown device class: ${String(value)}`);
    return found;
}

function isOperationKind(value: unknown): value is OperationKind {
    return OPERATION_KINDS.some((k) => k === value);
}

function numberRecordOfRanges(value: unknown): Record<string, Range> {
    const out: Record<string, Range> = {};
    if (!isRecord(value)) return out;
    for (const [key, range] of Object.entries(value)) {
        if (isRecord(range)) out[key] = { min: Number(range.min), max: Number(range.max) };
    }
    return out;
}

function positionsOf(value: unknown): Record<string, Record<string, number>> {
    const out: Record<string, Record<string, number>> = {};
    if (!isRecord(value)) return out;
    for (const [name, coords] of Object.entries(value)) {
        if (!isRecord(coords)) continue;
        const axes: Record<string, number> = {};
        for (const [axis, v] of Object.entries(coords)) {
            if (typeof v === 'number') axes[axis] = v;
        }
        out[name] = axes;
    }
    return out;
}

function isShakerSetting(key: string): key is ShakerSettingKey {
    return key in SHAKER_DEFAULTS;
}

function settingsOf(value: unknown): Partial<Record<ShakerSettingKey, number>> {
    const out: Partial<Record<ShakerSettingKey, number>> = {};
    if (!isRecord(value)) return out;
    for (const [key, v] of Object.entries(value)) {
        if (isShakerSetting(key) && typeof v === 'number') out[key] = v;
    }
    return out;
}

function checkDeviceConsistency(device: DeviceSpec): void {
    const axisNames = new Set<string>();
    for (const axis of device.axes) {
        if (axis.name === FEED_ARG) {
            throw new DeviceRegistryError(`${device.name}: axis name "${FEED_ARG}" is reserved`);
        }
        if (axisNames.has(axis.name)) {
            throw new DeviceRegistryError(`${device.name}: duplicate axis ${axis.name}`);
        }
        if (!(axis.min <= axis.home && axis.home <= axis.max)) {
            throw new DeviceRegistryError(
                `${device.name}: axis ${axis.name} requires min <= home <= max (got ${axis.min}, ${axis.home}, ${axis.max})`
            );
        }
        axisNames.add(axis.name);
    }
    for (const [name, range] of Object.entries(device.envelope)) {
        if (range.min > range.max) {
            throw new DeviceRegistryError(`${device.name}: envelope ${name} has min > max`);
        }
    }
    for (const [name, coords] of Object.entries(device.positions)) {
        for (const axis of Object.keys(coords)) {
            if (!axisNames.has(axis)) {
                throw new DeviceRegistryError(`${device.name}: position ${name} uses undeclared axis ${axis}`);
            }
        }
    }
}

function fingerprintDevices(devices: readonly DeviceSpec[]): string {
    const sorted = [...devices].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return sha256Hex(stableStringify(sorted));
}
