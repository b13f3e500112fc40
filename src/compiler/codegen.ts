/**
 * Code Generator: Program -> CommandStream.
 *
 *   lower -> coalesce -> bounds check -> drop no-ops -> number from 0
 */

import { sha256Hex, stableStringify } from '../canonical';
import { GRAMMAR_VERSION, LIMITS } from '../config';
import { DeviceRegistry } from '../device_registry';
import { Diagnostic, createDiagnostic } from '../structured_error';
import { checkEnvelope } from './envelope';
import { CommandDraft, lowerProgram } from './lowering';
import { coalesce, eliminateNoOps } from './optimizer';
import { Command, CommandStream, Program } from './types';

export interface CodegenOptions {
    /** Run coalescing and no-op elimination (default true); bounds are always checked */
    optimize?: boolean;
    maxDwellS?: number;
}

export interface CodegenResult {
    /** Null whenever `errors` is non-empty */
    stream: CommandStream | null;
    errors: Diagnostic[];
}

export function generateCommands(
    program: Program,
    registry: DeviceRegistry,
    options: CodegenOptions = {}
): CodegenResult {
    const optimize = options.optimize ?? true;
    const maxDwellS = options.maxDwellS ?? LIMITS.MAX_DWELL_S;

    if (program.registryFingerprint !== registry.fingerprint()) {
        return {
            stream: null,
            errors: [createDiagnostic(
                'REGISTRY_MISMATCH',
                'Program was analyzed against a different device registry; analyze it again'
            )],
        };
    }

    const lowered = lowerProgram(program, registry);
    if (lowered.errors.length) return { stream: null, errors: lowered.errors };

    let drafts = lowered.drafts;
    if (optimize) drafts = coalesce(drafts, registry, { maxDwellS });

    const violations = checkEnvelope(drafts, program, registry, { maxDwellS });
    if (violations.length) return { stream: null, errors: violations };

    if (optimize) drafts = eliminateNoOps(drafts);

    return { stream: buildStream(drafts), errors: [] };
}

/** Assign contiguous sequence numbers from 0, freeze, and digest. */
export function buildStream(drafts: readonly CommandDraft[]): CommandStream {
    const commands: Command[] = drafts.map((d, seq) => Object.freeze({
        seq,
        opcode: d.opcode,
        device: d.device,
        channel: d.channel,
        args: Object.freeze({ ...d.args }),
        steps: Object.freeze([...d.steps]),
    }));

    return Object.freeze({
        commands: Object.freeze(commands),
        digest: sha256Hex(stableStringify(commands)),
        grammarVersion: GRAMMAR_VERSION,
    });
}
