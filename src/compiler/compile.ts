/**
 * End-to-end compilation: method text -> syntax tree -> Program ->
 * CommandStream. Pure; safe to call concurrently.
 *
 * Problems come back as diagnostics in the result. Nothing is thrown for
 * bad input.
 */

import { sha256Hex } from '../canonical';
import { GRAMMAR_VERSION, LIMITS } from '../config';
import { DeviceRegistry } from '../device_registry';
import { createLogger } from '../logger';
import { Diagnostic, createDiagnostic } from '../structured_error';
import { analyze } from './analyzer';
import { generateCommands } from './codegen';
import { renderStream } from './gcode';
import { parseProtocol } from './parser';
import { CommandStream, Program } from './types';

const log = createLogger('compiler');

export type CompileStage = 'syntax' | 'semantic' | 'lowering';

export interface CompileOptions {
    maxErrors?: number;
    maxDwellS?: number;
    maxSourceChars?: number;
    optimize?: boolean;
}

/** Record of a successful compilation, kept alongside the run for audit. */
export interface CompileAudit {
    sourceSha256: string;
    grammarVersion: string;
    registryFingerprint: string;
    streamDigest: string;
    stepCount: number;
    commandCount: number;
    gcode: string;
}

export type CompileResult =
    | {
        ok: true;
        program: Program;
        stream: CommandStream;
        audit: CompileAudit;
        diagnostics: Diagnostic[];
    }
    | {
        ok: false;
        stage: CompileStage;
        diagnostics: Diagnostic[];
    };

export function compileProtocol(
    source: string,
    registry: DeviceRegistry,
    options: CompileOptions = {}
): CompileResult {
    const maxSourceChars = options.maxSourceChars ?? LIMITS.MAX_SOURCE_CHARS;
    if (source.length > maxSourceChars) {
        return fail('syntax', [createDiagnostic(
            'SOURCE_TOO_LARGE',
            `Method text is ${source.length} characters; the limit is ${maxSourceChars}`
        )]);
    }

    const parsed = parseProtocol(source);
    if (parsed.errors.length) return fail('syntax', parsed.errors);

    const analysis = analyze(parsed.document, registry, {
        maxErrors: options.maxErrors,
        maxDwellS: options.maxDwellS,
    });
    if (!analysis.program) return fail('semantic', analysis.errors);

    const generated = generateCommands(analysis.program, registry, {
        optimize: options.optimize,
        maxDwellS: options.maxDwellS,
    });
    if (!generated.stream) return fail('lowering', generated.errors);

    const { program } = analysis;
    const { stream } = generated;
    log.debug('Compiled method', {
        steps: program.steps.length,
        commands: stream.commands.length,
        digest: stream.digest.slice(0, 12),
    });

    return {
        ok: true,
        program,
        stream,
        audit: {
            sourceSha256: sha256Hex(source),
            grammarVersion: GRAMMAR_VERSION,
            registryFingerprint: program.registryFingerprint,
            streamDigest: stream.digest,
            stepCount: program.steps.length,
            commandCount: stream.commands.length,
            gcode: renderStream(stream),
        },
        diagnostics: [],
    };
}

function fail(stage: CompileStage, diagnostics: Diagnostic[]): CompileResult {
    log.debug('Compilation failed', { stage, errors: diagnostics.length, first: diagnostics[0]?.code });
    return { ok: false, stage, diagnostics };
}
