/**
 * ProtocolKernel - the gateway-facing facade.
 *
 * Compiles method text against a device registry (with an LRU cache of
 * results) and hands compiled streams to the execution orchestrator, which
 * owns the one active run on the controller connection.
 */

import { CompileCache, CompileCacheStats } from './compiler/compile_cache';
import type { CompileOptions, CompileResult } from './compiler/compile';
import { parseProtocol } from './compiler/parser';
import { printDocument } from './compiler/printer';
import type { CommandStream } from './compiler/types';
import { COMPILE_CACHE } from './config';
import { DeviceRegistry } from './device_registry';
import { createLogger } from './logger';
import { ExecutionOrchestrator, OrchestratorOptions, RecoverOptions, RunHandle } from './runtime/execution_orchestrator';
import { HardwareController, RunSnapshot } from './runtime/types';
import { Result, RunStatus, formatDiagnostic } from './structured_error';

const log = createLogger('kernel');

export interface KernelOptions {
    registry: DeviceRegistry;
    controller: HardwareController;
    compile?: CompileOptions;
    orchestrator?: OrchestratorOptions;
    cacheSize?: number;
}

export class ProtocolKernel {
    readonly registry: DeviceRegistry;
    readonly orchestrator: ExecutionOrchestrator;

    private readonly cache: CompileCache;
    private readonly compileOptions: CompileOptions;

    constructor(options: KernelOptions) {
        this.registry = options.registry;
        this.compileOptions = options.compile ?? {};
        this.cache = new CompileCache(options.cacheSize ?? COMPILE_CACHE.MAX_ENTRIES);
        this.orchestrator = new ExecutionOrchestrator(options.controller, options.orchestrator);
    }

    /* ------------------------------------------------------------------------ */
    /* Compilation                                                              */
    /* ------------------------------------------------------------------------ */

    compile(source: string): CompileResult {
        return this.cache.compile(source, this.registry, this.compileOptions);
    }

    /** Canonical printed form of the method text, or the first syntax problem. */
    pretty(source: string): Result<string> {
        const parsed = parseProtocol(source);
        if (parsed.errors.length) {
            return { ok: false, error: parsed.errors[0].code, message: parsed.errors.map(formatDiagnostic).join('\n') };
        }
        return { ok: true, value: printDocument(parsed.document) };
    }

    cacheStats(): CompileCacheStats {
        return this.cache.stats();
    }

    /* ------------------------------------------------------------------------ */
    /* Execution                                                                */
    /* ------------------------------------------------------------------------ */

    start(stream: CommandStream): Result<RunHandle> {
        return this.orchestrator.start(stream);
    }

    /** Compile and start in one step; compile diagnostics come back as the refusal message. */
    execute(source: string): Result<RunHandle> {
        const compiled = this.compile(source);
        if (!compiled.ok) {
            log.warn('Refusing to start: compilation failed', { stage: compiled.stage, errors: compiled.diagnostics.length });
            return {
                ok: false,
                error: compiled.diagnostics[0].code,
                message: compiled.diagnostics.map(formatDiagnostic).join('\n'),
            };
        }
        return this.start(compiled.stream);
    }

    recover(stream: CommandStream, runId: string, options: RecoverOptions = {}): Result<RunHandle> {
        return this.orchestrator.recover(stream, runId, options);
    }

    pause(): Result<RunStatus> {
        return this.orchestrator.pause();
    }

    resume(): Result<RunStatus> {
        return this.orchestrator.resume();
    }

    abort(reason?: string): Result<RunStatus> {
        return this.orchestrator.abort(reason);
    }

    snapshot(): RunSnapshot | null {
        return this.orchestrator.snapshot();
    }

    close(): void {
        this.orchestrator.journal.close();
    }
}
