/**
 * LRU cache of compile results keyed by what determines them: the text, the
 * grammar version, the registry fingerprint and the compile options.
 *
 * Callers get their own copy of a result; the stored one is never handed out.
 */

import { LRUCache } from 'lru-cache';
import { sha256Hex, stableStringify } from '../canonical';
import { COMPILE_CACHE, GRAMMAR_VERSION } from '../config';
import { DeviceRegistry } from '../device_registry';
import { CompileOptions, CompileResult, compileProtocol } from './compile';

export interface CompileCacheStats {
    hits: number;
    misses: number;
    size: number;
}

export class CompileCache {
    private readonly cache: LRUCache<string, CompileResult>;
    private hits = 0;
    private misses = 0;

    constructor(maxEntries: number = COMPILE_CACHE.MAX_ENTRIES) {
        this.cache = new LRUCache<string, CompileResult>({ max: Math.max(1, maxEntries) });
    }

    static key(source: string, registry: DeviceRegistry, options: CompileOptions = {}): string {
        return sha256Hex([GRAMMAR_VERSION, registry.fingerprint(), stableStringify(options), source].join('\u0000'));
    }

    compile(source: string, registry: DeviceRegistry, options: CompileOptions = {}): CompileResult {
        const key = CompileCache.key(source, registry, options);
        const cached = this.cache.get(key);
        if (cached) {
            this.hits++;
            return structuredClone(cached);
        }
        this.misses++;
        const result = compileProtocol(source, registry, options);
        this.cache.set(key, result);
        return structuredClone(result);
    }

    clear(): void {
        this.cache.clear();
    }

    stats(): CompileCacheStats {
        return { hits: this.hits, misses: this.misses, size: this.cache.size };
    }
}
