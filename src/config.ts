/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the protocol compiler and run orchestrator.
 * Values can be overridden via environment variables; per-instance options
 * passed to the compiler or orchestrator take precedence over these.
 */

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function envFloat(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const parsed = parseFloat(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

// Surface syntax contract for experiment authors (see docs/GRAMMAR.md)
export const GRAMMAR_VERSION = '1.0';

// Dispatch retry policy
export const RETRY = {
    MAX_RETRIES: envInt('LABMOTION_MAX_RETRIES', 3),
    BACKOFF_BASE_MS: envInt('LABMOTION_BACKOFF_BASE_MS', 200),
    BACKOFF_MAX_MS: envInt('LABMOTION_BACKOFF_MAX_MS', 5000),
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    ACK_MS: envInt('LABMOTION_ACK_TIMEOUT_MS', 30000),        // per dispatched command
    ABORT_WAIT_MS: envInt('LABMOTION_ABORT_WAIT_MS', 5000),    // emergency stop confirmation
    STATUS_QUERY_MS: envInt('LABMOTION_STATUS_TIMEOUT_MS', 5000),
};

// Compilation limits
export const LIMITS = {
    MAX_SEMANTIC_ERRORS: envInt('LABMOTION_MAX_SEMANTIC_ERRORS', 20),
    MAX_DWELL_S: envFloat('LABMOTION_MAX_DWELL_S', 3600),
    MAX_SOURCE_CHARS: envInt('LABMOTION_MAX_SOURCE_CHARS', 256 * 1024),
};

// Command journal
export const JOURNAL = {
    PATH: process.env.LABMOTION_JOURNAL_PATH || ':memory:',
    COMPACT_EVERY_ACKS: envInt('LABMOTION_JOURNAL_COMPACT_EVERY', 64), // 0 disables
};

export const COMPILE_CACHE = {
    MAX_ENTRIES: envInt('LABMOTION_COMPILE_CACHE_SIZE', 128),
};

// Moonraker / Klipper HTTP controller
export const MOONRAKER = {
    BASE_URL: process.env.LABMOTION_MOONRAKER_URL || 'http://127.0.0.1:7125',
    REQUEST_TIMEOUT_MS: envInt('LABMOTION_MOONRAKER_TIMEOUT_MS', 30000),
    MAX_ERROR_SNIPPET_CHARS: 200,
};

// Shaker trajectory defaults, used when a device declares no override
export const SHAKER_DEFAULTS = {
    centerX: 150,
    centerY: 150,
    centerZ: 10,
    orbitRadius: 5,
    linearAmplitude: 25,
    helicalRadius: 10,
    helicalAmplitudeZ: 5,
    helicalMaxFeed: 900,
    minFeed: 2000,
    travelFeed: 6000,
} as const;

export type ShakerSettingKey = keyof typeof SHAKER_DEFAULTS;

/**
 * Exponential backoff before retry attempt `retryNumber` (1-based).
 */
export function backoffDelayMs(
    retryNumber: number,
    baseMs: number = RETRY.BACKOFF_BASE_MS,
    maxMs: number = RETRY.BACKOFF_MAX_MS
): number {
    if (retryNumber < 1) return 0;
    return Math.min(maxMs, baseMs * 2 ** (retryNumber - 1));
}
