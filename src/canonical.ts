// src/canonical.ts

import * as crypto from 'crypto';

/**
 * JSON with object keys sorted at every level, so equal values always
 * serialize to equal bytes.
 */
export function stableStringify(value: unknown): string {
    if (value === null) return 'null';
    const t = typeof value;

    if (t === 'number') {
        if (!Number.isFinite(value)) throw new Error('NON_FINITE_NUMBER');
        return JSON.stringify(value);
    }
    if (t === 'boolean' || t === 'string') return JSON.stringify(value);

    if (Array.isArray(value)) {
        return '[' + value.map(stableStringify).join(',') + ']';
    }

    if (typeof value === 'object') {
        const entries = Object.entries(value).filter(([, v]) => v !== undefined);
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return '{' + entries.map(([k, v]) => JSON.stringify(k) + ':' + stableStringify(v)).join(',') + '}';
    }

    // undefined, function, symbol, bigint
    throw new Error('UNSUPPORTED_JSON_TYPE');
}

export function sha256Hex(data: string | Buffer): string {
    return crypto.createHash('sha256').update(data).digest('hex');
}
