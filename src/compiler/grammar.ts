/**
 * Grammar table for method text (grammar version 1.0, see docs/GRAMMAR.md).
 *
 * The lexer tries every rule at the current position and keeps the longest
 * match; equal-length matches go to the rule declared first. Keywords are
 * declared before the identifier rule, so `mix` is a keyword while `mixer1`
 * is an identifier.
 */

import { StatementKeyword, TokenKind } from './types';

export interface LexRule {
    kind: TokenKind;
    /** Shown in "expected ..." messages */
    label: string;
    /** Length of the match at `pos`, 0 when the rule does not apply */
    match(source: string, pos: number): number;
}

function literal(kind: TokenKind, text: string): LexRule {
    return {
        kind,
        label: kind === 'keyword' ? text : `'${text}'`,
        match: (source, pos) => (source.startsWith(text, pos) ? text.length : 0),
    };
}

function pattern(kind: TokenKind, label: string, re: RegExp): LexRule {
    const sticky = new RegExp(re.source, 'y');
    return {
        kind,
        label,
        match: (source, pos) => {
            sticky.lastIndex = pos;
            const m = sticky.exec(source);
            return m ? m[0].length : 0;
        },
    };
}

export const STATEMENT_KEYWORDS: readonly StatementKeyword[] = ['dispense', 'mix', 'sample', 'wait', 'move', 'set'];

export const CONSTRAINT_KEYWORDS = ['after', 'before'] as const;

export const LEX_RULES: readonly LexRule[] = [
    ...STATEMENT_KEYWORDS.map((k) => literal('keyword', k)),
    ...CONSTRAINT_KEYWORDS.map((k) => literal('keyword', k)),
    literal('punct', '('),
    literal('punct', ')'),
    literal('punct', ','),
    literal('punct', ':'),
    literal('punct', '='),
    literal('delimiter', ';'),
    pattern('number', 'number', /[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?/),
    pattern('identifier', 'identifier', /[A-Za-z_][A-Za-z0-9_]*/),
];

/** Everything a token could have started with, for error messages. */
export const TOKEN_START_LABELS: readonly string[] = [...new Set([...LEX_RULES.map((r) => r.label), 'string'])];

/* -------------------------------------------------------------------------- */
/* Units                                                                      */
/* -------------------------------------------------------------------------- */

export type Dimension = 'volume' | 'duration' | 'speed' | 'length' | 'temperature';

export interface UnitDef {
    text: string;
    dimension: Dimension;
    /** Multiplier to the canonical unit of the dimension */
    factor: number;
}

/** Canonical units: mL, s, rpm, mm, C. */
export const CANONICAL_UNIT: Record<Dimension, string> = {
    volume: 'mL',
    duration: 's',
    speed: 'rpm',
    length: 'mm',
    temperature: 'C',
};

export const UNITS: readonly UnitDef[] = [
    { text: 'uL', dimension: 'volume', factor: 0.001 },
    { text: 'mL', dimension: 'volume', factor: 1 },
    { text: 'L', dimension: 'volume', factor: 1000 },
    { text: 'ms', dimension: 'duration', factor: 0.001 },
    { text: 's', dimension: 'duration', factor: 1 },
    { text: 'sec', dimension: 'duration', factor: 1 },
    { text: 'min', dimension: 'duration', factor: 60 },
    { text: 'h', dimension: 'duration', factor: 3600 },
    { text: 'rpm', dimension: 'speed', factor: 1 },
    { text: 'mm', dimension: 'length', factor: 1 },
    { text: 'cm', dimension: 'length', factor: 10 },
    { text: 'C', dimension: 'temperature', factor: 1 },
];

/** Longest unit suffix at `pos`, ties to the earlier declaration. */
export function matchUnit(source: string, pos: number): UnitDef | null {
    let best: UnitDef | null = null;
    for (const unit of UNITS) {
        if (source.startsWith(unit.text, pos) && (!best || unit.text.length > best.text.length)) {
            best = unit;
        }
    }
    return best;
}

export function unitByText(text: string): UnitDef | undefined {
    return UNITS.find((u) => u.text === text);
}

export function isIdentifierChar(ch: string | undefined): boolean {
    return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}
