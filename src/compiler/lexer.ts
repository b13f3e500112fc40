/**
 * Method-text Lexer
 *
 * Produces tokens lazily from a generator. Problems do not stop the scan:
 * each one is recorded as a SyntaxError diagnostic and the offending
 * character is skipped, so the parser can report everything in one pass.
 *
 * Token kinds:
 * - keyword: operation names and `after` / `before`
 * - identifier: device names, labels, parameter and position names
 * - number: numeric literal, optionally followed by an attached unit token
 * - unit: suffix directly after a number (`5mL`, `100rpm`)
 * - string: "..." with \" and \\ escapes
 * - punct: ( ) , : =
 * - delimiter: `;` or a newline outside parentheses
 * - eof
 *
 * An unclosed `(` does not swallow the rest of the text: `;` closes it, and
 * so does a newline whose next line opens a statement (`keyword(` or
 * `label: keyword(`).
 *
 * `#` and `//` comments run to end of line; they are discarded but their
 * spans are kept on `comments`.
 */

import { Diagnostic, createDiagnostic } from '../structured_error';
import { LEX_RULES, STATEMENT_KEYWORDS, TOKEN_START_LABELS, UNITS, isIdentifierChar, matchUnit } from './grammar';
import { Position, Span, Token, TokenKind } from './types';

const STATEMENT_START = new RegExp(
    `[ \\t\\r]*(?:[A-Za-z_][A-Za-z0-9_]*[ \\t]*:[ \\t]*)?(?:${STATEMENT_KEYWORDS.join('|')})[ \\t]*\\(`,
    'y'
);

export interface LexerResult {
    tokens: Token[];
    errors: Diagnostic[];
    comments: Span[];
}

/**
 * Tokenize a whole source eagerly.
 */
export function tokenize(source: string): LexerResult {
    const lexer = new Lexer(source);
    const tokens = [...lexer.tokens()];
    return { tokens, errors: lexer.errors, comments: lexer.comments };
}

export class Lexer {
    readonly errors: Diagnostic[] = [];
    readonly comments: Span[] = [];

    private pos = 0;
    private line = 1;
    private column = 1;
    private parenDepth = 0;

    constructor(private readonly source: string) {}

    *tokens(): Generator<Token, void, undefined> {
        while (this.pos < this.source.length) {
            const ch = this.source[this.pos];

            if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\uFEFF') {
                this.advance(1);
                continue;
            }

            if (ch === '\n') {
                const start = this.here();
                this.advance(1);
                if (this.parenDepth > 0 && this.atStatementStart()) {
                    this.parenDepth = 0;
                }
                if (this.parenDepth === 0) {
                    yield { kind: 'delimiter', text: '\n', span: { start, end: this.here() } };
                }
                continue;
            }

            if (ch === '#' || (ch === '/' && this.source[this.pos + 1] === '/')) {
                this.scanComment();
                continue;
            }

            if (ch === '"') {
                const token = this.scanString();
                if (token) yield token;
                continue;
            }

            const token = this.scanRule();
            if (!token) continue;
            yield token;

            if (token.kind === 'number') {
                const unit = this.scanUnit();
                if (unit) yield unit;
            } else if (token.text === '(') {
                this.parenDepth++;
            } else if (token.text === ')' && this.parenDepth > 0) {
                this.parenDepth--;
            } else if (token.kind === 'delimiter') {
                this.parenDepth = 0;
            }
        }

        const end = this.here();
        yield { kind: 'eof', text: '', span: { start: end, end } };
    }

    /* ------------------------------------------------------------------------ */
    /* Scanners                                                                 */
    /* ------------------------------------------------------------------------ */

    private atStatementStart(): boolean {
        STATEMENT_START.lastIndex = this.pos;
        return STATEMENT_START.test(this.source);
    }

    private scanRule(): Token | null {
        let bestLength = 0;
        let bestKind: TokenKind | null = null;

        for (const rule of LEX_RULES) {
            const length = rule.match(this.source, this.pos);
            if (length > bestLength) {
                bestLength = length;
                bestKind = rule.kind;
            }
        }

        if (!bestKind) {
            const at = this.here();
            this.errors.push(createDiagnostic(
                'UNEXPECTED_CHARACTER',
                `Unexpected character ${JSON.stringify(this.source[this.pos])}`,
                { line: at.line, column: at.column, expected: TOKEN_START_LABELS.slice() }
            ));
            this.advance(1);
            return null;
        }

        return this.take(bestKind, bestLength);
    }

    private scanUnit(): Token | null {
        const unit = matchUnit(this.source, this.pos);
        const after = this.pos + (unit ? unit.text.length : 0);

        if (isIdentifierChar(this.source[after])) {
            // A suffix that is not exactly a known unit, e.g. `5x` or `5mLs`.
            const start = this.here();
            let end = this.pos;
            while (isIdentifierChar(this.source[end])) end++;
            const suffix = this.source.slice(this.pos, end);
            this.errors.push(createDiagnostic(
                'INVALID_UNIT',
                `Unknown unit "${suffix}"`,
                { line: start.line, column: start.column, expected: UNITS.map((u) => u.text) }
            ));
            this.advance(end - this.pos);
            return null;
        }

        return unit ? this.take('unit', unit.text.length) : null;
    }

    private scanString(): Token | null {
        const start = this.here();
        this.advance(1); // opening quote

        let value = '';
        while (this.pos < this.source.length) {
            const ch = this.source[this.pos];
            if (ch === '\n') break;
            if (ch === '"') {
                this.advance(1);
                return { kind: 'string', text: value, span: { start, end: this.here() } };
            }
            if (ch === '\\' && (this.source[this.pos + 1] === '"' || this.source[this.pos + 1] === '\\')) {
                value += this.source[this.pos + 1];
                this.advance(2);
                continue;
            }
            value += ch;
            this.advance(1);
        }

        this.errors.push(createDiagnostic(
            'UNTERMINATED_STRING',
            'Unterminated string literal',
            { line: start.line, column: start.column, expected: ['\'"\''] }
        ));
        return null;
    }

    private scanComment(): void {
        const start = this.here();
        let end = this.pos;
        while (end < this.source.length && this.source[end] !== '\n') end++;
        this.advance(end - this.pos);
        this.comments.push({ start, end: this.here() });
    }

    /* ------------------------------------------------------------------------ */
    /* Position helpers                                                         */
    /* ------------------------------------------------------------------------ */

    private take(kind: TokenKind, length: number): Token {
        const start = this.here();
        const text = this.source.slice(this.pos, this.pos + length);
        this.advance(length);
        return { kind, text, span: { start, end: this.here() } };
    }

    private here(): Position {
        return { offset: this.pos, line: this.line, column: this.column };
    }

    private advance(count: number): void {
        for (let i = 0; i < count && this.pos < this.source.length; i++) {
            if (this.source[this.pos] === '\n') {
                this.line++;
                this.column = 1;
            } else {
                this.column++;
            }
            this.pos++;
        }
    }
}
