/**
 * Recursive-descent parser for method text.
 *
 *   document   := { delimiter } { statement ( delimiter | eof ) { delimiter } }
 *   statement  := [ identifier ':' ] keyword '(' [ argument { ',' argument } ] ')' { constraint }
 *   argument   := identifier '=' value | value
 *   value      := number [ unit ] | identifier | string
 *   constraint := ( 'after' | 'before' ) identifier { ',' identifier }
 *
 * On a syntax error the parser records a diagnostic, skips to the next
 * statement delimiter and carries on.
 */

import { Diagnostic, createDiagnostic } from '../structured_error';
import { STATEMENT_KEYWORDS } from './grammar';
import { Lexer } from './lexer';
import {
    ArgumentNode,
    ConstraintNode,
    ConstraintRelation,
    NameRef,
    ProtocolDocument,
    Span,
    StatementKeyword,
    StatementNode,
    Token,
    ValueNode,
} from './types';

export interface ParseResult {
    document: ProtocolDocument;
    /** Lexical and syntactic problems, in source order */
    errors: Diagnostic[];
}

export function parseProtocol(source: string): ParseResult {
    const lexer = new Lexer(source);
    const parser = new Parser(lexer.tokens());
    const statements = parser.parseDocument();

    const errors = [...lexer.errors, ...parser.errors].sort(
        (a, b) => (a.line ?? 0) - (b.line ?? 0) || (a.column ?? 0) - (b.column ?? 0)
    );

    return {
        document: { statements, comments: lexer.comments },
        errors,
    };
}

class ParseAbort extends Error {}

function isStatementKeyword(text: string): text is StatementKeyword {
    return STATEMENT_KEYWORDS.some((k) => k === text);
}

function isConstraintRelation(text: string): text is ConstraintRelation {
    return text === 'after' || text === 'before';
}

class Parser {
    readonly errors: Diagnostic[] = [];

    private current: Token;

    constructor(private readonly stream: Iterator<Token, void, undefined>) {
        this.current = this.pull();
    }

    parseDocument(): StatementNode[] {
        const statements: StatementNode[] = [];

        while (this.current.kind !== 'eof') {
            if (this.current.kind === 'delimiter') {
                this.advance();
                continue;
            }

            try {
                statements.push(this.parseStatement());
                const next: Token = this.current;
                if (next.kind !== 'eof') {
                    this.expectDelimiter();
                }
            } catch (e) {
                if (!(e instanceof ParseAbort)) throw e;
                this.synchronize();
            }
        }

        return statements;
    }

    /* ------------------------------------------------------------------------ */
    /* Productions                                                              */
    /* ------------------------------------------------------------------------ */

    private parseStatement(): StatementNode {
        const start = this.current.span.start;
        let label: NameRef | null = null;

        if (this.current.kind === 'identifier') {
            label = { name: this.current.text, span: this.current.span };
            this.advance();
            this.expectPunct(':', ['\':\'']);
        }

        const keywordToken = this.current;
        if (keywordToken.kind !== 'keyword' || !isStatementKeyword(keywordToken.text)) {
            throw this.fail(label ? [...STATEMENT_KEYWORDS] : ['label', ...STATEMENT_KEYWORDS]);
        }
        const keyword = keywordToken.text;
        this.advance();

        this.expectPunct('(', ['\'(\'']);
        const args: ArgumentNode[] = [];
        if (!this.isPunct(')')) {
            args.push(this.parseArgument());
            while (this.isPunct(',')) {
                this.advance();
                args.push(this.parseArgument());
            }
        }
        let end = this.current.span.end;
        this.expectPunct(')', ['\',\'', '\')\'']);

        const constraints: ConstraintNode[] = [];
        while (this.current.kind === 'keyword' && isConstraintRelation(this.current.text)) {
            const constraint = this.parseConstraint(this.current.text);
            end = constraint.span.end;
            constraints.push(constraint);
        }

        return { kind: 'statement', keyword, label, args, constraints, span: { start, end } };
    }

    private parseArgument(): ArgumentNode {
        const start = this.current.span.start;

        if (this.current.kind === 'identifier') {
            const nameToken = this.current;
            this.advance();
            if (this.isPunct('=')) {
                this.advance();
                const value = this.parseValue();
                return { kind: 'argument', name: nameToken.text, value, span: { start, end: value.span.end } };
            }
            const value: ValueNode = { kind: 'name', name: nameToken.text, span: nameToken.span };
            return { kind: 'argument', name: null, value, span: nameToken.span };
        }

        const value = this.parseValue();
        return { kind: 'argument', name: null, value, span: value.span };
    }

    private parseValue(): ValueNode {
        const token = this.current;

        if (token.kind === 'number') {
            this.advance();
            const value = Number(token.text);
            if (this.current.kind === 'unit') {
                const unit = this.current;
                this.advance();
                return { kind: 'quantity', value, unit: unit.text, text: token.text, span: spanOf(token.span, unit.span) };
            }
            return { kind: 'quantity', value, unit: null, text: token.text, span: token.span };
        }

        if (token.kind === 'identifier') {
            this.advance();
            return { kind: 'name', name: token.text, span: token.span };
        }

        if (token.kind === 'string') {
            this.advance();
            return { kind: 'string', value: token.text, span: token.span };
        }

        throw this.fail(['number', 'identifier', 'string']);
    }

    private parseConstraint(relation: ConstraintRelation): ConstraintNode {
        const start = this.current.span.start;
        this.advance();

        const targets: NameRef[] = [this.expectIdentifier()];
        while (this.isPunct(',')) {
            this.advance();
            targets.push(this.expectIdentifier());
        }

        const last = targets[targets.length - 1];
        return { kind: 'constraint', relation, targets, span: { start, end: last.span.end } };
    }

    /* ------------------------------------------------------------------------ */
    /* Token helpers                                                            */
    /* ------------------------------------------------------------------------ */

    private pull(): Token {
        const next = this.stream.next();
        if (next.done) {
            // The lexer always ends with eof; keep returning it.
            return this.current;
        }
        return next.value;
    }

    private advance(): void {
        if (this.current.kind !== 'eof') {
            this.current = this.pull();
        }
    }

    private isPunct(text: string): boolean {
        return this.current.kind === 'punct' && this.current.text === text;
    }

    private expectPunct(text: string, expected: string[]): void {
        if (!this.isPunct(text)) throw this.fail(expected);
        this.advance();
    }

    private expectIdentifier(): NameRef {
        if (this.current.kind !== 'identifier') throw this.fail(['label']);
        const ref = { name: this.current.text, span: this.current.span };
        this.advance();
        return ref;
    }

    private expectDelimiter(): void {
        if (this.current.kind !== 'delimiter') {
            this.fail(['\';\'', 'newline', 'after', 'before']);
            this.synchronize();
            return;
        }
        this.advance();
    }

    private fail(expected: string[]): ParseAbort {
        const token = this.current;
        const found = token.kind === 'eof' ? 'end of input' : token.kind === 'delimiter' && token.text === '\n' ? 'newline' : `"${token.text}"`;
        this.errors.push(createDiagnostic(
            'UNEXPECTED_TOKEN',
            `Unexpected ${found}, expected ${expected.join(' or ')}`,
            { line: token.span.start.line, column: token.span.start.column, expected }
        ));
        return new ParseAbort();
    }

    /** Skip to just past the next statement delimiter. */
    private synchronize(): void {
        while (this.current.kind !== 'eof' && this.current.kind !== 'delimiter') {
            this.advance();
        }
        this.advance();
    }
}

function spanOf(a: Span, b: Span): Span {
    return { start: a.start, end: b.end };
}
