/**
 * Canonical pretty-printer for method text. One statement per line, single
 * spaces after commas, constraints after the closing parenthesis:
 *
 *   prime: dispense(deviceA, 5mL)
 *   mix(deviceB, 100rpm, 10s, mode=linear) after prime
 */

import { ArgumentNode, ConstraintNode, ProtocolDocument, StatementNode, ValueNode } from './types';

export function printDocument(document: ProtocolDocument): string {
    return document.statements.map(printStatement).join('\n') + (document.statements.length ? '\n' : '');
}

export function printStatement(statement: StatementNode): string {
    const label = statement.label ? `${statement.label.name}: ` : '';
    const args = statement.args.map(printArgument).join(', ');
    const constraints = statement.constraints.map((c) => ' ' + printConstraint(c)).join('');
    return `${label}${statement.keyword}(${args})${constraints}`;
}

function printArgument(arg: ArgumentNode): string {
    const value = printValue(arg.value);
    return arg.name !== null ? `${arg.name}=${value}` : value;
}

function printConstraint(constraint: ConstraintNode): string {
    return `${constraint.relation} ${constraint.targets.map((t) => t.name).join(', ')}`;
}

function printValue(value: ValueNode): string {
    switch (value.kind) {
        case 'quantity':
            return value.text + (value.unit ?? '');
        case 'name':
            return value.name;
        case 'string':
            return '"' + value.value.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"';
    }
}

/* -------------------------------------------------------------------------- */
/* Structural form                                                            */
/* -------------------------------------------------------------------------- */

export type StructuralValue =
    | { kind: 'quantity'; value: number; unit: string | null }
    | { kind: 'name'; name: string }
    | { kind: 'string'; value: string };

export interface StructuralStatement {
    keyword: string;
    label: string | null;
    args: { name: string | null; value: StructuralValue }[];
    constraints: { relation: string; targets: string[] }[];
}

/**
 * The document with every span removed, for comparing trees parsed from
 * differently formatted text.
 */
export function structuralForm(document: ProtocolDocument): StructuralStatement[] {
    return document.statements.map((s) => ({
        keyword: s.keyword,
        label: s.label ? s.label.name : null,
        args: s.args.map((a) => ({ name: a.name, value: structuralValue(a.value) })),
        constraints: s.constraints.map((c) => ({ relation: c.relation, targets: c.targets.map((t) => t.name) })),
    }));
}

function structuralValue(value: ValueNode): StructuralValue {
    switch (value.kind) {
        case 'quantity':
            return { kind: 'quantity', value: value.value, unit: value.unit };
        case 'name':
            return { kind: 'name', name: value.name };
        case 'string':
            return { kind: 'string', value: value.value };
    }
}
