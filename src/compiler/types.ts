/**
 * Compiler data model: tokens, syntax tree, IR and command stream.
 */

/* -------------------------------------------------------------------------- */
/* Source positions                                                           */
/* -------------------------------------------------------------------------- */

export interface Position {
    /** 0-based UTF-16 offset */
    offset: number;
    /** 1-based */
    line: number;
    /** 1-based */
    column: number;
}

export interface Span {
    start: Position;
    end: Position;
}

/* -------------------------------------------------------------------------- */
/* Tokens                                                                     */
/* -------------------------------------------------------------------------- */

export type TokenKind =
    | 'keyword'
    | 'identifier'
    | 'number'
    | 'unit'
    | 'string'
    | 'punct'
    | 'delimiter'
    | 'eof';

export interface Token {
    readonly kind: TokenKind;
    /** Source text; for strings the unescaped contents */
    readonly text: string;
    readonly span: Span;
}

/* -------------------------------------------------------------------------- */
/* Syntax tree                                                                */
/* -------------------------------------------------------------------------- */

export type StatementKeyword = 'dispense' | 'mix' | 'sample' | 'wait' | 'move' | 'set';

export type ConstraintRelation = 'after' | 'before';

export interface NameRef {
    name: string;
    span: Span;
}

export type ValueNode =
    | { kind: 'quantity'; value: number; unit: string | null; text: string; span: Span }
    | { kind: 'name'; name: string; span: Span }
    | { kind: 'string'; value: string; span: Span };

export interface ArgumentNode {
    kind: 'argument';
    /** Set for `name=value` arguments */
    name: string | null;
    value: ValueNode;
    span: Span;
}

export interface ConstraintNode {
    kind: 'constraint';
    relation: ConstraintRelation;
    targets: NameRef[];
    span: Span;
}

export interface StatementNode {
    kind: 'statement';
    keyword: StatementKeyword;
    label: NameRef | null;
    args: ArgumentNode[];
    constraints: ConstraintNode[];
    span: Span;
}

export type SyntaxNode = StatementNode | ArgumentNode | ConstraintNode | ValueNode;

export interface ProtocolDocument {
    statements: StatementNode[];
    /** Spans of discarded comments, kept for diagnostics */
    comments: Span[];
}

/* -------------------------------------------------------------------------- */
/* IR                                                                         */
/* -------------------------------------------------------------------------- */

export type OperationKind = 'dispense' | 'mix' | 'sample' | 'wait' | 'move' | 'set_parameter';

export const OPERATION_KINDS: readonly OperationKind[] = [
    'dispense',
    'mix',
    'sample',
    'wait',
    'move',
    'set_parameter',
];

export type MixMode = 'orbital' | 'linear' | 'helical';

export type MoveTarget =
    | { kind: 'relative'; axis: string; distanceMm: number }
    | { kind: 'absolute'; axis: string; positionMm: number }
    | { kind: 'named'; position: string; coordinates: Readonly<Record<string, number>> };

export type StepAction =
    | { op: 'dispense'; volumeMl: number }
    | { op: 'mix'; speedRpm: number; durationS: number; mode: MixMode; position: string | null }
    | { op: 'sample'; volumeMl: number }
    | { op: 'wait'; durationS: number }
    | { op: 'move'; target: MoveTarget; feedMmPerMin: number | null }
    | { op: 'set_parameter'; parameter: string; value: number; unit: string | null };

/** Arena index of a Step within its Program. */
export type StepId = number;

export interface Step {
    readonly id: StepId;
    /** Label when given, otherwise `<operation>#<id>` */
    readonly name: string;
    readonly label: string | null;
    /** Null only for a `wait` with no device */
    readonly device: string | null;
    readonly action: StepAction;
    readonly mustFollow: readonly StepId[];
    readonly mustPrecede: readonly StepId[];
    readonly line: number;
    readonly column: number;
}

export interface Program {
    readonly steps: readonly Step[];
    /** successors[id] = steps that must come after `id` */
    readonly successors: readonly (readonly StepId[])[];
    /** Topological order, ties broken by declaration order */
    readonly order: readonly StepId[];
    /** Registry fingerprint the program was analyzed against */
    readonly registryFingerprint: string;
}

/* -------------------------------------------------------------------------- */
/* Commands                                                                   */
/* -------------------------------------------------------------------------- */

export type Opcode =
    | 'HOME'
    | 'MOVE_REL'
    | 'MOVE_ABS'
    | 'SYNC'
    | 'DISPENSE'
    | 'ASPIRATE'
    | 'READ'
    | 'SPIN'
    | 'DWELL'
    | 'SET'
    | 'STOP';

/** Target for commands not bound to a registered device (unattached waits, stop). */
export const SYSTEM_DEVICE = 'system';

export interface Command {
    readonly seq: number;
    readonly opcode: Opcode;
    readonly device: string;
    /** Parameter name for SET; null otherwise */
    readonly channel: string | null;
    /**
     * Axis names for moves (plus `feed`), otherwise named operands. A SYNC
     * closing a shaker path carries the path's `duration` in seconds.
     */
    readonly args: Readonly<Record<string, number>>;
    /** Steps this command was lowered from */
    readonly steps: readonly StepId[];
}

export interface CommandStream {
    readonly commands: readonly Command[];
    /** SHA-256 of the canonical JSON of `commands` */
    readonly digest: string;
    readonly grammarVersion: string;
}
