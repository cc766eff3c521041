
import type { Range } from './tokenizer.js';

export type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=' | '%' | '!%';
export type LogicalOp = '&&' | '||';

export type Condition =
    | { kind: 'Literal'; value: string | number | boolean | null; range: Range }
    | { kind: 'Path'; path: string; range: Range }
    | { kind: 'Self'; range: Range }
    | { kind: 'Compare'; op: CompareOp; left: Condition; right: Condition; range: Range }
    | { kind: 'Logical'; op: LogicalOp; left: Condition; right: Condition; range: Range };

export type Segment =
    | { kind: 'Key'; name: string }
    | { kind: 'Pattern'; pattern: string }
    | { kind: 'Count' }
    | { kind: 'Filter'; condition: Condition; all: boolean };

export interface PathError {
    message: string;
    range: Range;
}

export interface ConditionResult {
    ok: boolean;
    errors: PathError[];
    ast?: Condition;
}

export interface PathResult {
    ok: boolean;
    errors: PathError[];
    segments?: Segment[];
}
