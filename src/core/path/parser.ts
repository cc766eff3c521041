
import { Token, TokenType, TokenizerError, tokenize, Range } from './tokenizer.js';
import { Condition, ConditionResult, CompareOp, PathError, PathResult, Segment } from './ast.js';

// Precedence levels
const PRECEDENCE: Record<string, number> = {
    '||': 1,
    '&&': 2,
    '==': 3, '!=': 3, '<': 3, '<=': 3, '>': 3, '>=': 3, '%': 3, '!%': 3,
};

const COMPARE_OPS = new Set<string>(['==', '!=', '<', '<=', '>', '>=', '%', '!%']);
const NUMBER_RE = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

class ParseFailure extends Error {}

function isCompareOp(op: string): op is CompareOp {
    return COMPARE_OPS.has(op);
}

export class ConditionParser {
    private tokens: Token[];
    private current: number = 0;
    private errors: PathError[] = [];

    constructor(input: string, private offset: number = 0) {
        try {
            this.tokens = tokenize(input);
        } catch (e) {
            this.tokens = [{ kind: 'EOF', value: '', range: { start: 0, end: 0 } }];
            if (e instanceof TokenizerError) {
                this.errors.push({ message: e.message, range: this.shift(e.range) });
            } else {
                throw e;
            }
        }
    }

    public parse(): ConditionResult {
        if (this.errors.length > 0) {
            return { ok: false, errors: this.errors };
        }

        try {
            const ast = this.parseExpr(0);

            if (!this.isAtEnd()) {
                this.errors.push({
                    message: 'Unexpected tokens after condition',
                    range: this.shift(this.peek().range)
                });
            }

            return {
                ok: this.errors.length === 0,
                errors: this.errors,
                ast: this.errors.length === 0 ? ast : undefined
            };
        } catch (e) {
            if (e instanceof ParseFailure) {
                return { ok: false, errors: this.errors };
            }
            throw e;
        }
    }

    private parseExpr(minPrecedence: number): Condition {
        // A leading comparison operator compares the element itself: #(=="x")
        let left: Condition = this.check('Op') && isCompareOp(this.peek().value)
            ? { kind: 'Self', range: { start: this.peek().range.start, end: this.peek().range.start } }
            : this.parsePrefix();

        while (this.getPrecedence() >= minPrecedence && !this.isAtEnd()) {
            const opToken = this.peek();
            if (opToken.kind !== 'Op') break;

            const op = this.advance().value;
            const right = this.parseExpr(PRECEDENCE[op] + 1);
            const range = { start: left.range.start, end: right.range.end };

            if (op === '&&' || op === '||') {
                left = { kind: 'Logical', op, left, right, range };
            } else if (isCompareOp(op)) {
                left = { kind: 'Compare', op, left, right, range };
            } else {
                throw this.error(opToken, `Unknown operator "${op}"`);
            }
        }

        return left;
    }

    private parsePrefix(): Condition {
        if (this.isAtEnd()) {
            throw this.error(this.peek(), 'Unexpected end of condition');
        }

        const token = this.advance();

        if (token.kind === 'String') {
            return { kind: 'Literal', value: token.value, range: token.range };
        }

        if (token.kind === 'Word') {
            if (NUMBER_RE.test(token.value)) {
                return { kind: 'Literal', value: Number(token.value), range: token.range };
            }
            switch (token.value) {
                case 'true':
                    return { kind: 'Literal', value: true, range: token.range };
                case 'false':
                    return { kind: 'Literal', value: false, range: token.range };
                case 'null':
                    return { kind: 'Literal', value: null, range: token.range };
                default:
                    return { kind: 'Path', path: token.value, range: token.range };
            }
        }

        // Parentheses (Grouping)
        if (token.kind === 'LParen') {
            const expr = this.parseExpr(0);
            this.consume('RParen', 'Expected closing ")"');
            return expr;
        }

        throw this.error(token, `Unexpected token: ${token.kind} "${token.value}"`);
    }

    private getPrecedence(): number {
        if (this.isAtEnd()) return 0;
        const token = this.peek();
        if (token.kind !== 'Op') return 0;
        return PRECEDENCE[token.value] ?? 0;
    }

    // Helpers
    private isAtEnd(): boolean {
        return this.peek().kind === 'EOF';
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.tokens[this.current - 1];
    }

    private check(kind: TokenType): boolean {
        if (this.isAtEnd()) return false;
        return this.peek().kind === kind;
    }

    private consume(kind: TokenType, message: string): Token {
        if (this.check(kind)) return this.advance();
        throw this.error(this.peek(), message);
    }

    private shift(range: Range): Range {
        return { start: range.start + this.offset, end: range.end + this.offset };
    }

    private error(token: Token, message: string): ParseFailure {
        this.errors.push({ message, range: this.shift(token.range) });
        return new ParseFailure(message); // Throw to unwind
    }
}

export function parseCondition(input: string, offset: number = 0): ConditionResult {
    return new ConditionParser(input, offset).parse();
}

/** Finds the `)` closing the `(` at `open`, skipping quoted strings. Returns -1 when unbalanced. */
function findClosingParen(input: string, open: number): number {
    let depth = 0;
    let quote: string | null = null;

    for (let i = open; i < input.length; i++) {
        const ch = input[i];
        if (quote) {
            if (ch === '\\') i++;
            else if (ch === quote) quote = null;
            continue;
        }
        if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '(') {
            depth++;
        } else if (ch === ')') {
            depth--;
            if (depth === 0) return i;
        }
    }
    return -1;
}

/**
 * Splits a dotted path into segments.
 *
 * `a.b` keys, `\.` escapes, `*` and `?` key patterns, `#` for length or
 * fan-out, and `#(cond)` / `#(cond)#` element queries.
 */
export function parsePath(input: string): PathResult {
    const errors: PathError[] = [];
    const segments: Segment[] = [];

    if (input.length === 0) {
        return { ok: false, errors: [{ message: 'Empty path', range: { start: 0, end: 0 } }] };
    }

    let i = 0;
    while (i < input.length) {
        const start = i;

        if (input.startsWith('#(', i)) {
            const close = findClosingParen(input, i + 1);
            if (close === -1) {
                errors.push({ message: 'Unclosed "#(" in path', range: { start, end: input.length } });
                break;
            }

            const parsed = parseCondition(input.slice(i + 2, close), i + 2);
            if (!parsed.ok || !parsed.ast) {
                errors.push(...parsed.errors);
                break;
            }

            let end = close + 1;
            const all = input[end] === '#';
            if (all) end++;
            segments.push({ kind: 'Filter', condition: parsed.ast, all });
            i = end;
        } else {
            let name = '';
            let raw = '';
            let wildcard = false;

            while (i < input.length && input[i] !== '.') {
                const ch = input[i];
                if (ch === '\\' && i + 1 < input.length) {
                    name += input[i + 1];
                    raw += ch + input[i + 1];
                    i += 2;
                    continue;
                }
                if (ch === '*' || ch === '?') wildcard = true;
                name += ch;
                raw += ch;
                i++;
            }

            if (raw.length === 0) {
                errors.push({ message: 'Empty path component', range: { start, end: i } });
                break;
            }

            if (raw === '#') {
                segments.push({ kind: 'Count' });
            } else if (wildcard) {
                segments.push({ kind: 'Pattern', pattern: raw });
            } else {
                segments.push({ kind: 'Key', name });
            }
        }

        if (i === input.length) break;
        if (input[i] !== '.') {
            errors.push({ message: `Expected "." at position ${i}`, range: { start: i, end: i + 1 } });
            break;
        }
        i++;
        if (i === input.length) {
            errors.push({ message: 'Trailing "." in path', range: { start: i - 1, end: i } });
        }
    }

    return {
        ok: errors.length === 0,
        errors,
        segments: errors.length === 0 ? segments : undefined
    };
}
