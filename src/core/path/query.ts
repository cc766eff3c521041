import { LRUCache } from 'lru-cache';
import { Node, createNull, createNumber, createSeq, createString, createBool } from '../node/types.js';
import { ValidationError } from '../errors.js';
import { Condition, CompareOp, Segment } from './ast.js';
import { parsePath } from './parser.js';

/** Looks up a sub-value of a tree by path expression. */
export interface PathQuery {
    get(root: Node, path: string): Node | undefined;
}

export interface DottedPathQueryOptions {
    /** Number of compiled paths kept in memory. */
    cacheSize?: number;
}

/**
 * Glob match supporting `*`, `?` and backslash escapes.
 */
export function wildcardMatch(value: string, pattern: string): boolean {
    // Iterative matcher with single-star backtracking
    let v = 0;
    let p = 0;
    let starP = -1;
    let starV = 0;

    while (v < value.length) {
        if (p < pattern.length) {
            const pc = pattern[p];
            if (pc === '*') {
                starP = p++;
                starV = v;
                continue;
            }
            if (pc === '\\' && p + 1 < pattern.length) {
                if (pattern[p + 1] === value[v]) {
                    p += 2;
                    v++;
                    continue;
                }
            } else if (pc === '?' || pc === value[v]) {
                p++;
                v++;
                continue;
            }
        }
        if (starP === -1) return false;
        p = starP + 1;
        v = ++starV;
    }

    while (pattern[p] === '*') p++;
    return p === pattern.length;
}

function literalNode(value: string | number | boolean | null): Node {
    if (value === null) return createNull();
    if (typeof value === 'string') return createString(value);
    if (typeof value === 'number') return createNumber(value);
    return createBool(value);
}

function truthy(node: Node | undefined): boolean {
    if (!node) return false;
    if (node.kind === 'null') return false;
    if (node.kind === 'bool') return node.value;
    return true;
}

function compare(left: Node | undefined, op: CompareOp, right: Node | undefined): boolean {
    if (!left || !right) return false;

    if (left.kind === 'string' && right.kind === 'string') {
        const a = left.value;
        const b = right.value;
        switch (op) {
            case '==': return a === b;
            case '!=': return a !== b;
            case '<': return a < b;
            case '<=': return a <= b;
            case '>': return a > b;
            case '>=': return a >= b;
            case '%': return wildcardMatch(a, b);
            case '!%': return !wildcardMatch(a, b);
        }
    }

    if (left.kind === 'number' && right.kind === 'number') {
        const a = left.value;
        const b = right.value;
        switch (op) {
            case '==': return a === b;
            case '!=': return a !== b;
            case '<': return a < b;
            case '<=': return a <= b;
            case '>': return a > b;
            case '>=': return a >= b;
            default: return false;
        }
    }

    if ((left.kind === 'bool' && right.kind === 'bool') || (left.kind === 'null' && right.kind === 'null')) {
        const same = left.kind === 'null' || (right.kind === 'bool' && left.kind === 'bool' && left.value === right.value);
        if (op === '==') return same;
        if (op === '!=') return !same;
        return false;
    }

    // Mismatched types are never equal
    return op === '!=';
}

/**
 * Default path engine: dotted paths with queries over the node model.
 *
 * ```
 * services.1.name
 * agents.#(id=="writer").config
 * items.#(price>10)#.name
 * tags.#
 * ```
 */
export class DottedPathQuery implements PathQuery {
    private compiled: LRUCache<string, Segment[]>;

    constructor(options: DottedPathQueryOptions = {}) {
        this.compiled = new LRUCache<string, Segment[]>({ max: options.cacheSize ?? 1000 });
    }

    compile(path: string): Segment[] {
        const cached = this.compiled.get(path);
        if (cached) return cached;

        const result = parsePath(path);
        if (!result.ok || !result.segments) {
            const detail = result.errors.map(e => `${e.message} (at ${e.range.start})`).join('; ');
            throw new ValidationError(`invalid path syntax '${path}': ${detail}`);
        }

        this.compiled.set(path, result.segments);
        return result.segments;
    }

    get(root: Node, path: string): Node | undefined {
        return this.walk(root, this.compile(path), 0);
    }

    private walk(node: Node, segments: Segment[], index: number): Node | undefined {
        if (index === segments.length) return node;
        const segment = segments[index];

        switch (segment.kind) {
            case 'Key': {
                if (node.kind === 'map') {
                    const child = node.entries.get(segment.name);
                    return child === undefined ? undefined : this.walk(child, segments, index + 1);
                }
                if (node.kind === 'seq' && /^\d+$/.test(segment.name)) {
                    const child = node.items[Number(segment.name)];
                    return child === undefined ? undefined : this.walk(child, segments, index + 1);
                }
                return undefined;
            }
            case 'Pattern': {
                if (node.kind !== 'map') return undefined;
                for (const [key, child] of node.entries) {
                    if (wildcardMatch(key, segment.pattern)) {
                        return this.walk(child, segments, index + 1);
                    }
                }
                return undefined;
            }
            case 'Count': {
                if (node.kind !== 'seq') return undefined;
                if (index === segments.length - 1) {
                    return createNumber(node.items.length, false);
                }
                return createSeq(this.collect(node.items, segments, index + 1));
            }
            case 'Filter': {
                if (node.kind !== 'seq') return undefined;
                if (!segment.all) {
                    const match = node.items.find(item => this.test(segment.condition, item));
                    return match === undefined ? undefined : this.walk(match, segments, index + 1);
                }
                const matches = node.items.filter(item => this.test(segment.condition, item));
                return createSeq(this.collect(matches, segments, index + 1));
            }
        }
    }

    private collect(items: Node[], segments: Segment[], index: number): Node[] {
        const out: Node[] = [];
        for (const item of items) {
            const value = this.walk(item, segments, index);
            if (value !== undefined) out.push(value);
        }
        return out;
    }

    private operand(condition: Condition, item: Node): Node | undefined {
        switch (condition.kind) {
            case 'Literal':
                return literalNode(condition.value);
            case 'Self':
                return item;
            case 'Path':
                return this.get(item, condition.path);
            default:
                return createBool(this.test(condition, item));
        }
    }

    private test(condition: Condition, item: Node): boolean {
        switch (condition.kind) {
            case 'Logical':
                return condition.op === '&&'
                    ? this.test(condition.left, item) && this.test(condition.right, item)
                    : this.test(condition.left, item) || this.test(condition.right, item);
            case 'Compare':
                return compare(this.operand(condition.left, item), condition.op, this.operand(condition.right, item));
            default:
                return truthy(this.operand(condition, item));
        }
    }
}
