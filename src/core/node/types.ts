export type NodeKind = 'null' | 'bool' | 'number' | 'string' | 'seq' | 'map';

export type NullNode = { kind: 'null' };
export type BoolNode = { kind: 'bool'; value: boolean };
/** `float` records whether the source spelled the number as a floating point literal. */
export type NumberNode = { kind: 'number'; value: number; float: boolean };
export type StringNode = { kind: 'string'; value: string };
export type SeqNode = { kind: 'seq'; items: Node[] };
export type MapNode = { kind: 'map'; entries: Map<string, Node> };

export type ScalarNode = NullNode | BoolNode | NumberNode | StringNode;
export type Node = ScalarNode | SeqNode | MapNode;

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isNullNode(v: Node): v is NullNode { return v.kind === 'null'; }
export function isSeqNode(v: Node): v is SeqNode { return v.kind === 'seq'; }
export function isMapNode(v: Node): v is MapNode { return v.kind === 'map'; }
export function isScalarNode(v: Node): v is ScalarNode { return v.kind !== 'seq' && v.kind !== 'map'; }

// Helpers to create nodes
export function createNull(): NullNode {
    return { kind: 'null' };
}

export function createBool(value: boolean): BoolNode {
    return { kind: 'bool', value };
}

export function createNumber(value: number, float: boolean = !Number.isInteger(value)): NumberNode {
    return { kind: 'number', value, float };
}

export function createString(value: string): StringNode {
    return { kind: 'string', value };
}

export function createSeq(items: Node[]): SeqNode {
    return { kind: 'seq', items };
}

export function createMap(entries: Map<string, Node> | Iterable<[string, Node]> = new Map()): MapNode {
    return { kind: 'map', entries: entries instanceof Map ? entries : new Map(entries) };
}

/**
 * Converts a plain value into a node. `undefined` becomes null; functions,
 * symbols and bigints are rejected.
 */
export function fromJS(value: unknown): Node {
    if (value === null || value === undefined) return createNull();
    switch (typeof value) {
        case 'boolean':
            return createBool(value);
        case 'number':
            return createNumber(value);
        case 'string':
            return createString(value);
        case 'object': {
            if (Array.isArray(value)) {
                return createSeq(value.map(fromJS));
            }
            if (value instanceof Map) {
                const entries = new Map<string, Node>();
                for (const [k, v] of value) {
                    entries.set(String(k), fromJS(v));
                }
                return createMap(entries);
            }
            const entries = new Map<string, Node>();
            for (const [k, v] of Object.entries(value)) {
                entries.set(k, fromJS(v));
            }
            return createMap(entries);
        }
        default:
            throw new TypeError(`Cannot convert value of type ${typeof value} to a node`);
    }
}

export function toJS(v: Node): JsonValue {
    switch (v.kind) {
        case 'null':
            return null;
        case 'bool':
        case 'number':
        case 'string':
            return v.value;
        case 'seq':
            return v.items.map(toJS);
        case 'map': {
            const obj: JsonObject = {};
            for (const [k, child] of v.entries) {
                obj[k] = toJS(child);
            }
            return obj;
        }
    }
}

export function cloneNode(v: Node): Node {
    switch (v.kind) {
        case 'null':
            return createNull();
        case 'bool':
            return createBool(v.value);
        case 'number':
            return createNumber(v.value, v.float);
        case 'string':
            return createString(v.value);
        case 'seq':
            return createSeq(v.items.map(cloneNode));
        case 'map': {
            const entries = new Map<string, Node>();
            for (const [k, child] of v.entries) {
                entries.set(k, cloneNode(child));
            }
            return createMap(entries);
        }
    }
}

/**
 * Structural equality. Numbers must agree on value and on the float flag;
 * normalize both sides first to compare across numeric spellings.
 * Map key order is not significant.
 */
export function nodeEquals(a: Node, b: Node): boolean {
    switch (a.kind) {
        case 'null':
            return b.kind === 'null';
        case 'bool':
        case 'string':
            return b.kind === a.kind && b.value === a.value;
        case 'number':
            return b.kind === 'number' && b.value === a.value && b.float === a.float;
        case 'seq':
            return b.kind === 'seq'
                && a.items.length === b.items.length
                && a.items.every((item, i) => nodeEquals(item, b.items[i]));
        case 'map': {
            if (b.kind !== 'map' || a.entries.size !== b.entries.size) return false;
            for (const [k, child] of a.entries) {
                const other = b.entries.get(k);
                if (!other || !nodeEquals(child, other)) return false;
            }
            return true;
        }
    }
}

/** Returns a copy in which every number carries the float representation. */
export function normalizeNumbers(v: Node): Node {
    switch (v.kind) {
        case 'number':
            return createNumber(v.value, true);
        case 'seq':
            return createSeq(v.items.map(normalizeNumbers));
        case 'map': {
            const entries = new Map<string, Node>();
            for (const [k, child] of v.entries) {
                entries.set(k, normalizeNumbers(child));
            }
            return createMap(entries);
        }
        default:
            return v;
    }
}

export function describeKind(v: Node): string {
    switch (v.kind) {
        case 'seq':
            return 'array';
        case 'map':
            return 'object';
        default:
            return v.kind;
    }
}
