import {
    Node, MapNode, SeqNode, createMap, createSeq, nodeEquals, normalizeNumbers, describeKind,
} from './node/types.js';
import { KeyConflictError, ValidationError } from './errors.js';

export type ObjectStrategy = 'deep' | 'shallow' | 'replace';
export type ArrayStrategy = 'concat' | 'prepend' | 'append' | 'unique' | 'union';
export type KeyConflict = 'replace' | 'first' | 'error';

export const OBJECT_STRATEGIES: readonly ObjectStrategy[] = ['deep', 'shallow', 'replace'];
export const ARRAY_STRATEGIES: readonly ArrayStrategy[] = ['concat', 'prepend', 'append', 'unique', 'union'];
export const KEY_CONFLICTS: readonly KeyConflict[] = ['replace', 'first', 'error'];

export interface MergeOptions {
    strategy: ObjectStrategy;
    /** Used whenever two sequences meet, at the top level or nested in a deep merge. */
    arrayStrategy: ArrayStrategy;
    /** Governs overlapping top-level keys of a mapping merge. */
    keyConflict: KeyConflict;
}

/**
 * Options for merging a directive's value with the sibling keys of its
 * mapping. Without a strategy, siblings override overlapping keys wholesale.
 */
export interface InlineMergeOptions {
    strategy?: ObjectStrategy;
    keyConflict: KeyConflict;
}

export const DEFAULT_MERGE_OPTIONS: MergeOptions = Object.freeze({
    strategy: 'deep',
    arrayStrategy: 'concat',
    keyConflict: 'replace',
});

export const DEFAULT_INLINE_MERGE_OPTIONS: InlineMergeOptions = Object.freeze({
    keyConflict: 'replace',
});

export function isObjectStrategy(value: string): value is ObjectStrategy {
    return OBJECT_STRATEGIES.some(s => s === value);
}

export function isArrayStrategy(value: string): value is ArrayStrategy {
    return ARRAY_STRATEGIES.some(s => s === value);
}

export function isKeyConflict(value: string): value is KeyConflict {
    return KEY_CONFLICTS.some(s => s === value);
}

/**
 * Parses the options of a `!merge:` suffix: `<deep>`, `<deep,first>`, `shallow`, `<,error>`.
 */
export function parseMergeOptions(input: string): InlineMergeOptions {
    let body = input.trim();
    if (body.startsWith('<') || body.endsWith('>')) {
        if (!body.startsWith('<') || !body.endsWith('>')) {
            throw new ValidationError(`invalid merge options '${input}': unbalanced angle brackets`);
        }
        body = body.slice(1, -1).trim();
    }

    const options: InlineMergeOptions = { keyConflict: 'replace' };
    if (body === '') return options;

    const parts = body.split(',').map(p => p.trim());
    if (parts.length > 2) {
        throw new ValidationError(`invalid merge options '${input}': expected strategy[,key_conflict]`);
    }

    const [strategy, keyConflict] = parts;
    if (strategy !== '') {
        if (!isObjectStrategy(strategy)) {
            throw new ValidationError(`invalid merge strategy '${strategy}', expected one of ${OBJECT_STRATEGIES.join(', ')}`);
        }
        options.strategy = strategy;
    }
    if (keyConflict !== undefined && keyConflict !== '') {
        if (!isKeyConflict(keyConflict)) {
            throw new ValidationError(`invalid key_conflict '${keyConflict}', expected one of ${KEY_CONFLICTS.join(', ')}`);
        }
        options.keyConflict = keyConflict;
    }
    return options;
}

export function mergeArrays(a: SeqNode, b: SeqNode, strategy: ArrayStrategy): SeqNode {
    switch (strategy) {
        case 'concat':
        case 'append':
            return createSeq([...a.items, ...b.items]);
        case 'prepend':
            return createSeq([...b.items, ...a.items]);
        case 'unique':
        case 'union': {
            // Keep first occurrences; compare numbers by value only
            const kept: Node[] = [];
            const seen: Node[] = [];
            for (const item of [...a.items, ...b.items]) {
                const normalized = normalizeNumbers(item);
                if (!seen.some(s => nodeEquals(s, normalized))) {
                    seen.push(normalized);
                    kept.push(item);
                }
            }
            return createSeq(kept);
        }
    }
}

function mergeMaps(a: MapNode, b: MapNode, options: MergeOptions, topLevel: boolean): MapNode {
    const entries = new Map(a.entries);
    for (const [key, incoming] of b.entries) {
        const existing = entries.get(key);
        if (existing === undefined) {
            entries.set(key, incoming);
            continue;
        }
        if (topLevel) {
            if (options.keyConflict === 'error') throw new KeyConflictError(key);
            if (options.keyConflict === 'first') continue;
        }
        entries.set(key, options.strategy === 'deep' ? deepMerge(existing, incoming, options) : incoming);
    }
    return createMap(entries);
}

function deepMerge(a: Node, b: Node, options: MergeOptions): Node {
    if (a.kind === 'map' && b.kind === 'map') return mergeMaps(a, b, options, false);
    if (a.kind === 'seq' && b.kind === 'seq') return mergeArrays(a, b, options.arrayStrategy);
    return b;
}

/**
 * Merges `b` into `a`. Neither input is mutated; untouched subtrees are shared.
 *
 * Combinations a strategy does not cover (a scalar against a mapping, a
 * mapping against a sequence) resolve as `replace`.
 */
export function mergeValues(a: Node, b: Node, options: MergeOptions = DEFAULT_MERGE_OPTIONS): Node {
    switch (options.strategy) {
        case 'replace':
            return b;
        case 'shallow':
            if (a.kind === 'map' && b.kind === 'map') return mergeMaps(a, b, options, true);
            return b;
        case 'deep':
            if (a.kind === 'map' && b.kind === 'map') return mergeMaps(a, b, options, true);
            if (a.kind === 'seq' && b.kind === 'seq') return mergeArrays(a, b, options.arrayStrategy);
            return b;
    }
}

/** Left fold of `mergeValues`, starting from the first source. */
export function mergeAll(sources: Node[], options: MergeOptions = DEFAULT_MERGE_OPTIONS): Node {
    if (sources.length === 0) {
        throw new ValidationError('merge sources cannot be empty');
    }
    return sources.slice(1).reduce((acc, source) => mergeValues(acc, source, options), sources[0]);
}

/**
 * Combines a directive's resolved value with the evaluated sibling keys of
 * its mapping.
 */
export function inlineMerge(result: Node, siblings: MapNode, options: InlineMergeOptions = DEFAULT_INLINE_MERGE_OPTIONS): Node {
    if (result.kind === 'null') return siblings;
    if (result.kind === 'seq') {
        throw new ValidationError('cannot merge array result with object siblings');
    }
    if (result.kind !== 'map') {
        throw new ValidationError(`cannot merge scalar result with siblings (got ${describeKind(result)})`);
    }
    if (options.strategy === 'replace') return result;

    const entries = new Map(result.entries);
    for (const [key, sibling] of siblings.entries) {
        const existing = entries.get(key);
        if (existing === undefined) {
            entries.set(key, sibling);
            continue;
        }
        switch (options.keyConflict) {
            case 'error':
                throw new KeyConflictError(key);
            case 'first':
                break;
            case 'replace':
                entries.set(key, options.strategy === 'deep'
                    ? deepMerge(existing, sibling, DEFAULT_MERGE_OPTIONS)
                    : sibling);
                break;
        }
    }
    return createMap(entries);
}
