import { describe, it, expect } from 'vitest';
import {
    DEFAULT_MERGE_OPTIONS, inlineMerge, mergeAll, mergeArrays, mergeValues, parseMergeOptions,
} from '../../src/core/merge.js';
import { createMap, createNumber, createSeq, fromJS, toJS } from '../../src/core/node/types.js';
import { KeyConflictError, ValidationError } from '../../src/core/errors.js';

function seq(values: unknown[]) {
    const node = fromJS(values);
    if (node.kind !== 'seq') throw new Error('expected sequence');
    return node;
}

function map(value: Record<string, unknown>) {
    const node = fromJS(value);
    if (node.kind !== 'map') throw new Error('expected mapping');
    return node;
}

describe('mergeArrays', () => {
    it('concatenates', () => {
        expect(toJS(mergeArrays(seq([1, 2]), seq([2, 3]), 'concat'))).toEqual([1, 2, 2, 3]);
        expect(toJS(mergeArrays(seq([1, 2]), seq([2, 3]), 'append'))).toEqual([1, 2, 2, 3]);
    });

    it('prepends', () => {
        expect(toJS(mergeArrays(seq([1, 2]), seq([2, 3]), 'prepend'))).toEqual([2, 3, 1, 2]);
    });

    it('deduplicates keeping first occurrences', () => {
        expect(toJS(mergeArrays(seq([1, 2]), seq([2, 3]), 'unique'))).toEqual([1, 2, 3]);
        expect(toJS(mergeArrays(seq([{ a: 1 }]), seq([{ a: 1 }, { a: 2 }]), 'union'))).toEqual([{ a: 1 }, { a: 2 }]);
    });

    it('treats 1 and 1.0 as the same element', () => {
        const merged = mergeArrays(createSeq([createNumber(1, false)]), createSeq([createNumber(1, true)]), 'unique');
        expect(merged.items).toEqual([{ kind: 'number', value: 1, float: false }]);
    });
});

describe('mergeValues', () => {
    const a = map({ db: { host: 'a', port: 1 }, list: [1] });
    const b = map({ db: { port: 2 }, list: [2] });

    it('merges nested mappings and sequences with deep', () => {
        expect(toJS(mergeValues(a, b))).toEqual({ db: { host: 'a', port: 2 }, list: [1, 2] });
    });

    it('replaces top-level values with shallow', () => {
        expect(toJS(mergeValues(a, b, { ...DEFAULT_MERGE_OPTIONS, strategy: 'shallow' })))
            .toEqual({ db: { port: 2 }, list: [2] });
    });

    it('returns the second value with replace', () => {
        expect(mergeValues(a, b, { ...DEFAULT_MERGE_OPTIONS, strategy: 'replace' })).toBe(b);
    });

    it('applies the array strategy to nested sequences', () => {
        expect(toJS(mergeValues(a, b, { ...DEFAULT_MERGE_OPTIONS, arrayStrategy: 'prepend' })))
            .toEqual({ db: { host: 'a', port: 2 }, list: [2, 1] });
    });

    it('keeps the first value of a top-level conflict with first', () => {
        const merged = mergeValues(map({ db: { host: 'a' } }), map({ db: { host: 'b' }, x: 1 }), {
            ...DEFAULT_MERGE_OPTIONS,
            keyConflict: 'first',
        });
        expect(toJS(merged)).toEqual({ db: { host: 'a' }, x: 1 });
    });

    it('throws on a top-level conflict with error', () => {
        const options = { ...DEFAULT_MERGE_OPTIONS, keyConflict: 'error' as const };
        expect(() => mergeValues(map({ port: 1 }), map({ port: 2 }), options)).toThrow(KeyConflictError);
        expect(() => mergeValues(map({ port: 1 }), map({ port: 2 }), options)).toThrow("key conflict: 'port' already exists");
    });

    it('does not mutate its inputs', () => {
        mergeValues(a, b);
        expect(toJS(a)).toEqual({ db: { host: 'a', port: 1 }, list: [1] });
    });
});

describe('mergeAll', () => {
    it('folds left to right', () => {
        expect(toJS(mergeAll([map({ a: 1 }), map({ b: 2 }), map({ a: 3 })]))).toEqual({ a: 3, b: 2 });
    });

    it('rejects an empty list', () => {
        expect(() => mergeAll([])).toThrow('merge sources cannot be empty');
    });
});

describe('inlineMerge', () => {
    const result = map({ a: { x: 1 }, b: 1 });
    const siblings = map({ a: { y: 2 }, c: 3 });

    it('lets siblings override by default', () => {
        expect(toJS(inlineMerge(result, siblings))).toEqual({ a: { y: 2 }, b: 1, c: 3 });
    });

    it('merges overlapping keys with deep', () => {
        expect(toJS(inlineMerge(result, siblings, { strategy: 'deep', keyConflict: 'replace' })))
            .toEqual({ a: { x: 1, y: 2 }, b: 1, c: 3 });
    });

    it('keeps the result unchanged with replace', () => {
        expect(inlineMerge(result, siblings, { strategy: 'replace', keyConflict: 'replace' })).toBe(result);
    });

    it('keeps resolved values with first', () => {
        expect(toJS(inlineMerge(result, siblings, { keyConflict: 'first' }))).toEqual({ a: { x: 1 }, b: 1, c: 3 });
    });

    it('throws on overlap with error', () => {
        expect(() => inlineMerge(result, siblings, { keyConflict: 'error' })).toThrow("key conflict: 'a' already exists");
    });

    it('returns the siblings for a null result', () => {
        expect(inlineMerge(fromJS(null), siblings)).toBe(siblings);
    });

    it('rejects sequence and scalar results', () => {
        expect(() => inlineMerge(fromJS([1]), siblings)).toThrow('cannot merge array result with object siblings');
        expect(() => inlineMerge(fromJS('x'), siblings)).toThrow('cannot merge scalar result with siblings (got string)');
    });

    it('accepts an empty sibling mapping', () => {
        expect(toJS(inlineMerge(result, createMap()))).toEqual({ a: { x: 1 }, b: 1 });
    });
});

describe('parseMergeOptions', () => {
    it.each([
        ['<deep,first>', { strategy: 'deep', keyConflict: 'first' }],
        ['shallow', { strategy: 'shallow', keyConflict: 'replace' }],
        ['<,error>', { keyConflict: 'error' }],
        ['<>', { keyConflict: 'replace' }],
        [' < replace , first > ', { strategy: 'replace', keyConflict: 'first' }],
    ])('parses %j', (input, expected) => {
        expect(parseMergeOptions(input)).toEqual(expected);
    });

    it.each([
        ['<concat>', "invalid merge strategy 'concat', expected one of deep, shallow, replace"],
        ['<deep', "invalid merge options '<deep': unbalanced angle brackets"],
        ['<deep,nope>', "invalid key_conflict 'nope', expected one of replace, first, error"],
        ['<a,b,c>', "invalid merge options '<a,b,c>': expected strategy[,key_conflict]"],
    ])('rejects %j', (input, message) => {
        expect(() => parseMergeOptions(input)).toThrow(ValidationError);
        expect(() => parseMergeOptions(input)).toThrow(message);
    });
});
