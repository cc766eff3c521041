import { describe, it, expect, vi } from 'vitest';
import {
    DocMetadata, ScopeResolver, parseReference, referenceIdentity, splitMergeSuffix,
} from '../../src/core/scope.js';
import { DottedPathQuery } from '../../src/core/path/query.js';
import { fromJS, toJS } from '../../src/core/node/types.js';
import {
    PathNotFoundError, ResourceResolutionError, UnknownScopeError, ValidationError,
} from '../../src/core/errors.js';

describe('parseReference', () => {
    it('parses local and global references', () => {
        expect(parseReference('local::a.b')).toEqual({ scope: 'local', path: 'a.b', inlineMerge: undefined, raw: 'local::a.b' });
        expect(parseReference(' global :: x ')).toMatchObject({ scope: 'global', path: 'x' });
    });

    it('parses resource references', () => {
        expect(parseReference('resource::agent::#(id=="writer")')).toMatchObject({
            scope: 'resource',
            resourceType: 'agent',
            path: '#(id=="writer")',
        });
    });

    it('splits off a merge suffix', () => {
        expect(parseReference('local::base!merge:<deep,first>').inlineMerge).toEqual({ strategy: 'deep', keyConflict: 'first' });
        expect(parseReference('local::base!merge:<deep,first>').path).toBe('base');
    });

    it('keeps != inside a query condition', () => {
        expect(parseReference('local::items.#(id!="a")').path).toBe('items.#(id!="a")');
    });

    it('rejects a token without a scope separator', () => {
        expect(() => parseReference('a.b')).toThrow(ValidationError);
        expect(() => parseReference('a.b')).toThrow("invalid $ref syntax 'a.b': expected scope::path");
    });

    it('rejects unknown scopes', () => {
        expect(() => parseReference('remote::a')).toThrow(UnknownScopeError);
        expect(() => parseReference('remote::a')).toThrow(
            "invalid $ref syntax 'remote::a': unknown scope 'remote', expected one of local, global, resource"
        );
    });

    it('rejects empty paths', () => {
        expect(() => parseReference('local::  ')).toThrow("invalid $ref syntax 'local::  ': empty path");
    });

    it('requires a type and a single selector for resources', () => {
        expect(() => parseReference('resource::agent')).toThrow('expected resource::<type>::<selector>');
        expect(() => parseReference('resource::agent::a::b')).toThrow('expected resource::<type>::<selector>');
    });

    it('names the directive in messages', () => {
        expect(() => parseReference('nope', '$use')).toThrow("invalid $use syntax 'nope': expected scope::path");
    });
});

describe('splitMergeSuffix', () => {
    it('returns the token untouched without a suffix', () => {
        expect(splitMergeSuffix('local::a')).toEqual({ body: 'local::a' });
    });
});

describe('referenceIdentity', () => {
    it('ignores merge options and whitespace', () => {
        expect(referenceIdentity(parseReference('local:: a.b !merge:<deep>'))).toBe('local::a.b');
        expect(referenceIdentity(parseReference('resource::tool::x'))).toBe('resource::tool::x');
    });
});

describe('ScopeResolver', () => {
    const roots = { local: fromJS({ a: { b: 1 } }) };

    it('fetches raw values', async () => {
        const scopes = new ScopeResolver(roots, new DottedPathQuery());
        const found = await scopes.fetch(parseReference('local::a'), new DocMetadata());
        expect(toJS(found)).toEqual({ b: 1 });
    });

    it('reports missing paths', async () => {
        const scopes = new ScopeResolver(roots, new DottedPathQuery());
        await expect(scopes.fetch(parseReference('local::a.c'), new DocMetadata()))
            .rejects.toThrow(new PathNotFoundError('local', 'a.c').message);
    });

    it('reports scopes that are not configured', async () => {
        const scopes = new ScopeResolver(roots, new DottedPathQuery());
        expect(scopes.hasScope('global')).toBe(false);
        await expect(scopes.fetch(parseReference('global::a'), new DocMetadata()))
            .rejects.toThrow('global scope is not configured');
        await expect(scopes.fetch(parseReference('resource::t::x'), new DocMetadata()))
            .rejects.toThrow(UnknownScopeError);
    });

    it('asks the resource resolver once per evaluation', async () => {
        const resolveResource = vi.fn(() => fromJS({ id: 'x' }));
        const scopes = new ScopeResolver(roots, new DottedPathQuery(), { resolveResource });
        const metadata = new DocMetadata();

        await scopes.fetch(parseReference('resource::tool::x'), metadata);
        await scopes.fetch(parseReference('resource::tool::x'), metadata);

        expect(resolveResource).toHaveBeenCalledTimes(1);
        expect(resolveResource).toHaveBeenCalledWith('tool', 'x');
        expect(metadata.size).toBe(1);
    });

    it('wraps resolver failures', async () => {
        const scopes = new ScopeResolver(roots, new DottedPathQuery(), {
            resolveResource: () => { throw new Error('offline'); },
        });
        const attempt = scopes.fetch(parseReference('resource::tool::x'), new DocMetadata());
        await expect(attempt).rejects.toBeInstanceOf(ResourceResolutionError);
        await expect(scopes.fetch(parseReference('resource::tool::x'), new DocMetadata()))
            .rejects.toThrow('failed to resolve resource tool::x: offline');
    });
});
