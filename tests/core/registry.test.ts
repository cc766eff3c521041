import { describe, it, expect } from 'vitest';
import { DirectiveRegistry, createDefaultRegistry } from '../../src/core/registry.js';
import type { Directive } from '../../src/core/directives/types.js';
import { createString, fromJS } from '../../src/core/node/types.js';
import { DirectiveRegistrationError, DuplicateDirectiveError, ValidationError } from '../../src/core/errors.js';

function directive(name: string): Directive {
    return {
        name,
        kind: 'custom',
        handle: () => ({ value: createString(name) }),
    };
}

describe('DirectiveRegistry', () => {
    it('holds the built-in directives by default', () => {
        expect(createDefaultRegistry().names()).toEqual(['$ref', '$use', '$merge']);
    });

    it('registers custom directives', () => {
        const registry = new DirectiveRegistry().register(directive('$env'));
        expect(registry.has('$env')).toBe(true);
        expect(registry.get('$env')?.kind).toBe('custom');
        expect(registry.get('$nope')).toBeUndefined();
    });

    it('rejects duplicates', () => {
        const registry = createDefaultRegistry();
        expect(() => registry.register(directive('$ref'))).toThrow(DuplicateDirectiveError);
        expect(() => registry.register(directive('$ref'))).toThrow('directive $ref already registered');
    });

    it.each([
        ['', 'directive name cannot be empty'],
        ['env', "directive name 'env' must start with '$'"],
        ['$a b', "directive name '$a b' cannot contain whitespace"],
    ])('rejects the name %j', (name, message) => {
        expect(() => new DirectiveRegistry().register(directive(name))).toThrow(DirectiveRegistrationError);
        expect(() => new DirectiveRegistry().register(directive(name))).toThrow(message);
    });

    it('refuses registration once sealed', () => {
        const registry = new DirectiveRegistry().seal();
        expect(registry.isSealed).toBe(true);
        expect(() => registry.register(directive('$env'))).toThrow('cannot register $env: registry is sealed');
    });

    it('reports error codes', () => {
        try {
            createDefaultRegistry().register(directive('$merge'));
        } catch (e) {
            expect(e).toBeInstanceOf(DuplicateDirectiveError);
            if (e instanceof DuplicateDirectiveError) expect(e.code).toBe('DUPLICATE_DIRECTIVE');
            return;
        }
        throw new Error('expected registration to fail');
    });
});

describe('findDirective', () => {
    const registry = createDefaultRegistry();

    it('finds the directive key of a mapping', () => {
        const node = fromJS({ $ref: 'local::a', extra: 1 });
        if (node.kind !== 'map') throw new Error('expected mapping');
        expect(registry.findDirective(node)?.name).toBe('$ref');
    });

    it('ignores unregistered $ keys', () => {
        const node = fromJS({ $schema: 'x' });
        if (node.kind !== 'map') throw new Error('expected mapping');
        expect(registry.findDirective(node)).toBeUndefined();
    });

    it('rejects more than one directive', () => {
        const node = fromJS({ $ref: 'local::a', $use: 'agent(local::b)' });
        if (node.kind !== 'map') throw new Error('expected mapping');
        expect(() => registry.findDirective(node)).toThrow(ValidationError);
        expect(() => registry.findDirective(node)).toThrow('multiple directives are not allowed in a map: $ref, $use');
    });
});
