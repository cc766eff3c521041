import { describe, it, expect } from 'vitest';
import {
    hasInterpolation, validateMergePayload, validateRefPayload, validateUsePayload,
} from '../../src/core/validation-utils.js';
import { fromJS } from '../../src/core/node/types.js';

describe('validateRefPayload', () => {
    it('requires a scoped string', () => {
        expect(validateRefPayload(fromJS('local::a'))).toEqual({ isValid: true });
        expect(validateRefPayload(fromJS('a'))).toEqual({
            isValid: false,
            message: "invalid $ref syntax 'a': expected scope::path",
        });
        expect(validateRefPayload(fromJS(['local::a'])).message).toBe('$ref must be a string, got array');
    });
});

describe('validateUsePayload', () => {
    it('checks parentheses', () => {
        expect(validateUsePayload(fromJS('agent(local::a)')).isValid).toBe(true);
        expect(validateUsePayload(fromJS('agent(local::#(id=="a"))')).isValid).toBe(true);
        expect(validateUsePayload(fromJS('agent(local::a))(')).message)
            .toBe("invalid $use syntax 'agent(local::a))(': unbalanced parentheses");
        expect(validateUsePayload(fromJS('(local::a)')).message)
            .toBe("invalid $use syntax '(local::a)': expected component(scope::path)");
    });
});

describe('validateMergePayload', () => {
    it('accepts the three payload shapes', () => {
        expect(validateMergePayload(fromJS([{ a: 1 }])).isValid).toBe(true);
        expect(validateMergePayload(fromJS({ sources: [{ a: 1 }], strategy: 'deep' })).isValid).toBe(true);
        expect(validateMergePayload(fromJS({ $ref: 'local::list' })).isValid).toBe(true);
    });

    it('checks option values', () => {
        expect(validateMergePayload(fromJS({ sources: [[1]], array_strategy: 'zip' })).message)
            .toBe('invalid array merge strategy, expected one of concat, prepend, append, unique, union');
        expect(validateMergePayload(fromJS({ sources: [{}], key_conflict: 'last' })).message)
            .toBe('invalid key_conflict, expected one of replace, first, error');
        expect(validateMergePayload(fromJS({ sources: [{}], strategy: 1 })).message)
            .toBe('$merge strategy must be a string, got number');
        expect(validateMergePayload(fromJS({ sources: {} })).message)
            .toBe('$merge sources must be a sequence, got object');
    });
});

describe('hasInterpolation', () => {
    it('detects ${', () => {
        expect(hasInterpolation('a ${B}')).toBe(true);
        expect(hasInterpolation('a $B')).toBe(false);
    });
});
