import { Node, describeKind } from './node/types.js';
import { isArrayStrategy, isKeyConflict, KEY_CONFLICTS, ARRAY_STRATEGIES } from './merge.js';

export interface ValidationResult {
    isValid: boolean;
    message?: string;
}

export const MERGE_OPTION_KEYS: ReadonlySet<string> = new Set(['strategy', 'array_strategy', 'key_conflict', 'sources']);

/**
 * Checks a directive name for registration: non-empty and starting with `$`.
 */
export function validateDirectiveName(name: string): ValidationResult {
    if (name.trim() === '') return { isValid: false, message: 'directive name cannot be empty' };
    if (!name.startsWith('$')) return { isValid: false, message: `directive name '${name}' must start with '$'` };
    if (/\s/.test(name)) return { isValid: false, message: `directive name '${name}' cannot contain whitespace` };
    return { isValid: true };
}

export function validateRefPayload(payload: Node): ValidationResult {
    if (payload.kind !== 'string') {
        return { isValid: false, message: `$ref must be a string, got ${describeKind(payload)}` };
    }
    if (!payload.value.includes('::')) {
        return { isValid: false, message: `invalid $ref syntax '${payload.value}': expected scope::path` };
    }
    return { isValid: true };
}

/**
 * Shape check only; the component name is checked against the evaluator's
 * components when the directive runs.
 */
export function validateUsePayload(payload: Node): ValidationResult {
    if (payload.kind !== 'string') {
        return { isValid: false, message: `$use must be a string, got ${describeKind(payload)}` };
    }

    const value = payload.value.trim();
    const open = value.indexOf('(');
    const close = value.lastIndexOf(')');
    if (open <= 0 || close < open) {
        return { isValid: false, message: `invalid $use syntax '${payload.value}': expected component(scope::path)` };
    }

    // Check balanced parentheses
    let depth = 0;
    for (const char of value) {
        if (char === '(') depth++;
        if (char === ')') depth--;
        if (depth < 0) return { isValid: false, message: `invalid $use syntax '${payload.value}': unbalanced parentheses` };
    }
    if (depth !== 0) return { isValid: false, message: `invalid $use syntax '${payload.value}': unbalanced parentheses` };

    return { isValid: true };
}

function isDirectiveForm(keys: string[]): boolean {
    return keys.length > 0 && keys.every(k => k.startsWith('$'));
}

/**
 * Validates the three `$merge` payload shapes: a list of sources, an options
 * mapping with `sources`, or a mapping holding a directive that yields the
 * list. Strategy names are checked against the source kinds later.
 */
export function validateMergePayload(payload: Node): ValidationResult {
    if (payload.kind === 'seq') {
        if (payload.items.length === 0) return { isValid: false, message: '$merge sources cannot be empty' };
        return { isValid: true };
    }

    if (payload.kind !== 'map') {
        return { isValid: false, message: `$merge must be a sequence or a mapping, got ${describeKind(payload)}` };
    }

    const keys = [...payload.entries.keys()];
    if (isDirectiveForm(keys)) return { isValid: true };

    const unknown = keys.filter(k => !MERGE_OPTION_KEYS.has(k));
    if (unknown.length > 0) {
        return { isValid: false, message: `unknown key in $merge: ${unknown.join(', ')}` };
    }

    const sources = payload.entries.get('sources');
    if (!sources) return { isValid: false, message: "$merge mapping must contain 'sources' key" };
    if (sources.kind !== 'seq') {
        return { isValid: false, message: `$merge sources must be a sequence, got ${describeKind(sources)}` };
    }
    if (sources.items.length === 0) return { isValid: false, message: '$merge sources cannot be empty' };

    const strategy = payload.entries.get('strategy');
    if (strategy && strategy.kind !== 'string') {
        return { isValid: false, message: `$merge strategy must be a string, got ${describeKind(strategy)}` };
    }

    const arrayStrategy = payload.entries.get('array_strategy');
    if (arrayStrategy && (arrayStrategy.kind !== 'string' || !isArrayStrategy(arrayStrategy.value))) {
        return { isValid: false, message: `invalid array merge strategy, expected one of ${ARRAY_STRATEGIES.join(', ')}` };
    }

    const keyConflict = payload.entries.get('key_conflict');
    if (keyConflict && (keyConflict.kind !== 'string' || !isKeyConflict(keyConflict.value))) {
        return { isValid: false, message: `invalid key_conflict, expected one of ${KEY_CONFLICTS.join(', ')}` };
    }

    return { isValid: true };
}

/**
 * Checks if a string contains `${...}` substitution
 */
export function hasInterpolation(val: string): boolean {
    return val.includes('${');
}
