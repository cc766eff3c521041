import type { Directive } from './types.js';
import { ValidationError } from '../errors.js';
import type { InlineMergeOptions } from '../merge.js';
import { ReferenceTarget, parseReference, splitMergeSuffix } from '../scope.js';
import { validateUsePayload } from '../validation-utils.js';

export const DEFAULT_COMPONENTS: readonly string[] = ['agent', 'tool', 'task', 'mcp'];

const USE_RE = /^([A-Za-z_][\w-]*)\((.*)\)$/s;

export interface UseTarget {
    component: string;
    target: ReferenceTarget;
    inlineMerge?: InlineMergeOptions;
}

/**
 * Parses `component(scope::path)[!merge:<opts>]`.
 */
export function parseUse(token: string, components: ReadonlySet<string>): UseTarget {
    const { body, inlineMerge } = splitMergeSuffix(token.trim());
    const match = USE_RE.exec(body.trim());
    if (!match) {
        throw new ValidationError(`invalid $use syntax '${token}': expected component(scope::path)`, '$use');
    }

    const [, component, inner] = match;
    if (!components.has(component)) {
        throw new ValidationError(
            `invalid $use syntax '${token}': unknown component '${component}', expected one of ${[...components].join(', ')}`,
            '$use'
        );
    }

    const target: ReferenceTarget = { ...parseReference(inner, '$use'), inlineMerge, raw: token };
    return { component, target, inlineMerge };
}

/**
 * `$use: agent(local::agents.writer)` resolves the reference and wraps it
 * as `{ agent: <value> }`, or as the configured transform decides.
 */
export const useDirective: Directive = {
    name: '$use',
    kind: 'use',
    validate: validateUsePayload,
    async handle(ctx, payload) {
        if (payload.kind !== 'string') {
            throw new ValidationError('$use must be a string', '$use');
        }

        const { component, target, inlineMerge } = parseUse(payload.value, ctx.components);
        const value = await ctx.resolveReference(target);
        const wrapped = await ctx.transformUse(component, value, target);
        return { value: wrapped, inlineMerge, resolved: true };
    },
};
