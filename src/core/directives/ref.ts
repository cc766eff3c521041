import type { Directive } from './types.js';
import { ValidationError } from '../errors.js';
import { parseReference } from '../scope.js';
import { validateRefPayload } from '../validation-utils.js';

/**
 * `$ref: scope::path[!merge:<opts>]` replaces its mapping with the value at
 * `path`, evaluated.
 */
export const refDirective: Directive = {
    name: '$ref',
    kind: 'ref',
    validate: validateRefPayload,
    async handle(ctx, payload) {
        if (payload.kind !== 'string') {
            throw new ValidationError('$ref must be a string', '$ref');
        }

        const target = parseReference(payload.value, '$ref');
        const value = await ctx.resolveReference(target);
        return { value, inlineMerge: target.inlineMerge, resolved: true };
    },
};
