import type { Directive, DirectiveContext } from './types.js';
import { Node, MapNode, createNull, describeKind } from '../node/types.js';
import { ValidationError } from '../errors.js';
import {
    MergeOptions, DEFAULT_MERGE_OPTIONS, ARRAY_STRATEGIES, OBJECT_STRATEGIES,
    isArrayStrategy, isKeyConflict, isObjectStrategy, mergeAll,
} from '../merge.js';
import { validateMergePayload } from '../validation-utils.js';

interface MergeRequest {
    sources: Node[];
    /** Sources came out of a nested directive and are evaluated already. */
    evaluated: boolean;
    strategy?: string;
    arrayStrategy?: string;
    keyConflict?: string;
}

function stringOption(map: MapNode, key: string): string | undefined {
    const node = map.entries.get(key);
    return node?.kind === 'string' ? node.value : undefined;
}

async function readRequest(ctx: DirectiveContext, payload: Node): Promise<MergeRequest> {
    if (payload.kind === 'seq') {
        return { sources: payload.items, evaluated: false };
    }
    if (payload.kind !== 'map') {
        throw new ValidationError(`$merge must be a sequence or a mapping, got ${describeKind(payload)}`, '$merge');
    }

    const sources = payload.entries.get('sources');
    if (sources) {
        if (sources.kind !== 'seq') {
            throw new ValidationError('$merge sources must be a sequence', '$merge');
        }
        return {
            sources: sources.items,
            evaluated: false,
            strategy: stringOption(payload, 'strategy'),
            arrayStrategy: stringOption(payload, 'array_strategy'),
            keyConflict: stringOption(payload, 'key_conflict'),
        };
    }

    // {$ref: local::configs} and the like: the directive yields the list
    const resolved = await ctx.evaluate(payload);
    if (resolved.kind !== 'seq') {
        throw new ValidationError(`$merge directive must resolve to a sequence of sources, got ${describeKind(resolved)}`, '$merge');
    }
    return { sources: resolved.items, evaluated: true };
}

function resolveOptions(request: MergeRequest, kind: 'map' | 'seq'): MergeOptions {
    const options: MergeOptions = { ...DEFAULT_MERGE_OPTIONS };

    if (request.keyConflict !== undefined) {
        if (!isKeyConflict(request.keyConflict)) {
            throw new ValidationError(`invalid key_conflict '${request.keyConflict}'`, '$merge');
        }
        options.keyConflict = request.keyConflict;
    }

    if (request.arrayStrategy !== undefined) {
        if (!isArrayStrategy(request.arrayStrategy)) {
            throw new ValidationError(`invalid array merge strategy '${request.arrayStrategy}'`, '$merge');
        }
        options.arrayStrategy = request.arrayStrategy;
    }

    if (request.strategy !== undefined) {
        if (kind === 'seq') {
            if (!isArrayStrategy(request.strategy)) {
                throw new ValidationError(
                    `invalid array merge strategy '${request.strategy}', expected one of ${ARRAY_STRATEGIES.join(', ')}`,
                    '$merge'
                );
            }
            options.arrayStrategy = request.strategy;
        } else {
            if (!isObjectStrategy(request.strategy)) {
                throw new ValidationError(
                    `invalid object merge strategy '${request.strategy}', expected one of ${OBJECT_STRATEGIES.join(', ')}`,
                    '$merge'
                );
            }
            options.strategy = request.strategy;
        }
    }

    return options;
}

/**
 * `$merge` folds its sources left to right. Null sources are skipped; the
 * rest must be all mappings or all sequences.
 */
export const mergeDirective: Directive = {
    name: '$merge',
    kind: 'merge',
    allowsSiblings: false,
    validate: validateMergePayload,
    async handle(ctx, payload) {
        const request = await readRequest(ctx, payload);
        if (request.sources.length === 0) {
            throw new ValidationError('$merge sources cannot be empty', '$merge');
        }

        const values: Node[] = [];
        for (let i = 0; i < request.sources.length; i++) {
            const value = request.evaluated ? request.sources[i] : await ctx.evaluate(request.sources[i]);
            if (value.kind === 'null') continue;
            if (value.kind !== 'map' && value.kind !== 'seq') {
                throw new ValidationError(
                    `merge source at index ${i} must be an object or array, got ${describeKind(value)}`,
                    '$merge'
                );
            }
            values.push(value);
        }

        if (values.length === 0) {
            return { value: createNull(), resolved: true };
        }

        const kind = values[0].kind === 'seq' ? 'seq' : 'map';
        if (!values.every(v => v.kind === kind)) {
            throw new ValidationError('merge sources must be all objects or all arrays', '$merge');
        }

        return { value: mergeAll(values, resolveOptions(request, kind)), resolved: true };
    },
};
