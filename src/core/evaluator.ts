import { Node } from './node/types.js';
import { DirectiveRegistry, createDefaultRegistry } from './registry.js';
import { DEFAULT_COMPONENTS } from './directives/use.js';
import { DottedPathQuery, PathQuery } from './path/query.js';
import { DEFAULT_INLINE_MERGE_OPTIONS, InlineMergeOptions } from './merge.js';
import { ResourceResolver, ScopeKind, ScopeResolver, parseReference } from './scope.js';
import { CacheSettings, CacheStats, ResolutionCache } from './cache.js';
import { EvaluationContext, EvaluationSettings, PreEvalHook, TransformUseFn } from './context.js';
import { ResolutionError, ValidationError } from './errors.js';
import { Logger, getLogger } from './logger.js';

export const DEFAULT_MAX_DEPTH = 100;

let evaluatorCount = 0;

export interface EvaluatorOptions {
    localScope?: Node;
    globalScope?: Node;
    resourceResolver?: ResourceResolver;
    transformUse?: TransformUseFn;
    preEval?: PreEvalHook;
    /**
     * Directive table. Defaults to a fresh `createDefaultRegistry()`. The
     * registry is sealed once the evaluator is built.
     */
    registry?: DirectiveRegistry;
    pathQuery?: PathQuery;
    /**
     * `true` for default limits, an object for custom ones, `false` or
     * omitted for no cache. A `ResolutionCache` instance may be shared
     * between evaluators: it bounds their combined size, while each
     * evaluator only sees its own entries.
     */
    cache?: boolean | Partial<CacheSettings> | ResolutionCache;
    /** Used when a directive token carries no `!merge:` suffix. */
    inlineMerge?: Partial<InlineMergeOptions>;
    /** Component names `$use` accepts. */
    components?: Iterable<string>;
    /** Maximum number of nested references. */
    maxDepth?: number;
    logger?: Logger;
}

function createCache(option: EvaluatorOptions['cache']): ResolutionCache | undefined {
    if (option === undefined || option === false) return undefined;
    if (option === true) return new ResolutionCache();
    if (option instanceof ResolutionCache) return option;
    return new ResolutionCache(option);
}

/**
 * Resolves `$ref`, `$use`, `$merge` and custom directives in a node tree.
 *
 * An evaluator holds configuration only; each `evaluate()` call gets its own
 * context, so calls may overlap.
 *
 * ```ts
 * const evaluator = new Evaluator({ localScope: fromJS({ a: { b: 1 } }) });
 * await evaluator.evaluate(fromJS({ $ref: 'local::a.b' })); // 1
 * ```
 */
export class Evaluator {
    readonly registry: DirectiveRegistry;
    private settings: EvaluationSettings;

    constructor(options: EvaluatorOptions = {}) {
        const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
        if (!Number.isInteger(maxDepth) || maxDepth < 1) {
            throw new ValidationError(`maxDepth must be a positive integer, got ${maxDepth}`);
        }

        this.registry = (options.registry ?? createDefaultRegistry()).seal();
        this.settings = {
            registry: this.registry,
            scopes: new ScopeResolver(
                { local: options.localScope, global: options.globalScope },
                options.pathQuery ?? new DottedPathQuery(),
                options.resourceResolver
            ),
            cache: createCache(options.cache),
            cacheNamespace: `e${++evaluatorCount}`,
            transformUse: options.transformUse,
            preEval: options.preEval,
            inlineMerge: { ...DEFAULT_INLINE_MERGE_OPTIONS, ...options.inlineMerge },
            components: new Set(options.components ?? DEFAULT_COMPONENTS),
            maxDepth,
            logger: options.logger ?? getLogger('evaluator'),
        };
    }

    /**
     * Returns a fully resolved copy of `node`. The input is not modified.
     */
    async evaluate(node: Node): Promise<Node> {
        const ctx = new EvaluationContext(this.settings);
        try {
            return await ctx.evaluate(node);
        } catch (e) {
            this.logRejection(e);
            throw e;
        }
    }

    /**
     * Resolves `path` in `scope` the way a `$ref` would, including nested
     * directives in the value found there.
     */
    async resolvePath(scope: ScopeKind, path: string): Promise<Node> {
        const target = parseReference(`${scope}::${path}`);
        const ctx = new EvaluationContext(this.settings);
        try {
            return await ctx.resolveReference(target);
        } catch (e) {
            this.logRejection(e);
            throw e;
        }
    }

    hasScope(scope: ScopeKind): boolean {
        return this.settings.scopes.hasScope(scope);
    }

    cacheStats(): CacheStats | undefined {
        return this.settings.cache?.stats();
    }

    private logRejection(e: unknown): void {
        if (e instanceof ResolutionError) {
            this.settings.logger.warn({ code: e.code, location: e.location.join('.') }, e.message);
        } else {
            this.settings.logger.warn({ err: e }, 'evaluation failed');
        }
    }
}
