import { Node } from './node/types.js';
import type { PathQuery } from './path/query.js';
import { InlineMergeOptions, parseMergeOptions } from './merge.js';
import { PathNotFoundError, ResourceResolutionError, UnknownScopeError, ValidationError } from './errors.js';

export type ScopeKind = 'local' | 'global' | 'resource';

export const SCOPES: readonly ScopeKind[] = ['local', 'global', 'resource'];

const MERGE_SUFFIX = '!merge:';

/** A parsed `scope::path[!merge:<opts>]` token. */
export interface ReferenceTarget {
    scope: ScopeKind;
    /** Trimmed path; the selector for resource references. */
    path: string;
    /** Set for `resource::<type>::<selector>` only. */
    resourceType?: string;
    inlineMerge?: InlineMergeOptions;
    /** Token as written. */
    raw: string;
}

/**
 * Fetches resource documents for `resource::<type>::<selector>` references.
 */
export interface ResourceResolver {
    resolveResource(type: string, selector: string): Node | Promise<Node>;
}

export interface ScopeRoots {
    local?: Node;
    global?: Node;
}

export function isScope(value: string): value is ScopeKind {
    return SCOPES.some(s => s === value);
}

/**
 * Splits a trailing `!merge:` suffix off a token. The last occurrence wins so
 * paths may still contain `!=` in query conditions.
 */
export function splitMergeSuffix(token: string): { body: string; inlineMerge?: InlineMergeOptions } {
    const idx = token.lastIndexOf(MERGE_SUFFIX);
    if (idx === -1) return { body: token };
    return {
        body: token.slice(0, idx),
        inlineMerge: parseMergeOptions(token.slice(idx + MERGE_SUFFIX.length)),
    };
}

export function parseReference(token: string, directive: string = '$ref'): ReferenceTarget {
    const { body, inlineMerge } = splitMergeSuffix(token);
    const sep = body.indexOf('::');
    if (sep === -1) {
        throw new ValidationError(`invalid ${directive} syntax '${token}': expected scope::path`, directive);
    }

    const scope = body.slice(0, sep).trim();
    const path = body.slice(sep + 2).trim();

    if (!isScope(scope)) {
        throw new UnknownScopeError(scope, `invalid ${directive} syntax '${token}': unknown scope '${scope}', expected one of ${SCOPES.join(', ')}`);
    }
    if (path === '') {
        throw new ValidationError(`invalid ${directive} syntax '${token}': empty path`, directive);
    }

    if (scope === 'resource') {
        const inner = path.indexOf('::');
        const resourceType = inner === -1 ? '' : path.slice(0, inner).trim();
        const selector = inner === -1 ? '' : path.slice(inner + 2).trim();
        if (resourceType === '' || selector === '' || selector.includes('::')) {
            throw new ValidationError(`invalid ${directive} syntax '${token}': expected resource::<type>::<selector>`, directive);
        }
        return { scope, path: selector, resourceType, inlineMerge, raw: token };
    }

    return { scope, path, inlineMerge, raw: token };
}

/** Identity used by the cycle guard. */
export function referenceIdentity(target: ReferenceTarget): string {
    return target.scope === 'resource'
        ? `resource::${target.resourceType ?? ''}::${target.path}`
        : `${target.scope}::${target.path}`;
}

/**
 * Resource documents fetched during one evaluation call, so that a call never
 * asks the resolver twice for the same resource.
 */
export class DocMetadata {
    private docs = new Map<string, Node>();

    async load(key: string, loader: () => Node | Promise<Node>): Promise<Node> {
        const known = this.docs.get(key);
        if (known) return known;
        const doc = await loader();
        this.docs.set(key, doc);
        return doc;
    }

    get size(): number {
        return this.docs.size;
    }
}

export class ScopeResolver {
    constructor(
        private roots: ScopeRoots,
        private pathQuery: PathQuery,
        private resources?: ResourceResolver
    ) {}

    hasScope(scope: ScopeKind): boolean {
        return scope === 'resource' ? this.resources !== undefined : this.roots[scope] !== undefined;
    }

    /**
     * Returns the raw, unevaluated value a reference points at.
     */
    async fetch(target: ReferenceTarget, metadata: DocMetadata): Promise<Node> {
        if (target.scope === 'resource') {
            return this.fetchResource(target, metadata);
        }

        const root = this.roots[target.scope];
        if (!root) {
            throw new UnknownScopeError(target.scope, `${target.scope} scope is not configured`);
        }

        const found = this.pathQuery.get(root, target.path);
        if (found === undefined) {
            throw new PathNotFoundError(target.scope, target.path);
        }
        return found;
    }

    private async fetchResource(target: ReferenceTarget, metadata: DocMetadata): Promise<Node> {
        const resolver = this.resources;
        const type = target.resourceType ?? '';
        if (!resolver) {
            throw new UnknownScopeError('resource', 'resource scope is not configured');
        }

        try {
            return await metadata.load(`${type}::${target.path}`, () => resolver.resolveResource(type, target.path));
        } catch (e) {
            if (e instanceof ResourceResolutionError) throw e;
            throw new ResourceResolutionError(type, target.path, e);
        }
    }
}
