import { Node, MapNode, SeqNode, createMap, createSeq } from './node/types.js';
import type { DirectiveContext } from './directives/types.js';
import type { DirectiveRegistry } from './registry.js';
import type { Logger } from './logger.js';
import { InlineMergeOptions, inlineMerge } from './merge.js';
import { DocMetadata, ReferenceTarget, ScopeResolver, referenceIdentity } from './scope.js';
import { ResolutionCache, fingerprint } from './cache.js';
import {
    CycleDetectedError, HookError, MaxDepthExceededError, ResolutionError, TransformError, ValidationError,
} from './errors.js';

export interface TransformResult {
    key: string;
    value: Node;
}

/** Turns a resolved `$use` value into the `{ key: value }` it is replaced with. */
export type TransformUseFn = (component: string, value: Node) => TransformResult | Promise<TransformResult>;

/** Runs on every node before it is evaluated. */
export type PreEvalHook = (node: Node) => Node | Promise<Node>;

export interface EvaluationSettings {
    registry: DirectiveRegistry;
    scopes: ScopeResolver;
    cache?: ResolutionCache;
    /** Prefix of this evaluator's cache keys. */
    cacheNamespace: string;
    transformUse?: TransformUseFn;
    preEval?: PreEvalHook;
    inlineMerge: InlineMergeOptions;
    components: ReadonlySet<string>;
    maxDepth: number;
    logger: Logger;
}

/**
 * State of one evaluation call: the reference stack used for cycle
 * detection and the resource documents fetched so far. Never shared between
 * calls.
 */
export class EvaluationContext implements DirectiveContext {
    private stack: string[] = [];
    /** Deepest stack length reached inside the reference being resolved. */
    private deepest = 0;
    readonly metadata = new DocMetadata();

    constructor(private settings: EvaluationSettings) {}

    get components(): ReadonlySet<string> {
        return this.settings.components;
    }

    get logger(): Logger {
        return this.settings.logger;
    }

    /** References currently being resolved, outermost first. */
    get references(): readonly string[] {
        return this.stack;
    }

    async evaluate(node: Node): Promise<Node> {
        const current = await this.applyHook(node);
        switch (current.kind) {
            case 'seq':
                return this.evaluateSeq(current);
            case 'map':
                return this.evaluateMap(current);
            default:
                return current;
        }
    }

    async resolveReference(target: ReferenceTarget): Promise<Node> {
        const identity = referenceIdentity(target);
        this.enter(identity);
        const level = this.stack.length;
        const outerDeepest = this.deepest;
        this.deepest = level;

        try {
            const key = fingerprint(target, this.settings.cacheNamespace);
            const cache = this.settings.cache;
            const cached = cache?.get(key, this.settings.maxDepth - level + 1);
            if (cached) {
                this.logger.debug({ reference: identity }, 'cache hit');
                this.deepest = level - 1 + cached.depth;
                return cached.value;
            }

            this.logger.debug({ reference: identity, depth: level }, 'resolving reference');
            const raw = await this.settings.scopes.fetch(target, this.metadata);
            const value = await this.evaluate(raw);
            cache?.set(key, value, this.deepest - level + 1);
            return value;
        } finally {
            this.deepest = Math.max(outerDeepest, this.deepest);
            this.leave(identity);
        }
    }

    async transformUse(component: string, value: Node, target: ReferenceTarget): Promise<Node> {
        const transform = this.settings.transformUse;
        if (!transform) {
            return createMap([[component, value]]);
        }

        let result: TransformResult;
        try {
            result = await transform(component, value);
        } catch (e) {
            if (e instanceof ResolutionError) throw e;
            throw new TransformError(component, e);
        }

        // Transform output may carry new directives. It is evaluated while
        // the `$use` is on the stack so a transform that re-emits it fails.
        const identity = `${component}(${referenceIdentity(target)})`;
        this.enter(identity);
        try {
            return await this.evaluate(createMap([[result.key, result.value]]));
        } finally {
            this.leave(identity);
        }
    }

    private enter(identity: string): void {
        const first = this.stack.indexOf(identity);
        if (first !== -1) {
            throw new CycleDetectedError([...this.stack.slice(first), identity]);
        }
        if (this.stack.length >= this.settings.maxDepth) {
            throw new MaxDepthExceededError(this.settings.maxDepth, [...this.stack, identity]);
        }
        this.stack.push(identity);
        this.deepest = Math.max(this.deepest, this.stack.length);
    }

    private leave(identity: string): void {
        const last = this.stack.lastIndexOf(identity);
        if (last !== -1) this.stack.splice(last, 1);
    }

    private async applyHook(node: Node): Promise<Node> {
        const hook = this.settings.preEval;
        if (!hook) return node;

        try {
            return await hook(node);
        } catch (e) {
            if (e instanceof HookError) throw e;
            throw new HookError(e);
        }
    }

    private async within<T>(segment: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (e) {
            if (e instanceof ResolutionError) e.within(segment);
            throw e;
        }
    }

    private async evaluateSeq(seq: SeqNode): Promise<Node> {
        const items: Node[] = [];
        for (let i = 0; i < seq.items.length; i++) {
            const item = seq.items[i];
            items.push(await this.within(String(i), () => this.evaluate(item)));
        }
        return createSeq(items);
    }

    private async evaluateEntries(entries: Iterable<[string, Node]>): Promise<Map<string, Node>> {
        const out = new Map<string, Node>();
        for (const [key, child] of entries) {
            out.set(key, await this.within(key, () => this.evaluate(child)));
        }
        return out;
    }

    private async evaluateMap(map: MapNode): Promise<Node> {
        const directive = this.settings.registry.findDirective(map);
        if (!directive) {
            return createMap(await this.evaluateEntries(map.entries));
        }

        const name = directive.name;
        const payload = map.entries.get(name);
        if (payload === undefined) {
            throw new ValidationError(`${name} directive has no payload`, name);
        }

        const siblings = [...map.entries].filter(([key]) => key !== name);
        if (siblings.length > 0 && directive.allowsSiblings === false) {
            throw new ValidationError(`${name} directive cannot have sibling keys`, name);
        }

        const check = directive.validate?.(payload);
        if (check && !check.isValid) {
            throw new ValidationError(check.message ?? `invalid ${name} payload`, name);
        }

        const result = await this.within(name, async () => directive.handle(this, payload));
        const value = result.resolved ? result.value : await this.evaluate(result.value);
        if (siblings.length === 0) return value;

        const evaluated = createMap(await this.evaluateEntries(siblings));
        return inlineMerge(value, evaluated, result.inlineMerge ?? this.settings.inlineMerge);
    }
}
