import type { Node } from '../node/types.js';
import type { InlineMergeOptions } from '../merge.js';
import type { ReferenceTarget } from '../scope.js';
import type { ValidationResult } from '../validation-utils.js';
import type { Logger } from '../logger.js';

export type DirectiveKind = 'ref' | 'use' | 'merge' | 'custom';

export interface DirectiveResult {
    value: Node;
    /** How `value` combines with sibling keys of the directive's mapping. */
    inlineMerge?: InlineMergeOptions;
    /** `value` is fully evaluated already and is not walked again. */
    resolved?: boolean;
}

/**
 * What a directive handler can ask of the evaluation in progress.
 */
export interface DirectiveContext {
    evaluate(node: Node): Promise<Node>;
    /** Fetches, evaluates and caches a reference under the cycle guard. */
    resolveReference(target: ReferenceTarget): Promise<Node>;
    /**
     * Wraps a resolved `$use` value as `{ key: value }`. Output of a
     * configured transform is evaluated before it is returned.
     */
    transformUse(component: string, value: Node, target: ReferenceTarget): Promise<Node>;
    readonly components: ReadonlySet<string>;
    readonly logger: Logger;
}

export type DirectiveHandler = (ctx: DirectiveContext, payload: Node) => DirectiveResult | Promise<DirectiveResult>;

export interface Directive {
    /** Mapping key that triggers the directive, `$`-prefixed. */
    name: string;
    kind: DirectiveKind;
    /** Defaults to true. */
    allowsSiblings?: boolean;
    validate?: (payload: Node) => ValidationResult;
    handle: DirectiveHandler;
}
