export type ResolutionErrorCode =
    | 'UNKNOWN_SCOPE'
    | 'PATH_NOT_FOUND'
    | 'CYCLE_DETECTED'
    | 'KEY_CONFLICT'
    | 'VALIDATION_ERROR'
    | 'INVALID_DIRECTIVE'
    | 'DUPLICATE_DIRECTIVE'
    | 'RESOURCE_RESOLUTION_ERROR'
    | 'TRANSFORM_ERROR'
    | 'PRE_EVAL_ERROR'
    | 'MAX_DEPTH_EXCEEDED';

/**
 * Base class for every failure raised while registering directives or
 * evaluating a document.
 *
 * `location` is filled in while the error propagates out of the tree walk:
 * map keys and sequence indexes, outermost first.
 */
export class ResolutionError extends Error {
    public readonly location: string[] = [];

    constructor(message: string, public readonly code: ResolutionErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ResolutionError';
    }

    /** Records one more enclosing key; called by the evaluator on the way out. */
    within(segment: string): this {
        this.location.unshift(segment);
        return this;
    }
}

export class UnknownScopeError extends ResolutionError {
    constructor(public readonly scope: string, message: string = `unknown scope '${scope}'`) {
        super(message, 'UNKNOWN_SCOPE');
        this.name = 'UnknownScopeError';
    }
}

export class PathNotFoundError extends ResolutionError {
    constructor(public readonly scope: string, public readonly path: string) {
        super(`path '${path}' not found in ${scope} scope`, 'PATH_NOT_FOUND');
        this.name = 'PathNotFoundError';
    }
}

export class CycleDetectedError extends ResolutionError {
    constructor(public readonly chain: string[]) {
        super(`cyclic reference detected: ${chain.join(' -> ')}`, 'CYCLE_DETECTED');
        this.name = 'CycleDetectedError';
    }
}

export class KeyConflictError extends ResolutionError {
    constructor(public readonly key: string) {
        super(`key conflict: '${key}' already exists`, 'KEY_CONFLICT');
        this.name = 'KeyConflictError';
    }
}

export class ValidationError extends ResolutionError {
    constructor(message: string, public readonly directive?: string, options?: { cause?: unknown }) {
        super(message, 'VALIDATION_ERROR', options);
        this.name = 'ValidationError';
    }
}

export class DirectiveRegistrationError extends ResolutionError {
    constructor(message: string, code: 'INVALID_DIRECTIVE' | 'DUPLICATE_DIRECTIVE' = 'INVALID_DIRECTIVE') {
        super(message, code);
        this.name = 'DirectiveRegistrationError';
    }
}

export class DuplicateDirectiveError extends DirectiveRegistrationError {
    constructor(public readonly directive: string) {
        super(`directive ${directive} already registered`, 'DUPLICATE_DIRECTIVE');
        this.name = 'DuplicateDirectiveError';
    }
}

export class ResourceResolutionError extends ResolutionError {
    constructor(public readonly resourceType: string, public readonly selector: string, cause?: unknown) {
        super(`failed to resolve resource ${resourceType}::${selector}: ${describeCause(cause)}`, 'RESOURCE_RESOLUTION_ERROR', { cause });
        this.name = 'ResourceResolutionError';
    }
}

export class TransformError extends ResolutionError {
    constructor(public readonly component: string, cause?: unknown) {
        super(`transform of ${component} failed: ${describeCause(cause)}`, 'TRANSFORM_ERROR', { cause });
        this.name = 'TransformError';
    }
}

export class HookError extends ResolutionError {
    constructor(cause?: unknown) {
        super(`pre-evaluation hook failed: ${describeCause(cause)}`, 'PRE_EVAL_ERROR', { cause });
        this.name = 'HookError';
    }
}

export class MaxDepthExceededError extends ResolutionError {
    constructor(public readonly maxDepth: number, public readonly chain: string[]) {
        super(`maximum reference depth of ${maxDepth} exceeded at ${chain[chain.length - 1] ?? '<root>'}`, 'MAX_DEPTH_EXCEEDED');
        this.name = 'MaxDepthExceededError';
    }
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    if (cause === undefined) return 'unknown error';
    return String(cause);
}
