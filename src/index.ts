export * from './core/node/types.js';
export * from './core/errors.js';
export {
    Evaluator, DEFAULT_MAX_DEPTH,
} from './core/evaluator.js';
export type { EvaluatorOptions } from './core/evaluator.js';
export { EvaluationContext } from './core/context.js';
export type { TransformUseFn, TransformResult, PreEvalHook } from './core/context.js';
export { DirectiveRegistry, createDefaultRegistry } from './core/registry.js';
export type { Directive, DirectiveContext, DirectiveHandler, DirectiveKind, DirectiveResult } from './core/directives/types.js';
export { refDirective } from './core/directives/ref.js';
export { useDirective, parseUse, DEFAULT_COMPONENTS } from './core/directives/use.js';
export { mergeDirective } from './core/directives/merge.js';
export {
    mergeValues, mergeAll, mergeArrays, inlineMerge, parseMergeOptions,
    DEFAULT_MERGE_OPTIONS, DEFAULT_INLINE_MERGE_OPTIONS, OBJECT_STRATEGIES, ARRAY_STRATEGIES, KEY_CONFLICTS,
} from './core/merge.js';
export type { MergeOptions, InlineMergeOptions, ObjectStrategy, ArrayStrategy, KeyConflict } from './core/merge.js';
export { parseReference, referenceIdentity, ScopeResolver, DocMetadata, SCOPES } from './core/scope.js';
export type { ReferenceTarget, ResourceResolver, ScopeKind, ScopeRoots } from './core/scope.js';
export { DottedPathQuery, wildcardMatch } from './core/path/query.js';
export type { PathQuery, DottedPathQueryOptions } from './core/path/query.js';
export { parsePath, parseCondition } from './core/path/parser.js';
export { ResolutionCache, DEFAULT_CACHE_SETTINGS, estimateNodeCost, fingerprint } from './core/cache.js';
export type { CacheEntry, CacheSettings, CacheStats } from './core/cache.js';
export { resolveCacheSettings } from './core/config.js';
export { createEnvSubstitutionHook, substituteEnv, MissingVariableError } from './core/hooks.js';
export type { EnvSource } from './core/hooks.js';
export { FileResourceResolver } from './core/resources.js';
export type { FileResourceResolverOptions } from './core/resources.js';
export type { ValidationResult } from './core/validation-utils.js';
export { rootLogger, getLogger } from './core/logger.js';
export type { Logger } from './core/logger.js';
export { loadNode, loadAllNodes, serialize } from './parser/yaml.js';
export type { OutputFormat } from './parser/yaml.js';
export { evaluateText, evaluateStream, evaluateFile } from './api.js';
export type { EvaluatorInput } from './api.js';
