import { LRUCache } from 'lru-cache';
import { Node, cloneNode } from './node/types.js';
import type { InlineMergeOptions } from './merge.js';
import type { ReferenceTarget } from './scope.js';

export interface CacheSettings {
    /** Upper bound on the summed cost estimate of cached values. */
    maxCost: number;
    /** Upper bound on the number of cached values. */
    maxEntries: number;
}

export const DEFAULT_CACHE_SETTINGS: CacheSettings = Object.freeze({
    maxCost: 100 * 1024 * 1024,
    maxEntries: 10_000,
});

export interface CacheStats {
    hits: number;
    misses: number;
    size: number;
    cost: number;
}

/**
 * Rough memory estimate for a node, in bytes. Used for admission only.
 */
export function estimateNodeCost(node: Node): number {
    switch (node.kind) {
        case 'null':
            return 1;
        case 'bool':
            return 1;
        case 'number':
            return 8;
        case 'string':
            return 10 + node.value.length;
        case 'seq':
            return node.items.reduce((sum, item) => sum + 15 + estimateNodeCost(item), 30);
        case 'map': {
            let sum = 50;
            for (const [key, child] of node.entries) {
                sum += 20 + key.length + estimateNodeCost(child);
            }
            return sum;
        }
    }
}

function normalizeInline(options: InlineMergeOptions | undefined): [string, string] | null {
    if (!options) return null;
    return [options.strategy ?? '', options.keyConflict];
}

/**
 * Cache key for a reference: namespace, scope, resource type, trimmed path
 * and inline merge options. Two references share an entry only when all of
 * them agree. Each evaluator keys its entries under its own namespace.
 */
export function fingerprint(target: ReferenceTarget, namespace = ''): string {
    return JSON.stringify([
        namespace,
        target.scope,
        target.resourceType ?? '',
        target.path,
        normalizeInline(target.inlineMerge),
    ]);
}

export interface CacheEntry {
    value: Node;
    /** Nested reference levels the resolution used, counting its own. */
    depth: number;
}

/**
 * Memo of resolved references, bounded by entry count and estimated cost.
 * Values are copied on the way in and on the way out so callers may mutate
 * what they receive.
 */
export class ResolutionCache {
    private store: LRUCache<string, CacheEntry>;
    private hits = 0;
    private misses = 0;

    constructor(settings: Partial<CacheSettings> = {}) {
        const maxCost = settings.maxCost ?? DEFAULT_CACHE_SETTINGS.maxCost;
        const maxEntries = settings.maxEntries ?? DEFAULT_CACHE_SETTINGS.maxEntries;
        this.store = new LRUCache<string, CacheEntry>({
            max: maxEntries,
            maxSize: maxCost,
            sizeCalculation: entry => Math.max(1, estimateNodeCost(entry.value)),
        });
    }

    /**
     * Looks up a resolved value. An entry whose depth exceeds `depthBudget`
     * counts as a miss: resolving it from the current position would pass
     * the depth cap.
     */
    get(key: string, depthBudget = Infinity): CacheEntry | undefined {
        const entry = this.store.get(key);
        if (entry === undefined || entry.depth > depthBudget) {
            this.misses++;
            return undefined;
        }
        this.hits++;
        return { value: cloneNode(entry.value), depth: entry.depth };
    }

    set(key: string, value: Node, depth = 1): void {
        this.store.set(key, { value: cloneNode(value), depth });
    }

    has(key: string): boolean {
        return this.store.has(key);
    }

    clear(): void {
        this.store.clear();
    }

    stats(): CacheStats {
        return {
            hits: this.hits,
            misses: this.misses,
            size: this.store.size,
            cost: this.store.calculatedSize,
        };
    }
}
