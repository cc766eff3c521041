import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { CacheSettings, DEFAULT_CACHE_SETTINGS } from './cache.js';
import type { RunOptions } from './runner.js';

export const CONFIG_FILE_NAME = '.yamlrefs.yml';

export class ConfigError extends Error {
    constructor(message: string, public readonly file?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

function positiveInt(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    return Number.isInteger(value) && value > 0 ? value : undefined;
}

/**
 * Cache limits from explicit settings, then `YAMLREFS_CACHE_*` variables,
 * then defaults. Returns undefined when `YAMLREFS_CACHE_DISABLED` is set to
 * a true value. Unparsable or non-positive values are ignored.
 */
export function resolveCacheSettings(
    input: Partial<CacheSettings> = {},
    env: Record<string, string | undefined> = process.env
): CacheSettings | undefined {
    const disabled = env.YAMLREFS_CACHE_DISABLED?.trim().toLowerCase();
    if (disabled === '1' || disabled === 'true' || disabled === 'yes') return undefined;

    return {
        maxCost: input.maxCost ?? positiveInt(env.YAMLREFS_CACHE_MAX_COST) ?? DEFAULT_CACHE_SETTINGS.maxCost,
        maxEntries: input.maxEntries ?? positiveInt(env.YAMLREFS_CACHE_MAX_ENTRIES) ?? DEFAULT_CACHE_SETTINGS.maxEntries,
    };
}

const cacheSchema = z.union([
    z.boolean(),
    z.object({
        maxCost: z.number().int().positive().optional(),
        maxEntries: z.number().int().positive().optional(),
    }).strict(),
]);

const optionsSchema = z.object({
    local: z.string().optional(),
    global: z.string().optional(),
    resources: z.string().optional(),
    format: z.enum(['yaml', 'json']).optional(),
    outDir: z.string().optional(),
    env: z.boolean().optional(),
    cache: cacheSchema.optional(),
    strategy: z.enum(['deep', 'shallow', 'replace']).optional(),
    keyConflict: z.enum(['replace', 'first', 'error']).optional(),
    maxDepth: z.number().int().positive().optional(),
    components: z.array(z.string().min(1)).optional(),
    ignore: z.union([z.string(), z.array(z.string())]).optional(),
}).strict();

export const configFileSchema = optionsSchema.extend({
    profiles: z.record(optionsSchema).optional(),
});

export type ConfigOptions = z.infer<typeof optionsSchema>;
export type ConfigFile = z.infer<typeof configFileSchema>;

const PATH_KEYS = ['local', 'global', 'resources', 'outDir'] as const;

function resolvePaths(options: ConfigOptions, baseDir: string): ConfigOptions {
    const out: ConfigOptions = { ...options };
    for (const key of PATH_KEYS) {
        const value = out[key];
        if (value !== undefined) out[key] = path.resolve(baseDir, value);
    }
    return out;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
        .join('; ');
}

/**
 * Reads and validates a config file. Paths inside it are resolved against
 * the file's directory. Returns undefined when the file does not exist.
 */
export function loadConfigFile(filePath: string): ConfigFile | undefined {
    if (!existsSync(filePath)) return undefined;

    let raw: unknown;
    try {
        raw = parse(readFileSync(filePath, 'utf8'));
    } catch (e) {
        throw new ConfigError(`Failed to parse config file at ${filePath}`, filePath, { cause: e });
    }
    if (raw === null || raw === undefined) return {};

    const result = configFileSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid config file at ${filePath}: ${formatIssues(result.error)}`, filePath);
    }

    const baseDir = path.dirname(path.resolve(filePath));
    const { profiles, ...base } = result.data;
    const config: ConfigFile = resolvePaths(base, baseDir);
    if (profiles) {
        config.profiles = {};
        for (const [name, profile] of Object.entries(profiles)) {
            config.profiles[name] = resolvePaths(profile, baseDir);
        }
    }
    return config;
}

function toList(value: string | string[] | undefined): string[] {
    if (value === undefined) return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Overlays `source` on `target`. Scalars replace, `ignore` patterns
 * accumulate.
 */
export function applyConfig(source: ConfigOptions | undefined, target: ConfigOptions): ConfigOptions {
    if (!source) return target;
    const ignore = [...toList(target.ignore), ...toList(source.ignore)];
    const merged: ConfigOptions = { ...target, ...source };
    if (ignore.length > 0) merged.ignore = ignore;
    return merged;
}

/**
 * Effective options of a config file for an optional profile. Unknown
 * profiles are an error.
 */
export function selectProfile(config: ConfigFile, profile?: string): ConfigOptions {
    const { profiles, ...base } = config;
    if (profile === undefined) return base;

    const selected = profiles?.[profile];
    if (!selected) {
        const known = Object.keys(profiles ?? {});
        throw new ConfigError(`Unknown profile "${profile}"${known.length > 0 ? ` (known: ${known.join(', ')})` : ''}`);
    }
    return applyConfig(selected, base);
}

/** Commander option parser for repeatable flags. */
export function repeatable(value: string, memo: string[]): string[] {
    return [...memo, value];
}

/** Command-line flags as commander reports them. */
export const cliOptionsSchema = z.object({
    local: z.string().optional(),
    global: z.string().optional(),
    resources: z.string().optional(),
    format: z.enum(['yaml', 'json']).optional(),
    outDir: z.string().optional(),
    env: z.boolean().optional(),
    cache: z.boolean().optional(),
    strategy: z.enum(['deep', 'shallow', 'replace']).optional(),
    keyConflict: z.enum(['replace', 'first', 'error']).optional(),
    maxDepth: z.coerce.number().int().positive().optional(),
    component: z.array(z.string()).default([]),
    ignore: z.array(z.string()).default([]),
    config: z.string().optional(),
    profile: z.string().optional(),
    report: z.enum(['pretty', 'plain', 'json', 'compact']).default('pretty'),
    color: z.enum(['auto', 'always', 'never']).default('auto'),
    verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export function parseCliOptions(raw: unknown): CliOptions {
    const result = cliOptionsSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid options: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Run options from command-line flags over config file options. Flags win;
 * ignore patterns and components from both are kept.
 */
export function toRunOptions(patterns: string[], flags: CliOptions, file: ConfigOptions = {}): RunOptions {
    const cache = flags.cache ?? file.cache;
    const components = [...(file.components ?? []), ...flags.component];

    return {
        patterns,
        ignore: [...toList(file.ignore), ...flags.ignore],
        local: flags.local ?? file.local,
        global: flags.global ?? file.global,
        resources: flags.resources ?? file.resources,
        format: flags.format ?? file.format ?? 'yaml',
        outDir: flags.outDir ?? file.outDir,
        env: flags.env ?? file.env ?? false,
        cache: cache ?? true,
        strategy: flags.strategy ?? file.strategy,
        keyConflict: flags.keyConflict ?? file.keyConflict,
        maxDepth: flags.maxDepth ?? file.maxDepth,
        components: components.length > 0 ? components : undefined,
    };
}
