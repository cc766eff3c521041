import fg from 'fast-glob';
import { readFileSync, writeFileSync, mkdirSync } from 'fs';
import path from 'path';
import { Node } from './node/types.js';
import { Evaluator } from './evaluator.js';
import { FileResourceResolver } from './resources.js';
import { createEnvSubstitutionHook, EnvSource } from './hooks.js';
import { resolveCacheSettings } from './config.js';
import type { CacheSettings, CacheStats } from './cache.js';
import type { KeyConflict, ObjectStrategy } from './merge.js';
import { ResolutionError } from './errors.js';
import type { Logger } from './logger.js';
import { OutputFormat, documentToNode, getRangeAt, loadNode, parseYaml, serialize } from '../parser/yaml.js';
import { Diagnostic } from '../types/diagnostic.js';

export interface RunOptions {
    /** Files or glob patterns, relative to `cwd`. */
    patterns: string[];
    cwd?: string;
    ignore?: string[];
    local?: string;
    global?: string;
    resources?: string;
    format?: OutputFormat;
    /** Write resolved files here, mirroring their relative paths. */
    outDir?: string;
    /** `true` reads `process.env`. */
    env?: boolean | EnvSource;
    cache?: boolean | Partial<CacheSettings>;
    strategy?: ObjectStrategy;
    keyConflict?: KeyConflict;
    maxDepth?: number;
    components?: string[];
    logger?: Logger;
}

export interface FileResult {
    file: string;
    output?: string;
    outputPath?: string;
    diagnostics: Diagnostic[];
}

export interface RunSummary {
    files: FileResult[];
    errors: number;
    warnings: number;
    cache?: CacheStats;
}

export function loadScopeFile(filePath: string): Node {
    return loadNode(readFileSync(filePath, 'utf8'));
}

function outputName(file: string, format: OutputFormat): string {
    if (format === 'json') return file.replace(/\.(ya?ml|json)$/i, '') + '.json';
    return file.replace(/\.json$/i, '.yml');
}

function createEvaluator(options: RunOptions, cwd: string): Evaluator {
    const cache = options.cache === false
        ? undefined
        : resolveCacheSettings(options.cache === true || options.cache === undefined ? {} : options.cache);
    const env = options.env === true ? process.env : options.env || undefined;

    return new Evaluator({
        localScope: options.local ? loadScopeFile(path.resolve(cwd, options.local)) : undefined,
        globalScope: options.global ? loadScopeFile(path.resolve(cwd, options.global)) : undefined,
        resourceResolver: options.resources ? new FileResourceResolver(path.resolve(cwd, options.resources)) : undefined,
        preEval: env ? createEnvSubstitutionHook(env) : undefined,
        cache: cache ?? false,
        inlineMerge: {
            ...(options.strategy ? { strategy: options.strategy } : {}),
            ...(options.keyConflict ? { keyConflict: options.keyConflict } : {}),
        },
        components: options.components,
        maxDepth: options.maxDepth,
        logger: options.logger,
    });
}

function errorDiagnostic(e: unknown, file: string): Diagnostic {
    if (e instanceof ResolutionError) {
        return {
            code: e.code,
            message: e.message,
            severity: 'error',
            file,
            path: e.location.length > 0 ? [...e.location] : undefined,
        };
    }
    return {
        code: 'EVALUATION_ERROR',
        message: e instanceof Error ? e.message : String(e),
        severity: 'error',
        file
    };
}

/**
 * Reads, evaluates and writes one file. Problems with the file are returned
 * as diagnostics, never thrown.
 */
export async function resolveFile(evaluator: Evaluator, cwd: string, file: string, options: RunOptions): Promise<FileResult> {
    const format = options.format ?? 'yaml';
    const fullPath = path.resolve(cwd, file);

    let text: string;
    try {
        text = readFileSync(fullPath, 'utf8');
    } catch (e) {
        return {
            file,
            diagnostics: [{
                code: 'FILE_READ_ERROR',
                message: `cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`,
                severity: 'error',
                file
            }]
        };
    }

    const { parsed, diagnostics } = parseYaml(text, file);
    const result: FileResult = { file, diagnostics };
    if (!parsed) return result;

    let output: string;
    try {
        const resolved = await evaluator.evaluate(documentToNode(parsed.doc));
        output = serialize(resolved, format);
    } catch (e) {
        const diagnostic = errorDiagnostic(e, file);
        if (diagnostic.path) diagnostic.range = getRangeAt(parsed, diagnostic.path);
        diagnostics.push(diagnostic);
        return result;
    }

    result.output = output;
    if (options.outDir) {
        const outPath = path.join(path.resolve(cwd, options.outDir), outputName(file, format));
        mkdirSync(path.dirname(outPath), { recursive: true });
        writeFileSync(outPath, output, 'utf8');
        result.outputPath = outPath;
    }
    return result;
}

/**
 * Resolves every file the patterns match, in sorted order, with one shared
 * evaluator. Files fail independently; failures become diagnostics.
 */
export async function resolveFiles(options: RunOptions): Promise<RunSummary> {
    const cwd = path.resolve(options.cwd ?? process.cwd());
    const matched = (await fg(options.patterns, {
        cwd,
        onlyFiles: true,
        ignore: ['**/node_modules/**', ...(options.ignore ?? [])]
    })).sort();

    // Scope files and earlier output are inputs to the run, not documents in it
    const excluded = [options.local, options.global]
        .filter((f): f is string => f !== undefined)
        .map(f => path.resolve(cwd, f));
    const outRoot = options.outDir ? path.resolve(cwd, options.outDir) + path.sep : undefined;
    const files = matched.filter(f => {
        const full = path.resolve(cwd, f);
        return !excluded.includes(full) && !(outRoot && full.startsWith(outRoot));
    });

    const evaluator = createEvaluator(options, cwd);
    const results: FileResult[] = [];
    for (const file of files) {
        results.push(await resolveFile(evaluator, cwd, file, options));
    }

    const all = results.flatMap(r => r.diagnostics);
    return {
        files: results,
        errors: all.filter(d => d.severity === 'error').length,
        warnings: all.filter(d => d.severity === 'warning').length,
        cache: evaluator.cacheStats(),
    };
}
