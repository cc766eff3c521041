#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Reporter } from './core/reporter.js';
import { resolveFiles, RunSummary } from './core/runner.js';
import {
    CliOptions, CONFIG_FILE_NAME, ConfigOptions, loadConfigFile, parseCliOptions, repeatable, selectProfile, toRunOptions,
} from './core/config.js';
import { rootLogger } from './core/logger.js';

const pkg = z.object({ version: z.string() })
    .parse(JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8')));

const program = new Command();

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

function writeDocuments(summary: RunSummary, format: 'yaml' | 'json'): void {
    const outputs = summary.files
        .filter(f => f.output !== undefined && f.outputPath === undefined)
        .map(f => f.output ?? '');
    if (outputs.length === 0) return;
    process.stdout.write(format === 'yaml' ? outputs.join('---\n') : outputs.join(''));
}

program
    .name('yamlrefs')
    .description('Resolve $ref, $use and $merge directives in YAML and JSON files')
    .version(pkg.version)
    .argument('<patterns...>', 'Files or glob patterns to resolve')
    .option('--local <file>', 'Document used as the local:: scope')
    .option('--global <file>', 'Document used as the global:: scope')
    .option('--resources <dir>', 'Directory served as resource::<type>::<selector>')
    .option('--format <yaml|json>', 'Output format (yaml, json)')
    .option('--out-dir <dir>', 'Write resolved files here instead of stdout')
    .option('--env', 'Expand ${VAR} and ${VAR:-default} in string values')
    .option('--cache', 'Cache resolved references across files (default)')
    .option('--no-cache', 'Disable the reference cache')
    .option('--strategy <deep|shallow|replace>', 'Inline merge strategy when a directive has no !merge: suffix')
    .option('--key-conflict <replace|first|error>', 'Inline merge key conflict rule when a directive has no !merge: suffix')
    .option('--max-depth <number>', 'Maximum number of nested references')
    .option('--component <name>', 'Allow an extra $use component (can be used multiple times)', repeatable, [])
    .option('--ignore <glob>', 'Ignore files matching the given glob patterns (can be used multiple times)', repeatable, [])
    .option('--config <path>', `Path to a config file (defaults to ${CONFIG_FILE_NAME} in the working directory)`)
    .option('--profile <name>', 'Use a specific profile from the config file')
    .option('--report <pretty|plain|json|compact>', 'Diagnostics format (pretty, plain, json, compact)', 'pretty')
    .option('--color <auto|always|never>', 'Color output (auto, always, never)', 'auto')
    .option('--verbose', 'Log resolution details to stderr', false)
    .action(async (patterns: string[], raw: Record<string, unknown>) => {
        let flags: CliOptions;
        try {
            flags = parseCliOptions(raw);
        } catch (e) {
            new Reporter({ color: 'auto', format: 'pretty' }).printError(errorMessage(e));
            process.exitCode = 2;
            return;
        }

        const reporter = new Reporter({ color: flags.color, format: flags.report });
        if (flags.verbose) {
            rootLogger.level = 'debug';
        }

        const configPath = flags.config ?? path.join(process.cwd(), CONFIG_FILE_NAME);

        let fileOptions: ConfigOptions = {};
        try {
            const config = loadConfigFile(configPath);
            if (config) {
                fileOptions = selectProfile(config, flags.profile);
                if (flags.verbose) reporter.printInfo(`Using config ${configPath}${flags.profile ? ` (profile ${flags.profile})` : ''}`);
            } else if (flags.config || flags.profile) {
                reporter.printError(`Config file not found at ${configPath}`);
                process.exitCode = 1;
                return;
            }
        } catch (e) {
            reporter.printError(errorMessage(e));
            process.exitCode = 1;
            return;
        }

        const runOptions = toRunOptions(patterns, flags, fileOptions);
        let summary: RunSummary;
        try {
            summary = await resolveFiles({ ...runOptions, logger: rootLogger.child({ component: 'cli' }) });
        } catch (e) {
            reporter.printError(errorMessage(e));
            process.exitCode = 1;
            return;
        }

        if (summary.files.length === 0) {
            reporter.printError(`No files matched ${patterns.join(', ')}`);
            process.exitCode = 1;
            return;
        }

        reporter.printBanner(pkg.version, summary.files.length);
        for (const file of summary.files) {
            reporter.printFileReport(file);
        }

        writeDocuments(summary, runOptions.format ?? 'yaml');

        const failed = summary.files.filter(f => f.diagnostics.some(d => d.severity === 'error')).length;
        const warned = summary.files.filter(f =>
            !f.diagnostics.some(d => d.severity === 'error') && f.diagnostics.some(d => d.severity === 'warning')
        ).length;

        reporter.printSummary({
            files: {
                total: summary.files.length,
                resolved: summary.files.length - failed,
                warned,
                failed
            },
            cache: summary.cache
        }, summary.errors, summary.warnings);

        if (summary.errors === 0 && summary.warnings === 0) {
            reporter.printSuccess();
        }

        if (summary.errors > 0) process.exitCode = 1;
    });

await program.parseAsync();
