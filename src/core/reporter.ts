import { Diagnostic, Severity, FileStats } from '../types/diagnostic.js';
import type { CacheStats } from './cache.js';
import ansis from 'ansis';

export type ReportFormat = 'pretty' | 'plain' | 'json' | 'compact';
export type ColorMode = 'auto' | 'always' | 'never';

export interface OutputStream {
    write(chunk: string): unknown;
    isTTY?: boolean;
}

export interface ReporterOptions {
    color: ColorMode;
    format: ReportFormat;
    /** Defaults to stderr so resolved documents can go to stdout. */
    stream?: OutputStream;
    env?: Record<string, string | undefined>;
}

export interface FileReport {
    file: string;
    outputPath?: string;
    diagnostics: Diagnostic[];
}

export interface SummaryStats {
    files: FileStats;
    cache?: CacheStats;
}

export class Reporter {
    private options: ReporterOptions;
    private stream: OutputStream;
    private shouldColor: boolean;
    private startTime: number;

    constructor(options: ReporterOptions) {
        this.options = options;
        this.stream = options.stream ?? process.stderr;
        this.shouldColor = this.shouldUseColor();
        this.startTime = Date.now();
    }

    private shouldUseColor(): boolean {
        if (this.options.color === 'never') return false;
        if (this.options.color === 'always') return true;
        if (this.options.format === 'plain' || this.options.format === 'json') return false;

        // auto mode: check environment
        const env = this.options.env ?? process.env;
        const hasNoColor = env.NO_COLOR !== undefined;
        const hasForceColor = env.FORCE_COLOR !== undefined;

        return !hasNoColor && (hasForceColor || this.stream.isTTY === true);
    }

    private write(line: string = ''): void {
        this.stream.write(line + '\n');
    }

    private getElapsedTime(): string {
        const elapsed = Date.now() - this.startTime;
        return (elapsed / 1000).toFixed(2);
    }

    private colorize(text: string, color: (text: string) => string): string {
        return this.shouldColor ? color(text) : text;
    }

    private getSeverityIcon(severity: Severity): string {
        return severity === 'error' ? '✖' : '⚠';
    }

    private getSeverityColor(severity: Severity): (text: string) => string {
        return severity === 'error' ? ansis.red : ansis.yellow;
    }

    formatDiagnostic(diagnostic: Diagnostic): string {
        const { file, code, message, severity, range } = diagnostic;
        const icon = this.getSeverityIcon(severity);
        const severityText = severity.toUpperCase();
        const location = range ? `:${range.start.line}:${range.start.col}` : '';

        if (this.options.format === 'json') {
            return JSON.stringify(diagnostic);
        }

        if (this.options.format === 'compact') {
            const severityChar = severity === 'error' ? 'E' : 'W';
            return `${file}${location} [${code}] ${severityChar}: ${message}`;
        }

        const coloredIcon = this.colorize(icon, this.getSeverityColor(severity));
        const coloredSeverity = this.colorize(severityText, this.getSeverityColor(severity));
        const coloredCode = this.colorize(`[${code}]`, ansis.cyan);
        const coloredLocation = this.colorize(`${file}${location}`, ansis.bold);

        return `  ${coloredIcon} ${coloredSeverity}  ${coloredCode}  ${coloredLocation}  ${message}`;
    }

    private formatContext(context: string): string {
        return this.colorize(`    ↳ at ${context}`, ansis.dim);
    }

    printBanner(version: string, fileCount: number): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            return;
        }

        const header = this.colorize(`┌ yamlrefs ${version}  •  Resolving ${fileCount} file${fileCount === 1 ? '' : 's'}`, ansis.bold);
        const divider = this.colorize('└────────────────────────────────────────────────────────', ansis.dim);

        this.write(header);
        this.write(divider);
        this.write();
    }

    printFileReport(report: FileReport): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            report.diagnostics.forEach(d => this.write(this.formatDiagnostic(d)));
            return;
        }

        const failed = report.diagnostics.some(d => d.severity === 'error');
        const icon = failed ? this.colorize('✖', ansis.red) : this.colorize('✓', ansis.green);
        const target = report.outputPath ? this.colorize(` → ${report.outputPath}`, ansis.dim) : '';
        this.write(`${icon} ${this.colorize(report.file, ansis.bold)}${target}`);

        report.diagnostics.forEach(diagnostic => {
            this.write(this.formatDiagnostic(diagnostic));
            if (diagnostic.path && diagnostic.path.length > 0) {
                this.write(this.formatContext(diagnostic.path.join(' → ')));
            }
        });
    }

    printSummary(stats: SummaryStats, totalErrors: number, totalWarnings: number): void {
        if (this.options.format === 'json') {
            this.write(JSON.stringify({
                summary: stats,
                totals: { errors: totalErrors, warnings: totalWarnings },
                timing: { elapsedSeconds: this.getElapsedTime() }
            }, null, 2));
            return;
        }

        if (this.options.format === 'compact') {
            this.write(`Summary: ${totalErrors} errors, ${totalWarnings} warnings (${this.getElapsedTime()}s)`);
            return;
        }

        const divider = this.colorize('────────────────────────────────────────────────────────', ansis.dim);
        this.write();
        this.write(divider);
        this.write(this.colorize('Summary', ansis.bold));
        this.write();

        this.write(this.colorize('Files:', ansis.cyan) + ` ${stats.files.total}`);
        this.printStatusLine(stats.files.resolved, stats.files.warned, stats.files.failed);
        this.write();

        if (stats.cache) {
            const { hits, misses, size } = stats.cache;
            this.write(this.colorize('Cache:', ansis.cyan) + ` ${hits} hits, ${misses} misses, ${size} entries`);
            this.write();
        }

        this.write(this.colorize(`Resolved ${stats.files.total} files in ${this.getElapsedTime()}s`, ansis.dim));

        const exitCode = totalErrors > 0 ? 1 : 0;
        this.write(this.colorize(`Exit code: ${exitCode}`, exitCode === 0 ? ansis.green : ansis.red));
    }

    private printStatusLine(resolved: number, warned: number, failed: number): void {
        const resolvedStr = this.colorize(`Resolved: ${resolved}`, ansis.green);
        const warnedStr = this.colorize(`Warned: ${warned}`, warned > 0 ? ansis.yellow : ansis.dim);
        const failedStr = this.colorize(`Failed: ${failed}`, failed > 0 ? ansis.red : ansis.dim);

        this.write(`  ${resolvedStr}  ${warnedStr}  ${failedStr}`);
    }

    printSuccess(): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            return;
        }

        this.write();
        const successIcon = this.colorize('✓', ansis.green);
        const successMsg = this.colorize('All references resolved!', ansis.green.bold);
        this.write(`${successIcon} ${successMsg}`);
    }

    printError(message: string): void {
        if (this.options.format === 'json') {
            this.write(JSON.stringify({ error: message }));
            return;
        }

        this.write(this.colorize(`Error: ${message}`, ansis.red));
    }

    printWarning(message: string): void {
        if (this.options.format === 'json') {
            this.write(JSON.stringify({ warning: message }));
            return;
        }

        this.write(this.colorize(`Warning: ${message}`, ansis.yellow));
    }

    printInfo(message: string): void {
        if (this.options.format === 'json') return;

        this.write(this.colorize(message, ansis.dim));
    }
}
