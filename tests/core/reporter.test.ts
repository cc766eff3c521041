import { describe, it, expect } from 'vitest';
import { Reporter, ReporterOptions } from '../../src/core/reporter.js';
import { Diagnostic } from '../../src/types/diagnostic.js';

function capture(options: Omit<ReporterOptions, 'stream' | 'env'>): { reporter: Reporter; lines: () => string[] } {
    let out = '';
    const reporter = new Reporter({
        ...options,
        env: {},
        stream: { write: (chunk: string) => { out += chunk; }, isTTY: false },
    });
    return { reporter, lines: () => out.split('\n').slice(0, -1) };
}

const diagnostic: Diagnostic = {
    code: 'PATH_NOT_FOUND',
    message: "path 'nope' not found in local scope",
    severity: 'error',
    file: 'app.yml',
    path: ['x', '$ref'],
    range: { start: { line: 2, col: 9, offset: 11 }, end: { line: 2, col: 20, offset: 22 } },
};

describe('Reporter', () => {
    it('formats diagnostics per report format', () => {
        const pretty = capture({ color: 'auto', format: 'pretty' }).reporter;
        const compact = capture({ color: 'auto', format: 'compact' }).reporter;
        const json = capture({ color: 'auto', format: 'json' }).reporter;

        expect(pretty.formatDiagnostic(diagnostic))
            .toBe("  ✖ ERROR  [PATH_NOT_FOUND]  app.yml:2:9  path 'nope' not found in local scope");
        expect(compact.formatDiagnostic(diagnostic))
            .toBe("app.yml:2:9 [PATH_NOT_FOUND] E: path 'nope' not found in local scope");
        expect(JSON.parse(json.formatDiagnostic(diagnostic))).toEqual(diagnostic);
    });

    it('prints a file report with the failing location', () => {
        const { reporter, lines } = capture({ color: 'never', format: 'pretty' });
        reporter.printFileReport({ file: 'app.yml', diagnostics: [diagnostic] });
        expect(lines()).toEqual([
            '✖ app.yml',
            "  ✖ ERROR  [PATH_NOT_FOUND]  app.yml:2:9  path 'nope' not found in local scope",
            '    ↳ at x → $ref',
        ]);
    });

    it('shows where output was written', () => {
        const { reporter, lines } = capture({ color: 'never', format: 'plain' });
        reporter.printFileReport({ file: 'app.yml', outputPath: 'out/app.yml', diagnostics: [] });
        expect(lines()).toEqual(['✓ app.yml → out/app.yml']);
    });

    it('prints the banner', () => {
        const { reporter, lines } = capture({ color: 'never', format: 'pretty' });
        reporter.printBanner('0.3.0', 2);
        expect(lines()[0]).toBe('┌ yamlrefs 0.3.0  •  Resolving 2 files');
    });

    it('prints nothing but diagnostics in compact mode', () => {
        const { reporter, lines } = capture({ color: 'never', format: 'compact' });
        reporter.printBanner('0.3.0', 1);
        reporter.printFileReport({ file: 'app.yml', diagnostics: [diagnostic] });
        reporter.printSuccess();
        expect(lines()).toEqual(["app.yml:2:9 [PATH_NOT_FOUND] E: path 'nope' not found in local scope"]);
    });

    it('summarises files and cache use', () => {
        const { reporter, lines } = capture({ color: 'never', format: 'pretty' });
        reporter.printSummary({
            files: { total: 2, resolved: 1, warned: 0, failed: 1 },
            cache: { hits: 3, misses: 1, size: 2, cost: 100 },
        }, 1, 0);

        const output = lines();
        expect(output).toContain('Files: 2');
        expect(output).toContain('  Resolved: 1  Warned: 0  Failed: 1');
        expect(output).toContain('Cache: 3 hits, 1 misses, 2 entries');
        expect(output[output.length - 1]).toBe('Exit code: 1');
    });

    it('summarises in one line in compact mode', () => {
        const { reporter, lines } = capture({ color: 'never', format: 'compact' });
        reporter.printSummary({ files: { total: 1, resolved: 1, warned: 0, failed: 0 } }, 0, 0);
        expect(lines()).toHaveLength(1);
        expect(lines()[0]).toMatch(/^Summary: 0 errors, 0 warnings \(\d+\.\d{2}s\)$/);
    });

    it('prints messages as JSON in json mode', () => {
        const { reporter, lines } = capture({ color: 'never', format: 'json' });
        reporter.printError('boom');
        reporter.printWarning('careful');
        reporter.printInfo('ignored');
        expect(lines()).toEqual(['{"error":"boom"}', '{"warning":"careful"}']);
    });

    it('prints the success line', () => {
        const { reporter, lines } = capture({ color: 'never', format: 'pretty' });
        reporter.printSuccess();
        expect(lines()).toEqual(['', '✓ All references resolved!']);
    });
});
