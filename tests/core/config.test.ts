import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
    ConfigError, applyConfig, loadConfigFile, parseCliOptions, repeatable, resolveCacheSettings, selectProfile,
    toRunOptions,
} from '../../src/core/config.js';

describe('resolveCacheSettings', () => {
    it('falls back to defaults', () => {
        expect(resolveCacheSettings({}, {})).toEqual({ maxCost: 100 * 1024 * 1024, maxEntries: 10_000 });
    });

    it('reads limits from the environment', () => {
        const env = { YAMLREFS_CACHE_MAX_COST: '2048', YAMLREFS_CACHE_MAX_ENTRIES: '10' };
        expect(resolveCacheSettings({}, env)).toEqual({ maxCost: 2048, maxEntries: 10 });
    });

    it('ignores unusable values', () => {
        const env = { YAMLREFS_CACHE_MAX_COST: 'abc', YAMLREFS_CACHE_MAX_ENTRIES: '-1' };
        expect(resolveCacheSettings({}, env)).toEqual({ maxCost: 100 * 1024 * 1024, maxEntries: 10_000 });
    });

    it('prefers explicit settings', () => {
        expect(resolveCacheSettings({ maxEntries: 5 }, { YAMLREFS_CACHE_MAX_ENTRIES: '10' })?.maxEntries).toBe(5);
    });

    it('can be disabled from the environment', () => {
        expect(resolveCacheSettings({}, { YAMLREFS_CACHE_DISABLED: 'true' })).toBeUndefined();
        expect(resolveCacheSettings({}, { YAMLREFS_CACHE_DISABLED: '0' })).toBeDefined();
    });
});

describe('loadConfigFile', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'yamlrefs-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function write(content: string): string {
        const file = path.join(dir, '.yamlrefs.yml');
        writeFileSync(file, content, 'utf8');
        return file;
    }

    it('returns undefined for a missing file', () => {
        expect(loadConfigFile(path.join(dir, 'nope.yml'))).toBeUndefined();
    });

    it('treats an empty file as no options', () => {
        expect(loadConfigFile(write(''))).toEqual({});
    });

    it('resolves paths against the file directory', () => {
        const config = loadConfigFile(write([
            'local: scopes/local.yml',
            'format: json',
            'ignore:',
            '  - out/**',
            'profiles:',
            '  ci:',
            '    outDir: build',
            '    ignore: tmp/**',
        ].join('\n')));

        expect(config?.local).toBe(path.join(dir, 'scopes', 'local.yml'));
        expect(config?.format).toBe('json');
        expect(config?.profiles?.ci.outDir).toBe(path.join(dir, 'build'));
    });

    it('rejects unknown keys and bad values', () => {
        expect(() => loadConfigFile(write('format: xml'))).toThrow(ConfigError);
        expect(() => loadConfigFile(write('colour: red'))).toThrow(/^Invalid config file at /);
    });

    it('reports YAML errors', () => {
        expect(() => loadConfigFile(write('a: [1'))).toThrow(/^Failed to parse config file at /);
    });
});

describe('selectProfile', () => {
    const config = {
        format: 'yaml' as const,
        ignore: ['out/**'],
        profiles: {
            ci: { format: 'json' as const, ignore: 'tmp/**' },
        },
    };

    it('returns the base options without a profile', () => {
        expect(selectProfile(config)).toEqual({ format: 'yaml', ignore: ['out/**'] });
    });

    it('overlays the profile and keeps both ignore lists', () => {
        expect(selectProfile(config, 'ci')).toEqual({ format: 'json', ignore: ['out/**', 'tmp/**'] });
    });

    it('rejects unknown profiles', () => {
        expect(() => selectProfile(config, 'prod')).toThrow('Unknown profile "prod" (known: ci)');
    });
});

describe('applyConfig', () => {
    it('returns the target when there is nothing to apply', () => {
        const target = { env: true };
        expect(applyConfig(undefined, target)).toBe(target);
    });
});

describe('command-line options', () => {
    it('fills in defaults', () => {
        expect(parseCliOptions({})).toEqual({
            component: [],
            ignore: [],
            report: 'pretty',
            color: 'auto',
            verbose: false,
        });
    });

    it('coerces numbers and checks enums', () => {
        expect(parseCliOptions({ maxDepth: '5' }).maxDepth).toBe(5);
        expect(() => parseCliOptions({ format: 'xml' })).toThrow(/^Invalid options: format: /);
    });

    it('collects repeatable flags', () => {
        expect(repeatable('b', ['a'])).toEqual(['a', 'b']);
    });

    it('lets flags win over the config file', () => {
        const flags = parseCliOptions({ format: 'json', component: ['widget'], ignore: ['b'] });
        const options = toRunOptions(['*.yml'], flags, {
            format: 'yaml',
            local: '/x/local.yml',
            components: ['extra'],
            ignore: 'a',
            cache: false,
        });

        expect(options).toEqual({
            patterns: ['*.yml'],
            ignore: ['a', 'b'],
            local: '/x/local.yml',
            global: undefined,
            resources: undefined,
            format: 'json',
            outDir: undefined,
            env: false,
            cache: false,
            strategy: undefined,
            keyConflict: undefined,
            maxDepth: undefined,
            components: ['extra', 'widget'],
        });
    });

    it('enables the cache by default', () => {
        expect(toRunOptions(['a.yml'], parseCliOptions({})).cache).toBe(true);
    });
});
