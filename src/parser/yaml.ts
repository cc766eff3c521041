import {
    parseDocument, parseAllDocuments, isScalar, isAlias, isMap, isSeq, LineCounter, Document,
    Scalar, YAMLMap, YAMLSeq, Pair,
} from 'yaml';
import type { Node as YamlNode } from 'yaml';
import { Diagnostic, Range } from '../types/diagnostic.js';
import { Node, createBool, createMap, createNull, createNumber, createSeq, createString } from '../core/node/types.js';

export type OutputFormat = 'yaml' | 'json';

export interface ParsedYaml {
    doc: Document;
    text: string;
    lineCounter: LineCounter;
    filePath: string;
}

const MAX_ALIAS_DEPTH = 50;

export function stripBom(s: string): string {
    return s.charCodeAt(0) === 0xFEFF ? s.slice(1) : s;
}

function isFloatSpelling(scalar: Scalar): boolean {
    if (typeof scalar.value !== 'number') return false;
    if (!Number.isInteger(scalar.value)) return true;
    if ((scalar.minFractionDigits ?? 0) > 0) return true;
    return typeof scalar.source === 'string' && /[.eE]|inf|nan/i.test(scalar.source);
}

function scalarToNode(scalar: Scalar): Node {
    const value = scalar.value;
    if (value === null || value === undefined) return createNull();
    if (typeof value === 'boolean') return createBool(value);
    if (typeof value === 'number') return createNumber(value, isFloatSpelling(scalar));
    if (typeof value === 'bigint') return createNumber(Number(value), false);
    if (typeof value === 'string') return createString(value);
    return createString(String(value));
}

function keyToString(key: unknown): string {
    if (isScalar(key)) return key.value === null || key.value === undefined ? '' : String(key.value);
    if (key === null || key === undefined) return '';
    return String(key);
}

/**
 * Converts a parsed YAML node into the node model. Aliases are expanded;
 * repeated expansion deeper than 50 levels is treated as an alias cycle.
 */
export function yamlToNode(node: unknown, doc: Document, aliasDepth: number = 0): Node {
    if (aliasDepth > MAX_ALIAS_DEPTH) {
        throw new Error('Alias cycle detected: maximum alias resolution depth exceeded');
    }

    if (isAlias(node)) {
        return yamlToNode(node.resolve(doc), doc, aliasDepth + 1);
    }
    if (isScalar(node)) {
        return scalarToNode(node);
    }
    if (isMap(node)) {
        const entries = new Map<string, Node>();
        for (const pair of node.items) {
            entries.set(keyToString(pair.key), yamlToNode(pair.value, doc, aliasDepth));
        }
        return createMap(entries);
    }
    if (isSeq(node)) {
        return createSeq(node.items.map(item => yamlToNode(item, doc, aliasDepth)));
    }
    return createNull();
}

export function documentToNode(doc: Document): Node {
    return yamlToNode(doc.contents, doc);
}

/**
 * Parses YAML (or JSON) text into a node. The first parse error is thrown
 * as the `yaml` library reports it.
 */
export function loadNode(text: string): Node {
    const doc = parseDocument(stripBom(text));
    if (doc.errors.length > 0) {
        throw doc.errors[0];
    }
    return documentToNode(doc);
}

/** Every document of a multi-document stream, in order. */
export function loadAllNodes(text: string): Node[] {
    const nodes: Node[] = [];
    for (const doc of parseAllDocuments(stripBom(text))) {
        if (doc.errors.length > 0) throw doc.errors[0];
        nodes.push(documentToNode(doc));
    }
    return nodes;
}

export function parseYaml(text: string, filePath: string): { parsed?: ParsedYaml, diagnostics: Diagnostic[] } {
    const lineCounter = new LineCounter();
    const diagnostics: Diagnostic[] = [];
    const source = stripBom(text);

    try {
        const doc = parseDocument(source, { lineCounter, keepSourceTokens: true });

        for (const error of doc.errors) {
            const pos = error.pos[0] ?? 0;
            const end = error.pos[1] ?? pos;

            const startLoc = lineCounter.linePos(pos);
            const endLoc = lineCounter.linePos(end);

            diagnostics.push({
                code: 'YAML_SYNTAX_ERROR',
                message: error.message,
                severity: 'error',
                file: filePath,
                range: {
                    start: { line: startLoc.line, col: startLoc.col, offset: pos },
                    end: { line: endLoc.line, col: endLoc.col, offset: end }
                }
            });
        }

        if (doc.errors.length > 0) {
            return { diagnostics };
        }

        for (const warning of doc.warnings) {
            const pos = warning.pos[0] ?? 0;
            const loc = lineCounter.linePos(pos);
            diagnostics.push({
                code: 'YAML_WARNING',
                message: warning.message,
                severity: 'warning',
                file: filePath,
                range: {
                    start: { line: loc.line, col: loc.col, offset: pos },
                    end: { line: loc.line, col: loc.col, offset: pos }
                }
            });
        }

        return {
            parsed: { doc, text: source, lineCounter, filePath },
            diagnostics
        };

    } catch (e) {
        diagnostics.push({
            code: 'YAML_PARSE_EXCEPTION',
            message: e instanceof Error ? e.message : String(e),
            severity: 'error',
            file: filePath
        });
        return { diagnostics };
    }
}

/**
 * Range of the value at `path` (map keys and sequence indexes) in a parsed
 * document, for pointing diagnostics at the failing directive.
 */
export function getRangeAt(parsed: ParsedYaml, path: string[]): Range | undefined {
    let node: unknown = parsed.doc.contents;
    for (const segment of path) {
        if (isMap(node)) {
            const pair = node.items.find(p => keyToString(p.key) === segment);
            if (!pair) break;
            node = pair.value;
        } else if (isSeq(node) && /^\d+$/.test(segment)) {
            const item = node.items[Number(segment)];
            if (item === undefined) break;
            node = item;
        } else {
            break;
        }
    }
    return getNodeRange(node, parsed.lineCounter);
}

export function getNodeRange(node: unknown, lineCounter: LineCounter): Range | undefined {
    if (!(isScalar(node) || isMap(node) || isSeq(node) || isAlias(node)) || !node.range) return undefined;

    const start = lineCounter.linePos(node.range[0]);
    const end = lineCounter.linePos(node.range[1]);

    return {
        start: { line: start.line, col: start.col, offset: node.range[0] },
        end: { line: end.line, col: end.col, offset: node.range[1] }
    };
}

function toYamlNode(node: Node): YamlNode {
    switch (node.kind) {
        case 'null':
            return new Scalar(null);
        case 'bool':
        case 'string':
            return new Scalar(node.value);
        case 'number': {
            const scalar = new Scalar(node.value);
            if (node.float && Number.isInteger(node.value)) scalar.minFractionDigits = 1;
            return scalar;
        }
        case 'seq': {
            const seq = new YAMLSeq<YamlNode>();
            for (const item of node.items) seq.items.push(toYamlNode(item));
            return seq;
        }
        case 'map': {
            const map = new YAMLMap<Scalar<string>, YamlNode>();
            for (const [key, child] of node.entries) {
                map.items.push(new Pair(new Scalar(key), toYamlNode(child)));
            }
            return map;
        }
    }
}

function toJsonText(node: Node, indent: string): string {
    const inner = indent + '  ';
    switch (node.kind) {
        case 'null':
            return 'null';
        case 'bool':
            return String(node.value);
        case 'number':
            if (!Number.isFinite(node.value)) return 'null';
            return node.float && Number.isInteger(node.value) ? node.value.toFixed(1) : String(node.value);
        case 'string':
            return JSON.stringify(node.value);
        case 'seq':
            if (node.items.length === 0) return '[]';
            return `[\n${node.items.map(item => inner + toJsonText(item, inner)).join(',\n')}\n${indent}]`;
        case 'map': {
            if (node.entries.size === 0) return '{}';
            const lines = [...node.entries].map(([key, child]) => `${inner}${JSON.stringify(key)}: ${toJsonText(child, inner)}`);
            return `{\n${lines.join(',\n')}\n${indent}}`;
        }
    }
}

/**
 * Renders a node as YAML or as two-space indented JSON. Floats with an
 * integral value keep their fractional spelling (`5.0`).
 */
export function serialize(node: Node, format: OutputFormat = 'yaml'): string {
    if (format === 'json') {
        return toJsonText(node, '') + '\n';
    }
    const doc = new Document();
    doc.contents = toYamlNode(node);
    return doc.toString();
}
