import fg from 'fast-glob';
import { readFileSync, existsSync } from 'fs';
import path from 'path';
import { Node, SeqNode, createSeq } from './node/types.js';
import { DottedPathQuery, PathQuery } from './path/query.js';
import type { ResourceResolver } from './scope.js';
import { loadNode } from '../parser/yaml.js';
import { getLogger } from './logger.js';

export interface FileResourceResolverOptions {
    pathQuery?: PathQuery;
    /** File extensions to load, without dots. */
    extensions?: string[];
    ignore?: string[];
}

const TYPE_RE = /^[A-Za-z0-9_-][\w.-]*$/;

/**
 * Serves `resource::<type>::<selector>` from a directory tree: every YAML or
 * JSON file under `<root>/<type>/` becomes one element of a sequence, and the
 * selector is a path query over that sequence.
 *
 * ```
 * resources/agents/writer.yml   ->  resource::agents::#(id=="writer").config
 * ```
 */
export class FileResourceResolver implements ResourceResolver {
    public readonly rootPath: string;
    private pathQuery: PathQuery;
    private extensions: string[];
    private ignorePatterns: string[];
    private collections = new Map<string, Promise<SeqNode>>();
    private logger = getLogger('resources');

    constructor(rootPath: string, opts: FileResourceResolverOptions = {}) {
        this.rootPath = path.resolve(rootPath);
        this.pathQuery = opts.pathQuery ?? new DottedPathQuery();
        this.extensions = opts.extensions?.length ? opts.extensions.map(e => e.replace(/^\./, '')) : ['yml', 'yaml', 'json'];
        this.ignorePatterns = opts.ignore ?? [];
    }

    async resolveResource(type: string, selector: string): Promise<Node> {
        if (!TYPE_RE.test(type)) {
            throw new Error(`invalid resource type '${type}'`);
        }

        const collection = await this.load(type);
        const found = this.pathQuery.get(collection, selector);
        if (found === undefined) {
            throw new Error(`no ${type} resource matches '${selector}'`);
        }
        return found;
    }

    private load(type: string): Promise<SeqNode> {
        let pending = this.collections.get(type);
        if (!pending) {
            pending = this.loadCollection(type);
            this.collections.set(type, pending);
            // Failed loads are retried on the next request
            void pending.catch(() => this.collections.delete(type));
        }
        return pending;
    }

    private async loadCollection(type: string): Promise<SeqNode> {
        const dir = path.join(this.rootPath, type);
        if (!existsSync(dir)) {
            throw new Error(`resource directory not found: ${dir}`);
        }

        const extPart = this.extensions.length === 1 ? this.extensions[0] : `{${this.extensions.join(',')}}`;
        const files = (await fg(`**/*.${extPart}`, { cwd: dir, ignore: this.ignorePatterns })).sort();

        const items: Node[] = [];
        for (const f of files) {
            const fullPath = path.join(dir, f);
            try {
                items.push(loadNode(readFileSync(fullPath, 'utf8')));
            } catch (e) {
                const reason = e instanceof Error ? e.message : String(e);
                throw new Error(`failed to load ${path.join(type, f)}: ${reason}`, { cause: e });
            }
        }

        this.logger.debug({ type, files: files.length }, 'loaded resource collection');
        return createSeq(items);
    }
}
