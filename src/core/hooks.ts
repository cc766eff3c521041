import { createString } from './node/types.js';
import type { PreEvalHook } from './context.js';
import { hasInterpolation } from './validation-utils.js';

export type EnvSource = Record<string, string | undefined>;

export class MissingVariableError extends Error {
    constructor(public readonly variable: string) {
        super(`environment variable ${variable} is not set`);
        this.name = 'MissingVariableError';
    }
}

/**
 * Expands `${NAME}` and `${NAME:-fallback}` in a string. `$${...}` is kept
 * as a literal `${...}`.
 */
export function substituteEnv(value: string, env: EnvSource): string {
    const regex = /\$\$\{([^}]*)\}|\$\{([^}]+)\}/g;
    let out = '';
    let last = 0;
    let match;

    while ((match = regex.exec(value)) !== null) {
        out += value.slice(last, match.index);
        last = match.index + match[0].length;

        if (match[1] !== undefined) {
            out += '${' + match[1] + '}';
            continue;
        }

        const expr = match[2].trim();
        const sep = expr.indexOf(':-');
        const name = (sep === -1 ? expr : expr.slice(0, sep)).trim();
        const current = env[name];

        if (sep === -1) {
            if (current === undefined) throw new MissingVariableError(name);
            out += current;
        } else {
            // Unset and empty both take the fallback
            out += current === undefined || current === '' ? expr.slice(sep + 2) : current;
        }
    }

    return out + value.slice(last);
}

/**
 * Pre-evaluation hook that expands environment variables in string scalars.
 */
export function createEnvSubstitutionHook(env: EnvSource = process.env): PreEvalHook {
    return node => {
        if (node.kind !== 'string' || !hasInterpolation(node.value)) return node;
        return createString(substituteEnv(node.value, env));
    };
}
