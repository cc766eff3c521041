
export type Range = { start: number; end: number };

export type TokenType =
    | 'Word'
    | 'String'
    | 'Op'
    | 'LParen'
    | 'RParen'
    | 'EOF';

export interface Token {
    kind: TokenType;
    value: string;
    range: Range;
}

export class TokenizerError extends Error {
    constructor(message: string, public range: Range) {
        super(message);
        this.name = 'TokenizerError';
    }
}

const OPS = ['==', '!=', '<=', '>=', '!%', '&&', '||', '<', '>', '%'];

// Characters that end a bare word
const WORD_BREAK = /[\s=!<>%&|()"']/;

/**
 * Tokenizes the body of a `#(...)` query condition, e.g. `age>=21 && name%"J*"`.
 * Bare words keep backslash escapes so they can be read as paths later.
 */
export function tokenize(input: string): Token[] {
    const tokens: Token[] = [];
    let current = 0;

    while (current < input.length) {
        const char = input[current];

        // Skip whitespace
        if (/\s/.test(char)) {
            current++;
            continue;
        }

        // Quoted string, either quote style
        if (char === '"' || char === "'") {
            const start = current;
            let value = '';
            current++;
            let closed = false;

            while (current < input.length) {
                const c = input[current];
                if (c === '\\' && current + 1 < input.length) {
                    value += input[current + 1];
                    current += 2;
                    continue;
                }
                if (c === char) {
                    closed = true;
                    current++;
                    break;
                }
                value += c;
                current++;
            }

            if (!closed) {
                throw new TokenizerError('Unterminated string literal', { start, end: current });
            }

            tokens.push({ kind: 'String', value, range: { start, end: current } });
            continue;
        }

        // Operators
        // Check multi-char ops first
        let matchedOp = false;
        for (const op of OPS) {
            if (input.startsWith(op, current)) {
                tokens.push({
                    kind: 'Op',
                    value: op,
                    range: { start: current, end: current + op.length }
                });
                current += op.length;
                matchedOp = true;
                break;
            }
        }
        if (matchedOp) continue;

        if (char === '(') {
            tokens.push({ kind: 'LParen', value: '(', range: { start: current, end: current + 1 } });
            current++;
            continue;
        }
        if (char === ')') {
            tokens.push({ kind: 'RParen', value: ')', range: { start: current, end: current + 1 } });
            current++;
            continue;
        }

        // Bare word: a path, number or keyword
        if (!WORD_BREAK.test(char)) {
            const start = current;
            let value = '';

            while (current < input.length) {
                const c = input[current];
                if (c === '\\' && current + 1 < input.length) {
                    value += c + input[current + 1];
                    current += 2;
                    continue;
                }
                if (WORD_BREAK.test(c)) break;
                value += c;
                current++;
            }

            tokens.push({ kind: 'Word', value, range: { start, end: current } });
            continue;
        }

        throw new TokenizerError(`Unexpected character: '${char}'`, { start: current, end: current + 1 });
    }

    tokens.push({ kind: 'EOF', value: '', range: { start: current, end: current } });
    return tokens;
}
