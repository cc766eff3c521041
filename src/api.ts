import { readFile } from 'fs/promises';
import { Node } from './core/node/types.js';
import { Evaluator, EvaluatorOptions } from './core/evaluator.js';
import { loadNode } from './parser/yaml.js';

export type EvaluatorInput = Evaluator | EvaluatorOptions;

function toEvaluator(input: EvaluatorInput | undefined): Evaluator {
    return input instanceof Evaluator ? input : new Evaluator(input);
}

/**
 * Parses YAML or JSON text and evaluates it. Parse errors are thrown as the
 * `yaml` library reports them.
 */
export async function evaluateText(text: string, evaluator?: EvaluatorInput): Promise<Node> {
    return toEvaluator(evaluator).evaluate(loadNode(text));
}

/** Reads a stream to the end, then behaves as `evaluateText`. */
export async function evaluateStream(stream: AsyncIterable<string | Uint8Array>, evaluator?: EvaluatorInput): Promise<Node> {
    const decoder = new TextDecoder();
    let text = '';
    for await (const chunk of stream) {
        text += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    }
    text += decoder.decode();
    return evaluateText(text, evaluator);
}

export async function evaluateFile(filePath: string, evaluator?: EvaluatorInput): Promise<Node> {
    return evaluateText(await readFile(filePath, 'utf8'), evaluator);
}
