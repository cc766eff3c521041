import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Root logger for the library and the CLI.
 *
 * Silent unless `YAMLREFS_LOG_LEVEL` is set, so embedding applications see no
 * output by default. Writes to stderr to keep stdout free for resolved
 * documents.
 */
export const rootLogger: Logger = pino(
    {
        name: 'yamlrefs',
        level: process.env.YAMLREFS_LOG_LEVEL ?? 'silent',
    },
    pino.destination(2)
);

export function getLogger(component: string): Logger {
    return rootLogger.child({ component });
}
