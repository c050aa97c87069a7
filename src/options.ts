import { z } from 'zod';
import type { ByteSource } from './types.js';
import { logger as defaultLogger, type Logger } from './logger.js';

/** Smallest buffer that holds any boolean literal, `\uXXXX` escape or UTF-8 sequence with room to spare */
export const MIN_BUFFER_SIZE = 8;

export const ScannerOptionsSchema = z.object({
    bufferSize: z.number().int().min(MIN_BUFFER_SIZE).default(4096),
    maxDepth: z.number().int().positive().default(512),
});

/**
 * Options for creating a JsonScanner.
 */
export type ScannerOptions = z.input<typeof ScannerOptionsSchema> & {
    /** The byte source to pull from */
    source: ByteSource;

    /** Logger for refill and source diagnostics (default: the package logger) */
    logger?: Logger;
};

export type ResolvedScannerOptions = z.output<typeof ScannerOptionsSchema> & {
    source: ByteSource;
    logger: Logger;
};

/**
 * Validate numeric options and fill in defaults. Throws ZodError on
 * invalid values.
 */
export function resolveOptions(options: ScannerOptions): ResolvedScannerOptions {
    const { source, logger, ...limits } = options;
    return {
        ...ScannerOptionsSchema.parse(limits),
        source,
        logger: logger ?? defaultLogger,
    };
}
