/**
 * Outcome of a single read from a byte source.
 */
export interface ReadResult {
    /** Number of bytes placed at the start of the target buffer */
    bytesRead: number;

    /** Set when no further bytes will ever be available. May accompany a final nonzero read. */
    done?: boolean;
}

/**
 * A pull-based byte source. A rejected read is treated as a fatal
 * source failure and is never retried.
 */
export interface ByteSource {
    read(target: Uint8Array): Promise<ReadResult>;
}

/**
 * A byte source over an input that holds resources until it is read to
 * the end. The scanner never closes its source; the owner does.
 */
export interface ClosableByteSource extends ByteSource {
    /** Stop reading and release the input. Later reads report the end. */
    close(): Promise<void>;
}

/**
 * Lifecycle of the underlying source as seen by the scanner.
 * Once it leaves 'open' it never goes back.
 */
export type SourceState =
    | { kind: 'open' }
    | { kind: 'exhausted' }
    | { kind: 'failed'; cause: unknown };

/**
 * Delimiters accepted by JsonScanner.delim().
 */
export type Delimiter = '[' | ']' | '{' | '}' | ':';
