import type { ByteSource, SourceState } from '../types.js';
import type { Logger } from '../logger.js';
import { ScanError } from '../errors.js';

// ============ Helpers ============

export function isSpace(b: number): boolean {
    return b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d;
}

// ============ Byte Window ============

/**
 * Fixed-capacity read buffer plus the window of bytes read from the
 * source but not yet consumed.
 *
 * The window is `buffer[start, end)`. Bytes only ever move forward:
 * `consume()` advances `start`, `fill()` compacts the window to the
 * front of the buffer and appends whatever the source returns.
 */
export class ByteWindow {
    readonly buffer: Uint8Array;
    start = 0;
    end = 0;

    /** Stream offset of buffer[0] */
    private base = 0;
    private state: SourceState = { kind: 'open' };

    constructor(
        private readonly source: ByteSource,
        capacity: number,
        private readonly logger: Logger,
    ) {
        this.buffer = new Uint8Array(capacity);
    }

    get length(): number {
        return this.end - this.start;
    }

    get capacity(): number {
        return this.buffer.length;
    }

    /** Stream offset of the first unconsumed byte */
    get offset(): number {
        return this.base + this.start;
    }

    /** Byte at position i of the window */
    at(i: number): number {
        return this.buffer[this.start + i];
    }

    consume(n: number): void {
        if (n < 0 || n > this.length) {
            throw new RangeError(`cannot consume ${n} of ${this.length} buffered bytes`);
        }
        this.start += n;
    }

    /**
     * Read more bytes after the unread ones.
     *
     * Resolves true when at least one byte was appended, false once the
     * source is exhausted. Throws TokenTooLong when the window already
     * spans the whole buffer, so a token must be shorter than the buffer.
     * Throws SourceError when the source fails now or has failed before.
     */
    async fill(): Promise<boolean> {
        if (this.state.kind === 'failed') {
            throw this.sourceError(this.state.cause);
        }
        // a full window fails whether or not the source is exhausted
        if (this.length === this.capacity) {
            throw new ScanError('TokenTooLong', `token does not fit in the ${this.capacity}-byte buffer`, {
                offset: this.offset,
            });
        }
        if (this.state.kind === 'exhausted') {
            return false;
        }

        if (this.start > 0) {
            this.buffer.copyWithin(0, this.start, this.end);
            this.base += this.start;
            this.end -= this.start;
            this.start = 0;
        }

        for (;;) {
            const space = this.capacity - this.end;
            let bytesRead: number;
            let done: boolean;
            try {
                const result = await this.source.read(this.buffer.subarray(this.end));
                bytesRead = result.bytesRead;
                done = result.done ?? false;
            } catch (cause) {
                throw this.fail(cause);
            }

            if (!Number.isInteger(bytesRead) || bytesRead < 0 || bytesRead > space) {
                throw this.fail(new RangeError(`source reported ${bytesRead} bytes read into ${space} bytes of space`));
            }

            this.end += bytesRead;
            if (bytesRead > 0) {
                this.logger.debug({ bytesRead, offset: this.base + this.end - bytesRead }, 'refilled scan buffer');
            }
            if (done) {
                this.state = { kind: 'exhausted' };
                this.logger.debug({ offset: this.base + this.end }, 'byte source exhausted');
            }
            if (bytesRead > 0) return true;
            if (done) return false;
        }
    }

    /**
     * Next byte that is not JSON whitespace, without consuming it.
     * Whitespace before it is consumed.
     */
    async peekNonSpace(): Promise<number> {
        for (;;) {
            while (this.start < this.end) {
                const b = this.buffer[this.start];
                if (!isSpace(b)) return b;
                this.start++;
            }
            if (!(await this.fill())) {
                throw new ScanError('EndOfInput', 'unexpected end of input', { offset: this.offset });
            }
        }
    }

    private fail(cause: unknown): ScanError {
        this.state = { kind: 'failed', cause };
        this.logger.warn({ err: cause, offset: this.base + this.end }, 'byte source failed');
        return this.sourceError(cause);
    }

    private sourceError(cause: unknown): ScanError {
        const reason = cause instanceof Error ? cause.message : String(cause);
        return new ScanError('SourceError', `byte source failed: ${reason}`, {
            offset: this.base + this.end,
            cause,
        });
    }
}
