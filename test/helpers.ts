import { JsonScanner } from '../src/scanner.js';
import type { ScannerOptions } from '../src/options.js';
import type { ByteSource, ReadResult } from '../src/types.js';

const encoder = new TextEncoder();

/**
 * Build a byte array from UTF-8 text pieces and raw byte runs, for inputs
 * that contain invalid UTF-8.
 */
export function bytes(...parts: (string | number[])[]): Uint8Array {
    const encoded = parts.map(p => (typeof p === 'string' ? encoder.encode(p) : Uint8Array.from(p)));
    const out = new Uint8Array(encoded.reduce((n, p) => n + p.length, 0));
    let pos = 0;
    for (const p of encoded) {
        out.set(p, pos);
        pos += p.length;
    }
    return out;
}

function toBytes(input: string | Uint8Array): Uint8Array {
    return typeof input === 'string' ? encoder.encode(input) : input;
}

/**
 * Source that hands out `chunks` one per read. With `doneWithData` the
 * terminal signal rides on the last chunk; otherwise it comes as a
 * separate zero-byte read. A chunk larger than the read target is split.
 */
export function scriptedSource(chunks: Uint8Array[], doneWithData: boolean): ByteSource & { reads: number } {
    const queue = chunks.slice();
    const source = {
        reads: 0,
        async read(target: Uint8Array): Promise<ReadResult> {
            source.reads++;
            const chunk = queue.shift();
            if (chunk === undefined) return { bytesRead: 0, done: true };
            const n = Math.min(chunk.length, target.length);
            target.set(chunk.subarray(0, n));
            if (n < chunk.length) queue.unshift(chunk.subarray(n));
            return { bytesRead: n, done: doneWithData && queue.length === 0 };
        },
    };
    return source;
}

/**
 * Source that fails with `error` once `prefix` has been read.
 */
export function failingSource(prefix: string, error: Error): ByteSource & { reads: number } {
    let sent = false;
    const source = {
        reads: 0,
        async read(target: Uint8Array): Promise<ReadResult> {
            source.reads++;
            if (sent) throw error;
            sent = true;
            const data = encoder.encode(prefix);
            target.set(data);
            return { bytesRead: data.length };
        },
    };
    return source;
}

/**
 * Split `data` into chunks of at most `size` bytes.
 */
export function splitEvery(data: Uint8Array, size: number): Uint8Array[] {
    const chunks: Uint8Array[] = [];
    for (let i = 0; i < data.length; i += size) {
        chunks.push(data.subarray(i, i + size));
    }
    return chunks;
}

export interface Chunking {
    name: string;
    source: () => ByteSource;
}

/**
 * Every way of reading `input` the scanner must treat the same: a first
 * chunk of each size followed by the rest, fixed chunk sizes from 1 to
 * the whole input, each with the terminal signal attached to the last
 * chunk or sent on its own.
 */
export function chunkings(input: string | Uint8Array): Chunking[] {
    const data = toBytes(input);
    const result: Chunking[] = [];
    for (const doneWithData of [true, false]) {
        const tail = doneWithData ? 'done attached' : 'done separate';
        for (let k = 1; k < data.length; k++) {
            result.push({
                name: `first ${k}, ${tail}`,
                source: () => scriptedSource([data.subarray(0, k), data.subarray(k)], doneWithData),
            });
        }
        for (let n = 1; n <= Math.max(data.length, 1); n++) {
            result.push({
                name: `every ${n}, ${tail}`,
                source: () => scriptedSource(splitEvery(data, n), doneWithData),
            });
        }
    }
    return result;
}

/**
 * Run `scan` against a fresh scanner for every chunking of `input`.
 */
export async function eachChunking(
    input: string | Uint8Array,
    scan: (scanner: JsonScanner, name: string) => Promise<void>,
    options: Omit<ScannerOptions, 'source'> = {},
): Promise<void> {
    for (const chunking of chunkings(input)) {
        await scan(new JsonScanner({ ...options, source: chunking.source() }), chunking.name);
    }
}

/**
 * Await `promise` and return the error it rejects with.
 */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (err) {
        return err;
    }
    throw new Error('expected the promise to reject');
}
