import type { ByteSource, ClosableByteSource, ReadResult } from './types.js';

const encoder = new TextEncoder();

function toBytes(chunk: Uint8Array | string): Uint8Array {
    return typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
}

/**
 * In-memory source. The read that hands out the last bytes also carries
 * the terminal signal.
 */
export function fromBytes(data: Uint8Array | string): ByteSource {
    const bytes = toBytes(data);
    let pos = 0;
    return {
        async read(target: Uint8Array): Promise<ReadResult> {
            const n = Math.min(target.length, bytes.length - pos);
            target.set(bytes.subarray(pos, pos + n));
            pos += n;
            return { bytesRead: n, done: pos === bytes.length };
        },
    };
}

interface ChunkProducer {
    /** Next chunk, or null once there is nothing more */
    next(): Promise<Uint8Array | string | null>;
    close(): Promise<void>;
}

/**
 * Adapt a chunk producer to a ByteSource. Chunks larger than the read
 * target are handed out over several reads.
 */
function fromChunks(producer: ChunkProducer): ClosableByteSource {
    let pending: Uint8Array = new Uint8Array(0);
    let finished = false;
    return {
        async read(target: Uint8Array): Promise<ReadResult> {
            while (pending.length === 0) {
                if (finished) return { bytesRead: 0, done: true };
                const chunk = await producer.next();
                if (chunk === null) {
                    finished = true;
                    return { bytesRead: 0, done: true };
                }
                pending = toBytes(chunk);
            }
            const n = Math.min(target.length, pending.length);
            target.set(pending.subarray(0, n));
            pending = pending.subarray(n);
            return { bytesRead: n };
        },
        async close(): Promise<void> {
            pending = new Uint8Array(0);
            finished = true;
            await producer.close();
        },
    };
}

/**
 * Source over an async iterable of chunks, such as a Node.js Readable or
 * an async generator. String chunks are UTF-8 encoded.
 *
 * The iterable is only finished by reaching its end. When a scan stops
 * early, call close() to run the generator's cleanup or destroy the
 * Readable.
 */
export function fromAsyncIterable(iterable: AsyncIterable<Uint8Array | string>): ClosableByteSource {
    const iterator = iterable[Symbol.asyncIterator]();
    return fromChunks({
        async next() {
            const result = await iterator.next();
            return result.done ? null : result.value;
        },
        async close() {
            await iterator.return?.();
        },
    });
}

/**
 * Source over a WHATWG ReadableStream, such as a fetch() response body.
 * The reader lock is released once the stream ends or fails. close()
 * cancels a stream that is still being read.
 */
export function fromReadableStream(stream: ReadableStream<Uint8Array>): ClosableByteSource {
    const reader = stream.getReader();
    let locked = true;
    const release = () => {
        if (!locked) return;
        locked = false;
        reader.releaseLock();
    };
    return fromChunks({
        async next() {
            const result = await reader.read().catch((err: unknown) => {
                release();
                throw err;
            });
            if (result.done) {
                release();
                return null;
            }
            return result.value;
        },
        async close() {
            if (!locked) return;
            try {
                await reader.cancel();
            } finally {
                release();
            }
        },
    });
}
