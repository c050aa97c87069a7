import { describe, it, expect } from 'vitest';
import { Readable } from 'node:stream';
import { JsonScanner } from '../src/scanner.js';
import { fromAsyncIterable, fromBytes, fromReadableStream } from '../src/sources.js';

const encoder = new TextEncoder();

describe('Byte sources', () => {
    describe('fromBytes', () => {
        it('attaches the terminal signal to the last read', async () => {
            const source = fromBytes('abcdef');
            const target = new Uint8Array(4);

            expect(await source.read(target)).toEqual({ bytesRead: 4, done: false });
            expect(new TextDecoder().decode(target)).toBe('abcd');
            expect(await source.read(target)).toEqual({ bytesRead: 2, done: true });
            expect(await source.read(target)).toEqual({ bytesRead: 0, done: true });
        });
    });

    describe('fromAsyncIterable', () => {
        it('reads a Node.js stream of mixed chunks', async () => {
            const stream = Readable.from(['{"k": ', encoder.encode('"v\\u0105"'), '}']);
            const scanner = new JsonScanner({ source: fromAsyncIterable(stream) });

            await scanner.delim('{');
            await scanner.more();
            await scanner.stringValue('k');
            await scanner.delim(':');
            expect(await scanner.string()).toBe('vą');
            expect(await scanner.more()).toBe(false);
            await scanner.delim('}');
            await scanner.assertEndOfInput();
        });

        it('hands out chunks larger than the buffer over several reads', async () => {
            async function* chunks(): AsyncIterable<string> {
                yield '["abcdefghijklmnop", ';
                yield '1234567]';
            }
            const scanner = new JsonScanner({ source: fromAsyncIterable(chunks()), bufferSize: 8 });

            await scanner.delim('[');
            await scanner.more();
            expect(await scanner.string()).toBe('abcdefghijklmnop');
            await scanner.more();
            expect(await scanner.int64()).toBe(1234567n);
            await scanner.delim(']');
            await scanner.assertEndOfInput();
        });

        it('runs the generator cleanup when closed after a failed scan', async () => {
            let cleaned = false;
            async function* chunks(): AsyncIterable<string> {
                try {
                    yield '[1, nul';
                    yield 'l]';
                } finally {
                    cleaned = true;
                }
            }
            const source = fromAsyncIterable(chunks());
            const scanner = new JsonScanner({ source });

            await expect(scanner.skip()).rejects.toMatchObject({ code: 'UnsupportedValue', offset: 4 });
            expect(cleaned).toBe(false);

            await source.close();
            expect(cleaned).toBe(true);
            expect(await source.read(new Uint8Array(8))).toEqual({ bytesRead: 0, done: true });
        });

        it('reports the end of an empty iterable', async () => {
            async function* empty(): AsyncIterable<Uint8Array> {}
            const source = fromAsyncIterable(empty());

            expect(await source.read(new Uint8Array(8))).toEqual({ bytesRead: 0, done: true });
            expect(await source.read(new Uint8Array(8))).toEqual({ bytesRead: 0, done: true });
        });
    });

    describe('fromReadableStream', () => {
        it('reads a web stream and releases its lock at the end', async () => {
            const stream = new ReadableStream<Uint8Array>({
                start(controller) {
                    controller.enqueue(encoder.encode('[true,'));
                    controller.enqueue(encoder.encode(' false]'));
                    controller.close();
                },
            });
            const scanner = new JsonScanner({ source: fromReadableStream(stream) });

            await scanner.delim('[');
            await scanner.more();
            expect(await scanner.bool()).toBe(true);
            await scanner.more();
            expect(await scanner.bool()).toBe(false);
            await scanner.delim(']');
            await scanner.assertEndOfInput();
            expect(stream.locked).toBe(false);
        });

        it('releases its lock when the stream fails', async () => {
            const cause = new Error('connection reset');
            let pulls = 0;
            const stream = new ReadableStream<Uint8Array>({
                pull(controller) {
                    if (pulls++ === 0) {
                        controller.enqueue(encoder.encode('[1,'));
                    } else {
                        controller.error(cause);
                    }
                },
            });
            const scanner = new JsonScanner({ source: fromReadableStream(stream) });

            await scanner.delim('[');
            await scanner.more();
            expect(await scanner.int64()).toBe(1n);
            await scanner.more();
            await expect(scanner.int64()).rejects.toMatchObject({ code: 'SourceError', cause });
            expect(stream.locked).toBe(false);
        });

        it('cancels the stream when closed early', async () => {
            let cancelled = false;
            const stream = new ReadableStream<Uint8Array>({
                start(controller) {
                    controller.enqueue(encoder.encode('[null]'));
                },
                cancel() {
                    cancelled = true;
                },
            });
            const source = fromReadableStream(stream);
            const scanner = new JsonScanner({ source });

            await expect(scanner.skip()).rejects.toMatchObject({ code: 'UnsupportedValue', offset: 1 });
            await source.close();

            expect(cancelled).toBe(true);
            expect(stream.locked).toBe(false);
            await source.close();
        });
    });
});
