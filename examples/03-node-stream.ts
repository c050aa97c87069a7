/**
 * Node.js Stream Example
 *
 * Any Node.js Readable is an async iterable of chunks, so a file or
 * socket can feed the scanner directly. Errors carry the byte offset.
 *
 * Run: npx tsx examples/03-node-stream.ts
 */

import { Readable } from 'node:stream';
import { JsonScanner, fromAsyncIterable, isScanError } from '../src/index.js';

async function sumAll(input: Readable): Promise<number> {
    const source = fromAsyncIterable(input);
    const scanner = new JsonScanner({ source, bufferSize: 64 });
    try {
        let total = 0;
        await scanner.delim('[');
        while (await scanner.more()) {
            total += await scanner.integer();
        }
        await scanner.delim(']');
        await scanner.assertEndOfInput();
        return total;
    } finally {
        // destroys the Readable if the scan stopped early
        await source.close();
    }
}

async function main() {
    console.log('--- Node.js Stream Example ---\n');

    // In real code: fs.createReadStream('numbers.json')
    const good = Readable.from([Buffer.from('[1, 2, 3'), Buffer.from(', 40]')]);
    console.log(`Sum: ${await sumAll(good)}`);

    const bad = Readable.from([Buffer.from('[1, 2 3]')]);
    try {
        await sumAll(bad);
    } catch (err) {
        if (!isScanError(err)) throw err;
        console.log(`[${err.code}] ${err.message}`);
    }

    console.log('\n--- Done ---');
}

main().catch(err => {
    console.error(err);
    process.exitCode = 1;
});
