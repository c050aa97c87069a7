/**
 * Fetch API Simulation Example
 *
 * Shows how to scan a fetch() response body without buffering it.
 *
 * Run: npx tsx examples/02-fetch-simulation.ts
 */

import { JsonScanner, fromReadableStream, isScanError } from '../src/index.js';

async function main() {
    console.log('--- Fetch API Simulation ---\n');
    console.log('// In real code:\n// const response = await fetch("/api/metrics");');
    console.log('// const scanner = new JsonScanner({ source: fromReadableStream(response.body) });\n');

    // Simulate fetch response
    const mockResponse = { body: createMockReadableStream() };

    const scanner = new JsonScanner({ source: fromReadableStream(mockResponse.body) });

    let sum = 0;
    let count = 0;
    await scanner.delim('{');
    while (await scanner.more()) {
        const key = await scanner.string();
        await scanner.delim(':');
        if (key !== 'samples') {
            await scanner.skip();
            continue;
        }
        await scanner.delim('[');
        while (await scanner.more()) {
            sum += await scanner.float64();
            count++;
        }
        await scanner.delim(']');
    }
    await scanner.delim('}');

    try {
        await scanner.assertEndOfInput();
    } catch (err) {
        if (isScanError(err, 'TrailingData')) {
            console.log(`[Warning] ${err.message}`);
        } else {
            throw err;
        }
    }

    console.log(`Samples: ${count}, mean: ${(sum / count).toFixed(3)}`);
    console.log(`Bytes consumed: ${scanner.offset}`);
}

// --- Mock Stream (simulates a ReadableStream response from fetch()) ---

function createMockReadableStream(): ReadableStream<Uint8Array> {
    const chunks = [
        '{"host": "node-1", "unit": "ms", "sam',
        'ples": [12.5, 13.25, 1',
        '1.0, 9.75e0, 14], "tags": ["a", "b"]}',
        '\n',
    ];

    let index = 0;
    const encoder = new TextEncoder();

    return new ReadableStream({
        async pull(controller) {
            if (index < chunks.length) {
                await new Promise(resolve => setTimeout(resolve, 100));
                controller.enqueue(encoder.encode(chunks[index]));
                index++;
            } else {
                controller.close();
            }
        }
    });
}

main().catch(err => {
    console.error(err);
    process.exitCode = 1;
});
