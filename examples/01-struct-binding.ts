/**
 * Struct Binding Example
 *
 * Reads a list of records from a chunked stream straight into typed
 * objects, skipping fields the consumer does not know about.
 *
 * Run: npx tsx examples/01-struct-binding.ts
 */

import { JsonScanner, fromAsyncIterable } from '../src/index.js';

interface Order {
    id: bigint;
    customer: string;
    total: number;
    paid: boolean;
}

// Mock a chunked response (tokens split at arbitrary points)
async function* mockStream(): AsyncIterable<string> {
    const chunks = [
        '[{"id": 10, "customer": "Al',
        'ice", "total": 19.9',
        '9, "paid": true, "notes": {"gift": tr',
        'ue}}, {"id": 11, "cust',
        'omer": "Bo\\u017cena", "total": 5, "paid": false}]',
    ];

    for (const chunk of chunks) {
        await new Promise(resolve => setTimeout(resolve, 100)); // Simulate network delay
        console.log(`[Stream] Received chunk: ${JSON.stringify(chunk)}`);
        yield chunk;
    }
}

async function readOrder(scanner: JsonScanner): Promise<Order> {
    const order: Order = { id: 0n, customer: '', total: 0, paid: false };
    await scanner.delim('{');
    while (await scanner.more()) {
        const key = await scanner.string();
        await scanner.delim(':');
        switch (key) {
            case 'id':
                order.id = await scanner.int64();
                break;
            case 'customer':
                order.customer = await scanner.string();
                break;
            case 'total':
                order.total = await scanner.float64();
                break;
            case 'paid':
                order.paid = await scanner.bool();
                break;
            default:
                console.log(`[Skip] unknown field ${JSON.stringify(key)}`);
                await scanner.skip();
        }
    }
    await scanner.delim('}');
    return order;
}

async function main() {
    console.log('--- Struct Binding Example ---\n');

    const scanner = new JsonScanner({ source: fromAsyncIterable(mockStream()) });

    await scanner.delim('[');
    while (await scanner.more()) {
        const order = await readOrder(scanner);
        console.log(`\n[Order ${order.id}] ${order.customer}: ${order.total.toFixed(2)} (${order.paid ? 'paid' : 'unpaid'})\n`);
    }
    await scanner.delim(']');
    await scanner.assertEndOfInput();

    console.log('\n--- Done ---');
}

main().catch(err => {
    console.error(err);
    process.exitCode = 1;
});
