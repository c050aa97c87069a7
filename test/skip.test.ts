import { describe, it, expect } from 'vitest';
import { JsonScanner } from '../src/scanner.js';
import { fromBytes } from '../src/sources.js';
import { eachChunking } from './helpers.js';

describe('Structural skip', () => {
    it('consumes a nested value up to the end of input', async () => {
        await eachChunking('{"a":[1,"x",true],"b":-2.5e1}', async (scanner, name) => {
            await scanner.skip();
            expect(scanner.offset, name).toBe(29);
            await scanner.assertEndOfInput();
        });
    });

    it('leaves the cursor on the next element', async () => {
        await eachChunking('[{"a": {"b": [false, "\\u0105"]}}, 7]', async (scanner, name) => {
            await scanner.delim('[');
            expect(await scanner.more(), name).toBe(true);
            await scanner.skip();
            expect(await scanner.more(), name).toBe(true);
            expect(await scanner.int64(), name).toBe(7n);
            expect(await scanner.more(), name).toBe(false);
            await scanner.delim(']');
        });
    });

    it('skips empty containers and strings', async () => {
        await eachChunking('[[], {}, "", [[]], 0]', async (scanner) => {
            await scanner.skip();
            await scanner.assertEndOfInput();
        });
    });

    it('skips scalars at the top level', async () => {
        for (const input of ['"ąę\\n"', '-0.5', 'false']) {
            const scanner = new JsonScanner({ source: fromBytes(input) });
            await scanner.skip();
            await scanner.assertEndOfInput();
        }
    });

    it('does not recognise null', async () => {
        const scanner = new JsonScanner({ source: fromBytes('[1, null]') });
        await expect(scanner.skip()).rejects.toMatchObject({
            code: 'UnsupportedValue',
            found: '"n"',
            offset: 4,
        });
    });

    it('requires string keys', async () => {
        const scanner = new JsonScanner({ source: fromBytes('{1: 2}') });
        await expect(scanner.skip()).rejects.toMatchObject({ code: 'UnexpectedByte', found: '"1"', offset: 1 });
    });

    it('rejects a missing colon', async () => {
        const scanner = new JsonScanner({ source: fromBytes('{"a" 2}') });
        await expect(scanner.skip()).rejects.toMatchObject({ code: 'UnexpectedByte', expected: ':', found: '"2"' });
    });

    describe('nesting limit', () => {
        it('accepts nesting up to maxDepth', async () => {
            const scanner = new JsonScanner({ source: fromBytes('[{"a": [1]}]'), maxDepth: 3 });
            await scanner.skip();
            await scanner.assertEndOfInput();
        });

        it('rejects nesting beyond maxDepth', async () => {
            const scanner = new JsonScanner({ source: fromBytes('[[[1]]]'), maxDepth: 2 });
            await expect(scanner.skip()).rejects.toMatchObject({ code: 'NestingTooDeep', offset: 2 });
        });

        it('applies the default limit', async () => {
            const input = '['.repeat(600) + ']'.repeat(600);
            const scanner = new JsonScanner({ source: fromBytes(input) });
            await expect(scanner.skip()).rejects.toMatchObject({ code: 'NestingTooDeep', offset: 512 });
        });
    });
});
