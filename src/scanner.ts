import type { Delimiter } from './types.js';
import { type ScannerOptions, resolveOptions } from './options.js';
import type { Logger } from './logger.js';
import { ScanError, describeByte, isScanError } from './errors.js';
import { ByteWindow } from './core/window.js';
import { type DecodeState, decodeStringStep } from './core/decoder.js';
import { MatchSink, ScratchBuffer, type StringSink, TextSink } from './core/sinks.js';

const asciiDecoder = new TextDecoder();
const utf8Encoder = new TextEncoder();

const QUOTE = 0x22;
const COMMA = 0x2c;
const MINUS = 0x2d;
const BACKSLASH = 0x5c;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const LOWER_F = 0x66;
const LOWER_T = 0x74;

const TRUE_BYTES = utf8Encoder.encode('true');
const FALSE_BYTES = utf8Encoder.encode('false');

const INTEGER_PATTERN = /^-?(0|[1-9][0-9]*)$/;
const NUMBER_PATTERN = /^-?(0|[1-9][0-9]*)(\.[0-9]+)?([eE][-+]?[0-9]+)?$/;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

function isDigit(b: number): boolean {
    return b >= 0x30 && b <= 0x39;
}

function isIntegerByte(b: number, i: number): boolean {
    return isDigit(b) || (i === 0 && b === MINUS);
}

function isNumberByte(b: number): boolean {
    // digits - + . e E
    return isDigit(b) || b === MINUS || b === 0x2b || b === 0x2e || b === 0x65 || b === 0x45;
}

interface NumericToken {
    text: string;
    offset: number;
}

/**
 * Pull-based JSON scanner over a byte source.
 *
 * The caller drives the grammar: it knows where an object, a number or a
 * string comes next and calls the matching operation. Each operation
 * skips leading whitespace, recognises exactly one token and leaves the
 * cursor on the first byte after it. Tokens may be split across reads in
 * any way.
 *
 * ```ts
 * const scanner = new JsonScanner({ source: fromBytes('[1, 2]') });
 * await scanner.delim('[');
 * while (await scanner.more()) {
 *     console.log(await scanner.int64());
 * }
 * await scanner.delim(']');
 * await scanner.assertEndOfInput();
 * ```
 *
 * Operations must be awaited one at a time.
 */
export class JsonScanner {
    private win: ByteWindow;
    private maxDepth: number;
    private logger: Logger;
    private containerStart = false;

    private scratch = new ScratchBuffer();
    private text: TextSink;
    private match: MatchSink;
    private discard: MatchSink;

    constructor(options: ScannerOptions) {
        const resolved = resolveOptions(options);
        this.logger = resolved.logger;
        this.maxDepth = resolved.maxDepth;
        this.win = new ByteWindow(resolved.source, resolved.bufferSize, resolved.logger);

        this.text = new TextSink(this.scratch);
        this.match = new MatchSink(this.scratch);
        // a matcher that never records throws the content away
        this.discard = new MatchSink(this.scratch);
        this.discard.expect(new Uint8Array(0), false);
    }

    /** Number of bytes consumed so far */
    get offset(): number {
        return this.win.offset;
    }

    // ============ Structure ============

    /**
     * Consume the delimiter `ch`, which must be the next non-whitespace byte.
     */
    async delim(ch: Delimiter): Promise<void> {
        const b = await this.win.peekNonSpace();
        const expected = ch.charCodeAt(0);
        if (b !== expected) {
            throw new ScanError('UnexpectedByte', `expected ${JSON.stringify(ch)} but found ${describeByte(b)}`, {
                offset: this.win.offset,
                expected: ch,
                found: describeByte(b),
            });
        }
        this.win.consume(1);
        this.containerStart = b === OPEN_BRACKET || b === OPEN_BRACE;
    }

    /**
     * Whether another element or member follows in the current array or
     * object. Consumes the separating comma, but not a closing bracket.
     * Call once per element, never twice in a row.
     */
    async more(): Promise<boolean> {
        const b = await this.win.peekNonSpace();
        if (b === CLOSE_BRACKET || b === CLOSE_BRACE) {
            this.containerStart = false;
            return false;
        }
        if (this.containerStart) {
            this.containerStart = false;
            return true;
        }
        if (b !== COMMA) {
            throw new ScanError('ExpectedComma', `expected "," but found ${describeByte(b)}`, {
                offset: this.win.offset,
                expected: ',',
                found: describeByte(b),
            });
        }
        this.win.consume(1);
        return true;
    }

    /**
     * Resolve if only whitespace remains before the end of the source.
     */
    async assertEndOfInput(): Promise<void> {
        let b: number;
        try {
            b = await this.win.peekNonSpace();
        } catch (err) {
            if (isScanError(err, 'EndOfInput')) return;
            throw err;
        }
        throw new ScanError('TrailingData', `expected end of input but found ${describeByte(b)}`, {
            offset: this.win.offset,
            found: describeByte(b),
        });
    }

    // ============ Scalars ============

    /**
     * Scan an integer token into a bigint within the signed 64-bit range.
     */
    async int64(): Promise<bigint> {
        const token = await this.scanNumeric(isIntegerByte);
        if (!INTEGER_PATTERN.test(token.text)) {
            throw invalidNumber(token);
        }
        const value = BigInt(token.text);
        if (value < INT64_MIN || value > INT64_MAX) {
            throw new ScanError('InvalidNumber', `integer ${token.text} is out of the 64-bit range`, {
                offset: token.offset,
                found: token.text,
            });
        }
        return value;
    }

    /**
     * Scan an integer token that fits in a JavaScript number without
     * losing precision.
     */
    async integer(): Promise<number> {
        const token = await this.scanNumeric(isIntegerByte);
        if (!INTEGER_PATTERN.test(token.text)) {
            throw invalidNumber(token);
        }
        // -0 reads as 0
        const value = Number(token.text) || 0;
        if (!Number.isSafeInteger(value)) {
            throw new ScanError('InvalidNumber', `integer ${token.text} is not a safe integer`, {
                offset: token.offset,
                found: token.text,
            });
        }
        return value;
    }

    async float64(): Promise<number> {
        const token = await this.scanNumeric(isNumberByte);
        if (!NUMBER_PATTERN.test(token.text)) {
            throw invalidNumber(token);
        }
        const value = Number(token.text);
        if (!Number.isFinite(value)) {
            throw new ScanError('InvalidNumber', `number ${token.text} is out of range`, {
                offset: token.offset,
                found: token.text,
            });
        }
        return value;
    }

    async bool(): Promise<boolean> {
        const b = await this.win.peekNonSpace();
        let literal: Uint8Array;
        if (b === LOWER_T) {
            literal = TRUE_BYTES;
        } else if (b === LOWER_F) {
            literal = FALSE_BYTES;
        } else {
            throw new ScanError('InvalidBoolean', `expected true or false but found ${describeByte(b)}`, {
                offset: this.win.offset,
                expected: 'true or false',
                found: describeByte(b),
            });
        }

        for (let i = 0; i < literal.length; i++) {
            while (i >= this.win.length) {
                if (!(await this.win.fill())) {
                    throw new ScanError('UnexpectedEndOfInput', 'unexpected end of input inside boolean literal', {
                        offset: this.win.offset + i,
                        expected: asciiDecoder.decode(literal),
                    });
                }
            }
            if (this.win.at(i) !== literal[i]) {
                const found = asciiDecoder.decode(this.win.buffer.subarray(this.win.start, this.win.start + i + 1));
                throw new ScanError('InvalidBoolean', `expected ${asciiDecoder.decode(literal)} but found ${JSON.stringify(found)}`, {
                    offset: this.win.offset,
                    expected: asciiDecoder.decode(literal),
                    found,
                });
            }
        }
        this.win.consume(literal.length);
        return literal === TRUE_BYTES;
    }

    /**
     * Scan the leading run of bytes accepted by `accept`. End of input
     * terminates the token.
     */
    private async scanNumeric(accept: (b: number, i: number) => boolean): Promise<NumericToken> {
        await this.win.peekNonSpace();
        let i = 0;
        for (;;) {
            while (i < this.win.length) {
                if (!accept(this.win.at(i), i)) return this.takeNumeric(i);
                i++;
            }
            if (!(await this.win.fill())) return this.takeNumeric(i);
        }
    }

    private takeNumeric(n: number): NumericToken {
        const offset = this.win.offset;
        if (n === 0) {
            const b = this.win.at(0);
            throw new ScanError('InvalidNumber', `expected a number but found ${describeByte(b)}`, {
                offset,
                found: describeByte(b),
            });
        }
        const text = asciiDecoder.decode(this.win.buffer.subarray(this.win.start, this.win.start + n));
        this.win.consume(n);
        return { text, offset };
    }

    // ============ Strings ============

    /**
     * Scan a string token and return its decoded content.
     */
    async string(): Promise<string> {
        return this.scanString(this.text);
    }

    /**
     * Scan a string token and require its decoded content to equal
     * `expected`. The string is consumed either way.
     */
    async stringValue(expected: string): Promise<void> {
        await this.win.peekNonSpace();
        const offset = this.win.offset;
        // decoded content never holds a lone surrogate
        this.match.expect(utf8Encoder.encode(expected), true, !LONE_SURROGATE.test(expected));
        const actual = await this.scanString(this.match);
        if (actual !== null) {
            throw new ScanError('StringMismatch', `expected string ${JSON.stringify(expected)} but got ${JSON.stringify(actual)}`, {
                offset,
                expected,
                found: actual,
            });
        }
    }

    private async scanString<T>(sink: StringSink<T>): Promise<T> {
        const b = await this.win.peekNonSpace();
        const win = this.win;
        const offset = win.offset;
        if (b !== QUOTE) {
            throw new ScanError('UnexpectedByte', `expected '"' to start string but found ${describeByte(b)}`, {
                offset,
                expected: '"',
                found: describeByte(b),
            });
        }

        // Fast path: the whole string is buffered and needs no decoding
        const buf = win.buffer;
        let j = win.start + 1;
        for (; j < win.end; j++) {
            const c = buf[j];
            if (c === QUOTE) {
                const value = sink.whole(buf, win.start + 1, j);
                win.consume(j + 1 - win.start);
                return value;
            }
            if (c === BACKSLASH || c >= 0x80) break;
        }

        sink.begin();
        sink.write(buf, win.start + 1, j);
        win.consume(j - win.start);

        const state: DecodeState = { escape: false };
        while (!decodeStringStep(win, state, sink)) {
            if (!(await win.fill())) {
                throw new ScanError('UnterminatedString', 'expected \'"\' to end string but reached end of input', {
                    offset,
                    expected: '"',
                });
            }
        }
        return sink.finish();
    }

    // ============ Skip ============

    /**
     * Consume one complete value without building it. Supports objects,
     * arrays, strings, numbers and booleans; `null` is not recognised.
     */
    async skip(): Promise<void> {
        await this.skipValue(0);
    }

    private async skipValue(depth: number): Promise<void> {
        const b = await this.win.peekNonSpace();
        switch (b) {
            case OPEN_BRACKET:
                return this.skipArray(depth + 1);
            case OPEN_BRACE:
                return this.skipObject(depth + 1);
            case QUOTE:
                await this.scanString(this.discard);
                return;
            case LOWER_T:
            case LOWER_F:
                await this.bool();
                return;
        }
        if (b === MINUS || isDigit(b)) {
            await this.float64();
            return;
        }
        throw new ScanError('UnsupportedValue', `cannot skip value starting with ${describeByte(b)}`, {
            offset: this.win.offset,
            found: describeByte(b),
        });
    }

    private async skipArray(depth: number): Promise<void> {
        this.enter(depth);
        await this.delim('[');
        while (await this.more()) {
            await this.skipValue(depth);
        }
        await this.delim(']');
    }

    private async skipObject(depth: number): Promise<void> {
        this.enter(depth);
        await this.delim('{');
        while (await this.more()) {
            await this.scanString(this.discard);
            await this.delim(':');
            await this.skipValue(depth);
        }
        await this.delim('}');
    }

    private enter(depth: number): void {
        if (depth <= this.maxDepth) return;
        this.logger.debug({ depth, maxDepth: this.maxDepth, offset: this.win.offset }, 'skip nesting limit reached');
        throw new ScanError('NestingTooDeep', `nesting deeper than ${this.maxDepth} levels`, {
            offset: this.win.offset,
        });
    }
}

function invalidNumber(token: NumericToken): ScanError {
    return new ScanError('InvalidNumber', `invalid number ${JSON.stringify(token.text)}`, {
        offset: token.offset,
        found: token.text,
    });
}
