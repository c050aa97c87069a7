import type { ByteWindow } from './window.js';
import { type StringSink, writeCodePoint } from './sinks.js';
import { REPLACEMENT_CHARACTER, decodeSequence, isFullSequence } from './utf8.js';
import { ScanError, describeByte } from '../errors.js';

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const LOWER_U = 0x75;

// ============ Escapes ============

const SIMPLE_ESCAPES: Record<number, number> = {
    0x22: 0x22, // \"
    0x5c: 0x5c, // \\
    0x2f: 0x2f, // \/
    0x62: 0x08, // \b
    0x66: 0x0c, // \f
    0x6e: 0x0a, // \n
    0x72: 0x0d, // \r
    0x74: 0x09, // \t
};

function hexValue(b: number): number {
    if (b >= 0x30 && b <= 0x39) return b - 0x30;
    if (b >= 0x61 && b <= 0x66) return b - 0x61 + 10;
    if (b >= 0x41 && b <= 0x46) return b - 0x41 + 10;
    return -1;
}

/** Value of four hex digits at bytes[from], or -1 */
function parseHex4(bytes: Uint8Array, from: number): number {
    let v = 0;
    for (let k = 0; k < 4; k++) {
        const d = hexValue(bytes[from + k]);
        if (d < 0) return -1;
        v = (v << 4) | d;
    }
    return v;
}

// ============ Decode Step ============

/**
 * State carried across refills while a string is being decoded.
 */
export interface DecodeState {
    /** A backslash was consumed and its escape letter is still to come */
    escape: boolean;
}

/**
 * Decode as much of the string body as the window holds.
 *
 * Every byte classified here is consumed from the window. The step stops
 * early, leaving the bytes in place, when an escape or a UTF-8 sequence is
 * only partially buffered; the caller refills and calls again. Returns
 * true once the closing quote has been consumed.
 */
export function decodeStringStep<T>(win: ByteWindow, state: DecodeState, sink: StringSink<T>): boolean {
    const buf = win.buffer;
    const end = win.end;
    let i = win.start;

    while (i < end) {
        const c = buf[i];

        if (state.escape) {
            if (c === LOWER_U) {
                if (i + 5 > end) break;
                const codePoint = parseHex4(buf, i + 1);
                if (codePoint < 0) {
                    throw invalidEscape(win, i, `\\u${String.fromCharCode(...buf.subarray(i + 1, i + 5))}`);
                }
                writeCodePoint(sink, codePoint);
                i += 5;
            } else {
                const mapped = SIMPLE_ESCAPES[c];
                if (mapped === undefined) {
                    throw invalidEscape(win, i, `\\${c >= 0x20 && c < 0x7f ? String.fromCharCode(c) : describeByte(c)}`);
                }
                sink.writeByte(mapped);
                i++;
            }
            state.escape = false;
            continue;
        }

        if (c === BACKSLASH) {
            state.escape = true;
            i++;
            continue;
        }

        if (c === QUOTE) {
            win.consume(i + 1 - win.start);
            return true;
        }

        if (c >= 0x80) {
            if (!isFullSequence(buf, i, end)) break;
            const { size } = decodeSequence(buf, i, end);
            if (size === 1) {
                writeCodePoint(sink, REPLACEMENT_CHARACTER);
            } else {
                sink.write(buf, i, i + size);
            }
            i += size;
            continue;
        }

        let j = i + 1;
        while (j < end && buf[j] < 0x80 && buf[j] !== QUOTE && buf[j] !== BACKSLASH) j++;
        sink.write(buf, i, j);
        i = j;
    }

    win.consume(i - win.start);
    return false;
}

function invalidEscape(win: ByteWindow, i: number, found: string): ScanError {
    return new ScanError('InvalidEscape', `invalid escape ${JSON.stringify(found)} in string`, {
        offset: win.offset + (i - win.start) - 1,
        found,
    });
}
