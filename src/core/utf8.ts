/**
 * UTF-8 sequence classification for the string slow path.
 *
 * The rules follow RFC 3629: overlong forms, surrogates and code points
 * above U+10FFFF are invalid, and an invalid sequence decodes to a single
 * U+FFFD covering one byte.
 */

export const REPLACEMENT_CHARACTER = 0xfffd;

const LOCB = 0x80;
const HICB = 0xbf;

interface LeadInfo {
    size: number;
    lo: number;  // accepted range of the second byte
    hi: number;
}

const INVALID: LeadInfo = { size: 1, lo: LOCB, hi: HICB };

function leadInfo(b: number): LeadInfo {
    if (b < 0x80) return { size: 1, lo: LOCB, hi: HICB };
    if (b < 0xc2) return INVALID;
    if (b < 0xe0) return { size: 2, lo: LOCB, hi: HICB };
    if (b === 0xe0) return { size: 3, lo: 0xa0, hi: HICB };
    if (b === 0xed) return { size: 3, lo: LOCB, hi: 0x9f };
    if (b < 0xf0) return { size: 3, lo: LOCB, hi: HICB };
    if (b === 0xf0) return { size: 4, lo: 0x90, hi: HICB };
    if (b < 0xf4) return { size: 4, lo: LOCB, hi: HICB };
    if (b === 0xf4) return { size: 4, lo: LOCB, hi: 0x8f };
    return INVALID;
}

/**
 * Whether `bytes[from, to)` starts with a complete sequence, or with one
 * that is already known to be invalid. When false, more bytes are needed
 * before the sequence can be decoded.
 */
export function isFullSequence(bytes: Uint8Array, from: number, to: number): boolean {
    const n = to - from;
    if (n <= 0) return false;
    const lead = bytes[from];
    if (lead < 0x80) return true;
    const info = leadInfo(lead);
    if (n >= info.size) return true;
    if (n > 1 && (bytes[from + 1] < info.lo || bytes[from + 1] > info.hi)) return true;
    if (n > 2 && (bytes[from + 2] < LOCB || bytes[from + 2] > HICB)) return true;
    return false;
}

export interface DecodedSequence {
    codePoint: number;
    size: number;
}

/**
 * Decode the sequence at `bytes[from]`. Callers check isFullSequence()
 * first; a short or malformed sequence yields U+FFFD of size 1.
 */
export function decodeSequence(bytes: Uint8Array, from: number, to: number): DecodedSequence {
    const n = to - from;
    const b0 = bytes[from];
    if (b0 < 0x80) return { codePoint: b0, size: 1 };

    const info = leadInfo(b0);
    if (info.size === 1 || n < info.size) return { codePoint: REPLACEMENT_CHARACTER, size: 1 };

    const b1 = bytes[from + 1];
    if (b1 < info.lo || b1 > info.hi) return { codePoint: REPLACEMENT_CHARACTER, size: 1 };
    if (info.size === 2) {
        return { codePoint: ((b0 & 0x1f) << 6) | (b1 & 0x3f), size: 2 };
    }

    const b2 = bytes[from + 2];
    if (b2 < LOCB || b2 > HICB) return { codePoint: REPLACEMENT_CHARACTER, size: 1 };
    if (info.size === 3) {
        return { codePoint: ((b0 & 0x0f) << 12) | ((b1 & 0x3f) << 6) | (b2 & 0x3f), size: 3 };
    }

    const b3 = bytes[from + 3];
    if (b3 < LOCB || b3 > HICB) return { codePoint: REPLACEMENT_CHARACTER, size: 1 };
    return {
        codePoint: ((b0 & 0x07) << 18) | ((b1 & 0x3f) << 12) | ((b2 & 0x3f) << 6) | (b3 & 0x3f),
        size: 4,
    };
}

/**
 * Encode a code point as UTF-8 into `out` (at least 4 bytes) and return
 * the encoded length. Surrogates and out-of-range values encode as U+FFFD.
 */
export function encodeCodePoint(codePoint: number, out: Uint8Array): number {
    let cp = codePoint;
    if ((cp >= 0xd800 && cp <= 0xdfff) || cp < 0 || cp > 0x10ffff) {
        cp = REPLACEMENT_CHARACTER;
    }
    if (cp < 0x80) {
        out[0] = cp;
        return 1;
    }
    if (cp < 0x800) {
        out[0] = 0xc0 | (cp >> 6);
        out[1] = 0x80 | (cp & 0x3f);
        return 2;
    }
    if (cp < 0x10000) {
        out[0] = 0xe0 | (cp >> 12);
        out[1] = 0x80 | ((cp >> 6) & 0x3f);
        out[2] = 0x80 | (cp & 0x3f);
        return 3;
    }
    out[0] = 0xf0 | (cp >> 18);
    out[1] = 0x80 | ((cp >> 12) & 0x3f);
    out[2] = 0x80 | ((cp >> 6) & 0x3f);
    out[3] = 0x80 | (cp & 0x3f);
    return 4;
}
