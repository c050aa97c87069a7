import { encodeCodePoint } from './utf8.js';

const utf8Decoder = new TextDecoder();

// ============ Scratch Buffer ============

/**
 * Growable byte buffer reused across string decodes.
 * Only complete UTF-8 sequences are ever written to it.
 */
export class ScratchBuffer {
    private bytes: Uint8Array = new Uint8Array(256);
    private length = 0;

    reset(): void {
        this.length = 0;
    }

    write(src: Uint8Array, from: number, to: number): void {
        this.grow(to - from);
        this.bytes.set(src.subarray(from, to), this.length);
        this.length += to - from;
    }

    writeByte(b: number): void {
        this.grow(1);
        this.bytes[this.length++] = b;
    }

    toString(): string {
        return utf8Decoder.decode(this.bytes.subarray(0, this.length));
    }

    private grow(n: number): void {
        if (this.length + n <= this.bytes.length) return;
        let c = this.bytes.length;
        while (c < this.length + n) c *= 2;
        const nb = new Uint8Array(c);
        nb.set(this.bytes.subarray(0, this.length));
        this.bytes = nb;
    }
}

// ============ Sinks ============

/**
 * Destination for decoded string content. The scan loop is shared between
 * string() and stringValue(); only the sink differs.
 */
export interface StringSink<T> {
    /** Whole content found in one buffered slice with nothing to decode */
    whole(src: Uint8Array, from: number, to: number): T;

    begin(): void;
    write(src: Uint8Array, from: number, to: number): void;
    writeByte(b: number): void;
    finish(): T;
}

const runeBytes = new Uint8Array(4);

export function writeCodePoint<T>(sink: StringSink<T>, codePoint: number): void {
    const n = encodeCodePoint(codePoint, runeBytes);
    sink.write(runeBytes, 0, n);
}

/**
 * Collects the decoded text.
 */
export class TextSink implements StringSink<string> {
    constructor(private readonly scratch: ScratchBuffer) {}

    whole(src: Uint8Array, from: number, to: number): string {
        return utf8Decoder.decode(src.subarray(from, to));
    }

    begin(): void {
        this.scratch.reset();
    }

    write(src: Uint8Array, from: number, to: number): void {
        this.scratch.write(src, from, to);
    }

    writeByte(b: number): void {
        this.scratch.writeByte(b);
    }

    finish(): string {
        const s = this.scratch.toString();
        this.scratch.reset();
        return s;
    }
}

/**
 * Compares decoded content against an expected value as it arrives.
 * Nothing is copied while the content matches; after the first
 * difference the content is recorded into scratch so the mismatch can be
 * reported. finish() yields null on an exact match, the actual text
 * otherwise.
 */
export class MatchSink implements StringSink<string | null> {
    private expected: Uint8Array = new Uint8Array(0);
    private matched = 0;
    private mismatched = false;
    private recording = true;
    private matchable = true;

    constructor(private readonly scratch: ScratchBuffer) {}

    /**
     * Arm the sink for the next string. With `record` false the actual
     * text is never built and finish() reports a mismatch as ''. With
     * `matchable` false every string mismatches.
     */
    expect(expected: Uint8Array, record = true, matchable = true): void {
        this.expected = expected;
        this.recording = record;
        this.matchable = matchable;
    }

    whole(src: Uint8Array, from: number, to: number): string | null {
        const n = to - from;
        if (this.matchable && n === this.expected.length) {
            let i = 0;
            while (i < n && src[from + i] === this.expected[i]) i++;
            if (i === n) return null;
        }
        return this.recording ? utf8Decoder.decode(src.subarray(from, to)) : '';
    }

    begin(): void {
        this.matched = 0;
        this.mismatched = !this.matchable;
        this.scratch.reset();
    }

    write(src: Uint8Array, from: number, to: number): void {
        if (this.mismatched) {
            if (this.recording) this.scratch.write(src, from, to);
            return;
        }
        for (let i = from; i < to; i++) {
            if (this.matched < this.expected.length && src[i] === this.expected[this.matched]) {
                this.matched++;
                continue;
            }
            this.mismatched = true;
            if (this.recording) {
                this.scratch.write(this.expected, 0, this.matched);
                this.scratch.write(src, i, to);
            }
            return;
        }
    }

    writeByte(b: number): void {
        runeBytes[0] = b;
        this.write(runeBytes, 0, 1);
    }

    finish(): string | null {
        let actual: string | null;
        if (!this.mismatched && this.matched === this.expected.length) {
            actual = null;
        } else if (!this.recording) {
            actual = '';
        } else if (!this.mismatched) {
            // content is a strict prefix of the expected value
            actual = utf8Decoder.decode(this.expected.subarray(0, this.matched));
        } else {
            actual = this.scratch.toString();
        }
        this.scratch.reset();
        return actual;
    }
}
