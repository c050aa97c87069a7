/**
 * Failure kinds reported by the scanner.
 */
export type ScanErrorCode =
    | 'EndOfInput'            // source exhausted where a token was expected
    | 'UnexpectedEndOfInput'  // source exhausted inside a fixed-length token
    | 'SourceError'           // the byte source failed
    | 'UnexpectedByte'        // delimiter or opening quote mismatch
    | 'ExpectedComma'
    | 'TrailingData'
    | 'InvalidNumber'
    | 'InvalidBoolean'
    | 'InvalidEscape'
    | 'UnterminatedString'
    | 'StringMismatch'
    | 'TokenTooLong'          // token does not fit in the read buffer
    | 'UnsupportedValue'      // skip() met a value it cannot scan (null)
    | 'NestingTooDeep';

export interface ScanErrorDetails {
    /** Stream offset of the byte or token the error is about */
    offset: number;
    expected?: string;
    found?: string;
    cause?: unknown;
}

export class ScanError extends Error {
    readonly code: ScanErrorCode;
    readonly offset: number;
    readonly expected?: string;
    readonly found?: string;

    constructor(code: ScanErrorCode, message: string, details: ScanErrorDetails) {
        super(`${message} (offset ${details.offset})`, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = 'ScanError';
        this.code = code;
        this.offset = details.offset;
        this.expected = details.expected;
        this.found = details.found;
    }
}

export function isScanError(err: unknown, code?: ScanErrorCode): err is ScanError {
    return err instanceof ScanError && (code === undefined || err.code === code);
}

/**
 * Render a single byte for diagnostics: printable ASCII as a quoted
 * character, everything else as hex.
 */
export function describeByte(b: number): string {
    if (b >= 0x20 && b < 0x7f) return JSON.stringify(String.fromCharCode(b));
    return `0x${b.toString(16).padStart(2, '0')}`;
}
