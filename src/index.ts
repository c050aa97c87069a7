export { JsonScanner } from './scanner.js';
export { fromBytes, fromAsyncIterable, fromReadableStream } from './sources.js';
export { ScanError, isScanError, type ScanErrorCode, type ScanErrorDetails } from './errors.js';
export { ScannerOptionsSchema, MIN_BUFFER_SIZE, type ScannerOptions } from './options.js';
export { logger } from './logger.js';
export {
    type ByteSource,
    type ClosableByteSource,
    type ReadResult,
    type SourceState,
    type Delimiter,
} from './types.js';
