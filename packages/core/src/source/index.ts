/**
 * Buffered byte sources consumed by the scan engine.
 */

export { BytesSource, type BytesSourceOptions } from './bytes.ts'
export { FdSource, type FdSourceOptions } from './fd.ts'
export {
	type BufferedByteSource,
	InterruptedError,
	isInterruptedError,
	readFromBuffered,
} from './types.ts'
