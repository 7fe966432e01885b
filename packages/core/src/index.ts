/**
 * tokenscan core
 *
 * Whitespace-delimited, type-directed token scanning over buffered byte sources:
 * - Sources expose fill/consume; interruptions are retried, other failures become Io errors
 * - Each scan skips delimiters, accumulates one token, decodes UTF-8 and parses it
 * - Failures are a closed set of kinds and never invalidate the stream
 */

export {
	describeError,
	ioError,
	isScanError,
	limitExceededError,
	parseError,
	ScanError,
	ScanErrorKind,
	type ScanResult,
	utf8Error,
} from './errors.ts'
export {
	bigInteger,
	bool,
	char,
	f32,
	f64,
	failed,
	fromThrowing,
	i8,
	i16,
	i32,
	i64,
	isize,
	isStrategyName,
	ParseFailure,
	type ParseFailureKind,
	type ParseOutcome,
	type ParseStrategy,
	parsed,
	smallInteger,
	type StrategyName,
	type StrategyValue,
	strategies,
	strategy,
	string,
	u8,
	u16,
	u32,
	u64,
	usize,
} from './parse/index.ts'
export {
	ByteAccumulator,
	countDelimiters,
	countTokenBytes,
	decodeToken,
	extractToken,
	isDelimiter,
	trimTrailingSpace,
} from './scan/index.ts'
export {
	type BufferedByteSource,
	BytesSource,
	type BytesSourceOptions,
	FdSource,
	type FdSourceOptions,
	InterruptedError,
	isInterruptedError,
	readFromBuffered,
} from './source/index.ts'
export { InputStream } from './stream.ts'
