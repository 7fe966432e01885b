import { isScanError, type ScanError, type ScanResult } from './errors.ts'
import type { ParseStrategy } from './parse/types.ts'
import { ByteAccumulator } from './scan/accumulator.ts'
import { decodeToken } from './scan/decode.ts'
import { extractToken } from './scan/engine.ts'
import { BytesSource, type BytesSourceOptions } from './source/bytes.ts'
import type { BufferedByteSource } from './source/types.ts'

/**
 * Whitespace-delimited, type-directed reader over a buffered byte source.
 *
 * Each `scan` skips leading whitespace, collects one token and converts it
 * with the given strategy. Every scan is all-or-nothing for its token, and
 * the stream stays usable after any failure. The stream also forwards
 * `fill`/`consume`/`read`, so it can itself be handed to another consumer as
 * a buffered source.
 *
 * Not safe for interleaved use by several callers.
 */
export class InputStream implements BufferedByteSource {
	private readonly source: BufferedByteSource
	private readonly accumulator = new ByteAccumulator()
	private failure: ScanError | null = null
	private emptyToken = false

	constructor(source: BufferedByteSource) {
		this.source = source
	}

	/**
	 * Stream over in-memory bytes or a string.
	 */
	static from(input: Uint8Array | string, options?: BytesSourceOptions): InputStream {
		return new InputStream(new BytesSource(input, options))
	}

	/**
	 * Error that ended the last `values()` iteration; null when it ran to the end of input.
	 */
	get lastError(): ScanError | null {
		return this.failure
	}

	/**
	 * Whether the most recent scan found no token bytes, i.e. the source is exhausted.
	 */
	get exhausted(): boolean {
		return this.emptyToken
	}

	scan<T>(parser: ParseStrategy<T>): ScanResult<T> {
		return this.scanToken(parser, undefined)
	}

	/**
	 * Like `scan`, but fails with BufferLimitExceeded once the token is longer
	 * than `limit` bytes. Bytes of that token read before the overflow stay consumed.
	 */
	scanWithLimit<T>(parser: ParseStrategy<T>, limit: number): ScanResult<T> {
		if (!Number.isInteger(limit) || limit < 0) {
			throw new RangeError(`Invalid token limit: ${limit}`)
		}
		return this.scanToken(parser, limit)
	}

	/**
	 * Yields values until the input ends or a scan fails. The empty token at
	 * the end of input is not yielded, even for strategies that accept it.
	 * A failure other than end of input is kept in `lastError`.
	 */
	*values<T>(parser: ParseStrategy<T>, limit?: number): Generator<T, void, undefined> {
		this.failure = null
		for (;;) {
			const result = limit === undefined ? this.scan(parser) : this.scanWithLimit(parser, limit)
			if (this.emptyToken) return
			if (!result.succeeded) {
				this.failure = result.error
				return
			}
			yield result.value
		}
	}

	fill(): Uint8Array {
		return this.source.fill()
	}

	consume(amount: number): void {
		this.source.consume(amount)
	}

	read(buffer: Uint8Array): number {
		return this.source.read(buffer)
	}

	private scanToken<T>(parser: ParseStrategy<T>, limit: number | undefined): ScanResult<T> {
		this.emptyToken = false
		try {
			const raw = extractToken(this.source, this.accumulator, limit)
			this.emptyToken = raw.length === 0
			return { succeeded: true, value: decodeToken(raw, parser) }
		} catch (error: unknown) {
			if (isScanError(error)) return { error, succeeded: false }
			throw error
		}
	}
}
