import { ioError, limitExceededError } from '../errors.ts'
import { type BufferedByteSource, isInterruptedError } from '../source/types.ts'
import type { ByteAccumulator } from './accumulator.ts'
import { countDelimiters, countTokenBytes } from './whitespace.ts'

/**
 * Fetches the next chunk, retrying interruptions. Any other failure becomes an Io error.
 */
function fetchChunk(source: BufferedByteSource): Uint8Array {
	for (;;) {
		try {
			return source.fill()
		} catch (error: unknown) {
			if (isInterruptedError(error)) continue
			throw ioError(error)
		}
	}
}

/**
 * Repeatedly matches a prefix of the next chunk and consumes it.
 * Stops once a prefix is shorter than its chunk, or the source is exhausted.
 * `act` sees each matched prefix before it is consumed; if it throws, the
 * prefix stays unconsumed.
 */
function consumeWhile(
	source: BufferedByteSource,
	measure: (chunk: Uint8Array) => number,
	act: (prefix: Uint8Array) => void
): void {
	for (;;) {
		const chunk = fetchChunk(source)
		const matched = measure(chunk)
		act(chunk.subarray(0, matched))
		source.consume(matched)
		if (matched < chunk.length || chunk.length === 0) return
	}
}

function ignore(_prefix: Uint8Array): void {}

/**
 * Carves the next whitespace-delimited token out of `source`.
 *
 * Leading delimiters are skipped, then token bytes are collected into
 * `accumulator` (cleared first). An exhausted source yields an empty token.
 * With `limit` set, the scan fails as soon as the token would grow past it;
 * earlier chunks of that token remain consumed.
 *
 * @returns a view of the accumulator holding the raw token bytes
 * @throws {ScanError} of kind Io or BufferLimitExceeded
 */
export function extractToken(
	source: BufferedByteSource,
	accumulator: ByteAccumulator,
	limit?: number
): Uint8Array {
	consumeWhile(source, countDelimiters, ignore)
	accumulator.clear()
	consumeWhile(source, countTokenBytes, (prefix) => {
		if (limit !== undefined && accumulator.length + prefix.length > limit) {
			throw limitExceededError(limit, accumulator.length + prefix.length)
		}
		accumulator.append(prefix)
	})
	return accumulator.view()
}
