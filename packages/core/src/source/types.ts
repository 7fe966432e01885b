/**
 * Pull-based buffered byte source.
 *
 * `fill()` exposes the next available chunk without consuming it; an empty
 * chunk means the source is exhausted. `consume(n)` marks the first `n` bytes
 * of that chunk as read. A `fill()` that throws {@link InterruptedError} may be
 * retried; any other thrown error is a real I/O failure.
 */
export interface BufferedByteSource {
	fill(): Uint8Array
	consume(amount: number): void
	read(buffer: Uint8Array): number
}

/**
 * Transient condition raised by a source when a fetch should simply be retried.
 */
export class InterruptedError extends Error {
	override readonly cause?: unknown

	constructor(message = 'interrupted', cause?: unknown) {
		super(message, cause !== undefined ? { cause } : undefined)
		this.name = 'InterruptedError'
		if (cause !== undefined) this.cause = cause
	}
}

export function isInterruptedError(error: unknown): error is InterruptedError {
	return error instanceof InterruptedError
}

/**
 * Copies buffered bytes into `buffer` and consumes them.
 * Returns 0 once the source is exhausted (or when `buffer` is empty).
 */
export function readFromBuffered(source: BufferedByteSource, buffer: Uint8Array): number {
	if (buffer.length === 0) return 0
	const chunk = source.fill()
	const count = Math.min(chunk.length, buffer.length)
	buffer.set(chunk.subarray(0, count))
	source.consume(count)
	return count
}
