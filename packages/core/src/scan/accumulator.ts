/**
 * Growable byte arena reused across scans.
 * `clear()` truncates the contents but keeps the backing storage, so a stream
 * that reads tokens of similar size stops allocating after the first few calls.
 */

const INITIAL_CAPACITY = 64

export class ByteAccumulator {
	private bytes: Uint8Array
	private used = 0

	constructor(initialCapacity = INITIAL_CAPACITY) {
		if (!Number.isInteger(initialCapacity) || initialCapacity < 0) {
			throw new RangeError(`Invalid accumulator capacity: ${initialCapacity}`)
		}
		this.bytes = new Uint8Array(initialCapacity)
	}

	get length(): number {
		return this.used
	}

	get capacity(): number {
		return this.bytes.length
	}

	append(chunk: Uint8Array): void {
		if (chunk.length === 0) return
		this.reserve(this.used + chunk.length)
		this.bytes.set(chunk, this.used)
		this.used += chunk.length
	}

	clear(): void {
		this.used = 0
	}

	/** Returns a view of the current contents. Invalidated by the next append or clear. */
	view(): Uint8Array {
		return this.bytes.subarray(0, this.used)
	}

	private reserve(needed: number): void {
		if (needed <= this.bytes.length) return
		let next = Math.max(this.bytes.length, INITIAL_CAPACITY)
		while (next < needed) {
			next *= 2
		}
		const grown = new Uint8Array(next)
		grown.set(this.bytes.subarray(0, this.used))
		this.bytes = grown
	}
}
