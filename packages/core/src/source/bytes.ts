import { readFromBuffered, type BufferedByteSource } from './types.ts'

export interface BytesSourceOptions {
	/** Largest chunk a single `fill()` exposes. Defaults to everything that is left. */
	chunkSize?: number
}

const encoder = new TextEncoder()

/**
 * In-memory source over a byte array or a string (encoded as UTF-8).
 */
export class BytesSource implements BufferedByteSource {
	private readonly data: Uint8Array
	private readonly chunkSize: number
	private offset = 0

	constructor(input: Uint8Array | string, options: BytesSourceOptions = {}) {
		const { chunkSize = Number.POSITIVE_INFINITY } = options
		if (!(chunkSize >= 1)) {
			throw new RangeError(`Invalid chunk size: ${chunkSize}`)
		}
		this.data = typeof input === 'string' ? encoder.encode(input) : input
		this.chunkSize = chunkSize
	}

	/** Number of bytes not yet consumed. */
	get remaining(): number {
		return this.data.length - this.offset
	}

	fill(): Uint8Array {
		const end = Math.min(this.data.length, this.offset + this.chunkSize)
		return this.data.subarray(this.offset, end)
	}

	consume(amount: number): void {
		this.offset = Math.min(this.data.length, this.offset + amount)
	}

	read(buffer: Uint8Array): number {
		return readFromBuffered(this, buffer)
	}
}
