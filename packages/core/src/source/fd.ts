import { closeSync, openSync, readSync } from 'node:fs'
import { InterruptedError, readFromBuffered, type BufferedByteSource } from './types.ts'

export interface FdSourceOptions {
	/** Size of the internal read buffer in bytes. */
	capacity?: number
	/** Close the descriptor when the source is closed. */
	owned?: boolean
}

const DEFAULT_CAPACITY = 8 * 1024

/** Error codes that mean "nothing available right now, try again". */
const TRANSIENT_CODES = new Set(['EAGAIN', 'EINTR', 'EWOULDBLOCK'])

function errorCode(error: unknown): string | undefined {
	if (!(error instanceof Error) || !('code' in error)) return undefined
	return typeof error.code === 'string' ? error.code : undefined
}

/**
 * Blocking source over a file descriptor, buffered like a classic BufReader.
 */
export class FdSource implements BufferedByteSource {
	private readonly fd: number
	private readonly owned: boolean
	private readonly buffer: Uint8Array
	private start = 0
	private end = 0
	private closed = false

	constructor(fd: number, options: FdSourceOptions = {}) {
		const { capacity = DEFAULT_CAPACITY, owned = false } = options
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Invalid buffer capacity: ${capacity}`)
		}
		this.fd = fd
		this.owned = owned
		this.buffer = new Uint8Array(capacity)
	}

	/**
	 * Opens `path` for reading. The returned source owns the descriptor.
	 */
	static open(path: string, options: Omit<FdSourceOptions, 'owned'> = {}): FdSource {
		return new FdSource(openSync(path, 'r'), { ...options, owned: true })
	}

	fill(): Uint8Array {
		if (this.start >= this.end) {
			// A failed read must not expose the previous, consumed window again.
			this.start = 0
			this.end = 0
			this.end = this.readIntoBuffer()
		}
		return this.buffer.subarray(this.start, this.end)
	}

	consume(amount: number): void {
		this.start = Math.min(this.end, this.start + amount)
	}

	read(buffer: Uint8Array): number {
		return readFromBuffered(this, buffer)
	}

	close(): void {
		if (this.closed) return
		this.closed = true
		if (this.owned) closeSync(this.fd)
	}

	private readIntoBuffer(): number {
		try {
			return readSync(this.fd, this.buffer, 0, this.buffer.length, null)
		} catch (error: unknown) {
			const code = errorCode(error)
			if (code === 'EOF') return 0
			if (code !== undefined && TRANSIENT_CODES.has(code)) {
				throw new InterruptedError(`read interrupted (${code})`, error)
			}
			throw error
		}
	}
}
