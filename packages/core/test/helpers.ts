import { type BufferedByteSource, readFromBuffered } from '../src/source/types.ts'

const encoder = new TextEncoder()

export type Step = Uint8Array | string | Error

/**
 * Source that replays a fixed script: each step is a chunk to expose, or an
 * error thrown by the next `fill()` (once). Exhausted once the script ends.
 */
export class ScriptedSource implements BufferedByteSource {
	private readonly steps: Array<Uint8Array | Error>
	private offset = 0
	fills = 0
	consumed = 0

	constructor(steps: Step[]) {
		this.steps = steps.map((step) => (typeof step === 'string' ? encoder.encode(step) : step))
	}

	fill(): Uint8Array {
		this.fills++
		const step = this.steps[0]
		if (step === undefined) return new Uint8Array()
		if (step instanceof Error) {
			this.steps.shift()
			throw step
		}
		return step.subarray(this.offset)
	}

	consume(amount: number): void {
		const step = this.steps[0]
		if (step === undefined || step instanceof Error) return
		this.offset += amount
		this.consumed += amount
		if (this.offset >= step.length) {
			this.steps.shift()
			this.offset = 0
		}
	}

	read(buffer: Uint8Array): number {
		return readFromBuffered(this, buffer)
	}
}

export function bytes(text: string): Uint8Array {
	return encoder.encode(text)
}
