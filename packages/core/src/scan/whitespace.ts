const SPACE = 0x20
const TAB = 0x09
const CARRIAGE_RETURN = 0x0d

/**
 * Classifies a byte as a token delimiter.
 * Delimiters are space (0x20) and the control range 0x09-0x0D
 * (tab, line feed, vertical tab, form feed, carriage return).
 */
export function isDelimiter(byte: number): boolean {
	return byte === SPACE || (byte >= TAB && byte <= CARRIAGE_RETURN)
}

/**
 * Length of the leading run of delimiter bytes in a chunk.
 */
export function countDelimiters(chunk: Uint8Array): number {
	let pos = 0
	while (pos < chunk.length && isDelimiter(chunk[pos] ?? 0)) {
		pos++
	}
	return pos
}

/**
 * Length of the leading run of token (non-delimiter) bytes in a chunk.
 */
export function countTokenBytes(chunk: Uint8Array): number {
	let pos = 0
	while (pos < chunk.length && !isDelimiter(chunk[pos] ?? SPACE)) {
		pos++
	}
	return pos
}
