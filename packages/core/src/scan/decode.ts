import { parseError, utf8Error } from '../errors.ts'
import type { ParseStrategy } from '../parse/types.ts'

const SPACE = 0x20

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

/**
 * Drops one trailing space byte, if the token ends in one. Only a literal
 * 0x20 in last position is removed; other delimiters and further spaces stay.
 */
export function trimTrailingSpace(raw: Uint8Array): Uint8Array {
	return raw.length > 0 && raw[raw.length - 1] === SPACE ? raw.subarray(0, raw.length - 1) : raw
}

/**
 * Decodes raw token bytes as UTF-8 and converts the text with `parser`.
 *
 * @throws {ScanError} of kind Utf8 or Parse
 */
export function decodeToken<T>(raw: Uint8Array, parser: ParseStrategy<T>): T {
	const bytes = trimTrailingSpace(raw)
	let text: string
	try {
		text = decoder.decode(bytes)
	} catch (error: unknown) {
		throw utf8Error(bytes.length, error)
	}
	const outcome = parser.parse(text)
	if (!outcome.succeeded) throw parseError(text, parser.name, outcome.error)
	return outcome.value
}
