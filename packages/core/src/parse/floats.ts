import { failed, type ParseOutcome, type ParseStrategy, parsed } from './types.ts'

const DECIMAL_LITERAL = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/
const SPECIAL_LITERAL = /^[+-]?(?:inf|infinity|nan)$/i

function parseDouble(text: string): ParseOutcome<number> {
	if (text.length === 0) return failed('empty', 'cannot parse float from empty string')
	if (DECIMAL_LITERAL.test(text)) return parsed(Number(text))
	if (SPECIAL_LITERAL.test(text)) {
		const body = text.replace(/^[+-]/, '').toLowerCase()
		if (body === 'nan') return parsed(Number.NaN)
		return parsed(text.startsWith('-') ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY)
	}
	return failed('invalid_float', 'invalid float literal')
}

export const f64: ParseStrategy<number> = {
	name: 'f64',
	parse: parseDouble,
}

const scratch = new DataView(new ArrayBuffer(8))

function float32Bits(value: number): number {
	scratch.setFloat32(0, value)
	return scratch.getUint32(0)
}

function float32FromBits(bits: number): number {
	scratch.setUint32(0, bits)
	return scratch.getFloat32(0)
}

/** A finite, non-negative double as `mantissa * 2 ** exponent`. */
function exactBinary(value: number): { mantissa: bigint; exponent: number } {
	scratch.setFloat64(0, value)
	const high = scratch.getUint32(0)
	const fraction = (BigInt(high & 0xfffff) << 32n) | BigInt(scratch.getUint32(4))
	const biased = (high >>> 20) & 0x7ff
	return biased === 0
		? { exponent: -1074, mantissa: fraction }
		: { exponent: biased - 1075, mantissa: fraction | (1n << 52n) }
}

/**
 * Sign of `|text| - target`, computed exactly. `text` is a decimal literal.
 */
function compareDecimal(text: string, target: number): number {
	const [body = '', exponent = '0'] = text.replace(/^[+-]/, '').split(/[eE]/)
	const [whole = '', fraction = ''] = body.split('.')
	const scale = Number(exponent) - fraction.length
	const { mantissa, exponent: binaryExponent } = exactBinary(target)

	let left = BigInt(`${whole}${fraction}` || '0')
	let right = mantissa
	if (scale >= 0) left *= 10n ** BigInt(scale)
	else right *= 10n ** BigInt(-scale)
	if (binaryExponent >= 0) right <<= BigInt(binaryExponent)
	else left <<= BigInt(-binaryExponent)

	return left === right ? 0 : left > right ? 1 : -1
}

/** Where the float32 after the largest finite one would sit. */
const FLOAT32_OVERFLOW = 2 ** 128

/**
 * Rounds the double parsed from `text` to float32 as if rounding the decimal
 * directly. The two differ only when the double sits exactly halfway between
 * two float32 values while the decimal does not.
 */
function roundToFloat32(text: string, value: number): number {
	const rounded = Math.fround(value)
	if (rounded === value || !Number.isFinite(value)) return rounded

	const magnitude = Math.abs(value)
	const near = Math.abs(rounded)
	const other = float32FromBits(near > magnitude ? float32Bits(near) - 1 : float32Bits(near) + 1)
	const midpoint = ((near === Number.POSITIVE_INFINITY ? FLOAT32_OVERFLOW : near) + other) / 2
	if (midpoint !== magnitude) return rounded

	const order = compareDecimal(text, magnitude)
	if (order === 0) return rounded
	const pick = (order > 0) === (near > magnitude) ? near : other
	return value < 0 ? -pick : pick
}

/**
 * Single precision, rounded once from the decimal text to the nearest float32.
 */
export const f32: ParseStrategy<number> = {
	name: 'f32',
	parse(text: string): ParseOutcome<number> {
		const outcome = parseDouble(text)
		return outcome.succeeded ? parsed(roundToFloat32(text, outcome.value)) : outcome
	},
}
