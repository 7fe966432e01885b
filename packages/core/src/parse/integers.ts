import { failed, type ParseOutcome, type ParseStrategy, parsed } from './types.ts'

const SIGNED_LITERAL = /^[+-]?[0-9]+$/
const UNSIGNED_LITERAL = /^\+?[0-9]+$/

/** Digit count below which a literal is exact as a double, so BigInt can be skipped. */
const SAFE_DIGITS = 15

interface IntegerRange<T> {
	readonly min: T
	readonly max: T
}

function checkLiteral(text: string, signed: boolean): ParseOutcome<never> | null {
	if (text.length === 0) return failed('empty', 'cannot parse integer from empty string')
	const pattern = signed ? SIGNED_LITERAL : UNSIGNED_LITERAL
	if (!pattern.test(text)) return failed('invalid_digit', 'invalid digit found in string')
	return null
}

function overflow<T>(negative: boolean): ParseOutcome<T> {
	return negative
		? failed('neg_overflow', 'number too small to fit in target type')
		: failed('pos_overflow', 'number too large to fit in target type')
}

/**
 * Integer type whose values fit in a double (32 bits or narrower).
 */
export function smallInteger(name: string, range: IntegerRange<number>): ParseStrategy<number> {
	const signed = range.min < 0
	return {
		name,
		parse(text: string): ParseOutcome<number> {
			const invalid = checkLiteral(text, signed)
			if (invalid !== null) return invalid
			const negative = text.startsWith('-')
			if (text.length > SAFE_DIGITS + 1) {
				const big = BigInt(text)
				if (big < BigInt(range.min) || big > BigInt(range.max)) return overflow(negative)
				return parsed(Number(big))
			}
			// `+ 0` folds -0 into 0
			const value = Number(text) + 0
			if (value < range.min || value > range.max) return overflow(negative)
			return parsed(value)
		},
	}
}

/**
 * 64-bit integer type, produced as a bigint.
 */
export function bigInteger(name: string, range: IntegerRange<bigint>): ParseStrategy<bigint> {
	const signed = range.min < 0n
	return {
		name,
		parse(text: string): ParseOutcome<bigint> {
			const invalid = checkLiteral(text, signed)
			if (invalid !== null) return invalid
			const value = BigInt(text)
			if (value < range.min || value > range.max) return overflow(text.startsWith('-'))
			return parsed(value)
		},
	}
}

export const i8 = smallInteger('i8', { max: 127, min: -128 })
export const i16 = smallInteger('i16', { max: 32767, min: -32768 })
export const i32 = smallInteger('i32', { max: 2147483647, min: -2147483648 })
export const u8 = smallInteger('u8', { max: 255, min: 0 })
export const u16 = smallInteger('u16', { max: 65535, min: 0 })
export const u32 = smallInteger('u32', { max: 4294967295, min: 0 })

const I64_RANGE: IntegerRange<bigint> = { max: 9223372036854775807n, min: -9223372036854775808n }
const U64_RANGE: IntegerRange<bigint> = { max: 18446744073709551615n, min: 0n }

export const i64 = bigInteger('i64', I64_RANGE)
export const u64 = bigInteger('u64', U64_RANGE)
// pointer-sized types follow a 64-bit target
export const isize = bigInteger('isize', I64_RANGE)
export const usize = bigInteger('usize', U64_RANGE)
