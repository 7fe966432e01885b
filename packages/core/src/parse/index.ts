/**
 * Parse strategies: the text-to-value conversions a scan is directed by.
 */

import { f32, f64 } from './floats.ts'
import { bigInteger, i8, i16, i32, i64, isize, smallInteger, u8, u16, u32, u64, usize } from './integers.ts'
import { bool, char, string } from './text.ts'
import { failed, type ParseOutcome, type ParseStrategy, parsed } from './types.ts'

export { bigInteger, bool, char, f32, f64, i8, i16, i32, i64, isize, smallInteger, string, u8, u16, u32, u64, usize }
export {
	failed,
	ParseFailure,
	type ParseFailureKind,
	type ParseOutcome,
	type ParseStrategy,
	parsed,
} from './types.ts'

/**
 * Built-in strategies keyed by type name.
 */
export const strategies = {
	bool,
	char,
	f32,
	f64,
	i8,
	i16,
	i32,
	i64,
	isize,
	string,
	u8,
	u16,
	u32,
	u64,
	usize,
} as const

export type StrategyName = keyof typeof strategies

export type StrategyValue<N extends StrategyName> =
	(typeof strategies)[N] extends ParseStrategy<infer T> ? T : never

export function isStrategyName(name: string): name is StrategyName {
	return Object.hasOwn(strategies, name)
}

/**
 * Builds a strategy from a conversion that reports failure through its outcome.
 */
export function strategy<T>(name: string, parse: (text: string) => ParseOutcome<T>): ParseStrategy<T> {
	return { name, parse }
}

/**
 * Builds a strategy from a conversion that throws on bad input, e.g. `JSON.parse`
 * or a class constructor. The thrown value becomes the failure's cause.
 */
export function fromThrowing<T>(name: string, convert: (text: string) => T): ParseStrategy<T> {
	return {
		name,
		parse(text: string): ParseOutcome<T> {
			try {
				return parsed(convert(text))
			} catch (error: unknown) {
				const message = error instanceof Error ? error.message : String(error)
				return failed('invalid_value', message, error)
			}
		},
	}
}
