import {
	type InputStream,
	type ParseStrategy,
	type ScanError,
	strategies,
} from '@tokenscan/core'
import type { FloatTypeName, FoldOperation, IntegerTypeName } from './utils.ts'

export interface TallyResult {
	count: number
	/** Failure that stopped the scan before the end of input, if any. */
	stoppedBy: ScanError | null
}

export interface FoldResult<T> extends TallyResult {
	total: T
}

/**
 * Counts tokens that parse with `parser`, stopping at the end of input or the first failure.
 */
export function countTokens<T>(stream: InputStream, parser: ParseStrategy<T>, limit?: number): TallyResult {
	let count = 0
	for (const _ of stream.values(parser, limit)) {
		count++
	}
	return { count, stoppedBy: stream.lastError }
}

function toBigInt(value: number | bigint): bigint {
	return typeof value === 'bigint' ? value : BigInt(value)
}

/**
 * Folds integer tokens exactly, by addition or by XOR.
 */
export function foldIntegers(
	stream: InputStream,
	type: IntegerTypeName,
	operation: FoldOperation,
	limit?: number
): FoldResult<bigint> {
	const parser: ParseStrategy<number | bigint> = strategies[type]
	let count = 0
	let total = 0n
	for (const value of stream.values(parser, limit)) {
		const next = toBigInt(value)
		total = operation === 'xor' ? total ^ next : total + next
		count++
	}
	return { count, stoppedBy: stream.lastError, total }
}

/**
 * Sums float tokens as doubles.
 */
export function sumFloats(stream: InputStream, type: FloatTypeName, limit?: number): FoldResult<number> {
	let count = 0
	let total = 0
	for (const value of stream.values(strategies[type], limit)) {
		total += value
		count++
	}
	return { count, stoppedBy: stream.lastError, total }
}
