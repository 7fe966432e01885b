import { describeError, FdSource, isStrategyName, type ScanError, type StrategyName, strategies } from '@tokenscan/core'
import {
	formatDiagnostic,
	interpolateMessage,
	TKSCLI001,
	TKSCLI002,
	TKSCLI003,
	TKSCLI004,
	TKSCLI005,
	TKSCLI006,
} from '@tokenscan/diagnostics'

const STDIN_FD = 0

export type FoldOperation = 'sum' | 'xor'

export type IntegerTypeName = 'i8' | 'i16' | 'i32' | 'i64' | 'isize' | 'u8' | 'u16' | 'u32' | 'u64' | 'usize'
export type FloatTypeName = 'f32' | 'f64'

const INTEGER_TYPES: ReadonlySet<string> = new Set<IntegerTypeName>([
	'i8',
	'i16',
	'i32',
	'i64',
	'isize',
	'u8',
	'u16',
	'u32',
	'u64',
	'usize',
])

const FLOAT_TYPES: ReadonlySet<string> = new Set<FloatTypeName>(['f32', 'f64'])

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function isIntegerType(name: string): name is IntegerTypeName {
	return INTEGER_TYPES.has(name)
}

export function isFloatType(name: string): name is FloatTypeName {
	return FLOAT_TYPES.has(name)
}

/**
 * Opens `file` for scanning, or stdin when no file is given.
 */
export function openInput(file: string | undefined, capacity?: number): FdSource {
	const options = capacity === undefined ? {} : { capacity }
	return file === undefined ? new FdSource(STDIN_FD, options) : FdSource.open(file, options)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnostic(TKSCLI001, { path: filePath })
	}
	return formatDiagnostic(TKSCLI002, { reason: describeError(error) })
}

export function formatUnknownTypeError(type: string): string {
	return formatDiagnostic(TKSCLI003, { type })
}

export function formatTypeSuggestion(): string {
	return interpolateMessage(TKSCLI003.suggestion ?? '', { types: Object.keys(strategies).join(', ') })
}

export function formatInvalidByteCountError(value: string): string {
	return formatDiagnostic(TKSCLI004, { value })
}

export function formatFoldTypeError(operation: FoldOperation, type: string): string {
	return formatDiagnostic(TKSCLI005, { operation, type })
}

export function formatScanStop(count: number, error: ScanError): string {
	return formatDiagnostic(TKSCLI006, { count, reason: error.message })
}

export interface ScanStopReport {
	exitCode: 1
	message: string
}

/**
 * Decides how a scan loop ended. Reaching the end of input is a clean finish (null);
 * any other stop is reported and fails the command.
 */
export function reportScanStop(count: number, stoppedBy: ScanError | null): ScanStopReport | null {
	if (stoppedBy === null) return null
	return { exitCode: 1, message: formatScanStop(count, stoppedBy) }
}

export function resolveStrategyName(type: string): StrategyName | null {
	return isStrategyName(type) ? type : null
}

/**
 * Parses a byte-count flag. Undefined means no flag was given.
 * Returns null for anything but a non-negative integer.
 */
export function parseByteCount(value: string | undefined): number | undefined | null {
	if (value === undefined) return undefined
	if (!/^[0-9]+$/.test(value)) return null
	const parsed = Number(value)
	return Number.isSafeInteger(parsed) ? parsed : null
}
