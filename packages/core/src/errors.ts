import {
	type DiagnosticArgs,
	formatDiagnostic,
	SCAN_DIAGNOSTICS,
	type ScanDiagnosticCode,
} from '@tokenscan/diagnostics'
import type { ParseFailure } from './parse/types.ts'

/**
 * The closed set of scan failure kinds.
 * - Io: the source failed to produce bytes (interruptions are retried, never reported)
 * - Utf8: the token bytes are not valid UTF-8
 * - Parse: the text is not a literal of the requested type
 * - BufferLimitExceeded: the token grew past the per-call byte limit
 */
export const ScanErrorKind = {
	BufferLimitExceeded: 'BufferLimitExceeded',
	Io: 'Io',
	Parse: 'Parse',
	Utf8: 'Utf8',
} as const

export type ScanErrorKind = (typeof ScanErrorKind)[keyof typeof ScanErrorKind]

interface ScanErrorInit {
	kind: ScanErrorKind
	code: ScanDiagnosticCode
	args: DiagnosticArgs
	cause?: unknown
	limit?: number
	length?: number
}

/**
 * Error returned by a failed scan.
 */
export class ScanError extends Error {
	readonly kind: ScanErrorKind
	readonly code: ScanDiagnosticCode
	override readonly cause?: unknown
	/** Configured byte limit (BufferLimitExceeded only). */
	readonly limit?: number
	/** Token length the append would have reached (BufferLimitExceeded only). */
	readonly length?: number

	constructor(init: ScanErrorInit) {
		const message = formatDiagnostic(SCAN_DIAGNOSTICS[init.code], init.args)
		super(message, init.cause !== undefined ? { cause: init.cause } : undefined)
		this.name = 'ScanError'
		this.kind = init.kind
		this.code = init.code
		if (init.cause !== undefined) this.cause = init.cause
		if (init.limit !== undefined) this.limit = init.limit
		if (init.length !== undefined) this.length = init.length
	}
}

export function isScanError(error: unknown): error is ScanError {
	return error instanceof ScanError
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function ioError(cause: unknown): ScanError {
	return new ScanError({
		args: { reason: describeError(cause) },
		cause,
		code: 'TKSIO001',
		kind: ScanErrorKind.Io,
	})
}

export function utf8Error(length: number, cause: unknown): ScanError {
	return new ScanError({
		args: { length },
		cause,
		code: 'TKSUTF001',
		kind: ScanErrorKind.Utf8,
	})
}

const TOKEN_PREVIEW_LENGTH = 32

function previewToken(text: string): string {
	const escaped = text.replace(/"/g, '\\"')
	return escaped.length > TOKEN_PREVIEW_LENGTH
		? `${escaped.slice(0, TOKEN_PREVIEW_LENGTH)}...`
		: escaped
}

export function parseError(text: string, typeName: string, failure: ParseFailure): ScanError {
	return new ScanError({
		args: { reason: failure.message, token: previewToken(text), type: typeName },
		cause: failure,
		code: 'TKSPARSE001',
		kind: ScanErrorKind.Parse,
	})
}

export function limitExceededError(limit: number, length: number): ScanError {
	return new ScanError({
		args: { length, limit },
		code: 'TKSLIMIT001',
		kind: ScanErrorKind.BufferLimitExceeded,
		length,
		limit,
	})
}

/**
 * Outcome of a single scan: the parsed value, or the error that ended it.
 */
export type ScanResult<T> =
	| { readonly succeeded: true; readonly value: T }
	| { readonly succeeded: false; readonly error: ScanError }
