/**
 * Why a conversion from text failed.
 */
export type ParseFailureKind =
	| 'empty'
	| 'invalid_digit'
	| 'pos_overflow'
	| 'neg_overflow'
	| 'invalid_float'
	| 'invalid_bool'
	| 'invalid_char'
	| 'invalid_value'

/**
 * Type-specific failure produced by a parse strategy.
 */
export class ParseFailure extends Error {
	readonly kind: ParseFailureKind
	override readonly cause?: unknown

	constructor(kind: ParseFailureKind, message: string, cause?: unknown) {
		super(message, cause !== undefined ? { cause } : undefined)
		this.name = 'ParseFailure'
		this.kind = kind
		if (cause !== undefined) this.cause = cause
	}
}

export type ParseOutcome<T> =
	| { readonly succeeded: true; readonly value: T }
	| { readonly succeeded: false; readonly error: ParseFailure }

/**
 * Converts token text into a value of type T.
 */
export interface ParseStrategy<T> {
	/** Type name used in diagnostics, e.g. "i32". */
	readonly name: string
	parse(text: string): ParseOutcome<T>
}

export function parsed<T>(value: T): ParseOutcome<T> {
	return { succeeded: true, value }
}

export function failed<T>(kind: ParseFailureKind, message: string, cause?: unknown): ParseOutcome<T> {
	return { error: new ParseFailure(kind, message, cause), succeeded: false }
}
