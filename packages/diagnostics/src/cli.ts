/**
 * CLI diagnostic definitions.
 *
 * Error code format: TKSCLI<NUMBER>
 * - TKSCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TKSCLI001-099)
// =============================================================================

export const TKSCLI001: DiagnosticDef = {
	code: 'TKSCLI001',
	description: "tokenscan couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	stage: 'cli',
	suggestion: 'Double-check the path, or leave it out to read from stdin.',
}

export const TKSCLI002: DiagnosticDef = {
	code: 'TKSCLI002',
	description: "The file exists but tokenscan can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'cli',
	suggestion: 'Check that you have read permission for this file.',
}

export const TKSCLI003: DiagnosticDef = {
	code: 'TKSCLI003',
	description: "tokenscan doesn't know how to parse tokens as this type.",
	message: 'unknown type "{type}"',
	severity: DiagnosticSeverity.Error,
	stage: 'cli',
	suggestion: 'Use one of: {types}.',
}

export const TKSCLI004: DiagnosticDef = {
	code: 'TKSCLI004',
	description: 'Byte counts must be whole numbers, and a read buffer needs at least one byte.',
	message: 'invalid byte count "{value}"',
	severity: DiagnosticSeverity.Error,
	stage: 'cli',
	suggestion: 'Pass a byte count such as `--limit 32` or `--capacity 65536`.',
}

export const TKSCLI005: DiagnosticDef = {
	code: 'TKSCLI005',
	description: 'Only numeric types can be summed, and only integer types can be combined with XOR.',
	message: 'cannot {operation} tokens of type {type}',
	severity: DiagnosticSeverity.Error,
	stage: 'cli',
	suggestion: 'Pick an integer type such as i32, or a float type without --xor.',
}

export const TKSCLI006: DiagnosticDef = {
	code: 'TKSCLI006',
	description: 'Scanning stopped on a token that could not be read before the end of the input.',
	message: 'scan stopped after {count} tokens: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'cli',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TKSCLI001,
	TKSCLI002,
	TKSCLI003,
	TKSCLI004,
	TKSCLI005,
	TKSCLI006,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
