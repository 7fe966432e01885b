/**
 * Scan engine diagnostic definitions.
 *
 * Error code format: TKS<STAGE><NUMBER>
 * - TKSIO: source failures (001-099)
 * - TKSUTF: text decoding failures (001-099)
 * - TKSPARSE: conversion failures (001-099)
 * - TKSLIMIT: token size limit (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// SOURCE ERRORS (TKSIO001-099)
// =============================================================================

export const TKSIO001: DiagnosticDef = {
	code: 'TKSIO001',
	description: 'The input source reported an error while more bytes were being fetched.',
	message: 'failed to read from source: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'io',
	suggestion: 'Check that the file or pipe is still readable.',
}

// =============================================================================
// DECODE ERRORS (TKSUTF001-099)
// =============================================================================

export const TKSUTF001: DiagnosticDef = {
	code: 'TKSUTF001',
	description: 'The bytes of this token do not form valid UTF-8 text.',
	message: 'token is not valid UTF-8 ({length} bytes)',
	severity: DiagnosticSeverity.Error,
	stage: 'decode',
	suggestion: 'Make sure the input is UTF-8 encoded.',
}

// =============================================================================
// PARSE ERRORS (TKSPARSE001-099)
// =============================================================================

export const TKSPARSE001: DiagnosticDef = {
	code: 'TKSPARSE001',
	description: 'The token is valid text but is not a literal of the requested type.',
	message: 'cannot parse "{token}" as {type}: {reason}',
	severity: DiagnosticSeverity.Error,
	stage: 'parse',
	suggestion: 'Scan the token with a different type, or fix the input.',
}

// =============================================================================
// LIMIT ERRORS (TKSLIMIT001-099)
// =============================================================================

export const TKSLIMIT001: DiagnosticDef = {
	code: 'TKSLIMIT001',
	description: 'The token grew past the byte limit given for this scan.',
	message: 'token exceeds buffer limit: {length} bytes, limit is {limit}',
	severity: DiagnosticSeverity.Error,
	stage: 'limit',
	suggestion: 'Raise the limit. Bytes already read for this token stay consumed.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all scan diagnostics.
 */
export const SCAN_DIAGNOSTICS = {
	TKSIO001,
	TKSLIMIT001,
	TKSPARSE001,
	TKSUTF001,
} as const

/**
 * All valid scan diagnostic codes.
 */
export type ScanDiagnosticCode = keyof typeof SCAN_DIAGNOSTICS
