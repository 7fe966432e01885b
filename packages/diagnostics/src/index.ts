/**
 * @tokenscan/diagnostics
 *
 * Shared diagnostic types and definitions for tokenscan packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	TKSCLI001,
	TKSCLI002,
	TKSCLI003,
	TKSCLI004,
	TKSCLI005,
	TKSCLI006,
} from './cli.ts'
export { formatDiagnostic, interpolateMessage } from './interpolate.ts'
export {
	SCAN_DIAGNOSTICS,
	type ScanDiagnosticCode,
	TKSIO001,
	TKSLIMIT001,
	TKSPARSE001,
	TKSUTF001,
} from './scan.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	type DiagnosticStage,
} from './types.ts'
