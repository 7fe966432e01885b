import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fills `{name}` placeholders from `args`. Placeholders without an own
 * property in `args` are left as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(PLACEHOLDER, (placeholder, key: string) =>
		Object.hasOwn(args, key) ? String(args[key]) : placeholder
	)
}

/**
 * Renders a diagnostic as `[CODE] message`.
 */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
