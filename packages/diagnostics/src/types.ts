/**
 * Diagnostic severity. Every diagnostic in the catalog is an error; the
 * value doubles as the label in formatted output.
 */
export const DiagnosticSeverity = {
	Error: 'error',
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	/** Template with `{name}` placeholders */
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Readonly<Record<string, string | number>>
