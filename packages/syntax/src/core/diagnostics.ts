/**
 * Diagnostic types, the syntax catalog re-exported from the shared package,
 * and the collector every parse appends to.
 */

import {
	type DiagnosticArgs,
	type DiagnosticDef,
	SYNTAX_DIAGNOSTICS,
	type SyntaxDiagnosticCode,
} from '@nixtree/diagnostics'
import type { Span } from './tokens.ts'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
	NXLEX001,
	NXLEX002,
	NXLEX003,
	NXLEX004,
	NXLEX005,
	NXLEX006,
	NXPARSE001,
	NXPARSE002,
	NXPARSE003,
	NXPARSE004,
	NXPARSE005,
	NXPARSE006,
	NXPARSE007,
	NXPARSE008,
	SYNTAX_DIAGNOSTICS,
} from '@nixtree/diagnostics'

/**
 * All diagnostic codes the syntax core can emit.
 */
export type DiagnosticCode = SyntaxDiagnosticCode

export function getDiagnostic(code: DiagnosticCode): DiagnosticDef {
	return SYNTAX_DIAGNOSTICS[code]
}

export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in SYNTAX_DIAGNOSTICS
}

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	readonly span: Span
	/** Line number of `span.start` (1-indexed) */
	readonly line: number
	/** Column number of `span.start` (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/**
 * Ordered, append-only accumulation of diagnostics.
 * Identical (span, message) pairs are kept once.
 */
export class DiagnosticCollector {
	private readonly diagnostics: Diagnostic[] = []
	private readonly seen = new Set<string>()

	add(diagnostic: Diagnostic): boolean {
		const key = `${diagnostic.span.start}:${diagnostic.span.end}:${diagnostic.message}`
		if (this.seen.has(key)) return false
		this.seen.add(key)
		this.diagnostics.push(diagnostic)
		return true
	}

	count(): number {
		return this.diagnostics.length
	}

	/** True when a diagnostic with `code` covers exactly `span`. */
	has(code: string, span: Span): boolean {
		return this.diagnostics.some(
			(d) => d.def.code === code && d.span.start === span.start && d.span.end === span.end
		)
	}

	/** Diagnostics sorted by start offset; ties keep insertion order. */
	finish(): readonly Diagnostic[] {
		return [...this.diagnostics].sort((a, b) => a.span.start - b.span.start)
	}
}
