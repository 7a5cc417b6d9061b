/**
 * Per-parse context shared by the scanner, grammar engine and tree builder.
 * Owns the token store and the diagnostics collector; nothing in it is
 * shared between parses.
 */

import {
	type Diagnostic,
	type DiagnosticArgs,
	DiagnosticCollector,
	type DiagnosticCode,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { LineIndex } from './lines.ts'
import { type Span, TokenStore } from './tokens.ts'

export type { Diagnostic } from './diagnostics.ts'
export { DiagnosticSeverity } from './diagnostics.ts'

/**
 * The unified parse context.
 *
 * - Append-only: the scanner adds tokens, every phase adds diagnostics
 * - Centralized diagnostics: all errors collected in one place
 */
export class ParseContext {
	/** Original source text */
	readonly source: string

	/** Source filename for formatted diagnostics */
	readonly filename: string

	/** Every token of the source, trivia included (populated by the scanner) */
	readonly tokens: TokenStore

	readonly lines: LineIndex

	private readonly collector = new DiagnosticCollector()

	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.tokens = new TokenStore()
		this.lines = new LineIndex(source)
	}

	/**
	 * Emit a diagnostic by code over a source span.
	 */
	emit(code: DiagnosticCode, span: Span, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		const { line, column } = this.lines.position(span.start)
		const added = this.collector.add({
			column,
			def,
			line,
			message,
			span: { end: span.end, start: span.start },
			...(args ? { args } : {}),
		})
		if (added) this.errorCount++
	}

	hasDiagnostic(code: DiagnosticCode, span: Span): boolean {
		return this.collector.has(code, span)
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	/** Diagnostics in source order. */
	getDiagnostics(): readonly Diagnostic[] {
		return this.collector.finish()
	}

	// ===========================================================================
	// FORMATTING
	// ===========================================================================

	private underlineWidth(diagnostic: Diagnostic, sourceLine: string): number {
		const available = sourceLine.length - (diagnostic.column - 1)
		const width = Math.min(diagnostic.span.end - diagnostic.span.start, available)
		return Math.max(1, width)
	}

	private buildSourceContext(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const underline = '^'.repeat(this.underlineWidth(diagnostic, sourceLine))
		const pointer = `${' '.repeat(diagnostic.column - 1)}${underline}`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[NXPARSE003]: missing ';'
	 *   --> default.nix:3:10
	 *    |
	 *  3 |   a = 1
	 *    |        ^
	 *    |
	 *    = help: Insert ';' here.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${def.severity}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.lines.lineText(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: contextLines } = this.buildSourceContext(diagnostic, sourceLine)
		const lines = [header, location, ...contextLines]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.getDiagnostics()
			.map((d) => this.formatDiagnostic(d))
			.join('\n\n')
	}
}
