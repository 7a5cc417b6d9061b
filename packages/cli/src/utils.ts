import { interpolateMessage, NXCLI001, NXCLI002, NXCLI003 } from '@nixtree/diagnostics'
import {
	type Diagnostic,
	type DiagnosticSeverity,
	debugTree,
	type ParseSourceResult,
	type SyntaxTree,
	tokenKindName,
} from '@nixtree/syntax'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(NXCLI001.message, { path: filePath })
		return `[${NXCLI001.code}] ${message}`
	}
	const message = interpolateMessage(NXCLI002.message, { reason: getErrorMessage(error) })
	return `[${NXCLI002.code}] ${message}`
}

export function formatSyntaxSummary(filePath: string, count: number): string {
	const message = interpolateMessage(NXCLI003.message, { count, path: filePath })
	return `[${NXCLI003.code}] ${message}`
}

/**
 * One line per token, trivia included: `Kind@start..end "text"`.
 * Keywords used as names are shown as identifiers.
 */
export function formatTokenLines(tree: SyntaxTree): string[] {
	const lines: string[] = []
	for (const token of tree.classifiedTokens()) {
		const text = JSON.stringify(tree.source.slice(token.start, token.end))
		lines.push(`${tokenKindName(token.kind)}@${token.start}..${token.end} ${text}`)
	}
	return lines
}

export interface JsonDiagnostic {
	code: string
	severity: DiagnosticSeverity
	message: string
	line: number
	column: number
	start: number
	end: number
}

export interface JsonToken {
	kind: string
	start: number
	end: number
	trivia: boolean
}

export interface JsonReport {
	file: string
	ok: boolean
	diagnostics: JsonDiagnostic[]
	tokens?: JsonToken[]
	tree?: string
}

export interface ReportOptions {
	tokens: boolean
	tree: boolean
}

function toJsonDiagnostic(diagnostic: Diagnostic): JsonDiagnostic {
	return {
		code: diagnostic.def.code,
		column: diagnostic.column,
		end: diagnostic.span.end,
		line: diagnostic.line,
		message: diagnostic.message,
		severity: diagnostic.def.severity,
		start: diagnostic.span.start,
	}
}

export function buildJsonReport(
	filePath: string,
	result: ParseSourceResult,
	options: ReportOptions
): JsonReport {
	const report: JsonReport = {
		diagnostics: result.diagnostics.map(toJsonDiagnostic),
		file: filePath,
		ok: result.diagnostics.length === 0,
	}
	if (options.tokens) {
		report.tokens = [...result.tree.classifiedTokens()].map((token) => ({
			end: token.end,
			kind: tokenKindName(token.kind),
			start: token.start,
			trivia: token.trivia,
		}))
	}
	if (options.tree) {
		report.tree = debugTree(result.tree)
	}
	return report
}
