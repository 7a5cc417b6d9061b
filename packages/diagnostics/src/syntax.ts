/**
 * Syntax diagnostic definitions.
 *
 * Error code format: NX<PHASE><NUMBER>
 * - NXLEX: Scanner errors (001-099)
 * - NXPARSE: Grammar errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// SCANNER ERRORS (NXLEX001-099)
// =============================================================================

export const NXLEX001: DiagnosticDef = {
	code: 'NXLEX001',
	description: 'These characters do not start any Nix token.',
	message: 'unrecognized input "{text}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the characters, or quote them inside a string.',
}

export const NXLEX002: DiagnosticDef = {
	code: 'NXLEX002',
	description: 'A double-quoted string was still open when the file ended.',
	message: 'unterminated string literal',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add a closing `"`.',
}

export const NXLEX003: DiagnosticDef = {
	code: 'NXLEX003',
	description: "An indented string (opened with '') was still open when the file ended.",
	message: 'unterminated indented string literal',
	severity: DiagnosticSeverity.Error,
	suggestion: "Add a closing `''`.",
}

export const NXLEX004: DiagnosticDef = {
	code: 'NXLEX004',
	description: 'A block comment was still open when the file ended.',
	message: 'unterminated block comment',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the comment with `*/`.',
}

export const NXLEX005: DiagnosticDef = {
	code: 'NXLEX005',
	description: 'An interpolation `${` was still open when the file ended.',
	message: 'unterminated interpolation',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the interpolation with `}`.',
}

export const NXLEX006: DiagnosticDef = {
	code: 'NXLEX006',
	description: 'This `}` does not close any `{` or `${` opened before it.',
	message: "unmatched '}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the brace, or add the `{` it was meant to close.',
}

// =============================================================================
// GRAMMAR ERRORS (NXPARSE001-099)
// =============================================================================

export const NXPARSE001: DiagnosticDef = {
	code: 'NXPARSE001',
	description: 'The parser found a token that cannot appear here.',
	message: 'unexpected {found}, expected {expected}',
	severity: DiagnosticSeverity.Error,
}

export const NXPARSE002: DiagnosticDef = {
	code: 'NXPARSE002',
	description: 'An expression is required at this position.',
	message: 'expected expression, found {found}',
	severity: DiagnosticSeverity.Error,
}

export const NXPARSE003: DiagnosticDef = {
	code: 'NXPARSE003',
	description: 'A token the construct requires is missing.',
	message: 'missing {expected}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Insert {expected} here.',
}

export const NXPARSE004: DiagnosticDef = {
	code: 'NXPARSE004',
	description: 'Comparison and equality operators cannot be chained.',
	message: "operator '{operator}' is not associative",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Add parentheses to group the comparison.',
}

export const NXPARSE005: DiagnosticDef = {
	code: 'NXPARSE005',
	description: 'Attribute paths are made of identifiers, strings and `${ }` interpolations.',
	message: 'expected attribute name, found {found}',
	severity: DiagnosticSeverity.Error,
}

export const NXPARSE006: DiagnosticDef = {
	code: 'NXPARSE006',
	description: 'A Nix file holds exactly one expression.',
	message: 'unexpected {found} after the end of the expression',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the trailing input, or combine it into the expression.',
}

export const NXPARSE007: DiagnosticDef = {
	code: 'NXPARSE007',
	description: 'A delimiter was opened but the file ended before it was closed.',
	message: "unclosed '{open}'",
	severity: DiagnosticSeverity.Error,
	suggestion: "Add the matching '{close}'.",
}

export const NXPARSE008: DiagnosticDef = {
	code: 'NXPARSE008',
	description: 'Expressions nested this deeply are not parsed; the rest of the file is kept as-is.',
	message: 'expression nested more than {limit} levels deep',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Split the expression with `let` bindings.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const SYNTAX_DIAGNOSTICS = {
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
} as const

export type SyntaxDiagnosticCode = keyof typeof SYNTAX_DIAGNOSTICS
