/**
 * Error recovery table: for each parsing context, the tokens where skipping
 * stops. `stopBefore` tokens are left for the enclosing rule; `stopAfter`
 * tokens are swallowed into the error node and end the skip.
 *
 * A recovery step always consumes the offending token first (unless at end
 * of input), so every step makes progress.
 */

import { TokenKind } from '../core/tokens.ts'

export const RecoveryContext = {
	BindingList: 'binding-list',
	Expression: 'expression',
	InheritList: 'inherit-list',
	Interpolation: 'interpolation',
	List: 'list',
	Pattern: 'pattern',
	TopLevel: 'top-level',
} as const

export type RecoveryContext = (typeof RecoveryContext)[keyof typeof RecoveryContext]

export interface RecoveryRule {
	/** Describes what the context expected, for the diagnostic */
	readonly expected: string
	readonly stopBefore: ReadonlySet<TokenKind>
	readonly stopAfter: ReadonlySet<TokenKind>
}

const CLOSERS = [
	TokenKind.Semicolon,
	TokenKind.RBrace,
	TokenKind.RParen,
	TokenKind.RBracket,
	TokenKind.In,
	TokenKind.InterpolationEnd,
	TokenKind.Eof,
] as const

const ATOM_STARTS = [
	TokenKind.Identifier,
	TokenKind.Integer,
	TokenKind.Float,
	TokenKind.Path,
	TokenKind.SearchPath,
	TokenKind.Uri,
	TokenKind.StringStart,
	TokenKind.IndentedStringStart,
	TokenKind.LParen,
	TokenKind.LBracket,
	TokenKind.LBrace,
	TokenKind.Rec,
] as const

const ATOM_START_SET: ReadonlySet<TokenKind> = new Set<TokenKind>(ATOM_STARTS)

const CLOSER_SET: ReadonlySet<TokenKind> = new Set<TokenKind>(CLOSERS)

const NONE: ReadonlySet<TokenKind> = new Set<TokenKind>()

export const RECOVERY: Readonly<Record<RecoveryContext, RecoveryRule>> = {
	[RecoveryContext.BindingList]: {
		expected: "binding or '}'",
		stopAfter: new Set<TokenKind>([TokenKind.Semicolon]),
		stopBefore: new Set<TokenKind>([
			TokenKind.Identifier,
			TokenKind.Inherit,
			TokenKind.Or,
			TokenKind.StringStart,
			TokenKind.InterpolationStart,
			TokenKind.RBrace,
			TokenKind.In,
			TokenKind.InterpolationEnd,
			TokenKind.Eof,
		]),
	},
	[RecoveryContext.Expression]: {
		expected: 'expression',
		stopAfter: NONE,
		stopBefore: new Set<TokenKind>([...CLOSERS, TokenKind.Then, TokenKind.Else, TokenKind.Comma]),
	},
	[RecoveryContext.InheritList]: {
		expected: "attribute name or ';'",
		stopAfter: NONE,
		stopBefore: new Set<TokenKind>([
			TokenKind.Identifier,
			TokenKind.Or,
			TokenKind.StringStart,
			TokenKind.InterpolationStart,
			...CLOSERS,
		]),
	},
	[RecoveryContext.Interpolation]: {
		expected: "'}'",
		stopAfter: new Set<TokenKind>([TokenKind.InterpolationEnd]),
		stopBefore: new Set<TokenKind>([TokenKind.Eof]),
	},
	[RecoveryContext.List]: {
		expected: "list element or ']'",
		stopAfter: NONE,
		stopBefore: new Set<TokenKind>([...ATOM_STARTS, ...CLOSERS]),
	},
	[RecoveryContext.Pattern]: {
		expected: "parameter name, '...' or '}'",
		stopAfter: NONE,
		stopBefore: new Set<TokenKind>([
			TokenKind.Identifier,
			TokenKind.Ellipsis,
			TokenKind.Comma,
			TokenKind.RBrace,
			TokenKind.Colon,
			TokenKind.InterpolationEnd,
			TokenKind.Eof,
		]),
	},
	[RecoveryContext.TopLevel]: {
		expected: 'end of input',
		stopAfter: NONE,
		stopBefore: new Set<TokenKind>([TokenKind.Eof]),
	},
}

/** Tokens that close a list, set, parenthesis, binding or interpolation. */
export function isCloser(kind: TokenKind): boolean {
	return CLOSER_SET.has(kind)
}

/** Tokens that end the surrounding construct; an expression missing here is zero-width. */
export function isExpressionBoundary(kind: TokenKind): boolean {
	return RECOVERY[RecoveryContext.Expression].stopBefore.has(kind)
}

export function isAtomStart(kind: TokenKind): boolean {
	return ATOM_START_SET.has(kind)
}
