/**
 * Trivia classification: whitespace and comments are kept in the token
 * stream but never reach the grammar engine. Each run of trivia belongs to
 * the significant token that follows it.
 */

import { type Token, TokenKind } from '../core/tokens.ts'

export const TRIVIA_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
	TokenKind.BlockComment,
	TokenKind.LineComment,
	TokenKind.Whitespace,
])

export function isTrivia(kind: TokenKind): boolean {
	return TRIVIA_KINDS.has(kind)
}

export function isComment(kind: TokenKind): boolean {
	return kind === TokenKind.LineComment || kind === TokenKind.BlockComment
}

/**
 * For every token, the index where its leading trivia begins.
 * Trivia tokens point at themselves; a significant token points at the
 * first trivia token of the run directly before it (or at itself).
 */
export function leadingTriviaStarts(tokens: readonly Token[]): Int32Array {
	const starts = new Int32Array(tokens.length)
	let runStart = 0
	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i]
		if (token !== undefined && isTrivia(token.kind)) {
			starts[i] = i
			continue
		}
		starts[i] = runStart
		runStart = i + 1
	}
	return starts
}

/**
 * Comment text without its delimiters.
 */
export function commentBody(token: Token): string {
	if (token.kind === TokenKind.LineComment) return token.text.slice(1)
	if (token.kind === TokenKind.BlockComment) {
		const closed = token.text.endsWith('*/') && token.text.length >= 4
		return token.text.slice(2, closed ? -2 : undefined)
	}
	return ''
}

/** True when a whitespace token spans at least one line break. */
export function containsNewline(token: Token): boolean {
	return token.kind === TokenKind.Whitespace && token.text.includes('\n')
}
