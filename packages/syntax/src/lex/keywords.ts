import { TokenKind } from '../core/tokens.ts'

/**
 * The fixed keyword table. The scanner never consults it: keywords leave the
 * scanner as plain identifiers and the grammar engine re-tags them where
 * their position makes them keywords.
 */
export const KEYWORDS: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['assert', TokenKind.Assert],
	['else', TokenKind.Else],
	['if', TokenKind.If],
	['in', TokenKind.In],
	['inherit', TokenKind.Inherit],
	['let', TokenKind.Let],
	['or', TokenKind.Or],
	['rec', TokenKind.Rec],
	['then', TokenKind.Then],
	['with', TokenKind.With],
])

export function keywordKind(text: string): TokenKind | undefined {
	return KEYWORDS.get(text)
}

export function isKeyword(text: string): boolean {
	return KEYWORDS.has(text)
}
