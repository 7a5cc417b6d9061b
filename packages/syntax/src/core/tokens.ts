/**
 * Token storage using dense arrays with integer IDs.
 * Every token of the source, trivia included, lives in one flat store in
 * source order, so concatenating their text reproduces the input.
 */

/**
 * Token kinds - small integer discriminant.
 *
 * - 0-9: trivia
 * - 20-39: string and interpolation parts
 * - 40-59: keywords (only ever produced by contextual re-tagging)
 * - 60-99: punctuation and operators
 * - 100-149: identifiers and literals
 * - 254-255: special
 */
export const TokenKind = {
	And: 80,
	Assert: 43,
	Assign: 73,
	At: 71,
	BlockComment: 2,
	Colon: 67,
	Comma: 68,
	Concat: 79,
	Dot: 69,
	Ellipsis: 70,
	Else: 42,
	Eof: 255,
	Equal: 84,
	Float: 102,
	Greater: 88,
	GreaterEqual: 89,
	Identifier: 100,
	If: 40,
	Implication: 82,
	In: 46,
	IndentedStringEnd: 25,
	IndentedStringEscape: 27,
	IndentedStringFragment: 26,
	IndentedStringStart: 24,
	Inherit: 48,
	Integer: 101,
	InterpolationEnd: 29,
	InterpolationStart: 28,
	LBrace: 60,
	LBracket: 62,
	Less: 86,
	LessEqual: 87,
	Let: 45,
	LineComment: 1,
	LParen: 64,
	Minus: 75,
	Not: 83,
	NotEqual: 85,
	Or: 49,
	OrOr: 81,
	Path: 103,
	Plus: 74,
	Question: 72,
	RBrace: 61,
	RBracket: 63,
	Rec: 47,
	RParen: 65,
	SearchPath: 104,
	Semicolon: 66,
	Slash: 77,
	Star: 76,
	StringEnd: 21,
	StringEscape: 23,
	StringFragment: 22,
	StringStart: 20,
	Then: 41,
	Unknown: 254,
	Update: 78,
	Uri: 105,
	Whitespace: 0,
	With: 44,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

const TOKEN_KIND_NAMES: ReadonlyMap<TokenKind, string> = new Map(
	Object.entries(TokenKind).map(([name, kind]): [TokenKind, string] => [kind, name])
)

/** Name of a token kind, as written in `TokenKind`. */
export function tokenKindName(kind: TokenKind): string {
	return TOKEN_KIND_NAMES.get(kind) ?? `Token(${kind})`
}

const FIXED_SPELLINGS: Partial<Record<TokenKind, string>> = {
	[TokenKind.And]: '&&',
	[TokenKind.Assert]: 'assert',
	[TokenKind.Assign]: '=',
	[TokenKind.At]: '@',
	[TokenKind.Colon]: ':',
	[TokenKind.Comma]: ',',
	[TokenKind.Concat]: '++',
	[TokenKind.Dot]: '.',
	[TokenKind.Ellipsis]: '...',
	[TokenKind.Else]: 'else',
	[TokenKind.Equal]: '==',
	[TokenKind.Greater]: '>',
	[TokenKind.GreaterEqual]: '>=',
	[TokenKind.If]: 'if',
	[TokenKind.Implication]: '->',
	[TokenKind.In]: 'in',
	[TokenKind.IndentedStringEnd]: "''",
	[TokenKind.IndentedStringStart]: "''",
	[TokenKind.Inherit]: 'inherit',
	[TokenKind.InterpolationEnd]: '}',
	[TokenKind.InterpolationStart]: '${',
	[TokenKind.LBrace]: '{',
	[TokenKind.LBracket]: '[',
	[TokenKind.Less]: '<',
	[TokenKind.LessEqual]: '<=',
	[TokenKind.Let]: 'let',
	[TokenKind.LParen]: '(',
	[TokenKind.Minus]: '-',
	[TokenKind.Not]: '!',
	[TokenKind.NotEqual]: '!=',
	[TokenKind.Or]: 'or',
	[TokenKind.OrOr]: '||',
	[TokenKind.Plus]: '+',
	[TokenKind.Question]: '?',
	[TokenKind.RBrace]: '}',
	[TokenKind.RBracket]: ']',
	[TokenKind.Rec]: 'rec',
	[TokenKind.RParen]: ')',
	[TokenKind.Semicolon]: ';',
	[TokenKind.Slash]: '/',
	[TokenKind.Star]: '*',
	[TokenKind.StringEnd]: '"',
	[TokenKind.StringStart]: '"',
	[TokenKind.Then]: 'then',
	[TokenKind.Update]: '//',
	[TokenKind.With]: 'with',
}

const CATEGORY_NAMES: Partial<Record<TokenKind, string>> = {
	[TokenKind.BlockComment]: 'comment',
	[TokenKind.Eof]: 'end of input',
	[TokenKind.Float]: 'float',
	[TokenKind.Identifier]: 'identifier',
	[TokenKind.IndentedStringEscape]: 'string escape',
	[TokenKind.IndentedStringFragment]: 'string text',
	[TokenKind.Integer]: 'integer',
	[TokenKind.LineComment]: 'comment',
	[TokenKind.Path]: 'path',
	[TokenKind.SearchPath]: 'search path',
	[TokenKind.StringEscape]: 'string escape',
	[TokenKind.StringFragment]: 'string text',
	[TokenKind.Unknown]: 'unrecognized input',
	[TokenKind.Uri]: 'URI',
	[TokenKind.Whitespace]: 'whitespace',
}

/**
 * Human-readable description of a token kind for diagnostics:
 * punctuation and keywords are quoted, categories are spelled out.
 */
export function describeTokenKind(kind: TokenKind): string {
	const spelling = FIXED_SPELLINGS[kind]
	if (spelling !== undefined) return `'${spelling}'`
	return CATEGORY_NAMES[kind] ?? tokenKindName(kind)
}

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * Source span in UTF-16 code units, `end` exclusive.
 */
export interface Span {
	readonly start: number
	readonly end: number
}

/**
 * A single token. Immutable once produced.
 * `text` is the exact source slice `[start, end)`; synthetic closing
 * tokens emitted at end of input are zero-width with empty text.
 */
export interface Token extends Span {
	readonly kind: TokenKind
	readonly text: string
}

/**
 * Dense array storage for tokens.
 * Append-only while the scanner is being pulled.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}

	toArray(): readonly Token[] {
		return this.tokens
	}
}
