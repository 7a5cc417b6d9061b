/**
 * Token cursor between the scanner and the grammar engine.
 *
 * Tokens are pulled from the scanner on demand and appended to the
 * context's token store, trivia included. The grammar only sees
 * significant tokens, through a lookahead window of at most
 * `MAX_LOOKAHEAD` tokens.
 */

import type { ParseContext } from '../core/context.ts'
import { type Token, type TokenId, TokenKind, tokenId } from '../core/tokens.ts'
import { isTrivia } from '../lex/trivia.ts'
import { Scanner } from '../lex/scanner.ts'

/** Deepest lookahead the grammar uses (`{ a }:` needs the fourth token). */
export const MAX_LOOKAHEAD = 4

export interface LookaheadToken {
	readonly id: TokenId
	readonly token: Token
}

export interface TokenSource {
	/** Next token, trivia included; `Eof` forever once exhausted. */
	next(): Token
	/** Store id of the token most recently returned by `next` */
	lastId(): TokenId
}

/**
 * Scans while parsing, appending into `context.tokens`.
 */
export function scannerSource(context: ParseContext): TokenSource {
	const scanner = new Scanner(context.source, (code, span, args) => context.emit(code, span, args))
	let last = tokenId(-1)
	let done = false
	return {
		lastId: () => last,
		next(): Token {
			if (done) return context.tokens.get(last)
			const token = scanner.next()
			last = context.tokens.add(token)
			if (token.kind === TokenKind.Eof) done = true
			return token
		},
	}
}

/**
 * Replays a token store that was already filled by `tokenize`.
 */
export function storeSource(context: ParseContext): TokenSource {
	const { tokens } = context
	let position = -1
	return {
		lastId: () => tokenId(position),
		next(): Token {
			if (position < tokens.count() - 1) position++
			const token = tokens.get(tokenId(position))
			return token
		},
	}
}

export class TokenCursor {
	private readonly window: LookaheadToken[] = []
	private lastConsumed: LookaheadToken | null = null

	constructor(private readonly source: TokenSource) {}

	/** The n-th significant token ahead (0 = current). */
	nth(n: number): Token {
		return this.peek(n).token
	}

	/** Store id of the n-th significant token ahead. */
	nthId(n: number): TokenId {
		return this.peek(n).id
	}

	/**
	 * Consume the current significant token. `Eof` is never consumed: it
	 * stays current however often this is called.
	 */
	shift(): LookaheadToken {
		const current = this.peek(0)
		if (current.token.kind !== TokenKind.Eof) {
			this.window.shift()
			this.lastConsumed = current
		}
		return current
	}

	/** The last consumed significant token, or null at the start. */
	previous(): Token | null {
		return this.lastConsumed?.token ?? null
	}

	private peek(n: number): LookaheadToken {
		if (n >= MAX_LOOKAHEAD) {
			throw new Error(`Lookahead ${n} exceeds ${MAX_LOOKAHEAD}`)
		}
		while (this.window.length <= n) {
			const tail = this.window.at(-1)
			if (tail?.token.kind === TokenKind.Eof) return tail
			this.window.push(this.pullSignificant())
		}
		const buffered = this.window[n]
		if (buffered === undefined) throw new Error(`Lookahead ${n} unavailable`)
		return buffered
	}

	private pullSignificant(): LookaheadToken {
		let token = this.source.next()
		while (isTrivia(token.kind)) token = this.source.next()
		return { id: this.source.lastId(), token }
	}
}
