/**
 * Immutable concrete syntax tree over a parsed source.
 *
 * Nodes live in a postorder NodeStore; tokens stay in the flat TokenStore
 * the scanner filled. A node's direct tokens are the significant tokens in
 * its range that no child node covers. Trivia is never a child: it is
 * reached as the leading trivia of the significant token after it, so
 * walking the leaves reproduces the source exactly.
 */

import {
	type NodeFlags,
	type NodeId,
	type NodeKind,
	type NodeStore,
	type SyntaxNodeData,
	isZeroWidth,
} from '../core/nodes.ts'
import { type Span, type Token, type TokenId, TokenKind, type TokenStore, tokenId } from '../core/tokens.ts'
import { isTrivia, leadingTriviaStarts } from '../lex/trivia.ts'

export type SyntaxElement =
	| { readonly type: 'node'; readonly id: NodeId }
	| { readonly type: 'token'; readonly id: TokenId }

/** A token with the kind the grammar gave it, for highlighting. */
export interface ClassifiedToken extends Span {
	readonly kind: TokenKind
	readonly trivia: boolean
}

export class SyntaxTree {
	private readonly triviaStarts: Int32Array

	constructor(
		readonly source: string,
		readonly tokens: TokenStore,
		readonly nodes: NodeStore,
		readonly root: NodeId,
		private readonly contextualKinds: readonly TokenKind[]
	) {
		this.triviaStarts = leadingTriviaStarts(tokens.toArray())
	}

	// ===========================================================================
	// NODES
	// ===========================================================================

	node(id: NodeId): SyntaxNodeData {
		return this.nodes.get(id)
	}

	kind(id: NodeId): NodeKind {
		return this.nodes.get(id).kind
	}

	flags(id: NodeId): NodeFlags {
		return this.nodes.get(id).flags
	}

	hasFlag(id: NodeId, flag: NodeFlags): boolean {
		return (this.nodes.get(id).flags & flag) === flag
	}

	childNodes(id: NodeId): NodeId[] {
		return this.nodes.childNodes(id)
	}

	/** First direct child node of `kind`, if any. */
	childOfKind(id: NodeId, kind: NodeKind): NodeId | null {
		return this.childNodes(id).find((child) => this.kind(child) === kind) ?? null
	}

	/**
	 * Direct children in source order: child nodes interleaved with the
	 * node's own significant tokens.
	 */
	children(id: NodeId): SyntaxElement[] {
		const node = this.nodes.get(id)
		const elements: SyntaxElement[] = []
		let cursor: number = node.firstToken

		for (const child of this.nodes.childNodes(id)) {
			const data = this.nodes.get(child)
			this.pushTokens(elements, cursor, data.firstToken)
			elements.push({ id: child, type: 'node' })
			cursor = Math.max(cursor, data.endToken)
		}
		this.pushTokens(elements, cursor, node.endToken)
		return elements
	}

	/** The node's own significant tokens, without those of child nodes. */
	childTokens(id: NodeId): TokenId[] {
		const ids: TokenId[] = []
		for (const element of this.children(id)) {
			if (element.type === 'token') ids.push(element.id)
		}
		return ids
	}

	/** Every node of a subtree, the node itself last (postorder). */
	*descendants(id: NodeId): Generator<NodeId> {
		for (const [descendant] of this.nodes.iterateSubtree(id)) yield descendant
	}

	/** All nodes of `kind` in source order of their end. */
	findAll(kind: NodeKind, within: NodeId = this.root): NodeId[] {
		const found: NodeId[] = []
		for (const [id, node] of this.nodes.iterateSubtree(within)) {
			if (node.kind === kind) found.push(id)
		}
		return found
	}

	/**
	 * The innermost node whose span contains `offset`.
	 */
	nodeAt(offset: number): NodeId {
		let current = this.root
		while (true) {
			const next = this.childNodes(current).find((child) => {
				const span = this.span(child)
				return span.start <= offset && offset < span.end
			})
			if (next === undefined) return current
			current = next
		}
	}

	// ===========================================================================
	// TOKENS
	// ===========================================================================

	token(id: TokenId): Token {
		return this.tokens.get(id)
	}

	/** Kind as the grammar saw it: keywords, and keywords used as names. */
	tokenKind(id: TokenId): TokenKind {
		const kind = this.contextualKinds[id]
		if (kind === undefined) throw new Error(`Invalid TokenId: ${id}`)
		return kind
	}

	/** Trivia tokens directly before a token, in source order. */
	leadingTrivia(id: TokenId): Token[] {
		const start = this.triviaStarts[id]
		if (start === undefined || start === id) return []
		return this.tokens.slice(tokenId(start), id)
	}

	/**
	 * All tokens in source order, trivia included, found by walking the
	 * tree from the root.
	 */
	*leaves(): Generator<[TokenId, Token]> {
		const stack: SyntaxElement[] = [{ id: this.root, type: 'node' }]
		while (stack.length > 0) {
			const element = stack.pop()
			if (element === undefined) break
			if (element.type === 'node') {
				const children = this.children(element.id)
				for (let i = children.length - 1; i >= 0; i--) {
					const child = children[i]
					if (child !== undefined) stack.push(child)
				}
				continue
			}
			const start = this.triviaStarts[element.id] ?? element.id
			for (let i = start; i < element.id; i++) {
				const id = tokenId(i)
				yield [id, this.tokens.get(id)]
			}
			yield [element.id, this.tokens.get(element.id)]
		}
	}

	/** The source text rebuilt from the leaves. Always equals `source`. */
	reconstruct(): string {
		const parts: string[] = []
		for (const [, token] of this.leaves()) parts.push(token.text)
		return parts.join('')
	}

	/** Every token with its contextual kind, for syntax highlighting. */
	*classifiedTokens(): Generator<ClassifiedToken> {
		for (const [id, token] of this.tokens) {
			if (token.kind === TokenKind.Eof) continue
			yield {
				end: token.end,
				kind: this.tokenKind(id),
				start: token.start,
				trivia: isTrivia(token.kind),
			}
		}
	}

	// ===========================================================================
	// SPANS AND TEXT
	// ===========================================================================

	/**
	 * Span from the node's first to its last significant token. A
	 * zero-width node sits at the end of the token before it.
	 */
	span(id: NodeId): Span {
		const node = this.nodes.get(id)
		if (isZeroWidth(node)) {
			const position = node.endToken > 0 ? this.tokens.get(tokenId(node.endToken - 1)).end : 0
			return { end: position, start: position }
		}
		return {
			end: this.tokens.get(tokenId(node.endToken - 1)).end,
			start: this.tokens.get(node.firstToken).start,
		}
	}

	/** Span including the leading trivia of the node's first token. */
	fullSpan(id: NodeId): Span {
		const node = this.nodes.get(id)
		const span = this.span(id)
		if (isZeroWidth(node)) return span
		const triviaStart = this.triviaStarts[node.firstToken] ?? node.firstToken
		return { end: span.end, start: this.tokens.get(tokenId(triviaStart)).start }
	}

	text(id: NodeId): string {
		const { start, end } = this.span(id)
		return this.source.slice(start, end)
	}

	fullText(id: NodeId): string {
		const { start, end } = this.fullSpan(id)
		return this.source.slice(start, end)
	}

	tokenText(id: TokenId): string {
		return this.tokens.get(id).text
	}

	private pushTokens(elements: SyntaxElement[], from: number, to: number): void {
		for (let i = from; i < to; i++) {
			const id = tokenId(i)
			if (!isTrivia(this.tokens.get(id).kind)) elements.push({ id, type: 'token' })
		}
	}
}
