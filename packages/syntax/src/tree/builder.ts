/**
 * Tree builder: assembles the grammar engine's events into a postorder
 * NodeStore. Owns no parsing logic.
 *
 * Token events are matched, in order, with the significant tokens of the
 * context's token store; trivia is skipped here and reattached by the tree
 * as leading trivia of the following token.
 */

import type { ParseContext } from '../core/context.ts'
import { type NodeFlags, type NodeKind, NodeStore, nodeId } from '../core/nodes.ts'
import { type Token, type TokenKind, tokenId } from '../core/tokens.ts'
import { isTrivia } from '../lex/trivia.ts'
import type { ParseEvent, StartEvent } from '../parse/events.ts'
import { SyntaxTree } from './tree.ts'

interface OpenNode {
	readonly kind: NodeKind
	readonly flags: NodeFlags
	/** Store index of the first significant token, once one was seen */
	firstToken: number | null
	subtreeSize: number
}

/**
 * The start event at `position` and the starts of the parents that
 * `precede` linked to it, innermost first.
 */
function forwardChain(
	events: readonly ParseEvent[],
	position: number,
	visited: Uint8Array
): StartEvent[] {
	const chain: StartEvent[] = []
	let at: number | null = position
	while (at !== null) {
		const event: ParseEvent | undefined = events[at]
		if (event?.type !== 'start') {
			throw new Error(`Forward parent at ${at} is not a start event`)
		}
		visited[at] = 1
		chain.push(event)
		at = event.forwardParent === null ? null : at + event.forwardParent
	}
	return chain
}

function skipTrivia(tokens: readonly Token[], from: number): number {
	let at = from
	while (at < tokens.length) {
		const token = tokens[at]
		if (token === undefined || !isTrivia(token.kind)) break
		at++
	}
	return at
}

export function buildTree(context: ParseContext, events: readonly ParseEvent[]): SyntaxTree {
	const tokens = context.tokens.toArray()
	const kinds: TokenKind[] = tokens.map((token) => token.kind)

	const nodes = new NodeStore()
	const stack: OpenNode[] = []
	const visited = new Uint8Array(events.length)
	let next = 0
	// one past the last significant token consumed
	let consumed = 0

	for (let i = 0; i < events.length; i++) {
		const event = events[i]
		if (event === undefined) continue

		switch (event.type) {
			case 'start': {
				if (visited[i] === 1) break
				const chain = forwardChain(events, i, visited)
				for (let j = chain.length - 1; j >= 0; j--) {
					const start = chain[j]
					if (start === undefined) continue
					if (start.kind === null) throw new Error(`Start event ${i} was never completed`)
					stack.push({ firstToken: null, flags: start.flags, kind: start.kind, subtreeSize: 1 })
				}
				break
			}
			case 'token': {
				next = skipTrivia(tokens, next)
				if (next >= tokens.length) {
					throw new Error(`Token event ${i} past the end of the token store`)
				}
				kinds[next] = event.kind
				for (let j = stack.length - 1; j >= 0; j--) {
					const open = stack[j]
					if (open === undefined || open.firstToken !== null) break
					open.firstToken = next
				}
				next++
				consumed = next
				break
			}
			case 'finish': {
				const open = stack.pop()
				if (open === undefined) throw new Error(`Unbalanced finish event at ${i}`)
				nodes.add({
					endToken: tokenId(consumed),
					firstToken: tokenId(open.firstToken ?? consumed),
					flags: open.flags,
					kind: open.kind,
					subtreeSize: open.subtreeSize,
				})
				const parent = stack.at(-1)
				if (parent !== undefined) parent.subtreeSize += open.subtreeSize
				break
			}
		}
	}

	if (stack.length > 0 || nodes.count() === 0) {
		throw new Error('Parse events did not close a single root node')
	}

	return new SyntaxTree(context.source, context.tokens, nodes, nodeId(nodes.count() - 1), kinds)
}
