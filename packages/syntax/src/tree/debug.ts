import { nodeKindName } from '../core/nodes.ts'
import { type Token, tokenKindName } from '../core/tokens.ts'
import type { SyntaxElement, SyntaxTree } from './tree.ts'

const INDENT = '  '

function tokenLine(name: string, token: Token, depth: number): string {
	return `${INDENT.repeat(depth)}${name}@${token.start}..${token.end} ${JSON.stringify(token.text)}`
}

/**
 * Indented dump of a tree, one line per node and per token (trivia
 * included):
 *
 * ```
 * Root@0..5
 *   BinaryOp@0..5
 *     Literal@0..1
 *       Integer@0..1 "1"
 *     Whitespace@1..2 " "
 *     Plus@2..3 "+"
 * ```
 */
export function debugTree(tree: SyntaxTree): string {
	const lines: string[] = []
	const stack: Array<{ element: SyntaxElement; depth: number }> = [
		{ depth: 0, element: { id: tree.root, type: 'node' } },
	]

	while (stack.length > 0) {
		const entry = stack.pop()
		if (entry === undefined) break
		const { element, depth } = entry

		if (element.type === 'token') {
			for (const trivia of tree.leadingTrivia(element.id)) {
				lines.push(tokenLine(tokenKindName(trivia.kind), trivia, depth))
			}
			lines.push(tokenLine(tokenKindName(tree.tokenKind(element.id)), tree.token(element.id), depth))
			continue
		}

		const span = tree.span(element.id)
		lines.push(`${INDENT.repeat(depth)}${nodeKindName(tree.kind(element.id))}@${span.start}..${span.end}`)
		const children = tree.children(element.id)
		for (let i = children.length - 1; i >= 0; i--) {
			const child = children[i]
			if (child !== undefined) stack.push({ depth: depth + 1, element: child })
		}
	}

	return lines.join('\n')
}
