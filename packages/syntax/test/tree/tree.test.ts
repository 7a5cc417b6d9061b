import assert from 'node:assert'
import { describe, it } from 'node:test'
import { NodeKind, nodeId } from '../../src/core/nodes.ts'
import { TokenKind, tokenId } from '../../src/core/tokens.ts'
import { parseSource } from '../../src/index.ts'
import { rootExpr } from '../shape.ts'

describe('tree/tree', () => {
	// tokens: 0 '1', 1 ' ', 2 '+', 3 ' ', 4 '2', 5 Eof
	// nodes: 0 Literal(1), 1 Literal(2), 2 BinaryOp, 3 Root
	const { tree } = parseSource('1 + 2')

	describe('children', () => {
		it('interleaves child nodes with the node own tokens', () => {
			assert.deepStrictEqual(tree.children(nodeId(2)), [
				{ id: 0, type: 'node' },
				{ id: 2, type: 'token' },
				{ id: 1, type: 'node' },
			])
		})

		it('gives the root its Eof token', () => {
			assert.deepStrictEqual(tree.children(tree.root), [
				{ id: 2, type: 'node' },
				{ id: 5, type: 'token' },
			])
		})

		it('lists only direct tokens', () => {
			assert.deepStrictEqual(tree.childTokens(nodeId(2)), [tokenId(2)])
			assert.deepStrictEqual(tree.childTokens(nodeId(0)), [tokenId(0)])
		})

		it('finds a child by kind', () => {
			assert.strictEqual(tree.childOfKind(tree.root, NodeKind.BinaryOp), 2)
			assert.strictEqual(tree.childOfKind(tree.root, NodeKind.List), null)
		})
	})

	describe('traversal', () => {
		it('walks descendants in postorder', () => {
			assert.deepStrictEqual([...tree.descendants(tree.root)], [0, 1, 2, 3])
			assert.deepStrictEqual([...tree.descendants(nodeId(1))], [1])
		})

		it('finds all nodes of a kind', () => {
			assert.deepStrictEqual(tree.findAll(NodeKind.Literal), [0, 1])
			assert.deepStrictEqual(tree.findAll(NodeKind.Literal, nodeId(1)), [1])
		})

		it('finds the innermost node at an offset', () => {
			assert.strictEqual(tree.nodeAt(4), 1)
			assert.strictEqual(tree.nodeAt(0), 0)
			assert.strictEqual(tree.nodeAt(2), 2)
			assert.strictEqual(tree.nodeAt(99), tree.root)
		})

		it('yields every token, trivia included, in source order', () => {
			assert.deepStrictEqual(
				[...tree.leaves()].map(([, token]) => token.text),
				['1', ' ', '+', ' ', '2', '']
			)
		})
	})

	describe('spans and text', () => {
		it('spans from the first to the last significant token', () => {
			assert.deepStrictEqual(tree.span(nodeId(2)), { end: 5, start: 0 })
			assert.deepStrictEqual(tree.span(nodeId(1)), { end: 5, start: 4 })
			assert.strictEqual(tree.text(nodeId(2)), '1 + 2')
		})

		it('includes leading trivia in the full span', () => {
			const { tree: commented } = parseSource('# head\nx')
			const expr = rootExpr(commented)
			assert.deepStrictEqual(commented.span(expr), { end: 8, start: 7 })
			assert.deepStrictEqual(commented.fullSpan(expr), { end: 8, start: 0 })
			assert.strictEqual(commented.fullText(expr), '# head\nx')
		})

		it('gives trailing trivia to the Eof token', () => {
			const { tree: trailing, tokens } = parseSource('x # tail')
			const eof = tokenId(tokens.length - 1)
			assert.deepStrictEqual(
				trailing.leadingTrivia(eof).map((token) => token.text),
				[' ', '# tail']
			)
			assert.deepStrictEqual(trailing.span(trailing.root), { end: 8, start: 0 })
		})

		it('returns no leading trivia for a token right after another', () => {
			assert.deepStrictEqual(tree.leadingTrivia(tokenId(0)), [])
			assert.deepStrictEqual(
				tree.leadingTrivia(tokenId(2)).map((token) => token.text),
				[' ']
			)
		})

		it('reconstructs the source', () => {
			const source = '  let a = 1; # one\n in  a\n'
			assert.strictEqual(parseSource(source).tree.reconstruct(), source)
		})
	})

	describe('tokens', () => {
		it('classifies keywords by their contextual kind', () => {
			const { tree: keywords } = parseSource('{ in = 1; }.in')
			assert.deepStrictEqual(
				[...keywords.classifiedTokens()]
					.filter((token) => !token.trivia)
					.map((token) => token.kind),
				[
					TokenKind.LBrace,
					TokenKind.Identifier,
					TokenKind.Assign,
					TokenKind.Integer,
					TokenKind.Semicolon,
					TokenKind.RBrace,
					TokenKind.Dot,
					TokenKind.Identifier,
				]
			)
		})

		it('reports trivia with its span', () => {
			const [, whitespace] = [...tree.classifiedTokens()]
			assert.deepStrictEqual(whitespace, { end: 2, kind: TokenKind.Whitespace, start: 1, trivia: true })
		})

		it('rejects an unknown token id', () => {
			assert.throws(() => tree.tokenKind(tokenId(99)), /Invalid TokenId: 99/)
		})
	})
})
