import assert from 'node:assert'
import { describe, it } from 'node:test'
import { NodeKind } from '../../src/core/nodes.ts'
import { TokenKind } from '../../src/core/tokens.ts'
import { parseSource } from '../../src/index.ts'
import {
	isAtomStart,
	isCloser,
	isExpressionBoundary,
	RECOVERY,
	RecoveryContext,
} from '../../src/parse/recovery.ts'
import { inheritedNames } from '../../src/tree/ast.ts'
import { rootExpr, shape } from '../shape.ts'

function recovered(source: string): { shape: string; messages: string[]; errors: string[] } {
	const { tree, diagnostics } = parseSource(source)
	return {
		errors: tree.findAll(NodeKind.Error).map((id) => tree.text(id)),
		messages: diagnostics.map((d) => d.message),
		shape: shape(tree, rootExpr(tree)),
	}
}

describe('parse/recovery', () => {
	describe('table', () => {
		it('stops every context at the end of input', () => {
			for (const context of Object.values(RecoveryContext)) {
				const rule = RECOVERY[context]
				assert.ok(rule.stopBefore.has(TokenKind.Eof), context)
			}
		})

		it('treats closers and branch keywords as expression boundaries', () => {
			assert.strictEqual(isExpressionBoundary(TokenKind.Semicolon), true)
			assert.strictEqual(isExpressionBoundary(TokenKind.Then), true)
			assert.strictEqual(isExpressionBoundary(TokenKind.InterpolationEnd), true)
			assert.strictEqual(isExpressionBoundary(TokenKind.Identifier), false)
			assert.strictEqual(isExpressionBoundary(TokenKind.At), false)
		})

		it('closes constructs only at delimiters', () => {
			assert.strictEqual(isCloser(TokenKind.RBracket), true)
			assert.strictEqual(isCloser(TokenKind.In), true)
			assert.strictEqual(isCloser(TokenKind.Eof), true)
			assert.strictEqual(isCloser(TokenKind.Comma), false)
			assert.strictEqual(isCloser(TokenKind.Then), false)
		})

		it('knows which tokens start an atom', () => {
			assert.strictEqual(isAtomStart(TokenKind.Rec), true)
			assert.strictEqual(isAtomStart(TokenKind.IndentedStringStart), true)
			assert.strictEqual(isAtomStart(TokenKind.Let), false)
			assert.strictEqual(isAtomStart(TokenKind.Or), false)
		})
	})

	describe('contexts', () => {
		it('resumes a list at the next element', () => {
			assert.deepStrictEqual(recovered('[ 1 = 2 ]'), {
				errors: ['='],
				messages: ["unexpected '=', expected list element or ']'"],
				shape: 'List(Literal Error Literal)',
			})
		})

		it('keeps a stray comma inside the list', () => {
			assert.deepStrictEqual(recovered('[ 1, 2 ]'), {
				errors: [','],
				messages: ["unexpected ',', expected list element or ']'"],
				shape: 'List(Literal Error Literal)',
			})
		})

		it('keeps a stray keyword inside the list', () => {
			assert.deepStrictEqual(recovered('[ 1 then 2 ]'), {
				errors: ['then'],
				messages: ["unexpected 'then', expected list element or ']'"],
				shape: 'List(Literal Error Literal)',
			})
		})

		it('recovers a list without disturbing the enclosing set', () => {
			assert.deepStrictEqual(recovered('{ a = [ 1, 2 ]; b = 3; }'), {
				errors: [','],
				messages: ["unexpected ',', expected list element or ']'"],
				shape: 'AttrSet(Binding(AttrPath List(Literal Error Literal)) Binding(AttrPath Literal))',
			})
		})

		it('wraps an interpolation in expression position in one error', () => {
			assert.deepStrictEqual(recovered('{ a = ${ x }; b = 2; }'), {
				errors: ['${ x }'],
				messages: ["expected expression, found '${'"],
				shape: 'AttrSet(Binding(AttrPath Error(Interpolation(Identifier))) Binding(AttrPath Literal))',
			})
		})

		it('reports a broken pattern field once', () => {
			assert.deepStrictEqual(recovered('{ a, 1, b }: a'), {
				errors: ['1'],
				messages: ["unexpected integer, expected parameter name, '...' or '}'"],
				shape: 'Lambda(PatternParam(PatternField Error PatternField) Identifier)',
			})
		})

		it('reports junk after a pattern field once', () => {
			assert.deepStrictEqual(recovered('{ a, b 1, c }: a'), {
				errors: ['1'],
				messages: ["unexpected integer, expected parameter name, '...' or '}'"],
				shape: 'Lambda(PatternParam(PatternField PatternField Error PatternField) Identifier)',
			})
		})

		it('resumes an inherit list at the next name', () => {
			const { tree, diagnostics } = parseSource('{ inherit a = b; }')
			assert.deepStrictEqual(
				diagnostics.map((d) => d.message),
				["unexpected '=', expected attribute name or ';'"]
			)
			assert.strictEqual(shape(tree, rootExpr(tree)), 'AttrSet(Inherit(Error))')
			const [inherit] = tree.findAll(NodeKind.Inherit)
			assert.ok(inherit !== undefined)
			assert.deepStrictEqual(inheritedNames(tree, inherit), ['a', 'b'])
		})

		it('skips to the end of an interpolation', () => {
			assert.deepStrictEqual(recovered('"${ a ; }"'), {
				errors: ['; }'],
				messages: ["unexpected ';', expected '}'"],
				shape: 'String(Interpolation(Identifier Error))',
			})
		})

		it('swallows a broken operand up to the next boundary', () => {
			assert.deepStrictEqual(recovered('1 + = 2'), {
				errors: ['= 2'],
				messages: ["expected expression, found '='"],
				shape: 'BinaryOp(Literal Error)',
			})
		})

		it('swallows a statement terminator in a binding list', () => {
			assert.deepStrictEqual(recovered('{ = 1; a = 2; }'), {
				errors: ['= 1;'],
				messages: ["unexpected '=', expected binding or '}'"],
				shape: 'AttrSet(Error Binding(AttrPath Literal))',
			})
		})
	})
})
