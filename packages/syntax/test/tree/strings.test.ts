import assert from 'node:assert'
import { describe, it } from 'node:test'
import { parseSource } from '../../src/index.ts'
import { type StringPart, staticStringValue, stringParts } from '../../src/tree/strings.ts'
import { rootExpr } from '../shape.ts'

function valueOf(source: string): string | null {
	const { tree } = parseSource(source)
	return staticStringValue(tree, rootExpr(tree))
}

function partsOf(source: string): Array<string | { interpolation: string }> {
	const { tree } = parseSource(source)
	return stringParts(tree, rootExpr(tree)).map((part: StringPart) =>
		part.type === 'text' ? part.text : { interpolation: tree.text(part.node) }
	)
}

describe('tree/strings', () => {
	describe('double-quoted strings', () => {
		it('decodes escapes', () => {
			assert.strictEqual(valueOf('"a\\nb\\t\\"c\\\\"'), 'a\nb\t"c\\')
		})

		it('keeps an unknown escape as the escaped character', () => {
			assert.strictEqual(valueOf('"\\q\\$"'), 'q$')
		})

		it('splits text around interpolations', () => {
			assert.deepStrictEqual(partsOf('"x ${y} z"'), ['x ', { interpolation: '${y}' }, ' z'])
		})

		it('has no static value with an interpolation', () => {
			assert.strictEqual(valueOf('"${y}"'), null)
		})

		it('reads an empty string', () => {
			assert.strictEqual(valueOf('""'), '')
		})

		it('has no static value for other nodes', () => {
			assert.strictEqual(valueOf('1'), null)
		})
	})

	describe('indented strings', () => {
		it('removes the common indentation', () => {
			assert.strictEqual(valueOf("''\n  a\n    b\n  ''"), 'a\n  b\n')
		})

		it('keeps a single line as written', () => {
			assert.strictEqual(valueOf("''abc''"), 'abc')
		})

		it('counts escapes as content', () => {
			assert.strictEqual(valueOf("''\n  ''$x\n''"), '$x\n')
		})

		it('decodes the indented escapes', () => {
			assert.strictEqual(valueOf("''''' ''\\n''"), "'' \n")
		})

		it('ignores blank lines when measuring indentation', () => {
			assert.strictEqual(valueOf("''\n    a\n\n    b\n''"), 'a\n\nb\n')
		})

		it('keeps interpolations in place', () => {
			assert.deepStrictEqual(partsOf("''\n  a ${b}\n''"), ['a ', { interpolation: '${b}' }, '\n'])
		})

		it('treats tabs as content', () => {
			assert.strictEqual(valueOf("''\n  \ta\n  b\n''"), '\ta\nb\n')
		})
	})
})
