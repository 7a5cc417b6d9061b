import assert from 'node:assert'
import { describe, it } from 'node:test'
import { LineIndex } from '../../src/core/lines.ts'

describe('core/lines', () => {
	it('maps offsets to 1-indexed positions', () => {
		const index = new LineIndex('ab\ncd\n\nef')
		assert.deepStrictEqual(index.position(0), { column: 1, line: 1 })
		assert.deepStrictEqual(index.position(2), { column: 3, line: 1 })
		assert.deepStrictEqual(index.position(3), { column: 1, line: 2 })
		assert.deepStrictEqual(index.position(6), { column: 1, line: 3 })
		assert.deepStrictEqual(index.position(8), { column: 2, line: 4 })
	})

	it('clamps offsets outside the source', () => {
		const index = new LineIndex('ab')
		assert.deepStrictEqual(index.position(-4), { column: 1, line: 1 })
		assert.deepStrictEqual(index.position(10), { column: 3, line: 1 })
	})

	it('counts lines', () => {
		assert.strictEqual(new LineIndex('').lineCount(), 1)
		assert.strictEqual(new LineIndex('a\nb\n').lineCount(), 3)
	})

	it('returns line text without terminators', () => {
		const index = new LineIndex('one\r\ntwo\nthree')
		assert.strictEqual(index.lineText(1), 'one')
		assert.strictEqual(index.lineText(2), 'two')
		assert.strictEqual(index.lineText(3), 'three')
		assert.strictEqual(index.lineText(4), undefined)
	})
})
