import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ParseContext } from '../../src/core/context.ts'

describe('core/context', () => {
	describe('emit', () => {
		it('interpolates the message and locates the span', () => {
			const ctx = new ParseContext('{\n  a = 1\n}')
			ctx.emit('NXPARSE003', { end: 9, start: 9 }, { expected: "';'" })

			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)
			assert.strictEqual(diagnostic.message, "missing ';'")
			assert.strictEqual(diagnostic.line, 2)
			assert.strictEqual(diagnostic.column, 8)
			assert.deepStrictEqual(diagnostic.args, { expected: "';'" })
		})

		it('counts errors', () => {
			const ctx = new ParseContext('x')
			assert.strictEqual(ctx.hasErrors(), false)
			ctx.emit('NXLEX006', { end: 1, start: 0 })
			assert.strictEqual(ctx.hasErrors(), true)
			assert.strictEqual(ctx.getErrorCount(), 1)
		})

		it('drops an identical span and message', () => {
			const ctx = new ParseContext('x')
			ctx.emit('NXLEX006', { end: 1, start: 0 })
			ctx.emit('NXLEX006', { end: 1, start: 0 })
			assert.strictEqual(ctx.getDiagnostics().length, 1)
			assert.strictEqual(ctx.getErrorCount(), 1)
		})

		it('returns diagnostics in source order', () => {
			const ctx = new ParseContext('abc def')
			ctx.emit('NXPARSE002', { end: 7, start: 4 }, { found: 'identifier' })
			ctx.emit('NXLEX001', { end: 1, start: 0 }, { text: 'a' })
			const codes = ctx.getDiagnostics().map((d) => d.def.code)
			assert.deepStrictEqual(codes, ['NXLEX001', 'NXPARSE002'])
		})
	})

	describe('formatDiagnostic', () => {
		it('renders header, location, source line and help', () => {
			const ctx = new ParseContext('{ a = 1 }', 'default.nix')
			ctx.emit('NXPARSE003', { end: 7, start: 7 }, { expected: "';'" })

			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)
			const expected = [
				"error[NXPARSE003]: missing ';'",
				'  --> default.nix:1:8',
				'   | ',
				' 1 | { a = 1 }',
				'   |        ^',
				'   | ',
				"   = help: Insert ';' here.",
			].join('\n')
			assert.strictEqual(ctx.formatDiagnostic(diagnostic), expected)
		})

		it('underlines the whole span on its line', () => {
			const ctx = new ParseContext('a @@@ b')
			ctx.emit('NXLEX006', { end: 5, start: 2 })

			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)
			const lines = ctx.formatDiagnostic(diagnostic).split('\n')
			assert.strictEqual(lines[4], '   |   ^^^')
		})

		it('uses <input> when no filename is given', () => {
			const ctx = new ParseContext('}')
			ctx.emit('NXLEX006', { end: 1, start: 0 })
			const output = ctx.formatAllDiagnostics()
			assert.strictEqual(output.split('\n')[1], '  --> <input>:1:1')
		})
	})
})
