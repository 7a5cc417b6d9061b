import assert from 'node:assert'
import { describe, it } from 'node:test'
import { LexicalMode, ModeStack } from '../../src/lex/modes.ts'

describe('lex/modes', () => {
	it('starts with one Default frame', () => {
		const stack = new ModeStack()
		assert.strictEqual(stack.depth(), 1)
		assert.strictEqual(stack.top().mode, LexicalMode.Default)
	})

	it('pushes and pops frames', () => {
		const stack = new ModeStack()
		stack.push(LexicalMode.StringLiteral, 4)
		stack.push(LexicalMode.Interpolation, 6)

		assert.strictEqual(stack.depth(), 3)
		assert.strictEqual(stack.pop()?.start, 6)
		assert.strictEqual(stack.top().mode, LexicalMode.StringLiteral)
		assert.strictEqual(stack.pop()?.mode, LexicalMode.StringLiteral)
	})

	it('never pops the root frame', () => {
		const stack = new ModeStack()
		assert.strictEqual(stack.pop(), null)
		assert.strictEqual(stack.depth(), 1)
	})

	it('counts braces per frame', () => {
		const stack = new ModeStack()
		stack.top().braceDepth++
		stack.push(LexicalMode.Interpolation, 0)
		assert.strictEqual(stack.top().braceDepth, 0)
		stack.pop()
		assert.strictEqual(stack.top().braceDepth, 1)
	})
})
