import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ParseContext } from '../../src/core/context.ts'
import { NodeFlags, NodeKind, nodeKindName } from '../../src/core/nodes.ts'
import { TokenKind, tokenKindName } from '../../src/core/tokens.ts'
import { type ParseEvent, startMarker } from '../../src/parse/events.ts'
import { parseEvents } from '../../src/parse/parser.ts'

function describeEvent(event: ParseEvent): string {
	switch (event.type) {
		case 'start': {
			const kind = event.kind === null ? 'open' : nodeKindName(event.kind)
			return event.forwardParent === null ? `start ${kind}` : `start ${kind} ^${event.forwardParent}`
		}
		case 'token':
			return `token ${tokenKindName(event.kind)}`
		case 'finish':
			return 'finish'
	}
}

describe('parse/events', () => {
	it('starts and completes nodes', () => {
		const events: ParseEvent[] = []
		const m = startMarker(events)
		events.push({ kind: TokenKind.Integer, type: 'token' })
		const done = m.complete(NodeKind.Literal)
		assert.strictEqual(done.kind, NodeKind.Literal)
		assert.strictEqual(done.position, 0)
		assert.deepStrictEqual(events.map(describeEvent), ['start Literal', 'token Integer', 'finish'])
	})

	it('records flags on completion', () => {
		const events: ParseEvent[] = []
		startMarker(events).complete(NodeKind.AttrSet, NodeFlags.Recursive)
		const [start] = events
		assert.ok(start?.type === 'start')
		assert.strictEqual(start.flags, NodeFlags.Recursive)
	})

	it('links a preceding parent by offset', () => {
		const events: ParseEvent[] = []
		const child = startMarker(events).complete(NodeKind.Identifier)
		const parent = child.precede()
		assert.strictEqual(parent.position, 2)
		parent.complete(NodeKind.Apply)
		assert.deepStrictEqual(events.map(describeEvent), [
			'start Identifier ^2',
			'finish',
			'start Apply',
			'finish',
		])
	})

	it('emits operator events with the left operand preceded', () => {
		const events = parseEvents(new ParseContext('1 + 2'))
		assert.deepStrictEqual(events.map(describeEvent), [
			'start Root',
			'start Literal ^3',
			'token Integer',
			'finish',
			'start BinaryOp',
			'token Plus',
			'start Literal',
			'token Integer',
			'finish',
			'finish',
			'token Eof',
			'finish',
		])
	})

	it('records keywords under their contextual kind', () => {
		const events = parseEvents(new ParseContext('{ in = 1; }'))
		const tokens = events.filter((event) => event.type === 'token').map(describeEvent)
		assert.deepStrictEqual(tokens, [
			'token LBrace',
			'token Identifier',
			'token Assign',
			'token Integer',
			'token Semicolon',
			'token RBrace',
			'token Eof',
		])
	})
})
