import type { ParseContext } from '../core/context.ts'
import { NodeKind } from '../core/nodes.ts'
import { scannerSource, storeSource, TokenCursor } from './cursor.ts'
import type { ParseEvent } from './events.ts'
import { parseExpr } from './expressions.ts'
import { ParserState } from './state.ts'

/**
 * Root := Expr Eof
 *
 * Input left over after the expression is kept in one Error node.
 */
function parseRoot(p: ParserState): void {
	const m = p.start()
	parseExpr(p)

	if (!p.atEof()) {
		p.reportAtToken('NXPARSE006', p.current(), { found: p.found() })
		const rest = p.start()
		while (!p.atEof()) p.bump()
		rest.complete(NodeKind.Error)
	}

	p.bumpEof()
	m.complete(NodeKind.Root)
}

/**
 * Run the grammar engine and return its event stream.
 *
 * When `context.tokens` is still empty the scanner is pulled on demand and
 * fills it; otherwise the tokens from an earlier `tokenize` are replayed.
 */
export function parseEvents(context: ParseContext): readonly ParseEvent[] {
	const source = context.tokens.count() === 0 ? scannerSource(context) : storeSource(context)
	const state = new ParserState(context, new TokenCursor(source))
	parseRoot(state)
	return state.events
}
