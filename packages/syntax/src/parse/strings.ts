/**
 * String rules. The scanner already split strings into fragments, escapes
 * and interpolation delimiters, and guarantees every opened string and
 * interpolation a closing token (synthetic at end of input).
 */

import { NodeKind } from '../core/nodes.ts'
import { TokenKind } from '../core/tokens.ts'
import type { CompletedMarker } from './events.ts'
import { parseExpr } from './expressions.ts'
import { RecoveryContext } from './recovery.ts'
import type { ParserState } from './state.ts'

/**
 * `${ expr }`, in strings and as a dynamic attribute name.
 */
export function parseInterpolation(p: ParserState): CompletedMarker {
	const m = p.start()
	p.bump()
	parseExpr(p)
	if (p.at(TokenKind.InterpolationEnd)) p.bump()
	else if (!p.atEof()) p.recover(RecoveryContext.Interpolation)
	return m.complete(NodeKind.Interpolation)
}

function parseStringParts(p: ParserState, end: TokenKind, kind: NodeKind): CompletedMarker {
	const m = p.start()
	p.bump()
	while (!p.atEof()) {
		const part = p.kindAt(0)
		if (part === end) {
			p.bump()
			break
		}
		if (part === TokenKind.InterpolationStart) parseInterpolation(p)
		else p.bump()
	}
	return m.complete(kind)
}

export function parseString(p: ParserState): CompletedMarker {
	return parseStringParts(p, TokenKind.StringEnd, NodeKind.String)
}

export function parseIndentedString(p: ParserState): CompletedMarker {
	return parseStringParts(p, TokenKind.IndentedStringEnd, NodeKind.IndentedString)
}
