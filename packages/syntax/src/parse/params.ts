/**
 * Lambda rules: `x: body`, `{ a, b ? d, ... }: body`, with the whole
 * argument optionally bound as `args@{ ... }` or `{ ... }@args`.
 *
 * Both parameter forms live under one Lambda node; the parameter child is
 * a SimpleParam or a PatternParam.
 */

import { NodeFlags, NodeKind } from '../core/nodes.ts'
import { TokenKind } from '../core/tokens.ts'
import type { CompletedMarker } from './events.ts'
import { parseExpr } from './expressions.ts'
import { RecoveryContext } from './recovery.ts'
import type { ParserState } from './state.ts'

function isBinder(kind: TokenKind): boolean {
	return kind === TokenKind.Colon || kind === TokenKind.At
}

/**
 * Decide whether the upcoming tokens start a lambda. A pattern is told
 * apart from an attribute set by its first two or three tokens.
 */
export function looksLikeLambda(p: ParserState): boolean {
	const first = p.kindAt(0)
	if (first === TokenKind.Identifier) return isBinder(p.kindAt(1))
	if (first !== TokenKind.LBrace) return false

	switch (p.kindAt(1)) {
		case TokenKind.RBrace:
			return isBinder(p.kindAt(2))
		case TokenKind.Ellipsis:
			return true
		case TokenKind.Identifier: {
			const next = p.kindAt(2)
			if (next === TokenKind.Comma || next === TokenKind.Question) return true
			return next === TokenKind.RBrace && isBinder(p.kindAt(3))
		}
		default:
			return false
	}
}

export function parseLambda(p: ParserState): CompletedMarker {
	const m = p.start()

	if (p.at(TokenKind.Identifier) && p.kindAt(1) === TokenKind.Colon) {
		const param = p.start()
		p.bumpAs(TokenKind.Identifier)
		param.complete(NodeKind.SimpleParam)
	} else {
		parsePatternParam(p)
	}

	p.expect(TokenKind.Colon)
	parseExpr(p)
	return m.complete(NodeKind.Lambda)
}

function parsePatternParam(p: ParserState): CompletedMarker {
	const m = p.start()
	let flags: NodeFlags = NodeFlags.None

	if (p.at(TokenKind.Identifier)) {
		p.bumpAs(TokenKind.Identifier)
		p.bump()
		if (!p.at(TokenKind.LBrace)) {
			p.expect(TokenKind.LBrace)
			return m.complete(NodeKind.PatternParam)
		}
		flags = parsePatternFields(p)
	} else {
		flags = parsePatternFields(p)
		if (p.at(TokenKind.At)) {
			p.bump()
			if (p.at(TokenKind.Identifier)) p.bumpAs(TokenKind.Identifier)
			else p.expect(TokenKind.Identifier)
		}
	}

	return m.complete(NodeKind.PatternParam, flags)
}

function parsePatternField(p: ParserState): void {
	const m = p.start()
	p.bumpAs(TokenKind.Identifier)
	if (p.at(TokenKind.Question)) {
		p.bump()
		parseExpr(p)
	}
	m.complete(NodeKind.PatternField)
}

/**
 * Skip a broken field. The comma after it, if any, belongs to the skipped
 * field and is not reported again.
 */
function recoverField(p: ParserState): void {
	p.recover(RecoveryContext.Pattern)
	if (p.at(TokenKind.Comma)) p.bump()
}

/**
 * `{ a, b ? default, ... }`. Returns the pattern's flags.
 */
function parsePatternFields(p: ParserState): NodeFlags {
	let flags: NodeFlags = NodeFlags.None
	const open = p.bump()

	while (!p.at(TokenKind.RBrace) && !p.atEof() && !p.at(TokenKind.InterpolationEnd)) {
		const kind = p.kindAt(0)
		if (kind === TokenKind.Ellipsis) {
			p.bump()
			flags |= NodeFlags.Ellipsis
		} else if (kind === TokenKind.Identifier) {
			parsePatternField(p)
		} else {
			recoverField(p)
			continue
		}

		const separator = p.kindAt(0)
		if (separator === TokenKind.Comma) {
			p.bump()
		} else if (separator === TokenKind.Identifier || separator === TokenKind.Ellipsis) {
			p.expect(TokenKind.Comma)
		} else if (
			separator !== TokenKind.RBrace &&
			separator !== TokenKind.Eof &&
			separator !== TokenKind.InterpolationEnd
		) {
			recoverField(p)
		}
	}

	p.expectClosing(TokenKind.RBrace, open)
	return flags
}
