/**
 * Binding rules shared by attribute sets, `let ... in` and legacy `let`.
 *
 * This module handles:
 * - `path = expr;` bindings with multi-segment attribute paths
 * - `inherit a b;` and `inherit (expr) a b;`
 * - Attribute names: identifiers, keywords in name position, strings and
 *   `${ ... }` dynamic names
 *
 * A multi-segment path stays one Binding with one AttrPath child.
 */

import { NodeKind } from '../core/nodes.ts'
import { TokenKind } from '../core/tokens.ts'
import { KEYWORDS } from '../lex/keywords.ts'
import type { CompletedMarker } from './events.ts'
import { parseExpr } from './expressions.ts'
import { isExpressionBoundary, RecoveryContext } from './recovery.ts'
import type { ParserState } from './state.ts'
import { parseInterpolation, parseString } from './strings.ts'

const KEYWORD_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>(KEYWORDS.values())

// ============================================================================
// Attribute names
// ============================================================================

function isNameToken(kind: TokenKind): boolean {
	return kind === TokenKind.Identifier || KEYWORD_KINDS.has(kind)
}

/**
 * True when a binding starts here. A keyword only starts one when the
 * next token shows it is being used as a name.
 */
function atBindingStart(p: ParserState): boolean {
	const kind = p.kindAt(0)
	switch (kind) {
		case TokenKind.Identifier:
		case TokenKind.Or:
		case TokenKind.StringStart:
		case TokenKind.InterpolationStart:
			return true
		default: {
			if (!KEYWORD_KINDS.has(kind)) return false
			const next = p.kindAt(1)
			return next === TokenKind.Assign || next === TokenKind.Dot
		}
	}
}

function parseAttrName(p: ParserState): void {
	const kind = p.kindAt(0)
	if (isNameToken(kind)) {
		p.bumpAs(TokenKind.Identifier)
	} else if (kind === TokenKind.StringStart) {
		parseString(p)
	} else if (kind === TokenKind.InterpolationStart) {
		parseInterpolation(p)
	} else {
		p.missing('NXPARSE005', { found: p.found() })
	}
}

/**
 * `a.b."c".${d}`
 */
export function parseAttrPath(p: ParserState): CompletedMarker {
	const m = p.start()
	parseAttrName(p)
	while (p.at(TokenKind.Dot)) {
		p.bump()
		parseAttrName(p)
	}
	return m.complete(NodeKind.AttrPath)
}

// ============================================================================
// Bindings
// ============================================================================

function parseBinding(p: ParserState): CompletedMarker {
	const m = p.start()
	parseAttrPath(p)
	if (p.at(TokenKind.Assign)) {
		p.bump()
		parseExpr(p)
	} else {
		p.expect(TokenKind.Assign)
		if (!isExpressionBoundary(p.kindAt(0))) parseExpr(p)
	}
	p.expect(TokenKind.Semicolon)
	return m.complete(NodeKind.Binding)
}

function parseInherit(p: ParserState): CompletedMarker {
	const m = p.start()
	p.bump()

	if (p.at(TokenKind.LParen)) {
		const from = p.start()
		const open = p.bump()
		parseExpr(p)
		p.expectClosing(TokenKind.RParen, open)
		from.complete(NodeKind.InheritFrom)
	}

	while (true) {
		const kind = p.kindAt(0)
		if (
			kind === TokenKind.Semicolon ||
			kind === TokenKind.RBrace ||
			kind === TokenKind.In ||
			kind === TokenKind.InterpolationEnd ||
			kind === TokenKind.Eof
		) {
			break
		}
		if (isNameToken(kind)) p.bumpAs(TokenKind.Identifier)
		else if (kind === TokenKind.StringStart) parseString(p)
		else if (kind === TokenKind.InterpolationStart) parseInterpolation(p)
		else p.recover(RecoveryContext.InheritList)
	}

	p.expect(TokenKind.Semicolon)
	return m.complete(NodeKind.Inherit)
}

/**
 * Bindings up to (not including) `closer`: `}` for sets, `in` for `let`.
 */
export function parseBindings(p: ParserState, closer: TokenKind): void {
	while (true) {
		const kind = p.kindAt(0)
		if (
			kind === closer ||
			kind === TokenKind.RBrace ||
			kind === TokenKind.InterpolationEnd ||
			kind === TokenKind.Eof
		) {
			return
		}
		if (atBindingStart(p)) parseBinding(p)
		else if (kind === TokenKind.Inherit) parseInherit(p)
		else p.recover(RecoveryContext.BindingList)
	}
}
