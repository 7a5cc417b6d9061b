/**
 * Expression rules.
 *
 * This module handles:
 * - Prefix forms: `if`, `assert`, `with`, `let ... in`, lambdas
 * - Binary operators by precedence climbing, `?` has-attribute
 * - Unary `-` and `!`
 * - Application and attribute selection with `or` defaults
 * - Atoms: identifiers, literals, parentheses, lists, attribute sets
 *
 * Prefix forms are also accepted as the operand of an operator
 * (`1 + if c then 2 else 3`); they extend as far right as possible.
 */

import { NodeFlags, NodeKind } from '../core/nodes.ts'
import { TokenKind } from '../core/tokens.ts'
import { parseAttrPath, parseBindings } from './bindings.ts'
import type { CompletedMarker } from './events.ts'
import { looksLikeLambda, parseLambda } from './params.ts'
import { INFIX_OPERATORS, PREFIX_OPERATORS, Precedence, rightOperandPrecedence } from './precedence.ts'
import { isAtomStart, isCloser, isExpressionBoundary, RecoveryContext } from './recovery.ts'
import type { ParserState } from './state.ts'
import { parseIndentedString, parseInterpolation, parseString } from './strings.ts'

// ============================================================================
// Entry
// ============================================================================

/**
 * Parse one expression, prefix forms included.
 */
export function parseExpr(p: ParserState): CompletedMarker {
	return p.descend(() => parseBinary(p, Precedence.Implication))
}

// ============================================================================
// Prefix forms
// ============================================================================

function parseIfThenElse(p: ParserState): CompletedMarker {
	const m = p.start()
	p.bump()
	parseExpr(p)
	p.expect(TokenKind.Then)
	parseExpr(p)
	p.expect(TokenKind.Else)
	parseExpr(p)
	return m.complete(NodeKind.IfThenElse)
}

/** `assert cond; body` and `with scope; body` share one shape. */
function parseGuarded(p: ParserState, kind: NodeKind): CompletedMarker {
	const m = p.start()
	p.bump()
	parseExpr(p)
	p.expect(TokenKind.Semicolon)
	parseExpr(p)
	return m.complete(kind)
}

function parseLetIn(p: ParserState): CompletedMarker {
	const m = p.start()
	p.bump()
	parseBindings(p, TokenKind.In)
	p.expect(TokenKind.In)
	parseExpr(p)
	return m.complete(NodeKind.LetIn)
}

function parsePrefixForm(p: ParserState): CompletedMarker | null {
	switch (p.kindAt(0)) {
		case TokenKind.If:
			return parseIfThenElse(p)
		case TokenKind.Assert:
			return parseGuarded(p, NodeKind.Assert)
		case TokenKind.With:
			return parseGuarded(p, NodeKind.With)
		case TokenKind.Let:
			return p.kindAt(1) === TokenKind.LBrace ? null : parseLetIn(p)
		default:
			return looksLikeLambda(p) ? parseLambda(p) : null
	}
}

// ============================================================================
// Operators
// ============================================================================

/**
 * Precedence climbing over the infix table. Operators binding at least
 * as tightly as `minPrecedence` are taken.
 */
function parseBinary(p: ParserState, minPrecedence: number): CompletedMarker {
	let lhs = parseOperand(p)
	let chained: number | null = null

	while (true) {
		const kind = p.kindAt(0)

		if (kind === TokenKind.Question) {
			if (Precedence.HasAttr < minPrecedence) break
			const m = lhs.precede()
			p.bump()
			parseAttrPath(p)
			lhs = m.complete(NodeKind.HasAttr)
			continue
		}

		const op = INFIX_OPERATORS.get(kind)
		if (op === undefined || op.precedence < minPrecedence) break

		if (op.associativity === 'none') {
			if (chained === op.precedence) {
				p.report('NXPARSE004', p.current(), { operator: p.current().text })
			}
			chained = op.precedence
		}

		const m = lhs.precede()
		p.bump()
		p.descend(() => parseBinary(p, rightOperandPrecedence(op)))
		lhs = m.complete(NodeKind.BinaryOp)
	}

	return lhs
}

function parseOperand(p: ParserState): CompletedMarker {
	const prefixForm = parsePrefixForm(p)
	if (prefixForm !== null) return prefixForm

	if (PREFIX_OPERATORS.has(p.kindAt(0))) {
		const m = p.start()
		p.bump()
		p.descend(() => parseBinary(p, Precedence.Unary + 1))
		return m.complete(NodeKind.UnaryOp)
	}

	return parseApplication(p)
}

// ============================================================================
// Application and selection
// ============================================================================

/** True when the current token can start a function argument. */
function atArgumentStart(p: ParserState): boolean {
	const kind = p.kindAt(0)
	if (kind === TokenKind.Let) return p.kindAt(1) === TokenKind.LBrace
	return isAtomStart(kind)
}

function parseApplication(p: ParserState): CompletedMarker {
	let lhs = parseSelect(p)
	while (atArgumentStart(p)) {
		const m = lhs.precede()
		parseSelect(p)
		lhs = m.complete(NodeKind.Apply)
	}
	return lhs
}

/**
 * `atom`, `atom.path` or `atom.path or default`.
 */
export function parseSelect(p: ParserState): CompletedMarker {
	return p.descend(() => {
		const atom = parseAtom(p)
		if (!p.at(TokenKind.Dot)) return atom

		const m = atom.precede()
		p.bump()
		parseAttrPath(p)
		if (p.at(TokenKind.Or)) {
			p.bump()
			parseSelect(p)
		}
		return m.complete(NodeKind.Select)
	})
}

// ============================================================================
// Atoms
// ============================================================================

function parseToken(p: ParserState, kind: NodeKind, retag?: TokenKind): CompletedMarker {
	const m = p.start()
	if (retag === undefined) p.bump()
	else p.bumpAs(retag)
	return m.complete(kind)
}

function parseParen(p: ParserState): CompletedMarker {
	const m = p.start()
	const open = p.bump()
	parseExpr(p)
	p.expectClosing(TokenKind.RParen, open)
	return m.complete(NodeKind.Paren)
}

function parseList(p: ParserState): CompletedMarker {
	const m = p.start()
	const open = p.bump()

	while (!p.at(TokenKind.RBracket) && !p.atEof()) {
		const kind = p.kindAt(0)
		if (atArgumentStart(p) || kind === TokenKind.Or) {
			parseSelect(p)
		} else if (isCloser(kind)) {
			break
		} else {
			p.recover(RecoveryContext.List)
		}
	}

	p.expectClosing(TokenKind.RBracket, open)
	return m.complete(NodeKind.List)
}

/** `{ ... }` and `rec { ... }` */
function parseAttrSet(p: ParserState): CompletedMarker {
	const m = p.start()
	let flags: NodeFlags = NodeFlags.None

	if (p.at(TokenKind.Rec)) {
		p.bump()
		flags |= NodeFlags.Recursive
		if (!p.at(TokenKind.LBrace)) {
			p.report('NXPARSE001', p.current(), { expected: "'{'", found: p.found() })
			return m.complete(NodeKind.Error)
		}
	}

	const open = p.bump()
	parseBindings(p, TokenKind.RBrace)
	p.expectClosing(TokenKind.RBrace, open)
	return m.complete(NodeKind.AttrSet, flags)
}

/** `let { bindings }`: the set's `body` attribute is the value. */
function parseLegacyLet(p: ParserState): CompletedMarker {
	const m = p.start()
	p.bump()
	const open = p.bump()
	parseBindings(p, TokenKind.RBrace)
	p.expectClosing(TokenKind.RBrace, open)
	return m.complete(NodeKind.LegacyLet)
}

/**
 * `${ expr }` where an expression was expected: one error, and the whole
 * interpolation up to its `}` kept in an Error node.
 */
function parseStrayInterpolation(p: ParserState): CompletedMarker {
	p.report('NXPARSE002', p.current(), { found: p.found() })
	const m = p.start()
	parseInterpolation(p)
	return m.complete(NodeKind.Error)
}

export function parseAtom(p: ParserState): CompletedMarker {
	const kind = p.kindAt(0)
	switch (kind) {
		case TokenKind.Identifier:
		case TokenKind.Or:
			return parseToken(p, NodeKind.Identifier, TokenKind.Identifier)
		case TokenKind.Integer:
		case TokenKind.Float:
		case TokenKind.Uri:
			return parseToken(p, NodeKind.Literal)
		case TokenKind.Path:
		case TokenKind.SearchPath:
			return parseToken(p, NodeKind.Path)
		case TokenKind.StringStart:
			return parseString(p)
		case TokenKind.IndentedStringStart:
			return parseIndentedString(p)
		case TokenKind.LParen:
			return parseParen(p)
		case TokenKind.LBracket:
			return parseList(p)
		case TokenKind.LBrace:
		case TokenKind.Rec:
			return parseAttrSet(p)
		case TokenKind.Let:
			if (p.kindAt(1) === TokenKind.LBrace) return parseLegacyLet(p)
			break
		case TokenKind.InterpolationStart:
			return parseStrayInterpolation(p)
		default:
			break
	}

	const args = { found: p.found() }
	if (isExpressionBoundary(kind)) return p.missing('NXPARSE002', args)
	return p.recover(RecoveryContext.Expression, 'NXPARSE002')
}
