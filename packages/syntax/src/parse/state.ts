/**
 * Grammar engine state and token-level primitives.
 *
 * This module contains everything the grammar rules share:
 * - Contextual token kinds (keywords are re-tagged here, not in the scanner)
 * - Consuming tokens into the event stream
 * - Expecting tokens and reporting what is missing
 * - Declarative error recovery
 * - The nesting depth guard
 *
 * This is Layer 1 - the grammar rules in expressions.ts, bindings.ts,
 * params.ts and strings.ts build on it.
 */

import type { ParseContext } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import { NodeKind } from '../core/nodes.ts'
import { describeTokenKind, type Span, type Token, TokenKind } from '../core/tokens.ts'
import { keywordKind } from '../lex/keywords.ts'
import type { TokenCursor } from './cursor.ts'
import { type CompletedMarker, type Marker, type ParseEvent, startMarker } from './events.ts'
import { RECOVERY, type RecoveryContext } from './recovery.ts'

/**
 * Nesting budget shared by every recursive rule. Each nested expression,
 * operand and selection spends one level.
 */
export const MAX_DEPTH = 512

export class ParserState {
	readonly events: ParseEvent[] = []

	private depth = 0

	/** Set once the depth limit was hit; no further diagnostics after that. */
	private exhausted = false

	constructor(
		readonly context: ParseContext,
		private readonly cursor: TokenCursor
	) {}

	// ===========================================================================
	// LOOKAHEAD
	// ===========================================================================

	/**
	 * Kind of the n-th significant token ahead, keywords re-tagged.
	 * `or` comes back as `Or`; rules that take it as a name re-tag it again.
	 */
	kindAt(n = 0): TokenKind {
		const token = this.cursor.nth(n)
		if (token.kind !== TokenKind.Identifier) return token.kind
		return keywordKind(token.text) ?? TokenKind.Identifier
	}

	at(kind: TokenKind): boolean {
		return this.kindAt(0) === kind
	}

	atEof(): boolean {
		return this.at(TokenKind.Eof)
	}

	current(): Token {
		return this.cursor.nth(0)
	}

	/** Zero-width span right after the last consumed token. */
	gap(): Span {
		const end = this.cursor.previous()?.end ?? 0
		return { end, start: end }
	}

	// ===========================================================================
	// EVENTS
	// ===========================================================================

	start(): Marker {
		return startMarker(this.events)
	}

	/** Consume the current token under its contextual kind. */
	bump(): Token {
		return this.bumpAs(this.kindAt(0))
	}

	/** Consume the current token, recording it under `kind`. */
	bumpAs(kind: TokenKind): Token {
		const token = this.current()
		if (token.kind === TokenKind.Eof) return token
		this.events.push({ kind, type: 'token' })
		return this.cursor.shift().token
	}

	/** Record the end of input; only the root rule does this. */
	bumpEof(): void {
		this.events.push({ kind: TokenKind.Eof, type: 'token' })
	}

	// ===========================================================================
	// DIAGNOSTICS
	// ===========================================================================

	report(code: DiagnosticCode, span: Span, args?: DiagnosticArgs): void {
		if (this.exhausted) return
		this.context.emit(code, span, args)
	}

	/**
	 * Report at a token unless the scanner already reported it: an
	 * unrecognized run, or a `}` closing nothing.
	 */
	reportAtToken(code: DiagnosticCode, token: Token, args?: DiagnosticArgs): void {
		if (token.kind === TokenKind.Unknown) return
		if (token.kind === TokenKind.RBrace && this.context.hasDiagnostic('NXLEX006', token)) return
		this.report(code, token, args)
	}

	/**
	 * Describes the current token for `{found}`. The zero-width closers the
	 * scanner adds at end of input read as the end of input.
	 */
	found(): string {
		const token = this.current()
		if (token.start === token.end) return describeTokenKind(TokenKind.Eof)
		return describeTokenKind(this.kindAt(0))
	}

	/**
	 * Consume `kind` or report it missing at the end of the previous token.
	 */
	expect(kind: TokenKind): boolean {
		if (this.at(kind)) {
			this.bump()
			return true
		}
		this.report('NXPARSE003', this.gap(), { expected: describeTokenKind(kind) })
		return false
	}

	/**
	 * Consume the closing delimiter of `opener`. At end of input the
	 * opener itself is reported as unclosed.
	 */
	expectClosing(kind: TokenKind, opener: Token): boolean {
		if (this.at(kind)) {
			this.bump()
			return true
		}
		if (this.atEof()) {
			this.report('NXPARSE007', opener, {
				close: describeTokenKind(kind).slice(1, -1),
				open: opener.text,
			})
			return false
		}
		return this.expect(kind)
	}

	// ===========================================================================
	// RECOVERY
	// ===========================================================================

	/**
	 * Skip tokens into an Error node until the context's synchronization
	 * point. Always consumes the current token unless at end of input.
	 */
	recover(context: RecoveryContext, code: DiagnosticCode = 'NXPARSE001'): CompletedMarker {
		const rule = RECOVERY[context]
		this.reportAtToken(code, this.current(), { expected: rule.expected, found: this.found() })
		const m = this.start()
		while (!this.atEof()) {
			const kind = this.kindAt(0)
			this.bump()
			if (rule.stopAfter.has(kind) || rule.stopBefore.has(this.kindAt(0))) break
		}
		return m.complete(NodeKind.Error)
	}

	/**
	 * A missing expression: report it at the current token and leave a
	 * zero-width Error node.
	 */
	missing(code: DiagnosticCode, args: DiagnosticArgs): CompletedMarker {
		this.reportAtToken(code, this.current(), args)
		return this.start().complete(NodeKind.Error)
	}

	// ===========================================================================
	// DEPTH
	// ===========================================================================

	/**
	 * Run a recursive rule one level deeper. Past `MAX_DEPTH` the rest of
	 * the input is swallowed into a single Error node instead.
	 */
	descend(rule: () => CompletedMarker): CompletedMarker {
		if (this.depth >= MAX_DEPTH) return this.abandonRest()
		this.depth++
		const result = rule()
		this.depth--
		return result
	}

	private abandonRest(): CompletedMarker {
		this.report('NXPARSE008', this.current(), { limit: MAX_DEPTH })
		this.exhausted = true
		const m = this.start()
		while (!this.atEof()) this.bump()
		return m.complete(NodeKind.Error)
	}
}
