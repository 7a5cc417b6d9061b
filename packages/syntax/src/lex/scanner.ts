import type { ParseContext } from '../core/context.ts'
import type { DiagnosticArgs, DiagnosticCode } from '../core/diagnostics.ts'
import { type Span, type Token, TokenKind } from '../core/tokens.ts'
import { LexicalMode, type ModeFrame, ModeStack } from './modes.ts'

/**
 * Receives scanner diagnostics. Scanning never stops on an error.
 */
export type ScanReporter = (code: DiagnosticCode, span: Span, args?: DiagnosticArgs) => void

const PATH_CHAR = '[A-Za-z0-9._+-]'

interface PatternRule {
	readonly kind: TokenKind
	readonly pattern: RegExp
}

/**
 * Identifier-shaped and literal tokens, tried together with the operator
 * table; the longest match wins and ties go to the earlier rule.
 */
const PATTERN_RULES: readonly PatternRule[] = [
	{
		kind: TokenKind.Uri,
		pattern: /[A-Za-z][A-Za-z0-9+.-]*:[A-Za-z0-9%/?:@&=+$,_.!~*'-]+/y,
	},
	{ kind: TokenKind.Path, pattern: new RegExp(`${PATH_CHAR}*(?:/${PATH_CHAR}+)+/?`, 'y') },
	{ kind: TokenKind.Path, pattern: new RegExp(`~(?:/${PATH_CHAR}+)+/?`, 'y') },
	{ kind: TokenKind.SearchPath, pattern: new RegExp(`<${PATH_CHAR}+(?:/${PATH_CHAR}+)*>`, 'y') },
	{ kind: TokenKind.Float, pattern: /(?:[1-9][0-9]*\.[0-9]*|0?\.[0-9]+)(?:[Ee][+-]?[0-9]+)?/y },
	{ kind: TokenKind.Integer, pattern: /[0-9]+/y },
	{ kind: TokenKind.Identifier, pattern: /[A-Za-z_][A-Za-z0-9_'-]*/y },
]

/**
 * Operators and punctuation, longest spelling first. Braces are handled by
 * the mode stack, not this table.
 */
export const OPERATORS: ReadonlyArray<readonly [string, TokenKind]> = [
	['...', TokenKind.Ellipsis],
	['!=', TokenKind.NotEqual],
	['&&', TokenKind.And],
	['++', TokenKind.Concat],
	['->', TokenKind.Implication],
	['//', TokenKind.Update],
	['<=', TokenKind.LessEqual],
	['==', TokenKind.Equal],
	['>=', TokenKind.GreaterEqual],
	['||', TokenKind.OrOr],
	['!', TokenKind.Not],
	['(', TokenKind.LParen],
	[')', TokenKind.RParen],
	['*', TokenKind.Star],
	['+', TokenKind.Plus],
	[',', TokenKind.Comma],
	['-', TokenKind.Minus],
	['.', TokenKind.Dot],
	['/', TokenKind.Slash],
	[':', TokenKind.Colon],
	[';', TokenKind.Semicolon],
	['<', TokenKind.Less],
	['=', TokenKind.Assign],
	['>', TokenKind.Greater],
	['?', TokenKind.Question],
	['@', TokenKind.At],
	['[', TokenKind.LBracket],
	[']', TokenKind.RBracket],
]

const UTF8_BOM = 0xfeff

function isWhitespaceCode(code: number): boolean {
	return code === 32 || code === 9 || code === 10 || code === 13
}

interface Match {
	readonly kind: TokenKind
	readonly end: number
}

function matchPattern(source: string, pos: number): Match | null {
	let best: Match | null = null
	for (const rule of PATTERN_RULES) {
		rule.pattern.lastIndex = pos
		if (rule.pattern.test(source)) {
			const end = rule.pattern.lastIndex
			if (best === null || end > best.end) best = { end, kind: rule.kind }
		}
	}
	return best
}

function matchOperator(source: string, pos: number): Match | null {
	for (const [spelling, kind] of OPERATORS) {
		if (source.startsWith(spelling, pos)) return { end: pos + spelling.length, kind }
	}
	return null
}

/** Length of the code point at `pos` (1 or 2 UTF-16 units). */
function codePointLength(source: string, pos: number): number {
	const code = source.codePointAt(pos)
	return code !== undefined && code > 0xffff ? 2 : 1
}

/**
 * Pull-based Nix scanner. Each `next()` call produces exactly one token;
 * after the input is exhausted every call returns a zero-width `Eof`.
 *
 * Never throws: unrecognized input becomes `Unknown` tokens, and strings,
 * comments or interpolations left open at end of input are closed with
 * zero-width tokens, each reported once.
 */
export class Scanner {
	private pos = 0
	private readonly modes = new ModeStack()
	private readonly pending: Token[] = []
	private finished = false

	constructor(
		private readonly source: string,
		private readonly report: ScanReporter = () => {}
	) {}

	/** Current mode stack depth; 1 once every string and interpolation has closed. */
	modeDepth(): number {
		return this.modes.depth()
	}

	next(): Token {
		const queued = this.pending.shift()
		if (queued !== undefined) return queued

		if (this.pos >= this.source.length) return this.finish()

		switch (this.modes.top().mode) {
			case LexicalMode.StringLiteral:
				return this.scanString()
			case LexicalMode.IndentedStringLiteral:
				return this.scanIndentedString()
			default:
				return this.scanCode()
		}
	}

	private token(kind: TokenKind, start: number, end: number): Token {
		this.pos = end
		return { end, kind, start, text: this.source.slice(start, end) }
	}

	// ===========================================================================
	// CODE
	// ===========================================================================

	private scanCode(): Token {
		const { source } = this
		const start = this.pos
		const code = source.charCodeAt(start)

		if (isWhitespaceCode(code) || (start === 0 && code === UTF8_BOM)) {
			return this.scanWhitespace(start)
		}
		if (code === 35 /* # */) {
			return this.scanLineComment(start)
		}
		if (source.startsWith('/*', start)) {
			return this.scanBlockComment(start)
		}
		if (code === 34 /* " */) {
			this.modes.push(LexicalMode.StringLiteral, start)
			return this.token(TokenKind.StringStart, start, start + 1)
		}
		if (source.startsWith("''", start)) {
			this.modes.push(LexicalMode.IndentedStringLiteral, start)
			return this.token(TokenKind.IndentedStringStart, start, start + 2)
		}
		if (source.startsWith('${', start)) {
			this.modes.push(LexicalMode.Interpolation, start)
			return this.token(TokenKind.InterpolationStart, start, start + 2)
		}
		if (code === 123 /* { */) {
			this.modes.top().braceDepth++
			return this.token(TokenKind.LBrace, start, start + 1)
		}
		if (code === 125 /* } */) {
			return this.scanClosingBrace(start)
		}

		const match = this.matchToken(start)
		if (match !== null) return this.token(match.kind, start, match.end)
		return this.scanUnknown(start)
	}

	private matchToken(pos: number): Match | null {
		const pattern = matchPattern(this.source, pos)
		const operator = matchOperator(this.source, pos)
		if (pattern === null) return operator
		if (operator === null) return pattern
		return operator.end > pattern.end ? operator : pattern
	}

	private scanWhitespace(start: number): Token {
		let end = start + 1
		while (end < this.source.length && isWhitespaceCode(this.source.charCodeAt(end))) end++
		return this.token(TokenKind.Whitespace, start, end)
	}

	private scanLineComment(start: number): Token {
		let end = start + 1
		while (end < this.source.length) {
			const code = this.source.charCodeAt(end)
			if (code === 10 || code === 13) break
			end++
		}
		return this.token(TokenKind.LineComment, start, end)
	}

	private scanBlockComment(start: number): Token {
		const close = this.source.indexOf('*/', start + 2)
		if (close === -1) {
			this.report('NXLEX004', { end: start + 2, start })
			return this.token(TokenKind.BlockComment, start, this.source.length)
		}
		return this.token(TokenKind.BlockComment, start, close + 2)
	}

	private scanClosingBrace(start: number): Token {
		const frame = this.modes.top()
		if (frame.braceDepth > 0) {
			frame.braceDepth--
			return this.token(TokenKind.RBrace, start, start + 1)
		}
		if (frame.mode === LexicalMode.Interpolation) {
			this.modes.pop()
			return this.token(TokenKind.InterpolationEnd, start, start + 1)
		}
		this.report('NXLEX006', { end: start + 1, start })
		return this.token(TokenKind.RBrace, start, start + 1)
	}

	/** True when some token other than `Unknown` can begin at `pos`. */
	private startsToken(pos: number): boolean {
		const code = this.source.charCodeAt(pos)
		if (isWhitespaceCode(code)) return true
		// # " { }
		if (code === 35 || code === 34 || code === 123 || code === 125) return true
		if (
			this.source.startsWith("''", pos) ||
			this.source.startsWith('${', pos) ||
			this.source.startsWith('/*', pos)
		) {
			return true
		}
		return this.matchToken(pos) !== null
	}

	private scanUnknown(start: number): Token {
		let end = start + codePointLength(this.source, start)
		while (end < this.source.length && !this.startsToken(end)) {
			end += codePointLength(this.source, end)
		}
		const token = this.token(TokenKind.Unknown, start, end)
		this.report('NXLEX001', token, { text: token.text })
		return token
	}

	// ===========================================================================
	// STRINGS
	// ===========================================================================

	private scanString(): Token {
		const { source } = this
		const start = this.pos
		const code = source.charCodeAt(start)

		if (code === 34 /* " */) {
			this.modes.pop()
			return this.token(TokenKind.StringEnd, start, start + 1)
		}
		if (code === 92 /* \ */) {
			const end = start + 1 < source.length ? start + 1 + codePointLength(source, start + 1) : start + 1
			return this.token(TokenKind.StringEscape, start, end)
		}
		if (source.startsWith('${', start)) {
			this.modes.push(LexicalMode.Interpolation, start)
			return this.token(TokenKind.InterpolationStart, start, start + 2)
		}

		let end = start
		while (end < source.length) {
			const c = source.charCodeAt(end)
			if (c === 34 || c === 92) break
			if (c === 36 /* $ */) {
				const after = source.charCodeAt(end + 1)
				if (after === 123) break
				if (after === 36) {
					end += 2
					continue
				}
			}
			end++
		}
		return this.token(TokenKind.StringFragment, start, end)
	}

	private scanIndentedString(): Token {
		const { source } = this
		const start = this.pos

		if (source.startsWith("''", start)) {
			const after = source.charCodeAt(start + 2)
			// ''' and ''$
			if (after === 39 || after === 36) {
				return this.token(TokenKind.IndentedStringEscape, start, start + 3)
			}
			// ''\x
			if (after === 92) {
				const escaped = start + 3
				const end = escaped < source.length ? escaped + codePointLength(source, escaped) : escaped
				return this.token(TokenKind.IndentedStringEscape, start, end)
			}
			this.modes.pop()
			return this.token(TokenKind.IndentedStringEnd, start, start + 2)
		}
		if (source.startsWith('${', start)) {
			this.modes.push(LexicalMode.Interpolation, start)
			return this.token(TokenKind.InterpolationStart, start, start + 2)
		}

		let end = start
		while (end < source.length) {
			if (source.startsWith("''", end)) break
			if (source.charCodeAt(end) === 36 /* $ */) {
				const after = source.charCodeAt(end + 1)
				if (after === 123) break
				if (after === 36) {
					end += 2
					continue
				}
			}
			end++
		}
		return this.token(TokenKind.IndentedStringFragment, start, end)
	}

	// ===========================================================================
	// END OF INPUT
	// ===========================================================================

	private closeFrame(frame: ModeFrame): void {
		const end = this.source.length
		const synthetic = (kind: TokenKind): Token => ({ end, kind, start: end, text: '' })
		switch (frame.mode) {
			case LexicalMode.StringLiteral:
				this.report('NXLEX002', { end: frame.start + 1, start: frame.start })
				this.pending.push(synthetic(TokenKind.StringEnd))
				break
			case LexicalMode.IndentedStringLiteral:
				this.report('NXLEX003', { end: frame.start + 2, start: frame.start })
				this.pending.push(synthetic(TokenKind.IndentedStringEnd))
				break
			case LexicalMode.Interpolation:
				this.report('NXLEX005', { end: frame.start + 2, start: frame.start })
				this.pending.push(synthetic(TokenKind.InterpolationEnd))
				break
			default:
				break
		}
	}

	private finish(): Token {
		const end = this.source.length
		if (!this.finished) {
			this.finished = true
			for (let frame = this.modes.pop(); frame !== null; frame = this.modes.pop()) {
				this.closeFrame(frame)
			}
			this.pending.push({ end, kind: TokenKind.Eof, start: end, text: '' })
			const first = this.pending.shift()
			if (first !== undefined) return first
		}
		return { end, kind: TokenKind.Eof, start: end, text: '' }
	}
}

/**
 * Lazily scan a source text. The sequence ends with one `Eof` token.
 */
export function* scan(source: string, report?: ScanReporter): Generator<Token, void, undefined> {
	const scanner = new Scanner(source, report)
	while (true) {
		const token = scanner.next()
		yield token
		if (token.kind === TokenKind.Eof) return
	}
}

export interface TokenizeResult {
	succeeded: boolean
	/** Number of tokens added, `Eof` included */
	count: number
}

/**
 * Scan the whole source into `context.tokens`, reporting into the context.
 */
export function tokenize(context: ParseContext): TokenizeResult {
	let count = 0
	for (const token of scan(context.source, (code, span, args) => context.emit(code, span, args))) {
		context.tokens.add(token)
		count++
	}
	return { count, succeeded: !context.hasErrors() }
}
