/**
 * String values of String and IndentedString nodes.
 *
 * Escapes are decoded and indented strings lose their common indentation:
 * - a first line holding only spaces is dropped
 * - a last line holding only spaces is dropped
 * - the smallest indentation among lines with content is removed from
 *   every line; escapes and interpolations count as content
 */

import { type NodeId, NodeKind } from '../core/nodes.ts'
import { TokenKind } from '../core/tokens.ts'
import type { SyntaxTree } from './tree.ts'

export type StringPart =
	| { readonly type: 'text'; readonly text: string }
	| { readonly type: 'interpolation'; readonly node: NodeId }

const ESCAPES: Readonly<Record<string, string>> = {
	n: '\n',
	r: '\r',
	t: '\t',
}

function decodeEscape(escaped: string): string {
	return ESCAPES[escaped] ?? escaped
}

/** `\x` in a double-quoted string. */
function decodeStringEscape(text: string): string {
	return decodeEscape(text.slice(1))
}

/** `'''`, `''$` and `''\x` in an indented string. */
function decodeIndentedEscape(text: string): string {
	if (text === "'''") return "''"
	if (text === "''$") return '$'
	return decodeEscape(text.slice(3))
}

function pushText(parts: StringPart[], text: string): void {
	if (text === '') return
	const last = parts.at(-1)
	if (last?.type === 'text') {
		parts[parts.length - 1] = { text: last.text + text, type: 'text' }
	} else {
		parts.push({ text, type: 'text' })
	}
}

function quotedParts(tree: SyntaxTree, id: NodeId): StringPart[] {
	const parts: StringPart[] = []
	for (const element of tree.children(id)) {
		if (element.type === 'node') {
			parts.push({ node: element.id, type: 'interpolation' })
			continue
		}
		const kind = tree.tokenKind(element.id)
		const text = tree.tokenText(element.id)
		if (kind === TokenKind.StringFragment) pushText(parts, text)
		else if (kind === TokenKind.StringEscape) pushText(parts, decodeStringEscape(text))
	}
	return parts
}

// ============================================================================
// Indented strings
// ============================================================================

/**
 * One piece of an indented string line. Only `raw` text can be
 * indentation; escapes and interpolations are always content.
 */
type Piece =
	| { readonly type: 'raw'; readonly text: string }
	| { readonly type: 'escape'; readonly text: string }
	| { readonly type: 'interpolation'; readonly node: NodeId }

interface Line {
	readonly pieces: Piece[]
	newline: boolean
}

function splitLines(tree: SyntaxTree, id: NodeId): Line[] {
	const lines: Line[] = [{ newline: false, pieces: [] }]
	const current = (): Line => {
		const line = lines.at(-1)
		if (line === undefined) throw new Error('No current line')
		return line
	}

	for (const element of tree.children(id)) {
		if (element.type === 'node') {
			current().pieces.push({ node: element.id, type: 'interpolation' })
			continue
		}
		const kind = tree.tokenKind(element.id)
		const text = tree.tokenText(element.id)
		if (kind === TokenKind.IndentedStringEscape) {
			current().pieces.push({ text: decodeIndentedEscape(text), type: 'escape' })
		} else if (kind === TokenKind.IndentedStringFragment) {
			const segments = text.split('\n')
			segments.forEach((segment, i) => {
				if (i > 0) {
					current().newline = true
					lines.push({ newline: false, pieces: [] })
				}
				if (segment !== '') current().pieces.push({ text: segment, type: 'raw' })
			})
		}
	}
	return lines
}

function leadingSpaces(text: string): number {
	let count = 0
	while (count < text.length && text.charCodeAt(count) === 32) count++
	return count
}

function isBlank(line: Line): boolean {
	return line.pieces.every(
		(piece) => piece.type === 'raw' && leadingSpaces(piece.text) === piece.text.length
	)
}

/** Leading spaces of a line, or null when the line has no content. */
function indentation(line: Line): number | null {
	let count = 0
	for (const piece of line.pieces) {
		if (piece.type !== 'raw') return count
		const spaces = leadingSpaces(piece.text)
		count += spaces
		if (spaces < piece.text.length) return count
	}
	return null
}

function stripLine(line: Line, amount: number): Piece[] {
	let remaining = amount
	const pieces: Piece[] = []
	for (const piece of line.pieces) {
		if (remaining > 0 && piece.type === 'raw') {
			const spaces = leadingSpaces(piece.text)
			const strip = Math.min(spaces, remaining)
			remaining = spaces < piece.text.length ? 0 : remaining - strip
			const text = piece.text.slice(strip)
			if (text !== '') pieces.push({ text, type: 'raw' })
			continue
		}
		remaining = 0
		pieces.push(piece)
	}
	return pieces
}

function indentedParts(tree: SyntaxTree, id: NodeId): StringPart[] {
	const lines = splitLines(tree, id)

	const first = lines[0]
	if (first !== undefined && first.newline && isBlank(first)) lines.shift()
	const last = lines.at(-1)
	if (last !== undefined && !last.newline && isBlank(last)) last.pieces.length = 0

	let minIndent = Number.POSITIVE_INFINITY
	for (const line of lines) {
		const indent = indentation(line)
		if (indent !== null) minIndent = Math.min(minIndent, indent)
	}
	const strip = Number.isFinite(minIndent) ? minIndent : 0

	const parts: StringPart[] = []
	for (const line of lines) {
		for (const piece of stripLine(line, strip)) {
			if (piece.type === 'interpolation') parts.push({ node: piece.node, type: 'interpolation' })
			else pushText(parts, piece.text)
		}
		if (line.newline) pushText(parts, '\n')
	}
	return parts
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Decoded parts of a String or IndentedString node: text runs and the
 * Interpolation nodes between them.
 */
export function stringParts(tree: SyntaxTree, id: NodeId): StringPart[] {
	switch (tree.kind(id)) {
		case NodeKind.String:
			return quotedParts(tree, id)
		case NodeKind.IndentedString:
			return indentedParts(tree, id)
		default:
			return []
	}
}

/** The value of a string without interpolations, null otherwise. */
export function staticStringValue(tree: SyntaxTree, id: NodeId): string | null {
	const kind = tree.kind(id)
	if (kind !== NodeKind.String && kind !== NodeKind.IndentedString) return null
	let value = ''
	for (const part of stringParts(tree, id)) {
		if (part.type === 'interpolation') return null
		value += part.text
	}
	return value
}
