/**
 * Offset to line/column mapping over a source text.
 */

export interface LineColumn {
	/** 1-indexed */
	readonly line: number
	/** 1-indexed, in UTF-16 code units */
	readonly column: number
}

export class LineIndex {
	private readonly lineStarts: number[] = [0]

	constructor(private readonly source: string) {
		for (let i = 0; i < source.length; i++) {
			if (source.charCodeAt(i) === 10) this.lineStarts.push(i + 1)
		}
	}

	lineCount(): number {
		return this.lineStarts.length
	}

	position(offset: number): LineColumn {
		const clamped = Math.max(0, Math.min(offset, this.source.length))
		let low = 0
		let high = this.lineStarts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			if ((this.lineStarts[mid] ?? 0) <= clamped) low = mid
			else high = mid - 1
		}
		const lineStart = this.lineStarts[low] ?? 0
		return { column: clamped - lineStart + 1, line: low + 1 }
	}

	/** Text of a 1-indexed line without its line terminator. */
	lineText(line: number): string | undefined {
		const start = this.lineStarts[line - 1]
		if (start === undefined) return undefined
		const next = this.lineStarts[line]
		const end = next === undefined ? this.source.length : next - 1
		const text = this.source.slice(start, end)
		return text.endsWith('\r') ? text.slice(0, -1) : text
	}
}
