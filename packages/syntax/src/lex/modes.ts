/**
 * The scanner's lexical mode stack. Interpolation nests without limit
 * (`"${ "${ x }" }"`), so modes are an explicit stack, not recursion.
 */

export const LexicalMode = {
	Default: 0,
	IndentedStringLiteral: 2,
	Interpolation: 3,
	StringLiteral: 1,
} as const

export type LexicalMode = (typeof LexicalMode)[keyof typeof LexicalMode]

export interface ModeFrame {
	readonly mode: LexicalMode
	/** Offset of the token that opened the frame */
	readonly start: number
	/** Open `{` count inside a code frame */
	braceDepth: number
}

export class ModeStack {
	private readonly frames: ModeFrame[] = [{ braceDepth: 0, mode: LexicalMode.Default, start: 0 }]

	top(): ModeFrame {
		const frame = this.frames[this.frames.length - 1]
		if (frame === undefined) throw new Error('mode stack is empty')
		return frame
	}

	push(mode: LexicalMode, start: number): void {
		this.frames.push({ braceDepth: 0, mode, start })
	}

	/**
	 * Pop the top frame. The initial Default frame is never popped:
	 * returns null instead.
	 */
	pop(): ModeFrame | null {
		if (this.frames.length === 1) return null
		return this.frames.pop() ?? null
	}

	depth(): number {
		return this.frames.length
	}
}
