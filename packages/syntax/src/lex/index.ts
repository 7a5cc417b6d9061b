/**
 * Lexical analysis module.
 * Scans source text into a lazy token sequence, trivia included.
 */

export { isKeyword, KEYWORDS, keywordKind } from './keywords.ts'
export { LexicalMode, type ModeFrame, ModeStack } from './modes.ts'
export {
	OPERATORS,
	type ScanReporter,
	Scanner,
	scan,
	type TokenizeResult,
	tokenize,
} from './scanner.ts'
export {
	commentBody,
	containsNewline,
	isComment,
	isTrivia,
	leadingTriviaStarts,
	TRIVIA_KINDS,
} from './trivia.ts'
