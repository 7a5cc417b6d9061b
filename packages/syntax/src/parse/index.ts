/**
 * Grammar engine module.
 * Turns the token stream into start / token / finish events; the tree
 * builder assembles them into a syntax tree.
 */

import type { ParseContext } from '../core/context.ts'
import { buildTree } from '../tree/builder.ts'
import type { SyntaxTree } from '../tree/tree.ts'
import { parseEvents } from './parser.ts'

export { MAX_LOOKAHEAD, TokenCursor, type TokenSource, scannerSource, storeSource } from './cursor.ts'
export {
	CompletedMarker,
	type FinishEvent,
	Marker,
	type ParseEvent,
	type StartEvent,
	startMarker,
	type TokenEvent,
} from './events.ts'
export { parseEvents } from './parser.ts'
export {
	type Associativity,
	type BinaryOperator,
	INFIX_OPERATORS,
	type InfixOperator,
	PREFIX_OPERATORS,
	Precedence,
	rightOperandPrecedence,
	type UnaryOperator,
} from './precedence.ts'
export {
	isAtomStart,
	isExpressionBoundary,
	RECOVERY,
	RecoveryContext,
	type RecoveryRule,
} from './recovery.ts'
export { MAX_DEPTH } from './state.ts'

export interface ParseResult {
	succeeded: boolean
	tree: SyntaxTree
}

/**
 * Parse the context's source into a syntax tree. Never fails: errors are
 * reported into the context and kept in Error nodes.
 */
export function parse(context: ParseContext): ParseResult {
	const tree = buildTree(context, parseEvents(context))
	return { succeeded: !context.hasErrors(), tree }
}
