/**
 * nixtree syntax: lossless Nix parsing with error recovery.
 *
 * - Pull-based scanner with an explicit lexical mode stack
 * - Event-emitting grammar engine with table-driven recovery
 * - Postorder tree storage with O(1) child range lookup
 * - One ParseContext per parse; nothing shared between parses
 */

import { ParseContext } from './core/context.ts'
import type { Diagnostic } from './core/diagnostics.ts'
import type { Token } from './core/tokens.ts'
import { parse } from './parse/index.ts'
import type { SyntaxTree } from './tree/tree.ts'

export {
	type Diagnostic,
	type DiagnosticCode,
	DiagnosticSeverity,
	describeTokenKind,
	getDiagnostic,
	isZeroWidth,
	LineIndex,
	type NodeId,
	NodeFlags,
	NodeKind,
	NodeStore,
	nodeId,
	nodeKindName,
	ParseContext,
	type Span,
	type SyntaxNodeData,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
	tokenKindName,
} from './core/index.ts'
export {
	commentBody,
	isComment,
	isKeyword,
	isTrivia,
	KEYWORDS,
	keywordKind,
	LexicalMode,
	Scanner,
	scan,
	type TokenizeResult,
	tokenize,
} from './lex/index.ts'
export {
	type BinaryOperator,
	MAX_DEPTH,
	type ParseEvent,
	type ParseResult,
	parse,
	parseEvents,
	RECOVERY,
	RecoveryContext,
	type UnaryOperator,
} from './parse/index.ts'
export {
	type AttrSegment,
	attrPathSegments,
	binaryOperator,
	bindingPath,
	bindings,
	bindingValue,
	buildTree,
	type ClassifiedToken,
	debugTree,
	identifierName,
	inheritedNames,
	inheritSource,
	isRecursive,
	type LambdaParam,
	lambdaBody,
	lambdaParam,
	operands,
	type PatternFieldView,
	type StringPart,
	type SyntaxElement,
	SyntaxTree,
	staticStringValue,
	stringParts,
	unaryOperator,
} from './tree/index.ts'

export interface ParseOptions {
	/** Name shown in formatted diagnostics */
	filename?: string
}

export interface ParseSourceResult {
	context: ParseContext
	tree: SyntaxTree
	tokens: readonly Token[]
	diagnostics: readonly Diagnostic[]
}

/**
 * Parse a Nix source text. Always returns a tree; problems are reported
 * as diagnostics in source order.
 *
 * @example
 * ```ts
 * const { tree, diagnostics } = parseSource('{ a = 1; }')
 * tree.reconstruct() // '{ a = 1; }'
 * ```
 */
export function parseSource(source: string, options: ParseOptions = {}): ParseSourceResult {
	const context = new ParseContext(source, options.filename)
	const { tree } = parse(context)
	return {
		context,
		diagnostics: context.getDiagnostics(),
		tokens: context.tokens.toArray(),
		tree,
	}
}
