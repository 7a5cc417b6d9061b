/**
 * Core data structures for the Nix syntax front end.
 * Dense arrays with integer IDs, one context per parse.
 */

export { type Diagnostic, ParseContext } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	DiagnosticCollector,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
	SYNTAX_DIAGNOSTICS,
} from './diagnostics.ts'
export { type LineColumn, LineIndex } from './lines.ts'
export {
	isZeroWidth,
	type NodeId,
	type NodeIdRange,
	NodeFlags,
	NodeKind,
	NodeStore,
	nodeId,
	nodeKindName,
	type SyntaxNodeData,
} from './nodes.ts'
export {
	describeTokenKind,
	type Span,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
	tokenKindName,
} from './tokens.ts'
