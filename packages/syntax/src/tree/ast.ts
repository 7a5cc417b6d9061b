/**
 * Typed views over syntax nodes.
 *
 * The tree itself is untyped (kind + children); these accessors read the
 * shapes the grammar engine produces. They return null on nodes of the
 * wrong kind and skip Error children rather than throwing.
 */

import { NodeFlags, type NodeId, NodeKind } from '../core/nodes.ts'
import { type TokenId, TokenKind } from '../core/tokens.ts'
import {
	type BinaryOperator,
	INFIX_OPERATORS,
	PREFIX_OPERATORS,
	type UnaryOperator,
} from '../parse/precedence.ts'
import type { SyntaxTree } from './tree.ts'

// ============================================================================
// Identifiers and operators
// ============================================================================

/** The name of an Identifier node. */
export function identifierName(tree: SyntaxTree, id: NodeId): string | null {
	if (tree.kind(id) !== NodeKind.Identifier) return null
	const [token] = tree.childTokens(id)
	return token === undefined ? null : tree.tokenText(token)
}

function operatorToken(tree: SyntaxTree, id: NodeId): TokenId | null {
	return tree.childTokens(id)[0] ?? null
}

export function binaryOperator(tree: SyntaxTree, id: NodeId): BinaryOperator | null {
	if (tree.kind(id) !== NodeKind.BinaryOp) return null
	const token = operatorToken(tree, id)
	if (token === null) return null
	return INFIX_OPERATORS.get(tree.tokenKind(token))?.operator ?? null
}

export function unaryOperator(tree: SyntaxTree, id: NodeId): UnaryOperator | null {
	if (tree.kind(id) !== NodeKind.UnaryOp) return null
	const token = operatorToken(tree, id)
	if (token === null) return null
	return PREFIX_OPERATORS.get(tree.tokenKind(token)) ?? null
}

/** Left and right operands of a BinaryOp, `[operand]` for a UnaryOp. */
export function operands(tree: SyntaxTree, id: NodeId): NodeId[] {
	const kind = tree.kind(id)
	if (kind !== NodeKind.BinaryOp && kind !== NodeKind.UnaryOp) return []
	return tree.childNodes(id)
}

// ============================================================================
// Lambdas
// ============================================================================

export interface PatternFieldView {
	readonly node: NodeId
	readonly name: string
	/** The default expression after `?`, null for a required field */
	readonly defaultValue: NodeId | null
}

export type LambdaParam =
	| { readonly kind: 'simple'; readonly node: NodeId; readonly name: string }
	| {
			readonly kind: 'pattern'
			readonly node: NodeId
			readonly fields: readonly PatternFieldView[]
			readonly ellipsis: boolean
			/** `args` in `args@{ ... }` or `{ ... }@args` */
			readonly boundName: string | null
	  }

function firstIdentifierToken(tree: SyntaxTree, id: NodeId): string | null {
	const token = tree.childTokens(id).find((t) => tree.tokenKind(t) === TokenKind.Identifier)
	return token === undefined ? null : tree.tokenText(token)
}

function patternField(tree: SyntaxTree, id: NodeId): PatternFieldView {
	return {
		defaultValue: tree.childNodes(id)[0] ?? null,
		name: firstIdentifierToken(tree, id) ?? '',
		node: id,
	}
}

export function lambdaParam(tree: SyntaxTree, id: NodeId): LambdaParam | null {
	if (tree.kind(id) !== NodeKind.Lambda) return null
	const [param] = tree.childNodes(id)
	if (param === undefined) return null

	switch (tree.kind(param)) {
		case NodeKind.SimpleParam:
			return { kind: 'simple', name: firstIdentifierToken(tree, param) ?? '', node: param }
		case NodeKind.PatternParam:
			return {
				boundName: firstIdentifierToken(tree, param),
				ellipsis: tree.hasFlag(param, NodeFlags.Ellipsis),
				fields: tree
					.childNodes(param)
					.filter((child) => tree.kind(child) === NodeKind.PatternField)
					.map((field) => patternField(tree, field)),
				kind: 'pattern',
				node: param,
			}
		default:
			return null
	}
}

export function lambdaBody(tree: SyntaxTree, id: NodeId): NodeId | null {
	if (tree.kind(id) !== NodeKind.Lambda) return null
	const children = tree.childNodes(id)
	return children.length > 1 ? (children.at(-1) ?? null) : null
}

// ============================================================================
// Attribute sets and bindings
// ============================================================================

export type AttrSegment =
	| { readonly type: 'name'; readonly name: string }
	| { readonly type: 'string'; readonly node: NodeId }
	| { readonly type: 'dynamic'; readonly node: NodeId }
	| { readonly type: 'error'; readonly node: NodeId }

/** Segments of an AttrPath node. */
export function attrPathSegments(tree: SyntaxTree, id: NodeId): AttrSegment[] {
	if (tree.kind(id) !== NodeKind.AttrPath) return []
	const segments: AttrSegment[] = []
	for (const element of tree.children(id)) {
		if (element.type === 'token') {
			if (tree.tokenKind(element.id) === TokenKind.Identifier) {
				segments.push({ name: tree.tokenText(element.id), type: 'name' })
			}
			continue
		}
		switch (tree.kind(element.id)) {
			case NodeKind.String:
				segments.push({ node: element.id, type: 'string' })
				break
			case NodeKind.Interpolation:
				segments.push({ node: element.id, type: 'dynamic' })
				break
			default:
				segments.push({ node: element.id, type: 'error' })
		}
	}
	return segments
}

export function bindingPath(tree: SyntaxTree, id: NodeId): AttrSegment[] {
	if (tree.kind(id) !== NodeKind.Binding) return []
	const path = tree.childOfKind(id, NodeKind.AttrPath)
	return path === null ? [] : attrPathSegments(tree, path)
}

/** The value expression of a Binding, null when it is missing. */
export function bindingValue(tree: SyntaxTree, id: NodeId): NodeId | null {
	if (tree.kind(id) !== NodeKind.Binding) return null
	const [, value] = tree.childNodes(id)
	return value ?? null
}

/** Binding and Inherit children of an AttrSet, LetIn or LegacyLet. */
export function bindings(tree: SyntaxTree, id: NodeId): NodeId[] {
	return tree.childNodes(id).filter((child) => {
		const kind = tree.kind(child)
		return kind === NodeKind.Binding || kind === NodeKind.Inherit
	})
}

export function isRecursive(tree: SyntaxTree, id: NodeId): boolean {
	return tree.kind(id) === NodeKind.AttrSet && tree.hasFlag(id, NodeFlags.Recursive)
}

/** Plain names listed by an Inherit node. */
export function inheritedNames(tree: SyntaxTree, id: NodeId): string[] {
	if (tree.kind(id) !== NodeKind.Inherit) return []
	return tree
		.childTokens(id)
		.filter((token) => tree.tokenKind(token) === TokenKind.Identifier)
		.map((token) => tree.tokenText(token))
}

/** The `(expr)` source of `inherit (expr) ...`. */
export function inheritSource(tree: SyntaxTree, id: NodeId): NodeId | null {
	if (tree.kind(id) !== NodeKind.Inherit) return null
	const from = tree.childOfKind(id, NodeKind.InheritFrom)
	if (from === null) return null
	return tree.childNodes(from)[0] ?? null
}
