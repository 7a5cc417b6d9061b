/**
 * Syntax node storage using dense arrays with integer IDs.
 * Nodes are stored in postorder - children precede their parent.
 * This enables O(1) child range lookup via subtreeSize.
 */

import type { TokenId } from './tokens.ts'

/**
 * Node kinds - one per grammar production.
 *
 * - 100-149: expressions
 * - 150-199: sub-expression structure (paths, bindings, parameters)
 * - 254-255: error and root
 */
export const NodeKind = {
	Apply: 114,
	Assert: 111,
	AttrPath: 151,
	AttrSet: 107,
	BinaryOp: 118,
	Binding: 152,
	Error: 254,
	HasAttr: 116,
	Identifier: 100,
	IfThenElse: 112,
	IndentedString: 104,
	Inherit: 153,
	InheritFrom: 154,
	Interpolation: 150,
	Lambda: 113,
	LegacyLet: 109,
	LetIn: 108,
	List: 106,
	Literal: 101,
	Paren: 105,
	Path: 102,
	PatternField: 157,
	PatternParam: 156,
	Root: 255,
	Select: 115,
	SimpleParam: 155,
	String: 103,
	UnaryOp: 117,
	With: 110,
} as const

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind]

const NODE_KIND_NAMES: ReadonlyMap<NodeKind, string> = new Map(
	Object.entries(NodeKind).map(([name, kind]): [NodeKind, string] => [kind, name])
)

export function nodeKindName(kind: NodeKind): string {
	return NODE_KIND_NAMES.get(kind) ?? `Node(${kind})`
}

/**
 * Bit flags carried by a node.
 */
export const NodeFlags = {
	/** PatternParam: `...` accepts unlisted attributes */
	Ellipsis: 2,
	None: 0,
	/** AttrSet: `rec { ... }` */
	Recursive: 1,
} as const

export type NodeFlags = number

/**
 * Branded type for node IDs.
 * Provides type safety while remaining a plain number at runtime.
 */
export type NodeId = number & { readonly __brand: 'NodeId' }

export function nodeId(n: number): NodeId {
	return n as NodeId
}

/**
 * Range of node IDs for child access.
 */
export interface NodeIdRange {
	readonly start: NodeId
	readonly count: number
}

/**
 * A single syntax node - fixed size, no pointers.
 *
 * subtreeSize encodes tree structure:
 * - For leaf nodes: subtreeSize = 1
 * - For parent nodes: subtreeSize = 1 + sum of children's subtreeSizes
 *
 * The node covers the significant tokens `[firstToken, endToken)` of the
 * flat token store (trivia between them included); `endToken` is one past
 * its last significant token. A zero-width node has
 * `firstToken === endToken`, one past the significant token before it.
 */
export interface SyntaxNodeData {
	readonly kind: NodeKind
	readonly flags: NodeFlags
	readonly subtreeSize: number
	readonly firstToken: TokenId
	readonly endToken: TokenId
}

/**
 * Dense array storage for syntax nodes (postorder).
 * Append-only while the tree is being built.
 */
export class NodeStore {
	private readonly nodes: SyntaxNodeData[] = []

	add(node: SyntaxNodeData): NodeId {
		const id = nodeId(this.nodes.length)
		this.nodes.push(node)
		return id
	}

	get(id: NodeId): SyntaxNodeData {
		const node = this.nodes[id]
		if (node === undefined) {
			throw new Error(`Invalid NodeId: ${id}`)
		}
		return node
	}

	count(): number {
		return this.nodes.length
	}

	isValid(id: NodeId): boolean {
		return id >= 0 && id < this.nodes.length
	}

	/**
	 * Get the range of descendant node IDs.
	 * In postorder storage, descendants are the (subtreeSize - 1) nodes
	 * immediately preceding this node.
	 */
	getChildRange(id: NodeId): NodeIdRange {
		const node = this.get(id)
		const childCount = node.subtreeSize - 1
		return {
			count: childCount,
			start: nodeId(id - childCount),
		}
	}

	/**
	 * Iterate over direct children of a node, rightmost first.
	 * Walks backwards from the end of the child range, skipping each
	 * child's subtree.
	 */
	*iterateChildrenReversed(id: NodeId): Generator<[NodeId, SyntaxNodeData]> {
		const { start, count } = this.getChildRange(id)
		if (count === 0) return

		let pos = start + count - 1

		while (pos >= start) {
			const child = this.nodes[pos]
			if (child === undefined) break
			yield [nodeId(pos), child]
			pos -= child.subtreeSize
		}
	}

	/** Direct children of a node in source order. */
	childNodes(id: NodeId): NodeId[] {
		const children: NodeId[] = []
		for (const [childId] of this.iterateChildrenReversed(id)) children.push(childId)
		return children.reverse()
	}

	/**
	 * Iterate over all nodes in a subtree (inclusive of root).
	 * Returns nodes in postorder (natural storage order).
	 */
	*iterateSubtree(id: NodeId): Generator<[NodeId, SyntaxNodeData]> {
		const node = this.get(id)
		const start = id - node.subtreeSize + 1
		for (let i = start; i <= id; i++) {
			const n = this.nodes[i]
			if (n !== undefined) yield [nodeId(i), n]
		}
	}

	*[Symbol.iterator](): Generator<[NodeId, SyntaxNodeData]> {
		for (let i = 0; i < this.nodes.length; i++) {
			const node = this.nodes[i]
			if (node !== undefined) yield [nodeId(i), node]
		}
	}
}

/** A node that covers no tokens, positioned before `next`. */
export function isZeroWidth(node: SyntaxNodeData): boolean {
	return node.firstToken === node.endToken
}
