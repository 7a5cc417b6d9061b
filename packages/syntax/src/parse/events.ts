/**
 * Parser events. The grammar engine never builds nodes itself: it appends
 * start / token / finish events which the tree builder assembles later.
 *
 * A node's kind is only known when it completes, and an already completed
 * node can be wrapped by a new parent (`precede`), which is how binary
 * operators and applications take their left operand. The wrapping parent
 * is linked through `forwardParent`, a positive offset to its start event.
 */

import { NodeFlags, type NodeKind } from '../core/nodes.ts'
import type { TokenKind } from '../core/tokens.ts'

export interface StartEvent {
	readonly type: 'start'
	/** null until the marker is completed */
	kind: NodeKind | null
	flags: NodeFlags
	forwardParent: number | null
}

export interface TokenEvent {
	readonly type: 'token'
	/** Contextual kind: keywords and re-tagged identifiers as the grammar saw them */
	readonly kind: TokenKind
}

export interface FinishEvent {
	readonly type: 'finish'
}

export type ParseEvent = StartEvent | TokenEvent | FinishEvent

export function startMarker(events: ParseEvent[]): Marker {
	const position = events.length
	events.push({ flags: NodeFlags.None, forwardParent: null, kind: null, type: 'start' })
	return new Marker(events, position)
}

function startEventAt(events: readonly ParseEvent[], position: number): StartEvent {
	const event = events[position]
	if (event?.type !== 'start') {
		throw new Error(`No start event at ${position}`)
	}
	return event
}

/**
 * An open node.
 */
export class Marker {
	constructor(
		private readonly events: ParseEvent[],
		readonly position: number
	) {}

	complete(kind: NodeKind, flags: NodeFlags = NodeFlags.None): CompletedMarker {
		const start = startEventAt(this.events, this.position)
		start.kind = kind
		start.flags = flags
		this.events.push({ type: 'finish' })
		return new CompletedMarker(this.events, this.position, kind)
	}
}

/**
 * A finished node that can still be wrapped by a parent.
 */
export class CompletedMarker {
	constructor(
		private readonly events: ParseEvent[],
		readonly position: number,
		readonly kind: NodeKind
	) {}

	precede(): Marker {
		const parent = startMarker(this.events)
		startEventAt(this.events, this.position).forwardParent = parent.position - this.position
		return parent
	}
}
