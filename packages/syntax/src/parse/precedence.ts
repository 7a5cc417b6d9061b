/**
 * Operator binding table, lowest binding first. Prefix forms (`if`,
 * `assert`, `with`, `let`, lambdas) sit below all of these and are parsed
 * by dedicated rules.
 */

import { TokenKind } from '../core/tokens.ts'

export const Precedence = {
	Implication: 1,
	LogicalOr: 2,
	LogicalAnd: 3,
	Equality: 4,
	Comparison: 5,
	Update: 6,
	Additive: 7,
	Multiplicative: 8,
	Unary: 9,
	HasAttr: 10,
	Concat: 11,
	Application: 12,
	Select: 13,
} as const

export type Precedence = (typeof Precedence)[keyof typeof Precedence]

export type Associativity = 'left' | 'right' | 'none'

export type BinaryOperator =
	| 'Add'
	| 'And'
	| 'Concat'
	| 'Divide'
	| 'Equal'
	| 'Greater'
	| 'GreaterEqual'
	| 'Implication'
	| 'Less'
	| 'LessEqual'
	| 'Multiply'
	| 'NotEqual'
	| 'Or'
	| 'Subtract'
	| 'Update'

export type UnaryOperator = 'Negate' | 'Not'

export interface InfixOperator {
	readonly operator: BinaryOperator
	readonly precedence: Precedence
	readonly associativity: Associativity
}

function infix(
	operator: BinaryOperator,
	precedence: Precedence,
	associativity: Associativity
): InfixOperator {
	return { associativity, operator, precedence }
}

export const INFIX_OPERATORS: ReadonlyMap<TokenKind, InfixOperator> = new Map<TokenKind, InfixOperator>([
	[TokenKind.Implication, infix('Implication', Precedence.Implication, 'right')],
	[TokenKind.OrOr, infix('Or', Precedence.LogicalOr, 'left')],
	[TokenKind.And, infix('And', Precedence.LogicalAnd, 'left')],
	[TokenKind.Equal, infix('Equal', Precedence.Equality, 'none')],
	[TokenKind.NotEqual, infix('NotEqual', Precedence.Equality, 'none')],
	[TokenKind.Less, infix('Less', Precedence.Comparison, 'none')],
	[TokenKind.LessEqual, infix('LessEqual', Precedence.Comparison, 'none')],
	[TokenKind.Greater, infix('Greater', Precedence.Comparison, 'none')],
	[TokenKind.GreaterEqual, infix('GreaterEqual', Precedence.Comparison, 'none')],
	[TokenKind.Update, infix('Update', Precedence.Update, 'right')],
	[TokenKind.Plus, infix('Add', Precedence.Additive, 'left')],
	[TokenKind.Minus, infix('Subtract', Precedence.Additive, 'left')],
	[TokenKind.Star, infix('Multiply', Precedence.Multiplicative, 'left')],
	[TokenKind.Slash, infix('Divide', Precedence.Multiplicative, 'left')],
	[TokenKind.Concat, infix('Concat', Precedence.Concat, 'right')],
])

export const PREFIX_OPERATORS: ReadonlyMap<TokenKind, UnaryOperator> = new Map<TokenKind, UnaryOperator>([
	[TokenKind.Minus, 'Negate'],
	[TokenKind.Not, 'Not'],
])

/** Minimum precedence for the right operand of an infix operator. */
export function rightOperandPrecedence(op: InfixOperator): number {
	return op.associativity === 'right' ? op.precedence : op.precedence + 1
}
