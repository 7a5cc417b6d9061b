/**
 * Syntax tree module.
 * Assembles parser events into an immutable, lossless tree and provides
 * typed views over it.
 */

export {
	type AttrSegment,
	attrPathSegments,
	binaryOperator,
	bindingPath,
	bindings,
	bindingValue,
	identifierName,
	inheritedNames,
	inheritSource,
	isRecursive,
	type LambdaParam,
	lambdaBody,
	lambdaParam,
	operands,
	type PatternFieldView,
	unaryOperator,
} from './ast.ts'
export { buildTree } from './builder.ts'
export { debugTree } from './debug.ts'
export { type StringPart, staticStringValue, stringParts } from './strings.ts'
export { type ClassifiedToken, type SyntaxElement, SyntaxTree } from './tree.ts'
