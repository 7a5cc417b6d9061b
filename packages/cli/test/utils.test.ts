import assert from 'node:assert'
import { describe, it } from 'node:test'
import { parseSource } from '@nixtree/syntax'
import {
	buildJsonReport,
	formatReadError,
	formatSyntaxSummary,
	formatTokenLines,
	getErrorMessage,
	isNodeError,
} from '../src/utils.ts'

function errnoError(message: string, code: string): NodeJS.ErrnoException {
	return Object.assign(new Error(message), { code })
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(errnoError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const result = formatReadError('/path/to/default.nix', errnoError('no such file', 'ENOENT'))
		assert.strictEqual(result, '[NXCLI001] file not found: /path/to/default.nix')
	})

	it('should format other errors with generic message', () => {
		const result = formatReadError('/path/to/default.nix', errnoError('permission denied', 'EACCES'))
		assert.strictEqual(result, '[NXCLI002] cannot read file: permission denied')
	})

	it('should handle plain Error', () => {
		const result = formatReadError('/path/to/default.nix', new Error('unknown error'))
		assert.strictEqual(result, '[NXCLI002] cannot read file: unknown error')
	})
})

describe('formatSyntaxSummary', () => {
	it('should count the errors of a file', () => {
		assert.strictEqual(formatSyntaxSummary('a.nix', 2), '[NXCLI003] 2 syntax error(s) in a.nix')
	})
})

describe('formatTokenLines', () => {
	it('should list tokens with trivia and without Eof', () => {
		const { tree } = parseSource('x # c')
		assert.deepStrictEqual(formatTokenLines(tree), [
			'Identifier@0..1 "x"',
			'Whitespace@1..2 " "',
			'LineComment@2..5 "# c"',
		])
	})

	it('should show keywords by their role', () => {
		assert.deepStrictEqual(formatTokenLines(parseSource('or').tree), ['Identifier@0..2 "or"'])
		assert.deepStrictEqual(formatTokenLines(parseSource('with').tree), ['With@0..4 "with"'])
	})
})

describe('buildJsonReport', () => {
	it('should report diagnostics with positions', () => {
		const report = buildJsonReport('x.nix', parseSource('{ a = 1 }'), { tokens: false, tree: false })
		assert.deepStrictEqual(report, {
			diagnostics: [
				{
					code: 'NXPARSE003',
					column: 8,
					end: 7,
					line: 1,
					message: "missing ';'",
					severity: 'error',
					start: 7,
				},
			],
			file: 'x.nix',
			ok: false,
		})
	})

	it('should include tokens and the tree on request', () => {
		const report = buildJsonReport('one.nix', parseSource('1'), { tokens: true, tree: true })
		assert.deepStrictEqual(report, {
			diagnostics: [],
			file: 'one.nix',
			ok: true,
			tokens: [{ end: 1, kind: 'Integer', start: 0, trivia: false }],
			tree: ['Root@0..1', '  Literal@0..1', '    Integer@0..1 "1"', '  Eof@1..1 ""'].join('\n'),
		})
	})
})
