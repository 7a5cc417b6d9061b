import assert from 'node:assert'
import { readdirSync, readFileSync } from 'node:fs'
import { describe, it } from 'node:test'
import { nodeKindName } from '../src/core/nodes.ts'
import { parseSource } from '../src/index.ts'
import { rootExpr } from './shape.ts'

const FIXTURES = new URL('./fixtures/', import.meta.url)

const EXPECTED_ROOTS: Readonly<Record<string, string>> = {
	'attrsets.nix': 'AttrSet',
	'functions.nix': 'LetIn',
	'legacy.nix': 'LegacyLet',
	'lists.nix': 'LetIn',
	'operators.nix': 'BinaryOp',
	'package.nix': 'Lambda',
	'paths.nix': 'List',
	'scoped.nix': 'With',
	'strings.nix': 'LetIn',
}

describe('corpus', () => {
	const files = readdirSync(FIXTURES).filter((name) => name.endsWith('.nix'))

	it('has an expectation for every fixture', () => {
		assert.deepStrictEqual([...files].sort(), Object.keys(EXPECTED_ROOTS).sort())
	})

	for (const file of files) {
		it(`parses ${file} without diagnostics`, () => {
			const source = readFileSync(new URL(file, FIXTURES), 'utf8')
			const { tree, context, diagnostics } = parseSource(source, { filename: file })
			assert.strictEqual(diagnostics.length, 0, context.formatAllDiagnostics())
			assert.strictEqual(nodeKindName(tree.kind(rootExpr(tree))), EXPECTED_ROOTS[file])
			assert.strictEqual(tree.reconstruct(), source)
		})
	}
})
