import fc from 'fast-check'

/** Fragments that exercise every scanner mode, including broken nesting. */
const NIX_PIECES = [
	' ',
	'\n',
	'\t',
	'a',
	'x1',
	'1',
	'2.5',
	'let',
	'in',
	'if',
	'then',
	'else',
	'with',
	'assert',
	'rec',
	'inherit',
	'or',
	'{',
	'}',
	'(',
	')',
	'[',
	']',
	'"',
	"''",
	"'''",
	'${',
	'$',
	'\\',
	'=',
	';',
	':',
	'.',
	',',
	'@',
	'?',
	'...',
	'+',
	'-',
	'*',
	'/',
	'//',
	'++',
	'->',
	'==',
	'!',
	'&&',
	'<',
	'./p',
	'<n>',
	'u:v',
	'#c\n',
	'/*',
	'*/',
	'^',
] as const

export const nixSoupArb = fc
	.array(fc.constantFrom(...NIX_PIECES), { maxLength: 40 })
	.map((pieces) => pieces.join(''))

/** Arbitrary UTF-16 code units, lone surrogates included. */
export const codeUnitsArb = fc
	.array(fc.integer({ max: 0xffff, min: 0 }), { maxLength: 40 })
	.map((codes) => String.fromCharCode(...codes))
