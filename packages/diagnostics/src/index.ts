/**
 * @nixtree/diagnostics
 *
 * Shared diagnostic types and definitions for the nixtree packages.
 */

export { CLI_DIAGNOSTICS, type CliDiagnosticCode, NXCLI001, NXCLI002, NXCLI003 } from './cli.ts'
export { interpolateMessage, templateKeys } from './interpolate.ts'
export {
	NXLEX001,
	NXLEX002,
	NXLEX003,
	NXLEX004,
	NXLEX005,
	NXLEX006,
	NXPARSE001,
	NXPARSE002,
	NXPARSE003,
	NXPARSE004,
	NXPARSE005,
	NXPARSE006,
	NXPARSE007,
	NXPARSE008,
	SYNTAX_DIAGNOSTICS,
	type SyntaxDiagnosticCode,
} from './syntax.ts'
export type { DiagnosticArgs, DiagnosticDef } from './types.ts'
export { DiagnosticSeverity } from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { SYNTAX_DIAGNOSTICS } from './syntax.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...SYNTAX_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

export type DiagnosticCode = keyof typeof DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
