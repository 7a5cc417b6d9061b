/**
 * CLI diagnostic definitions.
 *
 * Error code format: NXCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export const NXCLI001: DiagnosticDef = {
	code: 'NXCLI001',
	description: 'There is no file at this path.',
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const NXCLI002: DiagnosticDef = {
	code: 'NXCLI002',
	description: 'The file exists but could not be opened.',
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const NXCLI003: DiagnosticDef = {
	code: 'NXCLI003',
	description: 'The file was parsed but contains syntax errors.',
	message: '{count} syntax error(s) in {path}',
	severity: DiagnosticSeverity.Error,
}

export const CLI_DIAGNOSTICS = {
	NXCLI001,
	NXCLI002,
	NXCLI003,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
