import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill `{key}` placeholders from args. Unknown keys are left as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(PLACEHOLDER, (placeholder: string, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : placeholder
	})
}

/**
 * List the placeholder names a template expects, in order of first use.
 */
export function templateKeys(message: string): string[] {
	const keys: string[] = []
	for (const match of message.matchAll(PLACEHOLDER)) {
		const key = match[1]
		if (key !== undefined && !keys.includes(key)) keys.push(key)
	}
	return keys
}
