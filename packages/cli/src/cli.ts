#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import ParseCommand from './commands/parse.ts'

const version = '0.1.0'

const kernel = Kernel.create()

kernel.info.set('binary', 'nixtree')
kernel.info.set('version', version)

kernel.defineFlag('help', {
	alias: 'h',
	description: 'Display help information',
	type: 'boolean',
})

kernel.defineFlag('version', {
	alias: 'v',
	description: 'Display version number',
	type: 'boolean',
})

kernel.addLoader(new ListLoader([ParseCommand, HelpCommand]))

kernel.on('finding:command', async (): Promise<boolean> => {
	console.log(`nixtree v${version}`)
	console.log('')
	console.log('Usage: nixtree <command> [options]')
	console.log('')
	console.log('Commands:')
	console.log('  parse    Parse a Nix file and report syntax errors')
	console.log('')
	console.log('Run "nixtree --help" for available commands and options.')
	return true
})

try {
	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode ?? 0
} catch (error: unknown) {
	console.error(error)
	process.exit(1)
}
