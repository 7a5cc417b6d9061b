import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { debugTree, type ParseSourceResult, parseSource } from '@nixtree/syntax'
import { buildJsonReport, formatReadError, formatSyntaxSummary, formatTokenLines } from '../utils.ts'

export default class ParseCommand extends BaseCommand {
	static override commandName = 'parse'
	static override description = 'Parse a Nix file and report syntax errors'

	@args.string({ description: 'Path to the .nix file' })
	declare file: string

	@flags.boolean({ description: 'Print every token with its kind and span' })
	declare tokens: boolean

	@flags.boolean({ description: 'Print the syntax tree' })
	declare tree: boolean

	@flags.boolean({ description: 'Print a JSON report instead of text' })
	declare json: boolean

	@flags.boolean({ alias: 'q', description: 'Print nothing for a file without errors' })
	declare quiet: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.file, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file, error))
			this.exitCode = 1
			return null
		}
	}

	private printJson(result: ParseSourceResult): void {
		const report = buildJsonReport(this.file, result, {
			tokens: this.tokens === true,
			tree: this.tree === true,
		})
		console.log(JSON.stringify(report, null, 2))
	}

	private printText(result: ParseSourceResult): void {
		if (this.tokens) {
			for (const line of formatTokenLines(result.tree)) {
				this.logger.log(line)
			}
		}
		if (this.tree) {
			this.logger.log(debugTree(result.tree))
		}

		if (result.diagnostics.length > 0) {
			this.logger.logError(result.context.formatAllDiagnostics())
			this.logger.logError('')
			this.logger.error(formatSyntaxSummary(this.file, result.diagnostics.length))
		} else if (!this.quiet) {
			this.logger.success(`${this.file}: no syntax errors`)
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const result = parseSource(source, { filename: this.file })

		if (this.json) {
			this.printJson(result)
		} else {
			this.printText(result)
		}

		if (result.diagnostics.length > 0) {
			this.exitCode = 1
		}
	}
}
