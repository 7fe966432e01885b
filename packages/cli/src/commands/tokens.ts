import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type FdSource, InputStream, strategies } from '@tokenscan/core'
import { formatInvalidByteCountError, formatReadError, openInput, parseByteCount, reportScanStop } from '../utils.ts'

export default class TokensCommand extends BaseCommand {
	static override commandName = 'tokens'
	static override description = 'Print every whitespace-delimited token, one per line'

	@args.string({ description: 'Input file (reads stdin when omitted)', required: false })
	declare file?: string

	@flags.string({ alias: 'l', description: 'Fail on tokens longer than this many bytes' })
	declare limit?: string

	private openSource(): FdSource | null {
		try {
			return openInput(this.file)
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file ?? '<stdin>', error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		const limit = parseByteCount(this.limit)
		if (limit === null) {
			this.logger.error(formatInvalidByteCountError(this.limit ?? ''))
			this.exitCode = 1
			return
		}

		const source = this.openSource()
		if (source === null) return

		try {
			const stream = new InputStream(source)
			let count = 0
			for (const token of stream.values(strategies.string, limit)) {
				this.logger.log(token)
				count++
			}
			const stop = reportScanStop(count, stream.lastError)
			if (stop !== null) {
				this.logger.error(stop.message)
				this.exitCode = stop.exitCode
			}
		} finally {
			source.close()
		}
	}
}
