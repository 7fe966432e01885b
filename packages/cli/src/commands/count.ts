import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type FdSource, InputStream, type StrategyName, type StrategyValue, strategies } from '@tokenscan/core'
import { countTokens } from '../tally.ts'
import {
	formatInvalidByteCountError,
	formatReadError,
	formatTypeSuggestion,
	formatUnknownTypeError,
	openInput,
	reportScanStop,
	parseByteCount,
	resolveStrategyName,
} from '../utils.ts'

export default class CountCommand extends BaseCommand {
	static override commandName = 'count'
	static override description = 'Count the tokens that parse as a given type'

	@args.string({ description: 'Input file (reads stdin when omitted)', required: false })
	declare file?: string

	@flags.string({ alias: 't', default: 'string', description: 'Token type, e.g. i32, f64, bool' })
	declare type: string

	@flags.string({ alias: 'l', description: 'Fail on tokens longer than this many bytes' })
	declare limit?: string

	@flags.string({ alias: 'c', description: 'Read buffer size in bytes' })
	declare capacity?: string

	private openSource(capacity: number | undefined): FdSource | null {
		try {
			return openInput(this.file, capacity)
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file ?? '<stdin>', error))
			this.exitCode = 1
			return null
		}
	}

	private readByteCount(value: string | undefined, minimum: number): number | undefined | null {
		const parsed = parseByteCount(value)
		if (parsed === null || (parsed !== undefined && parsed < minimum)) {
			this.logger.error(formatInvalidByteCountError(value ?? ''))
			this.exitCode = 1
			return null
		}
		return parsed
	}

	override async run(): Promise<void> {
		const name = resolveStrategyName(this.type)
		if (name === null) {
			this.logger.error(formatUnknownTypeError(this.type))
			this.logger.info(formatTypeSuggestion())
			this.exitCode = 1
			return
		}

		const limit = this.readByteCount(this.limit, 0)
		if (limit === null) return
		const capacity = this.readByteCount(this.capacity, 1)
		if (capacity === null) return

		const source = this.openSource(capacity)
		if (source === null) return

		try {
			const { count, stoppedBy } = countTokens<StrategyValue<StrategyName>>(new InputStream(source), strategies[name], limit)
			this.logger.log(String(count))
			const stop = reportScanStop(count, stoppedBy)
			if (stop !== null) {
				this.logger.error(stop.message)
				this.exitCode = stop.exitCode
			}
		} finally {
			source.close()
		}
	}
}
