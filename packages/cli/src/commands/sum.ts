import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type FdSource, InputStream, type ScanError } from '@tokenscan/core'
import { foldIntegers, sumFloats } from '../tally.ts'
import {
	type FoldOperation,
	formatFoldTypeError,
	formatReadError,
	formatTypeSuggestion,
	formatUnknownTypeError,
	isFloatType,
	isIntegerType,
	openInput,
	reportScanStop,
	resolveStrategyName,
} from '../utils.ts'

export default class SumCommand extends BaseCommand {
	static override commandName = 'sum'
	static override description = 'Add up numeric tokens, or combine integers with XOR'

	@args.string({ description: 'Input file (reads stdin when omitted)', required: false })
	declare file?: string

	@flags.string({ alias: 't', default: 'i32', description: 'Numeric token type, e.g. i32, u64, f64' })
	declare type: string

	@flags.boolean({ description: 'Combine integers with XOR instead of addition' })
	declare xor: boolean

	private get operation(): FoldOperation {
		return this.xor ? 'xor' : 'sum'
	}

	private validateType(): boolean {
		if (resolveStrategyName(this.type) === null) {
			this.logger.error(formatUnknownTypeError(this.type))
			this.logger.info(formatTypeSuggestion())
			this.exitCode = 1
			return false
		}
		const foldable = isIntegerType(this.type) || (isFloatType(this.type) && !this.xor)
		if (!foldable) {
			this.logger.error(formatFoldTypeError(this.operation, this.type))
			this.exitCode = 1
			return false
		}
		return true
	}

	private openSource(): FdSource | null {
		try {
			return openInput(this.file)
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file ?? '<stdin>', error))
			this.exitCode = 1
			return null
		}
	}

	private fold(stream: InputStream): { count: number; stoppedBy: ScanError | null; total: string } {
		if (isIntegerType(this.type)) {
			const result = foldIntegers(stream, this.type, this.operation)
			return { ...result, total: result.total.toString() }
		}
		if (isFloatType(this.type)) {
			const result = sumFloats(stream, this.type)
			return { ...result, total: String(result.total) }
		}
		throw new Error(`Unsupported fold type: ${this.type}`)
	}

	override async run(): Promise<void> {
		if (!this.validateType()) return

		const source = this.openSource()
		if (source === null) return

		try {
			const { count, stoppedBy, total } = this.fold(new InputStream(source))
			this.logger.log(`count: ${count}`)
			this.logger.log(`${this.operation}: ${total}`)
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
