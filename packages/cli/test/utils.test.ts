import assert from 'node:assert'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it } from 'node:test'
import { InputStream, limitExceededError, strategies } from '@tokenscan/core'
import { countTokens } from '../src/tally.ts'
import {
	formatFoldTypeError,
	formatInvalidByteCountError,
	formatReadError,
	formatScanStop,
	formatTypeSuggestion,
	formatUnknownTypeError,
	isFloatType,
	isIntegerType,
	isNodeError,
	openInput,
	parseByteCount,
	reportScanStop,
	resolveStrategyName,
} from '../src/utils.ts'

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		const error = new Error('test') as NodeJS.ErrnoException
		error.code = 'ENOENT'
		assert.strictEqual(isNodeError(error), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		const error = new Error('no such file') as NodeJS.ErrnoException
		error.code = 'ENOENT'
		assert.strictEqual(formatReadError('/data/numbers.txt', error), '[TKSCLI001] file not found: /data/numbers.txt')
	})

	it('should format other errors with the reason', () => {
		const error = new Error('permission denied') as NodeJS.ErrnoException
		error.code = 'EACCES'
		assert.strictEqual(formatReadError('/data/numbers.txt', error), '[TKSCLI002] cannot read file: permission denied')
	})
})

describe('type names', () => {
	it('should resolve registered strategy names', () => {
		assert.strictEqual(resolveStrategyName('u64'), 'u64')
		assert.strictEqual(resolveStrategyName('int'), null)
	})

	it('should classify integer and float types', () => {
		assert.strictEqual(isIntegerType('i32'), true)
		assert.strictEqual(isIntegerType('usize'), true)
		assert.strictEqual(isIntegerType('f32'), false)
		assert.strictEqual(isFloatType('f64'), true)
		assert.strictEqual(isFloatType('string'), false)
	})

	it('should format an unknown type with the list of known ones', () => {
		assert.strictEqual(formatUnknownTypeError('int'), '[TKSCLI003] unknown type "int"')
		assert.strictEqual(
			formatTypeSuggestion(),
			'Use one of: bool, char, f32, f64, i8, i16, i32, i64, isize, string, u8, u16, u32, u64, usize.'
		)
	})

	it('should format fold type errors', () => {
		assert.strictEqual(formatFoldTypeError('xor', 'f64'), '[TKSCLI005] cannot xor tokens of type f64')
	})
})

describe('parseByteCount', () => {
	it('should return undefined when no value is given', () => {
		assert.strictEqual(parseByteCount(undefined), undefined)
	})

	it('should parse non-negative integers', () => {
		assert.strictEqual(parseByteCount('0'), 0)
		assert.strictEqual(parseByteCount('4096'), 4096)
	})

	it('should reject anything else', () => {
		for (const value of ['', '-1', '1.5', 'ten', '1e3', ' 3', '99999999999999999999']) {
			assert.strictEqual(parseByteCount(value), null, value)
		}
	})

	it('should format invalid byte counts', () => {
		assert.strictEqual(formatInvalidByteCountError('ten'), '[TKSCLI004] invalid byte count "ten"')
	})
})

describe('formatScanStop', () => {
	it('should include the count and the scan error', () => {
		assert.strictEqual(
			formatScanStop(2, limitExceededError(3, 4)),
			'[TKSCLI006] scan stopped after 2 tokens: [TKSLIMIT001] token exceeds buffer limit: 4 bytes, limit is 3'
		)
	})
})

describe('reportScanStop', () => {
	it('should finish cleanly at the end of input', () => {
		const stream = InputStream.from('4 8 15')
		const { count, stoppedBy } = countTokens(stream, strategies.i32)
		assert.strictEqual(count, 3)
		assert.strictEqual(reportScanStop(count, stoppedBy), null)
	})

	it('should fail the command when a token does not parse', () => {
		const stream = InputStream.from('4 8 x 15')
		const { count, stoppedBy } = countTokens(stream, strategies.i32)
		assert.deepStrictEqual(reportScanStop(count, stoppedBy), {
			exitCode: 1,
			message: '[TKSCLI006] scan stopped after 2 tokens: [TKSPARSE001] cannot parse "x" as i32: invalid digit found in string',
		})
	})

	it('should fail the command when a token exceeds the limit', () => {
		assert.deepStrictEqual(reportScanStop(0, limitExceededError(3, 4)), {
			exitCode: 1,
			message: '[TKSCLI006] scan stopped after 0 tokens: [TKSLIMIT001] token exceeds buffer limit: 4 bytes, limit is 3',
		})
	})
})

describe('openInput', () => {
	it('should open a file as a buffered source', () => {
		const dir = mkdtempSync(join(tmpdir(), 'tokenscan-cli-'))
		try {
			const path = join(dir, 'numbers.txt')
			writeFileSync(path, '1 2 3')
			const source = openInput(path, 2)
			try {
				assert.deepStrictEqual(source.fill(), new TextEncoder().encode('1 '))
			} finally {
				source.close()
			}
		} finally {
			rmSync(dir, { force: true, recursive: true })
		}
	})

	it('should throw for a missing file', () => {
		assert.throws(() => openInput('/nonexistent/tokenscan/input.txt'), { code: 'ENOENT' })
	})
})
