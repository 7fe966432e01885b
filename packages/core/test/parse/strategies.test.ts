import assert from 'node:assert'
import { describe, it } from 'node:test'
import { fromThrowing, isStrategyName, strategies, strategy } from '../../src/parse/index.ts'
import { failed, ParseFailure, parsed } from '../../src/parse/types.ts'

describe('parse/index', () => {
	describe('strategies', () => {
		it('should key every strategy by its own name', () => {
			for (const [name, entry] of Object.entries(strategies)) {
				assert.strictEqual(entry.name, name)
			}
		})

		it('should recognise registered names only', () => {
			assert.strictEqual(isStrategyName('i32'), true)
			assert.strictEqual(isStrategyName('string'), true)
			assert.strictEqual(isStrategyName('i128'), false)
			assert.strictEqual(isStrategyName('constructor'), false)
		})
	})

	describe('strategy', () => {
		it('should wrap an outcome-returning conversion', () => {
			const even = strategy('even', (text) => {
				const n = Number(text)
				return Number.isInteger(n) && n % 2 === 0 ? parsed(n) : failed('invalid_value', 'not even')
			})
			assert.strictEqual(even.name, 'even')
			assert.deepStrictEqual(even.parse('4'), { succeeded: true, value: 4 })
			assert.strictEqual(even.parse('3').succeeded, false)
		})
	})

	describe('fromThrowing', () => {
		it('should return the converted value', () => {
			const json = fromThrowing('json', (text): unknown => JSON.parse(text))
			assert.deepStrictEqual(json.parse('[1,2]'), { succeeded: true, value: [1, 2] })
		})

		it('should turn a thrown error into a failure with that cause', () => {
			const boom = new Error('bad date')
			const date = fromThrowing('date', (): Date => {
				throw boom
			})
			const outcome = date.parse('x')
			assert.ok(!outcome.succeeded)
			assert.ok(outcome.error instanceof ParseFailure)
			assert.strictEqual(outcome.error.kind, 'invalid_value')
			assert.strictEqual(outcome.error.message, 'bad date')
			assert.strictEqual(outcome.error.cause, boom)
		})

		it('should stringify non-error throws', () => {
			const odd = fromThrowing('odd', (): number => {
				throw 'nope'
			})
			const outcome = odd.parse('1')
			assert.ok(!outcome.succeeded)
			assert.strictEqual(outcome.error.message, 'nope')
		})
	})
})
