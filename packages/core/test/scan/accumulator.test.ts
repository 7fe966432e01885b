import assert from 'node:assert'
import { describe, it } from 'node:test'
import { ByteAccumulator } from '../../src/scan/accumulator.ts'
import { bytes } from '../helpers.ts'

describe('scan/accumulator', () => {
	it('should start empty', () => {
		const acc = new ByteAccumulator()
		assert.strictEqual(acc.length, 0)
		assert.strictEqual(acc.capacity, 64)
		assert.deepStrictEqual(acc.view(), new Uint8Array())
	})

	it('should append chunks in order', () => {
		const acc = new ByteAccumulator()
		acc.append(bytes('ab'))
		acc.append(bytes('cd'))
		assert.deepStrictEqual(acc.view(), bytes('abcd'))
		assert.strictEqual(acc.length, 4)
	})

	it('should grow by doubling past its capacity', () => {
		const acc = new ByteAccumulator(4)
		acc.append(bytes('abc'))
		acc.append(bytes('defgh'))
		assert.strictEqual(acc.capacity, 64)
		acc.append(new Uint8Array(100))
		assert.strictEqual(acc.capacity, 128)
		assert.strictEqual(acc.length, 108)
		assert.deepStrictEqual(acc.view().subarray(0, 8), bytes('abcdefgh'))
	})

	it('should keep its capacity when cleared', () => {
		const acc = new ByteAccumulator()
		acc.append(new Uint8Array(200))
		const grown = acc.capacity
		acc.clear()
		assert.strictEqual(acc.length, 0)
		assert.strictEqual(acc.capacity, grown)
		acc.append(bytes('x'))
		assert.deepStrictEqual(acc.view(), bytes('x'))
	})

	it('should ignore empty appends', () => {
		const acc = new ByteAccumulator(0)
		acc.append(new Uint8Array())
		assert.strictEqual(acc.capacity, 0)
	})

	it('should reject invalid capacities', () => {
		assert.throws(() => new ByteAccumulator(-1), RangeError)
		assert.throws(() => new ByteAccumulator(1.5), /Invalid accumulator capacity/)
	})
})
