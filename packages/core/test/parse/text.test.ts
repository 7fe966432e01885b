import assert from 'node:assert'
import { describe, it } from 'node:test'
import { bool, char, string } from '../../src/parse/text.ts'

describe('parse/text', () => {
	describe('string', () => {
		it('should return the text unchanged', () => {
			assert.deepStrictEqual(string.parse('neighbour,'), { succeeded: true, value: 'neighbour,' })
		})

		it('should accept empty text', () => {
			assert.deepStrictEqual(string.parse(''), { succeeded: true, value: '' })
		})
	})

	describe('bool', () => {
		it('should parse exact literals', () => {
			assert.deepStrictEqual(bool.parse('true'), { succeeded: true, value: true })
			assert.deepStrictEqual(bool.parse('false'), { succeeded: true, value: false })
		})

		it('should reject other spellings', () => {
			for (const text of ['True', 'FALSE', '1', 'yes', '']) {
				const outcome = bool.parse(text)
				assert.ok(!outcome.succeeded, text)
				assert.strictEqual(outcome.error.kind, 'invalid_bool')
			}
		})
	})

	describe('char', () => {
		it('should accept one code point', () => {
			assert.deepStrictEqual(char.parse('x'), { succeeded: true, value: 'x' })
			assert.deepStrictEqual(char.parse('ß'), { succeeded: true, value: 'ß' })
			assert.deepStrictEqual(char.parse('\u{1F600}'), { succeeded: true, value: '\u{1F600}' })
		})

		it('should reject empty text', () => {
			const outcome = char.parse('')
			assert.ok(!outcome.succeeded)
			assert.strictEqual(outcome.error.kind, 'empty')
		})

		it('should reject more than one code point', () => {
			for (const text of ['ab', '\u{1F600}x', 'e\u0301']) {
				const outcome = char.parse(text)
				assert.ok(!outcome.succeeded, text)
				assert.strictEqual(outcome.error.kind, 'invalid_char')
				assert.strictEqual(outcome.error.message, 'too many characters in string')
			}
		})
	})
})
