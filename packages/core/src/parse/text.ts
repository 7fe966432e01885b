import { failed, type ParseOutcome, type ParseStrategy, parsed } from './types.ts'

/** Takes the token text as is; never fails, even on an empty token. */
export const string: ParseStrategy<string> = {
	name: 'string',
	parse: (text: string): ParseOutcome<string> => parsed(text),
}

export const bool: ParseStrategy<boolean> = {
	name: 'bool',
	parse(text: string): ParseOutcome<boolean> {
		if (text === 'true') return parsed(true)
		if (text === 'false') return parsed(false)
		return failed('invalid_bool', 'provided string was not `true` or `false`')
	},
}

/** Exactly one Unicode scalar value. */
export const char: ParseStrategy<string> = {
	name: 'char',
	parse(text: string): ParseOutcome<string> {
		if (text.length === 0) return failed('empty', 'cannot parse char from empty string')
		const first = text.codePointAt(0) ?? 0
		const width = first > 0xffff ? 2 : 1
		if (text.length !== width) return failed('invalid_char', 'too many characters in string')
		return parsed(text)
	},
}
