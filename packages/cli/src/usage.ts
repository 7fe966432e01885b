import CountCommand from './commands/count.ts'
import SumCommand from './commands/sum.ts'
import TokensCommand from './commands/tokens.ts'

export const version = '0.1.0'

export const COMMANDS = [TokensCommand, CountCommand, SumCommand]

/**
 * Short overview printed when no command is given.
 */
export function usage(): string {
	const width = Math.max(...COMMANDS.map((command) => command.commandName.length))
	return [
		`tokenscan v${version}`,
		'',
		'Usage: tokenscan <command> [file] [options]',
		'',
		'Commands:',
		...COMMANDS.map((command) => `  ${command.commandName.padEnd(width)}  ${command.description}`),
		'',
		'Input is read from stdin when no file is given.',
		'Run "tokenscan --help" for available commands and options.',
	].join('\n')
}
