#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import { COMMANDS, usage, version } from './usage.ts'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'tokenscan')
	kernel.info.set('version', version)

	kernel.defineFlag('help', { alias: 'h', description: 'Display help information', type: 'boolean' })
	kernel.defineFlag('version', { alias: 'v', description: 'Display version number', type: 'boolean' })

	kernel.addLoader(new ListLoader([...COMMANDS, HelpCommand]))

	kernel.on('finding:command', async () => {
		console.log(usage())
		return true
	})

	await kernel.handle(process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
