#!/usr/bin/env tsx

import { Command } from "commander"
import { consola } from "consola"
import { checkCommand } from "@/src/commands/check"
import { toolsCommand } from "@/src/commands/tools"

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("devready")
		.description("Check that Git and Visual Studio Code are installed and on PATH")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("check", { isDefault: true })
		.description("Check the tools and add Git to the machine PATH when needed")
		.option("--dry-run", "Show the PATH change without making it")
		.option("--json", "Print the result as JSON")
		.option("--non-interactive", "Do not wait for a keypress before exiting")
		.option("--verbose", "Show debug output")
		.action(
			async (options: {
				dryRun?: boolean
				json?: boolean
				nonInteractive?: boolean
				verbose?: boolean
			}) => {
				await checkCommand({
					dryRun: Boolean(options.dryRun),
					json: Boolean(options.json),
					nonInteractive: Boolean(options.nonInteractive),
					verbose: Boolean(options.verbose),
				})
			},
		)

	program
		.command("tools")
		.description("List the tools devready checks and where it looks for them")
		.argument("[tool]", "Tool id (git, vscode)")
		.action(async (tool: string | undefined) => {
			await toolsCommand(tool)
		})

	await program.parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(error instanceof Error ? error.message : error)
	process.exit(1)
})
