import { consola } from "consola"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { getToolById, listTools, type RegistryOptions } from "@/src/core/tools/registry"
import type { ToolProbe } from "@/src/core/tools/types"

export async function toolsCommand(toolId?: string): Promise<void> {
	consola.info("devready tools")

	const result = selectTools(toolId, { env: process.env, platform: process.platform })
	if (result.status === "completed") {
		for (const probe of result.value) {
			consola.info(describeProbe(probe))
		}
	}

	printOutcome(result)
}

export function selectTools(
	toolId: string | undefined,
	options: RegistryOptions,
): CommandResult<ToolProbe[]> {
	if (toolId === undefined) {
		return CommandResult.completed(listTools(options))
	}

	const probe = getToolById(toolId, options)
	if (!probe.ok) {
		return CommandResult.failed(probe.error)
	}

	return CommandResult.completed([probe.value])
}

export function describeProbe(probe: ToolProbe): string {
	const lines = [
		`${probe.name} (${probe.id})`,
		`  Command: ${probe.pathCommand}`,
		`  Executable: ${probe.executable}`,
		`  PATH repair: ${probe.reconcile ? "yes" : "no"}`,
		"  Install locations:",
		...probe.knownInstallDirs.map((directory, index) => `    ${index + 1}. ${directory}`),
	]
	return lines.join("\n")
}
