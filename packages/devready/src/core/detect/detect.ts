import path from "node:path"
import type { IoError, Result } from "@devready/core"
import { consola } from "consola"
import type { CommandResolver } from "@/src/core/detect/resolve"
import type { InstallationState, ToolProbe } from "@/src/core/tools/types"
import { formatError } from "@/src/utils/errors"

export interface DetectContext {
	platform: NodeJS.Platform
	resolveCommand: CommandResolver
	fileExists: (filePath: string) => Promise<Result<boolean, IoError>>
}

/**
 * Works out whether a tool is reachable, installed somewhere off PATH, or
 * absent. Never rejects: lookup failures count as "not found".
 */
export async function detectTool(
	probe: ToolProbe,
	context: DetectContext,
): Promise<InstallationState> {
	const location = await lookUp(probe, context)
	if (location) {
		return { kind: "found_on_path", location }
	}

	const flavor = context.platform === "win32" ? path.win32 : path.posix
	for (const directory of probe.knownInstallDirs) {
		const candidate = flavor.join(directory, probe.executable)
		const exists = await checkFile(candidate, context)
		if (exists) {
			return { directory, kind: "found_not_on_path" }
		}
	}

	return { kind: "not_found" }
}

async function lookUp(probe: ToolProbe, context: DetectContext): Promise<string | null> {
	try {
		const resolved = await context.resolveCommand(probe.pathCommand)
		if (!resolved.ok) {
			consola.debug(`PATH lookup for ${probe.pathCommand} failed: ${resolved.error.message}`)
			return null
		}

		return resolved.value
	} catch (error) {
		consola.debug(`PATH lookup for ${probe.pathCommand} threw: ${formatError(error)}`)
		return null
	}
}

async function checkFile(candidate: string, context: DetectContext): Promise<boolean> {
	try {
		const exists = await context.fileExists(candidate)
		if (!exists.ok) {
			consola.debug(`Unable to check ${candidate}: ${exists.error.message}`)
			return false
		}

		return exists.value
	} catch (error) {
		consola.debug(`Unable to check ${candidate}: ${formatError(error)}`)
		return false
	}
}
