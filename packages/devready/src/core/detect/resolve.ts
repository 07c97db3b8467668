import path from "node:path"
import type { IoError, Result } from "@devready/core"
import { DEFAULT_PATHEXT, pathDelimiterFor, splitPathList } from "@devready/core"
import { safeStat } from "@/src/core/io/fs"
import { readProcessPath, readVariable } from "@/src/core/path/process"

export type ResolveResult = Result<string | null, IoError>

export type CommandResolver = (command: string) => Promise<ResolveResult>

export interface ResolveOptions {
	env: NodeJS.ProcessEnv
	platform: NodeJS.Platform
}

/**
 * Looks a command up on the PATH of `env`, the way the shell would.
 *
 * `platform` picks the PATH and PATHEXT rules; candidates are joined with the
 * host's own separator since they are looked up on the host filesystem.
 * Resolves to the executable path, or `null` when no entry holds it. Entries
 * that cannot be inspected are skipped; if nothing is found, the first such
 * failure is returned as the error.
 */
export async function resolveCommand(
	command: string,
	options: ResolveOptions,
): Promise<ResolveResult> {
	const { env, platform } = options
	const names = candidateNames(command, env, platform)
	const entries = splitPathList(readProcessPath(env, platform), pathDelimiterFor(platform))

	let firstFailure: IoError | undefined
	for (const rawEntry of entries) {
		const entry = cleanEntry(rawEntry, platform)
		if (entry.length === 0) {
			continue
		}

		for (const name of names) {
			const candidate = path.join(entry, name)
			const stats = await safeStat(candidate)
			if (!stats.ok) {
				firstFailure ??= stats.error
				continue
			}

			if (stats.value?.isFile() && (platform === "win32" || isExecutable(stats.value.mode))) {
				return { ok: true, value: candidate }
			}
		}
	}

	return firstFailure ? { error: firstFailure, ok: false } : { ok: true, value: null }
}

export function createCommandResolver(options: ResolveOptions): CommandResolver {
	return (command) => resolveCommand(command, options)
}

function candidateNames(
	command: string,
	env: NodeJS.ProcessEnv,
	platform: NodeJS.Platform,
): string[] {
	if (platform !== "win32") {
		return [command]
	}

	const extensions = (readVariable(env, "PATHEXT", platform) ?? DEFAULT_PATHEXT)
		.split(";")
		.map((extension) => extension.trim())
		.filter((extension) => extension.length > 0)
	const current = path.win32.extname(command).toLowerCase()
	if (current.length > 0 && extensions.some((extension) => extension.toLowerCase() === current)) {
		return [command]
	}

	return extensions.map((extension) => `${command}${extension}`)
}

// cmd.exe tolerates quoted PATH entries such as "C:\Program Files\Git\cmd".
function cleanEntry(entry: string, platform: NodeJS.Platform): string {
	const trimmed = entry.trim()
	if (platform === "win32" && trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
		return trimmed.slice(1, -1)
	}

	return trimmed
}

function isExecutable(mode: number | bigint): boolean {
	return (Number(mode) & 0o111) !== 0
}
