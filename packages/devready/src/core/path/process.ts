import type { PathDelimiter } from "@devready/core"
import { appendPathEntry, PATH_VARIABLE } from "@devready/core"

/**
 * Finds the key a variable is stored under. Windows treats variable names
 * case-insensitively (`Path`, `PATH`), so a copied env object can hold either.
 */
export function findVariableKey(
	env: NodeJS.ProcessEnv,
	name: string,
	platform: NodeJS.Platform,
): string | undefined {
	if (platform !== "win32") {
		return name in env ? name : undefined
	}

	const wanted = name.toUpperCase()
	return Object.keys(env).find((key) => key.toUpperCase() === wanted)
}

export function readVariable(
	env: NodeJS.ProcessEnv,
	name: string,
	platform: NodeJS.Platform,
): string | undefined {
	const key = findVariableKey(env, name, platform)
	return key === undefined ? undefined : env[key]
}

export function readProcessPath(env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string {
	return readVariable(env, PATH_VARIABLE, platform) ?? ""
}

/**
 * Appends an entry to the in-memory PATH of the given environment so that
 * lookups made later by this process see it. Returns the new value.
 */
export function appendProcessPath(
	env: NodeJS.ProcessEnv,
	entry: string,
	delimiter: PathDelimiter,
	platform: NodeJS.Platform,
): string {
	const key = findVariableKey(env, PATH_VARIABLE, platform) ?? PATH_VARIABLE
	const next = appendPathEntry(env[key] ?? "", entry, delimiter)
	env[key] = next
	return next
}
