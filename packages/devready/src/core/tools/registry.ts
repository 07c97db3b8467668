import { homedir } from "node:os"
import path from "node:path"
import type { Result, ToolId, ValidationError } from "@devready/core"
import { coerceAbsolutePathDirect, coerceToolId } from "@devready/core"
import { readVariable } from "@/src/core/path/process"
import type { ToolProbe } from "@/src/core/tools/types"

interface ToolEntry {
	id: ToolId
	name: string
	pathCommand: string
	reconcile: boolean
	windows: { executable: string; relativeDir: string }
	posix: { executable: string; dirs: (home: string) => string[] }
}

const TOOL_ENTRIES: ToolEntry[] = [
	{
		id: "git",
		name: "Git",
		pathCommand: "git",
		posix: {
			dirs: (home) => [
				path.posix.join(home, ".local", "bin"),
				"/usr/local/bin",
				"/opt/homebrew/bin",
				"/usr/bin",
			],
			executable: "git",
		},
		reconcile: true,
		windows: { executable: "git.exe", relativeDir: path.win32.join("Git", "cmd") },
	},
	{
		id: "vscode",
		name: "Visual Studio Code",
		pathCommand: "code",
		posix: {
			dirs: (home) => [
				path.posix.join(home, ".local", "bin"),
				"/usr/share/code/bin",
				"/snap/bin",
				"/Applications/Visual Studio Code.app/Contents/Resources/app/bin",
			],
			executable: "code",
		},
		reconcile: false,
		windows: {
			executable: "code.cmd",
			relativeDir: path.win32.join("Microsoft VS Code", "bin"),
		},
	},
]

export interface RegistryOptions {
	platform: NodeJS.Platform
	env: NodeJS.ProcessEnv
	homeDir?: string
}

export function listTools(options: RegistryOptions): ToolProbe[] {
	return TOOL_ENTRIES.map((entry) => buildProbe(entry, options))
}

export function getToolById(
	toolId: string,
	options: RegistryOptions,
): Result<ToolProbe, ValidationError> {
	const id = coerceToolId(toolId)
	const entry = id ? TOOL_ENTRIES.find((candidate) => candidate.id === id) : undefined
	if (!entry) {
		return {
			error: {
				field: "tool",
				message: `Unknown tool: ${toolId}. Known tools: ${TOOL_ENTRIES.map((candidate) => candidate.id).join(", ")}.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: buildProbe(entry, options) }
}

function buildProbe(entry: ToolEntry, options: RegistryOptions): ToolProbe {
	const home = options.homeDir ?? homedir()
	if (options.platform === "win32") {
		return {
			executable: entry.windows.executable,
			id: entry.id,
			knownInstallDirs: windowsInstallRoots(options.env, home).map((root) =>
				path.win32.join(root, entry.windows.relativeDir),
			),
			name: entry.name,
			pathCommand: entry.pathCommand,
			reconcile: entry.reconcile,
		}
	}

	return {
		executable: entry.posix.executable,
		id: entry.id,
		knownInstallDirs: entry.posix.dirs(home),
		name: entry.name,
		pathCommand: entry.pathCommand,
		reconcile: entry.reconcile,
	}
}

// User-local install first, then 64-bit, then 32-bit machine-wide installs.
function windowsInstallRoots(env: NodeJS.ProcessEnv, home: string): string[] {
	const localAppData =
		readSetting(env, "LOCALAPPDATA") ?? path.win32.join(home, "AppData", "Local")
	return [
		path.win32.join(localAppData, "Programs"),
		readSetting(env, "ProgramFiles") ?? "C:\\Program Files",
		readSetting(env, "ProgramFiles(x86)") ?? "C:\\Program Files (x86)",
	]
}

// Relative or blank roots are ignored in favour of the defaults.
function readSetting(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const value = readVariable(env, name, "win32")
	if (value === undefined) {
		return undefined
	}

	return coerceAbsolutePathDirect(value, "win32") ?? undefined
}
