import path from "node:path"
import type { AbsolutePath, ToolId } from "./branded"

export const VALID_TOOL_IDS: ReadonlyArray<ToolId> = ["git", "vscode"] as const

const VALID_TOOL_IDS_SET: ReadonlySet<string> = new Set(VALID_TOOL_IDS)

export function coerceToolId(value: string): ToolId | null {
	const trimmed = value.trim().toLowerCase()
	if (!VALID_TOOL_IDS_SET.has(trimmed)) return null
	return trimmed as ToolId
}

// Windows paths are judged with win32 rules wherever the check runs.
export function coerceAbsolutePathDirect(
	value: string,
	platform: NodeJS.Platform = process.platform,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	const flavor = platform === "win32" ? path.win32 : path.posix
	if (!flavor.isAbsolute(trimmed)) return null
	return flavor.normalize(trimmed) as AbsolutePath
}
