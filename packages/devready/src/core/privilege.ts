import { runCommand } from "@/src/utils/exec"

/**
 * Whether this process can change machine-wide settings. On Windows
 * `net session` only succeeds from an elevated shell.
 */
export async function isElevated(platform: NodeJS.Platform = process.platform): Promise<boolean> {
	if (platform === "win32") {
		const result = await runCommand("net", ["session"])
		return result.ok
	}

	return typeof process.geteuid === "function" && process.geteuid() === 0
}
