import { execFile } from "node:child_process"
import { promisify } from "node:util"
import type { Result } from "@devready/core"
import type { CommandError } from "@/src/types/errors"
import { formatError, toRawError } from "@/src/utils/errors"

const execFileAsync = promisify(execFile)

const COMMAND_TIMEOUT_MS = 15_000

export interface CommandOutput {
	stdout: string
	stderr: string
}

export interface RunCommandOptions {
	env?: NodeJS.ProcessEnv
	timeoutMs?: number
}

export async function runCommand(
	command: string,
	args: string[],
	options: RunCommandOptions = {},
): Promise<Result<CommandOutput, CommandError>> {
	try {
		const { stdout, stderr } = await execFileAsync(command, args, {
			encoding: "utf8",
			env: options.env,
			timeout: options.timeoutMs ?? COMMAND_TIMEOUT_MS,
			windowsHide: true,
		})
		return { ok: true, value: { stderr, stdout } }
	} catch (error) {
		const stderr = readStringField(error, "stderr")?.trim()
		return {
			error: {
				command,
				exitCode: readExitCode(error),
				message: stderr && stderr.length > 0 ? stderr : formatError(error),
				rawError: toRawError(error),
				type: "command",
			},
			ok: false,
		}
	}
}

function readExitCode(error: unknown): number | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		const { code } = error
		return typeof code === "number" ? code : undefined
	}

	return undefined
}

function readStringField(error: unknown, field: "stderr" | "stdout"): string | undefined {
	if (typeof error === "object" && error !== null && field in error) {
		const value: unknown = Reflect.get(error, field)
		return typeof value === "string" ? value : undefined
	}

	return undefined
}
