import { consola } from "consola"
import { afterEach, describe, expect, it, vi } from "vitest"
import { CommandResult, debugErrorChain, formatErrorChain, printOutcome } from "@/src/commands/types"
import type { CommandError, StoreError } from "@/src/types/errors"

const commandError: CommandError = {
	command: "powershell.exe",
	exitCode: 1,
	message: "Requested registry access is not allowed.",
	type: "command",
}

const storeError: StoreError = {
	cause: commandError,
	location: "HKLM",
	message: "Unable to update the machine PATH",
	operation: "write",
	type: "store",
}

afterEach(() => {
	vi.restoreAllMocks()
	process.exitCode = undefined
})

describe("formatErrorChain", () => {
	it("renders details and the cause chain", () => {
		expect(formatErrorChain(storeError)).toBe(
			[
				"[store] Unable to update the machine PATH (location=HKLM, operation=write)",
				"Caused by:",
				"  [command] Requested registry access is not allowed. (command=powershell.exe, exitCode=1)",
			].join("\n"),
		)
	})
})

describe("debugErrorChain", () => {
	it("logs the chain and every raw error at debug level", () => {
		const debug = vi.spyOn(consola, "debug").mockImplementation(() => {})
		const rawError = new Error("spawn EPERM")

		debugErrorChain({ ...storeError, cause: { ...commandError, message: "Denied.", rawError } })

		expect(debug).toHaveBeenNthCalledWith(
			1,
			[
				"[store] Unable to update the machine PATH (location=HKLM, operation=write)",
				"Caused by:",
				"  [command] Denied. (command=powershell.exe, exitCode=1)",
			].join("\n"),
		)
		expect(debug).toHaveBeenNthCalledWith(2, rawError)
	})
})

describe("printOutcome", () => {
	it("sets a failing exit code for failed results", () => {
		const error = vi.spyOn(consola, "error").mockImplementation(() => {})

		printOutcome(
			CommandResult.failed({ field: "tool", message: "Unknown tool: svn.", source: "manual", type: "validation" }),
		)

		expect(error).toHaveBeenCalledWith("[validation] Unknown tool: svn. (field=tool)")
		expect(process.exitCode).toBe(1)
	})
})
