import { describe, expect, it } from "vitest"
import { buildReport, categorize, describeState } from "@/src/commands/report"
import type { RunResult, ToolReport } from "@/src/core/tools/types"
import { buildProbe } from "@/tests/helpers"

const git = buildProbe()
const code = buildProbe({
	executable: "code",
	id: "vscode",
	name: "Visual Studio Code",
	pathCommand: "code",
	reconcile: false,
})

function run(tools: ToolReport[], platform: NodeJS.Platform = "win32"): RunResult {
	return { elevated: false, platform, tools }
}

describe("categorize", () => {
	it("maps each installation state to a category", () => {
		expect(categorize({ kind: "found_on_path", location: "git" })).toBe("ready")
		expect(categorize({ directory: "C:\\Git\\cmd", kind: "found_not_on_path" })).toBe(
			"unreachable",
		)
		expect(categorize({ kind: "not_found" })).toBe("missing")
	})
})

describe("describeState", () => {
	it("names the location or directory", () => {
		expect(describeState({ kind: "found_on_path", location: "/usr/bin/git" })).toBe(
			"installed and on PATH (/usr/bin/git)",
		)
		expect(describeState({ directory: "C:\\Git\\cmd", kind: "found_not_on_path" })).toBe(
			"installed in C:\\Git\\cmd, not on PATH",
		)
	})
})

describe("buildReport", () => {
	it("is ready with no recommendations when every tool is reachable", () => {
		const onPath = { kind: "found_on_path", location: "found" } as const
		const report = buildReport(
			run([
				{ final: onPath, initial: onPath, probe: git },
				{ final: onPath, initial: onPath, probe: code },
			]),
		)

		expect(report.ready).toBe(true)
		expect(report.recommendations).toEqual([])
		expect(report.entries.map((entry) => entry.category)).toEqual(["ready", "ready"])
	})

	it("recommends installing missing tools", () => {
		const missing = { kind: "not_found" } as const
		const report = buildReport(
			run([{ final: missing, initial: missing, probe: code }], "linux"),
		)

		expect(report.ready).toBe(false)
		expect(report.recommendations).toEqual([
			"Install Visual Studio Code: download it from https://code.visualstudio.com/download.",
		])
	})

	it("recommends an elevated rerun when the PATH update failed", () => {
		const state = { directory: "C:\\Program Files\\Git\\cmd", kind: "found_not_on_path" } as const
		const report = buildReport(
			run([
				{
					final: state,
					initial: state,
					probe: git,
					reconciliation: {
						error: {
							location: "HKLM",
							message: "Access is denied.",
							operation: "write",
							type: "store",
						},
						kind: "failed",
						reason: "Access is denied.",
					},
				},
			]),
		)

		expect(report.entries).toEqual([
			{
				category: "unreachable",
				detail: "installed in C:\\Program Files\\Git\\cmd, not on PATH",
				id: "git",
				name: "Git",
			},
		])
		expect(report.recommendations).toEqual([
			"Could not add C:\\Program Files\\Git\\cmd to the machine PATH: Access is denied.",
			"Rerun devready from an elevated (Run as administrator) terminal.",
		])
	})

	it("asks for a new session when the entry is already present", () => {
		const state = { directory: "C:\\Git\\cmd", kind: "found_not_on_path" } as const
		const report = buildReport(
			run([
				{ final: state, initial: state, probe: git, reconciliation: { kind: "already_present" } },
			]),
		)

		expect(report.recommendations).toEqual([
			"C:\\Git\\cmd is already on the machine PATH. Open a new terminal session to use Git.",
		])
	})

	it("asks for a new session when the update is not visible yet", () => {
		const state = { directory: "C:\\Git\\cmd", kind: "found_not_on_path" } as const
		const report = buildReport(
			run([
				{
					final: state,
					initial: state,
					probe: git,
					reconciliation: { kind: "applied_but_unverified", newPathValue: "C:\\Windows;C:\\Git\\cmd" },
				},
			]),
		)

		expect(report.ready).toBe(false)
		expect(report.recommendations).toEqual([
			"C:\\Git\\cmd was added to the machine PATH. Open a new terminal session to use Git.",
		])
	})

	it("points at a real run after a dry run", () => {
		const state = { directory: "/opt/git/bin", kind: "found_not_on_path" } as const
		const report = buildReport(
			run(
				[
					{
						final: state,
						initial: state,
						probe: git,
						reconciliation: { kind: "planned", newPathValue: "/usr/bin:/opt/git/bin" },
					},
				],
				"linux",
			),
		)

		expect(report.recommendations).toEqual([
			"Run without --dry-run to add /opt/git/bin to the machine PATH.",
		])
	})

	it("suggests adding an editor directory by hand", () => {
		const state = { directory: "/usr/share/code/bin", kind: "found_not_on_path" } as const
		const report = buildReport(run([{ final: state, initial: state, probe: code }], "linux"))

		expect(report.recommendations).toEqual([
			'Add /usr/share/code/bin to your PATH, or reinstall Visual Studio Code with its "Add to PATH" option selected.',
		])
	})

	it("has nothing to add after a verified update", () => {
		const report = buildReport(
			run([
				{
					final: { kind: "found_on_path", location: "C:\\Git\\cmd\\git.exe" },
					initial: { directory: "C:\\Git\\cmd", kind: "found_not_on_path" },
					probe: git,
					reconciliation: { kind: "applied_and_verified", newPathValue: "C:\\Git\\cmd" },
				},
			]),
		)

		expect(report.ready).toBe(true)
		expect(report.recommendations).toEqual([])
	})
})
