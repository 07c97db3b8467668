import type { ToolId } from "@devready/core"
import { consola } from "consola"
import { debugErrorChain } from "@/src/commands/types"
import type {
	InstallationState,
	ReconciliationOutcome,
	RunResult,
	ToolReport,
} from "@/src/core/tools/types"

export type ToolCategory = "ready" | "unreachable" | "missing"

export interface ReportEntry {
	id: ToolId
	name: string
	category: ToolCategory
	detail: string
}

export interface Report {
	entries: ReportEntry[]
	recommendations: string[]
	ready: boolean
}

const INSTALL_HINTS: Record<ToolId, { windows: string; other: string }> = {
	git: {
		other: "install it with your package manager or from https://git-scm.com/downloads",
		windows: "run `winget install --id Git.Git -e` or download it from https://git-scm.com/download/win",
	},
	vscode: {
		other: "download it from https://code.visualstudio.com/download",
		windows:
			"run `winget install --id Microsoft.VisualStudioCode -e` or download it from https://code.visualstudio.com/download",
	},
}

export function categorize(state: InstallationState): ToolCategory {
	switch (state.kind) {
		case "found_on_path":
			return "ready"
		case "found_not_on_path":
			return "unreachable"
		case "not_found":
			return "missing"
	}
}

export function describeState(state: InstallationState): string {
	switch (state.kind) {
		case "found_on_path":
			return `installed and on PATH (${state.location})`
		case "found_not_on_path":
			return `installed in ${state.directory}, not on PATH`
		case "not_found":
			return "not installed"
	}
}

export function buildReport(result: RunResult): Report {
	const entries = result.tools.map((tool) => ({
		category: categorize(tool.final),
		detail: describeState(tool.final),
		id: tool.probe.id,
		name: tool.probe.name,
	}))
	const recommendations = result.tools.flatMap((tool) => recommend(tool, result.platform))

	return {
		entries,
		ready: entries.every((entry) => entry.category === "ready"),
		recommendations,
	}
}

function recommend(tool: ToolReport, platform: NodeJS.Platform): string[] {
	const { final, probe, reconciliation } = tool
	if (final.kind === "found_on_path") {
		return []
	}

	if (final.kind === "not_found") {
		const hints = INSTALL_HINTS[probe.id]
		return [`Install ${probe.name}: ${platform === "win32" ? hints.windows : hints.other}.`]
	}

	if (!reconciliation) {
		return [
			`Add ${final.directory} to your PATH, or reinstall ${probe.name} with its "Add to PATH" option selected.`,
		]
	}

	return recommendReconciliation(probe.name, final.directory, reconciliation, platform)
}

function recommendReconciliation(
	name: string,
	directory: string,
	outcome: ReconciliationOutcome,
	platform: NodeJS.Platform,
): string[] {
	switch (outcome.kind) {
		case "already_present":
			return [
				`${directory} is already on the machine PATH. Open a new terminal session to use ${name}.`,
			]
		case "applied_but_unverified":
			return [`${directory} was added to the machine PATH. Open a new terminal session to use ${name}.`]
		case "planned":
			return [`Run without --dry-run to add ${directory} to the machine PATH.`]
		case "failed": {
			const elevated =
				platform === "win32" ? "an elevated (Run as administrator) terminal" : "a root shell (sudo)"
			return [
				`Could not add ${directory} to the machine PATH: ${outcome.reason}`,
				`Rerun devready from ${elevated}.`,
			]
		}
		case "applied_and_verified":
			return []
	}
}

export function printReport(report: Report): void {
	consola.info("Summary")
	for (const entry of report.entries) {
		const line = `${entry.name}: ${entry.detail}`
		switch (entry.category) {
			case "ready":
				consola.success(line)
				break
			case "unreachable":
				consola.warn(line)
				break
			case "missing":
				consola.error(line)
				break
		}
	}

	if (report.recommendations.length > 0) {
		consola.info("Next steps")
		for (const recommendation of report.recommendations) {
			consola.info(`- ${recommendation}`)
		}
	}

	if (report.ready) {
		consola.success("This machine is ready for development.")
	} else {
		consola.warn("This machine is not ready for development yet.")
	}
}

export function printReconciliation(tool: ToolReport): void {
	const outcome = tool.reconciliation
	if (!outcome) {
		return
	}

	switch (outcome.kind) {
		case "already_present":
			consola.info(`${tool.probe.name} directory is already on the machine PATH.`)
			break
		case "applied_and_verified":
			consola.success(`Added ${tool.probe.name} to the machine PATH.`)
			consola.debug(`New machine PATH: ${outcome.newPathValue}`)
			break
		case "applied_but_unverified":
			consola.warn(`Added ${tool.probe.name} to the machine PATH, but it is not visible yet.`)
			break
		case "planned":
			consola.info(`Would set the machine PATH to: ${outcome.newPathValue}`)
			break
		case "failed":
			consola.warn(`Could not update the machine PATH for ${tool.probe.name}.`)
			debugErrorChain(outcome.error)
			break
	}
}
