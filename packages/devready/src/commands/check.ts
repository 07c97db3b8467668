import { text } from "@clack/prompts"
import { consola } from "consola"
import { buildReport, printReconciliation, printReport, type Report } from "@/src/commands/report"
import { CommandResult, printOutcome } from "@/src/commands/types"
import { createSystemContext, type SystemContext } from "@/src/core/context"
import { runChecks } from "@/src/core/run"
import type { RunResult } from "@/src/core/tools/types"
import { type DevreadyEnv, loadEnv } from "@/src/env"

export interface CheckOptions {
	dryRun: boolean
	json: boolean
	nonInteractive: boolean
	verbose: boolean
}

export interface CheckSummary {
	report: Report
	result: RunResult
}

const VERBOSE_LEVEL = 4
const JSON_LEVEL = 1

export async function checkCommand(options: CheckOptions): Promise<void> {
	const envResult = loadEnv()
	if (!envResult.ok) {
		printOutcome(CommandResult.failed(envResult.error))
		return
	}

	const env = envResult.value
	consola.level = resolveLogLevel(env, options)
	consola.info("devready check")

	const context = createSystemContext({
		env: process.env,
		environmentFile: env.DEVREADY_ENVIRONMENT_FILE,
		platform: process.platform,
	})
	const outcome = await checkWithContext(context, { dryRun: options.dryRun })
	if (outcome.status === "completed") {
		publish(outcome.value, options.json)
	}

	if (!options.json) {
		printOutcome(outcome)
	}

	if (shouldPause(env, options)) {
		await text({ message: "Press Enter to close.", placeholder: "" })
	}
}

export async function checkWithContext(
	context: SystemContext,
	options: { dryRun: boolean },
): Promise<CommandResult<CheckSummary>> {
	const result = await runChecks(context, { dryRun: options.dryRun })
	for (const tool of result.tools) {
		printReconciliation(tool)
	}

	return CommandResult.completed({ report: buildReport(result), result })
}

function publish(summary: CheckSummary, json: boolean): void {
	if (json) {
		console.log(JSON.stringify(summary, omitRawErrors, 2))
	} else {
		printReport(summary.report)
	}

	if (!summary.report.ready) {
		process.exitCode = 1
	}
}

// Error objects serialize as {} and carry stack traces; keep the typed fields only.
function omitRawErrors(key: string, value: unknown): unknown {
	return key === "rawError" ? undefined : value
}

function resolveLogLevel(env: DevreadyEnv, options: CheckOptions): number {
	if (options.json) {
		return Math.min(env.DEVREADY_LOG_LEVEL, JSON_LEVEL)
	}

	return options.verbose ? VERBOSE_LEVEL : env.DEVREADY_LOG_LEVEL
}

function shouldPause(env: DevreadyEnv, options: CheckOptions): boolean {
	if (options.nonInteractive || options.json || env.DEVREADY_NO_PAUSE) {
		return false
	}

	return Boolean(process.stdin.isTTY && process.stdout.isTTY)
}
