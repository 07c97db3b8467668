import { consola } from "consola"
import type { SystemContext } from "@/src/core/context"
import { detectTool } from "@/src/core/detect/detect"
import { reconcilePath } from "@/src/core/path/reconcile"
import { listTools } from "@/src/core/tools/registry"
import type { RunResult, ToolProbe, ToolReport } from "@/src/core/tools/types"

export interface RunOptions {
	dryRun: boolean
	/** Overrides the registry, mainly for tests */
	tools?: ToolProbe[]
}

export async function runChecks(context: SystemContext, options: RunOptions): Promise<RunResult> {
	const elevated = await context.isElevated()
	const probes =
		options.tools ??
		listTools({ env: context.env, homeDir: context.homeDir, platform: context.platform })

	const tools: ToolReport[] = []
	for (const probe of probes) {
		tools.push(await checkTool(probe, context, { ...options, elevated }))
	}

	return { elevated, platform: context.platform, tools }
}

async function checkTool(
	probe: ToolProbe,
	context: SystemContext,
	options: RunOptions & { elevated: boolean },
): Promise<ToolReport> {
	consola.start(`Checking ${probe.name}...`)
	const initial = await detectTool(probe, context)
	if (initial.kind !== "found_not_on_path" || !probe.reconcile) {
		return { final: initial, initial, probe }
	}

	if (!options.elevated && !options.dryRun) {
		consola.warn(
			`Not running with elevated rights; updating ${context.store.location} will probably fail.`,
		)
	}

	consola.start(
		options.dryRun
			? `Planning PATH update for ${probe.name}...`
			: `Adding ${initial.directory} to ${context.store.location}...`,
	)
	const reconciliation = await reconcilePath(probe, initial.directory, {
		dryRun: options.dryRun,
		env: context.env,
		platform: context.platform,
		resolveCommand: context.resolveCommand,
		store: context.store,
	})
	const final = reconciliation.kind === "planned" ? initial : await detectTool(probe, context)

	return { final, initial, probe, reconciliation }
}
