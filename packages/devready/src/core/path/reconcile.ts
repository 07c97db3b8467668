import { ensurePathEntry } from "@devready/core"
import type { CommandResolver } from "@/src/core/detect/resolve"
import { appendProcessPath } from "@/src/core/path/process"
import type { MachinePathStore } from "@/src/core/path/types"
import type { ReconciliationOutcome, ToolProbe } from "@/src/core/tools/types"
import type { DevreadyError } from "@/src/types/errors"

// One retry when the stored value changes between our read and our write.
const MAX_ATTEMPTS = 2

export interface ReconcileContext {
	platform: NodeJS.Platform
	/** Environment of the running process; PATH is updated in place */
	env: NodeJS.ProcessEnv
	store: MachinePathStore
	resolveCommand: CommandResolver
	dryRun?: boolean
}

/**
 * Makes `directory` part of the machine PATH, at most once.
 *
 * Existing entries are never rewritten or reordered; the directory is
 * appended. After a successful write the running process gets the same entry
 * so the tool can be looked up again straight away.
 */
export async function reconcilePath(
	probe: ToolProbe,
	directory: string,
	context: ReconcileContext,
): Promise<ReconciliationOutcome> {
	const { store } = context
	const options = { delimiter: store.delimiter, ignoreCase: store.ignoreCase }

	const initial = await store.read()
	if (!initial.ok) {
		return failed(initial.error)
	}

	let current = initial.value
	for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt += 1) {
		const ensured = ensurePathEntry(current, directory, options)
		if (!ensured.changed) {
			return { kind: "already_present" }
		}

		if (context.dryRun) {
			return { kind: "planned", newPathValue: ensured.value }
		}

		const fresh = await store.read()
		if (!fresh.ok) {
			return failed(fresh.error)
		}

		if (fresh.value !== current) {
			current = fresh.value
			continue
		}

		const written = await store.write(ensured.value)
		if (!written.ok) {
			return failed(written.error)
		}

		appendProcessPath(context.env, directory, store.delimiter, context.platform)
		const verified = await verify(probe, context.resolveCommand)
		return verified
			? { kind: "applied_and_verified", newPathValue: ensured.value }
			: { kind: "applied_but_unverified", newPathValue: ensured.value }
	}

	return failed({
		message: `${store.location} kept changing while it was being updated.`,
		target: store.location,
		type: "conflict",
	})
}

async function verify(probe: ToolProbe, resolveCommand: CommandResolver): Promise<boolean> {
	try {
		const resolved = await resolveCommand(probe.pathCommand)
		return resolved.ok && resolved.value !== null
	} catch {
		// A lookup that throws after the write counts as not yet visible.
		return false
	}
}

function failed(error: DevreadyError): ReconciliationOutcome {
	return { error, kind: "failed", reason: error.message }
}
