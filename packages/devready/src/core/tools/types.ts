import type { ToolId } from "@devready/core"
import type { DevreadyError } from "@/src/types/errors"

export interface ToolProbe {
	readonly id: ToolId
	readonly name: string
	/** Command name looked up on PATH */
	readonly pathCommand: string
	/** File expected inside an install directory */
	readonly executable: string
	/** Candidate install directories, highest priority first */
	readonly knownInstallDirs: readonly string[]
	/** Whether devready may add the install directory to the machine PATH */
	readonly reconcile: boolean
}

export type InstallationState =
	| { kind: "not_found" }
	| { kind: "found_not_on_path"; directory: string }
	| { kind: "found_on_path"; location: string }

export type ReconciliationOutcome =
	| { kind: "already_present" }
	| { kind: "applied_and_verified"; newPathValue: string }
	| { kind: "applied_but_unverified"; newPathValue: string }
	| { kind: "planned"; newPathValue: string }
	| { kind: "failed"; reason: string; error: DevreadyError }

export interface ToolReport {
	probe: ToolProbe
	/** State before any PATH change */
	initial: InstallationState
	/** State after reconciliation, or the initial state when none ran */
	final: InstallationState
	reconciliation?: ReconciliationOutcome
}

export interface RunResult {
	platform: NodeJS.Platform
	elevated: boolean
	tools: ToolReport[]
}
