import type { BaseError, PathDelimiter, Result } from "@devready/core"
import type { StoreError } from "@/src/types/errors"

/**
 * The persistent, machine-scope search path that new sessions inherit.
 * Implementations never throw; failures come back as `StoreError`s.
 */
export interface MachinePathStore {
	readonly delimiter: PathDelimiter
	/** Human-readable location, used in messages */
	readonly location: string
	/** Whether entries compare case-insensitively */
	readonly ignoreCase: boolean
	read(): Promise<Result<string, StoreError>>
	write(value: string): Promise<Result<void, StoreError>>
}

export function storeFailure(
	location: string,
	operation: StoreError["operation"],
	message: string,
	cause?: BaseError,
): { ok: false; error: StoreError } {
	return {
		error: {
			cause,
			location,
			message,
			operation,
			type: "store",
		},
		ok: false,
	}
}
