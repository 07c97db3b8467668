import type { IoError, Result } from "@devready/core"

export type IoResult<T> = Result<T, IoError>

export function ioFailure<T>(message: string, path: string, operation: string): IoResult<T> {
	return {
		error: {
			message,
			operation,
			path,
			type: "io",
		},
		ok: false,
	}
}
