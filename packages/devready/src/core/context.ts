import type { IoError, Result } from "@devready/core"
import type { CommandResolver } from "@/src/core/detect/resolve"
import { createCommandResolver } from "@/src/core/detect/resolve"
import { fileExists } from "@/src/core/io/fs"
import { createMachinePathStore } from "@/src/core/path/store"
import type { MachinePathStore } from "@/src/core/path/types"
import { isElevated } from "@/src/core/privilege"

/** Everything a run needs from the machine it runs on. */
export interface SystemContext {
	platform: NodeJS.Platform
	env: NodeJS.ProcessEnv
	homeDir?: string
	store: MachinePathStore
	resolveCommand: CommandResolver
	fileExists: (filePath: string) => Promise<Result<boolean, IoError>>
	isElevated: () => Promise<boolean>
}

export interface SystemContextOptions {
	platform: NodeJS.Platform
	env: NodeJS.ProcessEnv
	environmentFile: string
}

export function createSystemContext(options: SystemContextOptions): SystemContext {
	const { env, platform } = options
	return {
		env,
		fileExists,
		isElevated: () => isElevated(platform),
		platform,
		// Reads PATH from `env` on every call, so entries appended later are seen.
		resolveCommand: createCommandResolver({ env, platform }),
		store: createMachinePathStore({
			env,
			environmentFile: options.environmentFile,
			platform,
		}),
	}
}
