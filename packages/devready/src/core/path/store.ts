import { createEnvironmentFileStore } from "@/src/core/path/env-file-store"
import type { MachinePathStore } from "@/src/core/path/types"
import { createWindowsRegistryStore } from "@/src/core/path/windows-store"

export interface StoreSelection {
	platform: NodeJS.Platform
	env: NodeJS.ProcessEnv
	environmentFile: string
}

export function createMachinePathStore(selection: StoreSelection): MachinePathStore {
	if (selection.platform === "win32") {
		return createWindowsRegistryStore({ env: selection.env })
	}

	return createEnvironmentFileStore(selection.environmentFile)
}
