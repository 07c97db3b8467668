import { WINDOWS_PATH_DELIMITER } from "@devready/core"
import type { MachinePathStore } from "@/src/core/path/types"
import { storeFailure } from "@/src/core/path/types"
import { runCommand } from "@/src/utils/exec"

const ENVIRONMENT_KEY = "SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment"
const LOCATION = `HKLM\\${ENVIRONMENT_KEY}\\Path`

/** Carries the new value into PowerShell without quoting it into the script. */
export const PATH_VALUE_VARIABLE = "DEVREADY_MACHINE_PATH"

// Read the raw REG_EXPAND_SZ value so %SystemRoot%-style entries survive a rewrite.
export const READ_SCRIPT = [
	"$ErrorActionPreference = 'Stop'",
	"[Console]::OutputEncoding = [System.Text.Encoding]::UTF8",
	`$key = [Microsoft.Win32.Registry]::LocalMachine.OpenSubKey('${ENVIRONMENT_KEY}')`,
	"$value = $key.GetValue('Path', '', [Microsoft.Win32.RegistryValueOptions]::DoNotExpandEnvironmentNames)",
	"$key.Close()",
	"[Console]::Out.Write([string]$value)",
].join("; ")

// Opening the key writable needs an elevated token; the broadcast tells
// Explorer and new consoles to reload the environment.
export const WRITE_SCRIPT = [
	"$ErrorActionPreference = 'Stop'",
	`$key = [Microsoft.Win32.Registry]::LocalMachine.OpenSubKey('${ENVIRONMENT_KEY}', $true)`,
	`$key.SetValue('Path', $env:${PATH_VALUE_VARIABLE}, [Microsoft.Win32.RegistryValueKind]::ExpandString)`,
	"$key.Close()",
	"Add-Type -Namespace Devready -Name Native -MemberDefinition '[DllImport(\"user32.dll\", CharSet = CharSet.Auto)] public static extern IntPtr SendMessageTimeout(IntPtr hWnd, uint Msg, UIntPtr wParam, string lParam, uint fuFlags, uint uTimeout, out UIntPtr lpdwResult);'",
	"$result = [UIntPtr]::Zero",
	"[void][Devready.Native]::SendMessageTimeout([IntPtr]0xffff, 0x1A, [UIntPtr]::Zero, 'Environment', 2, 5000, [ref]$result)",
].join("; ")

const POWERSHELL_ARGS = ["-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass"]

// -EncodedCommand takes base64 UTF-16LE, which sidesteps command-line quoting.
export function encodeScript(script: string): string[] {
	return [...POWERSHELL_ARGS, "-EncodedCommand", Buffer.from(script, "utf16le").toString("base64")]
}

export interface WindowsStoreOptions {
	env?: NodeJS.ProcessEnv
	powershell?: string
}

export function createWindowsRegistryStore(options: WindowsStoreOptions = {}): MachinePathStore {
	const env = options.env ?? process.env
	const powershell = options.powershell ?? "powershell.exe"

	return {
		delimiter: WINDOWS_PATH_DELIMITER,
		ignoreCase: true,
		location: LOCATION,
		async read() {
			const result = await runCommand(powershell, encodeScript(READ_SCRIPT), { env })
			if (!result.ok) {
				return storeFailure(
					LOCATION,
					"read",
					`Unable to read the machine PATH: ${result.error.message}`,
					result.error,
				)
			}

			return { ok: true, value: result.value.stdout.replace(/\r?\n$/, "") }
		},
		async write(value) {
			const result = await runCommand(powershell, encodeScript(WRITE_SCRIPT), {
				env: { ...env, [PATH_VALUE_VARIABLE]: value },
			})
			if (!result.ok) {
				return storeFailure(
					LOCATION,
					"write",
					`Unable to update the machine PATH (administrator rights are required): ${result.error.message}`,
					result.error,
				)
			}

			return { ok: true, value: undefined }
		},
	}
}
