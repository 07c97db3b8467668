import { join } from "node:path"
import { describe, expect, it } from "vitest"
import { resolveCommand } from "@/src/core/detect/resolve"
import { withTempDir, writeExecutable, writePlainFile } from "@/tests/helpers"

describe("resolveCommand", () => {
	it("returns the first executable match in PATH order", async () => {
		await withTempDir(async (dir) => {
			const first = join(dir, "first")
			const second = join(dir, "second")
			await writeExecutable(join(second, "git"))
			await writeExecutable(join(first, "git"))

			const result = await resolveCommand("git", {
				env: { PATH: `${join(dir, "empty")}:${first}:${second}` },
				platform: "linux",
			})

			expect(result).toEqual({ ok: true, value: join(first, "git") })
		})
	})

	it("ignores files without an executable bit", async () => {
		await withTempDir(async (dir) => {
			await writePlainFile(join(dir, "bin", "git"))

			const result = await resolveCommand("git", {
				env: { PATH: join(dir, "bin") },
				platform: "linux",
			})

			expect(result).toEqual({ ok: true, value: null })
		})
	})

	it("skips blank entries and directories named like the command", async () => {
		await withTempDir(async (dir) => {
			const decoy = join(dir, "decoy")
			const real = join(dir, "real")
			await writeExecutable(join(decoy, "git", "placeholder"))
			await writeExecutable(join(real, "git"))

			const result = await resolveCommand("git", {
				env: { PATH: `: ${decoy} ::${real}` },
				platform: "linux",
			})

			expect(result).toEqual({ ok: true, value: join(real, "git") })
		})
	})

	it("returns null when PATH is unset", async () => {
		const result = await resolveCommand("git", { env: {}, platform: "linux" })

		expect(result).toEqual({ ok: true, value: null })
	})

	it("tries each PATHEXT extension on Windows", async () => {
		await withTempDir(async (dir) => {
			await writePlainFile(join(dir, "code.cmd"))

			const result = await resolveCommand("code", {
				env: { PATHEXT: ".exe;.cmd", Path: `"${dir}"` },
				platform: "win32",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value).not.toBeNull()
				expect(result.value?.endsWith("code.cmd")).toBe(true)
			}
		})
	})

	it("uses the name as given when it already carries a PATHEXT extension", async () => {
		await withTempDir(async (dir) => {
			await writePlainFile(join(dir, "git.exe"))

			const result = await resolveCommand("git.exe", {
				env: { PATH: dir, PATHEXT: ".exe" },
				platform: "win32",
			})

			expect(result.ok).toBe(true)
			if (result.ok) {
				expect(result.value?.endsWith("git.exe")).toBe(true)
			}
		})
	})
})
