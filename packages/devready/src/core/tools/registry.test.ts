import { describe, expect, it } from "vitest"
import { getToolById, listTools } from "@/src/core/tools/registry"

describe("listTools", () => {
	it("orders Windows candidates user-local, 64-bit, then 32-bit", () => {
		const [git, vscode] = listTools({
			env: {
				LOCALAPPDATA: "C:\\Users\\dev\\AppData\\Local",
				ProgramFiles: "D:\\Apps",
				"ProgramFiles(x86)": "D:\\Apps (x86)",
			},
			platform: "win32",
		})

		expect(git).toEqual({
			executable: "git.exe",
			id: "git",
			knownInstallDirs: [
				"C:\\Users\\dev\\AppData\\Local\\Programs\\Git\\cmd",
				"D:\\Apps\\Git\\cmd",
				"D:\\Apps (x86)\\Git\\cmd",
			],
			name: "Git",
			pathCommand: "git",
			reconcile: true,
		})
		expect(vscode?.knownInstallDirs).toEqual([
			"C:\\Users\\dev\\AppData\\Local\\Programs\\Microsoft VS Code\\bin",
			"D:\\Apps\\Microsoft VS Code\\bin",
			"D:\\Apps (x86)\\Microsoft VS Code\\bin",
		])
		expect(vscode?.reconcile).toBe(false)
	})

	it("falls back to default Windows locations when variables are unset", () => {
		const [git] = listTools({ env: {}, homeDir: "C:\\Users\\dev", platform: "win32" })

		expect(git?.knownInstallDirs).toEqual([
			"C:\\Users\\dev\\AppData\\Local\\Programs\\Git\\cmd",
			"C:\\Program Files\\Git\\cmd",
			"C:\\Program Files (x86)\\Git\\cmd",
		])
	})

	it("ignores relative install roots", () => {
		const [git] = listTools({
			env: { LOCALAPPDATA: "  ", ProgramFiles: "Apps" },
			homeDir: "C:\\Users\\dev",
			platform: "win32",
		})

		expect(git?.knownInstallDirs).toEqual([
			"C:\\Users\\dev\\AppData\\Local\\Programs\\Git\\cmd",
			"C:\\Program Files\\Git\\cmd",
			"C:\\Program Files (x86)\\Git\\cmd",
		])
	})

	it("uses conventional locations elsewhere", () => {
		const [git] = listTools({ env: {}, homeDir: "/home/dev", platform: "linux" })

		expect(git?.executable).toBe("git")
		expect(git?.knownInstallDirs).toEqual([
			"/home/dev/.local/bin",
			"/usr/local/bin",
			"/opt/homebrew/bin",
			"/usr/bin",
		])
	})
})

describe("getToolById", () => {
	it("finds a tool by id", () => {
		const result = getToolById("VSCode", { env: {}, platform: "linux" })

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.pathCommand).toBe("code")
		}
	})

	it("rejects unknown tools", () => {
		const result = getToolById("svn", { env: {}, platform: "linux" })

		expect(result).toMatchObject({
			error: { field: "tool", message: "Unknown tool: svn. Known tools: git, vscode." },
			ok: false,
		})
	})
})
