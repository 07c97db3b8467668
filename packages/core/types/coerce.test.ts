import { describe, expect, it } from "vitest"
import { coerceAbsolutePathDirect, coerceToolId } from "./coerce"

describe("coerceToolId", () => {
	it("accepts known tool ids in any case", () => {
		expect(coerceToolId(" Git ")).toBe("git")
		expect(coerceToolId("vscode")).toBe("vscode")
	})

	it("rejects unknown tools", () => {
		expect(coerceToolId("svn")).toBeNull()
	})
})

describe("coerceAbsolutePathDirect", () => {
	it("uses Windows rules for win32", () => {
		expect(coerceAbsolutePathDirect("C:\\Program Files\\Git\\cmd\\", "win32")).toBe(
			"C:\\Program Files\\Git\\cmd\\",
		)
		expect(coerceAbsolutePathDirect("Git\\cmd", "win32")).toBeNull()
	})

	it("normalizes POSIX paths", () => {
		expect(coerceAbsolutePathDirect("/usr/local/../bin", "linux")).toBe("/usr/bin")
		expect(coerceAbsolutePathDirect("usr/bin", "linux")).toBeNull()
	})
})
