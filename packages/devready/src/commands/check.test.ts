import { describe, expect, it } from "vitest"
import { checkWithContext } from "@/src/commands/check"
import { buildContext, createMemoryPathStore } from "@/tests/helpers"

describe("checkWithContext", () => {
	it("reports on every registered tool without writing on a dry run", async () => {
		const store = createMemoryPathStore("/usr/sbin", { delimiter: ":", ignoreCase: false })
		const context = buildContext({ store })

		const outcome = await checkWithContext(context, { dryRun: true })

		expect(outcome.status).toBe("completed")
		if (outcome.status === "completed") {
			expect(outcome.value.report.entries.map((entry) => entry.id)).toEqual(["git", "vscode"])
			expect(outcome.value.result.tools).toHaveLength(2)
		}
		expect(store.writes).toEqual([])
		expect(store.value).toBe("/usr/sbin")
	})
})
