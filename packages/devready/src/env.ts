import type { Result, ValidationError } from "@devready/core"
import { z } from "zod"

const flag = () =>
	z
		.string()
		.trim()
		.toLowerCase()
		.pipe(z.enum(["", "0", "1", "false", "true"]))
		.default("false")
		.transform((value) => value === "1" || value === "true")

export const schema = z.object({
	DEVREADY_ENVIRONMENT_FILE: z.string().trim().min(1).default("/etc/environment"),
	DEVREADY_LOG_LEVEL: z.coerce.number().int().min(0).max(5).default(3),
	DEVREADY_NO_PAUSE: flag(),
})

export type DevreadyEnv = z.infer<typeof schema>

export function loadEnv(
	source: NodeJS.ProcessEnv = process.env,
): Result<DevreadyEnv, ValidationError> {
	const parsed = schema.safeParse(source)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		const field = issue ? issue.path.join(".") : "environment"
		return {
			error: {
				field,
				message: `Invalid ${field}: ${issue?.message ?? "unexpected value"}`,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	return { ok: true, value: parsed.data }
}
