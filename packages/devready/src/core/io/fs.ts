import type { Stats } from "node:fs"
import { readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import { consola } from "consola"
import type { IoResult } from "@/src/core/io/types"
import { ioFailure } from "@/src/core/io/types"
import { formatError } from "@/src/utils/errors"

export type { IoResult } from "@/src/core/io/types"

type StatResult = IoResult<Stats | null>

// A lookup that runs into one of these means "nothing usable here", not a failure.
const ABSENT_CODES = new Set(["ENOENT", "ENOTDIR"])

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isAbsent(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "stat")
	}
}

export async function fileExists(targetPath: string): Promise<IoResult<boolean>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	return { ok: true, value: stats.value?.isFile() ?? false }
}

export async function readOptionalFile(targetPath: string): Promise<IoResult<string | null>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		if (isAbsent(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "readFile")
	}
}

/**
 * Writes beside the target and renames over it, so a failed write leaves the
 * original untouched. An existing file keeps its permission bits.
 */
export async function writeFileUtf8(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	const existing = await safeStat(targetPath)
	if (!existing.ok) {
		return existing
	}

	const tempPath = `${targetPath}.${process.pid}.tmp`
	const mode = existing.value ? existing.value.mode & 0o777 : undefined
	try {
		await writeFile(tempPath, contents, { encoding: "utf8", mode })
		await rename(tempPath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		await removeQuietly(tempPath)
		return ioFailure(formatError(error), targetPath, "writeFile")
	}
}

async function removeQuietly(targetPath: string): Promise<void> {
	try {
		await rm(targetPath, { force: true })
	} catch (error) {
		consola.debug(`Unable to remove ${targetPath}: ${formatError(error)}`)
	}
}

export function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		const { code } = error
		return typeof code === "string" ? code : undefined
	}

	return undefined
}

function isAbsent(error: unknown): boolean {
	const code = errorCode(error)
	return code !== undefined && ABSENT_CODES.has(code)
}
