import { POSIX_PATH_DELIMITER } from "@devready/core"
import { readOptionalFile, writeFileUtf8 } from "@/src/core/io/fs"
import type { MachinePathStore } from "@/src/core/path/types"
import { storeFailure } from "@/src/core/path/types"

const PATH_LINE = /^\s*(?:export\s+)?PATH\s*=(.*)$/

/**
 * Machine PATH kept as a `PATH="..."` line of an environment file such as
 * /etc/environment (read by pam_env for every new session).
 */
export function createEnvironmentFileStore(location: string): MachinePathStore {
	return {
		delimiter: POSIX_PATH_DELIMITER,
		ignoreCase: false,
		location,
		async read() {
			const contents = await readOptionalFile(location)
			if (!contents.ok) {
				return storeFailure(location, "read", contents.error.message, contents.error)
			}

			const lines = splitLines(contents.value ?? "")
			const index = findPathLine(lines)
			return { ok: true, value: index === -1 ? "" : parsePathLine(lines[index] ?? "") }
		},
		async write(value) {
			const contents = await readOptionalFile(location)
			if (!contents.ok) {
				return storeFailure(location, "write", contents.error.message, contents.error)
			}

			const written = await writeFileUtf8(location, renderContents(contents.value ?? "", value))
			if (!written.ok) {
				return storeFailure(location, "write", written.error.message, written.error)
			}

			return { ok: true, value: undefined }
		},
	}
}

/**
 * Replaces the PATH line, or appends one, leaving every other line as it was.
 * The file's own line ending is kept.
 */
export function renderContents(contents: string, value: string): string {
	const rendered = `PATH="${value}"`
	const eol = lineEnding(contents)
	const lines = splitLines(contents)
	const index = findPathLine(lines)
	if (index !== -1) {
		lines[index] = rendered
		return lines.join(eol)
	}

	if (contents.length === 0) {
		return `${rendered}${eol}`
	}

	const separator = contents.endsWith("\n") ? "" : eol
	return `${contents}${separator}${rendered}${eol}`
}

export function parsePathLine(line: string): string {
	const match = PATH_LINE.exec(line)
	const raw = match?.[1]?.trim() ?? ""
	const quote = raw[0]
	if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
		return raw.slice(1, -1)
	}

	return raw
}

function lineEnding(contents: string): string {
	return contents.includes("\r\n") ? "\r\n" : "\n"
}

function splitLines(contents: string): string[] {
	return contents.split(/\r?\n/)
}

// pam_env keeps the last assignment, so that is the one read and rewritten.
function findPathLine(lines: string[]): number {
	for (let index = lines.length - 1; index >= 0; index--) {
		if (PATH_LINE.test(lines[index] ?? "")) {
			return index
		}
	}

	return -1
}
