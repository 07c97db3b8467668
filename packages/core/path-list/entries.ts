import { POSIX_PATH_DELIMITER, WINDOWS_PATH_DELIMITER } from "../constants"

export type PathDelimiter = typeof WINDOWS_PATH_DELIMITER | typeof POSIX_PATH_DELIMITER

export interface PathListOptions {
	delimiter: PathDelimiter
	/** Defaults to true: Windows resolves directories case-insensitively. */
	ignoreCase?: boolean
}

export type EnsureEntryResult =
	| { changed: false; value: string }
	| { changed: true; value: string }

export function pathDelimiterFor(platform: NodeJS.Platform): PathDelimiter {
	return platform === "win32" ? WINDOWS_PATH_DELIMITER : POSIX_PATH_DELIMITER
}

/**
 * Splits a search-path value into its raw segments.
 * Segments keep their surrounding whitespace and empty segments are kept,
 * so joining the result with the same delimiter gives back the input.
 */
export function splitPathList(value: string, delimiter: PathDelimiter): string[] {
	if (value.length === 0) {
		return []
	}

	return value.split(delimiter)
}

export function countPathEntry(
	value: string,
	entry: string,
	options: PathListOptions,
): number {
	const ignoreCase = options.ignoreCase ?? true
	const target = comparable(entry, ignoreCase)
	if (target.length === 0) {
		return 0
	}

	return splitPathList(value, options.delimiter).filter(
		(segment) => comparable(segment, ignoreCase) === target,
	).length
}

export function hasPathEntry(
	value: string,
	entry: string,
	options: PathListOptions,
): boolean {
	return countPathEntry(value, entry, options) > 0
}

export function appendPathEntry(
	value: string,
	entry: string,
	delimiter: PathDelimiter,
): string {
	return value.length === 0 ? entry : `${value}${delimiter}${entry}`
}

export function ensurePathEntry(
	value: string,
	entry: string,
	options: PathListOptions,
): EnsureEntryResult {
	if (hasPathEntry(value, entry, options)) {
		return { changed: false, value }
	}

	return { changed: true, value: appendPathEntry(value, entry, options.delimiter) }
}

function comparable(segment: string, ignoreCase: boolean): string {
	const trimmed = segment.trim()
	return ignoreCase ? trimmed.toLowerCase() : trimmed
}
