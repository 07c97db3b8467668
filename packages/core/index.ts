/**
 * @devready/core
 *
 * Shared constants, types, and pure utilities for search-path handling.
 */

export {
	DEFAULT_PATHEXT,
	PATH_VARIABLE,
	POSIX_PATH_DELIMITER,
	WINDOWS_PATH_DELIMITER,
} from "./constants"
export type { EnsureEntryResult, PathDelimiter, PathListOptions } from "./path-list/entries"
export {
	appendPathEntry,
	countPathEntry,
	ensurePathEntry,
	hasPathEntry,
	pathDelimiterFor,
	splitPathList,
} from "./path-list/entries"
export type { AbsolutePath, ToolId } from "./types/branded"
export { coerceAbsolutePathDirect, coerceToolId, VALID_TOOL_IDS } from "./types/coerce"
export type { BaseError, CoreError, IoError, Result, ValidationError } from "./types/error"
