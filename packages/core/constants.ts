/**
 * Shared constants for search-path handling across packages.
 */

/** Name of the search-path variable in a process environment */
export const PATH_VARIABLE = "PATH"

/** Delimiter between search-path entries on Windows */
export const WINDOWS_PATH_DELIMITER = ";"

/** Delimiter between search-path entries everywhere else */
export const POSIX_PATH_DELIMITER = ":"

/** Extensions tried on Windows when PATHEXT is unset */
export const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD"
