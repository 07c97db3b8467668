import type { BaseError, IoError, ValidationError } from "@devready/core"

export type StoreOperation = "read" | "write"

export interface StoreError extends BaseError {
	type: "store"
	location: string
	operation: StoreOperation
}

export interface CommandError extends BaseError {
	type: "command"
	command: string
	exitCode?: number
}

export interface ConflictError extends BaseError {
	type: "conflict"
	target: string
}

export type DevreadyError = ValidationError | IoError | StoreError | CommandError | ConflictError
