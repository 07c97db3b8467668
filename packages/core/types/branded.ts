/**
 * Branded types used across core.
 */

declare const AbsolutePathBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>

export type ToolId = "git" | "vscode"
