import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the parser core and the CLI shell
// WHY: provide typed failures that callers can match exhaustively
// QUOTE(TZ): "InvalidInput, InvalidObject, InvalidArray, InvalidValue"
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type InvalidInput = { readonly _tag: "InvalidInput"; readonly text: string }
export type InvalidObject = {
  readonly _tag: "InvalidObject"
  readonly text: string
  readonly reason: string
}
export type InvalidArray = {
  readonly _tag: "InvalidArray"
  readonly text: string
  readonly reason: string
}
export type InvalidValue = { readonly _tag: "InvalidValue"; readonly token: string }

export type ParseError = InvalidInput | InvalidObject | InvalidArray | InvalidValue

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }

export type AppError = CliError | ConfigError | FileError | ParseError

export const invalidInput = (text: string): InvalidInput => ({
  _tag: "InvalidInput",
  text
})

export const invalidObject = (text: string, reason: string): InvalidObject => ({
  _tag: "InvalidObject",
  text,
  reason
})

export const invalidArray = (text: string, reason: string): InvalidArray => ({
  _tag: "InvalidArray",
  text,
  reason
})

export const invalidValue = (token: string): InvalidValue => ({
  _tag: "InvalidValue",
  token
})

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

/**
 * Render a parser failure as a single line.
 *
 * @pure true
 * @invariant nested reasons are kept verbatim
 * @complexity O(n)
 */
export const formatJsonError = (error: ParseError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "InvalidInput" }, (value) => `Invalid JSON input: ${value.text}`),
    Match.when({ _tag: "InvalidObject" }, (value) => `Invalid JSON object (${value.reason}): ${value.text}`),
    Match.when({ _tag: "InvalidArray" }, (value) => `Invalid JSON array (${value.reason}): ${value.text}`),
    Match.when({ _tag: "InvalidValue" }, (value) => `Invalid JSON value: ${value.token}`),
    Match.exhaustive
  )

export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.when({ _tag: "CliError" }, (value) => `error: ${value.message}`),
    Match.when({ _tag: "ConfigError" }, (value) => `config error: ${value.message}`),
    Match.when({ _tag: "FileError" }, (value) => `file error: ${value.message}`),
    Match.orElse((value) => formatJsonError(value))
  )
