import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel, Match } from "effect"
import * as Either from "effect/Either"

import type { CliArgs, CliCommand } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { resolveConfig } from "../core/config.js"
import { type AppError, configError } from "../core/errors.js"
import { jsonArray, jsonInt, jsonString } from "../core/json.js"
import { parse } from "../core/parse.js"
import { serialize } from "../core/serialize.js"
import {
  countJsonObjectKeys,
  filterKeysByPrefix,
  getJsonObjectKeys,
  isValidJsonArray,
  isValidJsonObject,
  mergeJsonObjects,
  reverseJsonArray
} from "../core/utilities.js"
import { loadConfigFile } from "../shell/config-file.js"
import { loadSources } from "../shell/source.js"

// CHANGE: orchestrate json-util commands with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// QUOTE(TZ): "calls only these operations and prints their results"
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀cmd: run(cmd) returns exitCode ∈ {0,2} or fails with AppError
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output emitted at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

type CommandResult =
  | { readonly _tag: "Text"; readonly text: string }
  | { readonly _tag: "Count"; readonly count: number }
  | { readonly _tag: "Keys"; readonly keys: ReadonlyArray<string> }
  | { readonly _tag: "Validity"; readonly valid: boolean }

const textResult = (text: string): CommandResult => ({ _tag: "Text", text })

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const runFilter = (
  document: string,
  config: ResolvedConfig
): Either.Either<CommandResult, AppError> => {
  if (config.prefix === undefined) {
    return Either.left(configError("filter requires a prefix (--prefix or \"prefix\" in config)"))
  }
  return Either.map(filterKeysByPrefix(document, config.prefix, config), textResult)
}

const runCommand = (
  command: CliCommand,
  config: ResolvedConfig,
  documents: ReadonlyArray<string>
): Either.Either<CommandResult, AppError> => {
  const [first = "", second = ""] = documents
  return Match.value(command).pipe(
    Match.when("parse", () => Either.map(parse(first), (value) => textResult(serialize(value, config)))),
    Match.when("merge", () => Either.map(mergeJsonObjects(first, second, config), textResult)),
    Match.when("filter", () => runFilter(first, config)),
    Match.when("count", () =>
      Either.map(countJsonObjectKeys(first), (count): CommandResult => ({ _tag: "Count", count }))),
    Match.when("keys", () =>
      Either.map(getJsonObjectKeys(first), (keys): CommandResult => ({ _tag: "Keys", keys }))),
    Match.when("reverse", () => Either.map(reverseJsonArray(first, config), textResult)),
    Match.when("validate", () =>
      Either.right<CommandResult>({
        _tag: "Validity",
        valid: isValidJsonObject(first) || isValidJsonArray(first)
      })),
    Match.exhaustive
  )
}

const renderHuman = (result: CommandResult): string =>
  Match.value(result).pipe(
    Match.when({ _tag: "Text" }, (value) => value.text),
    Match.when({ _tag: "Count" }, (value) => String(value.count)),
    Match.when({ _tag: "Keys" }, (value) => value.keys.join("\n")),
    Match.when({ _tag: "Validity" }, (value) => String(value.valid)),
    Match.exhaustive
  )

const renderJson = (result: CommandResult, config: ResolvedConfig): string =>
  Match.value(result).pipe(
    Match.when({ _tag: "Text" }, (value) => value.text),
    Match.when({ _tag: "Count" }, (value) => serialize(jsonInt(BigInt(value.count)))),
    Match.when({ _tag: "Keys" }, (value) => serialize(jsonArray(value.keys.map(jsonString)), config)),
    Match.when({ _tag: "Validity" }, (value) => String(value.valid)),
    Match.exhaustive
  )

const exitCodeFor = (result: CommandResult): number => result._tag === "Validity" && !result.valid ? 2 : 0

const executeCommand = (
  cli: CliArgs
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fileConfig = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const config = resolveConfig(cli, fileConfig)
    const documents = yield* _(loadSources(cli.sources))
    yield* _(Effect.logDebug(`running ${cli.command} with indent=${config.indent}`))
    const result = yield* _(fromEither(runCommand(cli.command, config, documents)))
    const output = cli.json ? renderJson(result, config) : renderHuman(result)
    if (!cli.silent) {
      yield* _(writeStdout(output))
    }
    return { output, exitCode: exitCodeFor(result) }
  })

/**
 * Run the CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    return yield* _(
      executeCommand(cli).pipe(
        Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info)
      )
    )
  })
