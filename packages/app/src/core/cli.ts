import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for json-util
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): "a demonstration entry point that exercises the API and prints results"
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → |args.sources| = arity(args.command)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "parse" | "merge" | "filter" | "count" | "keys" | "reverse" | "validate"

export type Source =
  | { readonly _tag: "Inline"; readonly text: string }
  | { readonly _tag: "File"; readonly path: string }

export interface CliArgs {
  readonly command: CliCommand
  readonly sources: ReadonlyArray<Source>
  readonly prefix: string | undefined
  readonly indent: number | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const inlineSource = (text: string): Source => ({ _tag: "Inline", text })

const fileSource = (path: string): Source => ({ _tag: "File", path })

export const defaultConfigPath = "./.json-util.json"

const isFlag = (value: string): boolean => value.startsWith("-")

const parseIndent = (value: string): Either.Either<number, CliError> =>
  /^\d+$/u.test(value)
    ? Either.right(Number(value))
    : Either.left(cliError(`Invalid indent value: ${value}`))

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("parse", () => Either.right<CliCommand>("parse")),
    Match.when("merge", () => Either.right<CliCommand>("merge")),
    Match.when("filter", () => Either.right<CliCommand>("filter")),
    Match.when("count", () => Either.right<CliCommand>("count")),
    Match.when("keys", () => Either.right<CliCommand>("keys")),
    Match.when("reverse", () => Either.right<CliCommand>("reverse")),
    Match.when("validate", () => Either.right<CliCommand>("validate")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

/**
 * Number of documents a command consumes.
 *
 * @pure true
 */
export const commandArity = (command: CliCommand): number => command === "merge" ? 2 : 1

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  sources: [],
  prefix: undefined,
  indent: undefined,
  configPath: defaultConfigPath,
  configPathExplicit: false,
  json: false,
  silent: false,
  verbose: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

interface ParsedFlag {
  readonly next: CliArgs
  readonly consumed: number
}

const setParsedFlag = (next: CliArgs, consumed: number): Either.Either<ParsedFlag, CliError> =>
  Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => Either.Either<CliArgs, CliError>
): Either.Either<ParsedFlag, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        sources: [...args.sources, inlineSource(value)]
      })),
  file: (current, inlineValue, nextValue) =>
    parseValueFlag("file", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        sources: [...args.sources, fileSource(value)]
      })),
  prefix: (current, inlineValue, nextValue) =>
    parseValueFlag("prefix", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, prefix: value })),
  indent: (current, inlineValue, nextValue) =>
    parseValueFlag("indent", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseIndent(value), (indent) => ({ ...args, indent }))),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({ ...args, configPath: value, configPathExplicit: true }))
}

const splitFlag = (raw: string): { readonly name: string; readonly inlineValue: string | undefined } => {
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  return separator === -1
    ? { name: body, inlineValue: undefined }
    : { name: body.slice(0, separator), inlineValue: body.slice(separator + 1) }
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<ParsedFlag, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const { inlineValue, name } = splitFlag(raw)
  const parser = Object.hasOwn(flagParsers, name) ? flagParsers[name] : undefined
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 1
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const checkArity = (args: CliArgs): Either.Either<CliArgs, CliError> => {
  const expected = commandArity(args.command)
  if (args.sources.length === expected) {
    return Either.right(args)
  }
  const noun = expected === 1 ? "document" : "documents"
  return Either.left(
    cliError(`${args.command} expects ${expected} ${noun}, got ${args.sources.length}`)
  )
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant sources keep argv order across --input and --file
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.left(cliError("Missing command"))
  }
  return Either.flatMap(parseCommand(first), (command) =>
    Either.flatMap(parseFlags(rawArgs, defaultArgs(command)), checkArity))
}
