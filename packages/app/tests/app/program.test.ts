import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { runCli } from "../../src/app/program.js"
import { cliArgv, provideNodeContext, withTempDir } from "./test-helpers.js"

describe("runCli with inline documents", () => {
  it.effect("merges two objects", () =>
    Effect.gen(function*(_) {
      const result = yield* _(
        runCli(cliArgv("merge", "--input", `{"a":1,"b":2}`, "--input", `{"b":3,"c":4}`))
      )
      expect(result).toEqual({ output: `{"a":1,"b":3,"c":4}`, exitCode: 0 })
    }).pipe(provideNodeContext))

  it.effect("normalizes a document with an indent", () =>
    Effect.gen(function*(_) {
      const result = yield* _(runCli(cliArgv("parse", "--input", ` { "a" : [ 1 , 2.50 ] } `, "--indent", "2")))
      expect(result.output).toBe("{\n  \"a\": [\n    1,\n    2.5\n  ]\n}")
    }).pipe(provideNodeContext))

  it.effect("reverses an array", () =>
    Effect.gen(function*(_) {
      const result = yield* _(runCli(cliArgv("reverse", "--input", "[1,2,3]")))
      expect(result.output).toBe("[3,2,1]")
    }).pipe(provideNodeContext))

  it.effect("prints keys one per line, or as an array with --json", () =>
    Effect.gen(function*(_) {
      const human = yield* _(runCli(cliArgv("keys", "--input", `{"b":1,"a":2}`)))
      const json = yield* _(runCli(cliArgv("keys", "--input", `{"b":1,"a":2}`, "--json")))
      expect(human.output).toBe("b\na")
      expect(json.output).toBe(`["b","a"]`)
    }).pipe(provideNodeContext))

  it.effect("counts keys", () =>
    Effect.gen(function*(_) {
      const result = yield* _(runCli(cliArgv("count", "--input", `{"b":1,"a":{"c":2}}`, "--json")))
      expect(result.output).toBe("2")
    }).pipe(provideNodeContext))

  it.effect("exits with 2 when validation fails", () =>
    Effect.gen(function*(_) {
      const valid = yield* _(runCli(cliArgv("validate", "--input", "[1,2]")))
      const invalid = yield* _(runCli(cliArgv("validate", "--input", `{"a":`)))
      expect(valid).toEqual({ output: "true", exitCode: 0 })
      expect(invalid).toEqual({ output: "false", exitCode: 2 })
    }).pipe(provideNodeContext))

  it.effect("fails with the parser error for the wrong container", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(runCli(cliArgv("count", "--input", "[1]"))))
      expect(error).toEqual({ _tag: "InvalidObject", text: "[1]", reason: "expected object braces" })
    }).pipe(provideNodeContext))

  it.effect("fails with a CLI error before touching the filesystem", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(runCli(cliArgv("merge", "--input", "{}"))))
      expect(error).toEqual({ _tag: "CliError", message: "merge expects 2 documents, got 1" })
    }).pipe(provideNodeContext))

  it.effect("requires a prefix for filter", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(runCli(cliArgv("filter", "--input", `{"a":1}`))))
      expect(error._tag).toBe("ConfigError")
    }).pipe(provideNodeContext))
})

describe("runCli with files and config", () => {
  it.effect("reads documents and defaults from disk", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const docPath = path.join(tempDir, "doc.json")
        const configPath = path.join(tempDir, "config.json")
        yield* _(fs.writeFileString(docPath, `{"proj":"X","name":"Y"}`))
        yield* _(fs.writeFileString(configPath, `{"prefix":"pro","indent":2}`))

        const fromConfig = yield* _(runCli(cliArgv("filter", "--file", docPath, "--config", configPath)))
        const fromFlag = yield* _(
          runCli(cliArgv("filter", "--file", docPath, "--config", configPath, "--prefix", "na"))
        )

        expect(fromConfig.output).toBe("{\n  \"proj\": \"X\"\n}")
        expect(fromFlag.output).toBe("{\n  \"name\": \"Y\"\n}")
      })
    ).pipe(provideNodeContext))

  it.effect("merges a file with an inline document in argv order", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const docPath = path.join(tempDir, "left.json")
        yield* _(fs.writeFileString(docPath, `{"a":1,"b":2}`))
        const result = yield* _(runCli(cliArgv("merge", "--input", `{"b":9}`, "--file", docPath)))
        expect(result.output).toBe(`{"b":2,"a":1}`)
      })
    ).pipe(provideNodeContext))

  it.effect("rejects an invalid config file", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, "config.json")
        yield* _(fs.writeFileString(configPath, `{"indent":-1}`))
        const error = yield* _(Effect.flip(runCli(cliArgv("parse", "--input", "{}", "--config", configPath))))
        expect(error._tag).toBe("ConfigError")
      })
    ).pipe(provideNodeContext))

  it.effect("fails when an explicit config file is missing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const configPath = path.join(tempDir, "missing.json")
        const error = yield* _(Effect.flip(runCli(cliArgv("parse", "--input", "{}", "--config", configPath))))
        expect(error).toEqual({ _tag: "FileError", message: `Config file not found: ${configPath}` })
      })
    ).pipe(provideNodeContext))

  it.effect("fails when a document file is missing", () =>
    withTempDir(({ path, tempDir }) =>
      Effect.gen(function*(_) {
        const docPath = path.join(tempDir, "missing.json")
        const error = yield* _(Effect.flip(runCli(cliArgv("parse", "--file", docPath))))
        expect(error._tag).toBe("FileError")
      })
    ).pipe(provideNodeContext))
})
