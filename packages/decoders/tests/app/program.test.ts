import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { formatAppError, runCli } from "../../src/app/program.js"
import { provideNodeContext, withTempDir, writeJson } from "./test-helpers.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "json-decode", ...args]

describe("json-decode program", () => {
  it.effect("prints the decoded value and exits with 0", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeJson(context, "config.json", `{}`))
        const file = yield* _(
          writeJson(context, "capybara.json", `{"name":"John Smith","species":"Capybara","age":2,"weight":42.31}`)
        )
        const result = yield* _(runCli(argv("--file", file, "--config", config)))
        expect(result.exitCode).toBe(0)
        expect(result.output).toBe(`{"weight":42.31,"age":2,"species":"Capybara","name":"John Smith"}`)
      })
    ).pipe(provideNodeContext))

  it.effect("prints the located error and exits with 1", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeJson(context, "config.json", `{"shape":"animal"}`))
        const file = yield* _(
          writeJson(context, "cat.json", `{"weight":5.1234,"age":5,"species":"Mr. Whiskers","name":"Cat"}`)
        )
        const result = yield* _(runCli(argv("decode", "--file", file, "--config", config)))
        expect(result.exitCode).toBe(1)
        expect(result.output).toBe(
          [
            "json context [0]",
            `"Mr. Whiskers"`,
            "json context [1] at key [species]",
            `{"weight":5.1234,"age":5,"species":"Mr. Whiskers","name":"Cat"}`,
            "unknown species: Mr. Whiskers"
          ].join("\n")
        )
      })
    ).pipe(provideNodeContext))

  it.effect("renders errors as JSON with --json", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeJson(context, "config.json", `{"shape":"reading"}`))
        const file = yield* _(writeJson(context, "reading.json", `[100,"hello",true,"extra value!"]`))
        const result = yield* _(runCli(argv("--file", file, "--config", config, "--json")))
        expect(result.exitCode).toBe(1)
        const parsed: unknown = JSON.parse(result.output)
        expect(parsed).toEqual({
          tag: "UnparsedTrailingElements",
          cause: "array_as_tuple has unparsed elements",
          frames: [{ depth: 0, value: [100, "hello", true, "extra value!"] }],
          remaining: ["extra value!"]
        })
      })
    ).pipe(provideNodeContext))

  it.effect("lets the CLI shape override the config file", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeJson(context, "config.json", `{"shape":"animal","indent":2}`))
        const file = yield* _(writeJson(context, "readings.json", `[[1,"a",true],[2,"b",false]]`))
        const result = yield* _(runCli(argv("--file", file, "--config", config, "--shape", "readings", "--indent", "0")))
        expect(result.exitCode).toBe(0)
        expect(result.output).toBe(`[{"id":1,"label":"a","active":true},{"id":2,"label":"b","active":false}]`)
      })
    ).pipe(provideNodeContext))

  it.effect("lists the bundled shapes", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeJson(context, "config.json", `{}`))
        const result = yield* _(runCli(argv("shapes", "--config", config)))
        expect(result.output).toBe("animal\nanimals\nreading\nreadings")
      })
    ).pipe(provideNodeContext))

  it.effect("fails on unknown shapes before reading the file", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeJson(context, "config.json", `{"shape":"unicorn"}`))
        const outcome = yield* _(Effect.either(runCli(argv("--file", "missing.json", "--config", config))))
        expect(Either.isLeft(outcome)).toBe(true)
        if (Either.isLeft(outcome)) {
          expect(formatAppError(outcome.left)).toBe(
            "invalid config: Unknown shape: unicorn (known: animal, animals, reading, readings)"
          )
        }
      })
    ).pipe(provideNodeContext))

  it.effect("treats inherited object members as unknown shapes", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const config = yield* _(writeJson(context, "config.json", `{}`))
        const outcome = yield* _(
          Effect.either(runCli(argv("--file", "missing.json", "--config", config, "--shape", "toString")))
        )
        expect(Either.isLeft(outcome)).toBe(true)
        if (Either.isLeft(outcome)) {
          expect(outcome.left).toEqual({
            _tag: "ConfigError",
            message: "Unknown shape: toString (known: animal, animals, reading, readings)"
          })
        }
      })
    ).pipe(provideNodeContext))

  it.effect("fails on bad arguments", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(Effect.either(runCli(argv("--bogus"))))
      expect(Either.isLeft(outcome) ? outcome.left._tag : "Right").toBe("CliError")
    }).pipe(provideNodeContext))
})
