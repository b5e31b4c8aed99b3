import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import { get } from "effect/Record"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import type { ResolvedConfig } from "../core/config.js"
import type { Decoder } from "../core/decoder.js"
import type { AppError } from "../core/errors.js"
import { cliError, configError } from "../core/errors.js"
import { formatDecodeError, renderJsonError } from "../core/report.js"
import { loadConfigFile } from "../shell/config-file.js"
import { decodeFile } from "../shell/json-file.js"
import { shapeNames, shapes } from "./shapes.js"

// CHANGE: orchestrate the json-decode command with functional core + imperative shell
// WHY: a single entrypoint maps decode outcomes to output and exit codes
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: run(argv) returns exitCode ∈ {0,1}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: output is written at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly output: string
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const emit = (output: string, exitCode: number): Effect.Effect<ProgramResult> =>
  writeStdout(output).pipe(Effect.as({ output, exitCode }))

// own keys only: names like "toString" are unknown shapes
const selectShape = (name: string): Effect.Effect<Decoder<unknown>, AppError> =>
  Option.match(get(shapes, name), {
    onNone: () => Effect.fail(configError(`Unknown shape: ${name} (known: ${shapeNames().join(", ")})`)),
    onSome: Effect.succeed
  })

const requireFile = (cli: CliArgs): Effect.Effect<string, AppError> =>
  cli.file === undefined ? Effect.fail(cliError("Missing value for --file")) : Effect.succeed(cli.file)

const handleDecode = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const file = yield* _(requireFile(cli))
    const decoder = yield* _(selectShape(config.shape))
    const outcome = yield* _(Effect.either(decodeFile(decoder, file)))
    if (Either.isRight(outcome)) {
      return yield* _(emit(JSON.stringify(outcome.right, null, config.render.indent), 0))
    }
    const failure = outcome.left
    if (failure._tag !== "DecodeFileError") {
      return yield* _(Effect.fail(failure))
    }
    const rendered = cli.json
      ? renderJsonError(failure.error)
      : formatDecodeError(failure.error, config.render)
    return yield* _(emit(rendered, 1))
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("shapes", () => emit(shapeNames().join("\n"), 0)),
    Match.when("decode", () => handleDecode(cli, config)),
    Match.exhaustive
  )

/**
 * Render a failure that stopped the program before any decode output.
 *
 * @pure true
 */
export const formatAppError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => value.message),
    Match.tag("ConfigError", (value) => `invalid config: ${value.message}`),
    Match.tag("FileError", (value) => value.message),
    Match.tag("ParseError", (value) => `${value.file}: ${value.error}`),
    Match.tag("DecodeFileError", (value) => `${value.file}: ${value.error.cause}`),
    Match.exhaustive
  )

/**
 * Run the json-decode program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the printed output and exit code.
 *
 * @pure false
 * @effect FileSystem, stdout
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const configFile = yield* _(loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configPathExplicit))
    return yield* _(executeCommand(cli, resolveConfig(cli, configFile)))
  })
