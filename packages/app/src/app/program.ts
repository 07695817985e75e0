import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Logger, LogLevel } from "effect"
import type * as Either from "effect/Either"

import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import { resolveConfig } from "../core/config.js"
import { type AppError, parseFailed } from "../core/errors.js"
import { parseEffect } from "../core/parse.js"
import { renderAppError, renderOutput } from "../core/report.js"
import type { JsonValue } from "../core/value.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readInput } from "../shell/input.js"

// CHANGE: orchestrate json-tree commands with functional core + imperative shell
// WHY: single entrypoint with typed errors and deterministic outputs
// FORMAT THEOREM: ∀argv: run(argv).exitCode = 0 ↔ the input parsed under the resolved options
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, never, FileSystem>
// INVARIANT: stdout and stderr are each written at most once
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly exitCode: number
  readonly value: JsonValue | undefined
  readonly stdout: string
  readonly stderr: string
}

const writeLine = (stream: NodeJS.WriteStream, payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    stream.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const parseInput = (cli: CliArgs): Effect.Effect<JsonValue, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const configFile = yield* _(loadConfigFile(cli.configPath, cli.configPathExplicit))
    const options = resolveConfig(cli, configFile)
    const input = yield* _(readInput(cli.input))
    yield* _(
      Effect.logDebug(
        `parsing ${input.source} (${input.text.length} chars, maxDepth=${options.maxDepth}, ` +
          `allowEmptyObject=${options.allowEmptyObject})`
      )
    )
    const value = yield* _(
      parseEffect(input.text, options).pipe(
        Effect.mapError((error) => parseFailed(input.source, input.text, error))
      )
    )
    yield* _(Effect.logDebug(`parsed ${value._tag} from ${input.source}`))
    return value
  })

const succeed = (cli: CliArgs, value: JsonValue): Effect.Effect<ProgramResult> =>
  Effect.gen(function*(_) {
    const stdout = renderOutput(cli.command, value)
    if (!cli.silent) {
      yield* _(writeLine(process.stdout, stdout))
    }
    return { exitCode: 0, value, stdout, stderr: "" }
  })

const fail = (error: AppError, silent: boolean): Effect.Effect<ProgramResult> =>
  Effect.gen(function*(_) {
    const stderr = renderAppError(error)
    if (!silent) {
      yield* _(writeLine(process.stderr, stderr))
    }
    return { exitCode: 1, value: undefined, stdout: "", stderr }
  })

const runParsed = (cli: CliArgs): Effect.Effect<ProgramResult, never, FileSystemService> =>
  parseInput(cli).pipe(
    Effect.flatMap((value) => succeed(cli, value)),
    Effect.catchAll((error) => fail(error, cli.silent)),
    Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Info)
  )

/**
 * Run the CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the parsed value (if any), rendered output and exit code.
 *
 * @pure false
 * @effect FileSystem, stdout, stderr
 * @invariant exitCode ∈ {0, 1}
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, never, FileSystemService> =>
  fromEither(parseCliArgs(argv)).pipe(
    Effect.matchEffect({
      onFailure: (error) => fail(error, argv.includes("--silent")),
      onSuccess: runParsed
    })
  )
