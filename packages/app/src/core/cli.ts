import { Match } from "effect"
import * as Either from "effect/Either"

import { MAX_DEPTH_LIMIT } from "./parse.js"

// CHANGE: decode json-tree command line into typed arguments
// WHY: keep CLI decoding pure and testable at the boundary
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.input is defined
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and positional arguments are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "show" | "check"

export type InputSource =
  | { readonly _tag: "File"; readonly path: string }
  | { readonly _tag: "Inline"; readonly text: string }

export interface CliArgs {
  readonly command: CliCommand
  readonly input: InputSource
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly maxDepth: number | undefined
  readonly allowEmptyObject: boolean | undefined
  readonly verbose: boolean
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const DEFAULT_CONFIG_PATH = "./.json-tree.json"

export const usage = [
  "Usage: json-tree [show|check] (--file <path> | --text <json>) [options]",
  "  --max-depth <n>              maximum container nesting (1-1024)",
  "  --allow-empty-object[=bool]  accept {} as an object",
  `  --config <path>              config file (default ${DEFAULT_CONFIG_PATH})`,
  "  --verbose                    debug logging",
  "  --silent                     no output"
].join("\n")

interface CliDraft extends Omit<CliArgs, "input"> {
  readonly file: string | undefined
  readonly text: string | undefined
}

type FlagResult = Either.Either<{ readonly next: CliDraft; readonly consumed: number }, CliError>

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseBoundedInteger = (
  flagName: string,
  value: string,
  max: number
): Either.Either<number, CliError> => {
  const parsed = Number(value)
  if (!/^[1-9][0-9]*$/.test(value) || !Number.isSafeInteger(parsed) || parsed > max) {
    return Either.left(cliError(`Invalid value for --${flagName}: ${value}`))
  }
  return Either.right(parsed)
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("show", () => Either.right<CliCommand>("show")),
    Match.when("check", () => Either.right<CliCommand>("check")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultDraft = (command: CliCommand): CliDraft => ({
  command,
  file: undefined,
  text: undefined,
  configPath: DEFAULT_CONFIG_PATH,
  configPathExplicit: false,
  maxDepth: undefined,
  allowEmptyObject: undefined,
  verbose: false,
  silent: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  takesDashValue: boolean
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || (!takesDashValue && isFlag(nextValue))) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliDraft, consumed: number): FlagResult => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliDraft,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliDraft, value: string) => Either.Either<CliDraft, CliError>,
  takesDashValue = false
): FlagResult =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue, takesDashValue), (value) =>
    Either.map(update(current, value), (next) => ({
      next,
      consumed: inlineValue === undefined ? 2 : 1
    })))

const parseOptionalBooleanFlag = (
  current: CliDraft,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliDraft, value: boolean) => CliDraft
): FlagResult => {
  if (inlineValue !== undefined) {
    return Either.map(parseBoolean(inlineValue), (value) => ({ next: update(current, value), consumed: 1 }))
  }
  const fromNext = nextValue === undefined ? undefined : parseBoolean(nextValue)
  if (fromNext !== undefined && Either.isRight(fromNext)) {
    return setParsedFlag(update(current, fromNext.right), 2)
  }
  return setParsedFlag(update(current, true), 1)
}

type FlagParser = (
  current: CliDraft,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => FlagResult

const flagParsers: Record<string, FlagParser> = {
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  file: (current, inlineValue, nextValue) =>
    parseValueFlag("file", current, inlineValue, nextValue, (args, value) => Either.right({ ...args, file: value })),
  text: (current, inlineValue, nextValue) =>
    // document text such as "-1" may start with a dash
    parseValueFlag(
      "text",
      current,
      inlineValue,
      nextValue,
      (args, value) => Either.right({ ...args, text: value }),
      true
    ),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) =>
      Either.right({
        ...args,
        configPath: value,
        configPathExplicit: true
      })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseValueFlag("max-depth", current, inlineValue, nextValue, (args, value) =>
      Either.map(parseBoundedInteger("max-depth", value, MAX_DEPTH_LIMIT), (maxDepth) => ({ ...args, maxDepth }))),
  "allow-empty-object": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      allowEmptyObject: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliDraft
): FlagResult => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "show", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliDraft
): Either.Either<CliDraft, CliError> => {
  let args = initial
  let index = startIndex
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

const resolveInput = (draft: CliDraft): Either.Either<InputSource, CliError> => {
  if (draft.file !== undefined && draft.text === undefined) {
    return Either.right({ _tag: "File", path: draft.file })
  }
  if (draft.text !== undefined && draft.file === undefined) {
    return Either.right({ _tag: "Inline", text: draft.text })
  }
  return Either.left(cliError("Provide exactly one of --file or --text"))
}

const finalize = (draft: CliDraft): Either.Either<CliArgs, CliError> =>
  Either.map(resolveInput(draft), (input) => ({
    command: draft.command,
    input,
    configPath: draft.configPath,
    configPathExplicit: draft.configPathExplicit,
    maxDepth: draft.maxDepth,
    allowEmptyObject: draft.allowEmptyObject,
    verbose: draft.verbose,
    silent: draft.silent
  }))

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to show when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  return Either.flatMap(parseCommandFromArgs(rawArgs), (parsed) =>
    Either.flatMap(parseFlags(rawArgs, parsed.startIndex, defaultDraft(parsed.command)), finalize))
}
