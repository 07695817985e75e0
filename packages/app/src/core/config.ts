import type { CliArgs } from "./cli.js"
import type { ParseOptions } from "./parse.js"
import { resolveParseOptions } from "./parse.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides parser defaults
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth is an integer in [1, MAX_DEPTH_LIMIT]
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly maxDepth?: number
  readonly allowEmptyObject?: boolean
}

/**
 * Resolve parser options from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-tree.json.
 * @returns Options passed to the parser.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: Pick<CliArgs, "maxDepth" | "allowEmptyObject">,
  fileConfig: FileConfig | undefined
): ParseOptions =>
  resolveParseOptions({
    maxDepth: cli.maxDepth ?? fileConfig?.maxDepth,
    allowEmptyObject: cli.allowEmptyObject ?? fileConfig?.allowEmptyObject
  })
