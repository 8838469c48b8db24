import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): "Priority: CLI flags > config file > defaults."
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved indent is a non-negative integer
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly indent?: number
  readonly prefix?: string
}

export interface ResolvedConfig {
  readonly indent: number
  readonly prefix: string | undefined
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-util.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  indent: cli.indent ?? fileConfig?.indent ?? 0,
  prefix: cli.prefix ?? fileConfig?.prefix
})
