import type { CliArgs } from "./cli.js"
import type { RenderOptions } from "./report.js"
import { defaultRenderOptions } from "./report.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides defaults
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved indent ≥ 0
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly shape?: string
  readonly indent?: number
  readonly maxSnapshotLength?: number
}

export interface ResolvedConfig {
  readonly shape: string
  readonly render: RenderOptions
}

export const defaultShape = "animal"

export const defaultConfigPath = "./.json-decode.json"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-decode.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  shape: cli.shape ?? fileConfig?.shape ?? defaultShape,
  render: {
    indent: cli.indent ?? fileConfig?.indent ?? defaultRenderOptions.indent,
    maxSnapshotLength: cli.maxSnapshotLength ?? fileConfig?.maxSnapshotLength ??
      defaultRenderOptions.maxSnapshotLength
  }
})
