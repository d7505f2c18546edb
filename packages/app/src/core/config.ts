import type { CliArgs } from "./cli.js"
import type { ParseOptions, UnicodeProfile } from "./options.js"
import { defaultParseOptions } from "./options.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the expectations path is explicit only when a flag or the config file names it
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly profile?: UnicodeProfile
  readonly maxDepth?: number
  readonly maxExponent?: number
  readonly expectations?: string
  readonly fixtures?: string
}

export interface ResolvedConfig {
  readonly fixtures: string
  readonly expectations: string
  readonly expectationsExplicit: boolean
  readonly parse: ParseOptions
}

export const DEFAULT_FIXTURES_DIR = "./fixtures"

export const EXPECTATIONS_FILE_NAME = "expectations.json"

const resolveFixtures = (cli: CliArgs, fileConfig: FileConfig | undefined): string =>
  cli.fixtures ?? fileConfig?.fixtures ?? DEFAULT_FIXTURES_DIR

const resolveExpectations = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined,
  fixtures: string
): Pick<ResolvedConfig, "expectations" | "expectationsExplicit"> => {
  const explicit = cli.expectations ?? fileConfig?.expectations
  return explicit === undefined
    ? { expectations: `${fixtures.replace(/\/+$/, "")}/${EXPECTATIONS_FILE_NAME}`, expectationsExplicit: false }
    : { expectations: explicit, expectationsExplicit: true }
}

const resolveParse = (cli: CliArgs, fileConfig: FileConfig | undefined): ParseOptions => ({
  profile: cli.profile ?? fileConfig?.profile ?? defaultParseOptions.profile,
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? defaultParseOptions.maxDepth,
  maxExponent: cli.maxExponent ?? fileConfig?.maxExponent ?? defaultParseOptions.maxExponent
})

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-strict.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant expectations defaults to expectations.json inside the fixture directory
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => {
  const fixtures = resolveFixtures(cli, fileConfig)
  return {
    fixtures,
    ...resolveExpectations(cli, fileConfig, fixtures),
    parse: resolveParse(cli, fileConfig)
  }
}
