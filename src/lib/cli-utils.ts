/**
 * Argument parsing for the frame-rendering and fade-tracing scripts.
 */

/**
 * Frame counts and sampling strides: positive whole numbers only.
 *
 * @example
 * parseCount('10', 5)        // => 10
 * parseCount(undefined, 5)   // => 5 (default)
 * parseCount('0', 5)         // throws
 */
export function parseCount(arg: string | undefined, defaultCount: number): number {
  if (!arg) {
    return defaultCount
  }

  const parsed = Number(arg)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Invalid count: ${arg}. Use a positive whole number`)
  }

  return parsed
}

/**
 * Parse a non-negative number (seconds, radians, rad/s)
 *
 * @example
 * parseNonNegative('0.016', 0.1)  // => 0.016
 * parseNonNegative(undefined, 1)  // => 1
 * parseNonNegative('-1', 1)       // throws
 */
export function parseNonNegative(arg: string | undefined, defaultValue: number): number {
  if (!arg) {
    return defaultValue
  }

  const parsed = Number(arg)
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid value: ${arg}. Use a number >= 0`)
  }

  return parsed
}

/**
 * Read `--name value` and `--name=value` flags into a map.
 * Arguments that are not flags are collected as positionals.
 */
export function parseFlags(argv: string[]): { flags: Map<string, string>; positionals: string[] } {
  const flags = new Map<string, string>()
  const positionals: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg.startsWith('--')) {
      positionals.push(arg)
      continue
    }

    const eq = arg.indexOf('=')
    if (eq !== -1) {
      flags.set(arg.slice(2, eq), arg.slice(eq + 1))
      continue
    }

    const next = argv[i + 1]
    if (next !== undefined && !next.startsWith('--')) {
      flags.set(arg.slice(2), next)
      i++
    } else {
      flags.set(arg.slice(2), 'true')
    }
  }

  return { flags, positionals }
}
