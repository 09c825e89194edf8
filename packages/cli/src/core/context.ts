import type { Command } from 'commander'
import {
  type OutputFormat,
  type OutputFormatter,
  type TextSink,
  createOutputFormatter,
  isOutputFormat,
  resolveOutputFormat,
} from './output'

export interface CommandContext {
  stdout: TextSink
  stderr: TextSink
  /** Variables read by loadConfig */
  env: Record<string, string | undefined>
  format: OutputFormat
  output: OutputFormatter
  verbose: boolean
  quiet: boolean
}

export async function createContext(
  overrides: Partial<CommandContext> = {}
): Promise<CommandContext> {
  const stdout = overrides.stdout ?? process.stdout
  const stderr = overrides.stderr ?? process.stderr
  const verbose = overrides.verbose ?? false
  const quiet = overrides.quiet ?? false
  const format = resolveOutputFormat(overrides.format, stdout)
  const output =
    overrides.output ??
    createOutputFormatter({
      format,
      stdout,
      stderr,
      verbose,
      quiet,
    })

  return {
    stdout,
    stderr,
    env: overrides.env ?? process.env,
    format,
    output,
    verbose,
    quiet,
  }
}

/**
 * Build a context from the global --format/--verbose/--quiet flags.
 */
export async function contextFromCommand(
  command: Command
): Promise<CommandContext> {
  const opts = command.optsWithGlobals()
  return createContext({
    format: isOutputFormat(opts.format) ? opts.format : undefined,
    verbose: opts.verbose === true,
    quiet: opts.quiet === true,
  })
}
