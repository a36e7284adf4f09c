/**
 * @watchpane/node - Command Line
 *
 * `watchpane [options] <file> <render-program> [render-args...]`
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander'
import type { RenderCommand, Renderer } from '@watchpane/core'
import { ChangeWatcher, DEFAULT_DEBOUNCE } from './ChangeWatcher'
import { ChildProcessRenderer } from './ChildProcessRenderer'
import { LOG_LEVELS, closeLogger, createLogger, isLogLevel, type LogLevel } from './logger'
import { TerminalViewport } from './TerminalViewport'
import { VERSION } from './version'
import { ViewerSession } from './ViewerSession'

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed command line.
 */
export interface CliOptions {
  /** File to watch */
  file: string

  /** Render program and its arguments */
  command: RenderCommand

  keepGoing: boolean
  debounce: number
  logFile: string | null
  logLevel: LogLevel
}

/**
 * Where the CLI writes its messages.
 */
export interface CliOutput {
  writeOut(text: string): void
  writeErr(text: string): void
}

/**
 * Dependencies of `main`, replaceable for embedding and tests.
 */
export interface MainOptions {
  /** Where messages go (default: process stdout and stderr) */
  output?: CliOutput

  /** Creates the pane (default: a terminal-kit viewport on the process terminal) */
  createViewport?: () => TerminalViewport

  /** Creates the render invoker (default: a child-process renderer) */
  createRenderer?: () => Renderer
}

const processOutput: CliOutput = {
  writeOut: (text) => {
    process.stdout.write(text)
  },
  writeErr: (text) => {
    process.stderr.write(text)
  }
}

// =============================================================================
// Argument Parsing
// =============================================================================

function parseDebounce(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('expected a non-negative integer')
  }
  return Number(value)
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`expected one of ${LOG_LEVELS.join(', ')}`)
  }
  return value
}

/**
 * Parse the command line.
 *
 * Everything after the render program is passed to it untouched, options
 * included.
 *
 * @param argv - Arguments; with `from: 'node'` the first two are skipped
 * @throws CommanderError on usage errors, `--help` and `--version`
 */
export function parseCliArgs(
  argv: readonly string[],
  from: 'node' | 'user' = 'node',
  output: CliOutput = processOutput
): CliOptions {
  const positional: { file: string | null; command: RenderCommand | null } = {
    file: null,
    command: null
  }

  const program = new Command('watchpane')
    .description('Watch a file and view it through a render program, scrolled to the first changed line')
    .version(VERSION, '-V, --version')
    .argument('<file>', 'file to watch')
    .argument('<render-program>', 'program whose output is displayed')
    .argument('[render-args...]', 'arguments passed to the render program')
    .option('--keep-going', 'show render failures in place instead of exiting', false)
    .option('--debounce <ms>', 'window for batching change notifications', parseDebounce, DEFAULT_DEBOUNCE)
    .option('--log-file <path>', 'append JSON log lines to this file')
    .option('--log-level <level>', `one of ${LOG_LEVELS.join(', ')}`, parseLogLevel, 'info')
    .passThroughOptions()
    .showHelpAfterError()
    .exitOverride()
    .configureOutput(output)
    .action((file: string, renderProgram: string, renderArgs: string[]) => {
      positional.file = file
      positional.command = [renderProgram, ...renderArgs]
    })

  program.parse([...argv], { from })

  const opts = program.opts<{
    keepGoing: boolean
    debounce: number
    logFile?: string
    logLevel: LogLevel
  }>()

  const { file, command } = positional
  if (file === null || command === null) {
    throw new CommanderError(1, 'watchpane.missingArgument', 'missing arguments')
  }

  return {
    file,
    command,
    keepGoing: opts.keepGoing,
    debounce: opts.debounce,
    logFile: opts.logFile ?? null,
    logLevel: opts.logLevel
  }
}

// =============================================================================
// Main
// =============================================================================

/**
 * Run the viewer.
 *
 * The watcher is acquired before the terminal, and both are released in
 * reverse order on every path. Failure messages are written only after the
 * terminal has been restored.
 *
 * @returns Process exit code
 */
export async function main(
  argv: readonly string[] = process.argv,
  options: MainOptions = {}
): Promise<number> {
  const output = options.output ?? processOutput
  const createViewport = options.createViewport ?? (() => new TerminalViewport())
  const createRenderer = options.createRenderer ?? (() => new ChildProcessRenderer())

  let cli: CliOptions
  try {
    cli = parseCliArgs(argv, 'node', output)
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    throw error
  }

  const logger = createLogger({ file: cli.logFile, level: cli.logLevel })
  logger.info('starting', { file: cli.file, command: cli.command })

  const watcher = new ChangeWatcher(cli.file, {
    debounce: cli.debounce,
    logger
  })

  let failure: unknown = null
  let code = 0

  try {
    await watcher.start()

    const viewport = createViewport()
    try {
      viewport.open()
      const session = new ViewerSession({
        command: cli.command,
        renderer: createRenderer(),
        watcher,
        terminal: viewport,
        keepGoing: cli.keepGoing,
        logger
      })
      const exit = await session.run()
      code = exit.code
    } finally {
      viewport.close()
    }
  } catch (error) {
    failure = error
  } finally {
    await watcher.close()
  }

  if (failure !== null) {
    const message = failure instanceof Error ? failure.message : String(failure)
    logger.error('fatal', { error: message })
    output.writeErr(`watchpane: ${message.replace(/\n+$/, '')}\n`)
    code = 1
  }

  await closeLogger(logger)
  return code
}
