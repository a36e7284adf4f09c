/**
 * @watchpane/node
 *
 * Node.js bindings for watchpane: child-process renderer, chokidar
 * watcher, terminal-kit viewport, the viewer event loop and the CLI.
 * Requires Node.js 20+.
 */

export { ChildProcessRenderer, toRenderResult } from './ChildProcessRenderer'
export type { ChildProcessRendererOptions } from './ChildProcessRenderer'

export { ChangeWatcher, DEFAULT_DEBOUNCE } from './ChangeWatcher'
export type { ChangeWatcherOptions, ChangeSource, Unsubscribe } from './ChangeWatcher'

export { TerminalViewport } from './TerminalViewport'
export type {
  TerminalDevice,
  ViewportTerminal,
  KeyHandler,
  ResizeHandler
} from './TerminalViewport'

export { SignalQueue } from './SignalQueue'
export type { Signal } from './SignalQueue'

export { ViewerSession } from './ViewerSession'
export type { ViewerSessionOptions, SessionExit, ExitReason } from './ViewerSession'

export { createLogger, closeLogger, isLogLevel, LOG_LEVELS } from './logger'
export type { Logger, LoggerOptions, LogLevel } from './logger'

export { main, parseCliArgs } from './cli'
export type { CliOptions, CliOutput, MainOptions } from './cli'

export { VERSION } from './version'
