/**
 * @watchpane/node - ViewerSession
 *
 * The viewer's event loop. Waits on one queue fed by the change watcher
 * and the terminal, reloads on change batches, scrolls on keys, and
 * redraws after every signal.
 */

import {
  KeyNavigator,
  ReloadEngine,
  proposeOffset,
  type RenderCommand,
  type RenderError,
  type Renderer
} from '@watchpane/core'
import type { ChangeSource, Unsubscribe } from './ChangeWatcher'
import type { Logger } from './logger'
import { SignalQueue, type Signal } from './SignalQueue'
import type { ViewportTerminal } from './TerminalViewport'

// =============================================================================
// Types
// =============================================================================

/**
 * ViewerSession configuration.
 */
export interface ViewerSessionOptions {
  /** Render command run on every reload */
  command: RenderCommand

  /** Runs the render command */
  renderer: Renderer

  /** Change batches for the watched file */
  watcher: ChangeSource

  /** Where content is drawn and keys come from */
  terminal: ViewportTerminal

  /** Show render failures in place instead of ending the session (default: false) */
  keepGoing?: boolean

  /** Logger (default: none) */
  logger?: Logger | null
}

export type ExitReason = 'quit' | 'file-removed'

/**
 * How a session ended normally.
 */
export interface SessionExit {
  code: 0
  reason: ExitReason
}

// =============================================================================
// ViewerSession
// =============================================================================

/**
 * Event loop for one watched file.
 *
 * `run()` performs the first reload, then handles signals one at a time.
 * A render is awaited before the next signal is taken, so keys pressed
 * during a render are handled afterwards, in order.
 *
 * `run()` rejects on fatal conditions: a render that cannot be started, a
 * watcher failure, or (unless `keepGoing`) a render that fails.
 *
 * @example
 * ```typescript
 * const session = new ViewerSession({ command, renderer, watcher, terminal })
 * const { reason } = await session.run()
 * ```
 */
export class ViewerSession {
  private options: Required<Omit<ViewerSessionOptions, 'logger'>>
  private logger: Logger | null
  private engine: ReloadEngine
  private navigator = new KeyNavigator()
  private queue = new SignalQueue<Signal>()
  private status: string | null = null
  private terminalHeight: number
  private running = false

  constructor(options: ViewerSessionOptions) {
    this.options = {
      command: options.command,
      renderer: options.renderer,
      watcher: options.watcher,
      terminal: options.terminal,
      keepGoing: options.keepGoing ?? false
    }
    this.logger = options.logger ?? null
    this.terminalHeight = this.options.terminal.getHeight()
    this.engine = new ReloadEngine({
      command: this.options.command,
      renderer: this.options.renderer,
      height: this.terminalHeight
    })
  }

  /**
   * Run until the user quits or the watched file is removed.
   */
  async run(): Promise<SessionExit> {
    if (this.running) {
      throw new Error('ViewerSession: run() is already in progress')
    }
    this.running = true

    const { watcher, terminal } = this.options
    const subscriptions: Unsubscribe[] = [
      watcher.on('batch', () => this.queue.push({ type: 'change' })),
      watcher.on('error', (error) => this.queue.push({ type: 'fatal', error })),
      terminal.onKey((name) => this.queue.push({ type: 'key', name })),
      terminal.onResize((width, height) => this.queue.push({ type: 'resize', width, height }))
    ]

    try {
      await this.reload()
      this.redraw()
      return await this.loop()
    } finally {
      for (const unsubscribe of subscriptions) {
        unsubscribe()
      }
      this.running = false
    }
  }

  /** The reload engine holding the current content and offset */
  getEngine(): ReloadEngine {
    return this.engine
  }

  /** Message shown on the status row, if any */
  getStatus(): string | null {
    return this.status
  }

  // ===========================================================================
  // Loop
  // ===========================================================================

  private async loop(): Promise<SessionExit> {
    for (;;) {
      const signal = await this.queue.next()

      switch (signal.type) {
        case 'change': {
          const event = this.options.watcher.poll()
          if (event === null) {
            // Batch already taken by an earlier signal
            continue
          }
          if (event.type === 'file-removed') {
            return this.exit('file-removed')
          }
          await this.reload()
          break
        }

        case 'key': {
          const command = this.navigator.handleKey(signal.name)
          if (command === 'quit') {
            return this.exit('quit')
          }
          if (command !== null) {
            this.engine.setOffset(proposeOffset(command, {
              offset: this.engine.getOffset(),
              lineCount: this.engine.getLineCount(),
              height: this.engine.getHeight()
            }))
          }
          break
        }

        case 'resize':
          this.terminalHeight = signal.height
          this.applyHeight()
          break

        case 'fatal':
          throw signal.error
      }

      this.redraw()
    }
  }

  private async reload(): Promise<void> {
    const outcome = await this.engine.reload()

    if (outcome.status === 'failed') {
      this.handleRenderFailure(outcome.error)
      return
    }

    this.setStatus(null)
    this.logger?.info('reloaded', {
      target: outcome.target,
      offset: this.engine.getOffset(),
      lineCount: outcome.lineCount
    })
  }

  private handleRenderFailure(error: RenderError): void {
    this.logger?.warn('render failed', { error: error.message })
    if (!this.options.keepGoing) {
      throw error
    }
    this.setStatus(error.message)
  }

  /**
   * The status row covers the bottom content row, so the viewport loses a
   * row while a status is shown.
   */
  private setStatus(status: string | null): void {
    this.status = status
    this.applyHeight()
  }

  private applyHeight(): void {
    const reserved = this.status === null ? 0 : 1
    this.engine.setHeight(Math.max(0, this.terminalHeight - reserved))
  }

  private redraw(): void {
    this.options.terminal.draw(this.engine.getVisibleLines(), this.status)
  }

  private exit(reason: ExitReason): SessionExit {
    this.logger?.info('session ended', { reason })
    return { code: 0, reason }
  }
}
