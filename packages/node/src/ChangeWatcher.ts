/**
 * @watchpane/node - ChangeWatcher
 *
 * Watches the single viewed file with chokidar and reports change batches.
 *
 * BEHAVIOR: raw notifications are collected into a batch; once the
 * debounce window closes, `batch` listeners are told a batch is ready and
 * the consumer calls `poll()` to take it as one collapsed event.
 */

import { EventEmitter } from 'events'
import * as fs from 'fs'
import * as path from 'path'
import { watch, type FSWatcher } from 'chokidar'
import {
  ChangeBatcher,
  WatchSetupError,
  WatcherError,
  type ChangeEvent,
  type ChangeNotification
} from '@watchpane/core'
import type { Logger } from './logger'

// =============================================================================
// Types
// =============================================================================

/**
 * ChangeWatcher configuration options.
 */
export interface ChangeWatcherOptions {
  /** Debounce window in milliseconds (default: 50) */
  debounce?: number

  /** Logger for raw notifications (default: none) */
  logger?: Logger | null
}

/** Function to remove a listener */
export type Unsubscribe = () => void

/**
 * Anything the viewer session can take change batches from.
 */
export interface ChangeSource {
  on(event: 'batch', handler: () => void): Unsubscribe
  on(event: 'error', handler: (error: WatcherError) => void): Unsubscribe
  poll(): ChangeEvent | null
}

export const DEFAULT_DEBOUNCE = 50

// =============================================================================
// Debounce Utility
// =============================================================================

/**
 * Create a debounced function.
 */
function debounce(
  fn: () => void,
  delay: number
): (() => void) & { cancel: () => void } {
  let timeoutId: ReturnType<typeof setTimeout> | null = null

  const debounced = (): void => {
    if (timeoutId) {
      clearTimeout(timeoutId)
    }
    timeoutId = setTimeout(() => {
      timeoutId = null
      fn()
    }, delay)
  }

  debounced.cancel = (): void => {
    if (timeoutId) {
      clearTimeout(timeoutId)
      timeoutId = null
    }
  }

  return debounced
}

// =============================================================================
// ChangeWatcher Implementation
// =============================================================================

/**
 * File watcher for one path, using chokidar.
 *
 * With `atomic`, an unlink followed shortly by an add of the same path (an
 * editor saving through a temporary file and a rename) is reported as a
 * single `change`, and chokidar re-attaches its watch to the new file, so
 * the subscription survives the path being recreated.
 *
 * @example
 * ```typescript
 * const watcher = new ChangeWatcher('./notes.md', { debounce: 100 })
 * watcher.on('batch', () => {
 *   const event = watcher.poll()
 *   if (event?.type === 'file-removed') console.log('gone')
 * })
 * await watcher.start()
 * ```
 */
export class ChangeWatcher implements ChangeSource {
  readonly filePath: string
  private watcher: FSWatcher | null = null
  private emitter = new EventEmitter()
  private options: Required<ChangeWatcherOptions>
  private batcher = new ChangeBatcher()
  private debouncedSignal: ReturnType<typeof debounce>
  private closed = false

  constructor(filePath: string, options: ChangeWatcherOptions = {}) {
    this.filePath = path.resolve(filePath)
    this.options = {
      debounce: options.debounce ?? DEFAULT_DEBOUNCE,
      logger: options.logger ?? null
    }

    this.debouncedSignal = debounce(() => {
      if (this.closed || this.batcher.size() === 0) return
      this.emitter.emit('batch')
    }, this.options.debounce)
  }

  /**
   * Register a listener.
   * `batch` fires once per debounced batch; `error` on watch failures.
   */
  on(event: 'batch', handler: () => void): Unsubscribe
  on(event: 'error', handler: (error: WatcherError) => void): Unsubscribe
  on(
    event: 'batch' | 'error',
    handler: (() => void) | ((error: WatcherError) => void)
  ): Unsubscribe {
    // 'error' is special-cased by EventEmitter, so it is stored under another name
    const name = event === 'batch' ? 'batch' : 'watch-error'
    this.emitter.on(name, handler)
    return () => {
      this.emitter.off(name, handler)
    }
  }

  /**
   * Subscribe to the file.
   * Resolves once chokidar has finished its initial scan.
   *
   * @throws WatchSetupError if the path is missing or not a regular file
   */
  async start(): Promise<void> {
    if (this.closed) {
      throw new WatchSetupError(this.filePath, 'watcher is closed')
    }
    if (this.watcher) return

    let stats: fs.Stats
    try {
      stats = await fs.promises.stat(this.filePath)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new WatchSetupError(this.filePath, reason)
    }
    if (!stats.isFile()) {
      throw new WatchSetupError(this.filePath, 'not a regular file')
    }

    const watcher = watch(this.filePath, {
      persistent: true,
      ignoreInitial: true,
      atomic: true,
      disableGlobbing: true
    })
    this.watcher = watcher

    watcher.on('change', () => this.queueNotification('change'))
    watcher.on('add', () => this.queueNotification('add'))
    watcher.on('unlink', () => this.queueNotification('unlink'))
    watcher.on('error', (error: Error) => {
      const failure = new WatcherError(this.filePath, error)
      this.options.logger?.error('watcher error', { path: this.filePath, error: error.message })
      this.emitter.emit('watch-error', failure)
    })

    await new Promise<void>((resolve) => {
      watcher.once('ready', () => resolve())
    })
  }

  /**
   * Take the pending batch as one event.
   * @returns null if the batch was already taken
   */
  poll(): ChangeEvent | null {
    return this.batcher.poll()
  }

  /**
   * Release the subscription. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.debouncedSignal.cancel()
    this.batcher.clear()
    this.emitter.removeAllListeners()

    if (this.watcher) {
      const watcher = this.watcher
      this.watcher = null
      await watcher.close()
    }
  }

  /**
   * Check if the subscription is active.
   */
  isWatching(): boolean {
    return !this.closed && this.watcher !== null
  }

  /**
   * Add a raw notification to the batch and (re)start the debounce window.
   */
  private queueNotification(notification: ChangeNotification): void {
    if (this.closed) return
    this.options.logger?.debug('watch notification', {
      path: this.filePath,
      notification
    })
    this.batcher.record(notification)
    this.debouncedSignal()
  }
}
