/**
 * @watchpane/core - ChangeBatcher
 *
 * Collapses raw watcher notifications into one change event per batch.
 */

import type { ChangeEvent, ChangeNotification } from '../types'

/**
 * Pending notifications for a single watched path.
 *
 * A batch containing a removal yields `file-removed` and the rest of the
 * batch is dropped. Any other non-empty batch yields one
 * `content-changed`, however many notifications it holds.
 */
export class ChangeBatcher {
  private pending: number = 0
  private removed: boolean = false

  /**
   * Record one notification.
   * @returns true when this notification opened a new batch
   */
  record(notification: ChangeNotification): boolean {
    const opened = this.pending === 0
    this.pending++
    if (notification === 'unlink') {
      this.removed = true
    }
    return opened
  }

  /**
   * Take the pending batch as a single event. Never blocks.
   * @returns null when nothing is pending
   */
  poll(): ChangeEvent | null {
    if (this.pending === 0) return null

    const event: ChangeEvent = this.removed
      ? { type: 'file-removed' }
      : { type: 'content-changed' }

    this.clear()
    return event
  }

  /** Number of raw notifications in the current batch */
  size(): number {
    return this.pending
  }

  clear(): void {
    this.pending = 0
    this.removed = false
  }
}
