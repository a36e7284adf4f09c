/**
 * @watchpane/node - SignalQueue
 *
 * FIFO of signals from the watcher and the terminal. `next()` is the
 * viewer's only blocking point.
 */

import type { WatcherError } from '@watchpane/core'

/**
 * Signals the viewer session reacts to.
 */
export type Signal =
  | { type: 'change' }
  | { type: 'key'; name: string }
  | { type: 'resize'; width: number; height: number }
  | { type: 'fatal'; error: WatcherError }

/**
 * Unbounded queue with a single waiting consumer.
 */
export class SignalQueue<T = Signal> {
  private items: T[] = []
  private waiter: ((item: T) => void) | null = null

  push(item: T): void {
    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter(item)
      return
    }
    this.items.push(item)
  }

  /**
   * Resolve with the oldest signal, waiting for one if the queue is empty.
   */
  next(): Promise<T> {
    if (this.items.length > 0) {
      const [head, ...rest] = this.items
      this.items = rest
      return Promise.resolve(head)
    }
    if (this.waiter) {
      return Promise.reject(new Error('SignalQueue: next() is already pending'))
    }
    return new Promise<T>((resolve) => {
      this.waiter = resolve
    })
  }

  size(): number {
    return this.items.length
  }
}
