/**
 * @watchpane/node - TerminalViewport
 *
 * Full-screen pane drawn with terminal-kit.
 */

import { terminal } from 'terminal-kit'
import { formatLineForDisplay, type ContentBuffer } from '@watchpane/core'
import type { Unsubscribe } from './ChangeWatcher'

// =============================================================================
// Types
// =============================================================================

export type KeyHandler = (name: string) => void
export type ResizeHandler = (width: number, height: number) => void

/**
 * The part of a terminal-kit terminal the viewport drives.
 */
export interface TerminalDevice {
  readonly width: number
  readonly height: number
  fullscreen(enable: boolean): unknown
  grabInput(enable: boolean): unknown
  hideCursor(hide?: boolean): unknown
  styleReset(): unknown
  clear(): unknown
  moveTo(x: number, y: number): unknown
  eraseLineAfter(): unknown
  noFormat(text: string): unknown
  on(event: 'key', listener: KeyHandler): unknown
  on(event: 'resize', listener: ResizeHandler): unknown
  removeListener(event: 'key', listener: KeyHandler): unknown
  removeListener(event: 'resize', listener: ResizeHandler): unknown
}

/**
 * What the viewer session needs from a terminal.
 */
export interface ViewportTerminal {
  /** Visible rows */
  getHeight(): number

  /**
   * Paint the visible slice.
   * @param lines - Lines from the current offset on; extra lines are ignored
   * @param status - Message for the bottom row, or null
   */
  draw(lines: ContentBuffer, status: string | null): void

  onKey(handler: KeyHandler): Unsubscribe
  onResize(handler: ResizeHandler): Unsubscribe
}

const REVERSE_ON = '\x1b[7m'
const REVERSE_OFF = '\x1b[27m'

// =============================================================================
// TerminalViewport
// =============================================================================

/**
 * terminal-kit backed viewport.
 *
 * `open()` switches to the alternate screen and grabs raw input; `close()`
 * undoes both and is safe to call more than once, including when `open()`
 * was never called.
 */
export class TerminalViewport implements ViewportTerminal {
  private device: TerminalDevice
  private opened = false

  constructor(device: TerminalDevice = terminal) {
    this.device = device
  }

  open(): void {
    if (this.opened) return
    this.opened = true
    this.device.fullscreen(true)
    this.device.hideCursor()
    this.device.grabInput(true)
  }

  close(): void {
    if (!this.opened) return
    this.opened = false
    this.device.grabInput(false)
    this.device.styleReset()
    this.device.hideCursor(false)
    this.device.fullscreen(false)
  }

  isOpen(): boolean {
    return this.opened
  }

  getHeight(): number {
    return this.device.height
  }

  draw(lines: ContentBuffer, status: string | null): void {
    const { width, height } = this.device

    for (let row = 0; row < height; row++) {
      this.device.moveTo(1, row + 1)
      if (status !== null && row === height - 1) {
        const text = formatLineForDisplay(status, width)
        this.device.noFormat(`${REVERSE_ON}${text}${REVERSE_OFF}`)
      } else if (row < lines.length) {
        this.device.noFormat(formatLineForDisplay(lines[row], width))
      }
      this.device.eraseLineAfter()
    }
  }

  onKey(handler: KeyHandler): Unsubscribe {
    this.device.on('key', handler)
    return () => {
      this.device.removeListener('key', handler)
    }
  }

  onResize(handler: ResizeHandler): Unsubscribe {
    this.device.on('resize', handler)
    return () => {
      this.device.removeListener('resize', handler)
    }
  }
}
