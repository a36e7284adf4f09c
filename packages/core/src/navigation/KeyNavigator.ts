/**
 * @watchpane/core - KeyNavigator
 *
 * Maps key names to navigation commands and tracks the `gg` sequence.
 * Key names follow terminal-kit: printable keys are the character itself,
 * special keys are upper-case names such as `PAGE_DOWN` or `CTRL_C`.
 */

import type { KeySequenceState, NavigationCommand } from '../types'
import { halfPage } from '../viewport'

// =============================================================================
// Key Bindings
// =============================================================================

/** Key that arms, and then completes, the jump-to-top sequence */
const SEQUENCE_KEY = 'g'

/**
 * Single-key bindings.
 */
export const KEY_BINDINGS: ReadonlyMap<string, NavigationCommand> = new Map<string, NavigationCommand>([
  ['j', 'line-down'],
  ['DOWN', 'line-down'],
  ['k', 'line-up'],
  ['UP', 'line-up'],
  ['d', 'half-page-down'],
  ['PAGE_DOWN', 'half-page-down'],
  ['u', 'half-page-up'],
  ['PAGE_UP', 'half-page-up'],
  ['G', 'bottom'],
  ['END', 'bottom'],
  ['HOME', 'top'],
  ['q', 'quit'],
  ['CTRL_C', 'quit']
])

// =============================================================================
// Offset Arithmetic
// =============================================================================

/**
 * Position the proposal is computed from.
 */
export interface ScrollPosition {
  offset: number
  lineCount: number
  height: number
}

/**
 * Proposed (unclamped) offset for a scroll command.
 */
export function proposeOffset(
  command: Exclude<NavigationCommand, 'quit'>,
  position: ScrollPosition
): number {
  switch (command) {
    case 'line-down':
      return position.offset + 1
    case 'line-up':
      return position.offset - 1
    case 'half-page-down':
      return position.offset + halfPage(position.height)
    case 'half-page-up':
      return position.offset - halfPage(position.height)
    case 'top':
      return 0
    case 'bottom':
      return position.lineCount
  }
}

// =============================================================================
// KeyNavigator
// =============================================================================

/**
 * Turns key presses into navigation commands.
 *
 * The only multi-key binding is `gg`: a first `g` arms the sequence, a
 * second `g` right after it fires `top`. Any other key disarms it and is
 * handled on its own.
 */
export class KeyNavigator {
  private state: KeySequenceState = 'idle'

  /**
   * Feed one key.
   * @returns The command to apply, or null when the key does nothing
   */
  handleKey(key: string): NavigationCommand | null {
    if (key === SEQUENCE_KEY) {
      if (this.state === 'pending-g') {
        this.state = 'idle'
        return 'top'
      }
      this.state = 'pending-g'
      return null
    }

    this.state = 'idle'
    return KEY_BINDINGS.get(key) ?? null
  }

  getState(): KeySequenceState {
    return this.state
  }

  reset(): void {
    this.state = 'idle'
  }
}
