/**
 * @watchpane/core - Core Type Definitions
 *
 * Data model shared by the reload engine, the change batcher and the
 * key navigator.
 */

import type { RenderFailedError, RenderTerminatedError } from '../errors'

// =============================================================================
// Content
// =============================================================================

/**
 * One rendered line, including its original terminator.
 * The last line of a buffer may lack one.
 */
export type Line = string

/**
 * Rendered content, replaced wholesale on every successful reload.
 */
export type ContentBuffer = readonly Line[]

/**
 * Program path followed by its arguments. Fixed at start-up.
 */
export type RenderCommand = readonly [program: string, ...args: string[]]

// =============================================================================
// Rendering
// =============================================================================

/** Recoverable render outcome: nonzero exit or abnormal termination. */
export type RenderError = RenderFailedError | RenderTerminatedError

/**
 * Result of one render invocation.
 */
export type RenderResult =
  | { success: true; lines: Line[] }
  | { success: false; error: RenderError }

/**
 * Runs the render command and captures its combined output.
 *
 * Implementations reject (rather than resolve with a failure) only when
 * the child process itself cannot be created or read.
 */
export interface Renderer {
  run(command: RenderCommand): Promise<RenderResult>
}

// =============================================================================
// Change Events
// =============================================================================

/**
 * Raw notification kinds reported by a file watcher.
 */
export type ChangeNotification = 'add' | 'change' | 'unlink'

/**
 * Collapsed change event consumed by the event loop.
 */
export type ChangeEvent =
  | { type: 'content-changed' }
  | { type: 'file-removed' }

// =============================================================================
// Navigation
// =============================================================================

/**
 * Commands produced by the key navigator.
 */
export type NavigationCommand =
  | 'line-down'
  | 'line-up'
  | 'half-page-down'
  | 'half-page-up'
  | 'top'
  | 'bottom'
  | 'quit'

/**
 * Two-key sequence state. Only `gg` is recognised.
 */
export type KeySequenceState = 'idle' | 'pending-g'
