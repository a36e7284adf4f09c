/**
 * @watchpane/core - Errors
 */

import type { RenderError } from './types'

/**
 * Strip the trailing line terminator from a captured line.
 */
function chomp(line: string): string {
  return line.replace(/\r?\n$/, '')
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

// =============================================================================
// Render Errors (recoverable)
// =============================================================================

/**
 * The render program exited with a nonzero code.
 */
export class RenderFailedError extends Error {
  constructor(
    public readonly exitCode: number,
    public readonly firstLine: string | null
  ) {
    super(firstLine === null ? 'render failed' : `render failed: ${chomp(firstLine)}`)
    this.name = 'RenderFailedError'
  }
}

/**
 * The render program was killed before it could exit normally.
 */
export class RenderTerminatedError extends Error {
  constructor(
    public readonly signal: string | null,
    public readonly firstLine: string | null
  ) {
    super(firstLine === null ? 'render terminated' : `render terminated: ${chomp(firstLine)}`)
    this.name = 'RenderTerminatedError'
  }
}

/**
 * Check whether a value is one of the recoverable render errors.
 */
export function isRenderError(value: unknown): value is RenderError {
  return value instanceof RenderFailedError || value instanceof RenderTerminatedError
}

// =============================================================================
// Fatal Errors
// =============================================================================

/**
 * The render process could not be created, read or waited for.
 */
export class RenderInvocationError extends Error {
  constructor(
    public readonly program: string,
    public readonly cause: unknown
  ) {
    super(`failed to run the render ${program}: ${describeCause(cause)}`)
    this.name = 'RenderInvocationError'
  }
}

/**
 * The watched path cannot be subscribed to.
 */
export class WatchSetupError extends Error {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`failed to watch ${path}: ${reason}`)
    this.name = 'WatchSetupError'
  }
}

/**
 * The watch subscription failed after start-up.
 */
export class WatcherError extends Error {
  constructor(
    public readonly path: string,
    public readonly cause: unknown
  ) {
    super(`failed to wait for changes on ${path}: ${describeCause(cause)}`)
    this.name = 'WatcherError'
  }
}
