/**
 * @watchpane/core - ReloadEngine
 *
 * Owns the rendered content and the viewport offset. Each reload runs the
 * render command, compares old and new content line by line, and moves the
 * viewport to the first line that changed.
 */

import type {
  ContentBuffer,
  Line,
  RenderCommand,
  RenderError,
  Renderer
} from '../types'
import { clampOffset } from '../viewport'

// =============================================================================
// Types
// =============================================================================

/**
 * ReloadEngine configuration.
 */
export interface ReloadEngineOptions {
  /** Command run on every reload */
  command: RenderCommand

  /** Runs the command and captures its output */
  renderer: Renderer

  /** Initial viewport height in rows */
  height: number
}

/**
 * Result of a reload.
 * A failed render leaves the buffer and offset untouched.
 */
export type ReloadOutcome =
  | {
      status: 'reloaded'
      /** Proposed offset before clamping */
      target: number
      /** Offset after clamping */
      offset: number
      lineCount: number
    }
  | { status: 'failed'; error: RenderError }

// =============================================================================
// Repositioning
// =============================================================================

/**
 * Pick the offset to show after a reload, before clamping.
 *
 * - first index where old and new lines differ, if any;
 * - otherwise 0 on the first load (`previous === null`);
 * - otherwise `next.length` when lines were appended or removed at the tail;
 * - otherwise the current offset.
 *
 * Runs in O(min(n, m)); this is not a minimal edit script.
 */
export function computeRepositionTarget(
  previous: ContentBuffer | null,
  next: ContentBuffer,
  currentOffset: number
): number {
  if (previous === null) {
    return 0
  }

  const common = Math.min(previous.length, next.length)
  for (let i = 0; i < common; i++) {
    if (previous[i] !== next[i]) {
      return i
    }
  }

  if (previous.length !== next.length) {
    return next.length
  }

  return currentOffset
}

// =============================================================================
// ReloadEngine
// =============================================================================

/**
 * Content buffer and viewport offset, updated by reloads and navigation.
 *
 * @example
 * ```typescript
 * const engine = new ReloadEngine({ command: ['cat', 'notes.md'], renderer, height: 24 })
 * const outcome = await engine.reload()
 * if (outcome.status === 'failed') console.error(outcome.error.message)
 * ```
 */
export class ReloadEngine {
  private readonly command: RenderCommand
  private readonly renderer: Renderer
  private contents: Line[] = []
  private loaded: boolean = false
  private offset: number = 0
  private height: number

  constructor(options: ReloadEngineOptions) {
    this.command = options.command
    this.renderer = options.renderer
    this.height = Math.max(0, options.height)
  }

  /**
   * Re-run the render and reposition the viewport.
   * Rejects only when the renderer cannot run the command at all.
   */
  async reload(): Promise<ReloadOutcome> {
    const result = await this.renderer.run(this.command)
    if (!result.success) {
      return { status: 'failed', error: result.error }
    }

    const next = result.lines
    const target = computeRepositionTarget(
      this.loaded ? this.contents : null,
      next,
      this.offset
    )

    this.contents = next
    this.loaded = true
    this.offset = clampOffset(target, next.length, this.height)

    return {
      status: 'reloaded',
      target,
      offset: this.offset,
      lineCount: next.length
    }
  }

  /**
   * Move the viewport to a proposed offset, clamped.
   * @returns The offset actually applied
   */
  setOffset(proposed: number): number {
    this.offset = clampOffset(proposed, this.contents.length, this.height)
    return this.offset
  }

  /**
   * Change the viewport height and re-clamp the offset.
   */
  setHeight(height: number): void {
    this.height = Math.max(0, height)
    this.offset = clampOffset(this.offset, this.contents.length, this.height)
  }

  getContents(): ContentBuffer {
    return this.contents
  }

  getOffset(): number {
    return this.offset
  }

  getHeight(): number {
    return this.height
  }

  getLineCount(): number {
    return this.contents.length
  }

  /**
   * Whether a render has succeeded at least once.
   */
  isLoaded(): boolean {
    return this.loaded
  }

  /**
   * Lines currently inside the viewport.
   */
  getVisibleLines(): ContentBuffer {
    return this.contents.slice(this.offset, this.offset + this.height)
  }
}
