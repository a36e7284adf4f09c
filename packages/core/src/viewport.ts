/**
 * @watchpane/core - Viewport
 */

/**
 * Clamp a proposed vertical offset.
 *
 * - negative → 0
 * - buffer fits in the viewport → 0
 * - past the last full page → `lineCount - height`
 *
 * @param proposed - Desired index of the first visible line
 * @param lineCount - Lines in the content buffer
 * @param height - Viewport rows
 */
export function clampOffset(proposed: number, lineCount: number, height: number): number {
  if (proposed < 0) return 0
  if (lineCount <= height) return 0
  const last = lineCount - height
  return proposed >= last ? last : proposed
}

/**
 * Half a viewport, rounded down, as moved by half-page commands.
 */
export function halfPage(height: number): number {
  return Math.floor(height / 2)
}
