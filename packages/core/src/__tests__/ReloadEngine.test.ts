/**
 * @watchpane/core - ReloadEngine Tests
 *
 * Repositioning after reloads, driven by a scripted renderer.
 */

import { RenderFailedError, RenderTerminatedError } from '../errors'
import { ReloadEngine, computeRepositionTarget } from '../reload/ReloadEngine'
import type { Line, RenderCommand, RenderResult, Renderer } from '../types'

// =============================================================================
// Test Utilities
// =============================================================================

const COMMAND: RenderCommand = ['render', 'notes.md']

/**
 * Build `count` distinct terminated lines.
 */
function numbered(count: number, prefix: string = 'line'): Line[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i}\n`)
}

/**
 * Renderer that returns the queued results in order.
 */
function scriptedRenderer(...results: RenderResult[]): Renderer & { run: jest.Mock } {
  const run = jest.fn(async (_command: RenderCommand): Promise<RenderResult> => {
    const next = results.shift()
    if (!next) throw new Error('no scripted render left')
    return next
  })
  return { run }
}

function ok(lines: Line[]): RenderResult {
  return { success: true, lines }
}

// =============================================================================
// computeRepositionTarget
// =============================================================================

describe('computeRepositionTarget', () => {
  it('returns 0 on the first load', () => {
    expect(computeRepositionTarget(null, numbered(5), 3)).toBe(0)
  })

  it('returns the first differing index', () => {
    const previous = numbered(6)
    const next = [...previous]
    next[4] = 'changed\n'
    expect(computeRepositionTarget(previous, next, 0)).toBe(4)
  })

  it('prefers the first difference over a length change', () => {
    const previous = numbered(6)
    const next = [...numbered(2), 'inserted\n', ...numbered(6).slice(2)]
    expect(computeRepositionTarget(previous, next, 0)).toBe(2)
  })

  it('returns the new length when lines were appended', () => {
    expect(computeRepositionTarget(numbered(5), numbered(8), 1)).toBe(8)
  })

  it('returns the new length when tail lines were removed', () => {
    expect(computeRepositionTarget(numbered(8), numbered(5), 1)).toBe(5)
  })

  it('keeps the current offset for identical content', () => {
    expect(computeRepositionTarget(numbered(8), numbered(8), 3)).toBe(3)
  })

  it('treats a changed terminator as a difference', () => {
    expect(computeRepositionTarget(['a\n', 'b\n'], ['a\r\n', 'b\n'], 1)).toBe(0)
  })

  it('treats an empty previous render as previous content', () => {
    expect(computeRepositionTarget([], numbered(3), 0)).toBe(3)
  })
})

// =============================================================================
// ReloadEngine
// =============================================================================

describe('ReloadEngine', () => {
  describe('reload()', () => {
    it('passes the command to the renderer', async () => {
      const renderer = scriptedRenderer(ok(numbered(3)))
      const engine = new ReloadEngine({ command: COMMAND, renderer, height: 10 })

      await engine.reload()

      expect(renderer.run).toHaveBeenCalledTimes(1)
      expect(renderer.run).toHaveBeenCalledWith(COMMAND)
    })

    it('starts at offset 0 on the first load', async () => {
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(50))),
        height: 10
      })

      const outcome = await engine.reload()

      expect(outcome).toEqual({ status: 'reloaded', target: 0, offset: 0, lineCount: 50 })
      expect(engine.getContents()).toEqual(numbered(50))
      expect(engine.isLoaded()).toBe(true)
    })

    it('reveals the first appended line', async () => {
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(20)), ok(numbered(25))),
        height: 10
      })

      await engine.reload()
      const outcome = await engine.reload()

      // Target 25 is past the last full page (25 - 10 = 15)
      expect(outcome).toEqual({ status: 'reloaded', target: 25, offset: 15, lineCount: 25 })
    })

    it('moves to a single changed line', async () => {
      const changed = numbered(40)
      changed[22] = 'edited\n'
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(40)), ok(changed)),
        height: 10
      })

      await engine.reload()
      await engine.reload()

      expect(engine.getOffset()).toBe(22)
    })

    it('clamps a changed line near the end to the last page', async () => {
      const changed = numbered(40)
      changed[37] = 'edited\n'
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(40)), ok(changed)),
        height: 10
      })

      await engine.reload()
      await engine.reload()

      expect(engine.getOffset()).toBe(30)
    })

    it('keeps the offset when content is identical', async () => {
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(40)), ok(numbered(40))),
        height: 10
      })

      await engine.reload()
      engine.setOffset(17)
      const outcome = await engine.reload()

      expect(outcome).toEqual({ status: 'reloaded', target: 17, offset: 17, lineCount: 40 })
    })

    it('uses offset 0 when the whole buffer fits', async () => {
      // 5 lines, then the same 5 plus 3 appended, in a 10-row viewport
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(5)), ok(numbered(8))),
        height: 10
      })

      const first = await engine.reload()
      expect(first.status === 'reloaded' && first.offset).toBe(0)

      const second = await engine.reload()
      expect(second).toEqual({ status: 'reloaded', target: 8, offset: 0, lineCount: 8 })
    })

    it('handles an empty render', async () => {
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(30)), ok([])),
        height: 10
      })

      await engine.reload()
      engine.setOffset(12)
      const outcome = await engine.reload()

      expect(outcome).toEqual({ status: 'reloaded', target: 0, offset: 0, lineCount: 0 })
      expect(engine.getContents()).toEqual([])
    })

    it('keeps content and offset when the render fails', async () => {
      const error = new RenderFailedError(2, 'parse error at line 9\n')
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(30)), { success: false, error }),
        height: 10
      })

      await engine.reload()
      engine.setOffset(7)
      const outcome = await engine.reload()

      expect(outcome).toEqual({ status: 'failed', error })
      expect(engine.getContents()).toEqual(numbered(30))
      expect(engine.getOffset()).toBe(7)
    })

    it('reports a terminated render on the first load', async () => {
      const error = new RenderTerminatedError('SIGKILL', null)
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer({ success: false, error }),
        height: 10
      })

      const outcome = await engine.reload()

      expect(outcome.status).toBe('failed')
      expect(engine.isLoaded()).toBe(false)
      expect(engine.getLineCount()).toBe(0)
    })

    it('propagates renderer rejections', async () => {
      const renderer: Renderer = {
        run: jest.fn(async () => {
          throw new Error('spawn failed')
        })
      }
      const engine = new ReloadEngine({ command: COMMAND, renderer, height: 10 })

      await expect(engine.reload()).rejects.toThrow('spawn failed')
    })
  })

  describe('offset invariant', () => {
    it('holds after every reload for all lengths and heights', async () => {
      for (let height = 1; height <= 6; height++) {
        const sizes = [0, 3, 9, 4, 12, 12, 1]
        const engine = new ReloadEngine({
          command: COMMAND,
          renderer: scriptedRenderer(...sizes.map((n) => ok(numbered(n, `h${n}`)))),
          height
        })

        for (const size of sizes) {
          await engine.reload()
          expect(engine.getOffset()).toBeGreaterThanOrEqual(0)
          expect(engine.getOffset()).toBeLessThanOrEqual(Math.max(0, size - height))
        }
      }
    })
  })

  describe('setOffset() / setHeight()', () => {
    it('clamps explicit offsets', async () => {
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(30))),
        height: 10
      })
      await engine.reload()

      expect(engine.setOffset(-4)).toBe(0)
      expect(engine.setOffset(100)).toBe(20)
      expect(engine.setOffset(12)).toBe(12)
    })

    it('re-clamps when the viewport grows', async () => {
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(30))),
        height: 10
      })
      await engine.reload()
      engine.setOffset(20)

      engine.setHeight(25)
      expect(engine.getOffset()).toBe(5)

      engine.setHeight(40)
      expect(engine.getOffset()).toBe(0)
    })

    it('returns the visible slice', async () => {
      const engine = new ReloadEngine({
        command: COMMAND,
        renderer: scriptedRenderer(ok(numbered(30))),
        height: 3
      })
      await engine.reload()
      engine.setOffset(4)

      expect(engine.getVisibleLines()).toEqual(['line 4\n', 'line 5\n', 'line 6\n'])
    })
  })
})
