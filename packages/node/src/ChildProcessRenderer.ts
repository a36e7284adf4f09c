/**
 * @watchpane/node - ChildProcessRenderer
 *
 * Runs the render command as a child process and captures its standard
 * output and standard error, written to one shared file, as the new
 * content.
 */

import { spawn, type ChildProcess } from 'child_process'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import {
  RenderFailedError,
  RenderInvocationError,
  RenderTerminatedError,
  decodeOutput,
  splitLines,
  type Line,
  type RenderCommand,
  type RenderResult,
  type Renderer
} from '@watchpane/core'

// =============================================================================
// Types
// =============================================================================

/**
 * ChildProcessRenderer configuration options.
 */
export interface ChildProcessRendererOptions {
  /** Working directory of the render (default: the viewer's own) */
  cwd?: string

  /** Environment of the render (default: the viewer's own) */
  env?: NodeJS.ProcessEnv
}

// =============================================================================
// Exit Status
// =============================================================================

/**
 * Map a finished child's exit status to a render result.
 */
export function toRenderResult(
  code: number | null,
  signal: NodeJS.Signals | null,
  lines: Line[]
): RenderResult {
  const firstLine = lines.length > 0 ? lines[0] : null

  if (code === 0) {
    return { success: true, lines }
  }
  if (code !== null) {
    return { success: false, error: new RenderFailedError(code, firstLine) }
  }
  return { success: false, error: new RenderTerminatedError(signal, firstLine) }
}

// =============================================================================
// ChildProcessRenderer
// =============================================================================

interface ChildExit {
  code: number | null
  signal: NodeJS.Signals | null
}

/**
 * Renderer backed by `child_process.spawn`.
 *
 * Standard input of the render is the null device. Standard output and
 * standard error share one open file, so diagnostics interleave with
 * regular output in the order the render wrote them. One child per call;
 * it has exited by the time the returned promise settles.
 *
 * @example
 * ```typescript
 * const renderer = new ChildProcessRenderer()
 * const result = await renderer.run(['pandoc', '-t', 'plain', 'notes.md'])
 * if (result.success) console.log(result.lines.length)
 * ```
 */
export class ChildProcessRenderer implements Renderer {
  private options: ChildProcessRendererOptions

  constructor(options: ChildProcessRendererOptions = {}) {
    this.options = {
      cwd: options.cwd,
      env: options.env
    }
  }

  async run(command: RenderCommand): Promise<RenderResult> {
    const [program, ...args] = command
    const invoke = <T>(operation: Promise<T>): Promise<T> =>
      operation.catch((error: unknown) => {
        throw new RenderInvocationError(program, error)
      })

    const dir = await invoke(fs.promises.mkdtemp(path.join(os.tmpdir(), 'watchpane-render-')))
    try {
      const outputPath = path.join(dir, 'output')
      const output = await invoke(fs.promises.open(outputPath, 'w'))

      let exit: ChildExit
      try {
        exit = await this.spawnInto(program, args, output.fd)
      } finally {
        await output.close()
      }

      // Read through a fresh descriptor; the shared one sits at end of file
      const bytes = await invoke(fs.promises.readFile(outputPath))
      return toRenderResult(exit.code, exit.signal, splitLines(decodeOutput(bytes)))
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true })
    }
  }

  /**
   * Run the render with `fd` as both its standard output and standard
   * error, resolving once it has exited.
   */
  private spawnInto(program: string, args: string[], fd: number): Promise<ChildExit> {
    return new Promise<ChildExit>((resolve, reject) => {
      let settled = false

      let child: ChildProcess
      try {
        child = spawn(program, args, {
          cwd: this.options.cwd,
          env: this.options.env,
          stdio: ['ignore', fd, fd]
        })
      } catch (error) {
        reject(new RenderInvocationError(program, error))
        return
      }

      // Spawn failures (ENOENT, EACCES) arrive here rather than as a throw
      child.once('error', (error) => {
        if (settled) return
        settled = true
        reject(new RenderInvocationError(program, error))
      })

      child.once('close', (code, signal) => {
        if (settled) return
        settled = true
        resolve({ code, signal })
      })
    })
  }
}
