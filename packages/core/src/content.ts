/**
 * @watchpane/core - Content
 *
 * Decoding and line splitting for captured render output, and line
 * formatting for display.
 */

import type { Line } from './types'

/** Tab stop width used when expanding tabs for display */
export const TAB_WIDTH = 8

// CSI / OSC escape sequences, then any remaining C0 control or DEL
const ESCAPE_SEQUENCE = /\x1b(?:\[[0-?]*[ -/]*[@-~]|\][^\x07\x1b]*(?:\x07|\x1b\\)|[@-Z\\-_])/g
const CONTROL_CHARACTER = /[\x00-\x08\x0a-\x1f\x7f]/g

// Lone low surrogates standing in for undecodable bytes
const ESCAPED_BYTE = /[\udc80-\udcff]/gu

const ESCAPED_BYTE_BASE = 0xdc00
const REPLACEMENT_CHARACTER = '\ufffd'

const utf8 = new TextDecoder('utf-8', { ignoreBOM: true })

// =============================================================================
// Decoding
// =============================================================================

/**
 * Length of the well-formed UTF-8 sequence starting at `index`, or 0 if
 * the byte there does not start one.
 */
function sequenceLength(bytes: Uint8Array, index: number): number {
  const lead = bytes[index]
  if (lead < 0x80) return 1

  let length: number
  let low = 0x80
  let high = 0xbf
  if (lead >= 0xc2 && lead <= 0xdf) {
    length = 2
  } else if (lead >= 0xe0 && lead <= 0xef) {
    length = 3
    if (lead === 0xe0) low = 0xa0
    if (lead === 0xed) high = 0x9f
  } else if (lead >= 0xf0 && lead <= 0xf4) {
    length = 4
    if (lead === 0xf0) low = 0x90
    if (lead === 0xf4) high = 0x8f
  } else {
    return 0
  }

  if (index + length > bytes.length) return 0
  for (let i = 1; i < length; i++) {
    const byte = bytes[index + i]
    const min = i === 1 ? low : 0x80
    const max = i === 1 ? high : 0xbf
    if (byte < min || byte > max) return 0
  }
  return length
}

/**
 * Decode captured output as UTF-8 without losing bytes.
 *
 * Each byte that is not part of a well-formed sequence becomes the lone
 * surrogate U+DC80..U+DCFF, so outputs that differ only in undecodable
 * bytes still decode to different text.
 *
 * @example
 * ```typescript
 * decodeOutput(new Uint8Array([0x61, 0xff])) // 'a\udcff'
 * ```
 */
export function decodeOutput(bytes: Uint8Array): string {
  let text = ''
  let runStart = 0
  let index = 0

  while (index < bytes.length) {
    const length = sequenceLength(bytes, index)
    if (length > 0) {
      index += length
      continue
    }
    text += utf8.decode(bytes.subarray(runStart, index))
    text += String.fromCharCode(ESCAPED_BYTE_BASE + bytes[index])
    index++
    runStart = index
  }

  return text + utf8.decode(bytes.subarray(runStart))
}

// =============================================================================
// Lines
// =============================================================================

/**
 * Split text into lines, keeping every line's terminator.
 *
 * Only `\n` ends a line; a preceding `\r` stays part of the line. The
 * final line is kept even without a terminator. Empty text has no lines.
 *
 * @example
 * ```typescript
 * splitLines('a\nb\r\nc') // ['a\n', 'b\r\n', 'c']
 * ```
 */
export function splitLines(text: string): Line[] {
  const lines: Line[] = []
  let start = 0

  while (start < text.length) {
    const end = text.indexOf('\n', start)
    if (end === -1) {
      lines.push(text.slice(start))
      break
    }
    lines.push(text.slice(start, end + 1))
    start = end + 1
  }

  return lines
}

/**
 * Remove the line terminator, if any.
 */
export function stripTerminator(line: Line): string {
  if (line.endsWith('\r\n')) return line.slice(0, -2)
  if (line.endsWith('\n')) return line.slice(0, -1)
  return line
}

/**
 * Expand tabs to the next multiple of `tabWidth` columns.
 */
export function expandTabs(text: string, tabWidth: number = TAB_WIDTH): string {
  if (!text.includes('\t')) return text

  let out = ''
  let column = 0
  for (const ch of text) {
    if (ch === '\t') {
      const pad = tabWidth - (column % tabWidth)
      out += ' '.repeat(pad)
      column += pad
    } else {
      out += ch
      column++
    }
  }
  return out
}

/**
 * Prepare a content line for the terminal: terminator removed, escape
 * sequences and control characters dropped, undecodable bytes shown as
 * U+FFFD, tabs expanded, cut to `width` code points.
 */
export function formatLineForDisplay(line: Line, width: number): string {
  const visible = expandTabs(
    stripTerminator(line)
      .replace(ESCAPE_SEQUENCE, '')
      .replace(CONTROL_CHARACTER, '')
      .replace(ESCAPED_BYTE, REPLACEMENT_CHARACTER)
  )

  if (width <= 0) return ''
  const chars = Array.from(visible)
  return chars.length <= width ? visible : chars.slice(0, width).join('')
}
