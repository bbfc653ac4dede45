// SPDX-License-Identifier: GPL-2.0-or-later
// Hex dump formatting for packet tracing

const BYTES_PER_LINE = 16
const HALF = 8

function printable(b: number): string {
  return b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : '.'
}

/**
 * Format up to 16 bytes as
 * `01 01 00 00 00 00 74 1b  00 00 ...   ......t. ........`.
 * Short lines are padded so the text column stays aligned.
 */
export function hexdumpLine(data: Uint8Array): string {
  const line = data.subarray(0, BYTES_PER_LINE)
  const hex: string[] = []
  let text = ''
  for (let i = 0; i < BYTES_PER_LINE; i++) {
    hex.push(i < line.length ? line[i].toString(16).padStart(2, '0') : '  ')
  }
  for (const b of line) text += printable(b)
  return `${hex.slice(0, HALF).join(' ')}  ${hex.slice(HALF).join(' ')}   ${text.slice(0, HALF)} ${text.slice(HALF)}`
}

/** Dump lines prefixed with an 8-digit hex address starting at `start`. */
export function hexdumpLines(data: Uint8Array, start = 0): string[] {
  const lines: string[] = []
  for (let offset = 0; offset < data.length; offset += BYTES_PER_LINE) {
    const address = (start + offset).toString(16).padStart(8, '0')
    lines.push(`${address}  ${hexdumpLine(data.subarray(offset, offset + BYTES_PER_LINE))}`)
  }
  return lines
}

export function hexdump(data: Uint8Array, start = 0): string {
  return hexdumpLines(data, start).join('\n')
}

