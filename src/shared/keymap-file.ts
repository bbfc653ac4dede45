// SPDX-License-Identifier: GPL-2.0-or-later

import { ConfigError } from './errors'
import type { KeymapDocument } from './types/protocol'

/** Parse a JSON integer value: a number, or a string such as "0x1a" or "26". */
export function parseIntegerValue(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined
  }
  if (typeof value !== 'string' || value.trim() === '') return undefined
  const n = Number(value.trim())
  return Number.isInteger(n) ? n : undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string')
}

function isLayerTable(value: unknown): value is Record<string, Record<string, string>> {
  return isRecord(value) && Object.values(value).every(isStringRecord)
}

function isColorValue(value: unknown): value is number | string {
  const n = parseIntegerValue(value)
  return n !== undefined && n >= 0 && n <= 0xffffff
}

/** Runtime type guard for keymap JSON documents */
export function isKeymapDocument(data: unknown): data is KeymapDocument {
  if (!isRecord(data)) return false
  return (
    (data.keyLayers === undefined || isLayerTable(data.keyLayers)) &&
    (data.staticColorLayers === undefined || isLayerTable(data.staticColorLayers)) &&
    (data.colorDefinitions === undefined ||
      (isRecord(data.colorDefinitions) && Object.values(data.colorDefinitions).every(isColorValue)))
  )
}

/** Parse keymap JSON text, throwing ConfigError on malformed input. */
export function parseKeymapDocument(text: string, source = 'keymap'): KeymapDocument {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (err) {
    throw new ConfigError(`${source}: invalid JSON (${err instanceof Error ? err.message : String(err)})`)
  }
  if (!isKeymapDocument(data)) {
    throw new ConfigError(
      `${source}: expected keyLayers/staticColorLayers of name → name maps and colorDefinitions of 24-bit values`,
    )
  }
  return data
}
