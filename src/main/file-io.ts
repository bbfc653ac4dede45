// SPDX-License-Identifier: GPL-2.0-or-later
// Keymap and device profile loading

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { parseDeviceProfile } from '../shared/device-profile'
import { ConfigError, LookupError } from '../shared/errors'
import { parseKeymapDocument } from '../shared/keymap-file'
import type { DeviceProfile, KeymapDocument } from '../shared/types/protocol'

export const PROFILES_DIR = fileURLToPath(new URL('../../profiles/', import.meta.url))

const PROFILE_NAME_RE = /^[A-Za-z0-9_-]+$/

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export async function readKeymapFile(filePath: string): Promise<KeymapDocument> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    throw new ConfigError(`Cannot read keymap ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
  }
  return parseKeymapDocument(text, filePath)
}

/** Load profiles/<name>.json. */
export async function loadDeviceProfile(name: string, dir = PROFILES_DIR): Promise<DeviceProfile> {
  if (!PROFILE_NAME_RE.test(name)) {
    throw new LookupError(`Invalid profile name: ${name}`, name)
  }
  const filePath = join(dir, `${name}.json`)
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (isNotFound(err)) throw new LookupError(`Unknown profile: ${name}`, name)
    throw err
  }
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (err) {
    throw new ConfigError(`${filePath}: invalid JSON (${err instanceof Error ? err.message : String(err)})`)
  }
  try {
    return parseDeviceProfile(data)
  } catch (err) {
    if (err instanceof ConfigError) throw new ConfigError(`${filePath}: ${err.message}`)
    throw err
  }
}
