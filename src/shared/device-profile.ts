// SPDX-License-Identifier: GPL-2.0-or-later
// Per-model tables: physical keys, key codes, layers and opcodes

import { UNUSED_KEY_NAME } from './constants/protocol'
import { ConfigError, LookupError } from './errors'
import { parseIntegerValue } from './keymap-file'
import type { DeviceProfile, LayerDescriptor, OpcodeTable, PhysicalKey } from './types/protocol'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function requireInt(value: unknown, what: string, max: number): number {
  const n = parseIntegerValue(value)
  if (n === undefined || n < 0 || n > max) {
    throw new ConfigError(`${what}: expected an integer in 0..${max}, got ${JSON.stringify(value)}`)
  }
  return n
}

function parseKeys(value: unknown, ledCount: number): PhysicalKey[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError('keys: expected a non-empty array')
  }
  const seen = new Set<string>()
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      throw new ConfigError(`keys[${i}]: expected { name, led }`)
    }
    if (seen.has(entry.name)) {
      throw new ConfigError(`keys[${i}]: duplicate key ${entry.name}`)
    }
    seen.add(entry.name)
    return { name: entry.name, led: requireInt(entry.led, `keys[${i}].led`, ledCount - 1) }
  })
}

function parseKeycodes(value: unknown): Map<string, number> {
  if (!isRecord(value)) throw new ConfigError('keycodes: expected an object')
  const codes = new Map<string, number>()
  for (const [name, raw] of Object.entries(value)) {
    codes.set(name, requireInt(raw, `keycodes.${name}`, 0xffffffff))
  }
  if (!codes.has(UNUSED_KEY_NAME)) {
    throw new ConfigError(`keycodes: missing ${UNUSED_KEY_NAME}`)
  }
  return codes
}

function parseLayers(value: unknown): Map<string, LayerDescriptor> {
  if (!isRecord(value)) throw new ConfigError('layers: expected an object')
  const layers = new Map<string, LayerDescriptor>()
  for (const [name, raw] of Object.entries(value)) {
    if (
      !isRecord(raw) ||
      typeof raw.isFn !== 'boolean' ||
      (raw.isDriver !== undefined && typeof raw.isDriver !== 'boolean')
    ) {
      throw new ConfigError(`layers.${name}: expected { code, isFn, isDriver? }`)
    }
    layers.set(name, {
      name,
      code: requireInt(raw.code, `layers.${name}.code`, 0xff),
      isFn: raw.isFn,
      isDriver: raw.isDriver === true,
    })
  }
  return layers
}

function parseOpcodes(value: unknown): OpcodeTable {
  if (!isRecord(value)) throw new ConfigError('opcodes: expected an object')
  const raw = value
  const op = (name: keyof OpcodeTable): number => requireInt(raw[name], `opcodes.${name}`, 0xff)
  return {
    info: op('info'),
    restartKeyboard: op('restartKeyboard'),
    setLayer: op('setLayer'),
    ping: op('ping'),
    driverMacro: op('driverMacro'),
    driverLayerSetKeyValues: op('driverLayerSetKeyValues'),
    driverLayerSetConfig: op('driverLayerSetConfig'),
    layerResetDataType: op('layerResetDataType'),
    layerSetKeyValues: op('layerSetKeyValues'),
    layerSetMacros: op('layerSetMacros'),
    layerSetKeyPressLightingEffect: op('layerSetKeyPressLightingEffect'),
    layerSetLightValues: op('layerSetLightValues'),
    layerFnSetKeyValues: op('layerFnSetKeyValues'),
  }
}

/** Validate a parsed profile JSON document. */
export function parseDeviceProfile(data: unknown): DeviceProfile {
  if (!isRecord(data)) throw new ConfigError('profile: expected an object')
  if (typeof data.name !== 'string') throw new ConfigError('name: expected a string')
  const ledCount = requireInt(data.ledCount, 'ledCount', 0xffff)
  if (ledCount === 0) throw new ConfigError('ledCount: must be positive')
  return {
    name: data.name,
    vendorId: requireInt(data.vendorId, 'vendorId', 0xffff),
    productId: requireInt(data.productId, 'productId', 0xffff),
    interfaceNumber: requireInt(data.interfaceNumber, 'interfaceNumber', 0xff),
    ledCount,
    keys: parseKeys(data.keys, ledCount),
    keycodes: parseKeycodes(data.keycodes),
    layers: parseLayers(data.layers),
    opcodes: parseOpcodes(data.opcodes),
  }
}

export function findLayer(profile: DeviceProfile, layerName: string): LayerDescriptor {
  const layer = profile.layers.get(layerName)
  if (!layer) {
    throw new LookupError(`Unknown layer: ${layerName}`, layerName, layerName)
  }
  return layer
}

export function isPhysicalKey(profile: DeviceProfile, keyName: string): boolean {
  return profile.keys.some((k) => k.name === keyName)
}

export function lookupKeycode(profile: DeviceProfile, keyName: string, layerName?: string): number {
  const code = profile.keycodes.get(keyName)
  if (code === undefined) {
    throw new LookupError(
      `Unknown key name: ${keyName}${layerName ? ` inside ${layerName}` : ''}`,
      keyName,
      layerName,
    )
  }
  return code
}

export function unusedKeycode(profile: DeviceProfile): number {
  return lookupKeycode(profile, UNUSED_KEY_NAME)
}
