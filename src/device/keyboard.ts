// SPDX-License-Identifier: GPL-2.0-or-later
/**
 * Layer programming.
 * Turns a keymap document into reset + write command sequences, one layer
 * at a time. A layer is fully validated before its first frame is sent;
 * layers already written stay written when a later layer fails.
 */

import { BLACK, DEFAULT_COLOR_NAME, LayerDataType } from '../shared/constants/protocol'
import { findLayer, isPhysicalKey, lookupKeycode, unusedKeycode } from '../shared/device-profile'
import { LookupError } from '../shared/errors'
import { parseIntegerValue } from '../shared/keymap-file'
import type {
  DeviceProfile,
  KeymapDocument,
  LayerColorMap,
  LayerKeymap,
  Logger,
} from '../shared/types/protocol'
import type { KeyboardProtocol } from './protocol'

type ColorDefinitions = NonNullable<KeymapDocument['colorDefinitions']>

function assertPhysicalKey(profile: DeviceProfile, keyName: string, layerName: string): void {
  if (!isPhysicalKey(profile, keyName)) {
    throw new LookupError(`Source Keyname is wrong: ${keyName} inside ${layerName}`, keyName, layerName)
  }
}

/**
 * Full-length key code sequence in physical key order.
 * Unmapped keys get the UnusedKey code.
 */
export function buildKeyCodes(profile: DeviceProfile, layerName: string, keymap: LayerKeymap): number[] {
  for (const [src, dst] of Object.entries(keymap)) {
    assertPhysicalKey(profile, src, layerName)
    if (!profile.keycodes.has(dst)) {
      throw new LookupError(`Destination Keyname is wrong: ${dst} inside ${layerName}`, dst, layerName)
    }
  }
  const unused = unusedKeycode(profile)
  return profile.keys.map((key) => {
    const dst = keymap[key.name]
    return dst === undefined ? unused : lookupKeycode(profile, dst, layerName)
  })
}

/**
 * Resolve a color name. Unknown, missing and "default" names fall back to
 * the definitions' default entry, then to black.
 */
export function resolveColor(definitions: ColorDefinitions, colorName: string | undefined): number {
  if (colorName !== undefined && Object.hasOwn(definitions, colorName)) {
    const value = parseIntegerValue(definitions[colorName])
    if (value !== undefined) return value
  }
  if (Object.hasOwn(definitions, DEFAULT_COLOR_NAME)) {
    const value = parseIntegerValue(definitions[DEFAULT_COLOR_NAME])
    if (value !== undefined) return value
  }
  return BLACK
}

/** One color per LED index; unmapped LEDs get the layer default. */
export function buildColorTable(
  profile: DeviceProfile,
  layerName: string,
  colorMap: LayerColorMap,
  definitions: ColorDefinitions,
): number[] {
  for (const keyName of Object.keys(colorMap)) {
    if (keyName !== DEFAULT_COLOR_NAME) assertPhysicalKey(profile, keyName, layerName)
  }
  const layerDefault = resolveColor(definitions, colorMap[DEFAULT_COLOR_NAME])
  const colors = new Array<number>(profile.ledCount).fill(layerDefault)
  for (const key of profile.keys) {
    const colorName = colorMap[key.name]
    if (colorName !== undefined) {
      colors[key.led] = resolveColor(definitions, colorName)
    }
  }
  return colors
}

export class LayerProgrammer {
  private readonly protocol: KeyboardProtocol
  private readonly profile: DeviceProfile
  private readonly logger: Logger

  constructor(protocol: KeyboardProtocol, profile: DeviceProfile, logger: Logger) {
    this.protocol = protocol
    this.profile = profile
    this.logger = logger
  }

  /** Lighting first, then key maps. */
  async program(doc: KeymapDocument): Promise<void> {
    if (doc.staticColorLayers) {
      await this.programLightingLayers(doc.staticColorLayers, doc.colorDefinitions ?? {})
    }
    if (doc.keyLayers) {
      await this.programKeyLayers(doc.keyLayers)
    }
  }

  async programKeyLayers(keyLayers: Record<string, LayerKeymap>): Promise<void> {
    for (const [layerName, keymap] of Object.entries(keyLayers)) {
      this.logger.debug(`Set layer ${layerName}`)
      const layer = findLayer(this.profile, layerName)
      const codes = buildKeyCodes(this.profile, layerName, keymap)

      if (layer.isDriver) {
        await this.protocol.resetLayerData(layer.code, LayerDataType.KeySet)
        await this.protocol.setDriverKeyValues(codes)
      } else if (layer.isFn) {
        await this.protocol.resetLayerData(layer.code, LayerDataType.FnKeySet)
        await this.protocol.setFnKeyValues(layer.code, codes)
      } else {
        await this.protocol.resetLayerData(layer.code, LayerDataType.KeySet)
        await this.protocol.setKeyValues(layer.code, codes)
      }
      this.logger.info(`Programmed ${Object.keys(keymap).length} keys on ${layerName}`)
    }
  }

  async programLightingLayers(
    colorLayers: Record<string, LayerColorMap>,
    definitions: ColorDefinitions,
  ): Promise<void> {
    for (const [layerName, colorMap] of Object.entries(colorLayers)) {
      const layer = findLayer(this.profile, layerName)
      const colors = buildColorTable(this.profile, layerName, colorMap, definitions)
      this.logger.debug(
        `Set static light for layer ${layerName} with code ${layer.code} and ${colors.length} keys`,
      )
      await this.protocol.resetLayerData(layer.code, LayerDataType.Lighting, { ignoreMissingReply: true })
      await this.protocol.setStaticLighting(layer.code, colors)
      this.logger.info(`Programmed static lighting on ${layerName}`)
    }
  }
}
