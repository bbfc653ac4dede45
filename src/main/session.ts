// SPDX-License-Identifier: GPL-2.0-or-later
// One programming session: open the keyboard, run the commands, close it.

import { HidTransport } from '../device/hid-transport'
import { LayerProgrammer } from '../device/keyboard'
import { KeyboardProtocol } from '../device/protocol'
import { findLayer } from '../shared/device-profile'
import type {
  BufferSize,
  DeviceProfile,
  HidChannel,
  KeymapDocument,
  Logger,
} from '../shared/types/protocol'
import { withHidChannel, type DeviceTarget } from './hid-service'

export interface SessionPlan {
  profile: DeviceProfile
  target: DeviceTarget
  keymap?: KeymapDocument
  keysOnly?: boolean
  lightingOnly?: boolean
  info?: boolean
  /** Layer to make active once programming is done */
  activate?: string
}

export interface SessionResult {
  bufferSize?: BufferSize
}

export type ChannelRunner = <T>(
  target: DeviceTarget,
  logger: Logger,
  fn: (channel: HidChannel) => Promise<T>,
) => Promise<T>

/** Drop the parts of the document the plan excludes. */
export function selectLayers(doc: KeymapDocument, plan: Pick<SessionPlan, 'keysOnly' | 'lightingOnly'>): KeymapDocument {
  return {
    keyLayers: plan.lightingOnly ? undefined : doc.keyLayers,
    staticColorLayers: plan.keysOnly ? undefined : doc.staticColorLayers,
    colorDefinitions: doc.colorDefinitions,
  }
}

export async function runSession(
  plan: SessionPlan,
  logger: Logger,
  runWithChannel: ChannelRunner = withHidChannel,
): Promise<SessionResult> {
  // Resolve the layer to activate before touching the device
  const activeLayer = plan.activate !== undefined ? findLayer(plan.profile, plan.activate) : undefined

  return runWithChannel(plan.target, logger, async (channel) => {
    const transport = new HidTransport(channel, logger)
    const protocol = new KeyboardProtocol(transport, plan.profile.opcodes, logger)
    const result: SessionResult = {}

    if (plan.info) {
      result.bufferSize = await protocol.getBufferSize()
      logger.debug(`Received buffer size: ${result.bufferSize.major}.${result.bufferSize.minor}`)
    }
    if (plan.keymap) {
      const programmer = new LayerProgrammer(protocol, plan.profile, logger)
      await programmer.program(selectLayers(plan.keymap, plan))
    }
    if (activeLayer) {
      await protocol.setActiveLayer(activeLayer.code)
      logger.info(`Active layer set to ${activeLayer.name}`)
    }
    return result
  })
}
