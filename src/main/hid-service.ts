// SPDX-License-Identifier: GPL-2.0-or-later
// node-hid based HID channel.
// Opens the keyboard's control interface and moves raw 64-byte reports.

import HID, { type HIDAsync } from 'node-hid'
import {
  MSG_LEN,
  HID_REPORT_ID,
  HID_OPEN_RETRY_COUNT,
  HID_OPEN_RETRY_DELAY_MS,
} from '../shared/constants/protocol'
import { TransportError } from '../shared/errors'
import type { DeviceInfo, HidChannel, Logger } from '../shared/types/protocol'

export interface DeviceTarget {
  vendorId: number
  productId: number
  interfaceNumber: number
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Strip the report ID node-hid prepends on some platforms.
 * Any other length is returned as read for the transport to reject.
 */
export function normalizeResponse(buf: Buffer, expectedLen: number): Uint8Array {
  if (buf.length === expectedLen + 1 && buf[0] === HID_REPORT_ID) {
    return Uint8Array.from(buf.subarray(1))
  }
  return Uint8Array.from(buf)
}

/**
 * Find the control interface of the target keyboard.
 * The keyboard exposes several HID interfaces under one VID/PID; only the
 * configured interface number accepts protocol frames.
 */
export async function findDevice(target: DeviceTarget): Promise<DeviceInfo | null> {
  const devices = await HID.devicesAsync()
  const match = devices.find(
    (d) =>
      d.vendorId === target.vendorId &&
      d.productId === target.productId &&
      d.interface === target.interfaceNumber,
  )
  if (!match?.path) return null
  return {
    vendorId: match.vendorId,
    productId: match.productId,
    interfaceNumber: match.interface,
    productName: match.product ?? '',
    path: match.path,
  }
}

/** HidChannel over an open node-hid device; operations run one at a time. */
export class NodeHidChannel implements HidChannel {
  private device: HIDAsync | null
  private mutex: Promise<void> = Promise.resolve()

  constructor(device: HIDAsync) {
    this.device = device
  }

  private exclusive<T>(fn: (device: HIDAsync) => Promise<T>): Promise<T> {
    const prev = this.mutex
    let release: () => void = () => {}
    this.mutex = new Promise<void>((resolve) => {
      release = resolve
    })
    return prev.then(async () => {
      try {
        if (!this.device) {
          throw new TransportError('No HID device is open', 'closed')
        }
        return await fn(this.device)
      } finally {
        release()
      }
    })
  }

  write(data: Uint8Array): Promise<void> {
    return this.exclusive(async (device) => {
      const written = await device.write([HID_REPORT_ID, ...data])
      if (written < data.length) {
        throw new TransportError(`Short HID write: ${written} bytes`, 'io')
      }
    })
  }

  read(timeoutMs: number): Promise<Uint8Array | undefined> {
    return this.exclusive(async (device) => {
      const response = await device.read(timeoutMs)
      if (!response || response.length === 0) return undefined
      return normalizeResponse(response, MSG_LEN)
    })
  }

  close(): Promise<void> {
    return this.exclusive(async (device) => {
      this.device = null
      await device.close()
    })
  }
}

/**
 * Open the target interface, retrying transient open failures.
 * Returns null when no matching interface is present.
 */
export async function openHidChannel(target: DeviceTarget, logger: Logger): Promise<NodeHidChannel | null> {
  const info = await findDevice(target)
  if (!info) return null
  logger.debug(`Found device with path: ${info.path} (${info.productName})`)

  for (let attempt = 0; ; attempt++) {
    try {
      return new NodeHidChannel(await HID.HIDAsync.open(info.path))
    } catch (err) {
      if (attempt >= HID_OPEN_RETRY_COUNT - 1) {
        throw new TransportError(`Cannot open ${info.path}`, 'io', { cause: err })
      }
      logger.debug(`Open attempt ${attempt + 1} failed, retrying`)
      await delay(HID_OPEN_RETRY_DELAY_MS)
    }
  }
}

/**
 * Run `fn` with the device open. The handle is closed whether `fn`
 * succeeds or throws; a close failure is only logged.
 */
export async function withHidChannel<T>(
  target: DeviceTarget,
  logger: Logger,
  fn: (channel: HidChannel) => Promise<T>,
): Promise<T> {
  const channel = await openHidChannel(target, logger)
  if (!channel) {
    const id = `${hex16(target.vendorId)}:${hex16(target.productId)}`
    throw new TransportError(`No device ${id} with interface ${target.interfaceNumber}`, 'closed')
  }
  try {
    return await fn(channel)
  } finally {
    try {
      await channel.close()
      logger.debug('HID device closed')
    } catch (err) {
      logger.warn(`Failed to close HID device: ${err instanceof Error ? err.message : String(err)}`)
    }
  }
}

function hex16(value: number): string {
  return value.toString(16).padStart(4, '0')
}
