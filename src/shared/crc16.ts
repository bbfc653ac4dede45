// SPDX-License-Identifier: GPL-2.0-or-later
// MSB-first CRC-16 with configurable polynomial, initial value and output XOR

import { CRC16_PROTOCOL, CRC16_USB } from './constants/protocol'
import type { Crc16Params } from './types/protocol'

export function crc16(data: Uint8Array, params: Crc16Params): number {
  let crc = params.initialValue & 0xffff
  for (const b of data) {
    crc ^= b << 8
    for (let i = 0; i < 8; i++) {
      crc <<= 1
      if (crc & 0x10000) {
        crc = (crc ^ params.polynomial) & 0xffff
      }
    }
  }
  return ((crc & 0xffff) ^ params.xorOut) & 0xffff
}

/** Poly 0x8005, IV 0xFFFF, XOR-out 0xFFFF. Not used by the frame protocol. */
export function crc16Usb(data: Uint8Array): number {
  return crc16(data, CRC16_USB)
}

/** CRC-16/CCITT-FALSE: the frame checksum */
export function crc16Protocol(data: Uint8Array): number {
  return crc16(data, CRC16_PROTOCOL)
}
