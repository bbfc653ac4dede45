// SPDX-License-Identifier: GPL-2.0-or-later
// 64-byte frame codec
//
// Command: [cmd, subcmd, offset LE16, offsetHigh, length, checksum LE16, payload x56]
// Reply:   [cmd, subcmd, result, pad x3, checksum LE16, payload x56]
//
// The checksum is CRC-16/CCITT-FALSE over all 64 bytes with the checksum
// field zeroed.

import {
  MSG_LEN,
  HEADER_LEN,
  PAYLOAD_LEN,
  MAX_OFFSET,
  FRAME_CMD,
  FRAME_SUBCMD,
  FRAME_OFFSET,
  FRAME_OFFSET_HIGH,
  FRAME_LENGTH,
  FRAME_CHECKSUM,
  REPLY_RESULT,
} from './constants/protocol'
import { crc16Protocol } from './crc16'
import { ArgumentError } from './errors'
import type { CommandFrame, CommandRequest, OffsetMode, ReplyFrame } from './types/protocol'

// --- Byte helpers ---

export function readLE16(buf: Uint8Array, offset: number): number {
  return buf[offset] | (buf[offset + 1] << 8)
}

export function writeLE16(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = value & 0xff
  buf[offset + 1] = (value >> 8) & 0xff
}

export function readLE32(buf: Uint8Array, offset: number): number {
  return (buf[offset] | (buf[offset + 1] << 8) | (buf[offset + 2] << 16) | (buf[offset + 3] << 24)) >>> 0
}

export function writeLE32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = value & 0xff
  buf[offset + 1] = (value >>> 8) & 0xff
  buf[offset + 2] = (value >>> 16) & 0xff
  buf[offset + 3] = (value >>> 24) & 0xff
}

function padPayload(payload: Uint8Array | undefined): Uint8Array {
  const padded = new Uint8Array(PAYLOAD_LEN)
  if (!payload) return padded
  if (payload.length > PAYLOAD_LEN) {
    throw new ArgumentError(`Payload of ${payload.length} bytes exceeds ${PAYLOAD_LEN}`)
  }
  padded.set(payload)
  return padded
}

function freezeFrame(frame: CommandFrame): CommandFrame {
  return Object.freeze(frame)
}

// --- Command frames ---

/** Serialize a command frame to exactly MSG_LEN bytes. */
export function encodeCommandFrame(frame: CommandFrame): Uint8Array {
  if (frame.payload.length > PAYLOAD_LEN) {
    throw new ArgumentError(`Payload of ${frame.payload.length} bytes exceeds ${PAYLOAD_LEN}`)
  }
  const buf = new Uint8Array(MSG_LEN)
  buf[FRAME_CMD] = frame.cmd & 0xff
  buf[FRAME_SUBCMD] = frame.subcmd & 0xff
  writeLE16(buf, FRAME_OFFSET, frame.offset)
  buf[FRAME_OFFSET_HIGH] = frame.offsetHigh & 0xff
  buf[FRAME_LENGTH] = frame.length & 0xff
  writeLE16(buf, FRAME_CHECKSUM, frame.checksum)
  buf.set(frame.payload, HEADER_LEN)
  return buf
}

function assertFrameSize(data: Uint8Array): void {
  if (data.length !== MSG_LEN) {
    throw new ArgumentError(`Frame must be ${MSG_LEN} bytes, got ${data.length}`)
  }
}

export function decodeCommandFrame(data: Uint8Array): CommandFrame {
  assertFrameSize(data)
  return freezeFrame({
    cmd: data[FRAME_CMD],
    subcmd: data[FRAME_SUBCMD],
    offset: readLE16(data, FRAME_OFFSET),
    offsetHigh: data[FRAME_OFFSET_HIGH],
    length: data[FRAME_LENGTH],
    checksum: readLE16(data, FRAME_CHECKSUM),
    payload: data.slice(HEADER_LEN),
  })
}

export function calculateChecksum(frame: CommandFrame): number {
  return crc16Protocol(encodeCommandFrame({ ...frame, checksum: 0 }))
}

/** Copy of `frame` with the checksum recomputed. */
export function replaceChecksum(frame: CommandFrame): CommandFrame {
  return freezeFrame({ ...frame, checksum: calculateChecksum(frame) })
}

export function checksumOk(frame: CommandFrame): boolean {
  return frame.checksum === calculateChecksum(frame)
}

/**
 * Build a checksummed command frame.
 *
 * `full` splits a 24-bit offset across the offset field and offsetHigh.
 * `small` keeps a 16-bit offset and puts the request length into offsetHigh,
 * leaving the length byte zero; reset and key-value commands expect that.
 */
export function createCommandFrame(request: CommandRequest, mode: OffsetMode = 'full'): CommandFrame {
  const offset = request.offset ?? 0
  const length = request.length ?? 0
  if (!Number.isInteger(offset) || offset < 0 || offset > MAX_OFFSET) {
    throw new ArgumentError(`offset ${offset} outside 0..0x00ffffff`)
  }
  if (mode === 'small' && offset > 0xffff) {
    throw new ArgumentError(`offset 0x${offset.toString(16)} does not fit a small-offset frame`)
  }
  if (!Number.isInteger(length) || length < 0 || length > PAYLOAD_LEN) {
    throw new ArgumentError(`length ${length} outside 0..${PAYLOAD_LEN}`)
  }
  const payload = padPayload(request.payload)

  const base: CommandFrame =
    mode === 'small'
      ? {
          cmd: request.cmd,
          subcmd: request.subcmd,
          offset: offset & 0xffff,
          offsetHigh: length,
          length: 0,
          checksum: 0,
          payload,
        }
      : {
          cmd: request.cmd,
          subcmd: request.subcmd,
          offset: offset & 0xffff,
          offsetHigh: offset >>> 16,
          length,
          checksum: 0,
          payload,
        }
  return replaceChecksum(base)
}

// --- Reply frames ---

export function decodeReplyFrame(data: Uint8Array): ReplyFrame {
  assertFrameSize(data)
  const raw = data.slice()
  return Object.freeze({
    cmd: raw[FRAME_CMD],
    subcmd: raw[FRAME_SUBCMD],
    result: raw[REPLY_RESULT],
    checksum: readLE16(raw, FRAME_CHECKSUM),
    payload: raw.slice(HEADER_LEN),
    raw,
  })
}

export function replyChecksumOk(reply: ReplyFrame): boolean {
  const zeroed = reply.raw.slice()
  writeLE16(zeroed, FRAME_CHECKSUM, 0)
  return reply.checksum === crc16Protocol(zeroed)
}
