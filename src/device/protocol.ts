// SPDX-License-Identifier: GPL-2.0-or-later
/**
 * GK6x layer protocol commands.
 *
 * Every command is one or more 64-byte frames answered by one reply each:
 * - Reset / key-value writes use small-offset frames (16-bit offset, chunk
 *   length in the byte after it).
 * - Lighting writes use full-offset frames (24-bit offset) because the
 *   logical buffer is addressed past 64 KiB on large boards.
 * - A reply whose command byte differs from the request is a desync and
 *   aborts the operation.
 */

import {
  PAYLOAD_LEN,
  KEYCODE_SIZE,
  KEYCODES_PER_CHUNK,
  KEY_VALUES_TIMEOUT_MS,
  RESET_TIMEOUT_MS,
  LIGHTING_TIMEOUT_MS,
  DEFAULT_REPLY_TIMEOUT_MS,
  MAX_EFFECTS,
  EFFECT_HEADER_SIZE,
  EFFECT_TABLE_SIZE,
  LOCAL_EFFECT_HEADER_SIZE,
  COLOR_SIZE,
  EFFECT_UNUSED,
  EFFECT_STATIC_PARAMS,
  LIGHTING_TYPE_STATIC,
  INFO_GET_BUFFER_SIZE,
  type LayerDataType,
} from '../shared/constants/protocol'
import { ArgumentError, ProtocolError, TransportError } from '../shared/errors'
import { hexdump } from '../shared/hexdump'
import { createCommandFrame, replyChecksumOk, writeLE16, writeLE32 } from '../shared/packet'
import type {
  BufferSize,
  CommandFrame,
  Logger,
  OpcodeTable,
  ReplyFrame,
} from '../shared/types/protocol'
import type { Transport } from './hid-transport'

// --- Buffer helpers ---

/** Serialize key codes as consecutive little-endian u32 values. */
export function encodeKeycodes(codes: readonly number[]): Uint8Array {
  const buf = new Uint8Array(codes.length * KEYCODE_SIZE)
  codes.forEach((code, i) => writeLE32(buf, i * KEYCODE_SIZE, code))
  return buf
}

/** Split `data` into consecutive pieces of at most `size` bytes. */
export function chunkBuffer(data: Uint8Array, size = PAYLOAD_LEN): Uint8Array[] {
  const chunks: Uint8Array[] = []
  for (let offset = 0; offset < data.length; offset += size) {
    chunks.push(data.subarray(offset, offset + size))
  }
  return chunks
}

/**
 * Build the static lighting buffer:
 *   [0, 512)       effect table, 32 slots x 16 bytes
 *                  slot 0 = [512, 1, 0, 0], slots 1..31 = 0xFFFFFFFF x4
 *   [512, 516)     local effect header: type LE16 (0 = static), byte count LE16
 *   [516, ...)     one LE32 RGB value per LED
 */
export function buildStaticLightingBuffer(colors: readonly number[]): Uint8Array {
  const colorBytes = colors.length * COLOR_SIZE
  if (colorBytes > 0xffff) {
    throw new ArgumentError(`${colors.length} colors do not fit the 16-bit byte count of the lighting header`)
  }
  const buf = new Uint8Array(EFFECT_TABLE_SIZE + LOCAL_EFFECT_HEADER_SIZE + colorBytes)

  writeLE32(buf, 0, EFFECT_TABLE_SIZE)
  writeLE32(buf, 4, EFFECT_STATIC_PARAMS)
  writeLE32(buf, 8, 0)
  writeLE32(buf, 12, 0)
  for (let slot = 1; slot < MAX_EFFECTS; slot++) {
    for (let word = 0; word < EFFECT_HEADER_SIZE; word += 4) {
      writeLE32(buf, slot * EFFECT_HEADER_SIZE + word, EFFECT_UNUSED)
    }
  }

  writeLE16(buf, EFFECT_TABLE_SIZE, LIGHTING_TYPE_STATIC)
  writeLE16(buf, EFFECT_TABLE_SIZE + 2, colorBytes)

  const start = EFFECT_TABLE_SIZE + LOCAL_EFFECT_HEADER_SIZE
  colors.forEach((color, i) => writeLE32(buf, start + i * COLOR_SIZE, color & 0xffffff))
  return buf
}

function hex8(value: number): string {
  return `0x${value.toString(16).padStart(2, '0')}`
}

export interface ResetOptions {
  /** Swallow a missing reply; the firmware does not always answer a reset. */
  ignoreMissingReply?: boolean
}

export class KeyboardProtocol {
  private readonly transport: Transport
  private readonly opcodes: OpcodeTable
  private readonly logger: Logger

  constructor(transport: Transport, opcodes: OpcodeTable, logger: Logger) {
    this.transport = transport
    this.opcodes = opcodes
    this.logger = logger
  }

  /** Send one frame and require a reply echoing its command byte. */
  private async request(frame: CommandFrame, timeoutMs: number): Promise<ReplyFrame> {
    const reply = await this.transport.sendAndReceive(frame, timeoutMs)
    if (reply.cmd !== frame.cmd) {
      this.logger.debug(`Unexpected reply to ${hex8(frame.cmd)}:\n${hexdump(reply.raw)}`)
      throw new ProtocolError(frame.cmd, reply)
    }
    if (!replyChecksumOk(reply)) {
      this.logger.warn(`Reply to ${hex8(frame.cmd)} has checksum 0x${reply.checksum.toString(16)} which does not verify`)
    }
    return reply
  }

  // =====================================================================
  // Layer data
  // =====================================================================

  /**
   * Clear one data type of a layer.
   * Frame: [LayerResetDataType, layer, dataType LE16, 0, 0, crc, ...]
   */
  async resetLayerData(layerCode: number, dataType: LayerDataType, options: ResetOptions = {}): Promise<void> {
    const frame = createCommandFrame(
      { cmd: this.opcodes.layerResetDataType, subcmd: layerCode, offset: dataType },
      'small',
    )
    this.logger.debug(`Reset layer ${layerCode} data type ${dataType}`)
    try {
      await this.request(frame, RESET_TIMEOUT_MS)
    } catch (err) {
      if (options.ignoreMissingReply && err instanceof TransportError) {
        this.logger.debug(`Ignoring error: ${err.message}`)
        return
      }
      throw err
    }
  }

  async setKeyValues(layerCode: number, codes: readonly number[]): Promise<void> {
    await this.writeKeyValues(this.opcodes.layerSetKeyValues, layerCode, codes)
  }

  async setFnKeyValues(layerCode: number, codes: readonly number[]): Promise<void> {
    await this.writeKeyValues(this.opcodes.layerFnSetKeyValues, layerCode, codes)
  }

  async setDriverKeyValues(codes: readonly number[]): Promise<void> {
    await this.writeKeyValues(this.opcodes.driverLayerSetKeyValues, 0, codes)
  }

  /**
   * Write key codes 14 at a time (56 bytes per frame).
   * Offset is the running byte offset into the logical key-code buffer.
   */
  private async writeKeyValues(opcode: number, subcmd: number, codes: readonly number[]): Promise<void> {
    const chunks = chunkBuffer(encodeKeycodes(codes), KEYCODES_PER_CHUNK * KEYCODE_SIZE)
    let offset = 0
    for (const chunk of chunks) {
      const frame = createCommandFrame(
        { cmd: opcode, subcmd, offset, length: chunk.length, payload: chunk },
        'small',
      )
      await this.request(frame, KEY_VALUES_TIMEOUT_MS)
      offset += chunk.length
    }
    this.logger.debug(`Wrote ${codes.length} key codes with ${hex8(opcode)} in ${chunks.length} frames`)
  }

  /** Upload a static per-LED color table. */
  async setStaticLighting(layerCode: number, colors: readonly number[]): Promise<void> {
    const data = buildStaticLightingBuffer(colors)
    let offset = 0
    let packetNumber = 0
    for (const chunk of chunkBuffer(data)) {
      this.logger.debug(`Send packet ${packetNumber} at offset: ${offset}`)
      const frame = createCommandFrame({
        cmd: this.opcodes.layerSetLightValues,
        subcmd: layerCode,
        offset,
        length: chunk.length,
        payload: chunk,
      })
      await this.request(frame, LIGHTING_TIMEOUT_MS)
      offset += chunk.length
      packetNumber++
    }
  }

  // =====================================================================
  // Device state
  // =====================================================================

  /** Info/0x09: reply payload bytes 0..1 */
  async getBufferSize(): Promise<BufferSize> {
    const reply = await this.request(
      createCommandFrame({ cmd: this.opcodes.info, subcmd: INFO_GET_BUFFER_SIZE }),
      DEFAULT_REPLY_TIMEOUT_MS,
    )
    return { major: reply.payload[0], minor: reply.payload[1] }
  }

  async setActiveLayer(layerCode: number): Promise<void> {
    await this.request(
      createCommandFrame({ cmd: this.opcodes.setLayer, subcmd: layerCode }),
      DEFAULT_REPLY_TIMEOUT_MS,
    )
  }

  /** Returns the reply's result byte (1 on success). */
  async ping(): Promise<number> {
    const reply = await this.request(
      createCommandFrame({ cmd: this.opcodes.ping, subcmd: 0 }),
      DEFAULT_REPLY_TIMEOUT_MS,
    )
    return reply.result
  }
}
