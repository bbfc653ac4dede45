// SPDX-License-Identifier: GPL-2.0-or-later
/**
 * Frame transport over an open HID channel.
 * One frame out, optionally one frame back. No retries at this layer.
 */

import { MSG_LEN } from '../shared/constants/protocol'
import { ArgumentError, TransportError } from '../shared/errors'
import { hexdumpLines } from '../shared/hexdump'
import { checksumOk, decodeReplyFrame, encodeCommandFrame } from '../shared/packet'
import type { CommandFrame, HidChannel, Logger, ReplyFrame } from '../shared/types/protocol'

export interface Transport {
  send(frame: CommandFrame): Promise<void>
  sendAndReceive(frame: CommandFrame, timeoutMs: number): Promise<ReplyFrame>
}

/** Trace a frame as a hex dump at debug level. */
export function logHidPacket(logger: Logger, direction: 'TX' | 'RX', data: Uint8Array): void {
  if (!logger.verbose) return
  logger.debug(`HID ${direction}:\n${hexdumpLines(data).join('\n')}`)
}

function toTransportError(err: unknown, action: string): TransportError {
  if (err instanceof TransportError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new TransportError(`HID ${action} failed: ${message}`, 'io', { cause: err })
}

export class HidTransport implements Transport {
  private readonly channel: HidChannel
  private readonly logger: Logger

  constructor(channel: HidChannel, logger: Logger) {
    this.channel = channel
    this.logger = logger
  }

  async send(frame: CommandFrame): Promise<void> {
    if (!checksumOk(frame)) {
      throw new ArgumentError(
        `Frame 0x${frame.cmd.toString(16).padStart(2, '0')} checksum does not match its contents`,
      )
    }
    const data = encodeCommandFrame(frame)
    logHidPacket(this.logger, 'TX', data)
    try {
      await this.channel.write(data)
    } catch (err) {
      throw toTransportError(err, 'write')
    }
  }

  async sendAndReceive(frame: CommandFrame, timeoutMs: number): Promise<ReplyFrame> {
    await this.send(frame)

    let data: Uint8Array | undefined
    try {
      data = await this.channel.read(timeoutMs)
    } catch (err) {
      throw toTransportError(err, 'read')
    }
    if (!data || data.length === 0) {
      throw new TransportError(
        `No reply to command 0x${frame.cmd.toString(16).padStart(2, '0')} within ${timeoutMs} ms`,
        'timeout',
      )
    }
    if (data.length !== MSG_LEN) {
      throw new TransportError(`Reply must be ${MSG_LEN} bytes, got ${data.length}`, 'io')
    }

    logHidPacket(this.logger, 'RX', data)
    return decodeReplyFrame(data)
  }
}
