// SPDX-License-Identifier: GPL-2.0-or-later

import type { ReplyFrame } from './types/protocol'

/** Rejected before any I/O: bad offset, oversized payload, bad frame size */
export class ArgumentError extends Error {
  override name = 'ArgumentError'
}

/** Unknown key, layer or profile name */
export class LookupError extends Error {
  override name = 'LookupError'
  readonly key: string
  readonly layer: string | undefined

  constructor(message: string, key: string, layer?: string) {
    super(message)
    this.key = key
    this.layer = layer
  }
}

export type TransportFailure = 'timeout' | 'io' | 'closed'

export class TransportError extends Error {
  override name = 'TransportError'
  readonly reason: TransportFailure

  constructor(message: string, reason: TransportFailure, options?: { cause?: unknown }) {
    super(message, options)
    this.reason = reason
  }
}

/** Reply command byte does not echo the request */
export class ProtocolError extends Error {
  override name = 'ProtocolError'
  readonly expected: number
  readonly reply: ReplyFrame

  constructor(expected: number, reply: ReplyFrame) {
    super(`Command 0x${hex8(expected)} answered with 0x${hex8(reply.cmd)}`)
    this.expected = expected
    this.reply = reply
  }
}

/** Malformed keymap document or device profile */
export class ConfigError extends Error {
  override name = 'ConfigError'
}

function hex8(value: number): string {
  return value.toString(16).padStart(2, '0')
}
