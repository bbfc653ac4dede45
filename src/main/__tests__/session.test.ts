// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { LookupError } from '../../shared/errors'
import type { KeymapDocument } from '../../shared/types/protocol'
import {
  FakeHidChannel,
  createTestLogger,
  loadDk61Profile,
  makeReply,
} from '../../device/__tests__/test-helpers'

vi.mock('node-hid', () => ({
  default: {
    devicesAsync: vi.fn(),
    HIDAsync: { open: vi.fn() },
  },
}))

import { runSession, selectLayers, type ChannelRunner } from '../session'

const profile = loadDk61Profile()
const target = { vendorId: profile.vendorId, productId: profile.productId, interfaceNumber: profile.interfaceNumber }

const keymap: KeymapDocument = {
  keyLayers: { Layer1: { CapsLock: 'LCtrl' } },
  staticColorLayers: { Layer1: { default: 'white' } },
  colorDefinitions: { white: '0xffffff' },
}

let channel: FakeHidChannel
let opened: number
const runner: ChannelRunner = async (_target, _logger, fn) => {
  opened++
  return fn(channel)
}

beforeEach(() => {
  channel = new FakeHidChannel((request) =>
    makeReply(request[0], { subcmd: request[1], payload: request[0] === 0x01 ? [0x10, 0x02] : [] }),
  )
  opened = 0
})

describe('selectLayers', () => {
  it('drops lighting for keys-only runs', () => {
    expect(selectLayers(keymap, { keysOnly: true })).toEqual({
      keyLayers: keymap.keyLayers,
      staticColorLayers: undefined,
      colorDefinitions: keymap.colorDefinitions,
    })
  })

  it('drops key layers for lighting-only runs', () => {
    expect(selectLayers(keymap, { lightingOnly: true }).keyLayers).toBeUndefined()
  })
})

describe('runSession', () => {
  it('reads the buffer size', async () => {
    const result = await runSession({ profile, target, info: true }, createTestLogger(), runner)

    expect(result).toEqual({ bufferSize: { major: 0x10, minor: 0x02 } })
    expect(channel.written.map((f) => [f[0], f[1]])).toEqual([[0x01, 0x09]])
  })

  it('programs the keymap then activates the layer', async () => {
    await runSession({ profile, target, keymap, activate: 'Layer2' }, createTestLogger(), runner)

    const commands = channel.written.map((f) => f[0])
    expect(commands).toHaveLength(27)
    expect(commands[0]).toBe(0x21)
    expect(commands[1]).toBe(0x27)
    expect(commands[20]).toBe(0x21)
    expect(commands[21]).toBe(0x22)
    expect(Array.from(channel.written[26].subarray(0, 2))).toEqual([0x0b, 0x03])
  })

  it('honors keys-only', async () => {
    await runSession({ profile, target, keymap, keysOnly: true }, createTestLogger(), runner)

    expect(channel.written.map((f) => f[0])).toEqual([0x21, 0x22, 0x22, 0x22, 0x22, 0x22])
  })

  it('rejects an unknown layer before opening the device', async () => {
    await expect(
      runSession({ profile, target, activate: 'Layer9' }, createTestLogger(), runner),
    ).rejects.toBeInstanceOf(LookupError)
    expect(opened).toBe(0)
  })

  it('passes the device target to the channel runner', async () => {
    const calls: unknown[] = []
    const recording: ChannelRunner = async (t, logger, fn) => {
      calls.push(t)
      return runner(t, logger, fn)
    }

    await runSession({ profile, target, info: true }, createTestLogger(), recording)

    expect(calls).toEqual([{ vendorId: 0x1ea7, productId: 0x0907, interfaceNumber: 1 }])
  })
})
