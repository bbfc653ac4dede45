// SPDX-License-Identifier: GPL-2.0-or-later

import { describe, it, expect, beforeEach } from 'vitest'
import { LookupError } from '../../shared/errors'
import { readLE32 } from '../../shared/packet'
import { HidTransport } from '../hid-transport'
import { LayerProgrammer, buildColorTable, buildKeyCodes, resolveColor } from '../keyboard'
import { KeyboardProtocol } from '../protocol'
import { FakeHidChannel, createTestLogger, loadDk61Profile, makeReply, type TestLogger } from './test-helpers'

const profile = loadDk61Profile()

const CODE_A = 0x02000400
const CODE_B = 0x02000500
const UNUSED = 0x01000000
const RED = 0xff0000
const WHITE = 0xffffff

/** Reassemble the key codes carried by small-offset key-value frames. */
function keyCodesFrom(frames: Uint8Array[]): number[] {
  const codes: number[] = []
  for (const frame of frames) {
    const length = frame[4]
    for (let i = 0; i < length; i += 4) codes.push(readLE32(frame, 8 + i))
  }
  return codes
}

describe('buildKeyCodes', () => {
  it('maps named keys and fills the rest with UnusedKey', () => {
    const codes = buildKeyCodes(profile, 'Layer1', { A: 'B' })

    expect(codes).toHaveLength(61)
    expect(codes[29]).toBe(CODE_B)
    expect(codes.filter((c) => c === UNUSED)).toHaveLength(60)
  })

  it('rejects an unknown source key', () => {
    expect(() => buildKeyCodes(profile, 'Layer1', { Bogus: 'A' })).toThrow(
      new LookupError('Source Keyname is wrong: Bogus inside Layer1', 'Bogus', 'Layer1'),
    )
  })

  it('rejects an unknown destination key', () => {
    expect(() => buildKeyCodes(profile, 'Layer1', { A: 'Bogus' })).toThrow(
      'Destination Keyname is wrong: Bogus inside Layer1',
    )
  })

  it('accepts a code-only name such as UnusedKey as a destination', () => {
    expect(buildKeyCodes(profile, 'Layer1', { A: 'UnusedKey' })[29]).toBe(UNUSED)
  })
})

describe('resolveColor', () => {
  it('parses numeric and string definitions', () => {
    expect(resolveColor({ red: '0xff0000', blue: 255 }, 'red')).toBe(RED)
    expect(resolveColor({ red: '0xff0000', blue: 255 }, 'blue')).toBe(255)
  })

  it('falls back to the default definition, then black', () => {
    expect(resolveColor({ default: WHITE }, 'missing')).toBe(WHITE)
    expect(resolveColor({ default: WHITE }, undefined)).toBe(WHITE)
    expect(resolveColor({}, 'missing')).toBe(0)
  })

  it('ignores inherited property names', () => {
    expect(resolveColor({ default: 7 }, 'constructor')).toBe(7)
  })
})

describe('buildColorTable', () => {
  const definitions = { white: WHITE, red: '0xff0000' }

  it('colors named keys by LED index and the rest with the layer default', () => {
    const colors = buildColorTable(profile, 'Layer1', { default: 'white', Esc: 'red', CapsLock: 'red' }, definitions)

    expect(colors).toHaveLength(132)
    expect(colors[0]).toBe(RED)
    expect(colors[44]).toBe(RED)
    expect(colors.filter((c) => c === WHITE)).toHaveLength(130)
  })

  it('uses the definitions default when the layer names none', () => {
    const colors = buildColorTable(profile, 'Layer1', { Esc: 'red' }, { ...definitions, default: 0x000010 })

    expect(colors[0]).toBe(RED)
    expect(colors[1]).toBe(0x000010)
  })

  it('rejects an unknown key name', () => {
    expect(() => buildColorTable(profile, 'Layer1', { Bogus: 'red' }, definitions)).toThrow(LookupError)
  })
})

describe('LayerProgrammer', () => {
  let channel: FakeHidChannel
  let logger: TestLogger
  let programmer: LayerProgrammer

  beforeEach(() => {
    channel = new FakeHidChannel()
    logger = createTestLogger()
    const protocol = new KeyboardProtocol(new HidTransport(channel, logger), profile.opcodes, logger)
    programmer = new LayerProgrammer(protocol, profile, logger)
  })

  it('resets then writes a regular key layer', async () => {
    await programmer.programKeyLayers({ Layer1: { A: 'B' } })

    expect(channel.written).toHaveLength(6)
    expect(Array.from(channel.written[0].subarray(0, 6))).toEqual([0x21, 0x02, 0x01, 0x00, 0x00, 0x00])
    expect(channel.written.slice(1).every((f) => f[0] === 0x22 && f[1] === 0x02)).toBe(true)

    const codes = keyCodesFrom(channel.written.slice(1))
    expect(codes).toHaveLength(61)
    expect(codes[29]).toBe(CODE_B)
    expect(codes[28]).toBe(UNUSED)
  })

  it('programs an Fn layer with the Fn key set and opcode', async () => {
    await programmer.programKeyLayers({ FnLayer1: { CapsLock: 'A' } })

    expect(Array.from(channel.written[0].subarray(0, 6))).toEqual([0x21, 0x02, 0x07, 0x00, 0x00, 0x00])
    expect(channel.written.slice(1).every((f) => f[0] === 0x31 && f[1] === 0x02)).toBe(true)
    expect(keyCodesFrom(channel.written.slice(1))[28]).toBe(CODE_A)
  })

  it('programs the driver layer with the driver opcode and subcommand 0', async () => {
    await programmer.programKeyLayers({ Driver: {} })

    expect(Array.from(channel.written[0].subarray(0, 6))).toEqual([0x21, 0x05, 0x01, 0x00, 0x00, 0x00])
    expect(channel.written.slice(1).every((f) => f[0] === 0x16 && f[1] === 0x00)).toBe(true)
  })

  it('sends nothing for an unknown layer', async () => {
    await expect(programmer.programKeyLayers({ Layer9: { A: 'B' } })).rejects.toThrow('Unknown layer: Layer9')
    expect(channel.written).toEqual([])
  })

  it('sends nothing for a layer with a bad key name', async () => {
    await expect(programmer.programKeyLayers({ Layer1: { Bogus: 'B' } })).rejects.toThrow(LookupError)
    expect(channel.written).toEqual([])
  })

  it('keeps earlier layers written when a later one fails', async () => {
    await expect(
      programmer.programKeyLayers({ Layer1: { A: 'B' }, Layer2: { A: 'Nope' } }),
    ).rejects.toThrow('Destination Keyname is wrong: Nope inside Layer2')
    expect(channel.written).toHaveLength(6)
  })

  it('ignores a missing reply to the lighting reset', async () => {
    channel.replyFor = (request) => (request[0] === 0x21 ? undefined : makeReply(request[0]))

    await programmer.programLightingLayers({ Layer1: { default: 'white', Esc: 'red' } }, { white: WHITE, red: RED })

    expect(channel.written).toHaveLength(20)
    expect(Array.from(channel.written[0].subarray(0, 6))).toEqual([0x21, 0x02, 0x06, 0x00, 0x00, 0x00])
    expect(channel.written.slice(1).every((f) => f[0] === 0x27)).toBe(true)
    // First color sits at buffer offset 516: frame 9, payload byte 12
    expect(readLE32(channel.written[10], 8 + 12)).toBe(RED)
    expect(readLE32(channel.written[10], 8 + 16)).toBe(WHITE)
  })

  it('programs lighting before key maps', async () => {
    await programmer.program({
      keyLayers: { Layer1: { A: 'B' } },
      staticColorLayers: { Layer1: { default: 'white' } },
      colorDefinitions: { white: WHITE },
    })

    const commands = channel.written.map((f) => f[0])
    expect(commands).toHaveLength(26)
    expect(commands.slice(0, 2)).toEqual([0x21, 0x27])
    expect(commands.slice(20, 22)).toEqual([0x21, 0x22])
  })

  it('does nothing for an empty document', async () => {
    await programmer.program({})
    expect(channel.written).toEqual([])
  })
})
