// USB HID parameters
export const MSG_LEN = 64
export const HEADER_LEN = 8
export const PAYLOAD_LEN = 56
export const HID_REPORT_ID = 0x00

// Frame field offsets
export const FRAME_CMD = 0
export const FRAME_SUBCMD = 1
export const FRAME_OFFSET = 2
export const FRAME_OFFSET_HIGH = 4
export const FRAME_LENGTH = 5
export const FRAME_CHECKSUM = 6
export const REPLY_RESULT = 2

export const MAX_OFFSET = 0x00ffffff

// Communication parameters
export const HID_OPEN_RETRY_COUNT = 10
export const HID_OPEN_RETRY_DELAY_MS = 1000
export const KEY_VALUES_TIMEOUT_MS = 100
export const RESET_TIMEOUT_MS = 1000
export const LIGHTING_TIMEOUT_MS = 1000
export const DEFAULT_REPLY_TIMEOUT_MS = 100

// --- Key values ---
export const KEYCODE_SIZE = 4
export const KEYCODES_PER_CHUNK = PAYLOAD_LEN / KEYCODE_SIZE
export const UNUSED_KEY_NAME = 'UnusedKey'

// --- Static lighting buffer ---
export const MAX_EFFECTS = 32
export const EFFECT_HEADER_SIZE = 16
export const EFFECT_TABLE_SIZE = MAX_EFFECTS * EFFECT_HEADER_SIZE
export const LOCAL_EFFECT_HEADER_SIZE = 4
export const COLOR_SIZE = 4
export const EFFECT_UNUSED = 0xffffffff
export const EFFECT_STATIC_PARAMS = 1
export const LIGHTING_TYPE_STATIC = 0
export const DEFAULT_COLOR_NAME = 'default'
export const BLACK = 0x000000

// --- Info subcommands ---
export const INFO_GET_BUFFER_SIZE = 0x09

// --- Layer data types (LayerResetDataType offset argument) ---
export const LayerDataType = {
  Invalid: 0,
  KeySet: 1,
  LEData: 3,
  Macros: 4,
  KeyPressLightingEffect: 5,
  Lighting: 6,
  FnKeySet: 7,
} as const

export type LayerDataType = (typeof LayerDataType)[keyof typeof LayerDataType]

// --- CRC-16 parameter sets ---
export const CRC16_USB = { polynomial: 0x8005, initialValue: 0xffff, xorOut: 0xffff } as const
export const CRC16_PROTOCOL = { polynomial: 0x1021, initialValue: 0xffff, xorOut: 0x0000 } as const
