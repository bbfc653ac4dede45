/** Offset encoding for command frames */
export type OffsetMode = 'small' | 'full'

/** Host → device frame. Field values are as they appear on the wire. */
export interface CommandFrame {
  readonly cmd: number
  readonly subcmd: number
  readonly offset: number
  /** Bits 16..23 of the offset in full mode, the second argument in small mode */
  readonly offsetHigh: number
  readonly length: number
  readonly checksum: number
  /**
   * Always PAYLOAD_LEN bytes, owned by the frame. The checksum covers it,
   * so a changed payload needs a new frame from replaceChecksum.
   */
  readonly payload: Readonly<Uint8Array>
}

/** Logical command before wire encoding */
export interface CommandRequest {
  cmd: number
  subcmd: number
  offset?: number
  length?: number
  payload?: Uint8Array
}

/** Device → host frame */
export interface ReplyFrame {
  readonly cmd: number
  readonly subcmd: number
  readonly result: number
  readonly checksum: number
  readonly payload: Readonly<Uint8Array>
  /** The 64 bytes as read */
  readonly raw: Readonly<Uint8Array>
}

/** CRC-16 parameters */
export interface Crc16Params {
  polynomial: number
  initialValue: number
  xorOut: number
}

/** Opcode set of one keyboard model */
export interface OpcodeTable {
  info: number
  restartKeyboard: number
  setLayer: number
  ping: number
  driverMacro: number
  driverLayerSetKeyValues: number
  driverLayerSetConfig: number
  layerResetDataType: number
  layerSetKeyValues: number
  layerSetMacros: number
  layerSetKeyPressLightingEffect: number
  layerSetLightValues: number
  layerFnSetKeyValues: number
}

/** Entry of the physical key table */
export interface PhysicalKey {
  name: string
  /** Index in the lighting-addressable LED array */
  led: number
}

/** A programmable layer as addressed on the device */
export interface LayerDescriptor {
  name: string
  code: number
  isFn: boolean
  /** Written through the driver opcodes instead of the layer opcodes */
  isDriver: boolean
}

/** Static tables of one keyboard model, selected at session start */
export interface DeviceProfile {
  name: string
  vendorId: number
  productId: number
  interfaceNumber: number
  ledCount: number
  keys: PhysicalKey[]
  keycodes: Map<string, number>
  layers: Map<string, LayerDescriptor>
  opcodes: OpcodeTable
}

/** Source key name → destination key name */
export type LayerKeymap = Record<string, string>

/** Source key name (or "default") → color name */
export type LayerColorMap = Record<string, string>

/** Keymap document as read from a JSON file */
export interface KeymapDocument {
  keyLayers?: Record<string, LayerKeymap>
  staticColorLayers?: Record<string, LayerColorMap>
  /** Color name → RGB value, numbers or integer strings such as "0xff0000" */
  colorDefinitions?: Record<string, number | string>
}

/** Buffer size reported by the Info command */
export interface BufferSize {
  major: number
  minor: number
}

/** Detected HID device info */
export interface DeviceInfo {
  vendorId: number
  productId: number
  interfaceNumber: number
  productName: string
  path: string
}

/**
 * Bidirectional 64-byte channel to an open HID device.
 * `read` resolves to undefined when nothing arrives within the timeout.
 */
export interface HidChannel {
  write(data: Uint8Array): Promise<void>
  read(timeoutMs: number): Promise<Uint8Array | undefined>
  close(): Promise<void>
}

export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

/** Logging capability passed explicitly through the protocol layers */
export interface Logger {
  readonly verbose: boolean
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}
