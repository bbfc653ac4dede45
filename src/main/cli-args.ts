// SPDX-License-Identifier: GPL-2.0-or-later

import { parseArgs } from 'node:util'
import { ConfigError } from '../shared/errors'
import { parseIntegerValue } from '../shared/keymap-file'
import type { AppConfig } from '../shared/types/app-config'

export interface CliOptions {
  keymap?: string
  profile?: string
  verbose?: boolean
  keysOnly: boolean
  lightingOnly: boolean
  info: boolean
  activate?: string
  vendorId?: number
  productId?: number
  interfaceNumber?: number
  logDir?: string
  save: boolean
  help: boolean
}

export const USAGE = `Usage: layerkit --keymap <file> [options]

Options:
  --keymap <file>        keymap JSON (keyLayers, staticColorLayers, colorDefinitions)
  --profile <name>       device profile under profiles/ (default: dk61)
  --keys-only            program key layers only
  --lighting-only        program lighting layers only
  --info                 print the device buffer size
  --activate <layer>     switch the active layer when done
  --vid <id>             override vendor ID (e.g. 0x1ea7)
  --pid <id>             override product ID
  --interface <n>        override HID interface number
  --log-dir <dir>        log directory
  -v, --verbose          log packet dumps
  --save                 store --profile/--vid/--pid/--interface/--log-dir/--verbose as defaults
  -h, --help             show this help
`

function parseId(value: string | undefined, flag: string, max: number): number | undefined {
  if (value === undefined) return undefined
  const n = parseIntegerValue(value)
  if (n === undefined || n < 0 || n > max) {
    throw new ConfigError(`${flag}: expected an integer in 0..${max}, got ${value}`)
  }
  return n
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      keymap: { type: 'string' },
      profile: { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      'keys-only': { type: 'boolean', default: false },
      'lighting-only': { type: 'boolean', default: false },
      info: { type: 'boolean', default: false },
      activate: { type: 'string' },
      vid: { type: 'string' },
      pid: { type: 'string' },
      interface: { type: 'string' },
      'log-dir': { type: 'string' },
      save: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  })

  if (values['keys-only'] === true && values['lighting-only'] === true) {
    throw new ConfigError('--keys-only and --lighting-only are mutually exclusive')
  }

  return {
    keymap: values.keymap,
    profile: values.profile,
    verbose: values.verbose,
    keysOnly: values['keys-only'] ?? false,
    lightingOnly: values['lighting-only'] ?? false,
    info: values.info ?? false,
    activate: values.activate,
    vendorId: parseId(values.vid, '--vid', 0xffff),
    productId: parseId(values.pid, '--pid', 0xffff),
    interfaceNumber: parseId(values.interface, '--interface', 0xff),
    logDir: values['log-dir'],
    save: values.save ?? false,
    help: values.help ?? false,
  }
}

/** Stored configuration with this run's flags applied on top. */
export function mergeConfig(stored: AppConfig, cli: CliOptions): AppConfig {
  return {
    ...stored,
    profile: cli.profile ?? stored.profile,
    verbose: cli.verbose ?? stored.verbose,
    logDir: cli.logDir ?? stored.logDir,
    vendorId: cli.vendorId ?? stored.vendorId,
    productId: cli.productId ?? stored.productId,
    interfaceNumber: cli.interfaceNumber ?? stored.interfaceNumber,
  }
}
