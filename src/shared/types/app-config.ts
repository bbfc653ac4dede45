// SPDX-License-Identifier: GPL-2.0-or-later

export interface AppConfig {
  /** Profile name, resolved to profiles/<name>.json */
  profile: string
  verbose: boolean
  /** Mirror log lines to stderr */
  echoLog: boolean
  /** Empty: logs/ beside the config file */
  logDir: string
  vendorId?: number
  productId?: number
  interfaceNumber?: number
}

export const SETTABLE_APP_CONFIG_KEYS: ReadonlySet<keyof AppConfig> = new Set([
  'profile',
  'verbose',
  'echoLog',
  'logDir',
  'vendorId',
  'productId',
  'interfaceNumber',
])

export const DEFAULT_APP_CONFIG: AppConfig = {
  profile: 'dk61',
  verbose: false,
  echoLog: true,
  logDir: '',
}
