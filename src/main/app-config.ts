// SPDX-License-Identifier: GPL-2.0-or-later
// App configuration backed by conf

import { dirname, join } from 'node:path'
import Conf from 'conf'
import { DEFAULT_APP_CONFIG, SETTABLE_APP_CONFIG_KEYS, type AppConfig } from '../shared/types/app-config'

const store = new Conf<AppConfig>({
  projectName: 'layerkit',
  configName: 'config',
  defaults: DEFAULT_APP_CONFIG,
})

export function loadAppConfig(): AppConfig {
  return store.store
}

/** Persist the given settable keys; others are ignored. */
export function updateAppConfig(changes: Partial<AppConfig>): void {
  for (const key of SETTABLE_APP_CONFIG_KEYS) {
    const value = changes[key]
    if (value !== undefined) store.set(key, value)
  }
}

/** Configured log directory, or logs/ beside the config file. */
export function resolveLogDir(config: AppConfig): string {
  return config.logDir !== '' ? config.logDir : join(dirname(store.path), 'logs')
}
