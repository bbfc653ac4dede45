// SPDX-License-Identifier: GPL-2.0-or-later
// CLI entry point

import { loadAppConfig, resolveLogDir, updateAppConfig } from './app-config'
import { mergeConfig, parseCliArgs, USAGE, type CliOptions } from './cli-args'
import { loadDeviceProfile, readKeymapFile } from './file-io'
import { createLogger } from './logger'
import { runSession } from './session'

async function main(argv: string[]): Promise<number> {
  let cli: CliOptions
  try {
    cli = parseCliArgs(argv)
  } catch (err) {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`)
    return 2
  }
  if (cli.help) {
    process.stdout.write(USAGE)
    return 0
  }

  const config = mergeConfig(loadAppConfig(), cli)
  if (cli.save) {
    updateAppConfig({
      profile: cli.profile,
      verbose: cli.verbose,
      logDir: cli.logDir,
      vendorId: cli.vendorId,
      productId: cli.productId,
      interfaceNumber: cli.interfaceNumber,
    })
  }

  const logger = createLogger({ logDir: resolveLogDir(config), verbose: config.verbose, echo: config.echoLog })

  try {
    const profile = await loadDeviceProfile(config.profile)
    const keymap = cli.keymap !== undefined ? await readKeymapFile(cli.keymap) : undefined
    if (!keymap && !cli.info && cli.activate === undefined) {
      process.stderr.write(`Nothing to do.\n\n${USAGE}`)
      return 2
    }
    logger.info(`Programming ${profile.name}${cli.keymap ? ` from ${cli.keymap}` : ''}`)

    const result = await runSession(
      {
        profile,
        target: {
          vendorId: config.vendorId ?? profile.vendorId,
          productId: config.productId ?? profile.productId,
          interfaceNumber: config.interfaceNumber ?? profile.interfaceNumber,
        },
        keymap,
        keysOnly: cli.keysOnly,
        lightingOnly: cli.lightingOnly,
        info: cli.info,
        activate: cli.activate,
      },
      logger,
    )
    if (result.bufferSize) {
      process.stdout.write(`Buffer size: ${result.bufferSize.major} ${result.bufferSize.minor}\n`)
    }
    logger.info('Done')
    return 0
  } catch (err) {
    const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err)
    logger.error(message)
    if (!config.echoLog) process.stderr.write(`${message}\n`)
    return 1
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    process.stderr.write(`${String(err)}\n`)
    process.exitCode = 1
  },
)
