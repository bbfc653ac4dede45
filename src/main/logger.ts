// SPDX-License-Identifier: GPL-2.0-or-later
// Rotation logger: writes to <logDir>/layerkit-N.log

import { join } from 'node:path'
import {
  existsSync,
  mkdirSync,
  statSync,
  renameSync,
  unlinkSync,
  appendFileSync,
} from 'node:fs'
import type { Logger, LogLevel } from '../shared/types/protocol'

const LOG_FILE_PREFIX = 'layerkit-'
const LOG_FILE_EXT = '.log'
const MAX_FILE_SIZE = 5 * 1024 * 1024 // 5 MB
const MAX_GENERATIONS = 5 // layerkit-0.log through layerkit-4.log

export interface LoggerOptions {
  logDir: string
  /** Keep debug lines (packet dumps included) */
  verbose: boolean
  /** Also write each line to stderr */
  echo?: boolean
}

export function logFilePath(logDir: string, generation: number): string {
  return join(logDir, `${LOG_FILE_PREFIX}${generation}${LOG_FILE_EXT}`)
}

function rotate(logDir: string): void {
  const oldest = logFilePath(logDir, MAX_GENERATIONS - 1)
  if (existsSync(oldest)) {
    unlinkSync(oldest)
  }
  for (let i = MAX_GENERATIONS - 2; i >= 0; i--) {
    const src = logFilePath(logDir, i)
    if (existsSync(src)) {
      renameSync(src, logFilePath(logDir, i + 1))
    }
  }
}

function shouldRotate(logDir: string): boolean {
  const current = logFilePath(logDir, 0)
  if (!existsSync(current)) return false
  return statSync(current).size >= MAX_FILE_SIZE
}

export function formatLine(level: LogLevel, message: string, now = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}\n`
}

export class FileLogger implements Logger {
  readonly verbose: boolean
  private readonly logDir: string
  private readonly echo: boolean
  private initialized = false

  constructor(options: LoggerOptions) {
    this.logDir = options.logDir
    this.verbose = options.verbose
    this.echo = options.echo ?? false
  }

  log(level: LogLevel, message: string): void {
    if (level === 'debug' && !this.verbose) return
    if (!this.initialized) {
      if (!existsSync(this.logDir)) {
        mkdirSync(this.logDir, { recursive: true })
      }
      this.initialized = true
    }
    if (shouldRotate(this.logDir)) {
      rotate(this.logDir)
    }
    const line = formatLine(level, message)
    appendFileSync(logFilePath(this.logDir, 0), line, 'utf-8')
    if (this.echo) {
      process.stderr.write(line)
    }
  }

  debug(message: string): void {
    this.log('debug', message)
  }

  info(message: string): void {
    this.log('info', message)
  }

  warn(message: string): void {
    this.log('warn', message)
  }

  error(message: string): void {
    this.log('error', message)
  }

  getLogPath(): string {
    return this.logDir
  }
}

export function createLogger(options: LoggerOptions): FileLogger {
  return new FileLogger(options)
}
