// ---------------------------------------------------------------------------
// Structured logger for the contact sheet CLI
//  - import 時には何もしない (getLogger() の初回呼び出しで初期化)
//  - 1 イベント = 1 JSON 行。stdout は結果表示専用なので、ログは常に stderr へ
//  - 環境変数: LOG_LEVEL (default info), ENABLE_FILE_LOG=1 で logs/ にも追記
// ---------------------------------------------------------------------------

import fs from 'node:fs'
import path from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const levelOrder: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

function isLogLevel(v: string): v is LogLevel {
  return (levelOrder as readonly string[]).includes(v)
}

export function normalizeLevel(raw: unknown): LogLevel {
  const v = String(raw || '').toLowerCase()
  return isLogLevel(v) ? v : 'info'
}

export interface LoggerPort {
  debug(msg: string, meta?: Record<string, unknown>): void
  info(msg: string, meta?: Record<string, unknown>): void
  warn(msg: string, meta?: Record<string, unknown>): void
  error(msg: string, meta?: Record<string, unknown>): void
  withContext(ctx: Record<string, unknown>): LoggerPort
}

/** Receives one serialized record, without the trailing newline */
export type LogSink = (line: string) => void

export const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`)
}

/**
 * Append-only file sink. The stream is opened on the first record; if the
 * directory cannot be created the sink disables itself after one warning.
 */
export function fileSink(filePath: string): LogSink {
  let stream: fs.WriteStream | null = null
  let disabled = false
  return (line) => {
    if (disabled) return
    if (!stream) {
      try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true })
        stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' })
        stream.on('error', (error) => {
          disabled = true
          stderrSink(`file logger disabled: ${error.message}`)
        })
      } catch (error) {
        disabled = true
        stderrSink(`file logger disabled: ${error instanceof Error ? error.message : String(error)}`)
        return
      }
    }
    stream.write(`${line}\n`)
  }
}

export class JsonLogger implements LoggerPort {
  constructor(
    private readonly sinks: readonly LogSink[],
    private readonly min: LogLevel = 'info',
    private readonly base: Record<string, unknown> = {},
  ) {}

  private emit(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
    if (levelOrder.indexOf(level) < levelOrder.indexOf(this.min)) return
    const line = JSON.stringify({ ts: new Date().toISOString(), level, msg, ...this.base, ...meta })
    for (const sink of this.sinks) sink(line)
  }

  debug(m: string, meta?: Record<string, unknown>) {
    this.emit('debug', m, meta)
  }
  info(m: string, meta?: Record<string, unknown>) {
    this.emit('info', m, meta)
  }
  warn(m: string, meta?: Record<string, unknown>) {
    this.emit('warn', m, meta)
  }
  error(m: string, meta?: Record<string, unknown>) {
    this.emit('error', m, meta)
  }
  withContext(ctx: Record<string, unknown>): LoggerPort {
    return new JsonLogger(this.sinks, this.min, { ...this.base, ...ctx })
  }
}

let singleton: LoggerPort | null = null

export function getLogger(): LoggerPort {
  if (singleton) return singleton
  const sinks: LogSink[] = [stderrSink]
  if (process.env.ENABLE_FILE_LOG === '1') {
    const day = new Date().toISOString().split('T')[0]
    sinks.push(fileSink(path.resolve(process.cwd(), 'logs', `contact-sheet-${day}.log`)))
  }
  singleton = new JsonLogger(sinks, normalizeLevel(process.env.LOG_LEVEL))
  return singleton
}
