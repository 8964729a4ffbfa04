import fs from 'fs'
import path from 'path'

type WritableStream = NodeJS.WritableStream

export interface Fields {
  [index: string]: unknown
}

export type LogLevel = 'debug' | 'info' | 'notice' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'notice', 'warn', 'error']

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: '[DEBUG]',
  info: '[INFO]',
  notice: '[NOTICE]',
  warn: '[WARN]',
  error: '[ERROR]'
}

/**
 * @public
 */
export interface LoggerOptions {
  level?: LogLevel
  consoleOutput?: boolean
  fileOutput?: boolean
  filePath?: string
}

export class Logger {
  private fileStream: fs.WriteStream | null = null
  private options: Required<LoggerOptions>

  constructor(
    protected readonly stream: WritableStream,
    options: LoggerOptions = {}
  ) {
    this.options = {
      level: 'info',
      consoleOutput: true,
      fileOutput: false,
      filePath: path.join(process.cwd(), 'logs', 'twitch-client.log'),
      ...options
    }
    this.openFile()
  }

  configure(options: LoggerOptions) {
    this.close()
    this.options = { ...this.options, ...options }
    this.openFile()
  }

  get level(): LogLevel {
    return this.options.level
  }

  isLevelEnabled(level: LogLevel) {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.options.level)
  }

  debug(messageOrFields: Fields | string | Error, message?: string) {
    this.doLog(messageOrFields, message, 'debug')
  }

  info(messageOrFields: Fields | string | Error, message?: string) {
    this.doLog(messageOrFields, message, 'info')
  }

  notice(messageOrFields: Fields | string | Error, message?: string) {
    this.doLog(messageOrFields, message, 'notice')
  }

  warn(messageOrFields: Fields | string | Error, message?: string) {
    this.doLog(messageOrFields, message, 'warn')
  }

  error(messageOrFields: Fields | string | Error, message?: string) {
    this.doLog(messageOrFields, message, 'error')
  }

  close() {
    if (this.fileStream) {
      this.fileStream.end()
      this.fileStream = null
    }
  }

  private openFile() {
    if (!this.options.fileOutput) {
      return
    }
    const dir = path.dirname(this.options.filePath)
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true })
    }
    this.fileStream = fs.createWriteStream(this.options.filePath, { flags: 'a' })
  }

  private doLog(messageOrFields: Fields | string | Error, message: string | undefined, level: LogLevel) {
    if (!this.isLevelEnabled(level)) {
      return
    }
    let text: string
    if (typeof messageOrFields === 'string') {
      text = messageOrFields
    } else if (messageOrFields instanceof Error) {
      text = Logger.createMessage(
        message ?? formatValue(messageOrFields),
        message ? { error: messageOrFields } : null
      )
    } else {
      text = Logger.createMessage(message ?? '', messageOrFields)
    }
    const line = `[${new Date().toISOString()}] ${LEVEL_LABELS[level]} ${text}`

    if (this.options.consoleOutput) {
      this.stream.write(`${line}\n`)
    }
    if (this.fileStream) {
      this.fileStream.write(`${line}\n`)
    }
  }

  static createMessage(message: string, fields: Fields | null): string {
    if (!fields) {
      return message
    }

    const fieldPadding = ' '.repeat(Math.max(2, 16 - message.length))
    let text = message + fieldPadding

    for (const [name, value] of Object.entries(fields)) {
      text += `${name}=${formatValue(value)} `
    }

    return text.trim()
  }
}

const formatValue = (value: unknown): string => {
  if (value instanceof Error) {
    return value.stack || value.toString()
  }
  if (Array.isArray(value) || (value !== null && typeof value === 'object')) {
    return JSON.stringify(value)
  }
  return String(value)
}

export const logger = new Logger(process.stderr)
