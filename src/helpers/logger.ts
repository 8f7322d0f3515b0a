import { cyan, grey, red, yellow } from 'kleur/colors'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug']

const TAGS: Record<LogLevel, string> = {
  error: red('ERROR'),
  warn: yellow('WARN'),
  info: cyan('INFO'),
  debug: grey('DEBUG'),
}

class Logger {
  private level: LogLevel = 'info'

  setLogLevel(level: LogLevel): void {
    this.level = level
  }

  getLogLevel(): LogLevel {
    return this.level
  }

  isDebug(): boolean {
    return this.level === 'debug'
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level)
  }

  private format(level: LogLevel, message: string): string {
    return `${grey(new Date().toISOString())} ${TAGS[level]} ${message}`
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error'))
      console.error(this.format('error', message), ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn'))
      console.warn(this.format('warn', message), ...args)
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info'))
      console.log(this.format('info', message), ...args)
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug'))
      console.debug(this.format('debug', message), ...args)
  }
}

export default new Logger()
