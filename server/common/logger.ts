type RedactionRule = string | RegExp

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggerOptions {
  name?: string
  redactKeys?: RedactionRule[]
  level?: LogLevel
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

const DEFAULT_REDACT_RULES: RedactionRule[] = [
  'authorization',
  'cookie',
  /^api_?key$/i,
  /token/i,
  /secret/i,
  /password/i,
]

function redact(value: unknown, rules: RedactionRule[]): unknown {
  if (Array.isArray(value)) return value.map((item) => redact(item, rules))
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {}
    for (const [key, inner] of Object.entries(value)) {
      const shouldRedact = rules.some((r) => (typeof r === 'string' ? r === key : r.test(key)))
      out[key] = shouldRedact ? '[REDACTED]' : redact(inner, rules)
    }
    return out
  }
  return value
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  return raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' ? raw : 'info'
}

export class Logger {
  private redactRules: RedactionRule[]
  private minLevel: LogLevel
  private name: string | undefined

  constructor(options?: LoggerOptions) {
    this.redactRules = options?.redactKeys ?? DEFAULT_REDACT_RULES
    this.minLevel = options?.level ?? 'info'
    this.name = options?.name
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel]
  }

  private write(level: LogLevel, msg: string, meta?: unknown) {
    if (!this.shouldLog(level)) return
    const time = new Date().toISOString()
    const payload = meta ? redact(meta, this.redactRules) : undefined
    const line = {
      time,
      level,
      ...(this.name ? { logger: this.name } : {}),
      msg,
      ...(payload ? { meta: payload } : {}),
    }
    // eslint-disable-next-line no-console
    console[level](JSON.stringify(line))
  }

  debug(msg: string, meta?: unknown) { this.write('debug', msg, meta) }
  info(msg: string, meta?: unknown) { this.write('info', msg, meta) }
  warn(msg: string, meta?: unknown) { this.write('warn', msg, meta) }
  error(msg: string, meta?: unknown) { this.write('error', msg, meta) }
}

export function createLogger(name: string): Logger {
  return new Logger({ name, level: parseLogLevel(process.env.LOG_LEVEL) })
}

export const logger = new Logger({ level: parseLogLevel(process.env.LOG_LEVEL) })
