import winston from 'winston'
import type { EngineConfig } from './config'

export type Logger = winston.Logger

// bigint is not JSON-serializable; render it as a decimal string
const bigintsAsStrings = winston.format((info) => {
  for (const [key, value] of Object.entries(info)) {
    if (typeof value === 'bigint') info[key] = value.toString()
  }
  return info
})

export function createLogger(level: EngineConfig['logLevel'] = 'info'): Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      bigintsAsStrings(),
      winston.format.timestamp(),
      winston.format.json(),
    ),
    defaultMeta: { service: 'pair-matcher' },
    transports: [new winston.transports.Console()],
  })
}

export const logger = createLogger()
