import winston from 'winston'
import path from 'path'
import * as fs from 'fs'
import { loadConfig } from './config'

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

// Define colors for each log level
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
}

winston.addColors(colors)

export interface Logger {
  error: (message: string, meta?: Record<string, unknown>) => void
  warn: (message: string, meta?: Record<string, unknown>) => void
  info: (message: string, meta?: Record<string, unknown>) => void
  debug: (message: string, meta?: Record<string, unknown>) => void
}

const config = loadConfig()

// Console-only logger for tests; Jest runs silent so nothing reaches the terminal
const createTestLogger = (service: string): Logger => {
  return {
    error: (message, meta) => {
      console.error(`[ERROR] ${service}: ${message}`, meta)
    },
    warn: (message, meta) => {
      console.warn(`[WARN] ${service}: ${message}`, meta)
    },
    info: (message, meta) => {
      console.info(`[INFO] ${service}: ${message}`, meta)
    },
    debug: (message, meta) => {
      console.debug(`[DEBUG] ${service}: ${message}`, meta)
    },
  }
}

const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`,
  ),
)

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
    ),
  }),
]

// File transports only in production
if (config.nodeEnv === 'production') {
  try {
    const logsDir = path.join(process.cwd(), 'logs')
    fs.mkdirSync(logsDir, { recursive: true })

    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error',
        format: winston.format.json(),
      }),
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log'),
        format: winston.format.json(),
      }),
    )
  } catch (error) {
    console.warn('Could not create logs directory, using console transport only:', error)
  }
}

const logger = winston.createLogger({
  level: config.logLevel,
  levels,
  format,
  transports,
})

/**
 * Creates a structured logger instance for a specific service
 * @param service - The name of the service/component using the logger
 * @returns Logger instance with error, warn, info, and debug methods
 */
export const createLogger = (service: string): Logger => {
  if (process.env.NODE_ENV === 'test') {
    return createTestLogger(service)
  }

  return {
    error: (message, meta) => {
      logger.error(`${service}: ${message}`, meta)
    },
    warn: (message, meta) => {
      logger.warn(`${service}: ${message}`, meta)
    },
    info: (message, meta) => {
      logger.info(`${service}: ${message}`, meta)
    },
    debug: (message, meta) => {
      logger.debug(`${service}: ${message}`, meta)
    },
  }
}
