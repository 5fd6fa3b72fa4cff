import pino, { type Logger } from 'pino'

export type { Logger }

export function createLogger(component: string): Logger {
  return pino({
    level: process.env.LOG_LEVEL || 'info',
    base: { component },
    redact: ['token', 'headers.Authorization', '*.headers.Authorization']
  })
}

/** Masks a phone number for logs: 15551234567 -> 1555…4567 */
export function maskPhone(number: string): string {
  if (number.length <= 8) return '…' + number.slice(-2)
  return `${number.slice(0, 4)}…${number.slice(-4)}`
}
