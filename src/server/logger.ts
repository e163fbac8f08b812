import { pino, type BaseLogger } from 'pino'

/**
 * The subset of a pino logger that library code writes to.
 * Both a standalone pino instance and Fastify's `request.log` satisfy it.
 */
export type Logger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>

export const logger = pino({
  name: 'cluster-usage-viewer',
  level: process.env.LOG_LEVEL || 'info'
})
