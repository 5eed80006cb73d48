export * from './types.js'
export { CHANNELS, isLogChannel } from './channels.js'
export { makeClientBuffer } from './buffer.js'
export { createLogger, type CreateLoggerOptions } from './pino.js'
