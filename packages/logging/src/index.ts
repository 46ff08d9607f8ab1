export * from './types.js'
export { CHANNELS, ANSI, RESET, isLogChannel } from './channels.js'
export { makeClientBuffer } from './buffer.js'
export { createLogger } from './pino.js'
