export * from './types.js'
export * from './backoff.js'
export { makeMsgId, sleep } from './utils.js'
export { CommandEngine } from './CommandEngine.js'
export type { CommandEngineDeps, ResponseDisposition, SessionFactory } from './CommandEngine.js'
