export * from './types.js'
export * from './errors.js'
export { DeviceSession, DEFAULT_SESSION_CONFIG } from './DeviceSession.js'
