export * from './types.js'
export * from './defaults.js'
export { buildTransportConfigFromEnv } from './env.js'
export { validateTransportConfig, assertValidTransportConfig } from './validate.js'
