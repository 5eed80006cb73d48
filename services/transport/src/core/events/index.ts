export * from './types.js'
export { FanoutEventSink } from './fanout.js'
