export * from './core/codec/index.js'
export * from './core/session/index.js'
export * from './core/idempotency/index.js'
export * from './core/queue/index.js'
export * from './core/events/index.js'
export * from './core/engine/index.js'
export * from './config/index.js'
export * from './metrics/index.js'
export { TransportLoggerEventSink } from './adapters/transportLog.adapter.js'
export { buildMetricsApp, type MetricsAppOptions } from './app.js'
export { default as metricsPlugin, type MetricsPluginOptions } from './plugins/metrics.js'
