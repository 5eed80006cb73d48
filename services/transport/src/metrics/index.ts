export { createTransportMetrics } from './TransportMetrics.js'
export type { TransportMetrics, TransportMetricsOptions } from './TransportMetrics.js'
