// services/transport/src/metrics/TransportMetrics.ts

import { Counter, Gauge, Histogram, Registry } from 'prom-client'

import type { TransportEvent, TransportEventSink } from '../core/events/types.js'
import type { IdempotencyCache } from '../core/idempotency/index.js'

export interface TransportMetricsOptions {
    /** Defaults to a fresh registry; the prom-client global is never used. */
    readonly registry?: Registry
    /** Cache whose stats back the tcp_comm_dedup_cache_* families. */
    readonly cache?: IdempotencyCache
}

export interface TransportMetrics {
    readonly registry: Registry
    /** Feed this into the engine's event fan-out. */
    readonly sink: TransportEventSink
    /** Exposition text for a scrape. */
    render(): Promise<string>
}

const LATENCY_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10]

export function createTransportMetrics(options: TransportMetricsOptions = {}): TransportMetrics {
    const registry = options.registry ?? new Registry()
    const cache = options.cache
    const registers = [registry]

    const packetSent = new Counter({
        name: 'tcp_comm_packet_sent_total',
        help: 'Frames handed to a device connection, by outcome.',
        labelNames: ['device_id', 'outcome'],
        registers,
    })
    const packetRecv = new Counter({
        name: 'tcp_comm_packet_recv_total',
        help: 'Frames read from a device connection, by outcome.',
        labelNames: ['device_id', 'outcome'],
        registers,
    })
    const latency = new Histogram({
        name: 'tcp_comm_packet_latency_seconds',
        help: 'Time from connect to correlated response for answered attempts.',
        labelNames: ['device_id'],
        buckets: LATENCY_BUCKETS,
        registers,
    })
    const retransmit = new Counter({
        name: 'tcp_comm_packet_retransmit_total',
        help: 'Retries scheduled, by the failure that caused them.',
        labelNames: ['device_id', 'reason'],
        registers,
    })
    const decodeErrors = new Counter({
        name: 'tcp_comm_decode_errors_total',
        help: 'Inbound frames rejected by the codec.',
        labelNames: ['device_id', 'reason'],
        registers,
    })
    const ackReceived = new Counter({
        name: 'tcp_comm_ack_received_total',
        help: 'Correlated responses, by status.',
        labelNames: ['device_id', 'status'],
        registers,
    })
    const ackTimeout = new Counter({
        name: 'tcp_comm_ack_timeout_total',
        help: 'Attempts that saw no correlated response in time.',
        labelNames: ['device_id'],
        registers,
    })
    const idempotentDrop = new Counter({
        name: 'tcp_comm_idempotent_drop_total',
        help: 'Sends skipped or responses discarded because the msgId already had an outcome.',
        labelNames: ['device_id'],
        registers,
    })
    const abandoned = new Counter({
        name: 'tcp_comm_message_abandoned_total',
        help: 'Commands that ended failed, by reason.',
        labelNames: ['device_id', 'reason'],
        registers,
    })
    const queueRejected = new Counter({
        name: 'tcp_comm_queue_rejected_total',
        help: 'Commands refused or evicted by a full device queue.',
        labelNames: ['device_id'],
        registers,
    })

    let seenHits = 0
    let seenEvictions = 0

    new Gauge({
        name: 'tcp_comm_dedup_cache_size',
        help: 'Entries in the idempotency cache.',
        registers,
        collect() {
            if (cache) this.set(cache.size)
        },
    })
    new Counter({
        name: 'tcp_comm_dedup_cache_hits_total',
        help: 'Idempotency cache lookups that found an outcome.',
        registers,
        collect() {
            if (!cache) return
            const { hits } = cache.stats()
            if (hits > seenHits) this.inc(hits - seenHits)
            seenHits = hits
        },
    })
    new Counter({
        name: 'tcp_comm_dedup_cache_evictions_total',
        help: 'Idempotency cache entries evicted at capacity.',
        registers,
        collect() {
            if (!cache) return
            const { evictions } = cache.stats()
            if (evictions > seenEvictions) this.inc(evictions - seenEvictions)
            seenEvictions = evictions
        },
    })

    const sink: TransportEventSink = {
        publish(evt: TransportEvent): void {
            switch (evt.kind) {
                case 'packet-sent':
                    packetSent.inc({ device_id: evt.deviceId, outcome: 'ok' })
                    break

                case 'packet-received':
                    packetRecv.inc({ device_id: evt.deviceId, outcome: 'ok' })
                    break

                case 'frame-error':
                    packetRecv.inc({ device_id: evt.deviceId, outcome: 'decode_error' })
                    decodeErrors.inc({ device_id: evt.deviceId, reason: evt.code })
                    break

                case 'attempt': {
                    const device_id = evt.deviceId
                    if (evt.outcome === 'success' || evt.outcome === 'nack') {
                        ackReceived.inc({ device_id, status: evt.outcome === 'success' ? 'ack' : 'nack' })
                        latency.observe({ device_id }, evt.elapsedMs / 1000)
                    } else if (evt.error === 'RecvTimeout') {
                        ackTimeout.inc({ device_id })
                    } else if (evt.error === 'SendTimeout' || evt.error === 'IOError') {
                        packetSent.inc({ device_id, outcome: 'error' })
                    }
                    // MalformedPayload arrives as a parsed-but-invalid frame
                    if (evt.error === 'MalformedPayload') {
                        decodeErrors.inc({ device_id, reason: 'MALFORMED_PAYLOAD' })
                    }
                    break
                }

                case 'retry-scheduled':
                    retransmit.inc({ device_id: evt.deviceId, reason: evt.reason })
                    break

                case 'dedup-hit':
                case 'duplicate-response':
                    idempotentDrop.inc({ device_id: evt.deviceId })
                    break

                case 'command-rejected':
                case 'command-dropped':
                    queueRejected.inc({ device_id: evt.deviceId })
                    break

                case 'command-completed':
                    if (evt.status === 'failed') {
                        abandoned.inc({ device_id: evt.deviceId, reason: evt.reason ?? 'unknown' })
                    }
                    break

                default:
                    break
            }
        },
    }

    return {
        registry,
        sink,
        render: () => registry.metrics(),
    }
}
