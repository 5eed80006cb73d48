// services/transport/src/adapters/transportLog.adapter.ts

import { LogChannel, type ChannelLogger, type LoggerBundle } from '@lanctl/logging'

import type { TransportEvent, TransportEventSink } from '../core/events/types.js'

/**
 * Writes every transport event as one `ts=… kind=…` line on the channel
 * that owns it. Packet hex goes out at debug.
 */
export class TransportLoggerEventSink implements TransportEventSink {
    private readonly session: ChannelLogger
    private readonly codec: ChannelLogger
    private readonly queue: ChannelLogger
    private readonly engine: ChannelLogger
    private readonly idempotency: ChannelLogger
    private readonly transport: ChannelLogger

    constructor(channel: LoggerBundle['channel']) {
        this.session = channel(LogChannel.session)
        this.codec = channel(LogChannel.codec)
        this.queue = channel(LogChannel.queue)
        this.engine = channel(LogChannel.engine)
        this.idempotency = channel(LogChannel.idempotency)
        this.transport = channel(LogChannel.transport)
    }

    publish(evt: TransportEvent): void {
        const ts = new Date(evt.at).toISOString()

        switch (evt.kind) {
            case 'session-state': {
                const line = `ts=${ts} kind=${evt.kind} device=${evt.deviceId} from=${evt.from} to=${evt.to}`
                if (evt.error) this.session.warn(`${line} error=${evt.error}`)
                else this.session.debug(line)
                break
            }

            case 'packet-sent':
            case 'packet-received': {
                this.codec.debug(
                    `ts=${ts} kind=${evt.kind} device=${evt.deviceId} bytes=${evt.bytes} elapsedMs=${evt.elapsedMs} hex=${evt.hex}`
                )
                break
            }

            case 'frame-error': {
                this.codec.warn(`ts=${ts} kind=${evt.kind} device=${evt.deviceId} code=${evt.code} message=${JSON.stringify(evt.message)}`)
                break
            }

            case 'command-queued': {
                this.queue.debug(`ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId} depth=${evt.depth}`)
                break
            }

            case 'command-rejected': {
                this.queue.warn(`ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId} reason=${evt.reason}`)
                break
            }

            case 'command-dropped': {
                this.queue.warn(
                    `ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId} replacedBy=${evt.replacedBy}`
                )
                break
            }

            case 'command-state': {
                this.engine.debug(`ts=${ts} kind=${evt.kind} msgId=${evt.msgId} from=${evt.from} to=${evt.to}`)
                break
            }

            case 'attempt': {
                const line = `ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId} attempt=${evt.attemptNumber} outcome=${evt.outcome} elapsedMs=${evt.elapsedMs}`
                if (evt.error) this.engine.warn(`${line} error=${evt.error}`)
                else this.engine.info(line)
                break
            }

            case 'retry-scheduled': {
                this.engine.info(
                    `ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId} next=${evt.nextAttempt} delayMs=${Math.round(evt.delayMs)} reason=${evt.reason}`
                )
                break
            }

            case 'dedup-hit': {
                this.idempotency.info(
                    `ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId} beforeAttempt=${evt.beforeAttempt}`
                )
                break
            }

            case 'late-response':
            case 'duplicate-response': {
                this.idempotency.info(`ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId}`)
                break
            }

            case 'uncorrelated-response': {
                this.engine.warn(
                    `ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId} expected=${evt.expectedMsgId ?? 'none'} opcode=${evt.opcode}`
                )
                break
            }

            case 'command-completed': {
                const line = `ts=${ts} kind=${evt.kind} device=${evt.deviceId} msgId=${evt.msgId} status=${evt.status} attempts=${evt.attempts} deduplicated=${evt.deduplicated} elapsedMs=${evt.elapsedMs}`
                if (evt.status === 'success') {
                    this.engine.info(line)
                } else {
                    this.engine.warn(`${line} reason=${evt.reason ?? 'unknown'} detail=${JSON.stringify(evt.detail ?? '')}`)
                }
                break
            }

            case 'engine-error': {
                this.engine.error(`ts=${ts} kind=${evt.kind} device=${evt.deviceId} message=${JSON.stringify(evt.message)}`)
                break
            }

            case 'sink-error': {
                this.transport.error(`ts=${ts} kind=${evt.kind} error=${JSON.stringify(evt.error)}`)
                break
            }
        }
    }
}
