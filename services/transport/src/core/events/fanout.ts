import type { TransportEvent, TransportEventSink } from './types.js'

/**
 * Fan one event out to several sinks.
 *
 * A sink that throws is reported to the others as a `sink-error` event and
 * never reaches the publisher, so a bad consumer cannot break the engine.
 */
export class FanoutEventSink implements TransportEventSink {
    private readonly sinks: TransportEventSink[]
    private unreported = 0

    constructor(...sinks: TransportEventSink[]) {
        this.sinks = sinks
    }

    /** Sink failures that could not be reported anywhere. */
    get unreportedErrors(): number {
        return this.unreported
    }

    publish(evt: TransportEvent): void {
        const failed: TransportEventSink[] = []
        const messages: string[] = []

        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                failed.push(sink)
                messages.push(err instanceof Error ? err.message : String(err))
            }
        }

        if (failed.length === 0) return
        if (evt.kind === 'sink-error') {
            this.unreported += failed.length
            return
        }

        const report: TransportEvent = {
            kind: 'sink-error',
            at: Date.now(),
            error: `${evt.kind}: ${messages.join('; ')}`,
        }
        for (const sink of this.sinks) {
            if (failed.includes(sink)) continue
            try {
                sink.publish(report)
            } catch {
                this.unreported += 1
            }
        }
    }
}
