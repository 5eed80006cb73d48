// services/transport/src/core/queue/CommandQueue.ts

/* -------------------------------------------------------------------------- */
/*  Bounded per-device FIFO                                                   */
/* -------------------------------------------------------------------------- */

export type OverflowPolicy = 'reject-new' | 'drop-oldest' | 'block-with-timeout'

export const OVERFLOW_POLICIES: readonly OverflowPolicy[] = ['reject-new', 'drop-oldest', 'block-with-timeout']

export interface CommandQueueConfig {
    maxDepth: number
    overflowPolicy: OverflowPolicy
    /** Only read under block-with-timeout. */
    blockTimeoutMs: number
}

export const DEFAULT_QUEUE_CONFIG: CommandQueueConfig = {
    maxDepth: 32,
    overflowPolicy: 'reject-new',
    blockTimeoutMs: 1000,
}

export type EnqueueRejection = 'queue-full' | 'closed'

export type EnqueueResult<T> =
    | { accepted: true; dropped?: T }
    | { accepted: false; reason: EnqueueRejection }

interface BlockedProducer<T> {
    item: T
    resolve: (result: EnqueueResult<T>) => void
    timer: NodeJS.Timeout
}

interface WaitingConsumer<T> {
    resolve: (item: T | undefined) => void
    timer: NodeJS.Timeout
}

/**
 * FIFO with a hard depth and an explicit overflow policy.
 *
 * `enqueue` decides synchronously whenever it can: the returned promise is
 * already settled unless the policy is block-with-timeout and the queue is
 * full, so items submitted back to back keep their order.
 */
export class CommandQueue<T extends object> {
    private readonly cfg: CommandQueueConfig
    private readonly items: T[] = []
    private readonly producers: BlockedProducer<T>[] = []
    private readonly consumers: WaitingConsumer<T>[] = []
    private closed = false

    constructor(cfg: Partial<CommandQueueConfig> = {}) {
        this.cfg = { ...DEFAULT_QUEUE_CONFIG, ...cfg }
        if (!Number.isInteger(this.cfg.maxDepth) || this.cfg.maxDepth < 1) {
            throw new RangeError(`queue maxDepth must be a positive integer (got ${this.cfg.maxDepth})`)
        }
    }

    get size(): number {
        return this.items.length
    }

    get capacity(): number {
        return this.cfg.maxDepth
    }

    get isClosed(): boolean {
        return this.closed
    }

    /** Producers parked under block-with-timeout. */
    get blockedCount(): number {
        return this.producers.length
    }

    enqueue(item: T): Promise<EnqueueResult<T>> {
        if (this.closed) return Promise.resolve({ accepted: false, reason: 'closed' })

        // parked producers are ahead of this one
        if (this.items.length < this.cfg.maxDepth && this.producers.length === 0) {
            this.items.push(item)
            this.feedConsumers()
            return Promise.resolve({ accepted: true })
        }

        switch (this.cfg.overflowPolicy) {
            case 'reject-new':
                return Promise.resolve({ accepted: false, reason: 'queue-full' })

            case 'drop-oldest': {
                const dropped = this.items.shift()
                this.items.push(item)
                this.feedConsumers()
                return Promise.resolve(dropped === undefined ? { accepted: true } : { accepted: true, dropped })
            }

            case 'block-with-timeout':
                return new Promise<EnqueueResult<T>>((resolve) => {
                    const producer: BlockedProducer<T> = {
                        item,
                        resolve,
                        timer: setTimeout(() => {
                            const idx = this.producers.indexOf(producer)
                            if (idx >= 0) this.producers.splice(idx, 1)
                            resolve({ accepted: false, reason: 'queue-full' })
                        }, this.cfg.blockTimeoutMs),
                    }
                    this.producers.push(producer)
                })
        }
    }

    /** Head of the queue, or undefined when empty. Admits a parked producer into the freed slot. */
    tryDequeue(): T | undefined {
        const item = this.items.shift()
        if (item !== undefined) this.admitProducers()
        return item
    }

    /** Wait up to `timeoutMs` for an item. Resolves undefined on timeout or close. */
    dequeue(timeoutMs: number): Promise<T | undefined> {
        const item = this.tryDequeue()
        if (item !== undefined || this.closed) return Promise.resolve(item)

        return new Promise<T | undefined>((resolve) => {
            const consumer: WaitingConsumer<T> = {
                resolve,
                timer: setTimeout(() => {
                    const idx = this.consumers.indexOf(consumer)
                    if (idx >= 0) this.consumers.splice(idx, 1)
                    resolve(undefined)
                }, timeoutMs),
            }
            this.consumers.push(consumer)
        })
    }

    /** Remove every queued item matching `predicate`, in queue order. */
    remove(predicate: (item: T) => boolean): T[] {
        const removed: T[] = []
        for (let i = this.items.length - 1; i >= 0; i--) {
            const item = this.items[i]
            if (item !== undefined && predicate(item)) {
                this.items.splice(i, 1)
                removed.unshift(item)
            }
        }
        if (removed.length > 0) this.admitProducers()
        return removed
    }

    /**
     * Refuse further items, release parked producers with `closed` and
     * waiting consumers with undefined. Returns what was still queued.
     */
    close(): T[] {
        this.closed = true

        for (const p of this.producers.splice(0)) {
            clearTimeout(p.timer)
            p.resolve({ accepted: false, reason: 'closed' })
        }
        for (const c of this.consumers.splice(0)) {
            clearTimeout(c.timer)
            c.resolve(undefined)
        }

        return this.items.splice(0)
    }

    private admitProducers(): void {
        while (this.items.length < this.cfg.maxDepth) {
            const next = this.producers.shift()
            if (!next) break
            clearTimeout(next.timer)
            this.items.push(next.item)
            next.resolve({ accepted: true })
        }
        this.feedConsumers()
    }

    private feedConsumers(): void {
        while (this.consumers.length > 0 && this.items.length > 0) {
            const consumer = this.consumers.shift()
            const item = this.items.shift()
            if (!consumer || item === undefined) break
            clearTimeout(consumer.timer)
            consumer.resolve(item)
        }
    }
}

/** One queue per device, created on first use. */
export class CommandQueues<T extends object> {
    private readonly queues = new Map<string, CommandQueue<T>>()

    constructor(private readonly cfg: Partial<CommandQueueConfig> = {}) {}

    get(deviceId: string): CommandQueue<T> {
        let q = this.queues.get(deviceId)
        if (!q) {
            q = new CommandQueue<T>(this.cfg)
            this.queues.set(deviceId, q)
        }
        return q
    }

    has(deviceId: string): boolean {
        return this.queues.has(deviceId)
    }

    devices(): string[] {
        return [...this.queues.keys()]
    }

    /** Close every queue; returns the items left in each, keyed by device. */
    closeAll(): Map<string, T[]> {
        const leftovers = new Map<string, T[]>()
        for (const [deviceId, q] of this.queues) {
            leftovers.set(deviceId, q.close())
        }
        this.queues.clear()
        return leftovers
    }
}
