// services/transport/src/core/idempotency/IdempotencyCache.ts

/**
 * Bounded msgId → outcome map.
 *
 * Entries expire a fixed TTL after insertion; reads never extend that.
 * Iteration order of the backing Map doubles as LRU order: a lookup
 * re-inserts the key at the tail, eviction takes the head.
 */

export type IdempotencyOutcome = 'SUCCESS' | 'NACK'

export interface IdempotencyRecord {
    outcome: IdempotencyOutcome
    recordedAt: number
}

export interface IdempotencyCacheConfig {
    capacity: number
    ttlMs: number
}

export interface IdempotencyCacheStats {
    size: number
    hits: number
    misses: number
    evictions: number
    expirations: number
}

export const DEFAULT_IDEMPOTENCY_CONFIG: IdempotencyCacheConfig = {
    capacity: 1000,
    ttlMs: 5 * 60_000,
}

export class IdempotencyCache {
    private readonly cfg: IdempotencyCacheConfig
    private readonly now: () => number
    private readonly entries = new Map<string, IdempotencyRecord>()

    private hits = 0
    private misses = 0
    private evictions = 0
    private expirations = 0

    constructor(cfg: Partial<IdempotencyCacheConfig> = {}, deps: { now?: () => number } = {}) {
        this.cfg = { ...DEFAULT_IDEMPOTENCY_CONFIG, ...cfg }
        if (!Number.isInteger(this.cfg.capacity) || this.cfg.capacity < 1) {
            throw new RangeError(`idempotency capacity must be a positive integer (got ${this.cfg.capacity})`)
        }
        if (!(this.cfg.ttlMs > 0)) {
            throw new RangeError(`idempotency ttlMs must be > 0 (got ${this.cfg.ttlMs})`)
        }
        this.now = deps.now ?? Date.now
    }

    get size(): number {
        return this.entries.size
    }

    get capacity(): number {
        return this.cfg.capacity
    }

    /**
     * Store the outcome for a msgId. Re-recording replaces the outcome and
     * restarts its TTL. At capacity the least recently used entry goes.
     */
    record(msgId: string, outcome: IdempotencyOutcome): void {
        const key = msgId.toLowerCase()
        this.entries.delete(key)

        while (this.entries.size >= this.cfg.capacity) {
            const oldest = this.entries.keys().next()
            if (oldest.done) break
            this.entries.delete(oldest.value)
            this.evictions += 1
        }

        this.entries.set(key, { outcome, recordedAt: this.now() })
    }

    /** Outcome for a msgId, or undefined when absent or expired. Counts a hit or a miss. */
    lookup(msgId: string): IdempotencyOutcome | undefined {
        const key = msgId.toLowerCase()
        const rec = this.live(key)
        if (!rec) {
            this.misses += 1
            return undefined
        }

        this.entries.delete(key)
        this.entries.set(key, rec)
        this.hits += 1
        return rec.outcome
    }

    /** Presence check without touching stats or recency. */
    has(msgId: string): boolean {
        const rec = this.entries.get(msgId.toLowerCase())
        return rec !== undefined && !this.isExpired(rec)
    }

    /** Drop every expired entry; returns how many went. */
    purgeExpired(): number {
        let purged = 0
        for (const [key, rec] of this.entries) {
            if (this.isExpired(rec)) {
                this.entries.delete(key)
                purged += 1
            }
        }
        this.expirations += purged
        return purged
    }

    clear(): void {
        this.entries.clear()
    }

    stats(): IdempotencyCacheStats {
        return {
            size: this.entries.size,
            hits: this.hits,
            misses: this.misses,
            evictions: this.evictions,
            expirations: this.expirations,
        }
    }

    private live(key: string): IdempotencyRecord | undefined {
        const rec = this.entries.get(key)
        if (!rec) return undefined
        if (this.isExpired(rec)) {
            this.entries.delete(key)
            this.expirations += 1
            return undefined
        }
        return rec
    }

    private isExpired(rec: IdempotencyRecord): boolean {
        return this.now() - rec.recordedAt >= this.cfg.ttlMs
    }
}
