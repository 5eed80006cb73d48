// services/transport/src/core/engine/utils.ts

import { randomBytes } from 'node:crypto'

/** 16 lowercase hex chars; the idempotency key carried by every attempt of one command. */
export function makeMsgId(): string {
    return randomBytes(8).toString('hex')
}

/**
 * Resolves after `ms`, or early when `signal` aborts. Never rejects:
 * callers check `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
        if (signal?.aborted) return resolve()

        const onAbort = () => {
            clearTimeout(timer)
            resolve()
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, Math.max(0, ms))

        signal?.addEventListener('abort', onAbort, { once: true })
    })
}
