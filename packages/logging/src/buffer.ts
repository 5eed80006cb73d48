import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogListener
} from './types.js'

export function makeClientBuffer(limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? 500)): ClientLogBuffer {
    const max = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : 500
    const buf: ClientLog[] = []
    const listeners = new Set<ClientLogListener>()

    const push = (log: ClientLog): void => {
        buf.push(log)
        if (buf.length > max) buf.shift()
        // notify subscribers
        for (const l of listeners) {
            l(log)
        }
    }

    const getLatest = (n: number): ClientLog[] => {
        if (n <= 0) return []
        return buf.slice(-n)
    }

    const subscribe = (listener: ClientLogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { push, getLatest, subscribe }
}
