export * from './IdempotencyCache.js'
