export * from './CommandQueue.js'
