export * from './position.model'
export * from './event.model'
export * from './recipient.model'
export * from './monitor.model'
