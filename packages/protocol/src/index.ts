export * from './shared-types.js'
export * from './server-events.js'
export * from './client-commands.js'
