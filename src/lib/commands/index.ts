/**
 * Commands module - intents, their catalog and the dispatcher.
 */

export * from './types'
export * from './command-registry'
export { searchCommands, type CommandMatch } from './fuzzy-search'
export { createCommandDispatcher, type CommandDispatcher } from './command-dispatch'
