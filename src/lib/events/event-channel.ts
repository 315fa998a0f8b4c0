// Typed publish/subscribe over the events module, shaped like the listen/emit pair UIs already use

import { EventEmitter } from 'events'
import { getAppLogger } from '$lib/logger'

const log = getAppLogger('events')

export type UnlistenFn = () => void

export interface EventChannel<Events extends object> {
    listen<K extends keyof Events & string>(event: K, handler: (payload: Events[K]) => void): UnlistenFn
    emit<K extends keyof Events & string>(event: K, payload: Events[K]): void
    listenerCount(event: keyof Events & string): number
    clear(): void
}

export function createEventChannel<Events extends object>(): EventChannel<Events> {
    const emitter = new EventEmitter()
    // Panes, operations and the ledger each hold their own subscriptions
    emitter.setMaxListeners(0)

    return {
        listen(event, handler) {
            // A throwing subscriber must not unwind into the state owner that emitted
            const wrapped = (payload: Events[typeof event]) => {
                try {
                    handler(payload)
                } catch (error) {
                    log.error('Listener for {event} threw: {error}', { event, error })
                }
            }
            emitter.on(event, wrapped)
            return () => {
                emitter.off(event, wrapped)
            }
        },
        emit(event, payload) {
            emitter.emit(event, payload)
        },
        listenerCount(event) {
            return emitter.listenerCount(event)
        },
        clear() {
            emitter.removeAllListeners()
        },
    }
}
