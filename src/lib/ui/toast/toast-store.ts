import { randomUUID } from 'crypto'

export type ToastLevel = 'info' | 'warn' | 'error'
export type ToastDismissal = 'transient' | 'persistent'

export interface ToastOptions {
    level?: ToastLevel
    dismissal?: ToastDismissal
    /** Timeout in ms. Default 4000 for transient toasts, ignored for persistent. */
    timeoutMs?: number
    /** Optional dedup key. If a toast with this ID exists, its content and level are replaced in place. */
    id?: string
}

export interface Toast {
    id: string
    content: string
    level: ToastLevel
    dismissal: ToastDismissal
    timeoutMs: number
    createdAt: number
}

export const maxVisibleToasts = 5
export const DEFAULT_TOAST_TIMEOUT_MS = 4000

export interface ToastStore {
    addToast(content: string, options?: ToastOptions): string
    dismissToast(id: string): void
    dismissTransientToasts(): void
    /** Drops transient toasts whose timeout has passed. Returns how many were dropped. */
    pruneExpired(now?: number): number
    clearAllToasts(): void
    getToasts(): readonly Toast[]
    onChange(listener: (toasts: readonly Toast[]) => void): () => void
}

export function createToastStore(clock: () => number = Date.now): ToastStore {
    let toasts: Toast[] = []
    const listeners = new Set<(toasts: readonly Toast[]) => void>()

    function commit(next: Toast[]): void {
        toasts = next
        for (const listener of listeners) listener(toasts)
    }

    function findIndexById(id: string): number {
        return toasts.findIndex((t) => t.id === id)
    }

    function isExpired(toast: Toast, now: number): boolean {
        return toast.dismissal === 'transient' && now - toast.createdAt >= toast.timeoutMs
    }

    return {
        addToast(content, options) {
            const level = options?.level ?? 'info'
            const dismissal = options?.dismissal ?? 'transient'
            const timeoutMs = dismissal === 'persistent' ? 0 : (options?.timeoutMs ?? DEFAULT_TOAST_TIMEOUT_MS)
            const id = options?.id ?? randomUUID()

            // Dedup: replace content and level in place if ID already exists
            const existingIndex = findIndexById(id)
            if (existingIndex !== -1) {
                const next = [...toasts]
                next[existingIndex] = { ...next[existingIndex], content, level }
                commit(next)
                return id
            }

            let next = [...toasts]
            if (next.length >= maxVisibleToasts) {
                const oldestTransientIndex = next.findIndex((t) => t.dismissal === 'transient')
                if (oldestTransientIndex === -1) {
                    // All visible toasts are persistent; drop the new one
                    return id
                }
                next = next.filter((_, i) => i !== oldestTransientIndex)
            }

            next.push({ id, content, level, dismissal, timeoutMs, createdAt: clock() })
            commit(next)
            return id
        },

        dismissToast(id) {
            if (findIndexById(id) !== -1) {
                commit(toasts.filter((t) => t.id !== id))
            }
        },

        dismissTransientToasts() {
            const next = toasts.filter((t) => t.dismissal !== 'transient')
            if (next.length !== toasts.length) commit(next)
        },

        pruneExpired(now = clock()) {
            const next = toasts.filter((t) => !isExpired(t, now))
            const dropped = toasts.length - next.length
            if (dropped > 0) commit(next)
            return dropped
        },

        clearAllToasts() {
            if (toasts.length > 0) commit([])
        },

        getToasts() {
            return toasts
        },

        onChange(listener) {
            listeners.add(listener)
            return () => {
                listeners.delete(listener)
            }
        },
    }
}
