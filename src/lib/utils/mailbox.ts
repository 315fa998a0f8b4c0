/**
 * Serial message queue. Tasks run one at a time in posting order; a task that awaits
 * holds the mailbox until it finishes, so state it reads and writes can't interleave
 * with another task's.
 */
export interface Mailbox {
    /** Resolves when the task has run. Task errors go to the mailbox's error handler. */
    post(task: () => void | Promise<void>): Promise<void>
    /** Resolves once every task posted so far (and any they post) has run. */
    idle(): Promise<void>
    readonly size: number
}

export function createMailbox(onError: (error: unknown) => void): Mailbox {
    let tail: Promise<void> = Promise.resolve()
    let size = 0

    return {
        post(task) {
            size++
            const run = tail
                .then(task)
                .catch(onError)
                .finally(() => {
                    size--
                })
            tail = run
            return run
        },
        async idle() {
            while (size > 0) {
                await tail
            }
        },
        get size() {
            return size
        },
    }
}
