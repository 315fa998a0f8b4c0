/**
 * Error taxonomy shared by listing, file operations and undo.
 *
 * Thrown failures (submission validation, pane listing, undo availability) are `FileEngineError`s.
 * Per-item failures inside a batch are plain `OperationError` values in the record's manifest.
 */

export type FileEngineErrorCode =
    | 'not_found'
    | 'permission_denied'
    | 'already_exists'
    | 'cross_device_move_failed'
    | 'io_error'
    | 'not_undoable'
    | 'cancelled'
    | 'invalid_request'

export class FileEngineError extends Error {
    constructor(
        public code: FileEngineErrorCode,
        message: string,
        public path?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options)
        this.name = 'FileEngineError'
    }
}

export function isFileEngineError(error: unknown): error is FileEngineError {
    return error instanceof FileEngineError
}

/** Per-item error types (discriminated union). */
export type OperationError =
    | { type: 'not_found'; path: string }
    | { type: 'permission_denied'; path: string; message: string }
    | { type: 'already_exists'; path: string }
    | { type: 'cross_device_move_failed'; path: string; message: string }
    | { type: 'destination_inside_source'; source: string; destination: string }
    | { type: 'io_error'; path: string; message: string }

export function errnoCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined
    return typeof error.code === 'string' ? error.code : undefined
}

function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

/** Maps a Node.js filesystem error to a per-item operation error. */
export function classifyFsError(error: unknown, path: string): OperationError {
    switch (errnoCode(error)) {
        case 'ENOENT':
        case 'ENOTDIR':
            return { type: 'not_found', path }
        case 'EACCES':
        case 'EPERM':
            return { type: 'permission_denied', path, message: errorMessage(error) }
        case 'EEXIST':
        case 'ENOTEMPTY':
            return { type: 'already_exists', path }
        default:
            return { type: 'io_error', path, message: errorMessage(error) }
    }
}

/** Maps a Node.js filesystem error to a thrown engine error. */
export function toFileEngineError(error: unknown, path: string): FileEngineError {
    if (error instanceof FileEngineError) return error
    const classified = classifyFsError(error, path)
    switch (classified.type) {
        case 'not_found':
            return new FileEngineError('not_found', `No such file or directory: ${path}`, path, { cause: error })
        case 'permission_denied':
            return new FileEngineError('permission_denied', `Permission denied: ${path}`, path, { cause: error })
        case 'already_exists':
            return new FileEngineError('already_exists', `Already exists: ${path}`, path, { cause: error })
        default:
            return new FileEngineError('io_error', errorMessage(error), path, { cause: error })
    }
}

/** Thrown inside a suboperation to carry a classified error up to the item runner. */
export class OperationFailure extends Error {
    constructor(public error: OperationError) {
        super(`Operation failed: ${error.type}`)
        this.name = 'OperationFailure'
    }
}

/** Thrown inside a suboperation when the batch was cancelled mid-item. */
export class OperationCancelled extends Error {
    constructor() {
        super('Operation cancelled')
        this.name = 'OperationCancelled'
    }
}
