/** Filename checks for rename targets and conflict-free name generation. */

const MAX_NAME_BYTES = 255

/** Characters disallowed in a single path segment on POSIX filesystems. */
const DISALLOWED_CHARS_REGEX = /[/\0]/

export type ValidationSeverity = 'error' | 'ok'

export interface ValidationResult {
    severity: ValidationSeverity
    message: string
}

const OK_RESULT: ValidationResult = { severity: 'ok', message: '' }

/** Validates a filename for disallowed characters. */
export function validateDisallowedChars(name: string): ValidationResult {
    if (DISALLOWED_CHARS_REGEX.test(name)) {
        return { severity: 'error', message: 'Filenames can\'t contain "/" or null characters' }
    }
    return OK_RESULT
}

/** Validates that a filename is not empty and isn't one of the directory self-references. */
export function validateNotEmpty(name: string): ValidationResult {
    if (name.trim().length === 0) {
        return { severity: 'error', message: "A filename can't be empty" }
    }
    if (name === '.' || name === '..') {
        return { severity: 'error', message: `"${name}" isn't a valid filename` }
    }
    return OK_RESULT
}

/** Validates filename byte length (max 255 bytes). */
export function validateNameLength(name: string): ValidationResult {
    const byteLength = Buffer.byteLength(name, 'utf8')
    if (byteLength > MAX_NAME_BYTES) {
        return {
            severity: 'error',
            message: `Filename is too long (${String(byteLength)}/${String(MAX_NAME_BYTES)} bytes)`,
        }
    }
    return OK_RESULT
}

/** Extracts the extension from a filename (empty string if none). Dotfiles have no extension. */
export function getExtension(filename: string): string {
    const lastDot = filename.lastIndexOf('.')
    if (lastDot <= 0) return ''
    return filename.substring(lastDot)
}

/** Runs all checks and returns the first error, or ok. */
export function validateFilename(name: string): ValidationResult {
    const emptyCheck = validateNotEmpty(name)
    if (emptyCheck.severity === 'error') return emptyCheck

    const charCheck = validateDisallowedChars(name)
    if (charCheck.severity === 'error') return charCheck

    return validateNameLength(name)
}

/**
 * Inserts a numeric suffix before the extension: `report.pdf` → `report (2).pdf`.
 * Directories (and dotfiles) get the suffix at the end.
 */
export function nameWithSuffix(name: string, n: number, isDirectory: boolean): string {
    const ext = isDirectory ? '' : getExtension(name)
    const stem = ext ? name.slice(0, -ext.length) : name
    return `${stem} (${String(n)})${ext}`
}
