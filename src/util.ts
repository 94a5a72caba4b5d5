/**
 * Physiological log utilities.
 * @package    physio-log-reader
 * @copyright  2024 Sampsa Lohi
 * @license    Apache-2.0
 */

import { type LogLine } from './types/physio'

const DECIMAL_INTEGER = /^\d+$/

/**
 * Classify a single physical line of a log file.
 * Comments start from a `#` that is not the first character of the (trimmed) line.
 * @param raw - Line as read from the file.
 * @returns Classified line.
 */
export const classifyLine = (raw: string): LogLine => {
    let line = raw.trim()
    const commentStart = line.indexOf('#')
    if (commentStart > 0) {
        line = line.substring(0, commentStart).trim()
    }
    if (!line.length) {
        return { type: 'blank' }
    }
    const assignAt = line.indexOf('=')
    if (assignAt >= 0) {
        return {
            type: 'assignment',
            key: line.substring(0, assignAt).trim(),
            value: line.substring(assignAt + 1).trim(),
        }
    }
    // A textual first column marks a column header row.
    if (!/^\d/.test(line)) {
        return { type: 'label' }
    }
    return { type: 'data', fields: line.split(/\s+/) }
}

/**
 * Check if any value in the given array is nonzero.
 * @param samples - Array to check.
 * @returns true/false
 */
export const isActiveSignal = (samples: ArrayLike<number>) => {
    for (let i=0; i<samples.length; i++) {
        if (samples[i] !== 0) {
            return true
        }
    }
    return false
}

/**
 * Parse a non-negative decimal integer.
 * @param value - String value to parse.
 * @returns The parsed number or null, if the value is not a non-negative integer.
 */
export const parseUnsigned = (value: string): number | null => {
    if (!DECIMAL_INTEGER.test(value)) {
        return null
    }
    const num = parseInt(value, 10)
    return Number.isSafeInteger(num) ? num : null
}

/**
 * Split file contents into lines, accepting both LF and CRLF line endings.
 */
export const splitLines = (text: string) => {
    return text.split(/\r?\n/)
}

/**
 * Convert a tick count into seconds.
 * @param ticks - Number of clock ticks.
 * @param tickDuration - Duration of a single tick in milliseconds.
 */
export const ticksToSeconds = (ticks: number, tickDuration: number) => {
    return ticks*tickDuration/1000
}
