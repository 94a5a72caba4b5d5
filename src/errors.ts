/**
 * Physiological log reader errors.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

export type ErrorCategory = 'ConsistencyViolation' | 'DataViolation' | 'FormatViolation' | 'MissingInput'

/**
 * Where in the input an error was found.
 */
export type ErrorContext = {
    /** Header field or record column name. */
    field?: string
    /** 1-based line number. */
    line?: number
    path?: string
}

/**
 * Prefix a message with the source location in the context, if any.
 */
const locate = (message: string, context: ErrorContext) => {
    if (!context.path) {
        return message
    }
    return context.line !== undefined
           ? `${context.path}:${context.line}: ${message}`
           : `${context.path}: ${message}`
}

export abstract class PhysioError extends Error {
    abstract readonly category: ErrorCategory
    readonly context: ErrorContext
    constructor (message: string, context: ErrorContext = {}) {
        super(locate(message, context))
        this.name = 'PhysioError'
        this.context = context
    }
}

export class MissingInputError extends PhysioError {
    readonly category = 'MissingInput'
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'MissingInputError'
    }
}

export class FormatError extends PhysioError {
    readonly category = 'FormatViolation'
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'FormatError'
    }
}

export class ConsistencyError extends PhysioError {
    readonly category = 'ConsistencyViolation'
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'ConsistencyError'
    }
}

export class DataError extends PhysioError {
    readonly category = 'DataViolation'
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'DataError'
    }
}

export class FileNotFoundError extends MissingInputError {
    constructor (path: string) {
        super(`${path} not found!`)
        this.name = 'FileNotFoundError'
        this.context.path = path
    }
}

export class FormatVersionMismatchError extends FormatError {
    constructor (found: string, expected: string, context?: ErrorContext) {
        super(`File format [${found}] is not supported (expected [${expected}]).`, context)
        this.name = 'FormatVersionMismatchError'
    }
}

export class DataTypeMismatchError extends FormatError {
    constructor (found: string, expected: string, context?: ErrorContext) {
        super(`Expected [${expected}] data, found [${found}]? Check filenames?`, context)
        this.name = 'DataTypeMismatchError'
    }
}

export class SchemaFieldMisplacedError extends FormatError {
    constructor (field: string, dataType: string, context?: ErrorContext) {
        super(`Invalid [${field}] parameter found in ${dataType} log.`, { ...context, field })
        this.name = 'SchemaFieldMisplacedError'
    }
}

export class MissingHeaderError extends FormatError {
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'MissingHeaderError'
    }
}

export class UuidMissingError extends FormatError {
    constructor (context?: ErrorContext) {
        super(`Log does not declare a UUID.`, { ...context, field: 'UUID' })
        this.name = 'UuidMissingError'
    }
}

export class MalformedHeaderError extends FormatError {
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'MalformedHeaderError'
    }
}

export class MalformedRecordError extends FormatError {
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'MalformedRecordError'
    }
}

export class UuidMismatchError extends ConsistencyError {
    constructor (expectedFile: string, actualFile: string) {
        super(`UUID mismatch between ${expectedFile} and ${actualFile} files!`)
        this.name = 'UuidMismatchError'
        this.context.path = actualFile
    }
}

export class DuplicateRecordError extends ConsistencyError {
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'DuplicateRecordError'
    }
}

export class InvalidTimeRangeError extends ConsistencyError {
    constructor (firstTime: number, lastTime: number, context?: ErrorContext) {
        super(
            `Last timestamp (${lastTime}) is not greater than first timestamp (${firstTime}), aborting.`,
            context
        )
        this.name = 'InvalidTimeRangeError'
    }
}

export class InvalidChannelError extends DataError {
    constructor (dataType: string, label: string, context?: ErrorContext) {
        super(`Invalid ${dataType} channel ID [${label}].`, { ...context, field: 'channel' })
        this.name = 'InvalidChannelError'
    }
}

export class RecordRangeError extends DataError {
    constructor (message: string, context?: ErrorContext) {
        super(message, context)
        this.name = 'RecordRangeError'
    }
}
