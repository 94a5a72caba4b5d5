/**
 * Physiological log decoder.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

import {
    DataTypeMismatchError,
    DuplicateRecordError,
    type ErrorContext,
    FormatVersionMismatchError,
    InvalidChannelError,
    InvalidTimeRangeError,
    MalformedHeaderError,
    MalformedRecordError,
    MissingHeaderError,
    RecordRangeError,
    SchemaFieldMisplacedError,
    UuidMissingError,
} from '../errors'
import {
    type AcquisitionInfoHeader,
    type AcquisitionInfoLog,
    type ChannelLabel,
    type DecodedLog,
    type LogDataType,
    type LogHeader,
    type SampleOverrunPolicy,
    type SampleWindow,
    type SignalDataType,
    type SignalHeader,
    type SignalLog,
} from '../types/physio'
import { SETTINGS } from '../settings'
import { classifyLine, parseUnsigned, splitLines } from '../util'
import SliceMap from './SliceMap'
import Log from 'scoped-event-log'

const SCOPE = 'PhysioDecoder'

const CHANNEL_LABELS: Readonly<Record<SignalDataType, readonly ChannelLabel[]>> = {
    ECG: ['ECG1', 'ECG2', 'ECG3', 'ECG4'],
    EXT: ['EXT', 'EXT2'],
    PULS: ['PULS'],
    RESP: ['RESP'],
}
const INFO_FIELDS = ['FirstTime', 'LastTime', 'NumSlices', 'NumVolumes']
const SIGNAL_FIELDS = ['SampleTime']
/** Data records always have this many columns. */
const RECORD_COLUMNS = 4
const MAX_SAMPLE_VALUE = 0xFFFF

type HeaderField = {
    line: number
    value: string
}
type HeaderFields = {
    fields: Map<string, HeaderField>
    /** Line number of the first data record, null if there are none. */
    firstDataLine: number | null
}

/**
 * PhysioDecoder decodes the text of a single physiological log file.
 *
 * Decoding happens in two phases: first all header assignments are collected and validated into a typed
 * header, then the data records are decoded into arrays sized from the header (or the given sample window).
 *
 * Set the input with `setInput(text, source)` and decode it with `decode()`, or with the typed
 * `decodeAcquisitionInfo()` and `decodeSignals()` methods.
 */
export default class PhysioDecoder {
    private _dataType: LogDataType
    private _expectedVersion: string
    private _header = null as null | LogHeader
    private _lines = [] as string[]
    private _sampleOverrun: SampleOverrunPolicy
    private _samplePadding: number
    private _source = '<input>'
    /**
     * Get the channel labels of the given signal log type, in array order.
     * @param dataType - Signal log type.
     */
    public static ChannelLabels (dataType: SignalDataType) {
        return CHANNEL_LABELS[dataType]
    }
    /**
     * Create a decoder for one type of log file.
     * @param dataType - The `LogDataType` the input must declare.
     * @param expectedVersion - The `LogVersion` the input must declare.
     * @param sampleOverrun - How to handle sample runs outside the sample window (default 'error').
     * @param samplePadding - Ticks past `LastTime` that acquisition periods may extend into (default from settings).
     */
    constructor (
        dataType: LogDataType,
        expectedVersion: string,
        sampleOverrun: SampleOverrunPolicy = 'error',
        samplePadding = SETTINGS.samplePadding
    ) {
        this._dataType = dataType
        this._expectedVersion = expectedVersion
        this._sampleOverrun = sampleOverrun
        this._samplePadding = samplePadding
    }

    get dataType () {
        return this._dataType
    }
    /**
     * The most recently decoded header, or null if the header has not been decoded.
     */
    get header () {
        return this._header
    }

    /**
     * Read the header fields from the input and validate them against this decoder's data type.
     */
    protected _collectHeaderFields (): HeaderFields {
        const fields = new Map<string, HeaderField>()
        let firstDataLine = null as number | null
        for (let i=0; i<this._lines.length; i++) {
            const line = classifyLine(this._lines[i])
            const lineNum = i + 1
            if (line.type === 'data' && firstDataLine === null) {
                firstDataLine = lineNum
            }
            if (line.type !== 'assignment') {
                continue
            }
            const context = { field: line.key, line: lineNum, path: this._source }
            if (line.key === 'LogVersion') {
                if (line.value !== this._expectedVersion) {
                    throw new FormatVersionMismatchError(line.value, this._expectedVersion, context)
                }
            } else if (line.key === 'LogDataType') {
                if (line.value !== this._dataType) {
                    throw new DataTypeMismatchError(line.value, this._dataType, context)
                }
            } else if (SIGNAL_FIELDS.includes(line.key)) {
                if (this._dataType === 'ACQUISITION_INFO') {
                    throw new SchemaFieldMisplacedError(line.key, this._dataType, context)
                }
            } else if (INFO_FIELDS.includes(line.key)) {
                if (this._dataType !== 'ACQUISITION_INFO') {
                    throw new SchemaFieldMisplacedError(line.key, this._dataType, context)
                }
            } else if (line.key !== 'UUID') {
                Log.debug(`Ignoring header field ${line.key} on line ${lineNum}.`, SCOPE)
                continue
            }
            const previous = fields.get(line.key)
            if (previous) {
                Log.warn(
                    `Header field ${line.key} on line ${lineNum} overrides the value on line ${previous.line}.`,
                SCOPE)
            }
            fields.set(line.key, { line: lineNum, value: line.value })
        }
        return { fields, firstDataLine }
    }

    /**
     * Get a required header field.
     * @param header - Collected header fields.
     * @param key - Field name.
     * @param sizing - Must the field precede the first data record (default false).
     */
    protected _requireField (header: HeaderFields, key: string, sizing = false) {
        const field = header.fields.get(key)
        if (!field) {
            throw new MissingHeaderError(
                `Required header field ${key} is missing.`, { field: key, path: this._source }
            )
        }
        if (sizing && header.firstDataLine !== null && field.line > header.firstDataLine) {
            throw new MissingHeaderError(
                `Header field ${key} must precede the first data record on line ${header.firstDataLine}.`,
                { field: key, line: field.line, path: this._source }
            )
        }
        return field
    }

    /**
     * Get a required, non-negative integer header field.
     * @param header - Collected header fields.
     * @param key - Field name.
     * @param positive - Must the value be greater than zero (default false).
     */
    protected _requireCount (header: HeaderFields, key: string, positive = false) {
        const field = this._requireField(header, key, true)
        const value = parseUnsigned(field.value)
        if (value === null || (positive && value === 0)) {
            throw new MalformedHeaderError(
                `Header field ${key} value [${field.value}] is not a ${positive ? 'positive' : 'non-negative'} integer.`,
                { field: key, line: field.line, path: this._source }
            )
        }
        return value
    }

    protected _requireCommon (header: HeaderFields) {
        this._requireField(header, 'LogVersion')
        this._requireField(header, 'LogDataType')
        const uuid = header.fields.get('UUID')
        if (!uuid?.value) {
            throw new UuidMissingError({ line: uuid?.line, path: this._source })
        }
        return { logVersion: this._expectedVersion, uuid: uuid.value }
    }

    protected _decodeInfoHeader (header: HeaderFields): AcquisitionInfoHeader {
        const infoHeader: AcquisitionInfoHeader = {
            ...this._requireCommon(header),
            dataType: 'ACQUISITION_INFO',
            firstTime: this._requireCount(header, 'FirstTime'),
            lastTime: this._requireCount(header, 'LastTime'),
            numSlices: this._requireCount(header, 'NumSlices', true),
            numVolumes: this._requireCount(header, 'NumVolumes', true),
        }
        if (infoHeader.lastTime <= infoHeader.firstTime) {
            throw new InvalidTimeRangeError(infoHeader.firstTime, infoHeader.lastTime, { path: this._source })
        }
        Log.debug([
                `${this._dataType} header decoded:`,
                `${infoHeader.numVolumes} volumes,`,
                `${infoHeader.numSlices} slices,`,
                `ticks ${infoHeader.firstTime}-${infoHeader.lastTime}.`,
            ], SCOPE
        )
        return infoHeader
    }

    protected _decodeSignalHeader (header: HeaderFields, dataType: SignalDataType): SignalHeader {
        const signalHeader: SignalHeader = {
            ...this._requireCommon(header),
            dataType: dataType,
            sampleTime: this._requireCount(header, 'SampleTime', true),
        }
        Log.debug(`${dataType} header decoded: ${signalHeader.sampleTime} ticks per sample.`, SCOPE)
        return signalHeader
    }

    /**
     * Iterate over the data records of the input, checking the column count.
     */
    protected *_records (): Generator<{ context: ErrorContext, fields: string[] }> {
        for (let i=0; i<this._lines.length; i++) {
            const line = classifyLine(this._lines[i])
            if (line.type !== 'data') {
                continue
            }
            const context = { line: i + 1, path: this._source }
            if (line.fields.length !== RECORD_COLUMNS) {
                throw new MalformedRecordError(
                    `Expected ${RECORD_COLUMNS} columns in data record, found ${line.fields.length}.`, context
                )
            }
            yield { context, fields: line.fields }
        }
    }

    /**
     * Parse a non-negative integer column of a data record.
     */
    protected _parseColumn (value: string, column: string, context: ErrorContext) {
        const num = parseUnsigned(value)
        if (num === null) {
            throw new MalformedRecordError(
                `Column ${column} has invalid value [${value}], expected a non-negative integer.`,
                { ...context, field: column }
            )
        }
        return num
    }

    /**
     * Write `value` into `length` consecutive samples starting from index `start`.
     * Runs reaching outside of the array are handled according to the sample overrun policy.
     */
    protected _fillRun (samples: Uint16Array, start: number, length: number, value: number, context: ErrorContext) {
        let from = start
        let to = start + length
        if (from < 0 || to > samples.length) {
            if (this._sampleOverrun === 'error') {
                throw new RecordRangeError(
                    `Sample run [${from}, ${to - 1}] is outside of the sample window [0, ${samples.length - 1}].`,
                    context
                )
            }
            Log.debug(`Clamping sample run [${from}, ${to - 1}] on line ${context.line} to the sample window.`, SCOPE)
            from = Math.max(from, 0)
            to = Math.min(to, samples.length)
        }
        if (from < to) {
            samples.fill(value, from, to)
        }
    }

    /**
     * Decode the input as the data type of this decoder.
     * @param window - Sample window, required for signal logs.
     * @returns Decoded acquisition info or signal log.
     */
    decode (window?: SampleWindow): DecodedLog {
        if (this._dataType === 'ACQUISITION_INFO') {
            return this.decodeAcquisitionInfo()
        }
        if (!window) {
            throw new Error(`Cannot decode ${this._dataType} data: a sample window must be specified!`)
        }
        return this.decodeSignals(window)
    }

    /**
     * Decode an acquisition info log into a slice map. Timestamps in the map are relative to the first time
     * stamp of the session.
     */
    decodeAcquisitionInfo (): AcquisitionInfoLog {
        if (this._dataType !== 'ACQUISITION_INFO') {
            throw new Error(`Cannot decode ${this._dataType} data as acquisition info!`)
        }
        const header = this._decodeInfoHeader(this._collectHeaderFields())
        this._header = header
        const sliceMap = new SliceMap(header.numVolumes, header.numSlices)
        const recordedOn = new Map<number, number>()
        const lastTick = header.lastTime + this._samplePadding
        for (const { context, fields } of this._records()) {
            const volume = this._parseColumn(fields[0], 'volume', context)
            const slice = this._parseColumn(fields[1], 'slice', context)
            const start = this._parseColumn(fields[2], 'start', context)
            const stop = this._parseColumn(fields[3], 'stop', context)
            if (!sliceMap.contains(volume, slice)) {
                throw new RecordRangeError(
                    `Volume ${volume} slice ${slice} is outside of the declared ` +
                    `${header.numVolumes} volumes and ${header.numSlices} slices.`,
                    context
                )
            }
            // Periods may run into the padding after LastTime but not past the end of the sample window.
            if (start < header.firstTime || stop > lastTick || start > stop) {
                throw new RecordRangeError(
                    `Acquisition period [${start}, ${stop}] of volume ${volume} slice ${slice} is not within ` +
                    `[${header.firstTime}, ${lastTick}].`,
                    context
                )
            }
            const cell = volume*header.numSlices + slice
            if (sliceMap.has(volume, slice)) {
                throw new DuplicateRecordError(
                    `Received duplicate timing data for volume ${volume} slice ${slice} ` +
                    `(first recorded on line ${recordedOn.get(cell)}).`,
                    context
                )
            }
            recordedOn.set(cell, context.line ?? 0)
            sliceMap.set(volume, slice, start - header.firstTime, stop - header.firstTime)
        }
        const expected = header.numVolumes*header.numSlices
        if (recordedOn.size < expected) {
            Log.warn(`Timing data is missing for ${expected - recordedOn.size} of ${expected} slices.`, SCOPE)
        } else {
            Log.debug(`Timing data decoded for ${expected} slices.`, SCOPE)
        }
        return { dataType: header.dataType, header, sliceMap }
    }

    /**
     * Decode a signal log into one dense sample array per channel.
     * @param window - The tick window the arrays are aligned to.
     */
    decodeSignals (window: SampleWindow): SignalLog {
        const dataType = this._dataType
        if (dataType === 'ACQUISITION_INFO') {
            throw new Error(`Cannot decode ${dataType} data as signals!`)
        }
        if (!Number.isSafeInteger(window.expectedSamples) || window.expectedSamples <= 0) {
            throw new RangeError(`Expected sample count must be a positive integer, ${window.expectedSamples} given.`)
        }
        const header = this._decodeSignalHeader(this._collectHeaderFields(), dataType)
        this._header = header
        const labels = PhysioDecoder.ChannelLabels(dataType)
        const channels = labels.map(label => {
            return { label, samples: new Uint16Array(window.expectedSamples) }
        })
        let recordCount = 0
        for (const { context, fields } of this._records()) {
            const timestamp = this._parseColumn(fields[0], 'timestamp', context)
            const label = fields[1]
            const value = this._parseColumn(fields[2], 'value', context)
            // The fourth column (trigger) is not used.
            if (value > MAX_SAMPLE_VALUE) {
                throw new RecordRangeError(`Sample value ${value} does not fit in 16 bits.`, context)
            }
            // Single channel logs do not check the channel label.
            const chanIdx = labels.length === 1 ? 0 : labels.findIndex(l => l === label)
            if (chanIdx < 0) {
                throw new InvalidChannelError(dataType, label, context)
            }
            this._fillRun(channels[chanIdx].samples, timestamp - window.firstTime, header.sampleTime, value, context)
            recordCount++
        }
        Log.debug(`Decoded ${recordCount} ${dataType} records.`, SCOPE)
        return { dataType, header, channels }
    }

    /**
     * Decode and return the header of the input.
     */
    decodeHeader (): LogHeader {
        const fields = this._collectHeaderFields()
        const dataType = this._dataType
        this._header = dataType === 'ACQUISITION_INFO'
                       ? this._decodeInfoHeader(fields)
                       : this._decodeSignalHeader(fields, dataType)
        return this._header
    }

    /**
     * Set the text of a log file as the input of this decoder.
     * @param text - Log file contents.
     * @param source - Name of the source (e.g. file path) for error messages (optional).
     */
    setInput (text: string, source?: string) {
        this._header = null
        this._lines = splitLines(text)
        if (source) {
            this._source = source
        }
    }
}
