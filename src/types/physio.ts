/**
 * Physiological log types.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

import type SliceMap from '../physio/SliceMap'

/**
 * Log file kinds, as declared in the `LogDataType` header field.
 */
export type LogDataType = 'ACQUISITION_INFO' | SignalDataType
export type SignalDataType = 'ECG' | 'EXT' | 'PULS' | 'RESP'

export type ChannelLabel = 'ECG1' | 'ECG2' | 'ECG3' | 'ECG4' | 'EXT' | 'EXT2' | 'PULS' | 'RESP'

type CommonHeader = {
    /** Format version of the log file (e.g. EJA_1). */
    logVersion: string
    /** Session identifier shared by all files of one measurement. */
    uuid: string
}

export type AcquisitionInfoHeader = CommonHeader & {
    dataType: 'ACQUISITION_INFO'
    /** First timestamp of the session in ticks. */
    firstTime: number
    /** Last timestamp of the session in ticks. */
    lastTime: number
    numSlices: number
    numVolumes: number
}

export type SignalHeader = CommonHeader & {
    dataType: SignalDataType
    /** Number of ticks each reported sample covers. */
    sampleTime: number
}

export type LogHeader = AcquisitionInfoHeader | SignalHeader

export type AcquisitionInfoLog = {
    dataType: 'ACQUISITION_INFO'
    header: AcquisitionInfoHeader
    sliceMap: SliceMap
}

export type PhysioChannel = {
    label: ChannelLabel
    samples: Uint16Array
}

export type SignalLog = {
    dataType: SignalDataType
    header: SignalHeader
    /** Channels in vocabulary order. */
    channels: PhysioChannel[]
}

export type DecodedLog = AcquisitionInfoLog | SignalLog

/**
 * The tick window that signal arrays are aligned to.
 */
export type SampleWindow = {
    /** Session start in ticks; maps to array index 0. */
    firstTime: number
    /** Length of each channel array. */
    expectedSamples: number
}

/**
 * How to handle a sample run that falls (partly) outside the sample window.
 * - `error`: abort the read with a RecordRangeError.
 * - `clamp`: write only the part of the run inside the window.
 */
export type SampleOverrunPolicy = 'clamp' | 'error'

export type PhysioSettings = {
    /** The only log format version this reader accepts. */
    expectedVersion: string
    /** File name suffixes appended to the session base name. */
    fileSuffixes: Readonly<Record<LogDataType, string>>
    /** Extra samples appended to each array for a run starting at the last timestamp. */
    samplePadding: number
    sampleOverrun: SampleOverrunPolicy
    /** Duration of one clock tick in milliseconds. */
    tickDuration: number
}

/**
 * Either a header assignment, a data row or something to skip.
 */
export type LogLine = {
    type: 'assignment'
    key: string
    value: string
} | {
    type: 'data'
    fields: string[]
} | {
    type: 'blank' | 'label'
}
