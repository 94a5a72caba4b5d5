/**
 * Physiological log session reader.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

import { UuidMismatchError } from '../errors'
import { resolveSettings } from '../settings'
import {
    type AcquisitionInfoLog,
    type ChannelLabel,
    type DecodedLog,
    type LogDataType,
    type PhysioSettings,
    type SampleWindow,
    type SignalDataType,
    type SignalLog,
} from '../types/physio'
import { isActiveSignal } from '../util'
import PhysioDecoder from './PhysioDecoder'
import PhysioFileReader, { LOG_DATA_TYPES } from './PhysioFileReader'
import PhysioRecording from './PhysioRecording'
import type SliceMap from './SliceMap'
import Log from 'scoped-event-log'

const SCOPE = 'PhysioReader'

const SIGNAL_DATA_TYPES: readonly SignalDataType[] = ['ECG', 'RESP', 'PULS', 'EXT']

export default class PhysioReader {
    protected _fileReader: PhysioFileReader
    protected _settings: Readonly<PhysioSettings>
    /**
     * Build the acquisition indicator array from a slice map.
     * @param sliceMap - Slice timing relative to the first timestamp.
     * @param expectedSamples - Length of the array.
     * @returns Array with 1 at every tick within a recorded [start, stop] period and 0 elsewhere.
     */
    public static AcquisitionActive (sliceMap: SliceMap, expectedSamples: number) {
        const active = new Uint8Array(expectedSamples)
        for (const { start, stop } of sliceMap.entries()) {
            active.fill(1, start, stop + 1)
        }
        return active
    }

    /**
     * Create a new session reader.
     * @param settings - Overrides to the default settings (optional).
     * @param fileReader - File reader to use for file access (optional).
     */
    constructor (settings?: Partial<PhysioSettings>, fileReader = new PhysioFileReader()) {
        this._fileReader = fileReader
        this._settings = resolveSettings(settings)
    }

    get settings () {
        return this._settings
    }

    protected async _decoderFor (path: string, dataType: LogDataType) {
        const decoder = new PhysioDecoder(
            dataType,
            this._settings.expectedVersion,
            this._settings.sampleOverrun,
            this._settings.samplePadding
        )
        decoder.setInput(await this._fileReader.readText(path), path)
        return decoder
    }

    /**
     * Read an acquisition info log.
     * @param path - Path to the log file.
     */
    async readAcquisitionInfo (path: string): Promise<AcquisitionInfoLog> {
        const decoder = await this._decoderFor(path, 'ACQUISITION_INFO')
        return decoder.decodeAcquisitionInfo()
    }

    /**
     * Read any single log file.
     * @param path - Path to the log file.
     * @param dataType - Data type the log must declare.
     * @param window - Sample window, required for signal logs.
     */
    async readLog (path: string, dataType: LogDataType, window?: SampleWindow): Promise<DecodedLog> {
        const decoder = await this._decoderFor(path, dataType)
        return decoder.decode(window)
    }

    /**
     * Read the five log files of a session and combine them into a recording.
     * Only signal channels with at least one nonzero sample are included.
     * @param baseName - Session base file name, the part before the `_<type>.log` suffix.
     * @returns The decoded recording.
     */
    async readSession (baseName: string) {
        const paths = PhysioFileReader.LogPaths(baseName, this._settings.fileSuffixes)
        Log.debug(`Reading physiological logs of session ${baseName}.`, SCOPE)
        try {
            await this._fileReader.assertExists(LOG_DATA_TYPES.map(dataType => paths[dataType]))
            const info = await this.readAcquisitionInfo(paths.ACQUISITION_INFO)
            const { firstTime, lastTime, uuid } = info.header
            const actualSamples = lastTime - firstTime + 1
            const window = {
                expectedSamples: actualSamples + this._settings.samplePadding,
                firstTime: firstTime,
            }
            const signals = new Map<ChannelLabel, Uint16Array>()
            for (const dataType of SIGNAL_DATA_TYPES) {
                const log = await this.readSignals(paths[dataType], dataType, window)
                if (log.header.uuid !== uuid) {
                    throw new UuidMismatchError(paths.ACQUISITION_INFO, paths[dataType])
                }
                for (const channel of log.channels) {
                    if (isActiveSignal(channel.samples)) {
                        signals.set(channel.label, channel.samples)
                    } else {
                        Log.debug(`Channel ${channel.label} has no nonzero samples, omitting it.`, SCOPE)
                    }
                }
            }
            const recording = new PhysioRecording(
                info.header,
                info.sliceMap,
                PhysioReader.AcquisitionActive(info.sliceMap, window.expectedSamples),
                signals,
                this._settings.tickDuration
            )
            Log.debug(recording.summary(), SCOPE)
            return recording
        } catch (e: unknown) {
            Log.error(`Reading physiological logs of session ${baseName} failed.`, SCOPE, e as Error)
            throw e
        }
    }

    /**
     * Read a signal log.
     * @param path - Path to the log file.
     * @param dataType - Signal type the log must declare.
     * @param window - The tick window the sample arrays are aligned to.
     */
    async readSignals (path: string, dataType: SignalDataType, window: SampleWindow): Promise<SignalLog> {
        const decoder = await this._decoderFor(path, dataType)
        return decoder.decodeSignals(window)
    }
}
