/**
 * Physiological recording class to store the decoded session.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

import { type AcquisitionInfoHeader, type ChannelLabel } from '../types/physio'
import { ticksToSeconds } from '../util'
import type SliceMap from './SliceMap'
import Log from 'scoped-event-log'

const SCOPE = 'PhysioRecording'

export default class PhysioRecording {
    private _acquisitionActive: Uint8Array
    private _header: AcquisitionInfoHeader
    private _signals: Map<ChannelLabel, Uint16Array>
    private _sliceMap: SliceMap
    private _tickDuration: number

    /**
     * Create a recording from decoded session data.
     * @param header - Header of the acquisition info log.
     * @param sliceMap - Slice timing relative to the first timestamp.
     * @param acquisitionActive - 1 at every tick when acquisition was active, 0 otherwise.
     * @param signals - Active signal channels.
     * @param tickDuration - Duration of a clock tick in milliseconds (default 2.5).
     */
    constructor (
        header: AcquisitionInfoHeader,
        sliceMap: SliceMap,
        acquisitionActive: Uint8Array,
        signals = new Map<ChannelLabel, Uint16Array>(),
        tickDuration = 2.5
    ) {
        this._acquisitionActive = acquisitionActive
        this._header = header
        this._signals = signals
        this._sliceMap = sliceMap
        this._tickDuration = tickDuration
    }

    /**
     * Acquisition indicator for each tick of the session (including padding).
     */
    get acquisitionActive () {
        return this._acquisitionActive
    }
    /**
     * Number of ticks between (and including) the first and last timestamps.
     */
    get actualSamples () {
        return this._header.lastTime - this._header.firstTime + 1
    }
    /**
     * Labels of the active signal channels.
     */
    get channels () {
        return [...this._signals.keys()]
    }
    /**
     * Length of the acquisition and signal arrays.
     */
    get expectedSamples () {
        return this._acquisitionActive.length
    }
    get firstTime () {
        return this._header.firstTime
    }
    get header () {
        return this._header
    }
    get lastTime () {
        return this._header.lastTime
    }
    get numSlices () {
        return this._header.numSlices
    }
    get numVolumes () {
        return this._header.numVolumes
    }
    /**
     * Active signal channels as an object keyed by channel label.
     */
    get signals () {
        const signals: Partial<Record<ChannelLabel, Uint16Array>> = {}
        for (const [label, samples] of this._signals) {
            signals[label] = samples
        }
        return signals
    }
    get sliceMap () {
        return this._sliceMap
    }
    /**
     * Total scan duration in seconds.
     */
    get totalDuration () {
        return ticksToSeconds(this.actualSamples, this._tickDuration)
    }
    get uuid () {
        return this._header.uuid
    }

    /**
     * Get the samples of a signal channel.
     * @param label - Channel label.
     * @returns Channel samples, null if the channel is not active in this recording.
     */
    getSignal (label: ChannelLabel): Uint16Array | null {
        const samples = this._signals.get(label)
        if (!samples) {
            Log.debug(`Channel ${label} is not active in recording ${this.uuid}.`, SCOPE)
            return null
        }
        return samples
    }

    hasSignal (label: ChannelLabel) {
        return this._signals.has(label)
    }

    /**
     * Human-readable summary of the scan.
     * @returns Summary lines.
     */
    summary () {
        return [
            `Slices in scan:      ${this.numSlices}`,
            `Volumes in scan:     ${this.numVolumes}`,
            `First timestamp:     ${this.firstTime}`,
            `Last timestamp:      ${this.lastTime}`,
            `Total scan duration: ${this.actualSamples} ticks`,
            `Total scan duration: ${this.totalDuration.toFixed(4)} s`,
        ]
    }
}
