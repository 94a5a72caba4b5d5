/**
 * Acquisition timing map.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

export type SliceEdge = 'start' | 'stop'

export type SliceTiming = {
    slice: number
    start: number
    stop: number
    volume: number
}

/**
 * Start and stop ticks of each acquired slice, laid out as `[edge, volume, slice]`.
 * Volume and slice indices are 0-based. Each cell can be recorded only once.
 */
export default class SliceMap {
    private _numSlices: number
    private _numVolumes: number
    private _recorded: Uint8Array
    private _ticks: Uint32Array

    constructor (numVolumes: number, numSlices: number) {
        this._numSlices = numSlices
        this._numVolumes = numVolumes
        this._recorded = new Uint8Array(numVolumes*numSlices)
        this._ticks = new Uint32Array(2*numVolumes*numSlices)
    }

    get numSlices () {
        return this._numSlices
    }
    get numVolumes () {
        return this._numVolumes
    }
    /**
     * Number of (volume, slice) cells that have been recorded.
     */
    get recordedCount () {
        let count = 0
        for (const rec of this._recorded) {
            count += rec
        }
        return count
    }

    private _cellIndex (volume: number, slice: number) {
        if (!this.contains(volume, slice)) {
            throw new RangeError(
                `Cell (${volume}, ${slice}) is outside of the ${this._numVolumes}x${this._numSlices} slice map.`
            )
        }
        return volume*this._numSlices + slice
    }

    /**
     * Check if the given volume and slice indices are inside this map.
     */
    contains (volume: number, slice: number) {
        return volume >= 0 && volume < this._numVolumes && slice >= 0 && slice < this._numSlices
    }

    /**
     * Iterate over the recorded cells in volume, slice order.
     */
    *entries (): Generator<SliceTiming> {
        for (let volume=0; volume<this._numVolumes; volume++) {
            for (let slice=0; slice<this._numSlices; slice++) {
                const cell = volume*this._numSlices + slice
                if (this._recorded[cell]) {
                    yield {
                        slice: slice,
                        start: this._ticks[cell],
                        stop: this._ticks[this._recorded.length + cell],
                        volume: volume,
                    }
                }
            }
        }
    }

    /**
     * Get the timestamp of a slice edge.
     * @param edge - Start or stop.
     * @param volume - 0-based volume index.
     * @param slice - 0-based slice index.
     * @returns Timestamp in ticks or null, if the cell has not been recorded.
     */
    get (edge: SliceEdge, volume: number, slice: number): number | null {
        const cell = this._cellIndex(volume, slice)
        if (!this._recorded[cell]) {
            return null
        }
        return this._ticks[(edge === 'start' ? 0 : this._recorded.length) + cell]
    }

    has (volume: number, slice: number) {
        return this._recorded[this._cellIndex(volume, slice)] === 1
    }

    /**
     * Record the timing of a slice. Recording the same cell twice is an error.
     * @param volume - 0-based volume index.
     * @param slice - 0-based slice index.
     * @param start - Start timestamp in ticks.
     * @param stop - Stop timestamp in ticks.
     */
    set (volume: number, slice: number, start: number, stop: number) {
        const cell = this._cellIndex(volume, slice)
        if (this._recorded[cell]) {
            throw new Error(`Cell (${volume}, ${slice}) has already been recorded.`)
        }
        this._recorded[cell] = 1
        this._ticks[cell] = start
        this._ticks[this._recorded.length + cell] = stop
    }
}
