/**
 * Test fixtures for physiological logs.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { type SignalDataType } from '../src/types/physio'

export const UUID = 'test-session-uuid'

export type InfoHeaderOptions = {
    firstTime?: number
    lastTime?: number
    numSlices?: number
    numVolumes?: number
    uuid?: string
    version?: string
}

export const infoHeader = ({
    firstTime = 100,
    lastTime = 109,
    numSlices = 2,
    numVolumes = 1,
    uuid = UUID,
    version = 'EJA_1',
}: InfoHeaderOptions = {}) => [
    `UUID        = ${uuid}`,
    `LogVersion  = ${version}`,
    'LogDataType = ACQUISITION_INFO',
    `NumSlices   = ${numSlices}`,
    `NumVolumes  = ${numVolumes}`,
    `FirstTime   = ${firstTime}`,
    `LastTime    = ${lastTime}`,
]

export type SignalHeaderOptions = {
    sampleTime?: number
    uuid?: string
    version?: string
}

export const signalHeader = (
    dataType: SignalDataType,
    { sampleTime = 1, uuid = UUID, version = 'EJA_1' }: SignalHeaderOptions = {}
) => [
    `UUID        = ${uuid}`,
    `LogVersion  = ${version}`,
    `LogDataType = ${dataType}`,
    `SampleTime  = ${sampleTime}`,
]

export const INFO_LABELS = 'VOLUME  SLICE  ACQ_START_TICS  ACQ_FINISH_TICS'
export const SIGNAL_LABELS = 'ACQ_TIME_TICS  CHANNEL  VALUE  SIGNAL'

/**
 * Join log lines into file contents.
 */
export const logText = (...lines: string[]) => `${lines.join('\n')}\n`

export type SessionFiles = {
    ECG: string
    EXT: string
    Info: string
    PULS: string
    RESP: string
}

/**
 * Temporary directory holding the log files of one or more sessions.
 */
export class SessionDir {
    readonly path = mkdtempSync(join(tmpdir(), 'physio-test-'))

    /**
     * Write the given log files and return the session base name.
     * Files left undefined are not written.
     */
    write (name: string, files: Partial<SessionFiles>) {
        const base = join(this.path, name)
        for (const [suffix, text] of Object.entries(files)) {
            writeFileSync(`${base}_${suffix}.log`, text)
        }
        return base
    }

    remove () {
        rmSync(this.path, { recursive: true, force: true })
    }
}

/**
 * Run a function that is expected to throw an error of the given class and return the error.
 */
export const thrownBy = <E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E => {
    try {
        fn()
    } catch (e: unknown) {
        if (e instanceof type) {
            return e
        }
        throw e
    }
    throw new Error(`Expected function to throw ${type.name}.`)
}
