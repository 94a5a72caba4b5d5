/**
 * Physiological session reader tests.
 * Log files are written into a temporary directory that is removed after the tests.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

import fsPromises, { type FileHandle } from 'node:fs/promises'
import { join } from 'node:path'
import {
    FileNotFoundError,
    InvalidTimeRangeError,
    UuidMismatchError,
} from '../src/errors'
import PhysioFileReader from '../src/physio/PhysioFileReader'
import PhysioReader from '../src/physio/PhysioReader'
import {
    INFO_LABELS,
    SIGNAL_LABELS,
    SessionDir,
    type SessionFiles,
    UUID,
    infoHeader,
    logText,
    signalHeader,
} from './helpers'

const sessionFiles = (): SessionFiles => {
    return {
        ECG: logText(
            ...signalHeader('ECG'),
            SIGNAL_LABELS,
            '100 ECG1 10 0',
            '101 ECG2 20 0',
            '102 ECG3 0 0',
        ),
        EXT: logText(...signalHeader('EXT'), SIGNAL_LABELS, '109 EXT 1 0'),
        Info: logText(...infoHeader(), INFO_LABELS, '0 0 100 103', '0 1 105 107'),
        PULS: logText(...signalHeader('PULS'), SIGNAL_LABELS, '100 PULS 0 0'),
        RESP: logText(...signalHeader('RESP', { sampleTime: 2 }), SIGNAL_LABELS, '104 RESP 7 0'),
    }
}

describe('Physiological session reader', () => {
    const dir = new SessionDir()
    afterAll(() => {
        dir.remove()
    })
    afterEach(() => {
        jest.restoreAllMocks()
    })

    test('Read a complete session', async () => {
        const base = dir.write('complete', sessionFiles())
        const recording = await new PhysioReader().readSession(base)
        expect(recording.uuid).toBe(UUID)
        expect(recording.numSlices).toBe(2)
        expect(recording.numVolumes).toBe(1)
        expect(recording.firstTime).toBe(100)
        expect(recording.lastTime).toBe(109)
        expect(recording.actualSamples).toBe(10)
        expect(recording.expectedSamples).toBe(18)
        expect(Array.from(recording.acquisitionActive)).toEqual(
            [1, 1, 1, 1, 0, 1, 1, 1, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]
        )
        expect(recording.sliceMap.get('stop', 0, 1)).toBe(7)
    })

    test('Only active channels are included', async () => {
        const base = dir.write('channels', sessionFiles())
        const recording = await new PhysioReader().readSession(base)
        expect(recording.channels).toEqual(['ECG1', 'ECG2', 'RESP', 'EXT'])
        expect(Object.keys(recording.signals)).toEqual(['ECG1', 'ECG2', 'RESP', 'EXT'])
        expect(recording.hasSignal('ECG3')).toBe(false)
        expect(recording.hasSignal('PULS')).toBe(false)
        expect(recording.getSignal('EXT2')).toBeNull()
        expect(recording.getSignal('ECG1')?.[0]).toBe(10)
        expect(recording.getSignal('ECG2')?.[1]).toBe(20)
        expect(Array.from(recording.getSignal('RESP')?.subarray(3, 7) ?? [])).toEqual([0, 7, 7, 0])
        expect(recording.getSignal('EXT')?.[9]).toBe(1)
        expect(recording.getSignal('EXT')?.length).toBe(18)
    })

    test('Summarize the scan', async () => {
        const base = dir.write('summary', sessionFiles())
        const recording = await new PhysioReader().readSession(base)
        expect(recording.totalDuration).toBe(0.025)
        expect(recording.summary()).toEqual([
            'Slices in scan:      2',
            'Volumes in scan:     1',
            'First timestamp:     100',
            'Last timestamp:      109',
            'Total scan duration: 10 ticks',
            'Total scan duration: 0.0250 s',
        ])
    })

    test('UUID must match between files', async () => {
        const files = sessionFiles()
        files.PULS = logText(...signalHeader('PULS', { uuid: 'other-session-uuid' }), '100 PULS 1 0')
        const base = dir.write('uuid', files)
        const reading = new PhysioReader().readSession(base)
        await expect(reading).rejects.toThrow(UuidMismatchError)
        await expect(reading).rejects.toThrow(
            `UUID mismatch between ${base}_Info.log and ${base}_PULS.log files!`
        )
    })

    test('All log files must exist', async () => {
        const files: Partial<SessionFiles> = sessionFiles()
        delete files.EXT
        const base = dir.write('missing', files)
        const reading = new PhysioReader().readSession(base)
        await expect(reading).rejects.toThrow(FileNotFoundError)
        await expect(reading).rejects.toThrow(`${base}_EXT.log not found!`)
    })

    test('Invalid time range aborts before signal logs are read', async () => {
        const files = sessionFiles()
        files.Info = logText(...infoHeader({ firstTime: 100, lastTime: 100 }))
        const base = dir.write('range', files)
        const fileReader = new PhysioFileReader()
        const readText = jest.spyOn(fileReader, 'readText')
        await expect(new PhysioReader({}, fileReader).readSession(base)).rejects.toThrow(InvalidTimeRangeError)
        expect(readText).toHaveBeenCalledTimes(1)
        expect(readText).toHaveBeenCalledWith(`${base}_Info.log`)
    })

    test('Settings are applied to every log', async () => {
        const files: SessionFiles = {
            ECG: logText(...signalHeader('ECG', { version: 'EJA_2' }), '100 ECG1 1 0'),
            EXT: logText(...signalHeader('EXT', { version: 'EJA_2' })),
            Info: logText(...infoHeader({ version: 'EJA_2' }), '0 0 100 101'),
            PULS: logText(...signalHeader('PULS', { version: 'EJA_2' })),
            RESP: logText(...signalHeader('RESP', { sampleTime: 4, version: 'EJA_2' }), '108 RESP 3 0'),
        }
        const base = dir.write('settings', files)
        const reader = new PhysioReader({ expectedVersion: 'EJA_2', samplePadding: 0, sampleOverrun: 'clamp' })
        const recording = await reader.readSession(base)
        expect(recording.expectedSamples).toBe(10)
        expect(Array.from(recording.getSignal('RESP')?.subarray(7) ?? [])).toEqual([0, 3, 3])
        expect(recording.channels).toEqual(['ECG1', 'RESP'])
    })

    test('Default settings reject a newer log version', async () => {
        const base = dir.write('version', {
            ...sessionFiles(),
            Info: logText(...infoHeader({ version: 'EJA_2' })),
        })
        await expect(new PhysioReader().readSession(base)).rejects.toThrow(
            `${base}_Info.log:2: File format [EJA_2] is not supported (expected [EJA_1]).`
        )
    })

    test('Read a single log', async () => {
        const base = dir.write('single', sessionFiles())
        const reader = new PhysioReader()
        const info = await reader.readLog(`${base}_Info.log`, 'ACQUISITION_INFO')
        expect(info.dataType).toBe('ACQUISITION_INFO')
        const resp = await reader.readLog(`${base}_RESP.log`, 'RESP', { expectedSamples: 10, firstTime: 100 })
        expect(resp.header.uuid).toBe(UUID)
        if (resp.dataType === 'ACQUISITION_INFO') {
            throw new Error('Expected a signal log.')
        }
        expect(resp.channels[0].samples[4]).toBe(7)
    })
})

describe('Physiological log file reader', () => {
    const dir = new SessionDir()
    afterAll(() => {
        dir.remove()
    })
    afterEach(() => {
        jest.restoreAllMocks()
    })

    test('Build session log paths', () => {
        const suffixes = new PhysioReader().settings.fileSuffixes
        expect(PhysioFileReader.LogPaths('/data/Physio_1', suffixes)).toEqual({
            ACQUISITION_INFO: '/data/Physio_1_Info.log',
            ECG: '/data/Physio_1_ECG.log',
            EXT: '/data/Physio_1_EXT.log',
            PULS: '/data/Physio_1_PULS.log',
            RESP: '/data/Physio_1_RESP.log',
        })
    })

    test('Read file contents', async () => {
        const base = dir.write('text', { RESP: 'UUID = x\n' })
        await expect(new PhysioFileReader().readText(`${base}_RESP.log`)).resolves.toBe('UUID = x\n')
    })

    test('Reading a missing file fails', async () => {
        const path = join(dir.path, 'absent_RESP.log')
        await expect(new PhysioFileReader().readText(path)).rejects.toThrow('ENOENT')
        await expect(new PhysioFileReader().assertExists([path])).rejects.toThrow(FileNotFoundError)
    })

    test('File handle is closed when reading fails', async () => {
        const realOpen = fsPromises.open
        const handles: FileHandle[] = []
        jest.spyOn(fsPromises, 'open').mockImplementation(async (path, flags, mode) => {
            const handle = await realOpen(path, flags, mode)
            jest.spyOn(handle, 'close')
            handles.push(handle)
            return handle
        })
        // A directory opens but cannot be read as a file.
        await expect(new PhysioFileReader().readText(dir.path)).rejects.toThrow('EISDIR')
        expect(handles).toHaveLength(1)
        expect(handles[0].close).toHaveBeenCalledTimes(1)
    })
})
