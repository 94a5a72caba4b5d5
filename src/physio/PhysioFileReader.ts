/**
 * Physiological log file reader.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

import { access, open } from 'node:fs/promises'
import { FileNotFoundError } from '../errors'
import { type LogDataType, type PhysioSettings } from '../types/physio'
import Log from 'scoped-event-log'

const SCOPE = 'PhysioFileReader'

/** Log files of a session, in the order they are read. */
export const LOG_DATA_TYPES: readonly LogDataType[] = ['ACQUISITION_INFO', 'ECG', 'RESP', 'PULS', 'EXT']

export default class PhysioFileReader {
    /**
     * Build the paths of the five log files of a session.
     * @param baseName - Session base file name (e.g. `Physio_20150101_101010_<uuid>`).
     * @param suffixes - File name suffix for each log type.
     * @returns Log file path for each log type.
     */
    public static LogPaths (baseName: string, suffixes: PhysioSettings['fileSuffixes']): Record<LogDataType, string> {
        return {
            ACQUISITION_INFO: `${baseName}${suffixes.ACQUISITION_INFO}`,
            ECG: `${baseName}${suffixes.ECG}`,
            EXT: `${baseName}${suffixes.EXT}`,
            PULS: `${baseName}${suffixes.PULS}`,
            RESP: `${baseName}${suffixes.RESP}`,
        }
    }

    /**
     * Make sure that all of the given files exist.
     * @param paths - File paths to check.
     * @throws FileNotFoundError naming the first missing file.
     */
    async assertExists (paths: string[]) {
        for (const path of paths) {
            try {
                await access(path)
            } catch (e: unknown) {
                Log.error(`Log file ${path} is not accessible.`, SCOPE, e as Error)
                throw new FileNotFoundError(path)
            }
        }
    }

    /**
     * Read the whole contents of a text file. The file handle is always closed before returning.
     * @param path - Path to the file.
     * @returns File contents as UTF-8 text.
     */
    async readText (path: string) {
        Log.debug(`Reading ${path}.`, SCOPE)
        const handle = await open(path, 'r')
        try {
            return await handle.readFile({ encoding: 'utf8' })
        } finally {
            await handle.close()
        }
    }
}
