/**
 * Default physiological log reader settings.
 * @package    physio-log-reader
 * @copyright  2023 Sampsa Lohi
 * @license    Apache-2.0
 */

import { type PhysioSettings } from './types/physio'

export const SETTINGS: Readonly<PhysioSettings> = Object.freeze({
    expectedVersion: 'EJA_1',
    fileSuffixes: Object.freeze({
        ACQUISITION_INFO: '_Info.log',
        ECG: '_ECG.log',
        EXT: '_EXT.log',
        PULS: '_PULS.log',
        RESP: '_RESP.log',
    }),
    // Room for a worst case EXT run starting at the last timestamp.
    samplePadding: 8,
    sampleOverrun: 'error',
    tickDuration: 2.5,
})

/**
 * Merge the given overrides over the default settings.
 * @param overrides - Settings to change (optional).
 * @returns A frozen settings object.
 */
export const resolveSettings = (overrides?: Partial<PhysioSettings>): Readonly<PhysioSettings> => {
    return Object.freeze({ ...SETTINGS, ...overrides })
}
