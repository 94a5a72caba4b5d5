import PhysioDecoder from './physio/PhysioDecoder'
import PhysioFileReader from './physio/PhysioFileReader'
import PhysioReader from './physio/PhysioReader'
import PhysioRecording from './physio/PhysioRecording'
import SliceMap from './physio/SliceMap'

export {
    PhysioDecoder,
    PhysioFileReader,
    PhysioReader,
    PhysioRecording,
    SliceMap,
}
export * from './errors'
export { SETTINGS, resolveSettings } from './settings'
export { classifyLine, isActiveSignal, ticksToSeconds } from './util'
export type { SliceEdge, SliceTiming } from './physio/SliceMap'
export * from './types'
