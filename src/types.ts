import {
    type AcquisitionInfoHeader,
    type AcquisitionInfoLog,
    type ChannelLabel,
    type DecodedLog,
    type LogDataType,
    type LogHeader,
    type PhysioChannel,
    type PhysioSettings,
    type SampleOverrunPolicy,
    type SampleWindow,
    type SignalDataType,
    type SignalHeader,
    type SignalLog,
} from "./types/physio"

export {
    AcquisitionInfoHeader,
    AcquisitionInfoLog,
    ChannelLabel,
    DecodedLog,
    LogDataType,
    LogHeader,
    PhysioChannel,
    PhysioSettings,
    SampleOverrunPolicy,
    SampleWindow,
    SignalDataType,
    SignalHeader,
    SignalLog,
}
