export { ErrorCodes } from './codes';
export type { ErrorCode } from './codes';
export { VoiceError, ServiceError, DeviceError, ConfigurationError, isVoiceError, toVoiceError } from './types';
export type { VoiceErrorOptions, RemoteService, DeviceKind } from './types';
export { ErrorAggregator } from './aggregator';
export type { ErrorStats } from './aggregator';
