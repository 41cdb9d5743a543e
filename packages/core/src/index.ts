// Core exports for the voice interaction subsystem

// Voice
export type * from './voice/types';
export { VoiceManager } from './voice/manager';
export type { VoiceManagerOptions, VoiceManagerState } from './voice/manager';
export { VoiceSessionStateMachine } from './voice/state-machine';
export type { VoiceSessionOptions } from './voice/state-machine';
export { AudioCaptureController } from './voice/recorder';
export type { AudioCaptureOptions } from './voice/recorder';
export { AudioPlaybackController } from './voice/player';
export type { AudioPlaybackOptions } from './voice/player';
export { TranscriptionClient } from './voice/stt';
export type { TranscriptionClientOptions } from './voice/stt';
export { SpeechSynthesisClient } from './voice/tts';
export type { SpeechSynthesisClientOptions } from './voice/tts';
export { ChatSession } from './voice/chat-session';
export type { ChatSessionOptions, QueryHandler } from './voice/chat-session';
export { SystemPermissionGate, StaticPermissionGate } from './voice/permissions';
export { WorkerPool } from './voice/worker-pool';
export type { WorkerLane, WorkerTask, WorkerPoolOptions, WorkerPoolStats } from './voice/worker-pool';
export { ExclusiveFlag } from './voice/exclusive';
export type { Lease, ExclusiveFlagStats } from './voice/exclusive';
export {
  ProcessCaptureDevice,
  ProcessOutputDevice,
  resolveRecorder,
  resolvePlayer,
} from './voice/devices';
export type { CaptureDevice, OutputDevice, DeviceCommand } from './voice/devices';
export {
  pcmFormat,
  bytesPerFrame,
  bytesPerSecond,
  minBufferSize,
  durationMs,
  decodePcm,
  parseWav,
  encodeWav,
  isWav,
} from './voice/pcm';
export type { DecodedPcm } from './voice/pcm';
export { resolveApiKey, findExecutable, API_KEY_ENV } from './voice/utils';

// Config
export {
  DEFAULT_CONFIG,
  loadConfig,
  mergeConfig,
  getConfigPath,
  getConfigDir,
  getProjectConfigDir,
  ensureConfigDir,
} from './config';
export type { VoiceConfigOverride } from './config';

// Validation
export { validateVoiceConfig, isRecognitionResponse, isSynthesisResponse } from './validation/schema';
export type { ValidationResult } from './validation/schema';

// Logger
export { Logger, silentLogger } from './logger';
export type { LogEntry, LogLevel } from './logger';

// Errors
export * from './errors';

// Re-export shared types
export * from '@receipt-voice/shared';
