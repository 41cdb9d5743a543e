export const ErrorCodes = {
  // Capture
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  DEVICE_INIT_FAILURE: 'DEVICE_INIT_FAILURE',
  NO_AUDIO_RECORDED: 'NO_AUDIO_RECORDED',
  CAPTURE_BUSY: 'CAPTURE_BUSY',
  SESSION_BUSY: 'SESSION_BUSY',

  // Remote services
  NETWORK_FAILURE: 'NETWORK_FAILURE',
  SERVICE_ERROR: 'SERVICE_ERROR',
  NO_SPEECH: 'NO_SPEECH',
  PARSE_FAILURE: 'PARSE_FAILURE',

  // Playback
  PLAYBACK_BUSY: 'PLAYBACK_BUSY',
  DEVICE_WRITE_FAILURE: 'DEVICE_WRITE_FAILURE',

  // Configuration & lifecycle
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_MISSING_API_KEY: 'CONFIG_MISSING_API_KEY',
  VOICE_DISABLED: 'VOICE_DISABLED',
  DISPOSED: 'DISPOSED',

  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];
