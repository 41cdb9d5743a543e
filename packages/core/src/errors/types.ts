import { ErrorCodes, type ErrorCode } from './codes';

export interface VoiceErrorOptions {
  code: ErrorCode;
  recoverable?: boolean;
  retryable?: boolean;
  userFacing?: boolean;
  suggestion?: string;
  cause?: Error;
}

/**
 * Base error for the voice core. Nothing is retried automatically, so
 * `retryable` only tells the user whether trying again can help.
 */
export class VoiceError extends Error {
  code: ErrorCode;
  recoverable: boolean;
  retryable: boolean;
  userFacing: boolean;
  suggestion?: string;
  cause?: Error;

  constructor(message: string, options: VoiceErrorOptions) {
    super(message);
    this.name = 'VoiceError';
    this.code = options.code;
    this.recoverable = options.recoverable ?? true;
    this.retryable = options.retryable ?? false;
    this.userFacing = options.userFacing ?? true;
    this.suggestion = options.suggestion;
    this.cause = options.cause;
  }

  toJSON(): {
    name: string;
    code: ErrorCode;
    message: string;
    suggestion?: string;
    recoverable: boolean;
    retryable: boolean;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      recoverable: this.recoverable,
      retryable: this.retryable,
    };
  }
}

export type RemoteService = 'recognition' | 'synthesis';

export class ServiceError extends VoiceError {
  service: RemoteService;
  statusCode?: number;

  constructor(message: string, options: Omit<VoiceErrorOptions, 'code'> & {
    service: RemoteService;
    statusCode?: number;
    code?: ErrorCode;
  }) {
    super(message, {
      code: options.code ?? ErrorCodes.SERVICE_ERROR,
      recoverable: options.recoverable,
      retryable: options.retryable,
      userFacing: options.userFacing,
      suggestion: options.suggestion,
      cause: options.cause,
    });
    this.name = 'ServiceError';
    this.service = options.service;
    this.statusCode = options.statusCode;
  }
}

export type DeviceKind = 'capture' | 'output';

export class DeviceError extends VoiceError {
  device: DeviceKind;

  constructor(message: string, options: Omit<VoiceErrorOptions, 'code'> & {
    device: DeviceKind;
    code?: ErrorCode;
  }) {
    super(message, {
      code: options.code ?? (options.device === 'capture' ? ErrorCodes.DEVICE_INIT_FAILURE : ErrorCodes.DEVICE_WRITE_FAILURE),
      recoverable: options.recoverable,
      retryable: options.retryable,
      userFacing: options.userFacing,
      suggestion: options.suggestion,
      cause: options.cause,
    });
    this.name = 'DeviceError';
    this.device = options.device;
  }
}

export class ConfigurationError extends VoiceError {
  configPath?: string;

  constructor(message: string, options: Omit<VoiceErrorOptions, 'code'> & {
    configPath?: string;
    code?: ErrorCode;
  }) {
    super(message, {
      code: options.code ?? ErrorCodes.CONFIG_INVALID,
      recoverable: options.recoverable,
      retryable: options.retryable,
      userFacing: options.userFacing,
      suggestion: options.suggestion,
      cause: options.cause,
    });
    this.name = 'ConfigurationError';
    this.configPath = options.configPath;
  }
}

export function isVoiceError(error: unknown): error is VoiceError {
  return error instanceof VoiceError;
}

/**
 * Wrap anything thrown into a VoiceError, keeping VoiceErrors as they are.
 */
export function toVoiceError(error: unknown, code: ErrorCode = ErrorCodes.UNKNOWN_ERROR): VoiceError {
  if (isVoiceError(error)) return error;
  const cause = error instanceof Error ? error : new Error(String(error));
  return new VoiceError(cause.message, { code, cause });
}
