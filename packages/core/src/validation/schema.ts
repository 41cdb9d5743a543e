import Ajv, { type ValidateFunction } from 'ajv';
import type { VoiceConfig } from '@receipt-voice/shared';
import type { RecognitionResponse, SynthesisResponse } from '../voice/types';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

const ajv = new Ajv({
  allErrors: true,
  allowUnionTypes: true,
  strict: false,
});

const recognitionResponseSchema = {
  type: 'object',
  properties: {
    results: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          alternatives: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                transcript: { type: 'string' },
                confidence: { type: 'number' },
              },
            },
          },
        },
      },
    },
  },
};

const synthesisResponseSchema = {
  type: 'object',
  properties: {
    audioContent: { type: 'string' },
  },
};

const httpUrl = { type: 'string', pattern: '^https?://' };

const voiceConfigSchema = {
  type: 'object',
  required: ['enabled', 'capture', 'recognition', 'synthesis', 'network'],
  properties: {
    enabled: { type: 'boolean' },
    apiKey: { type: 'string' },
    capture: {
      type: 'object',
      required: ['sampleRate', 'channels'],
      properties: {
        enabled: { type: 'boolean' },
        sampleRate: { type: 'integer', minimum: 8000, maximum: 48000 },
        channels: { enum: [1, 2] },
        joinTimeoutMs: { type: 'integer', minimum: 0 },
      },
    },
    recognition: {
      type: 'object',
      required: ['endpoint', 'languageCode'],
      properties: {
        endpoint: httpUrl,
        languageCode: { type: 'string', minLength: 2 },
      },
    },
    synthesis: {
      type: 'object',
      required: ['endpoint', 'languageCode', 'voiceName', 'ssmlGender', 'sampleRate'],
      properties: {
        endpoint: httpUrl,
        languageCode: { type: 'string', minLength: 2 },
        voiceName: { type: 'string', minLength: 1 },
        ssmlGender: { enum: ['FEMALE', 'MALE', 'NEUTRAL'] },
        sampleRate: { type: 'integer', minimum: 8000, maximum: 48000 },
      },
    },
    network: {
      type: 'object',
      required: ['timeoutMs', 'maxConcurrent'],
      properties: {
        timeoutMs: { type: 'integer', minimum: 1 },
        maxConcurrent: { type: 'integer', minimum: 1 },
      },
    },
  },
};

const validateRecognition: ValidateFunction<RecognitionResponse> = ajv.compile<RecognitionResponse>(recognitionResponseSchema);
const validateSynthesis: ValidateFunction<SynthesisResponse> = ajv.compile<SynthesisResponse>(synthesisResponseSchema);
const validateConfig: ValidateFunction<VoiceConfig> = ajv.compile<VoiceConfig>(voiceConfigSchema);

export function isRecognitionResponse(body: unknown): body is RecognitionResponse {
  return validateRecognition(body);
}

export function isSynthesisResponse(body: unknown): body is SynthesisResponse {
  return validateSynthesis(body);
}

export function validateVoiceConfig(config: unknown): ValidationResult {
  if (validateConfig(config)) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: (validateConfig.errors || []).map(formatAjvError),
  };
}

function formatAjvError(error: { instancePath?: string; message?: string }): string {
  const path = error.instancePath ? ` ${error.instancePath}` : '';
  const message = error.message || 'is invalid';
  return `${path} ${message}`.trim();
}
