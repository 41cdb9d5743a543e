import type { SsmlGender } from '@receipt-voice/shared';
import { ErrorCodes, ServiceError, VoiceError, toVoiceError } from '../errors';
import { silentLogger } from '../logger';
import { isSynthesisResponse } from '../validation/schema';
import { postJson } from './http';
import type {
  RequestOptions,
  SynthesisProvider,
  SynthesisRequest,
  SynthesisResult,
  VoiceLogger,
} from './types';
import { resolveApiKey } from './utils';

export interface SpeechSynthesisClientOptions {
  endpoint: string;
  languageCode: string;
  voiceName: string;
  ssmlGender: SsmlGender;
  sampleRate: number;
  apiKey?: string;
  timeoutMs?: number;
  logger?: VoiceLogger;
}

/**
 * Text-to-Speech over the REST synthesize endpoint, LINEAR16 output
 */
export class SpeechSynthesisClient implements SynthesisProvider {
  private endpoint: string;
  private languageCode: string;
  private voiceName: string;
  private ssmlGender: SsmlGender;
  private sampleRate: number;
  private apiKey: string;
  private timeoutMs: number;
  private logger: VoiceLogger;

  constructor(options: SpeechSynthesisClientOptions) {
    this.endpoint = options.endpoint;
    this.languageCode = options.languageCode;
    this.voiceName = options.voiceName;
    this.ssmlGender = options.ssmlGender;
    this.sampleRate = options.sampleRate;
    this.apiKey = resolveApiKey(options.apiKey);
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? silentLogger;
  }

  buildRequest(text: string): SynthesisRequest {
    return {
      text,
      voiceLocale: this.languageCode,
      voiceName: this.voiceName,
      ssmlGender: this.ssmlGender,
      audioEncoding: 'LINEAR16',
      sampleRate: this.sampleRate,
    };
  }

  async synthesize(text: string, options: RequestOptions = {}): Promise<SynthesisResult> {
    if (!this.apiKey) {
      return {
        kind: 'failed',
        error: new VoiceError('Missing GOOGLE_API_KEY for speech synthesis. Set it in config, env or ~/.secrets.', {
          code: ErrorCodes.CONFIG_MISSING_API_KEY,
          recoverable: false,
        }),
      };
    }

    const request = this.buildRequest(text);
    let body: unknown;
    try {
      body = await postJson(this.endpoint, toWire(request), {
        service: 'synthesis',
        apiKey: this.apiKey,
        timeoutMs: this.timeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      const voiceError = toVoiceError(error, ErrorCodes.NETWORK_FAILURE);
      this.logger.warn('Speech synthesis failed', voiceError.toJSON());
      return { kind: 'failed', error: voiceError };
    }

    if (!isSynthesisResponse(body) || !body.audioContent) {
      const error = new ServiceError('No audio content received', {
        service: 'synthesis',
        code: ErrorCodes.PARSE_FAILURE,
      });
      this.logger.warn('Synthesis response without audioContent', error.toJSON());
      return { kind: 'failed', error };
    }

    const audio = Buffer.from(body.audioContent, 'base64');
    this.logger.debug('Synthesized audio decoded', { bytes: audio.length });
    return { kind: 'ready', audio, sampleRate: request.sampleRate };
  }
}

function toWire(request: SynthesisRequest) {
  return {
    input: { text: request.text },
    voice: {
      languageCode: request.voiceLocale,
      name: request.voiceName,
      ssmlGender: request.ssmlGender,
    },
    audioConfig: {
      audioEncoding: request.audioEncoding,
      sampleRateHertz: request.sampleRate,
    },
  };
}
