import { ErrorCodes, ServiceError, VoiceError, toVoiceError } from '../errors';
import { silentLogger } from '../logger';
import { isRecognitionResponse } from '../validation/schema';
import { postJson } from './http';
import type {
  RecognitionRequest,
  RequestOptions,
  TranscriptResult,
  TranscriptionProvider,
  VoiceLogger,
} from './types';
import { resolveApiKey } from './utils';

export interface TranscriptionClientOptions {
  endpoint: string;
  apiKey?: string;
  timeoutMs?: number;
  logger?: VoiceLogger;
}

/**
 * Speech-to-Text over the REST recognize endpoint
 */
export class TranscriptionClient implements TranscriptionProvider {
  private endpoint: string;
  private apiKey: string;
  private timeoutMs: number;
  private logger: VoiceLogger;

  constructor(options: TranscriptionClientOptions) {
    this.endpoint = options.endpoint;
    this.apiKey = resolveApiKey(options.apiKey);
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? silentLogger;
  }

  buildRequest(audio: Buffer, sampleRate: number, languageCode: string): RecognitionRequest {
    return {
      config: {
        encoding: 'LINEAR16',
        sampleRateHertz: sampleRate,
        languageCode,
        enableAutomaticPunctuation: true,
      },
      audio: {
        content: audio.toString('base64'),
      },
    };
  }

  /**
   * Transcribe a finished capture. Always resolves; failures come back as
   * `{ kind: 'failed' }`.
   */
  async transcribe(
    audio: Buffer,
    sampleRate: number,
    languageCode: string,
    options: RequestOptions = {}
  ): Promise<TranscriptResult> {
    if (!this.apiKey) {
      return {
        kind: 'failed',
        error: new VoiceError('Missing GOOGLE_API_KEY for speech recognition. Set it in config, env or ~/.secrets.', {
          code: ErrorCodes.CONFIG_MISSING_API_KEY,
          recoverable: false,
        }),
      };
    }

    let body: unknown;
    try {
      body = await postJson(this.endpoint, this.buildRequest(audio, sampleRate, languageCode), {
        service: 'recognition',
        apiKey: this.apiKey,
        timeoutMs: this.timeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      const voiceError = toVoiceError(error, ErrorCodes.NETWORK_FAILURE);
      this.logger.warn('Speech recognition failed', voiceError.toJSON());
      return { kind: 'failed', error: voiceError };
    }

    return this.interpret(body);
  }

  private interpret(body: unknown): TranscriptResult {
    if (!isRecognitionResponse(body)) {
      return { kind: 'failed', error: this.parseFailure('Unexpected speech recognition response shape') };
    }

    const results = body.results ?? [];
    if (results.length === 0) {
      this.logger.info('No speech detected');
      return { kind: 'no-speech' };
    }

    const transcript = results[0].alternatives?.[0]?.transcript;
    if (transcript === undefined) {
      return { kind: 'failed', error: this.parseFailure('Speech recognition result has no transcript') };
    }

    this.logger.info('Transcript received', { length: transcript.length });
    return { kind: 'ready', text: transcript };
  }

  private parseFailure(message: string): ServiceError {
    const error = new ServiceError(message, {
      service: 'recognition',
      code: ErrorCodes.PARSE_FAILURE,
    });
    this.logger.warn('Error parsing speech response', error.toJSON());
    return error;
  }
}
