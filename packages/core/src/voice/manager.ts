import type { VoiceConfig } from '@receipt-voice/shared';
import { ErrorCodes, VoiceError, type ErrorStats } from '../errors';
import { mergeConfig } from '../config';
import { Logger } from '../logger';
import { ChatSession } from './chat-session';
import { ProcessCaptureDevice, ProcessOutputDevice, type CaptureDevice, type OutputDevice } from './devices';
import { pcmFormat } from './pcm';
import { SystemPermissionGate } from './permissions';
import { AudioPlaybackController } from './player';
import { AudioCaptureController } from './recorder';
import { VoiceSessionStateMachine } from './state-machine';
import { TranscriptionClient } from './stt';
import { SpeechSynthesisClient } from './tts';
import type {
  ChatSessionBridge,
  CommandOutcome,
  NoticeListener,
  PermissionGate,
  StateListener,
  SynthesisProvider,
  TranscriptionProvider,
  VoiceLogger,
  VoiceState,
} from './types';
import { WorkerPool } from './worker-pool';

export interface VoiceManagerOptions {
  chat?: ChatSessionBridge;
  stt?: TranscriptionProvider;
  tts?: SynthesisProvider;
  permissions?: PermissionGate;
  createCaptureDevice?: () => CaptureDevice;
  createOutputDevice?: () => OutputDevice;
  logger?: VoiceLogger;
}

export interface VoiceManagerState extends VoiceState {
  enabled: boolean;
}

export class VoiceManager {
  private config: VoiceConfig;
  private enabled: boolean;
  private chat: ChatSessionBridge;
  private pool: WorkerPool;
  private machine: VoiceSessionStateMachine;
  private logger: VoiceLogger;

  constructor(config: VoiceConfig, options: VoiceManagerOptions = {}) {
    // Own copy; enable/disable must not leak into the caller's object
    this.config = mergeConfig(config, {});
    this.enabled = this.config.enabled;
    this.logger = options.logger ?? new Logger('voice');
    this.chat = options.chat ?? new ChatSession({ logger: this.logger });
    this.pool = new WorkerPool({ networkSlots: this.config.network.maxConcurrent });

    const capture = new AudioCaptureController({
      format: pcmFormat(this.config.capture.sampleRate, this.config.capture.channels),
      pool: this.pool,
      permissions: options.permissions ?? new SystemPermissionGate(this.config.capture),
      createDevice: options.createCaptureDevice ?? (() => new ProcessCaptureDevice()),
      joinTimeoutMs: this.config.capture.joinTimeoutMs,
      logger: this.logger,
    });
    const playback = new AudioPlaybackController({
      pool: this.pool,
      createDevice: options.createOutputDevice ?? (() => new ProcessOutputDevice()),
      logger: this.logger,
    });

    this.machine = new VoiceSessionStateMachine({
      capture,
      playback,
      transcription: options.stt ?? this.createTranscriptionClient(),
      synthesis: options.tts ?? this.createSynthesisClient(),
      pool: this.pool,
      bridge: this.chat,
      languageCode: this.config.recognition.languageCode,
      logger: this.logger,
    });
  }

  enable(): void {
    this.enabled = true;
    this.config.enabled = true;
  }

  /**
   * Turn voice off. A recording in progress is stopped and still transcribed.
   */
  async disable(): Promise<void> {
    this.enabled = false;
    this.config.enabled = false;
    if (this.machine.getState().phase === 'recording') {
      await this.machine.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getState(): VoiceManagerState {
    return {
      enabled: this.enabled,
      ...this.machine.getState(),
    };
  }

  getErrorStats(): ErrorStats[] {
    return this.machine.getErrorStats();
  }

  /**
   * Microphone button: starts a recording, or stops the current one
   */
  async toggleRecording(): Promise<CommandOutcome> {
    if (!this.enabled) return this.rejectDisabled();
    return this.machine.toggle();
  }

  /**
   * Speak a received chat message by id
   */
  async speakMessage(messageId: string): Promise<CommandOutcome> {
    if (!this.enabled) return this.rejectDisabled();
    const text = this.chat.getAssistantText?.(messageId) ?? null;
    if (text === null) {
      this.logger.info('No assistant message to speak', { messageId });
      return { status: 'ignored', phase: this.machine.getState().phase };
    }
    return this.machine.speak(text);
  }

  async speakText(text: string): Promise<CommandOutcome> {
    if (!this.enabled) return this.rejectDisabled();
    return this.machine.speak(text);
  }

  onNotice(listener: NoticeListener): () => void {
    return this.machine.onNotice(listener);
  }

  onStateChange(listener: StateListener): () => void {
    return this.machine.onStateChange(listener);
  }

  whenIdle(): Promise<void> {
    return this.machine.whenIdle();
  }

  dispose(): Promise<void> {
    return this.machine.dispose();
  }

  private rejectDisabled(): CommandOutcome {
    return {
      status: 'rejected',
      phase: this.machine.getState().phase,
      error: new VoiceError('Voice mode is disabled. Enable it to record or play audio.', {
        code: ErrorCodes.VOICE_DISABLED,
      }),
    };
  }

  private createTranscriptionClient(): TranscriptionProvider {
    return new TranscriptionClient({
      endpoint: this.config.recognition.endpoint,
      apiKey: this.config.apiKey,
      timeoutMs: this.config.network.timeoutMs,
      logger: this.logger,
    });
  }

  private createSynthesisClient(): SynthesisProvider {
    return new SpeechSynthesisClient({
      endpoint: this.config.synthesis.endpoint,
      languageCode: this.config.synthesis.languageCode,
      voiceName: this.config.synthesis.voiceName,
      ssmlGender: this.config.synthesis.ssmlGender,
      sampleRate: this.config.synthesis.sampleRate,
      apiKey: this.config.apiKey,
      timeoutMs: this.config.network.timeoutMs,
      logger: this.logger,
    });
  }
}
