import type { NoticeLevel, VoiceNotice } from '@receipt-voice/shared';
import { ErrorAggregator, ErrorCodes, VoiceError, toVoiceError, type ErrorStats } from '../errors';
import { silentLogger } from '../logger';
import type { AudioCaptureController } from './recorder';
import type { AudioPlaybackController } from './player';
import type {
  CapturedAudio,
  ChatSessionBridge,
  CommandOutcome,
  CommandStatus,
  NoticeListener,
  PlaybackResult,
  SessionPhase,
  StateListener,
  SynthesisProvider,
  SynthesisResult,
  TranscriptResult,
  TranscriptionProvider,
  VoiceLogger,
  VoiceState,
} from './types';
import type { WorkerPool } from './worker-pool';

export interface VoiceSessionOptions {
  capture: AudioCaptureController;
  playback: AudioPlaybackController;
  transcription: TranscriptionProvider;
  synthesis: SynthesisProvider;
  pool: WorkerPool;
  bridge: ChatSessionBridge;
  languageCode: string;
  logger?: VoiceLogger;
}

function noop(): void {}

/**
 * Owns the recording session and the speak pipeline.
 *
 * Every command and every background completion is posted to a single
 * mailbox and handled one at a time, so session and playback state are only
 * ever touched from inside a handler.
 */
export class VoiceSessionStateMachine {
  private capture: AudioCaptureController;
  private playback: AudioPlaybackController;
  private transcription: TranscriptionProvider;
  private synthesis: SynthesisProvider;
  private pool: WorkerPool;
  private bridge: ChatSessionBridge;
  private languageCode: string;
  private logger: VoiceLogger;
  private errors = new ErrorAggregator();

  private mailbox: Promise<void> = Promise.resolve();
  private pending: Set<Promise<void>> = new Set();
  private noticeListeners: Set<NoticeListener> = new Set();
  private stateListeners: Set<StateListener> = new Set();

  private phase: SessionPhase = 'idle';
  private sessionId: string | null = null;
  private pendingSyntheses = 0;
  /** Bumped on dispose; synthesis results from an older epoch are dropped */
  private epoch = 0;
  private disposed = false;

  constructor(options: VoiceSessionOptions) {
    this.capture = options.capture;
    this.playback = options.playback;
    this.transcription = options.transcription;
    this.synthesis = options.synthesis;
    this.pool = options.pool;
    this.bridge = options.bridge;
    this.languageCode = options.languageCode;
    this.logger = options.logger ?? silentLogger;
  }

  // ============================================
  // Commands
  // ============================================

  /**
   * Start recording. While recording this acts as `stop`, like the single
   * microphone button.
   */
  start(): Promise<CommandOutcome> {
    return this.post(() => this.handleStart());
  }

  stop(): Promise<CommandOutcome> {
    return this.post(() => this.handleStop());
  }

  toggle(): Promise<CommandOutcome> {
    return this.start();
  }

  /**
   * Synthesize `text` and play it. Resolves once the request is dispatched;
   * playback progress is reported through notices.
   */
  speak(text: string): Promise<CommandOutcome> {
    return this.post(() => this.handleSpeak(text));
  }

  getState(): VoiceState {
    return {
      phase: this.phase,
      sessionId: this.sessionId,
      isPlaying: this.playback.isPlaying(),
      pendingSyntheses: this.pendingSyntheses,
    };
  }

  getErrorStats(): ErrorStats[] {
    return this.errors.getStats();
  }

  onNotice(listener: NoticeListener): () => void {
    this.noticeListeners.add(listener);
    return () => this.noticeListeners.delete(listener);
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  /**
   * Resolves once no request, playback or delivery is outstanding
   */
  async whenIdle(): Promise<void> {
    do {
      await Promise.all(Array.from(this.pending));
      await this.mailbox;
    } while (this.pending.size > 0);
  }

  /**
   * Stop recording, abort in-flight requests and wait for the pool to drain.
   * Later commands are rejected and late results are dropped.
   */
  async dispose(): Promise<void> {
    const first = await this.post(() => this.handleDispose());
    if (!first) return;
    await this.pool.shutdown();
    await this.whenIdle();
    this.noticeListeners.clear();
    this.stateListeners.clear();
  }

  // ============================================
  // Handlers (run inside the mailbox)
  // ============================================

  private async handleStart(): Promise<CommandOutcome> {
    if (this.disposed) return this.rejectDisposed();
    if (this.phase === 'recording') return this.handleStop();
    if (this.phase === 'transcribing') return this.rejectBusy();

    try {
      const session = await this.capture.start();
      this.sessionId = session.id;
      this.setPhase('recording');
      this.notify('info', 'Recording started...');
      return this.outcome('accepted');
    } catch (error) {
      const voiceError = toVoiceError(error, ErrorCodes.DEVICE_INIT_FAILURE);
      this.fail(voiceError);
      return this.outcome('rejected', voiceError);
    }
  }

  private async handleStop(): Promise<CommandOutcome> {
    if (this.disposed) return this.rejectDisposed();
    if (this.phase === 'idle') return this.outcome('ignored');
    if (this.phase === 'transcribing') return this.rejectBusy();

    const result = await this.capture.stop();
    if (!result) {
      this.logger.warn('Stop found no active capture', { sessionId: this.sessionId });
      this.resetSession();
      return this.outcome('ignored');
    }

    if (result.kind === 'empty') {
      this.resetSession();
      const error = new VoiceError('No audio recorded', { code: ErrorCodes.NO_AUDIO_RECORDED });
      this.fail(error);
      return this.outcome('accepted', error);
    }

    this.setPhase('transcribing');
    this.notify('info', 'Recording stopped. Processing...');
    this.dispatchTranscription(result.capture);
    return this.outcome('accepted');
  }

  private handleSpeak(text: string): CommandOutcome {
    if (this.disposed) return this.rejectDisposed();
    if (this.playback.isPlaying()) {
      const error = new VoiceError('Already playing audio', { code: ErrorCodes.PLAYBACK_BUSY });
      this.fail(error);
      return this.outcome('rejected', error);
    }

    const trimmed = text.trim();
    if (!trimmed) return this.outcome('ignored');

    this.notify('info', 'Converting message to audio...');
    this.pendingSyntheses += 1;
    this.emitState();

    const epoch = this.epoch;
    const delivery = this.pool
      .run('network', (signal) => this.synthesis.synthesize(trimmed, { signal }))
      .catch((error: unknown): SynthesisResult => ({
        kind: 'failed',
        error: toVoiceError(error, ErrorCodes.NETWORK_FAILURE),
      }))
      .then((result) => this.post(() => this.deliverSynthesis(epoch, result)));
    this.track(delivery);

    return this.outcome('accepted');
  }

  private async handleDispose(): Promise<boolean> {
    if (this.disposed) return false;
    this.disposed = true;
    this.epoch += 1;

    if (this.phase === 'recording') {
      const result = await this.capture.stop();
      this.logger.info('Recording discarded on dispose', {
        sessionId: this.sessionId,
        kind: result?.kind ?? null,
      });
    }
    if (this.sessionId) {
      this.capture.release(this.sessionId);
    }

    this.pendingSyntheses = 0;
    this.resetSession();
    return true;
  }

  // ============================================
  // Deliveries
  // ============================================

  private dispatchTranscription(capture: CapturedAudio): void {
    const { sessionId, audio, format } = capture;
    this.logger.info('Submitting audio for transcription', {
      sessionId,
      bytes: audio.length,
      durationMs: capture.durationMs,
    });

    const delivery = this.pool
      .run('network', (signal) =>
        this.transcription.transcribe(audio, format.sampleRate, this.languageCode, { signal })
      )
      .catch((error: unknown): TranscriptResult => ({
        kind: 'failed',
        error: toVoiceError(error, ErrorCodes.NETWORK_FAILURE),
      }))
      .then((result) => this.post(() => this.deliverTranscript(sessionId, result)));
    this.track(delivery);
  }

  private deliverTranscript(sessionId: string, result: TranscriptResult): void {
    if (this.phase !== 'transcribing' || this.sessionId !== sessionId) {
      this.logger.info('Discarding stale transcript', {
        sessionId,
        currentSessionId: this.sessionId,
        kind: result.kind,
      });
      return;
    }

    this.capture.release(sessionId);
    this.resetSession();

    switch (result.kind) {
      case 'ready':
        this.submitTranscript(result.text);
        break;
      case 'no-speech':
        this.fail(new VoiceError('No speech detected', { code: ErrorCodes.NO_SPEECH }));
        break;
      case 'failed':
        this.fail(result.error);
        break;
    }
  }

  private submitTranscript(text: string): void {
    let submitted: void | Promise<void>;
    try {
      submitted = this.bridge.submit(text);
    } catch (error) {
      this.fail(toVoiceError(error));
      return;
    }
    this.notify('info', `Voice message sent: ${text}`);
    this.track(
      Promise.resolve(submitted).catch((error: unknown) => this.post(() => this.fail(toVoiceError(error))))
    );
  }

  private deliverSynthesis(epoch: number, result: SynthesisResult): void {
    if (epoch !== this.epoch) {
      this.logger.info('Discarding stale synthesis result', { kind: result.kind });
      return;
    }
    this.pendingSyntheses -= 1;

    if (result.kind === 'failed') {
      this.fail(result.error);
      this.emitState();
      return;
    }

    if (this.playback.isPlaying()) {
      this.finishPlayback(epoch, { kind: 'busy' });
      return;
    }

    const playback = this.playback.play(result.audio, result.sampleRate);
    this.notify('info', 'Playing audio...');
    this.emitState();
    this.track(playback.then((outcome) => this.post(() => this.finishPlayback(epoch, outcome))));
  }

  private finishPlayback(epoch: number, outcome: PlaybackResult): void {
    if (epoch !== this.epoch) return;

    switch (outcome.kind) {
      case 'completed':
        this.notify('info', 'Audio playback finished');
        break;
      case 'busy':
        this.fail(new VoiceError('Already playing audio', { code: ErrorCodes.PLAYBACK_BUSY }));
        break;
      case 'failed':
        this.fail(outcome.error, `Error playing audio: ${outcome.error.message}`);
        break;
    }
    this.emitState();
  }

  // ============================================
  // Internals
  // ============================================

  private post<T>(handler: () => T | Promise<T>): Promise<T> {
    const result = this.mailbox.then(handler);
    this.mailbox = result.then(noop, noop);
    return result;
  }

  private track(work: Promise<unknown>): void {
    const tracked: Promise<void> = work
      .then(noop, (error: unknown) => {
        this.logger.error('Background voice task failed', toVoiceError(error).toJSON());
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private resetSession(): void {
    this.sessionId = null;
    this.setPhase('idle');
  }

  private setPhase(phase: SessionPhase): void {
    if (this.phase === phase) return;
    this.logger.debug('Voice phase changed', { from: this.phase, to: phase, sessionId: this.sessionId });
    this.phase = phase;
    this.emitState();
  }

  private outcome(status: CommandStatus, error?: VoiceError): CommandOutcome {
    return error ? { status, phase: this.phase, error } : { status, phase: this.phase };
  }

  private rejectBusy(): CommandOutcome {
    const error = new VoiceError('Still processing the previous recording', {
      code: ErrorCodes.SESSION_BUSY,
      suggestion: 'Wait for the transcript before recording again.',
    });
    this.fail(error);
    return this.outcome('rejected', error);
  }

  private rejectDisposed(): CommandOutcome {
    return this.outcome(
      'rejected',
      new VoiceError('Voice session has been disposed', { code: ErrorCodes.DISPOSED, userFacing: false })
    );
  }

  private fail(error: VoiceError, message = error.message): void {
    this.errors.record(error);
    this.logger.warn(message, error.toJSON());
    this.notify('error', message, error.code);
  }

  private notify(level: NoticeLevel, message: string, code?: string): void {
    const notice: VoiceNotice = code ? { level, message, code } : { level, message };
    for (const listener of this.noticeListeners) {
      try {
        listener(notice);
      } catch (error) {
        this.logger.warn('Notice listener threw', toVoiceError(error).toJSON());
      }
    }
  }

  private emitState(): void {
    const state = this.getState();
    for (const listener of this.stateListeners) {
      try {
        listener(state);
      } catch (error) {
        this.logger.warn('State listener threw', toVoiceError(error).toJSON());
      }
    }
  }
}
