import type { SsmlGender, VoiceNotice } from '@receipt-voice/shared';
import type { VoiceError } from '../errors';

// ============================================
// Audio
// ============================================

export type PcmEncoding = 'pcm16';

export interface AudioFormat {
  sampleRate: number;
  channels: 1 | 2;
  encoding: PcmEncoding;
}

export type SessionPhase = 'idle' | 'recording' | 'transcribing';

export interface AudioSession {
  id: string;
  state: SessionPhase;
  /** Chunks appended by the capture loop; frozen once transcribing */
  buffer: Buffer[];
  sampleRate: number;
  channelLayout: 'mono' | 'stereo';
  encoding: PcmEncoding;
  startedAt: number;
}

/**
 * Snapshot handed over when a recording session stops with audio
 */
export interface CapturedAudio {
  sessionId: string;
  audio: Buffer;
  format: AudioFormat;
  durationMs: number;
}

export type CaptureResult =
  | { kind: 'empty'; sessionId: string }
  | { kind: 'captured'; capture: CapturedAudio };

// ============================================
// Recognition
// ============================================

export type TranscriptResult =
  | { kind: 'ready'; text: string }
  | { kind: 'no-speech' }
  | { kind: 'failed'; error: VoiceError };

export interface RecognitionRequest {
  config: {
    encoding: 'LINEAR16';
    sampleRateHertz: number;
    languageCode: string;
    enableAutomaticPunctuation: true;
  };
  audio: {
    content: string;
  };
}

export interface RecognitionResponse {
  results?: Array<{
    alternatives?: Array<{
      transcript?: string;
      confidence?: number;
    }>;
  }>;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface TranscriptionProvider {
  transcribe(audio: Buffer, sampleRate: number, languageCode: string, options?: RequestOptions): Promise<TranscriptResult>;
}

// ============================================
// Synthesis
// ============================================

export interface SynthesisRequest {
  text: string;
  voiceLocale: string;
  voiceName: string;
  ssmlGender: SsmlGender;
  audioEncoding: 'LINEAR16';
  sampleRate: number;
}

export type SynthesisResult =
  | { kind: 'ready'; audio: Buffer; sampleRate: number }
  | { kind: 'failed'; error: VoiceError };

export interface SynthesisResponse {
  audioContent?: string;
}

export interface SynthesisProvider {
  synthesize(text: string, options?: RequestOptions): Promise<SynthesisResult>;
}

// ============================================
// Playback
// ============================================

export type PlaybackResult =
  | { kind: 'completed'; bytesWritten: number }
  | { kind: 'busy' }
  | { kind: 'failed'; error: VoiceError };

// ============================================
// Collaborators
// ============================================

/**
 * Chat flow the transcript is handed to. Implemented outside the voice core.
 */
export interface ChatSessionBridge {
  /** Append a user-originated entry and trigger the backend query */
  submit(text: string): void | Promise<void>;
  /** Text of a finalized assistant message, or null when there is none */
  getAssistantText?(messageId: string): string | null;
}

export interface PermissionGate {
  hasMicrophonePermission(): boolean;
}

export interface VoiceLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export type NoticeListener = (notice: VoiceNotice) => void;

// ============================================
// State
// ============================================

export interface VoiceState {
  phase: SessionPhase;
  sessionId: string | null;
  isPlaying: boolean;
  pendingSyntheses: number;
}

export type StateListener = (state: VoiceState) => void;

export type CommandStatus = 'accepted' | 'ignored' | 'rejected';

export interface CommandOutcome {
  status: CommandStatus;
  phase: SessionPhase;
  error?: VoiceError;
}
