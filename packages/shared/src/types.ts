// ============================================
// Chat Types
// ============================================

/**
 * A chat entry as the voice core sees it. User entries come from typed input
 * or a transcript; assistant entries are backend replies that may be spoken.
 */
export interface ChatMessage {
  id: string;
  text: string;
  isUser: boolean;
  /** Deep link to a wallet pass attached to an assistant reply */
  walletLink?: string;
  timestamp: number;
}

// ============================================
// Notice Types
// ============================================

export type NoticeLevel = 'info' | 'error';

/**
 * Transient, user-visible notice (toast) raised by the voice core
 */
export interface VoiceNotice {
  level: NoticeLevel;
  message: string;
  /** Error code when the notice reports a failure */
  code?: string;
}

// ============================================
// Config Types
// ============================================

export type SsmlGender = 'FEMALE' | 'MALE' | 'NEUTRAL';

export interface CaptureConfig {
  enabled?: boolean;
  sampleRate: number;
  channels: 1 | 2;
  /** Bounded wait when joining the capture loop on stop */
  joinTimeoutMs?: number;
}

export interface RecognitionConfig {
  endpoint: string;
  languageCode: string;
}

export interface SynthesisConfig {
  endpoint: string;
  languageCode: string;
  voiceName: string;
  ssmlGender: SsmlGender;
  sampleRate: number;
}

export interface NetworkConfig {
  timeoutMs: number;
  maxConcurrent: number;
}

export interface VoiceConfig {
  enabled: boolean;
  /** Falls back to GOOGLE_API_KEY, then ~/.secrets */
  apiKey?: string;
  capture: CaptureConfig;
  recognition: RecognitionConfig;
  synthesis: SynthesisConfig;
  network: NetworkConfig;
}
