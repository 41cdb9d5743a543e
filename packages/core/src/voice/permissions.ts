import type { CaptureConfig } from '@receipt-voice/shared';
import { resolveRecorder } from './devices';
import { minBufferSize, pcmFormat } from './pcm';
import type { PermissionGate } from './types';

/**
 * Microphone access on a desktop host: capture must not be switched off in
 * config and a recorder tool must be installed. The lookup runs once.
 */
export class SystemPermissionGate implements PermissionGate {
  private available: boolean | null = null;

  constructor(private readonly capture: CaptureConfig) {}

  hasMicrophonePermission(): boolean {
    if (this.capture.enabled === false) return false;
    if (this.available === null) {
      const format = pcmFormat(this.capture.sampleRate, this.capture.channels);
      this.available = resolveRecorder(format, minBufferSize(format)) !== null;
    }
    return this.available;
  }
}

/**
 * Fixed answer, for hosts that handle the permission prompt themselves
 */
export class StaticPermissionGate implements PermissionGate {
  constructor(private granted: boolean) {}

  hasMicrophonePermission(): boolean {
    return this.granted;
  }

  setGranted(granted: boolean): void {
    this.granted = granted;
  }
}
