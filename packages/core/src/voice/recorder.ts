import { formatBytes, formatDuration, generateId, now } from '@receipt-voice/shared';
import { DeviceError, ErrorCodes, VoiceError, toVoiceError } from '../errors';
import { silentLogger } from '../logger';
import { ProcessCaptureDevice, type CaptureDevice } from './devices';
import { ExclusiveFlag, type Lease } from './exclusive';
import { durationMs, minBufferSize } from './pcm';
import type { AudioFormat, AudioSession, CaptureResult, PermissionGate, VoiceLogger } from './types';
import type { WorkerPool } from './worker-pool';

const DEFAULT_JOIN_TIMEOUT_MS = 1000;

export interface AudioCaptureOptions {
  format: AudioFormat;
  pool: WorkerPool;
  permissions: PermissionGate;
  /** Opens a fresh device per session */
  createDevice?: () => CaptureDevice;
  joinTimeoutMs?: number;
  logger?: VoiceLogger;
}

interface ActiveCapture {
  session: AudioSession;
  device: CaptureDevice;
  lease: Lease;
  loop: Promise<void>;
  /** Ends a loop stuck in `read` so its pool slot is freed */
  halt: () => void;
}

/**
 * Owns the microphone for the lifetime of one recording.
 *
 * The capture loop is the only writer of the session buffer. `stop` joins the
 * loop before the buffer is read. A loop that outlives the bounded join is
 * halted, so it gives back the capture slot and never appends again.
 */
export class AudioCaptureController {
  private format: AudioFormat;
  private pool: WorkerPool;
  private permissions: PermissionGate;
  private createDevice: () => CaptureDevice;
  private joinTimeoutMs: number;
  private logger: VoiceLogger;
  private microphone = new ExclusiveFlag('microphone');
  private active: ActiveCapture | null = null;
  private session: AudioSession | null = null;
  private stopRequested = false;

  constructor(options: AudioCaptureOptions) {
    this.format = options.format;
    this.pool = options.pool;
    this.permissions = options.permissions;
    this.createDevice = options.createDevice ?? (() => new ProcessCaptureDevice());
    this.joinTimeoutMs = options.joinTimeoutMs ?? DEFAULT_JOIN_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Copy of the current session; the buffer stays private to the loop
   */
  getSession(): Readonly<AudioSession> | null {
    return this.session ? snapshot(this.session) : null;
  }

  isRecording(): boolean {
    return this.session?.state === 'recording';
  }

  /**
   * Open the microphone and start the capture loop. Resolves as soon as the
   * loop is running.
   */
  async start(): Promise<Readonly<AudioSession>> {
    if (!this.permissions.hasMicrophonePermission()) {
      throw new VoiceError('Audio permission required', {
        code: ErrorCodes.PERMISSION_DENIED,
        suggestion: 'Grant microphone access and try again.',
      });
    }

    const lease = this.session ? null : this.microphone.tryAcquire();
    if (!lease) {
      throw new VoiceError('A recording session is already active', {
        code: ErrorCodes.CAPTURE_BUSY,
        userFacing: false,
      });
    }

    const bufferSize = minBufferSize(this.format);
    const device = this.createDevice();
    try {
      await device.open(this.format, bufferSize);
    } catch (error) {
      lease.release();
      await this.closeQuietly(device);
      throw new DeviceError('Failed to initialize audio recorder', {
        device: 'capture',
        code: ErrorCodes.DEVICE_INIT_FAILURE,
        cause: error instanceof Error ? error : undefined,
        suggestion: 'Check that a microphone is connected and not in use.',
      });
    }

    const session: AudioSession = {
      id: generateId(),
      state: 'recording',
      buffer: [],
      sampleRate: this.format.sampleRate,
      channelLayout: this.format.channels === 2 ? 'stereo' : 'mono',
      encoding: this.format.encoding,
      startedAt: now(),
    };
    this.session = session;
    this.stopRequested = false;

    let halt: () => void = () => {};
    const halted = new Promise<Buffer>((resolve) => {
      halt = () => resolve(Buffer.alloc(0));
    });

    const loop = this.pool
      .run('capture', (signal) => this.captureLoop(session, device, bufferSize, signal, halted))
      .catch((error: unknown) => {
        this.logger.warn('Capture loop ended with an error', {
          sessionId: session.id,
          error: toVoiceError(error).toJSON(),
        });
      });
    this.active = { session, device, lease, loop, halt };

    this.logger.info('Recording started', { sessionId: session.id, bufferSize });
    return snapshot(session);
  }

  /**
   * Stop the loop, close the device and hand over the captured audio.
   * Returns null when there is no recording to stop.
   */
  async stop(): Promise<CaptureResult | null> {
    const active = this.active;
    if (!active || active.session.state !== 'recording' || this.stopRequested) {
      return null;
    }
    const { session, device, lease, loop, halt } = active;

    this.stopRequested = true;
    const joined = await this.join(loop);
    if (!joined) {
      this.logger.warn('Capture loop did not exit in time; closing device', {
        sessionId: session.id,
        joinTimeoutMs: this.joinTimeoutMs,
      });
      halt();
      await loop;
    }
    await this.closeQuietly(device);
    lease.release();
    this.active = null;

    const audio = Buffer.concat(session.buffer);
    if (audio.length === 0) {
      session.state = 'idle';
      this.session = null;
      this.logger.info('Recording stopped without audio', { sessionId: session.id });
      return { kind: 'empty', sessionId: session.id };
    }

    session.state = 'transcribing';
    Object.freeze(session.buffer);
    const duration = durationMs(audio.length, this.format);
    this.logger.info('Recording stopped', {
      sessionId: session.id,
      bytes: audio.length,
      size: formatBytes(audio.length),
      duration: formatDuration(duration),
    });

    return {
      kind: 'captured',
      capture: {
        sessionId: session.id,
        audio,
        format: { ...this.format },
        durationMs: duration,
      },
    };
  }

  /**
   * Destroy a session whose transcript has been delivered
   */
  release(sessionId: string): void {
    if (this.session?.id !== sessionId || this.session.state !== 'transcribing') return;
    this.session.state = 'idle';
    this.session = null;
  }

  private async captureLoop(
    session: AudioSession,
    device: CaptureDevice,
    chunkSize: number,
    signal: AbortSignal,
    halted: Promise<Buffer>
  ): Promise<void> {
    while (!this.stopRequested && !signal.aborted) {
      const chunk = await Promise.race([device.read(chunkSize), halted]);
      if (chunk.length === 0) break;
      if (session.state !== 'recording') break;
      session.buffer.push(chunk);
    }
  }

  private join(loop: Promise<void>): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), this.joinTimeoutMs);
      void loop.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private async closeQuietly(device: CaptureDevice): Promise<void> {
    try {
      await device.close();
    } catch (error) {
      this.logger.warn('Failed to close capture device', { error: toVoiceError(error).toJSON() });
    }
  }
}

function snapshot(session: AudioSession): Readonly<AudioSession> {
  return { ...session, buffer: [...session.buffer] };
}
