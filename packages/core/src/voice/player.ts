import { formatBytes } from '@receipt-voice/shared';
import { DeviceError, ErrorCodes, isVoiceError, toVoiceError } from '../errors';
import { silentLogger } from '../logger';
import { ProcessOutputDevice, type OutputDevice } from './devices';
import { ExclusiveFlag, type ExclusiveFlagStats } from './exclusive';
import { decodePcm, minBufferSize } from './pcm';
import type { PlaybackResult, VoiceLogger } from './types';
import type { WorkerPool } from './worker-pool';

export interface AudioPlaybackOptions {
  pool: WorkerPool;
  /** Opens a fresh device per playback */
  createDevice?: () => OutputDevice;
  logger?: VoiceLogger;
}

/**
 * Plays one PCM buffer at a time on the output device.
 */
export class AudioPlaybackController {
  private pool: WorkerPool;
  private createDevice: () => OutputDevice;
  private logger: VoiceLogger;
  private output = new ExclusiveFlag('output');

  constructor(options: AudioPlaybackOptions) {
    this.pool = options.pool;
    this.createDevice = options.createDevice ?? (() => new ProcessOutputDevice());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Play `bytes` to completion. A second call while a playback holds the
   * device resolves `busy` right away and leaves the first one untouched.
   */
  play(bytes: Buffer, sampleRate: number): Promise<PlaybackResult> {
    const lease = this.output.tryAcquire();
    if (!lease) {
      this.logger.debug('Playback rejected: output device busy');
      return Promise.resolve({ kind: 'busy' });
    }

    return this.pool
      .run('playback', (signal) => this.render(bytes, sampleRate, signal))
      .catch((error: unknown): PlaybackResult => {
        const voiceError = toVoiceError(error, ErrorCodes.DEVICE_WRITE_FAILURE);
        this.logger.warn('Playback failed', voiceError.toJSON());
        return { kind: 'failed', error: voiceError };
      })
      .finally(() => {
        lease.release();
      });
  }

  isPlaying(): boolean {
    return this.output.isHeld();
  }

  getStats(): ExclusiveFlagStats {
    return this.output.getStats();
  }

  private async render(bytes: Buffer, sampleRate: number, signal: AbortSignal): Promise<PlaybackResult> {
    const { audio, format } = decodePcm(bytes, sampleRate);
    const device = this.createDevice();
    const closeOnAbort = () => {
      void this.closeQuietly(device);
    };

    try {
      try {
        await device.open(format, minBufferSize(format));
      } catch (error) {
        throw new DeviceError('Failed to open audio output', {
          device: 'output',
          code: ErrorCodes.DEVICE_INIT_FAILURE,
          cause: error instanceof Error ? error : undefined,
        });
      }

      signal.addEventListener('abort', closeOnAbort, { once: true });
      this.logger.info('Playback started', {
        bytes: audio.length,
        size: formatBytes(audio.length),
        sampleRate: format.sampleRate,
      });

      let bytesWritten: number;
      try {
        bytesWritten = await device.write(audio);
      } catch (error) {
        if (isVoiceError(error) && error.code === ErrorCodes.DEVICE_WRITE_FAILURE) throw error;
        throw new DeviceError(error instanceof Error ? error.message : String(error), {
          device: 'output',
          code: ErrorCodes.DEVICE_WRITE_FAILURE,
          cause: error instanceof Error ? error : undefined,
        });
      }

      this.logger.info('Playback finished', { bytesWritten });
      return { kind: 'completed', bytesWritten };
    } finally {
      signal.removeEventListener('abort', closeOnAbort);
      await this.closeQuietly(device);
    }
  }

  private async closeQuietly(device: OutputDevice): Promise<void> {
    try {
      await device.close();
    } catch (error) {
      this.logger.warn('Failed to close output device', toVoiceError(error).toJSON());
    }
  }
}
