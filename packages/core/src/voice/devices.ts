import { spawn, type ChildProcess } from 'child_process';
import type { Readable } from 'stream';
import { DeviceError, ErrorCodes } from '../errors';
import { bytesPerFrame } from './pcm';
import type { AudioFormat } from './types';
import { findExecutable } from './utils';

const CLOSE_GRACE_MS = 500;

/**
 * Microphone as seen by the capture loop
 */
export interface CaptureDevice {
  open(format: AudioFormat, bufferSize: number): Promise<void>;
  /** Resolves with up to `maxBytes` of PCM; an empty buffer means the stream ended */
  read(maxBytes: number): Promise<Buffer>;
  close(): Promise<void>;
}

/**
 * Speaker as seen by the playback controller
 */
export interface OutputDevice {
  open(format: AudioFormat, bufferSize: number): Promise<void>;
  /** Resolves with the byte count once the device has played everything */
  write(bytes: Buffer): Promise<number>;
  close(): Promise<void>;
}

export interface DeviceCommand {
  command: string;
  args: string[];
}

/**
 * Recorder writing raw signed 16-bit little-endian PCM to stdout
 */
export function resolveRecorder(format: AudioFormat, bufferSize: number): DeviceCommand | null {
  const rate = String(format.sampleRate);
  const channels = String(format.channels);

  const sox = findExecutable('sox');
  if (sox) {
    return {
      command: sox,
      args: ['--buffer', String(bufferSize), '-q', '-d', '-t', 'raw', '-r', rate, '-e', 'signed', '-b', '16', '-c', channels, '-'],
    };
  }

  const arecord = findExecutable('arecord');
  if (arecord) {
    return {
      command: arecord,
      args: ['-q', '-t', 'raw', '-f', 'S16_LE', '-r', rate, '-c', channels, `--buffer-size=${bufferSize / bytesPerFrame(format)}`],
    };
  }

  const ffmpeg = findExecutable('ffmpeg');
  if (ffmpeg) {
    const outputArgs = ['-ac', channels, '-ar', rate, '-f', 's16le', '-'];
    if (process.platform === 'darwin') {
      return { command: ffmpeg, args: ['-loglevel', 'quiet', '-f', 'avfoundation', '-i', ':0', ...outputArgs] };
    }
    if (process.platform === 'linux') {
      return { command: ffmpeg, args: ['-loglevel', 'quiet', '-f', 'alsa', '-i', 'default', ...outputArgs] };
    }
  }

  return null;
}

/**
 * Player reading raw signed 16-bit little-endian PCM from stdin
 */
export function resolvePlayer(format: AudioFormat, bufferSize: number): DeviceCommand | null {
  const rate = String(format.sampleRate);
  const channels = String(format.channels);

  const play = findExecutable('play');
  if (play) {
    return {
      command: play,
      args: ['--buffer', String(bufferSize), '-q', '-t', 'raw', '-r', rate, '-e', 'signed', '-b', '16', '-c', channels, '-'],
    };
  }

  const aplay = findExecutable('aplay');
  if (aplay) {
    return {
      command: aplay,
      args: ['-q', '-t', 'raw', '-f', 'S16_LE', '-r', rate, '-c', channels, `--buffer-size=${bufferSize / bytesPerFrame(format)}`],
    };
  }

  const ffplay = findExecutable('ffplay');
  if (ffplay) {
    return {
      command: ffplay,
      args: ['-nodisp', '-autoexit', '-loglevel', 'quiet', '-f', 's16le', '-ar', rate, '-ac', channels, '-i', '-'],
    };
  }

  return null;
}

function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off('spawn', onSpawn);
      reject(error);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

function terminate(child: ChildProcess | null): Promise<void> {
  if (!child || child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      resolve();
    }, CLOSE_GRACE_MS);
    child.once('close', () => {
      clearTimeout(timer);
      resolve();
    });
    child.kill();
  });
}

/**
 * Microphone backed by sox, arecord or ffmpeg
 */
export class ProcessCaptureDevice implements CaptureDevice {
  private process: ChildProcess | null = null;
  private stream: Readable | null = null;

  async open(format: AudioFormat, bufferSize: number): Promise<void> {
    if (this.process) {
      throw new DeviceError('Capture device is already open.', { device: 'capture' });
    }
    const recorder = resolveRecorder(format, bufferSize);
    if (!recorder) {
      throw new DeviceError('No supported audio recorder found. Install sox, arecord, or ffmpeg.', {
        device: 'capture',
        recoverable: false,
      });
    }

    const child = spawn(recorder.command, recorder.args, { stdio: ['ignore', 'pipe', 'ignore'] });
    try {
      await waitForSpawn(child);
    } catch (error) {
      throw new DeviceError('Failed to initialize audio recorder.', {
        device: 'capture',
        cause: error instanceof Error ? error : undefined,
      });
    }
    this.process = child;
    this.stream = child.stdout;
  }

  read(maxBytes: number): Promise<Buffer> {
    const stream = this.stream;
    if (!stream || stream.readableEnded || stream.destroyed) {
      return Promise.resolve(Buffer.alloc(0));
    }

    return new Promise((resolve, reject) => {
      const cleanup = () => {
        stream.off('readable', onReadable);
        stream.off('end', onEnd);
        stream.off('close', onEnd);
        stream.off('error', onError);
      };
      const onReadable = () => {
        const chunk: unknown = stream.read(maxBytes);
        if (chunk instanceof Buffer) {
          cleanup();
          resolve(chunk);
        }
      };
      const onEnd = () => {
        cleanup();
        const rest: unknown = stream.read();
        resolve(rest instanceof Buffer ? rest : Buffer.alloc(0));
      };
      const onError = (error: Error) => {
        cleanup();
        reject(new DeviceError(`Audio recorder read failed: ${error.message}`, {
          device: 'capture',
          cause: error,
        }));
      };

      stream.on('readable', onReadable);
      stream.once('end', onEnd);
      stream.once('close', onEnd);
      stream.once('error', onError);
      onReadable();
    });
  }

  async close(): Promise<void> {
    const child = this.process;
    this.process = null;
    this.stream = null;
    await terminate(child);
  }
}

/**
 * Speaker backed by sox's play, aplay or ffplay
 */
export class ProcessOutputDevice implements OutputDevice {
  private process: ChildProcess | null = null;

  async open(format: AudioFormat, bufferSize: number): Promise<void> {
    if (this.process) {
      throw new DeviceError('Output device is already open.', { device: 'output' });
    }
    const player = resolvePlayer(format, bufferSize);
    if (!player) {
      throw new DeviceError('No supported audio player found. Install sox, aplay, or ffplay.', {
        device: 'output',
        code: ErrorCodes.DEVICE_INIT_FAILURE,
        recoverable: false,
      });
    }

    const child = spawn(player.command, player.args, { stdio: ['pipe', 'ignore', 'ignore'] });
    try {
      await waitForSpawn(child);
    } catch (error) {
      throw new DeviceError('Failed to initialize audio player.', {
        device: 'output',
        code: ErrorCodes.DEVICE_INIT_FAILURE,
        cause: error instanceof Error ? error : undefined,
      });
    }
    this.process = child;
  }

  write(bytes: Buffer): Promise<number> {
    const child = this.process;
    const stdin = child?.stdin;
    if (!child || !stdin) {
      return Promise.reject(new DeviceError('Output device is not open.', { device: 'output' }));
    }

    return new Promise((resolve, reject) => {
      const fail = (error: Error) => {
        child.off('close', onClose);
        reject(new DeviceError(`Audio playback failed: ${error.message}`, {
          device: 'output',
          cause: error,
        }));
      };
      const onClose = (code: number | null) => {
        stdin.off('error', fail);
        if (code === 0) {
          resolve(bytes.length);
        } else {
          reject(new DeviceError(`Audio player exited with code ${code ?? 'null'}`, { device: 'output' }));
        }
      };
      child.once('close', onClose);
      stdin.once('error', fail);
      stdin.end(bytes);
    });
  }

  async close(): Promise<void> {
    const child = this.process;
    this.process = null;
    await terminate(child);
  }
}
