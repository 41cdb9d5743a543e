/**
 * Linear PCM helpers.
 *
 * Devices and both remote services exchange signed 16-bit little-endian PCM.
 * The synthesis service wraps LINEAR16 output in a RIFF/WAVE header, which is
 * stripped before the samples reach the output device.
 */

import { ErrorCodes, VoiceError } from '../errors';
import type { AudioFormat } from './types';

const BYTES_PER_SAMPLE = 2;
const DEVICE_PERIOD_MS = 20;
const MIN_DEVICE_BUFFER = 1024;
const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;

export function pcmFormat(sampleRate: number, channels: 1 | 2 = 1): AudioFormat {
  return { sampleRate, channels, encoding: 'pcm16' };
}

export function bytesPerFrame(format: AudioFormat): number {
  return format.channels * BYTES_PER_SAMPLE;
}

export function bytesPerSecond(format: AudioFormat): number {
  return format.sampleRate * bytesPerFrame(format);
}

/**
 * Smallest buffer a device is opened with: one period of audio rounded up
 * to whole frames, never below MIN_DEVICE_BUFFER.
 */
export function minBufferSize(format: AudioFormat): number {
  const frame = bytesPerFrame(format);
  const frames = Math.ceil((format.sampleRate * DEVICE_PERIOD_MS) / 1000);
  return Math.max(frames * frame, MIN_DEVICE_BUFFER);
}

export function durationMs(byteLength: number, format: AudioFormat): number {
  return Math.round((byteLength / bytesPerSecond(format)) * 1000);
}

export interface DecodedPcm {
  audio: Buffer;
  format: AudioFormat;
}

function parseFailure(message: string): VoiceError {
  return new VoiceError(message, {
    code: ErrorCodes.PARSE_FAILURE,
    suggestion: 'The synthesized audio could not be decoded. Try again.',
  });
}

export function isWav(bytes: Buffer): boolean {
  return bytes.length >= RIFF_HEADER_SIZE
    && bytes.toString('ascii', 0, 4) === 'RIFF'
    && bytes.toString('ascii', 8, 12) === 'WAVE';
}

/**
 * Turn a playback payload into raw frames. Raw PCM is taken as mono at
 * `sampleRate`; a WAV payload supplies its own format.
 */
export function decodePcm(bytes: Buffer, sampleRate: number): DecodedPcm {
  const decoded = isWav(bytes)
    ? parseWav(bytes)
    : { audio: bytes, format: pcmFormat(sampleRate) };

  if (decoded.audio.length === 0) {
    throw parseFailure('Audio payload is empty');
  }
  if (decoded.audio.length % bytesPerFrame(decoded.format) !== 0) {
    throw parseFailure(`Audio payload of ${decoded.audio.length} bytes is not a whole number of 16-bit frames`);
  }
  return decoded;
}

export function parseWav(bytes: Buffer): DecodedPcm {
  if (!isWav(bytes)) {
    throw parseFailure('Missing RIFF/WAVE header');
  }

  let format: AudioFormat | null = null;
  let offset = RIFF_HEADER_SIZE;

  while (offset + CHUNK_HEADER_SIZE <= bytes.length) {
    const id = bytes.toString('ascii', offset, offset + 4);
    const size = bytes.readUInt32LE(offset + 4);
    const body = offset + CHUNK_HEADER_SIZE;

    if (id === 'fmt ') {
      if (size < 16 || body + 16 > bytes.length) {
        throw parseFailure('Truncated WAV fmt chunk');
      }
      const audioFormat = bytes.readUInt16LE(body);
      const channels = bytes.readUInt16LE(body + 2);
      const rate = bytes.readUInt32LE(body + 4);
      const bitsPerSample = bytes.readUInt16LE(body + 14);
      if (audioFormat !== 1 || bitsPerSample !== 16) {
        throw parseFailure(`Unsupported WAV encoding (format ${audioFormat}, ${bitsPerSample} bits)`);
      }
      if (channels !== 1 && channels !== 2) {
        throw parseFailure(`Unsupported WAV channel count: ${channels}`);
      }
      format = pcmFormat(rate, channels === 2 ? 2 : 1);
    } else if (id === 'data') {
      if (!format) {
        throw parseFailure('WAV data chunk precedes fmt chunk');
      }
      // Streamed WAVs may declare a size larger than what follows
      const end = Math.min(body + size, bytes.length);
      return { audio: bytes.subarray(body, end), format };
    }

    offset = body + size + (size % 2);
  }

  throw parseFailure('WAV payload has no data chunk');
}

/**
 * Wrap raw frames in a minimal WAV header
 */
export function encodeWav(audio: Buffer, format: AudioFormat): Buffer {
  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + audio.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(bytesPerSecond(format), 28);
  header.writeUInt16LE(bytesPerFrame(format), 32);
  header.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(audio.length, 40);
  return Buffer.concat([header, audio]);
}
