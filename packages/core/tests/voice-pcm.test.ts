import { describe, expect, test } from 'vitest';
import {
  bytesPerSecond,
  decodePcm,
  durationMs,
  encodeWav,
  isWav,
  minBufferSize,
  parseWav,
  pcmFormat,
} from '../src/voice/pcm';
import { ErrorCodes, VoiceError } from '../src/errors';

function expectParseFailure(fn: () => unknown, message: string): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(VoiceError);
    if (error instanceof VoiceError) {
      expect(error.code).toBe(ErrorCodes.PARSE_FAILURE);
      expect(error.message).toBe(message);
    }
    return;
  }
  throw new Error('Expected a parse failure');
}

describe('minBufferSize', () => {
  test('never goes below 1024 bytes', () => {
    expect(minBufferSize(pcmFormat(16000))).toBe(1024);
    expect(minBufferSize(pcmFormat(22050))).toBe(1024);
  });

  test('covers 20ms of audio in whole frames', () => {
    expect(minBufferSize(pcmFormat(48000, 2))).toBe(3840);
    expect(minBufferSize(pcmFormat(44100, 2))).toBe(3528);
  });
});

describe('pcm arithmetic', () => {
  test('16 kHz mono is 32000 bytes per second', () => {
    expect(bytesPerSecond(pcmFormat(16000))).toBe(32000);
    expect(durationMs(64000, pcmFormat(16000))).toBe(2000);
  });
});

describe('decodePcm', () => {
  test('passes raw frames through at the given rate', () => {
    const raw = Buffer.from([1, 0, 2, 0]);
    const decoded = decodePcm(raw, 22050);
    expect(decoded.audio).toBe(raw);
    expect(decoded.format).toEqual({ sampleRate: 22050, channels: 1, encoding: 'pcm16' });
  });

  test('strips a WAV header and takes its format', () => {
    const samples = Buffer.alloc(8, 7);
    const wav = encodeWav(samples, pcmFormat(24000));
    expect(isWav(wav)).toBe(true);

    const decoded = decodePcm(wav, 16000);
    expect(decoded.format.sampleRate).toBe(24000);
    expect(decoded.audio.equals(samples)).toBe(true);
  });

  test('rejects an odd byte count', () => {
    expectParseFailure(
      () => decodePcm(Buffer.alloc(3), 16000),
      'Audio payload of 3 bytes is not a whole number of 16-bit frames'
    );
  });

  test('rejects an empty payload', () => {
    expectParseFailure(() => decodePcm(Buffer.alloc(0), 16000), 'Audio payload is empty');
  });

  test('rejects stereo data that splits a frame', () => {
    const wav = encodeWav(Buffer.alloc(6), pcmFormat(16000, 2));
    expectParseFailure(
      () => decodePcm(wav, 16000),
      'Audio payload of 6 bytes is not a whole number of 16-bit frames'
    );
  });
});

describe('parseWav', () => {
  test('rejects a header without a data chunk', () => {
    const header = encodeWav(Buffer.alloc(0), pcmFormat(16000)).subarray(0, 12);
    expectParseFailure(() => parseWav(header), 'WAV payload has no data chunk');
  });

  test('rejects float samples', () => {
    const wav = encodeWav(Buffer.alloc(4), pcmFormat(16000));
    wav.writeUInt16LE(3, 20);
    expectParseFailure(() => parseWav(wav), 'Unsupported WAV encoding (format 3, 16 bits)');
  });

  test('clamps a data size larger than the payload', () => {
    const wav = encodeWav(Buffer.alloc(4, 2), pcmFormat(16000));
    wav.writeUInt32LE(4096, 40);
    expect(parseWav(wav).audio.length).toBe(4);
  });
});
