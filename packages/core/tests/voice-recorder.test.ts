import { afterEach, describe, expect, test, vi } from 'vitest';
import { AudioCaptureController } from '../src/voice/recorder';
import { StaticPermissionGate } from '../src/voice/permissions';
import { WorkerPool } from '../src/voice/worker-pool';
import { pcmFormat } from '../src/voice/pcm';
import type { CaptureDevice } from '../src/voice/devices';
import { DeviceError, ErrorCodes, VoiceError } from '../src/errors';
import { FakeCaptureDevice, PacedCaptureDevice, RecordingLogger } from './fixtures/fakes';
import { pcm, waitFor } from './fixtures/helpers';

function createController(device: CaptureDevice, options: { granted?: boolean; joinTimeoutMs?: number; logger?: RecordingLogger } = {}) {
  const createDevice = vi.fn(() => device);
  const controller = new AudioCaptureController({
    format: pcmFormat(16000),
    pool: new WorkerPool(),
    permissions: new StaticPermissionGate(options.granted ?? true),
    createDevice,
    joinTimeoutMs: options.joinTimeoutMs,
    logger: options.logger,
  });
  return { controller, createDevice };
}

describe('AudioCaptureController', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('refuses to start without microphone permission', async () => {
    const { controller, createDevice } = createController(new FakeCaptureDevice(), { granted: false });

    await expect(controller.start()).rejects.toMatchObject({
      code: ErrorCodes.PERMISSION_DENIED,
      message: 'Audio permission required',
    });
    expect(createDevice).not.toHaveBeenCalled();
    expect(controller.getSession()).toBeNull();
  });

  test('reports device init failure and frees the microphone', async () => {
    const broken = new FakeCaptureDevice();
    broken.openError = new Error('device busy');
    const { controller, createDevice } = createController(broken);

    const error = await controller.start().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(DeviceError);
    expect(error).toMatchObject({ code: ErrorCodes.DEVICE_INIT_FAILURE, message: 'Failed to initialize audio recorder' });
    expect(broken.closeCount).toBe(1);
    expect(controller.isRecording()).toBe(false);

    broken.openError = null;
    await controller.start();
    expect(controller.isRecording()).toBe(true);
    expect(createDevice).toHaveBeenCalledTimes(2);
  });

  test('opens the device with the minimum buffer size', async () => {
    const device = new FakeCaptureDevice();
    const { controller } = createController(device);

    const session = await controller.start();

    expect(device.opened).toEqual({ format: pcmFormat(16000), bufferSize: 1024 });
    expect(session.state).toBe('recording');
    expect(session.sampleRate).toBe(16000);
    expect(session.channelLayout).toBe('mono');
    expect(session.encoding).toBe('pcm16');
  });

  test('only one session at a time', async () => {
    const { controller } = createController(new FakeCaptureDevice());
    await controller.start();

    await expect(controller.start()).rejects.toMatchObject({ code: ErrorCodes.CAPTURE_BUSY });
  });

  test('stop with no audio yields an empty result and destroys the session', async () => {
    const device = new FakeCaptureDevice();
    const { controller } = createController(device);
    const session = await controller.start();

    const result = await controller.stop();

    expect(result).toEqual({ kind: 'empty', sessionId: session.id });
    expect(controller.getSession()).toBeNull();
    expect(device.closeCount).toBe(1);
  });

  test('stop hands over the concatenated buffer', async () => {
    const device = new FakeCaptureDevice([pcm(1024, 1), pcm(1024, 2)]);
    const { controller } = createController(device);
    const session = await controller.start();
    await waitFor(() => controller.getSession()?.buffer.length === 2);

    const result = await controller.stop();

    expect(result?.kind).toBe('captured');
    if (result?.kind !== 'captured') return;
    expect(result.capture.sessionId).toBe(session.id);
    expect(result.capture.audio.length).toBe(2048);
    expect(result.capture.audio[0]).toBe(1);
    expect(result.capture.audio[2047]).toBe(2);
    expect(result.capture.durationMs).toBe(64);
    expect(controller.getSession()?.state).toBe('transcribing');
    expect(controller.getSession()?.buffer).toHaveLength(2);

    controller.release(session.id);
    expect(controller.getSession()).toBeNull();
  });

  test('stop without a recording returns null', async () => {
    const { controller } = createController(new FakeCaptureDevice());
    expect(await controller.stop()).toBeNull();
  });

  test('release ignores other session ids', async () => {
    const device = new FakeCaptureDevice([pcm(1024)]);
    const { controller } = createController(device);
    await controller.start();
    await waitFor(() => controller.getSession()?.buffer.length === 1);
    await controller.stop();

    controller.release('not-this-one');
    expect(controller.getSession()?.state).toBe('transcribing');
  });

  test('two seconds of 16 kHz mono is about 64000 bytes', async () => {
    vi.useFakeTimers();
    const device = new PacedCaptureDevice();
    const { controller } = createController(device);

    await controller.start();
    await vi.advanceTimersByTimeAsync(2000);
    const stopping = controller.stop();
    await vi.advanceTimersByTimeAsync(100);
    const result = await stopping;

    expect(result?.kind).toBe('captured');
    if (result?.kind !== 'captured') return;
    expect(Math.abs(result.capture.audio.length - 64000)).toBeLessThanOrEqual(1024);
    expect(result.capture.audio.length % 1024).toBe(0);
  });

  test('bounded join closes a device whose loop hangs', async () => {
    const hanging: CaptureDevice = {
      open: async () => {},
      read: () => new Promise<Buffer>(() => {}),
      close: vi.fn(async () => {}),
    };
    const logger = new RecordingLogger();
    const { controller } = createController(hanging, { joinTimeoutMs: 10, logger });
    const session = await controller.start();

    const result = await controller.stop();

    expect(result).toEqual({ kind: 'empty', sessionId: session.id });
    expect(hanging.close).toHaveBeenCalledTimes(1);
    expect(logger.messages()).toContain('Capture loop did not exit in time; closing device');
  });

  test('a hung loop gives back the capture slot for the next session', async () => {
    const hanging: CaptureDevice = {
      open: async () => {},
      read: () => new Promise<Buffer>(() => {}),
      close: async () => {},
    };
    const next = new FakeCaptureDevice([pcm(1024, 1), pcm(1024, 2)]);
    const pool = new WorkerPool();
    const devices = [hanging, next];
    const controller = new AudioCaptureController({
      format: pcmFormat(16000),
      pool,
      permissions: new StaticPermissionGate(true),
      createDevice: () => devices.shift() ?? next,
      joinTimeoutMs: 10,
    });

    await controller.start();
    expect((await controller.stop())?.kind).toBe('empty');
    expect(pool.getStats().active.capture).toBe(0);

    await controller.start();
    await waitFor(() => next.reads > 2);
    const result = await controller.stop();

    expect(result?.kind).toBe('captured');
    if (result?.kind !== 'captured') return;
    expect(result.capture.audio.length).toBe(2048);
    await pool.shutdown();
    expect(pool.getStats()).toEqual({
      active: { capture: 0, playback: 0, network: 0 },
      queued: { capture: 0, playback: 0, network: 0 },
      closed: true,
    });
  });

  test('getSession returns a copy the caller cannot write through', async () => {
    const device = new FakeCaptureDevice([pcm(1024)]);
    const { controller } = createController(device);
    await controller.start();
    await waitFor(() => device.reads > 1);

    controller.getSession()?.buffer.push(pcm(512));
    const result = await controller.stop();

    expect(result?.kind).toBe('captured');
    if (result?.kind !== 'captured') return;
    expect(result.capture.audio.length).toBe(1024);
  });

  test('errors are VoiceErrors', async () => {
    const { controller } = createController(new FakeCaptureDevice(), { granted: false });
    await expect(controller.start()).rejects.toBeInstanceOf(VoiceError);
  });
});
