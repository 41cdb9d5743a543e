import { describe, expect, test, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm, stat } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_CONFIG,
  ensureConfigDir,
  getConfigDir,
  getConfigPath,
  getProjectConfigDir,
  loadConfig,
  mergeConfig,
} from '../src/config';
import { ConfigurationError, ErrorCodes } from '../src/errors';

let tempDir: string;
let userDir: string;
let projectDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'receipt-voice-config-'));
  userDir = join(tempDir, 'user');
  projectDir = join(tempDir, 'project');
  await mkdir(join(projectDir, '.receipt-voice'), { recursive: true });
  vi.stubEnv('RECEIPT_VOICE_DIR', userDir);
});

afterEach(async () => {
  await rm(tempDir, { recursive: true, force: true });
});

async function writeProjectConfig(name: string, value: unknown): Promise<void> {
  await writeFile(join(projectDir, '.receipt-voice', name), JSON.stringify(value));
}

describe('config paths', () => {
  test('RECEIPT_VOICE_DIR overrides the home directory', () => {
    expect(getConfigDir()).toBe(userDir);
    expect(getConfigPath('config.json')).toBe(join(userDir, 'config.json'));
    expect(getProjectConfigDir(projectDir)).toBe(join(projectDir, '.receipt-voice'));
  });

  test('falls back to ~/.receipt-voice', () => {
    vi.stubEnv('RECEIPT_VOICE_DIR', '');
    vi.stubEnv('HOME', '/home/tester');
    expect(getConfigDir()).toBe(join('/home/tester', '.receipt-voice'));
  });

  test('ensureConfigDir creates the logs directory', async () => {
    await ensureConfigDir();
    expect((await stat(join(userDir, 'logs'))).isDirectory()).toBe(true);
  });
});

describe('mergeConfig', () => {
  test('merges per section', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { synthesis: { voiceName: 'en-GB-Neural2-B', ssmlGender: 'MALE' } });

    expect(merged.synthesis).toEqual({
      endpoint: 'https://texttospeech.googleapis.com/v1/text:synthesize',
      languageCode: 'en-US',
      voiceName: 'en-GB-Neural2-B',
      ssmlGender: 'MALE',
      sampleRate: 22050,
    });
    expect(merged.capture).toEqual(DEFAULT_CONFIG.capture);
    expect(DEFAULT_CONFIG.synthesis.voiceName).toBe('en-US-Neural2-F');
  });
});

describe('loadConfig', () => {
  test('returns defaults when no files exist', async () => {
    expect(await loadConfig(projectDir)).toEqual(DEFAULT_CONFIG);
  });

  test('should preserve defaults when partial config provided', async () => {
    await writeProjectConfig('config.json', { recognition: { languageCode: 'en-GB' } });

    const loaded = await loadConfig(projectDir);

    expect(loaded.recognition.languageCode).toBe('en-GB');
    expect(loaded.recognition.endpoint).toBe('https://speech.googleapis.com/v1/speech:recognize');
    expect(loaded.capture.sampleRate).toBe(16000);
  });

  test('project local config overrides project and user config', async () => {
    await mkdir(userDir, { recursive: true });
    await writeFile(join(userDir, 'config.json'), JSON.stringify({ network: { timeoutMs: 5000, maxConcurrent: 2 } }));
    await writeProjectConfig('config.json', { network: { timeoutMs: 10000 } });
    await writeProjectConfig('config.local.json', { apiKey: 'test-key', enabled: false });

    const loaded = await loadConfig(projectDir);

    expect(loaded.network).toEqual({ timeoutMs: 10000, maxConcurrent: 2 });
    expect(loaded.apiKey).toBe('test-key');
    expect(loaded.enabled).toBe(false);
  });

  test('rejects invalid JSON', async () => {
    await writeFile(join(projectDir, '.receipt-voice', 'config.json'), '{ not json');

    const error = await loadConfig(projectDir).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ configPath: join(projectDir, '.receipt-voice', 'config.json') });
  });

  test('rejects a section that is not an object', async () => {
    await writeProjectConfig('config.json', { capture: 16000 });

    await expect(loadConfig(projectDir)).rejects.toThrow(
      `Config file must contain a JSON object with object sections: ${join(projectDir, '.receipt-voice', 'config.json')}`
    );
  });

  test('validates values', async () => {
    await writeProjectConfig('config.json', { capture: { sampleRate: 4000 } });

    await expect(loadConfig(projectDir)).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_INVALID,
      message: 'Invalid voice config: /capture/sampleRate must be >= 8000',
    });
  });

  test('rejects unknown voice genders', async () => {
    await writeProjectConfig('config.json', { synthesis: { ssmlGender: 'ROBOT' } });

    await expect(loadConfig(projectDir)).rejects.toMatchObject({ code: ErrorCodes.CONFIG_INVALID });
  });
});
