import { join } from 'path';
import { homedir } from 'os';
import { mkdir, readFile } from 'fs/promises';
import type { VoiceConfig } from '@receipt-voice/shared';
import { ConfigurationError, ErrorCodes } from './errors';
import { validateVoiceConfig } from './validation/schema';

const PROJECT_DIR_NAME = '.receipt-voice';

export const DEFAULT_CONFIG: VoiceConfig = {
  enabled: true,
  capture: {
    enabled: true,
    sampleRate: 16000,
    channels: 1,
    joinTimeoutMs: 1000,
  },
  recognition: {
    endpoint: 'https://speech.googleapis.com/v1/speech:recognize',
    languageCode: 'en-US',
  },
  synthesis: {
    endpoint: 'https://texttospeech.googleapis.com/v1/text:synthesize',
    languageCode: 'en-US',
    voiceName: 'en-US-Neural2-F',
    ssmlGender: 'FEMALE',
    sampleRate: 22050,
  },
  network: {
    timeoutMs: 30000,
    maxConcurrent: 4,
  },
};

export type VoiceConfigOverride = Partial<Omit<VoiceConfig, 'capture' | 'recognition' | 'synthesis' | 'network'>> & {
  capture?: Partial<VoiceConfig['capture']>;
  recognition?: Partial<VoiceConfig['recognition']>;
  synthesis?: Partial<VoiceConfig['synthesis']>;
  network?: Partial<VoiceConfig['network']>;
};

export function mergeConfig(base: VoiceConfig, override?: VoiceConfigOverride): VoiceConfig {
  if (!override) return base;

  return {
    ...base,
    ...override,
    enabled: override.enabled ?? base.enabled,
    apiKey: override.apiKey ?? base.apiKey,
    capture: {
      ...base.capture,
      ...(override.capture || {}),
    },
    recognition: {
      ...base.recognition,
      ...(override.recognition || {}),
    },
    synthesis: {
      ...base.synthesis,
      ...(override.synthesis || {}),
    },
    network: {
      ...base.network,
      ...(override.network || {}),
    },
  };
}

/**
 * Get the path to the user config directory
 */
export function getConfigDir(): string {
  const override = process.env.RECEIPT_VOICE_DIR;
  if (override && override.trim()) {
    return override;
  }
  const envHome = process.env.HOME || process.env.USERPROFILE;
  const homeDir = envHome && envHome.trim().length > 0 ? envHome : homedir();
  return join(homeDir, PROJECT_DIR_NAME);
}

/**
 * Get the path to a specific config file
 */
export function getConfigPath(filename: string): string {
  return join(getConfigDir(), filename);
}

/**
 * Get the path to the project config directory
 */
export function getProjectConfigDir(cwd: string = process.cwd()): string {
  return join(cwd, PROJECT_DIR_NAME);
}

/**
 * Load configuration from multiple sources (merged)
 * Priority: project local > project > user > default
 */
export async function loadConfig(cwd: string = process.cwd()): Promise<VoiceConfig> {
  let config: VoiceConfig = mergeConfig(DEFAULT_CONFIG, {});

  const sources = [
    getConfigPath('config.json'),
    join(getProjectConfigDir(cwd), 'config.json'),
    // git-ignored
    join(getProjectConfigDir(cwd), 'config.local.json'),
  ];

  for (const path of sources) {
    const override = await loadJsonFile(path);
    if (override === null) continue;
    if (!isConfigOverride(override)) {
      throw new ConfigurationError(`Config file must contain a JSON object with object sections: ${path}`, {
        configPath: path,
        recoverable: false,
      });
    }
    config = mergeConfig(config, override);
  }

  const result = validateVoiceConfig(config);
  if (!result.valid) {
    throw new ConfigurationError(`Invalid voice config: ${result.errors.join('; ')}`, {
      code: ErrorCodes.CONFIG_INVALID,
      recoverable: false,
      suggestion: `Check ${getConfigPath('config.json')} and ${PROJECT_DIR_NAME}/config.json.`,
    });
  }

  return config;
}

/**
 * Load a JSON file, returning null if it doesn't exist
 */
async function loadJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return null;
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid JSON: ${path}`, {
      configPath: path,
      recoverable: false,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

const SECTIONS = ['capture', 'recognition', 'synthesis', 'network'] as const;

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isConfigOverride(value: unknown): value is VoiceConfigOverride {
  if (!isObject(value)) return false;
  return SECTIONS.every((key) => {
    const section: unknown = Reflect.get(value, key);
    return section === undefined || isObject(section);
  });
}

/**
 * Ensure the config directory exists
 */
export async function ensureConfigDir(): Promise<void> {
  const configDir = getConfigDir();
  await Promise.all([
    mkdir(configDir, { recursive: true }),
    mkdir(join(configDir, 'logs'), { recursive: true }),
  ]);
}
