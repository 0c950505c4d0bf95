import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { DEFAULT_TOLERANCE_MS } from './sync/decide.js';

const CONFIG_DIR = path.join(os.homedir(), '.envsync');
const CONFIG_FILE = path.join(CONFIG_DIR, 'config.json');

export interface CliConfig {
  /** Secrets file location, or `env:NAME` to read it from a variable */
  secretsStore: string;
  /** Blob directory location, or `env:NAME` */
  blobsStore: string;
  /** Dotenv file to synchronize */
  envFile: string;
  /** Template listing the variables to synchronize */
  templateFile: string;
  /** Timestamps closer than this are considered unchanged */
  toleranceSeconds: number;
}

export type ConfigKey = keyof CliConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'secretsStore',
  'blobsStore',
  'envFile',
  'templateFile',
  'toleranceSeconds',
];

export const DEFAULT_CONFIG: Readonly<CliConfig> = {
  secretsStore: 'env:ENVSYNC_SECRETS',
  blobsStore: 'env:ENVSYNC_BLOBS',
  envFile: '.env',
  templateFile: '.env.example',
  toleranceSeconds: DEFAULT_TOLERANCE_MS / 1000,
};

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some(k => k === key);
}

/**
 * Loads config from defaults, the config file, then environment variables
 * (later sources win).
 */
export function loadConfig(): CliConfig {
  const config: CliConfig = { ...DEFAULT_CONFIG, ...readConfigFile() };

  if (process.env.ENVSYNC_SECRETS_STORE) {
    config.secretsStore = process.env.ENVSYNC_SECRETS_STORE;
  }
  if (process.env.ENVSYNC_BLOBS_STORE) {
    config.blobsStore = process.env.ENVSYNC_BLOBS_STORE;
  }
  if (process.env.ENVSYNC_TOLERANCE_SECONDS) {
    config.toleranceSeconds = parseTolerance(process.env.ENVSYNC_TOLERANCE_SECONDS);
  }

  return config;
}

/**
 * Reads the values stored in the config file. Unknown keys are ignored.
 */
export function readConfigFile(): Partial<CliConfig> {
  if (!fs.existsSync(CONFIG_FILE)) {
    return {};
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(CONFIG_FILE, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${CONFIG_FILE} must contain a JSON object`);
  }

  const config: Partial<CliConfig> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isConfigKey(key)) continue;
    if (key === 'toleranceSeconds') {
      config.toleranceSeconds = parseTolerance(String(value));
    } else if (typeof value === 'string') {
      config[key] = value;
    }
  }
  return config;
}

/**
 * Stores a single value in the config file.
 */
export function setConfigValue(key: ConfigKey, value: string): void {
  const merged = readConfigFile();
  if (key === 'toleranceSeconds') {
    merged.toleranceSeconds = parseTolerance(value);
  } else {
    merged[key] = value;
  }

  if (!fs.existsSync(CONFIG_DIR)) {
    fs.mkdirSync(CONFIG_DIR, { recursive: true });
  }
  fs.writeFileSync(CONFIG_FILE, JSON.stringify(merged, null, 2) + '\n');
}

export function parseTolerance(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`Invalid tolerance "${value}" (expected a non-negative number of seconds)`);
  }
  return seconds;
}

export function toleranceMs(config: CliConfig): number {
  return config.toleranceSeconds * 1000;
}
