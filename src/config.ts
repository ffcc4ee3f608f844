import { config as dotenvConfig } from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import type {
  AppConfig,
  CaptureConfig,
  RelayConfig,
  SpeechConfig,
  SupervisorConfig,
} from './types/index.js';
import { logger } from './logger.js';

dotenvConfig();

export const DEFAULT_RELAY_URL = 'http://localhost:8000/api/v1/interviews/1/start';

/** Values supplied on the command line; they win over env and config.json. */
export interface ConfigOverrides {
  keyFile?: string;
  languageCode?: string;
}

type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadConfigFile(configPath: string): RawObject {
  if (!fs.existsSync(configPath)) {
    logger.debug(`No config file at ${configPath}, using defaults`);
    return {};
  }
  const raw = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(
      `Failed to parse ${path.basename(configPath)}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  if (!isObject(parsed)) {
    throw new Error(`${path.basename(configPath)} must contain a JSON object`);
  }
  return parsed;
}

function section(file: RawObject, key: string): RawObject {
  const value = file[key];
  return isObject(value) ? value : {};
}

function validatePositiveNumber(value: unknown, name: string, fallback: number): number {
  if (typeof value === 'number' && value > 0) return value;
  if (value !== undefined && value !== null) {
    logger.warn(`config.json: ${name} should be a positive number, using default ${fallback}`);
  }
  return fallback;
}

function validateString(value: unknown, name: string, fallback: string): string {
  if (typeof value === 'string') return value;
  if (value !== undefined && value !== null) {
    logger.warn(`config.json: ${name} should be a string, using default "${fallback}"`);
  }
  return fallback;
}

function defaultCaptureInput(platform: NodeJS.Platform): { inputFormat: string; inputDevice: string } {
  switch (platform) {
    case 'darwin':
      return { inputFormat: 'avfoundation', inputDevice: ':0' };
    case 'win32':
      return { inputFormat: 'dshow', inputDevice: 'audio=default' };
    default:
      return { inputFormat: 'pulse', inputDevice: 'default' };
  }
}

export function parseSpeechConfig(
  raw: RawObject,
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {}
): SpeechConfig {
  return {
    projectId: env.GOOGLE_CLOUD_PROJECT || validateString(raw.projectId, 'speech.projectId', ''),
    keyFile:
      overrides.keyFile ||
      env.GOOGLE_APPLICATION_CREDENTIALS ||
      validateString(raw.keyFile, 'speech.keyFile', ''),
    languageCode:
      overrides.languageCode ||
      env.SPEECH_LANGUAGE ||
      validateString(raw.languageCode, 'speech.languageCode', 'en-US'),
    model: validateString(raw.model, 'speech.model', ''),
    enableAutomaticPunctuation: raw.enableAutomaticPunctuation === true,
    costWarningUsd: validatePositiveNumber(raw.costWarningUsd, 'speech.costWarningUsd', 5),
  };
}

export function parseCaptureConfig(
  raw: RawObject,
  env: NodeJS.ProcessEnv,
  platform: NodeJS.Platform = process.platform
): CaptureConfig {
  const defaults = defaultCaptureInput(platform);
  const sampleRateHertz = validatePositiveNumber(raw.sampleRateHertz, 'capture.sampleRateHertz', 16000);
  return {
    inputFormat:
      env.CAPTURE_INPUT_FORMAT || validateString(raw.inputFormat, 'capture.inputFormat', defaults.inputFormat),
    inputDevice:
      env.CAPTURE_INPUT_DEVICE || validateString(raw.inputDevice, 'capture.inputDevice', defaults.inputDevice),
    sampleRateHertz,
    chunkSize: Math.floor(sampleRateHertz / 10),
    streamDurationLimitSeconds: validatePositiveNumber(
      raw.streamDurationLimitSeconds,
      'capture.streamDurationLimitSeconds',
      300
    ),
    backlogWarningSeconds: validatePositiveNumber(raw.backlogWarningSeconds, 'capture.backlogWarningSeconds', 10),
  };
}

export function parseRelayConfig(raw: RawObject, env: NodeJS.ProcessEnv): RelayConfig {
  return {
    url: env.RELAY_URL || validateString(raw.url, 'relay.url', DEFAULT_RELAY_URL),
    timeoutMs: validatePositiveNumber(raw.timeoutMs, 'relay.timeoutMs', 60_000),
  };
}

export function parseSupervisorConfig(raw: RawObject): SupervisorConfig {
  const baseDelayMs = validatePositiveNumber(raw.baseDelayMs, 'supervisor.baseDelayMs', 1000);
  const maxDelayMs = validatePositiveNumber(raw.maxDelayMs, 'supervisor.maxDelayMs', 30_000);
  return {
    maxConsecutiveFailures: validatePositiveNumber(
      raw.maxConsecutiveFailures,
      'supervisor.maxConsecutiveFailures',
      5
    ),
    baseDelayMs,
    maxDelayMs: Math.max(baseDelayMs, maxDelayMs),
  };
}

function parseStopWords(value: unknown): string[] {
  if (value === undefined || value === null) return ['exit', 'quit'];
  if (!Array.isArray(value)) {
    throw new Error('config.json: stopWords must be an array of strings');
  }
  const words = value
    .filter((word): word is string => typeof word === 'string')
    .map((word) => word.trim())
    .filter((word) => word.length > 0);
  return words.length > 0 ? words : ['exit', 'quit'];
}

/** Build the full configuration from an already-parsed config file and an environment. */
export function buildConfig(
  file: RawObject,
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {}
): AppConfig {
  return {
    speech: parseSpeechConfig(section(file, 'speech'), env, overrides),
    capture: parseCaptureConfig(section(file, 'capture'), env),
    relay: parseRelayConfig(section(file, 'relay'), env),
    supervisor: parseSupervisorConfig(section(file, 'supervisor')),
    stopWords: parseStopWords(file.stopWords),
    eventLoopLagThresholdMs: validatePositiveNumber(
      file.eventLoopLagThresholdMs,
      'eventLoopLagThresholdMs',
      100
    ),
  };
}

let _config: AppConfig | null = null;

export function getConfig(overrides: ConfigOverrides = {}): AppConfig {
  if (_config) return _config;

  const file = loadConfigFile(path.resolve(process.cwd(), 'config.json'));
  _config = buildConfig(file, process.env, overrides);
  return _config;
}
