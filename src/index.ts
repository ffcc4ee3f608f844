#!/usr/bin/env node
import { parseArgs } from 'util';
import { getConfig, type ConfigOverrides } from './config.js';
import { logger } from './logger.js';
import { FfmpegMicrophoneSource } from './audio/microphone-source.js';
import { createStopPhraseMatcher } from './dispatch/stop-phrase.js';
import { BackendRelay } from './relay/backend-relay.js';
import { SessionDriver } from './session/session-driver.js';
import { GoogleSpeechRecognizer, buildStreamingConfig } from './stt/google-speech-client.js';
import { SttUsageTracker } from './stt/usage-tracker.js';
import { startMonitoring, stopMonitoring } from './monitoring.js';

function usage(): never {
  console.log(`Usage: voice-relay [options]

Options:
  --key-file <path>    Google Cloud service account key (default: GOOGLE_APPLICATION_CREDENTIALS)
  --language <tag>     Recognition language, e.g. en-US (default: SPEECH_LANGUAGE or config.json)
  -h, --help           Show this help`);
  process.exit(0);
}

function readOverrides(argv: string[]): ConfigOverrides {
  const { values } = parseArgs({
    args: argv,
    options: {
      'key-file': { type: 'string' },
      language: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  if (values.help) usage();
  return { keyFile: values['key-file'], languageCode: values.language };
}

const config = getConfig(readOverrides(process.argv.slice(2)));

const recognizer = new GoogleSpeechRecognizer(config.speech);
const usageTracker = new SttUsageTracker(config.speech.costWarningUsd);
const driver = new SessionDriver({
  createSource: () => new FfmpegMicrophoneSource(config.capture),
  recognizer,
  relay: new BackendRelay(config.relay),
  streamingConfig: buildStreamingConfig(config.speech, config.capture),
  capture: config.capture,
  supervisor: config.supervisor,
  isStopPhrase: createStopPhraseMatcher(config.stopWords),
  usage: usageTracker,
});

// --- Graceful shutdown ---

let isShuttingDown = false;

async function shutdown(exitCode: number): Promise<void> {
  stopMonitoring();
  usageTracker.report();
  try {
    await recognizer.close();
  } catch (err) {
    logger.warn('Error closing Google Cloud Speech client:', err);
  }
  process.exit(exitCode);
}

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal} -- stopping...`);
  try {
    await driver.stop();
  } catch (err) {
    logger.error('Error during shutdown:', err);
  }
  await shutdown(0);
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception:', err);
  void gracefulShutdown('uncaughtException');
});

// --- Startup ---

async function main(): Promise<void> {
  logger.info('voice-relay starting...');
  logger.info(`  Language: ${config.speech.languageCode}`);
  logger.info(`  Input: ${config.capture.inputFormat} ${config.capture.inputDevice} @ ${config.capture.sampleRateHertz}Hz`);
  logger.info(`  Relay: ${config.relay.url}`);
  logger.info(`  Stop words: ${config.stopWords.join(', ')}`);

  startMonitoring(config.eventLoopLagThresholdMs);
  await driver.run();
}

main()
  .then(() => shutdown(0))
  .catch(async (err) => {
    logger.error('Fatal error:', err);
    await shutdown(1);
  });
