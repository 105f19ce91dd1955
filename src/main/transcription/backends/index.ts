/**
 * Backend registry: one RecognitionBackend per backend id.
 */

import type { AppSettings } from '../../settings';
import type { BackendRegistry, OfflineEngine } from '../types';
import { AzureAdapter } from './AzureAdapter';
import { CloudBackend } from './CloudBackend';
import { DeepgramAdapter } from './DeepgramAdapter';
import { GoogleAdapter } from './GoogleAdapter';
import { OfflineModelBackend } from './OfflineModelBackend';
import { WhisperCppEngine } from './WhisperCppEngine';
import { YandexAdapter } from './YandexAdapter';

export interface BackendRegistryOptions {
  /** Replaces the whisper.cpp engine (tests, embedded runtimes) */
  offlineEngine?: OfflineEngine;
}

/**
 * Longest time one frame can spend in attempts: an Azure token fetch, the
 * slower of the two cloud request timeouts, then the offline fallback run.
 */
export function longestAttemptChainMs(settings: AppSettings): number {
  return (
    settings.tokenTimeoutMs +
    Math.max(settings.requestTimeoutMs, settings.publicRequestTimeoutMs) +
    settings.offline.runTimeoutMs
  );
}

export function createBackendRegistry(settings: AppSettings, options: BackendRegistryOptions = {}): BackendRegistry {
  const cloudConfig = {
    language: settings.language,
    requestTimeoutMs: settings.requestTimeoutMs,
    publicRequestTimeoutMs: settings.publicRequestTimeoutMs,
  };

  return {
    offline: new OfflineModelBackend({
      modelsDir: settings.offline.modelsDir,
      modelSize: settings.offline.modelSize,
      language: settings.language,
      threads: settings.offline.threads,
      noSpeechThreshold: settings.offline.noSpeechThreshold,
      engine:
        options.offlineEngine ??
        new WhisperCppEngine({ binaryPath: settings.offline.binaryPath, timeoutMs: settings.offline.runTimeoutMs }),
    }),
    azure: new CloudBackend(
      new AzureAdapter({ region: settings.azureRegion, tokenTimeoutMs: settings.tokenTimeoutMs }),
      cloudConfig
    ),
    google: new CloudBackend(new GoogleAdapter(), cloudConfig),
    yandex: new CloudBackend(new YandexAdapter(), cloudConfig),
    deepgram: new CloudBackend(new DeepgramAdapter(), cloudConfig),
  };
}

export { CloudBackend, type VendorAdapter, type VendorRequest } from './CloudBackend';
export { AzureAdapter, type AzureAdapterOptions } from './AzureAdapter';
export { GoogleAdapter } from './GoogleAdapter';
export { YandexAdapter } from './YandexAdapter';
export { DeepgramAdapter } from './DeepgramAdapter';
export { OfflineModelBackend, type OfflineModelOptions } from './OfflineModelBackend';
export { WhisperCppEngine, ModelLoadError, verifyModelFile, GGML_MAGIC } from './WhisperCppEngine';
export { toPrimaryLanguage, toRegionalLocale } from './language';
